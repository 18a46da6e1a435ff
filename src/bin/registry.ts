#!/usr/bin/env node
import { existsSync } from 'fs';
import * as path from 'path';
import { RegistryNode } from '../common/RegistryNode';
import { RegistryConfiguration } from '../config/RegistryConfiguration';
import { errorMessage } from '../common/errors';
import { createLogger } from '../common/logger';
import { parseCliArgs, USAGE } from './cliArgs';

const DEFAULT_CONFIG_PATH = path.join('config', 'registry.yaml');

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help) {
    console.log(USAGE);
    return;
  }

  const configuration = new RegistryConfiguration(args.environment);
  const configPath = args.configPath ?? (existsSync(DEFAULT_CONFIG_PATH) ? DEFAULT_CONFIG_PATH : undefined);
  if (configPath) {
    await configuration.loadFromFile(configPath);
  }

  const node = new RegistryNode(configuration.resolve());
  const logger = createLogger(node.config.logging);
  await node.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals): void => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}, shutting down`);

    void node.stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error('Shutdown failed:', error);
        process.exit(1);
      });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

void main().catch((error: unknown) => {
  console.error(`service-registry: ${errorMessage(error)}`);
  process.exit(1);
});
