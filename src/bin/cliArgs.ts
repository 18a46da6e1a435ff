export interface CliArgs {
  configPath?: string;
  environment?: string;
  help: boolean;
}

export const USAGE = `Usage: service-registry [options]

Options:
  -c, --config <path>   YAML configuration file (default: config/registry.yaml when present)
  -e, --env <name>      Environment block to apply (default: NODE_ENV or development)
  -h, --help            Show this help

Environment variables REGISTRY_HOST, REGISTRY_PORT, REGISTRY_HEARTBEAT_TTL_MS,
REGISTRY_SWEEP_INTERVAL_MS, REGISTRY_STORE_TYPE and REGISTRY_STORE_PATH
override the file.`;

/**
 * Parse the arguments after the script name. Unknown flags are an error.
 */
export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-c':
      case '--config':
        result.configPath = requireValue(arg, args[++i]);
        break;
      case '-e':
      case '--env':
        result.environment = requireValue(arg, args[++i]);
        break;
      case '-h':
      case '--help':
        result.help = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('-')) {
    throw new Error(`${flag} needs a value`);
  }
  return value;
}
