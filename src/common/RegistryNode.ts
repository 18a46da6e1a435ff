import { Clock, InstanceStore, systemClock } from '../types';
import { InstanceStoreFactory } from '../persistence/InstanceStoreFactory';
import { SubscriberHub } from '../connections/SubscriberHub';
import { LivenessSweeper } from '../monitoring/LivenessSweeper';
import { ServiceRegistry } from '../registry/ServiceRegistry';
import { RegistryHttpServer } from '../transport/RegistryHttpServer';
import { DEFAULT_CONFIG, RegistryConfiguration, RegistryNodeConfig } from '../config/RegistryConfiguration';
import { createLogger, RegistryLogger } from './logger';

export interface RegistryNodeOptions {
  clock?: Clock;
  /** Replaces the store the configuration would build */
  store?: InstanceStore;
  logger?: RegistryLogger;
}

/**
 * Composition root: builds every component from one resolved
 * configuration and owns their start/stop order.
 */
export class RegistryNode {
  readonly config: RegistryNodeConfig;
  readonly store: InstanceStore;
  readonly hub: SubscriberHub;
  readonly sweeper: LivenessSweeper;
  readonly registry: ServiceRegistry;
  readonly http: RegistryHttpServer;

  private readonly logger: RegistryLogger;
  private isStarted = false;

  constructor(config: RegistryNodeConfig = DEFAULT_CONFIG, options: RegistryNodeOptions = {}) {
    this.config = config;
    const clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger(config.logging);

    this.store = options.store ?? InstanceStoreFactory.create({
      type: config.store.type,
      walConfig: {
        filePath: config.store.filePath,
        syncInterval: config.store.syncInterval,
        compactOnStart: config.store.compactOnStart
      },
      clock,
      logger: this.logger
    });

    this.hub = new SubscriberHub({
      queueCapacity: config.hub.queueCapacity,
      maxDeliveryFailures: config.hub.maxDeliveryFailures
    }, this.logger);

    this.sweeper = new LivenessSweeper(this.store, {
      sweepInterval: config.registry.sweepInterval,
      heartbeatTtl: config.registry.heartbeatTtl
    }, clock, this.logger);

    this.registry = new ServiceRegistry(this.store, this.hub, this.sweeper, {
      heartbeatTtl: config.registry.heartbeatTtl
    }, clock, this.logger);

    this.http = new RegistryHttpServer(this.registry, this.hub, {
      host: config.server.host,
      port: config.server.port,
      cors: config.server.cors,
      maxBodyBytes: config.server.maxBodyBytes,
      wsPath: config.server.wsPath,
      pingInterval: config.server.pingInterval
    }, this.logger);
  }

  /**
   * Load a YAML file, apply the environment block and REGISTRY_* variables,
   * and build a node from the result.
   */
  static async fromConfigFile(
    filePath: string,
    environment?: string,
    options: RegistryNodeOptions = {}
  ): Promise<RegistryNode> {
    const configuration = new RegistryConfiguration(environment);
    await configuration.loadFromFile(filePath);
    return new RegistryNode(configuration.resolve(), options);
  }

  async start(): Promise<void> {
    if (this.isStarted) {
      throw new Error('Registry node is already started');
    }

    try {
      await this.registry.start();
      await this.http.start();
      this.isStarted = true;
      this.logger.info(`Registry node started (${this.store.type} store, heartbeat TTL ${this.config.registry.heartbeatTtl}ms)`);
    } catch (error) {
      this.logger.error('Registry node failed to start:', error);
      await this.shutdown();
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (!this.isStarted) {
      return;
    }
    this.isStarted = false;
    await this.shutdown();
    this.logger.info('Registry node stopped');
  }

  getAddress(): { host: string; port: number } | null {
    return this.http.getAddress();
  }

  /**
   * Transport first so no request lands on a stopping registry.
   */
  private async shutdown(): Promise<void> {
    await this.http.stop();
    await this.registry.stop();
  }
}
