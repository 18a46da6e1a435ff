import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import { ConfigurationError, errorMessage } from '../common/errors';
import { LoggingConfig } from '../common/logger';
import { InstanceStoreType } from '../persistence/InstanceStoreFactory';

/**
 * YAML configuration file schema
 */
export interface YamlRegistryConfig {
  server?: {
    host?: string;
    port?: number;
    /** Send CORS headers */
    cors?: boolean;
    max_body_bytes?: number;
    ws_path?: string;
    /** WebSocket ping interval (ms) */
    ping_interval?: number;
  };

  registry?: {
    /** Max age of the last heartbeat before an instance counts as dead (ms) */
    heartbeat_ttl?: number;
    /** Interval of the eviction sweep (ms) */
    sweep_interval?: number;
  };

  store?: {
    type?: InstanceStoreType;
    file_path?: string;
    /** fsync interval for the write-ahead log (ms), 0 disables */
    sync_interval?: number;
    compact_on_start?: boolean;
  };

  hub?: {
    queue_capacity?: number;
    max_delivery_failures?: number;
  };

  logging?: {
    registry?: boolean;
    store?: boolean;
    sweeper?: boolean;
    hub?: boolean;
    http?: boolean;
  };

  /** Environment-specific overrides */
  environments?: {
    [env: string]: Omit<YamlRegistryConfig, 'environments'>;
  };
}

export interface RegistryNodeConfig {
  server: {
    host: string;
    port: number;
    cors: boolean;
    maxBodyBytes: number;
    wsPath: string;
    pingInterval: number;
  };
  registry: {
    heartbeatTtl: number;
    sweepInterval: number;
  };
  store: {
    type: InstanceStoreType;
    filePath: string;
    syncInterval: number;
    compactOnStart: boolean;
  };
  hub: {
    queueCapacity: number;
    maxDeliveryFailures: number;
  };
  logging: LoggingConfig;
}

export const DEFAULT_CONFIG: RegistryNodeConfig = {
  server: {
    host: '0.0.0.0',
    port: 4000,
    cors: true,
    maxBodyBytes: 1024 * 1024,
    wsPath: '/ws',
    pingInterval: 30000
  },
  registry: {
    heartbeatTtl: 30000,
    sweepInterval: 10000
  },
  store: {
    type: 'memory',
    filePath: './data/registry.wal',
    syncInterval: 1000,
    compactOnStart: true
  },
  hub: {
    queueCapacity: 64,
    maxDeliveryFailures: 3
  },
  logging: {}
};

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(source: Section, key: string, path: string): Section | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (!isSection(value)) {
    throw new ConfigurationError(`${path}${key} must be a mapping`);
  }
  return value;
}

function optionalNumber(source: Section | undefined, key: string, path: string, min: number, max = Number.MAX_SAFE_INTEGER): number | undefined {
  const value = source?.[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${path}.${key} must be an integer between ${min} and ${max}`);
  }
  return value;
}

function optionalString(source: Section | undefined, key: string, path: string): string | undefined {
  const value = source?.[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ConfigurationError(`${path}.${key} must be a non-empty string`);
  }
  return value;
}

function optionalBoolean(source: Section | undefined, key: string, path: string): boolean | undefined {
  const value = source?.[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'boolean') {
    throw new ConfigurationError(`${path}.${key} must be true or false`);
  }
  return value;
}

function optionalStoreType(source: Section | undefined, key: string, path: string): InstanceStoreType | undefined {
  const value = source?.[key];
  if (value === undefined || value === null) return undefined;
  if (value !== 'memory' && value !== 'wal') {
    throw new ConfigurationError(`${path}.${key} must be one of: memory, wal`);
  }
  return value;
}

function assign<T, K extends keyof T>(target: T, key: K, value: T[K] | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

type ServerBlock = NonNullable<YamlRegistryConfig['server']>;
type RegistryBlock = NonNullable<YamlRegistryConfig['registry']>;
type StoreBlock = NonNullable<YamlRegistryConfig['store']>;
type HubBlock = NonNullable<YamlRegistryConfig['hub']>;
type LoggingBlock = NonNullable<YamlRegistryConfig['logging']>;

/**
 * Validate one configuration block (top level or one environment override).
 * Keys left out of the YAML stay absent so they never shadow a lower layer.
 */
function parseBlock(source: Section, prefix: string): Omit<YamlRegistryConfig, 'environments'> {
  const block: Omit<YamlRegistryConfig, 'environments'> = {};

  const server = section(source, 'server', prefix);
  if (server) {
    const path = `${prefix}server`;
    const parsed: ServerBlock = {};
    assign(parsed, 'host', optionalString(server, 'host', path));
    assign(parsed, 'port', optionalNumber(server, 'port', path, 0, 65535));
    assign(parsed, 'cors', optionalBoolean(server, 'cors', path));
    assign(parsed, 'max_body_bytes', optionalNumber(server, 'max_body_bytes', path, 1));
    assign(parsed, 'ws_path', optionalString(server, 'ws_path', path));
    assign(parsed, 'ping_interval', optionalNumber(server, 'ping_interval', path, 1));
    block.server = parsed;
  }

  const registry = section(source, 'registry', prefix);
  if (registry) {
    const path = `${prefix}registry`;
    const parsed: RegistryBlock = {};
    assign(parsed, 'heartbeat_ttl', optionalNumber(registry, 'heartbeat_ttl', path, 1));
    assign(parsed, 'sweep_interval', optionalNumber(registry, 'sweep_interval', path, 1));
    block.registry = parsed;
  }

  const store = section(source, 'store', prefix);
  if (store) {
    const path = `${prefix}store`;
    const parsed: StoreBlock = {};
    assign(parsed, 'type', optionalStoreType(store, 'type', path));
    assign(parsed, 'file_path', optionalString(store, 'file_path', path));
    assign(parsed, 'sync_interval', optionalNumber(store, 'sync_interval', path, 0));
    assign(parsed, 'compact_on_start', optionalBoolean(store, 'compact_on_start', path));
    block.store = parsed;
  }

  const hub = section(source, 'hub', prefix);
  if (hub) {
    const path = `${prefix}hub`;
    const parsed: HubBlock = {};
    assign(parsed, 'queue_capacity', optionalNumber(hub, 'queue_capacity', path, 1));
    assign(parsed, 'max_delivery_failures', optionalNumber(hub, 'max_delivery_failures', path, 1));
    block.hub = parsed;
  }

  const logging = section(source, 'logging', prefix);
  if (logging) {
    const path = `${prefix}logging`;
    const parsed: LoggingBlock = {};
    for (const key of ['registry', 'store', 'sweeper', 'hub', 'http'] as const) {
      assign(parsed, key, optionalBoolean(logging, key, path));
    }
    block.logging = parsed;
  }

  return block;
}

/**
 * YAML configuration loader with per-environment override blocks and
 * REGISTRY_* environment variable overrides
 */
export class RegistryConfiguration extends EventEmitter {
  private config: YamlRegistryConfig = {};
  private configPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = process.env.NODE_ENV || 'development') {
    super();
    this.currentEnvironment = environment;
  }

  /**
   * Load configuration from YAML file
   */
  async loadFromFile(filePath: string): Promise<void> {
    let yamlContent: string;
    try {
      yamlContent = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      this.emit('config-error', { filePath, error });
      throw new ConfigurationError(`Failed to load YAML configuration from ${filePath}: ${errorMessage(error)}`, { cause: error });
    }

    this.config = this.parseFromYaml(yamlContent);
    this.configPath = filePath;
    this.emit('config-loaded', { filePath, config: this.config });
  }

  /**
   * Parse and validate YAML content. An empty document is an empty config.
   */
  parseFromYaml(yamlContent: string): YamlRegistryConfig {
    let parsed: unknown;
    try {
      parsed = yaml.load(yamlContent);
    } catch (error) {
      throw new ConfigurationError(`Failed to parse YAML configuration: ${errorMessage(error)}`, { cause: error });
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isSection(parsed)) {
      throw new ConfigurationError('Configuration root must be a mapping');
    }

    const config: YamlRegistryConfig = parseBlock(parsed, '');

    const environments = section(parsed, 'environments', '');
    if (environments) {
      config.environments = {};
      for (const [name, block] of Object.entries(environments)) {
        if (!isSection(block)) {
          throw new ConfigurationError(`environments.${name} must be a mapping`);
        }
        config.environments[name] = parseBlock(block, `environments.${name}.`);
      }
    }

    return config;
  }

  setConfig(config: YamlRegistryConfig): void {
    this.config = config;
  }

  getConfig(): YamlRegistryConfig {
    return this.config;
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  getEnvironment(): string {
    return this.currentEnvironment;
  }

  /**
   * Defaults, then the file, then the override block of the current
   * environment, then environment variables.
   */
  resolve(env: NodeJS.ProcessEnv = process.env): RegistryNodeConfig {
    const merged = RegistryConfiguration.mergeConfigurations(
      this.config,
      this.config.environments?.[this.currentEnvironment] ?? {}
    );

    const resolved: RegistryNodeConfig = {
      server: {
        host: merged.server?.host ?? DEFAULT_CONFIG.server.host,
        port: merged.server?.port ?? DEFAULT_CONFIG.server.port,
        cors: merged.server?.cors ?? DEFAULT_CONFIG.server.cors,
        maxBodyBytes: merged.server?.max_body_bytes ?? DEFAULT_CONFIG.server.maxBodyBytes,
        wsPath: merged.server?.ws_path ?? DEFAULT_CONFIG.server.wsPath,
        pingInterval: merged.server?.ping_interval ?? DEFAULT_CONFIG.server.pingInterval
      },
      registry: {
        heartbeatTtl: merged.registry?.heartbeat_ttl ?? DEFAULT_CONFIG.registry.heartbeatTtl,
        sweepInterval: merged.registry?.sweep_interval ?? DEFAULT_CONFIG.registry.sweepInterval
      },
      store: {
        type: merged.store?.type ?? DEFAULT_CONFIG.store.type,
        filePath: merged.store?.file_path ?? DEFAULT_CONFIG.store.filePath,
        syncInterval: merged.store?.sync_interval ?? DEFAULT_CONFIG.store.syncInterval,
        compactOnStart: merged.store?.compact_on_start ?? DEFAULT_CONFIG.store.compactOnStart
      },
      hub: {
        queueCapacity: merged.hub?.queue_capacity ?? DEFAULT_CONFIG.hub.queueCapacity,
        maxDeliveryFailures: merged.hub?.max_delivery_failures ?? DEFAULT_CONFIG.hub.maxDeliveryFailures
      },
      logging: {
        enableRegistryLogs: merged.logging?.registry ?? false,
        enableStoreLogs: merged.logging?.store ?? false,
        enableSweeperLogs: merged.logging?.sweeper ?? false,
        enableHubLogs: merged.logging?.hub ?? false,
        enableHttpLogs: merged.logging?.http ?? false
      }
    };

    return RegistryConfiguration.applyEnvironmentVariables(resolved, env);
  }

  /**
   * Merge configurations with precedence
   */
  static mergeConfigurations(
    base: YamlRegistryConfig,
    override: Omit<YamlRegistryConfig, 'environments'>
  ): YamlRegistryConfig {
    return {
      server: { ...base.server, ...override.server },
      registry: { ...base.registry, ...override.registry },
      store: { ...base.store, ...override.store },
      hub: { ...base.hub, ...override.hub },
      logging: { ...base.logging, ...override.logging },
      environments: base.environments
    };
  }

  static applyEnvironmentVariables(config: RegistryNodeConfig, env: NodeJS.ProcessEnv): RegistryNodeConfig {
    const result: RegistryNodeConfig = {
      server: { ...config.server },
      registry: { ...config.registry },
      store: { ...config.store },
      hub: { ...config.hub },
      logging: { ...config.logging }
    };

    if (env.REGISTRY_HOST) {
      result.server.host = env.REGISTRY_HOST;
    }
    if (env.REGISTRY_PORT) {
      result.server.port = RegistryConfiguration.parseIntegerVariable('REGISTRY_PORT', env.REGISTRY_PORT, 0, 65535);
    }
    if (env.REGISTRY_HEARTBEAT_TTL_MS) {
      result.registry.heartbeatTtl = RegistryConfiguration.parseIntegerVariable('REGISTRY_HEARTBEAT_TTL_MS', env.REGISTRY_HEARTBEAT_TTL_MS, 1);
    }
    if (env.REGISTRY_SWEEP_INTERVAL_MS) {
      result.registry.sweepInterval = RegistryConfiguration.parseIntegerVariable('REGISTRY_SWEEP_INTERVAL_MS', env.REGISTRY_SWEEP_INTERVAL_MS, 1);
    }
    if (env.REGISTRY_STORE_TYPE) {
      const type = env.REGISTRY_STORE_TYPE;
      if (type !== 'memory' && type !== 'wal') {
        throw new ConfigurationError('REGISTRY_STORE_TYPE must be one of: memory, wal');
      }
      result.store.type = type;
    }
    if (env.REGISTRY_STORE_PATH) {
      result.store.filePath = env.REGISTRY_STORE_PATH;
    }

    return result;
  }

  private static parseIntegerVariable(name: string, raw: string, min: number, max = Number.MAX_SAFE_INTEGER): number {
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new ConfigurationError(`${name} must be an integer between ${min} and ${max}`);
    }
    return value;
  }
}
