import { Clock, InstanceStore } from '../types';
import { RegistryLogger } from '../common/logger';
import { ConfigurationError } from '../common/errors';
import { InMemoryInstanceStore } from './memory/InMemoryInstanceStore';
import { WriteAheadLogInstanceStore } from './WriteAheadLogInstanceStore';
import { WALConfig } from './wal/types';

export type InstanceStoreType = 'memory' | 'wal';

export interface InstanceStoreFactoryConfig {
  type: InstanceStoreType;
  walConfig?: WALConfig & { compactOnStart?: boolean };
  clock?: Clock;
  logger?: RegistryLogger;
}

export class InstanceStoreFactory {
  static create(config: InstanceStoreFactoryConfig): InstanceStore {
    const { type, clock, logger } = config;

    switch (type) {
      case 'memory':
        return new InMemoryInstanceStore({ clock, logger });

      case 'wal':
        return new WriteAheadLogInstanceStore({ ...config.walConfig, clock, logger });

      default:
        throw new ConfigurationError(`Unknown instance store type: ${String(type)}`);
    }
  }
}
