import { EventEmitter } from 'eventemitter3';
import {
  Clock,
  Instance,
  InstanceKey,
  InstancePredicate,
  InstanceRegistration,
  InstanceStore,
  StoreEvents,
  StoreStats,
  systemClock
} from '../../types';
import { NotFoundError } from '../../common/errors';
import { RegistryLogger } from '../../common/logger';
import { matchesPredicate } from '../../registry/filter/InstanceFilter';
import { cloneInstance, stampHeartbeat, stampRegistration, storageKey } from '../records';

export interface InMemoryStoreOptions {
  clock?: Clock;
  logger?: RegistryLogger;
}

/**
 * Map-backed store. Each operation runs to completion without yielding,
 * so per-key writes never interleave and query/deleteWhere see one
 * consistent snapshot.
 */
export class InMemoryInstanceStore extends EventEmitter<StoreEvents> implements InstanceStore {
  readonly type = 'memory';

  private instances = new Map<string, Instance>();
  private readonly clock: Clock;
  private readonly logger: RegistryLogger;
  private stats = { upserts: 0, touches: 0, deletes: 0 };

  constructor(options: InMemoryStoreOptions = {}) {
    super();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new RegistryLogger();
  }

  async start(): Promise<void> {
    this.logger.store('[InMemoryInstanceStore] Started');
  }

  async stop(): Promise<void> {
    this.logger.store(`[InMemoryInstanceStore] Stopped with ${this.instances.size} instances`);
  }

  async upsert(registration: InstanceRegistration): Promise<Instance> {
    const record = stampRegistration(registration, this.clock());
    this.instances.set(storageKey(record), record);
    this.stats.upserts++;

    this.emit('instance:upserted', cloneInstance(record));
    return cloneInstance(record);
  }

  async touchHeartbeat(key: InstanceKey): Promise<Instance> {
    const id = storageKey(key);
    const existing = this.instances.get(id);
    if (!existing) {
      throw new NotFoundError(key.serviceName, key.id);
    }

    const touched = stampHeartbeat(existing, this.clock());
    this.instances.set(id, touched);
    this.stats.touches++;

    this.emit('instance:touched', cloneInstance(touched));
    return cloneInstance(touched);
  }

  async query(predicate: InstancePredicate): Promise<Instance[]> {
    return Array.from(this.instances.values())
      .filter(instance => matchesPredicate(instance, predicate))
      .map(cloneInstance);
  }

  async deleteWhere(predicate: InstancePredicate): Promise<Instance[]> {
    const removed: Instance[] = [];

    for (const [id, instance] of this.instances) {
      if (matchesPredicate(instance, predicate)) {
        this.instances.delete(id);
        removed.push(instance);
      }
    }

    this.stats.deletes += removed.length;
    for (const instance of removed) {
      this.emit('instance:deleted', cloneInstance(instance));
    }
    return removed.map(cloneInstance);
  }

  get(key: InstanceKey): Instance | null {
    const instance = this.instances.get(storageKey(key));
    return instance ? cloneInstance(instance) : null;
  }

  count(): number {
    return this.instances.size;
  }

  getStats(): StoreStats {
    return {
      type: this.type,
      instances: this.instances.size,
      ...this.stats
    };
  }
}
