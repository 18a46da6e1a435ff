import { EventEmitter } from 'eventemitter3';
import {
  Clock,
  HEALTH_UP,
  Instance,
  InstanceKey,
  InstancePredicate,
  InstanceRegistration,
  InstanceStore,
  StoreEvents,
  StoreStats,
  systemClock
} from '../types';
import { NotFoundError, RegistryError, StoreError } from '../common/errors';
import { RegistryLogger } from '../common/logger';
import { matchesPredicate } from '../registry/filter/InstanceFilter';
import { InstanceUpdate, WALConfig } from './wal/types';
import { WALWriterImpl } from './wal/WALWriter';
import { WALReaderImpl } from './wal/WALReader';
import { cloneInstance, stampHeartbeat, stampRegistration, storageKey } from './records';

export interface WriteAheadLogStoreOptions extends WALConfig {
  /** Rewrite the log to one entry per live instance after replay */
  compactOnStart?: boolean;
  clock?: Clock;
  logger?: RegistryLogger;
}

/**
 * Instance store that appends every mutation to a write-ahead log before
 * applying it to memory. Mutations run one at a time on a write queue, so
 * the log order is the apply order; a failed append leaves memory as it was.
 */
export class WriteAheadLogInstanceStore extends EventEmitter<StoreEvents> implements InstanceStore {
  readonly type = 'wal';

  private instances = new Map<string, Instance>();
  private walWriter: WALWriterImpl;
  private walReader: WALReaderImpl;
  private writeQueue: Promise<void> = Promise.resolve();
  private isRunning = false;
  private readonly compactOnStart: boolean;
  private readonly clock: Clock;
  private readonly logger: RegistryLogger;
  private stats = { upserts: 0, touches: 0, deletes: 0 };

  constructor(options: WriteAheadLogStoreOptions = {}) {
    super();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? new RegistryLogger();
    this.compactOnStart = options.compactOnStart ?? true;

    const filePath = options.filePath || './data/registry.wal';
    this.walWriter = new WALWriterImpl({ ...options, filePath }, this.logger, this.clock);
    this.walReader = new WALReaderImpl(filePath, this.logger);
  }

  async start(): Promise<void> {
    if (this.isRunning) return;

    try {
      this.instances.clear();
      const result = await this.walReader.replay(entry => this.applyUpdate(entry.data));
      await this.walWriter.initialize();

      if (this.compactOnStart) {
        await this.compact();
      }

      this.isRunning = true;
      this.logger.store(
        `[WriteAheadLogInstanceStore] Started with ${this.instances.size} instances ` +
        `(${result.applied} entries replayed, ${result.skipped} skipped)`
      );
    } catch (error) {
      throw new StoreError('start', error);
    }
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;

    // Let queued writes land before the log closes
    let pending: Promise<void>;
    do {
      pending = this.writeQueue;
      await pending;
    } while (pending !== this.writeQueue);

    this.isRunning = false;
    await this.walWriter.close();
    await this.walReader.close();
    this.logger.store('[WriteAheadLogInstanceStore] Stopped');
  }

  upsert(registration: InstanceRegistration): Promise<Instance> {
    return this.enqueue('upsert', async () => {
      const record = stampRegistration(registration, this.clock());

      await this.appendToLog({ operation: 'UPSERT', instance: record });
      this.applyUpdate({ operation: 'UPSERT', instance: record });
      this.stats.upserts++;

      this.emit('instance:upserted', cloneInstance(record));
      return cloneInstance(record);
    });
  }

  touchHeartbeat(key: InstanceKey): Promise<Instance> {
    return this.enqueue('touchHeartbeat', async () => {
      const existing = this.instances.get(storageKey(key));
      if (!existing) {
        throw new NotFoundError(key.serviceName, key.id);
      }

      const touched = stampHeartbeat(existing, this.clock());
      const update: InstanceUpdate = {
        operation: 'TOUCH',
        key: { serviceName: key.serviceName, id: key.id },
        lastHeartbeat: touched.lastHeartbeat
      };

      await this.appendToLog(update);
      this.applyUpdate(update);
      this.stats.touches++;

      this.emit('instance:touched', cloneInstance(touched));
      return cloneInstance(touched);
    });
  }

  async query(predicate: InstancePredicate): Promise<Instance[]> {
    return Array.from(this.instances.values())
      .filter(instance => matchesPredicate(instance, predicate))
      .map(cloneInstance);
  }

  deleteWhere(predicate: InstancePredicate): Promise<Instance[]> {
    return this.enqueue('deleteWhere', async () => {
      const removed = Array.from(this.instances.values())
        .filter(instance => matchesPredicate(instance, predicate));

      if (removed.length === 0) {
        return [];
      }

      const update: InstanceUpdate = {
        operation: 'DELETE',
        keys: removed.map(instance => ({ serviceName: instance.serviceName, id: instance.id }))
      };

      await this.appendToLog(update);
      this.applyUpdate(update);
      this.stats.deletes += removed.length;

      for (const instance of removed) {
        this.emit('instance:deleted', cloneInstance(instance));
      }
      return removed.map(cloneInstance);
    });
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

  getCurrentLSN(): number {
    return this.walWriter.getCurrentLSN();
  }

  /**
   * Rewrite the log so it holds one upsert per live instance.
   */
  async compact(): Promise<void> {
    const updates: InstanceUpdate[] = Array.from(this.instances.values())
      .map((instance): InstanceUpdate => ({ operation: 'UPSERT', instance: cloneInstance(instance) }));

    await this.walWriter.rewrite(updates);
    this.logger.store(`[WriteAheadLogInstanceStore] Compacted log to ${updates.length} entries`);
  }

  /**
   * Append one update, compacting first when the log is over its size
   * limit. Runs inside the write queue, so the live set is stable.
   */
  private async appendToLog(update: InstanceUpdate): Promise<void> {
    if (await this.walWriter.exceedsSizeLimit()) {
      await this.compact();
      if (await this.walWriter.exceedsSizeLimit()) {
        this.logger.warn('[WriteAheadLogInstanceStore] Log is still over its size limit after compaction');
      }
    }
    await this.walWriter.append(update);
  }

  private applyUpdate(update: InstanceUpdate): void {
    switch (update.operation) {
      case 'UPSERT':
        this.instances.set(storageKey(update.instance), cloneInstance(update.instance));
        break;

      case 'TOUCH': {
        const existing = this.instances.get(storageKey(update.key));
        if (existing) {
          this.instances.set(storageKey(update.key), { ...existing, health: HEALTH_UP, lastHeartbeat: update.lastHeartbeat });
        }
        break;
      }

      case 'DELETE':
        for (const key of update.keys) {
          this.instances.delete(storageKey(key));
        }
        break;
    }
  }

  private enqueue<T>(operation: string, task: () => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      if (!this.isRunning) {
        throw new StoreError(operation, new Error('store is not running'));
      }
      try {
        return await task();
      } catch (error) {
        if (error instanceof RegistryError) throw error;
        throw new StoreError(operation, error);
      }
    };

    const result = this.writeQueue.then(run);
    this.writeQueue = result.then(() => undefined, () => undefined);
    return result;
  }
}
