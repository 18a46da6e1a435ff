import { Clock, Instance, InstanceStore, RegistryAction, RegistryEvent, StoreStats, systemClock } from '../types';
import { HubStats } from '../connections/types';
import { NotFoundError } from '../common/errors';
import { RegistryLogger } from '../common/logger';
import { SubscriberHub } from '../connections/SubscriberHub';
import { LivenessSweeper, SweeperStats } from '../monitoring/LivenessSweeper';
import { buildPredicate, keyPredicate, LookupQuery } from './filter/InstanceFilter';
import { validateInstanceKey, validateRegistration } from './validation';

export interface ServiceRegistryConfig {
  heartbeatTtl: number;
}

export interface ServiceRegistryStats {
  registrations: number;
  heartbeats: number;
  deregistrations: number;
  lookups: number;
  evictions: number;
}

export interface RegistryHealth {
  registry: ServiceRegistryStats;
  store: StoreStats;
  sweeper: SweeperStats;
  hub: HubStats;
}

/**
 * Binds register, heartbeat, deregister and lookup to the store, the
 * sweeper and the hub. A mutation that reached the store counts as done;
 * whatever happens to its broadcast is not the caller's concern.
 */
export class ServiceRegistry {
  private readonly config: ServiceRegistryConfig;
  private stats: ServiceRegistryStats = {
    registrations: 0,
    heartbeats: 0,
    deregistrations: 0,
    lookups: 0,
    evictions: 0
  };
  private readonly onEvicted = (instances: Instance[]): void => {
    this.stats.evictions += instances.length;
    for (const instance of instances) {
      this.publish('deregister', instance);
    }
  };

  constructor(
    private readonly store: InstanceStore,
    private readonly hub: SubscriberHub,
    private readonly sweeper: LivenessSweeper,
    config: Partial<ServiceRegistryConfig> = {},
    private readonly clock: Clock = systemClock,
    private readonly logger: RegistryLogger = new RegistryLogger()
  ) {
    this.config = {
      heartbeatTtl: config.heartbeatTtl ?? 30000
    };
  }

  async start(): Promise<void> {
    await this.store.start();
    this.sweeper.on('evicted', this.onEvicted);
    this.sweeper.start();
    this.logger.registry(`Started with ${this.store.type} store`);
  }

  async stop(): Promise<void> {
    await this.sweeper.stop();
    this.sweeper.off('evicted', this.onEvicted);
    this.hub.close();
    await this.store.stop();
    this.logger.registry('Stopped');
  }

  async register(body: unknown): Promise<Instance> {
    const registration = validateRegistration(body);
    const stored = await this.store.upsert(registration);

    this.stats.registrations++;
    this.logger.registry(`Registered ${stored.serviceName}/${stored.id} at ${stored.host}:${stored.port}`);
    this.publish('register', stored);
    return stored;
  }

  async heartbeat(body: unknown): Promise<Instance> {
    const key = validateInstanceKey(body);
    const touched = await this.store.touchHeartbeat(key);

    this.stats.heartbeats++;
    this.publish('heartbeat', touched);
    return touched;
  }

  async deregister(body: unknown): Promise<Instance[]> {
    const key = validateInstanceKey(body);
    const removed = await this.store.deleteWhere(keyPredicate(key));
    if (removed.length === 0) {
      throw new NotFoundError(key.serviceName, key.id);
    }

    this.stats.deregistrations += removed.length;
    this.logger.registry(`Deregistered ${key.serviceName}/${key.id}`);
    for (const instance of removed) {
      this.publish('deregister', instance);
    }
    return removed;
  }

  /**
   * Instances matching the filter whose heartbeat is within the TTL.
   */
  async lookup(query: LookupQuery): Promise<Instance[]> {
    const predicate = buildPredicate(query, {
      aliveOnly: true,
      ttlMs: this.config.heartbeatTtl,
      now: this.clock()
    });

    this.stats.lookups++;
    return this.store.query(predicate);
  }

  getStats(): ServiceRegistryStats {
    return { ...this.stats };
  }

  getHealth(): RegistryHealth {
    return {
      registry: this.getStats(),
      store: this.store.getStats(),
      sweeper: this.sweeper.getStats(),
      hub: this.hub.getStats()
    };
  }

  private publish(action: RegistryAction, service: Instance): void {
    const event: RegistryEvent = { action, service };
    try {
      this.hub.broadcast(event);
    } catch (error) {
      this.logger.warn(`[ServiceRegistry] Broadcast of ${action} for ${service.serviceName}/${service.id} failed:`, error);
    }
  }
}
