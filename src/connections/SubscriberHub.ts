import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { Subscriber } from './Subscriber';
import {
  CloseReason,
  DeliverFunction,
  HubStats,
  SubscriberConfig,
  SubscriberMetadata
} from './types';
import { RegistryEvent } from '../types';
import { RegistryLogger } from '../common/logger';
import { DeliveryError } from '../common/errors';

export interface SubscriberHub {
  on(event: 'subscriber-added', listener: (subscriber: Subscriber) => void): this;
  on(event: 'subscriber-removed', listener: (info: { subscriberId: string; reason: CloseReason }) => void): this;
  on(event: 'delivery-error', listener: (error: DeliveryError) => void): this;
  on(event: 'broadcast-sent', listener: (info: { event: RegistryEvent; enqueued: number }) => void): this;

  emit(event: 'subscriber-added', subscriber: Subscriber): boolean;
  emit(event: 'subscriber-removed', info: { subscriberId: string; reason: CloseReason }): boolean;
  emit(event: 'delivery-error', error: DeliveryError): boolean;
  emit(event: 'broadcast-sent', info: { event: RegistryEvent; enqueued: number }): boolean;
}

/**
 * Owns the set of live subscribers and fans registry events out to them.
 * A broadcast only enqueues; slow or broken subscribers are dropped
 * instead of holding up the mutation that triggered the event.
 */
export class SubscriberHub extends EventEmitter {
  private subscribers = new Map<string, Subscriber>();
  private readonly defaultConfig: Required<SubscriberConfig>;
  private readonly logger: RegistryLogger;
  private stats = {
    broadcasts: 0,
    enqueued: 0,
    delivered: 0,
    deliveryFailures: 0,
    overflows: 0,
    dropped: 0
  };

  constructor(config: SubscriberConfig = {}, logger: RegistryLogger = new RegistryLogger()) {
    super();
    this.defaultConfig = {
      queueCapacity: config.queueCapacity ?? 64,
      maxDeliveryFailures: config.maxDeliveryFailures ?? 3
    };
    this.logger = logger;
  }

  subscribe(deliverFn: DeliverFunction, metadata: SubscriberMetadata = {}, config?: SubscriberConfig): Subscriber {
    const subscriber = new Subscriber(randomUUID(), deliverFn, metadata, {
      queueCapacity: config?.queueCapacity ?? this.defaultConfig.queueCapacity,
      maxDeliveryFailures: config?.maxDeliveryFailures ?? this.defaultConfig.maxDeliveryFailures
    });

    subscriber.on('delivered', () => {
      this.stats.delivered++;
    });
    subscriber.on('delivery-error', (error) => {
      this.stats.deliveryFailures++;
      this.logger.warn(`[SubscriberHub] ${error.message}`);
      this.emit('delivery-error', error);
    });
    subscriber.on('closed', (reason) => this.handleSubscriberClosed(subscriber.id, reason));

    this.subscribers.set(subscriber.id, subscriber);
    this.logger.hub(`Subscriber ${subscriber.id} added. Total subscribers: ${this.subscribers.size}`);

    this.emit('subscriber-added', subscriber);
    return subscriber;
  }

  /**
   * Remove a subscriber. Safe to call more than once and from inside a
   * broadcast.
   */
  unsubscribe(handle: Subscriber | string, reason: CloseReason = 'unsubscribed'): boolean {
    const id = typeof handle === 'string' ? handle : handle.id;
    const subscriber = this.subscribers.get(id);
    if (!subscriber) return false;

    // close() reports back through handleSubscriberClosed
    subscriber.close(reason);
    return true;
  }

  broadcast(event: RegistryEvent): number {
    const data = JSON.stringify(event);
    const targets = Array.from(this.subscribers.values());
    let enqueued = 0;

    this.stats.broadcasts++;

    for (const subscriber of targets) {
      if (!subscriber.isActive()) continue;

      if (subscriber.enqueue(data)) {
        enqueued++;
      } else {
        this.stats.overflows++;
        this.logger.warn(`[SubscriberHub] Queue full for subscriber ${subscriber.id}, dropping it`);
        this.unsubscribe(subscriber, 'queue-full');
      }
    }

    this.stats.enqueued += enqueued;
    this.emit('broadcast-sent', { event, enqueued });
    return enqueued;
  }

  getSubscriber(id: string): Subscriber | undefined {
    return this.subscribers.get(id);
  }

  size(): number {
    return this.subscribers.size;
  }

  getStats(): HubStats {
    return {
      subscribers: this.subscribers.size,
      ...this.stats
    };
  }

  /**
   * Drop every subscriber. Used on shutdown.
   */
  close(): void {
    for (const subscriber of Array.from(this.subscribers.values())) {
      subscriber.close('shutdown');
    }
  }

  private handleSubscriberClosed(id: string, reason: CloseReason): void {
    if (!this.subscribers.delete(id)) return;

    if (reason !== 'unsubscribed' && reason !== 'disconnected' && reason !== 'shutdown') {
      this.stats.dropped++;
    }

    this.logger.hub(`Subscriber ${id} removed (${reason}). Total subscribers: ${this.subscribers.size}`);
    this.emit('subscriber-removed', { subscriberId: id, reason });
  }
}
