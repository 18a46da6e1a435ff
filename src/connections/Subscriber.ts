import { EventEmitter } from 'events';
import { DeliveryError } from '../common/errors';
import {
  CloseReason,
  DeliverFunction,
  SubscriberConfig,
  SubscriberMetadata,
  SubscriberStats,
  SubscriberStatus
} from './types';

export interface Subscriber {
  on(event: 'delivered', listener: (data: string) => void): this;
  on(event: 'delivery-error', listener: (error: DeliveryError) => void): this;
  on(event: 'closed', listener: (reason: CloseReason) => void): this;

  emit(event: 'delivered', data: string): boolean;
  emit(event: 'delivery-error', error: DeliveryError): boolean;
  emit(event: 'closed', reason: CloseReason): boolean;
}

/**
 * One live watcher. Events wait in a bounded queue and are handed to the
 * transport one at a time, in order. Nothing here ever blocks the caller
 * of `enqueue`.
 */
export class Subscriber extends EventEmitter {
  private status: SubscriberStatus = 'active';
  private queue: string[] = [];
  private draining = false;
  private consecutiveFailures = 0;
  private stats: SubscriberStats;
  private readonly config: Required<SubscriberConfig>;

  constructor(
    public readonly id: string,
    private deliverFn: DeliverFunction,
    public readonly metadata: SubscriberMetadata = {},
    config: SubscriberConfig = {}
  ) {
    super();

    this.config = {
      queueCapacity: config.queueCapacity ?? 64,
      maxDeliveryFailures: config.maxDeliveryFailures ?? 3
    };

    const now = Date.now();
    this.stats = {
      connectedAt: now,
      delivered: 0,
      failed: 0,
      queued: 0,
      lastActivity: now
    };
  }

  /**
   * Queue serialized data for delivery. Returns false when the subscriber
   * is closed or its queue is already full; the data is not queued then.
   */
  enqueue(data: string): boolean {
    if (this.status !== 'active') return false;
    if (this.queue.length >= this.config.queueCapacity) return false;

    this.queue.push(data);
    this.stats.queued++;

    if (!this.draining) {
      void this.drain();
    }
    return true;
  }

  close(reason: CloseReason = 'unsubscribed'): void {
    if (this.status === 'closed') return;

    this.status = 'closed';
    this.queue = [];
    this.emit('closed', reason);
    this.removeAllListeners();
  }

  isActive(): boolean {
    return this.status === 'active';
  }

  getStatus(): SubscriberStatus {
    return this.status;
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  getStats(): Readonly<SubscriberStats> {
    return { ...this.stats };
  }

  private async drain(): Promise<void> {
    this.draining = true;

    try {
      let data = this.queue.shift();
      while (data !== undefined && this.status === 'active') {
        await this.deliver(data);
        data = this.status === 'active' ? this.queue.shift() : undefined;
      }
    } finally {
      this.draining = false;
    }
  }

  private async deliver(data: string): Promise<void> {
    try {
      await this.deliverFn(data);
      this.consecutiveFailures = 0;
      this.stats.delivered++;
      this.stats.lastActivity = Date.now();
      this.emit('delivered', data);
    } catch (error) {
      this.consecutiveFailures++;
      this.stats.failed++;
      this.emit('delivery-error', new DeliveryError(this.id, error));

      if (this.consecutiveFailures >= this.config.maxDeliveryFailures) {
        this.close('delivery-failed');
      }
    }
  }
}
