export interface SubscriberMetadata {
  [key: string]: string | number | boolean | undefined;
}

export interface SubscriberConfig {
  /** Events that may wait for delivery before the subscriber is dropped */
  queueCapacity?: number;
  /** Consecutive failed deliveries before the subscriber is dropped */
  maxDeliveryFailures?: number;
}

/**
 * Sends one serialized event to the remote end. Resolves once the
 * transport has accepted it.
 */
export interface DeliverFunction {
  (data: string): Promise<void>;
}

export type SubscriberStatus = 'active' | 'closed';

export type CloseReason = 'unsubscribed' | 'queue-full' | 'delivery-failed' | 'disconnected' | 'shutdown';

export interface SubscriberStats {
  connectedAt: number;
  delivered: number;
  failed: number;
  queued: number;
  lastActivity: number;
}

export interface HubStats {
  subscribers: number;
  broadcasts: number;
  enqueued: number;
  delivered: number;
  deliveryFailures: number;
  overflows: number;
  dropped: number;
}
