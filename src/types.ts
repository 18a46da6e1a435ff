/**
 * Type definitions for the service registry
 */

export const MODES = ['dev', 'staging', 'prod'] as const;

export type Mode = typeof MODES[number];

export const HEALTH_UP = 'UP';

export interface Metadata {
  /** Environment the instance runs in */
  environment: Mode;
  region: string;
  /** Non-negative integer build or API version */
  version: number;
  developer?: string;
  experimental?: boolean;
}

/**
 * What a caller supplies on registration. `health` and `lastHeartbeat`
 * may be present but are always overwritten by the store.
 */
export interface InstanceRegistration {
  serviceName: string;
  id: string;
  host: string;
  port: number;
  mode: Mode;
  metadata: Metadata;
  health?: string;
  lastHeartbeat?: string;
}

export interface Instance extends InstanceRegistration {
  health: string;
  /** ISO-8601 UTC timestamp */
  lastHeartbeat: string;
}

export interface InstanceKey {
  serviceName: string;
  id: string;
}

export type FilterValue = string | number | boolean;

/**
 * Conjunction of conditions over an instance record. Field paths in
 * `equals` are top-level fields or `metadata.<key>`.
 */
export interface InstancePredicate {
  equals?: Record<string, FilterValue>;
  /** Epoch ms, inclusive */
  heartbeatAtOrAfter?: number;
  /** Epoch ms, exclusive */
  heartbeatBefore?: number;
}

export type RegistryAction = 'register' | 'heartbeat' | 'deregister';

export interface RegistryEvent {
  action: RegistryAction;
  service: Instance;
}

export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export interface StoreStats {
  type: string;
  instances: number;
  upserts: number;
  touches: number;
  deletes: number;
}

/**
 * Keyed instance collection. Every mutation is atomic per key and the
 * returned records are copies the caller may keep.
 */
export interface InstanceStore {
  readonly type: string;

  start(): Promise<void>;
  stop(): Promise<void>;

  upsert(registration: InstanceRegistration): Promise<Instance>;
  touchHeartbeat(key: InstanceKey): Promise<Instance>;
  query(predicate: InstancePredicate): Promise<Instance[]>;
  deleteWhere(predicate: InstancePredicate): Promise<Instance[]>;

  get(key: InstanceKey): Instance | null;
  count(): number;
  getStats(): StoreStats;
}

export interface StoreEvents {
  'instance:upserted': (instance: Instance) => void;
  'instance:touched': (instance: Instance) => void;
  'instance:deleted': (instance: Instance) => void;
}
