import { Mode } from '../types';

export interface RegistryClientConfig {
  /** Base URL of the registry, e.g. http://127.0.0.1:4000 */
  baseUrl: string;
  /** Request timeout (ms) */
  timeout?: number;
  /** Consecutive heartbeat failures before the heartbeat loop stops itself */
  maxHeartbeatFailures?: number;
}

export interface LookupFilter {
  service?: string;
  mode?: Mode;
  /** Metadata equality filters; values are sent as query-string text */
  metadata?: Record<string, string | number | boolean | undefined>;
}

export interface HeartbeatStatus {
  isRunning: boolean;
  failureCount: number;
}

export interface RegistryWatcherConfig {
  /** WebSocket URL, e.g. ws://127.0.0.1:4000/ws */
  url: string;
  /** Delay before reconnecting after the socket drops (ms); 0 disables reconnects */
  reconnectDelay?: number;
}
