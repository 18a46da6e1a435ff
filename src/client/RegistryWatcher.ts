import WebSocket = require('ws');
import { EventEmitter } from 'events';
import { RegistryAction, RegistryEvent } from '../types';
import { isInstance } from '../persistence/records';
import { RegistryLogger } from '../common/logger';
import { errorMessage } from '../common/errors';
import { RegistryClientError } from './errors';
import { RegistryWatcherConfig } from './types';

export interface RegistryWatcher {
  on(event: 'connected', listener: () => void): this;
  on(event: 'disconnected', listener: (info: { code: number; reason: string }) => void): this;
  on(event: 'registry-event', listener: (event: RegistryEvent) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;

  once(event: 'connected', listener: () => void): this;
  once(event: 'disconnected', listener: (info: { code: number; reason: string }) => void): this;
  once(event: 'registry-event', listener: (event: RegistryEvent) => void): this;

  emit(event: 'connected'): boolean;
  emit(event: 'disconnected', info: { code: number; reason: string }): boolean;
  emit(event: 'registry-event', registryEvent: RegistryEvent): boolean;
  emit(event: 'error', error: Error): boolean;
}

const ACTIONS: readonly RegistryAction[] = ['register', 'heartbeat', 'deregister'];

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return null;
  }
}

export function parseRegistryEvent(raw: string): RegistryEvent | null {
  const parsed = parseJson(raw);
  if (typeof parsed !== 'object' || parsed === null || !('action' in parsed) || !('service' in parsed)) {
    return null;
  }

  const { action: rawAction, service } = parsed;
  const action = ACTIONS.find(candidate => candidate === rawAction);
  if (!action || !isInstance(service)) {
    return null;
  }
  return { action, service };
}

/**
 * Follows the registry's push channel and re-emits every event it
 * carries as 'registry-event'.
 */
export class RegistryWatcher extends EventEmitter {
  private readonly config: Required<RegistryWatcherConfig>;
  private ws?: WebSocket;
  private reconnectTimer?: NodeJS.Timeout;
  private closedByUser = false;

  constructor(config: RegistryWatcherConfig, private readonly logger: RegistryLogger = new RegistryLogger()) {
    super();
    this.config = {
      url: config.url,
      reconnectDelay: config.reconnectDelay ?? 0
    };
  }

  /**
   * Resolves once the socket is open.
   */
  connect(): Promise<void> {
    this.closedByUser = false;

    return new Promise<void>((resolve, reject) => {
      const ws = new WebSocket(this.config.url);
      this.ws = ws;

      const onOpenError = (error: Error): void => {
        reject(new RegistryClientError(`Failed to connect to ${this.config.url}: ${error.message}`, undefined, undefined, { cause: error }));
      };

      ws.once('error', onOpenError);
      ws.once('open', () => {
        ws.off('error', onOpenError);
        ws.on('error', (error: Error) => {
          this.logger.warn(`Watcher socket error: ${error.message}`);
          if (this.listenerCount('error') > 0) {
            this.emit('error', error);
          }
        });
        this.emit('connected');
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => {
        const event = parseRegistryEvent(data.toString());
        if (event) {
          this.emit('registry-event', event);
        } else {
          this.logger.warn('Ignoring malformed registry event');
        }
      });

      ws.on('close', (code: number, reason: Buffer) => {
        if (this.ws === ws) {
          this.ws = undefined;
        }
        this.emit('disconnected', { code, reason: reason.toString() });
        this.scheduleReconnect();
      });
    });
  }

  close(): Promise<void> {
    this.closedByUser = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }

    const ws = this.ws;
    if (!ws || ws.readyState === WebSocket.CLOSED) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      ws.once('close', () => resolve());
      ws.close(1000, 'watcher closed');
    });
  }

  isConnected(): boolean {
    return this.ws?.readyState === WebSocket.OPEN;
  }

  private scheduleReconnect(): void {
    if (this.closedByUser || this.config.reconnectDelay <= 0 || this.reconnectTimer) {
      return;
    }

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      void this.connect().catch((error: unknown) => {
        this.logger.warn(`Watcher reconnect failed: ${errorMessage(error)}`);
      });
    }, this.config.reconnectDelay);
    this.reconnectTimer.unref();
  }
}
