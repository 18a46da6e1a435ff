import WebSocket = require('ws');
import * as http from 'http';
import { EventEmitter } from 'events';
import { SubscriberHub } from '../connections/SubscriberHub';
import { Subscriber } from '../connections/Subscriber';
import { CloseReason, DeliverFunction } from '../connections/types';
import { RegistryLogger } from '../common/logger';

export interface WatchChannelOptions {
  path?: string;
  /** How often every socket is pinged; a socket that missed the previous ping is dropped */
  pingInterval?: number;
  maxPayload?: number;
}

interface WatchConnection {
  ws: WebSocket;
  subscriber: Subscriber;
  isAlive: boolean;
}

export interface WatchChannel {
  on(event: 'watcher-connected', listener: (info: { subscriberId: string; remoteAddress?: string }) => void): this;
  on(event: 'watcher-disconnected', listener: (info: { subscriberId: string; code: number }) => void): this;
  on(event: 'server-error', listener: (error: Error) => void): this;

  emit(event: 'watcher-connected', info: { subscriberId: string; remoteAddress?: string }): boolean;
  emit(event: 'watcher-disconnected', info: { subscriberId: string; code: number }): boolean;
  emit(event: 'server-error', error: Error): boolean;
}

const CLOSE_CODES: Record<CloseReason, number> = {
  'unsubscribed': 1000,
  'disconnected': 1000,
  'shutdown': 1001,
  'queue-full': 1008,
  'delivery-failed': 1011
};

/**
 * WebSocket push channel for registry events. Every socket becomes one hub
 * subscriber; anything the client sends is ignored.
 */
export class WatchChannel extends EventEmitter {
  private readonly options: Required<WatchChannelOptions>;
  private wss?: WebSocket.Server;
  private connections = new Map<string, WatchConnection>();
  private heartbeatTimer?: NodeJS.Timeout;

  constructor(
    private readonly hub: SubscriberHub,
    options: WatchChannelOptions = {},
    private readonly logger: RegistryLogger = new RegistryLogger()
  ) {
    super();

    this.options = {
      path: options.path || '/ws',
      pingInterval: options.pingInterval || 30000,
      maxPayload: options.maxPayload || 64 * 1024
    };
  }

  attach(server: http.Server): void {
    if (this.wss) return;

    const wss = new WebSocket.Server({
      server,
      path: this.options.path,
      clientTracking: true,
      maxPayload: this.options.maxPayload
    });

    wss.on('connection', (ws: WebSocket, request: http.IncomingMessage) => {
      this.handleNewConnection(ws, request);
    });
    wss.on('error', (error: Error) => {
      this.logger.error('[WatchChannel] WebSocket server error:', error);
      this.emit('server-error', error);
    });

    this.wss = wss;
    this.startHeartbeat();
  }

  async close(): Promise<void> {
    this.stopHeartbeat();

    for (const connection of Array.from(this.connections.values())) {
      this.hub.unsubscribe(connection.subscriber, 'shutdown');
      connection.ws.terminate();
    }
    this.connections.clear();

    const wss = this.wss;
    this.wss = undefined;
    if (wss) {
      await new Promise<void>((resolve) => {
        wss.close(() => resolve());
      });
    }
  }

  getConnectionCount(): number {
    return this.connections.size;
  }

  private handleNewConnection(ws: WebSocket, request: http.IncomingMessage): void {
    const deliver: DeliverFunction = (data) => new Promise<void>((resolve, reject) => {
      if (ws.readyState !== WebSocket.OPEN) {
        reject(new Error('socket is not open'));
        return;
      }
      ws.send(data, (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });

    const remoteAddress = request.socket.remoteAddress;
    const subscriber = this.hub.subscribe(deliver, {
      remoteAddress,
      userAgent: request.headers['user-agent']
    });
    const connection: WatchConnection = { ws, subscriber, isAlive: true };
    this.connections.set(subscriber.id, connection);

    // The hub may drop the subscriber (full queue, failed sends); close the socket with it
    subscriber.on('closed', (reason) => {
      if (reason !== 'disconnected' && ws.readyState === WebSocket.OPEN) {
        ws.close(CLOSE_CODES[reason], reason);
      }
    });

    ws.on('pong', () => {
      connection.isAlive = true;
    });
    ws.on('message', () => {
      connection.isAlive = true;
    });
    ws.on('error', (error: Error) => {
      this.logger.warn(`[WatchChannel] Socket error for watcher ${subscriber.id}:`, error.message);
    });
    ws.on('close', (code: number) => {
      this.connections.delete(subscriber.id);
      this.hub.unsubscribe(subscriber, 'disconnected');
      this.logger.http(`Watcher ${subscriber.id} disconnected with code ${code}`);
      this.emit('watcher-disconnected', { subscriberId: subscriber.id, code });
    });

    this.logger.http(`Watcher ${subscriber.id} connected from ${remoteAddress}`);
    this.emit('watcher-connected', { subscriberId: subscriber.id, remoteAddress });
  }

  private startHeartbeat(): void {
    this.heartbeatTimer = setInterval(() => {
      for (const connection of this.connections.values()) {
        if (!connection.isAlive) {
          this.logger.http(`Watcher ${connection.subscriber.id} missed a ping, terminating`);
          connection.ws.terminate();
          continue;
        }
        connection.isAlive = false;
        connection.ws.ping();
      }
    }, this.options.pingInterval);
    this.heartbeatTimer.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }
}
