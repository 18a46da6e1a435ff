import * as http from 'http';
import { AddressInfo } from 'net';
import { EventEmitter } from 'events';
import { ServiceRegistry } from '../registry/ServiceRegistry';
import { parseLookupParams } from '../registry/filter/InstanceFilter';
import { SubscriberHub } from '../connections/SubscriberHub';
import { PayloadTooLargeError, ValidationError, toErrorResponse } from '../common/errors';
import { RegistryLogger } from '../common/logger';
import { WatchChannel } from './WatchChannel';

export interface RegistryHttpServerConfig {
  port?: number;
  host?: string;
  cors?: boolean;
  maxBodyBytes?: number;
  wsPath?: string;
  pingInterval?: number;
}

type RouteHandler = (req: http.IncomingMessage, url: URL) => Promise<unknown>;

interface Route {
  method: 'GET' | 'POST';
  handler: RouteHandler;
}

/**
 * HTTP front of the registry: the JSON routes plus the WebSocket watch
 * channel on the same listener.
 */
export class RegistryHttpServer extends EventEmitter {
  private readonly config: Required<RegistryHttpServerConfig>;
  private readonly routes: Map<string, Route>;
  private readonly watchChannel: WatchChannel;
  private server: http.Server | null = null;
  private isRunning = false;
  private startedAt = 0;
  private stats = {
    requestsHandled: 0,
    clientErrors: 0,
    serverErrors: 0
  };

  constructor(
    private readonly registry: ServiceRegistry,
    hub: SubscriberHub,
    config: RegistryHttpServerConfig = {},
    private readonly logger: RegistryLogger = new RegistryLogger()
  ) {
    super();

    this.config = {
      port: config.port ?? 4000,
      host: config.host ?? '0.0.0.0',
      cors: config.cors ?? true,
      maxBodyBytes: config.maxBodyBytes ?? 1024 * 1024,
      wsPath: config.wsPath ?? '/ws',
      pingInterval: config.pingInterval ?? 30000
    };

    this.watchChannel = new WatchChannel(hub, {
      path: this.config.wsPath,
      pingInterval: this.config.pingInterval
    }, logger);

    this.routes = new Map<string, Route>([
      ['/register', { method: 'POST', handler: (req) => this.handleRegister(req) }],
      ['/heartbeat', { method: 'POST', handler: (req) => this.handleHeartbeat(req) }],
      ['/deregister', { method: 'POST', handler: (req) => this.handleDeregister(req) }],
      ['/lookup', { method: 'GET', handler: (_req, url) => this.handleLookup(url) }],
      ['/health', { method: 'GET', handler: async () => this.handleHealth() }]
    ]);
  }

  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Registry HTTP server is already running');
    }

    const server = http.createServer((req, res) => this.handleRequest(req, res));

    try {
      await new Promise<void>((resolve, reject) => {
        const timeout = setTimeout(() => {
          reject(new Error('HTTP server start timeout'));
        }, 5000);

        server.once('error', (error) => {
          clearTimeout(timeout);
          reject(error);
        });

        server.listen(this.config.port, this.config.host, () => {
          clearTimeout(timeout);
          resolve();
        });
      });
    } catch (error) {
      server.close();
      throw error;
    }

    this.server = server;
    this.watchChannel.attach(server);
    this.isRunning = true;
    this.startedAt = Date.now();

    const address = this.getAddress();
    this.logger.info(`Registry listening on http://${address?.host}:${address?.port} (watch channel ${this.config.wsPath})`);
    this.emit('started', address);
  }

  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }
    this.isRunning = false;

    await this.watchChannel.close();

    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        server.closeAllConnections();
      });
    }

    this.emit('stopped');
  }

  /**
   * Bound address, which is how callers learn the port after listening on 0.
   */
  getAddress(): { host: string; port: number } | null {
    const address: AddressInfo | string | null = this.server?.address() ?? null;
    if (address === null || typeof address === 'string') {
      return null;
    }
    return { host: address.address, port: address.port };
  }

  getWatchChannel(): WatchChannel {
    return this.watchChannel;
  }

  getStats() {
    return {
      isRunning: this.isRunning,
      watchers: this.watchChannel.getConnectionCount(),
      ...this.stats
    };
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    this.stats.requestsHandled++;

    if (this.config.cors) {
      res.setHeader('Access-Control-Allow-Origin', '*');
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    }

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? '/', 'http://registry.local');
    const route = this.routes.get(url.pathname);

    if (!route) {
      this.sendJson(res, 404, { error: 'Not found' });
      return;
    }

    if (req.method !== route.method) {
      res.setHeader('Allow', `${route.method}, OPTIONS`);
      this.sendJson(res, 405, { error: 'Method not allowed' });
      return;
    }

    void route.handler(req, url)
      .then((body) => this.sendJson(res, 200, body))
      .catch((error: unknown) => this.sendError(req, res, url, error));
  }

  private async handleRegister(req: http.IncomingMessage): Promise<unknown> {
    const body = await this.readJsonBody(req);
    return this.registry.register(body);
  }

  private async handleHeartbeat(req: http.IncomingMessage): Promise<unknown> {
    const body = await this.readJsonBody(req);
    await this.registry.heartbeat(body);
    return { message: 'heartbeat ok' };
  }

  private async handleDeregister(req: http.IncomingMessage): Promise<unknown> {
    const body = await this.readJsonBody(req);
    await this.registry.deregister(body);
    return { message: 'deregistered' };
  }

  private async handleLookup(url: URL): Promise<unknown> {
    return this.registry.lookup(parseLookupParams(url.searchParams));
  }

  private handleHealth(): unknown {
    return {
      status: 'UP',
      timestamp: new Date().toISOString(),
      uptime: this.startedAt > 0 ? Date.now() - this.startedAt : 0,
      stats: {
        ...this.registry.getHealth(),
        http: this.getStats()
      }
    };
  }

  private async readJsonBody(req: http.IncomingMessage): Promise<unknown> {
    const text = await this.readBody(req);
    try {
      return JSON.parse(text);
    } catch {
      throw new ValidationError([{ field: 'body', message: 'must be valid JSON' }]);
    }
  }

  private readBody(req: http.IncomingMessage): Promise<string> {
    const limit = this.config.maxBodyBytes;
    const declared = Number(req.headers['content-length']);
    if (Number.isFinite(declared) && declared > limit) {
      req.resume();
      return Promise.reject(new PayloadTooLargeError(limit));
    }

    return new Promise<string>((resolve, reject) => {
      const chunks: Buffer[] = [];
      let size = 0;
      let tooLarge = false;

      req.on('data', (chunk: Buffer) => {
        if (tooLarge) return;
        size += chunk.length;
        if (size > limit) {
          tooLarge = true;
          reject(new PayloadTooLargeError(limit));
          return;
        }
        chunks.push(chunk);
      });

      req.on('end', () => {
        if (!tooLarge) {
          resolve(Buffer.concat(chunks).toString('utf8'));
        }
      });

      req.on('error', reject);
    });
  }

  private sendError(req: http.IncomingMessage, res: http.ServerResponse, url: URL, error: unknown): void {
    const { statusCode, body } = toErrorResponse(error);

    if (statusCode >= 500) {
      this.stats.serverErrors++;
      this.logger.error(`[RegistryHttpServer] ${req.method} ${url.pathname} failed:`, error);
    } else {
      this.stats.clientErrors++;
      this.logger.http(`${req.method} ${url.pathname} -> ${statusCode}: ${body.error}`);
    }

    if (statusCode === 413) {
      res.setHeader('Connection', 'close');
    }
    this.sendJson(res, statusCode, body);
  }

  private sendJson(res: http.ServerResponse, statusCode: number, body: unknown): void {
    if (res.headersSent) {
      res.end();
      return;
    }
    const payload = JSON.stringify(body);
    res.writeHead(statusCode, {
      'Content-Type': 'application/json',
      'Content-Length': Buffer.byteLength(payload)
    });
    res.end(payload);
  }
}
