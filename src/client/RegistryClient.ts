import * as http from 'http';
import * as https from 'https';
import { Instance, InstanceKey, InstanceRegistration } from '../types';
import { validateRegistration } from '../registry/validation';
import { isInstance } from '../persistence/records';
import { RegistryLogger } from '../common/logger';
import { errorMessage } from '../common/errors';
import { RegistryClientError } from './errors';
import { HeartbeatStatus, LookupFilter, RegistryClientConfig } from './types';

interface HttpResult {
  statusCode: number;
  body: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Client for the registry HTTP API, with an optional background
 * heartbeat loop for the instance it registered.
 */
export class RegistryClient {
  private readonly config: Required<RegistryClientConfig>;
  private readonly baseUrl: URL;
  private heartbeatTimer?: NodeJS.Timeout;
  private heartbeatInFlight = false;
  private heartbeatFailures = 0;

  constructor(config: RegistryClientConfig, private readonly logger: RegistryLogger = new RegistryLogger()) {
    this.config = {
      baseUrl: config.baseUrl,
      timeout: config.timeout ?? 5000,
      maxHeartbeatFailures: config.maxHeartbeatFailures ?? 3
    };
    this.baseUrl = new URL(this.config.baseUrl);
  }

  /**
   * Register (or re-register) an instance. The registration is checked
   * locally first, with the same rules the server applies.
   */
  async register(registration: InstanceRegistration): Promise<Instance> {
    const clean = validateRegistration(registration);
    const result = await this.request('POST', '/register', clean, 'Failed to register service');
    if (!isInstance(result.body)) {
      throw new RegistryClientError('Failed to register service: unexpected response body', result.statusCode);
    }
    return result.body;
  }

  async heartbeat(serviceName: string, id: string): Promise<void> {
    const key: InstanceKey = { serviceName, id };
    await this.request('POST', '/heartbeat', key, 'Failed to send heartbeat');
  }

  async deregister(serviceName: string, id: string): Promise<void> {
    const key: InstanceKey = { serviceName, id };
    await this.request('POST', '/deregister', key, 'Failed to deregister service');
  }

  /**
   * Alive instances matching the filter.
   */
  async lookup(filter: LookupFilter = {}): Promise<Instance[]> {
    const params = new URLSearchParams();
    if (filter.service) {
      params.set('service', filter.service);
    }
    if (filter.mode) {
      params.set('mode', filter.mode);
    }
    for (const [key, value] of Object.entries(filter.metadata ?? {})) {
      if (value !== undefined) {
        params.set(key, String(value));
      }
    }

    const query = params.toString();
    const result = await this.request('GET', query ? `/lookup?${query}` : '/lookup', undefined, 'Failed to look up services');
    if (!Array.isArray(result.body)) {
      throw new RegistryClientError('Failed to look up services: unexpected response body', result.statusCode);
    }
    return result.body.filter(isInstance);
  }

  /**
   * Register, then keep the registration alive with periodic heartbeats.
   */
  async autoRegister(registration: InstanceRegistration, heartbeatMs = 10000): Promise<Instance> {
    const stored = await this.register(registration);
    this.startHeartbeat(stored.serviceName, stored.id, heartbeatMs);
    this.logger.info(`Registered ${stored.serviceName}/${stored.id}, heartbeat every ${heartbeatMs}ms`);
    return stored;
  }

  /**
   * Send heartbeats every `intervalMs`. The loop stops itself after
   * `maxHeartbeatFailures` failures in a row.
   */
  startHeartbeat(serviceName: string, id: string, intervalMs = 10000): void {
    this.stopHeartbeat();

    this.heartbeatTimer = setInterval(() => {
      void this.beat(serviceName, id);
    }, intervalMs);
    this.heartbeatTimer.unref();
  }

  stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
      this.heartbeatFailures = 0;
    }
  }

  getHeartbeatStatus(): HeartbeatStatus {
    return {
      isRunning: this.heartbeatTimer !== undefined,
      failureCount: this.heartbeatFailures
    };
  }

  private async beat(serviceName: string, id: string): Promise<void> {
    if (this.heartbeatInFlight) return;
    this.heartbeatInFlight = true;

    try {
      await this.heartbeat(serviceName, id);
      this.heartbeatFailures = 0;
    } catch (error) {
      this.heartbeatFailures++;
      this.logger.warn(
        `Heartbeat for ${serviceName}/${id} failed (${this.heartbeatFailures}/${this.config.maxHeartbeatFailures}): ${errorMessage(error)}`
      );

      if (this.heartbeatFailures >= this.config.maxHeartbeatFailures) {
        this.logger.error(`Stopping heartbeat for ${serviceName}/${id} after repeated failures`);
        if (this.heartbeatTimer) {
          clearInterval(this.heartbeatTimer);
          this.heartbeatTimer = undefined;
        }
      }
    } finally {
      this.heartbeatInFlight = false;
    }
  }

  private request(method: 'GET' | 'POST', path: string, payload: unknown, failure: string): Promise<HttpResult> {
    const target = new URL(path, this.baseUrl);
    const postData = payload === undefined ? undefined : JSON.stringify(payload);

    const headers: http.OutgoingHttpHeaders = { 'Accept': 'application/json' };
    if (postData !== undefined) {
      headers['Content-Type'] = 'application/json';
      headers['Content-Length'] = Buffer.byteLength(postData);
    }

    return new Promise<HttpResult>((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage): void => {
        let responseBody = '';
        res.setEncoding('utf8');

        res.on('data', (chunk: string) => {
          responseBody += chunk;
        });

        res.on('end', () => {
          const statusCode = res.statusCode ?? 0;
          let body: unknown = null;
          if (responseBody !== '') {
            try {
              body = JSON.parse(responseBody);
            } catch (error) {
              reject(new RegistryClientError(`${failure}: response is not JSON`, statusCode, undefined, { cause: error }));
              return;
            }
          }

          if (statusCode >= 200 && statusCode < 300) {
            resolve({ statusCode, body });
            return;
          }

          const serverMessage = isRecord(body) && typeof body.error === 'string' ? body.error : `HTTP ${statusCode}`;
          const details = isRecord(body) ? body.details : undefined;
          reject(new RegistryClientError(`${failure}: ${serverMessage}`, statusCode, details));
        });
      };

      const options: http.RequestOptions = { method, headers, timeout: this.config.timeout };
      const req = target.protocol === 'https:'
        ? https.request(target, options, onResponse)
        : http.request(target, options, onResponse);

      req.on('error', (error) => {
        reject(new RegistryClientError(`${failure}: ${error.message}`, undefined, undefined, { cause: error }));
      });

      req.on('timeout', () => {
        req.destroy(new Error('Request timeout'));
      });

      if (postData !== undefined) {
        req.write(postData);
      }
      req.end();
    });
  }
}
