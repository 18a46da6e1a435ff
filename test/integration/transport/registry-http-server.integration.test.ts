import WebSocket = require('ws');
import { RegistryNode } from '../../../src/common/RegistryNode';
import { DEFAULT_CONFIG } from '../../../src/config/RegistryConfiguration';
import { InMemoryInstanceStore } from '../../../src/persistence/memory/InMemoryInstanceStore';
import { StoreError } from '../../../src/common/errors';
import { Subscriber } from '../../../src/connections/Subscriber';
import { CloseReason } from '../../../src/connections/types';
import { Instance, InstancePredicate, InstanceRegistration, RegistryEvent } from '../../../src/types';
import { makeRegistration } from '../../fixtures/instances';
import { httpRequest } from '../../helpers/httpRequest';

function nextEvent(ws: WebSocket): Promise<RegistryEvent> {
  return new Promise<RegistryEvent>((resolve) => {
    ws.once('message', (data: WebSocket.RawData) => resolve(JSON.parse(data.toString())));
  });
}

function openSocket(url: string): Promise<WebSocket> {
  return new Promise<WebSocket>((resolve, reject) => {
    const ws = new WebSocket(url);
    ws.once('open', () => resolve(ws));
    ws.once('error', reject);
  });
}

class FailingStore extends InMemoryInstanceStore {
  failing = true;

  async upsert(registration: InstanceRegistration): Promise<Instance> {
    if (this.failing) throw new StoreError('upsert', new Error('disk full'));
    return super.upsert(registration);
  }

  async query(predicate: InstancePredicate): Promise<Instance[]> {
    if (this.failing) throw new Error('connection reset');
    return super.query(predicate);
  }
}

describe('RegistryHttpServer', () => {
  let node: RegistryNode;
  let port: number;

  beforeEach(async () => {
    node = new RegistryNode({
      ...DEFAULT_CONFIG,
      server: { ...DEFAULT_CONFIG.server, host: '127.0.0.1', port: 0, maxBodyBytes: 1024 }
    });
    await node.start();

    const address = node.getAddress();
    if (!address) throw new Error('server did not bind');
    port = address.port;
  });

  afterEach(async () => {
    await node.stop();
  });

  const register = (body: unknown = makeRegistration()) =>
    httpRequest(port, 'POST', '/register', JSON.stringify(body));

  describe('POST /register', () => {
    it('returns the stored instance', async () => {
      const response = await register();

      expect(response.status).toBe(200);
      expect(response.headers['content-type']).toBe('application/json');
      expect(response.json()).toMatchObject({ ...makeRegistration(), health: 'UP' });
    });

    it('answers 400 with details for an invalid body', async () => {
      const response = await register({ ...makeRegistration(), port: 0 });

      expect(response.status).toBe(400);
      expect(response.json()).toEqual({
        error: 'port: must be an integer between 1 and 65535',
        details: [{ field: 'port', message: 'must be an integer between 1 and 65535' }]
      });
    });

    it('answers 400 for malformed JSON', async () => {
      const response = await httpRequest(port, 'POST', '/register', '{"serviceName": ');

      expect(response.status).toBe(400);
      expect(response.json()).toEqual({
        error: 'body: must be valid JSON',
        details: [{ field: 'body', message: 'must be valid JSON' }]
      });
    });

    it('answers 413 for an oversized body', async () => {
      const response = await register(makeRegistration({
        metadata: { environment: 'prod', region: 'eu', version: 3, developer: 'x'.repeat(2000) }
      }));

      expect(response.status).toBe(413);
      expect(response.json()).toEqual({ error: 'Request body exceeds 1024 bytes' });
    });
  });

  describe('POST /heartbeat', () => {
    it('acknowledges a known instance', async () => {
      await register();

      const response = await httpRequest(port, 'POST', '/heartbeat', JSON.stringify({ serviceName: 'payments', id: 'p-1' }));

      expect(response.status).toBe(200);
      expect(response.json()).toEqual({ message: 'heartbeat ok' });
    });

    it('answers 404 for an unknown instance', async () => {
      const response = await httpRequest(port, 'POST', '/heartbeat', JSON.stringify({ serviceName: 'payments', id: 'ghost' }));

      expect(response.status).toBe(404);
      expect(response.json()).toEqual({ error: 'Instance payments/ghost is not registered' });
    });
  });

  describe('POST /deregister', () => {
    it('removes a known instance once', async () => {
      await register();
      const key = JSON.stringify({ serviceName: 'payments', id: 'p-1' });

      const first = await httpRequest(port, 'POST', '/deregister', key);
      const second = await httpRequest(port, 'POST', '/deregister', key);

      expect(first.status).toBe(200);
      expect(first.json()).toEqual({ message: 'deregistered' });
      expect(second.status).toBe(404);
    });
  });

  describe('GET /lookup', () => {
    it('filters on service and metadata', async () => {
      await register(makeRegistration({ id: 'eu-1' }));
      await register(makeRegistration({ id: 'us-1', metadata: { environment: 'prod', region: 'us', version: 3 } }));

      const response = await httpRequest(port, 'GET', '/lookup?service=payments&region=us&version=3');

      expect(response.status).toBe(200);
      const body = response.json();
      expect(Array.isArray(body) ? body.map((instance: { id: string }) => instance.id) : body).toEqual(['us-1']);
    });

    it('answers an empty array when nothing matches', async () => {
      const response = await httpRequest(port, 'GET', '/lookup?service=nothing');

      expect(response.status).toBe(200);
      expect(response.text).toBe('[]');
    });
  });

  describe('routing', () => {
    it('answers 404 for an unknown path', async () => {
      const response = await httpRequest(port, 'GET', '/nope');

      expect(response.status).toBe(404);
      expect(response.json()).toEqual({ error: 'Not found' });
    });

    it('answers 405 for the wrong method', async () => {
      const response = await httpRequest(port, 'GET', '/register');

      expect(response.status).toBe(405);
      expect(response.headers['allow']).toBe('POST, OPTIONS');
    });

    it('answers preflight requests with CORS headers', async () => {
      const response = await httpRequest(port, 'OPTIONS', '/register');

      expect(response.status).toBe(204);
      expect(response.headers['access-control-allow-origin']).toBe('*');
    });

    it('reports health', async () => {
      await register();

      const response = await httpRequest(port, 'GET', '/health');

      expect(response.status).toBe(200);
      expect(response.json()).toMatchObject({
        status: 'UP',
        stats: {
          registry: { registrations: 1 },
          store: { type: 'memory', instances: 1 }
        }
      });
    });
  });

  describe('watch channel', () => {
    it('pushes an event for every mutation', async () => {
      const ws = await openSocket(`ws://127.0.0.1:${port}/ws`);

      const registered = nextEvent(ws);
      await register();
      expect(await registered).toMatchObject({ action: 'register', service: { serviceName: 'payments', id: 'p-1' } });

      const heartbeat = nextEvent(ws);
      await httpRequest(port, 'POST', '/heartbeat', JSON.stringify({ serviceName: 'payments', id: 'p-1' }));
      expect((await heartbeat).action).toBe('heartbeat');

      const deregistered = nextEvent(ws);
      await httpRequest(port, 'POST', '/deregister', JSON.stringify({ serviceName: 'payments', id: 'p-1' }));
      expect((await deregistered).action).toBe('deregister');

      ws.close();
    });

    it('ignores what watchers send', async () => {
      const ws = await openSocket(`ws://127.0.0.1:${port}/ws`);
      ws.send('hello');

      const registered = nextEvent(ws);
      await register();

      expect((await registered).action).toBe('register');
      ws.close();
    });

    it.each<[CloseReason, number]>([
      ['queue-full', 1008],
      ['delivery-failed', 1011]
    ])('closes the socket when the hub drops its watcher for %s', async (reason, code) => {
      const added = new Promise<Subscriber>(resolve => {
        node.hub.on('subscriber-added', resolve);
      });
      const ws = await openSocket(`ws://127.0.0.1:${port}/ws`);
      const subscriber = await added;

      const closed = new Promise<{ code: number; reason: string }>(resolve => {
        ws.once('close', (closeCode: number, closeReason: Buffer) => {
          resolve({ code: closeCode, reason: closeReason.toString() });
        });
      });
      node.hub.unsubscribe(subscriber, reason);

      expect(await closed).toEqual({ code, reason });
      expect(node.hub.size()).toBe(0);
    });

    it('unsubscribes a watcher that disconnects', async () => {
      const ws = await openSocket(`ws://127.0.0.1:${port}/ws`);
      expect(node.hub.size()).toBe(1);

      const disconnected = new Promise<void>(resolve => {
        node.http.getWatchChannel().once('watcher-disconnected', () => resolve());
      });
      ws.close();
      await disconnected;

      expect(node.hub.size()).toBe(0);
    });
  });

  describe('store failures', () => {
    let failingNode: RegistryNode;
    let store: FailingStore;
    let failingPort: number;

    beforeEach(async () => {
      store = new FailingStore();
      failingNode = new RegistryNode({
        ...DEFAULT_CONFIG,
        server: { ...DEFAULT_CONFIG.server, host: '127.0.0.1', port: 0 }
      }, { store });
      await failingNode.start();

      const address = failingNode.getAddress();
      if (!address) throw new Error('server did not bind');
      failingPort = address.port;
    });

    afterEach(async () => {
      await failingNode.stop();
    });

    it('answers 500 with the store error and applies nothing on register', async () => {
      const response = await httpRequest(failingPort, 'POST', '/register', JSON.stringify(makeRegistration()));

      expect(response.status).toBe(500);
      expect(response.json()).toEqual({ error: 'Store upsert failed: disk full' });
      expect(store.count()).toBe(0);
      expect(failingNode.hub.getStats().broadcasts).toBe(0);
    });

    it('answers 500 without internals when lookup fails unexpectedly', async () => {
      const response = await httpRequest(failingPort, 'GET', '/lookup?service=payments');

      expect(response.status).toBe(500);
      expect(response.json()).toEqual({ error: 'Internal server error' });
    });

    it('serves again once the store recovers', async () => {
      store.failing = false;

      const registered = await httpRequest(failingPort, 'POST', '/register', JSON.stringify(makeRegistration()));
      const found = await httpRequest(failingPort, 'GET', '/lookup?service=payments');

      expect(registered.status).toBe(200);
      expect(found.status).toBe(200);
      expect(store.count()).toBe(1);
    });
  });
});
