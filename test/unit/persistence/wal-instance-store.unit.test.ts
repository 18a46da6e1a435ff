import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { WriteAheadLogInstanceStore } from '../../../src/persistence/WriteAheadLogInstanceStore';
import { WALCoordinatorImpl } from '../../../src/persistence/wal/WALCoordinator';
import { isErrnoException } from '../../../src/persistence/wal/WALFile';
import { WALWriterImpl } from '../../../src/persistence/wal/WALWriter';
import { stampRegistration } from '../../../src/persistence/records';
import { StoreError } from '../../../src/common/errors';
import { Instance } from '../../../src/types';
import { makeRegistration, manualClock, T0 } from '../../fixtures/instances';
import { SpyLogger } from '../../helpers/spyLogger';

describe('WriteAheadLogInstanceStore', () => {
  let dir: string;
  let walPath: string;
  const stores: WriteAheadLogInstanceStore[] = [];

  function createStore(
    options: { compactOnStart?: boolean; logger?: SpyLogger; maxFileSize?: number; clock?: () => number } = {}
  ): WriteAheadLogInstanceStore {
    const store = new WriteAheadLogInstanceStore({
      filePath: walPath,
      syncInterval: 0,
      clock: manualClock().clock,
      ...options
    });
    stores.push(store);
    return store;
  }

  async function walLines(): Promise<string[]> {
    const content = await fs.readFile(walPath, 'utf-8');
    return content.split('\n').filter(line => line.trim() !== '');
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'registry-wal-'));
    walPath = path.join(dir, 'nested', 'registry.wal');
  });

  afterEach(async () => {
    for (const store of stores.splice(0, stores.length)) {
      await store.stop();
    }
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('restores state from the log after a restart', async () => {
    const first = createStore();
    await first.start();
    await first.upsert(makeRegistration({ id: 'a' }));
    await first.upsert(makeRegistration({ id: 'b' }));
    await first.touchHeartbeat({ serviceName: 'payments', id: 'a' });
    await first.deleteWhere({ equals: { id: 'b' } });
    await first.stop();

    const second = createStore({ compactOnStart: false });
    await second.start();

    expect(second.count()).toBe(1);
    expect(second.get({ serviceName: 'payments', id: 'a' })?.health).toBe('UP');
    expect(second.get({ serviceName: 'payments', id: 'b' })).toBeNull();
    expect(second.getCurrentLSN()).toBe(4);

    await second.upsert(makeRegistration({ id: 'c' }));
    expect(second.getCurrentLSN()).toBe(5);
  });

  it('compacts the log to one entry per live instance on start', async () => {
    const first = createStore();
    await first.start();
    await first.upsert(makeRegistration({ id: 'a' }));
    await first.touchHeartbeat({ serviceName: 'payments', id: 'a' });
    await first.touchHeartbeat({ serviceName: 'payments', id: 'a' });
    await first.stop();
    expect(await walLines()).toHaveLength(3);

    const second = createStore();
    await second.start();

    expect(await walLines()).toHaveLength(1);
    expect(second.getCurrentLSN()).toBe(1);
    expect(second.count()).toBe(1);
  });

  it('starts on a path where no log exists yet', async () => {
    const store = createStore();

    await store.start();

    expect(store.count()).toBe(0);
    expect(store.getCurrentLSN()).toBe(0);
  });

  it('compacts while running once the log passes its size limit', async () => {
    const time = manualClock();
    const store = createStore({ maxFileSize: 1024, clock: time.clock });
    await store.start();
    await store.upsert(makeRegistration());

    for (let i = 0; i < 40; i++) {
      time.advance(1000);
      await store.touchHeartbeat({ serviceName: 'payments', id: 'p-1' });
    }
    await store.stop();

    expect(store.getStats().touches).toBe(40);
    expect((await walLines()).length).toBeLessThanOrEqual(8);

    const reopened = createStore({ compactOnStart: false });
    await reopened.start();
    expect(reopened.get({ serviceName: 'payments', id: 'p-1' })?.lastHeartbeat).toBe(new Date(T0 + 40000).toISOString());
  });

  it('leaves memory untouched when the log append fails', async () => {
    const store = createStore();
    await store.start();
    await store.upsert(makeRegistration({ id: 'a' }));
    const append = jest.spyOn(WALWriterImpl.prototype, 'append').mockRejectedValue(new Error('disk full'));

    try {
      await expect(store.upsert(makeRegistration({ id: 'b' }))).rejects.toThrow('Store upsert failed: disk full');
      await expect(store.deleteWhere({ equals: { id: 'a' } })).rejects.toBeInstanceOf(StoreError);
    } finally {
      append.mockRestore();
    }

    expect(store.count()).toBe(1);
    expect(store.get({ serviceName: 'payments', id: 'a' })).not.toBeNull();
    expect(store.getStats()).toMatchObject({ upserts: 1, deletes: 0 });
  });

  it('does not append when a delete matches nothing', async () => {
    const store = createStore();
    await store.start();
    await store.upsert(makeRegistration());

    await store.deleteWhere({ equals: { serviceName: 'orders' } });

    expect(await walLines()).toHaveLength(1);
  });

  it('skips entries with a bad checksum or that do not parse', async () => {
    const coordinator = new WALCoordinatorImpl();
    const good = coordinator.createEntry({ operation: 'UPSERT', instance: stampRegistration(makeRegistration({ id: 'good' }), T0) });
    const tampered = {
      ...coordinator.createEntry({ operation: 'UPSERT', instance: stampRegistration(makeRegistration({ id: 'bad' }), T0) }),
      checksum: 'not-the-checksum'
    };

    await fs.mkdir(path.dirname(walPath), { recursive: true });
    await fs.writeFile(walPath, [JSON.stringify(good), 'not json', JSON.stringify(tampered)].join('\n') + '\n', 'utf-8');

    const logger = new SpyLogger();
    const store = createStore({ compactOnStart: false, logger });
    await store.start();

    expect(store.count()).toBe(1);
    expect(store.get({ serviceName: 'payments', id: 'good' })).not.toBeNull();
    expect(store.get({ serviceName: 'payments', id: 'bad' })).toBeNull();

    const warnings = logger.getLogs('warn').map(entry => entry.message);
    expect(warnings).toContain(`[WALFile] Skipping unparseable entry in ${walPath}`);
    expect(warnings).toContain('[WALReader] Invalid checksum at LSN 2, skipping');
  });

  it('rejects mutations while not running', async () => {
    const store = createStore();

    const attempt = store.upsert(makeRegistration());
    await expect(attempt).rejects.toBeInstanceOf(StoreError);
    await expect(attempt).rejects.toThrow('Store upsert failed: store is not running');
  });

  it('applies concurrent mutations in arrival order', async () => {
    const store = createStore();
    await store.start();

    const [stored, removed] = await Promise.all([
      store.upsert(makeRegistration()),
      store.deleteWhere({ equals: { serviceName: 'payments' } })
    ]);

    expect(removed).toEqual([stored]);
    expect(store.count()).toBe(0);
  });

  it('emits store events after each mutation', async () => {
    const store = createStore();
    await store.start();
    const upserted: Instance[] = [];
    const deleted: Instance[] = [];
    store.on('instance:upserted', instance => upserted.push(instance));
    store.on('instance:deleted', instance => deleted.push(instance));

    await store.upsert(makeRegistration());
    await store.deleteWhere({});

    expect(upserted.map(instance => instance.id)).toEqual(['p-1']);
    expect(deleted.map(instance => instance.id)).toEqual(['p-1']);
  });
});

describe('isErrnoException', () => {
  it('recognises errno errors by their code alone', () => {
    expect(isErrnoException({ code: 'ENOENT', message: 'missing' })).toBe(true);
    expect(isErrnoException(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe(true);
  });

  it('rejects values without a string code', () => {
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException({ code: 2 })).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
    expect(isErrnoException(null)).toBe(false);
  });
});

describe('WALCoordinatorImpl', () => {
  const update = { operation: 'DELETE' as const, keys: [{ serviceName: 'payments', id: 'p-1' }] };

  it('numbers entries after the restart point and stamps them with the clock', () => {
    const coordinator = new WALCoordinatorImpl(() => T0);
    coordinator.restartAfter(7);

    const entry = coordinator.createEntry(update);

    expect(entry.logSequenceNumber).toBe(8);
    expect(entry.timestamp).toBe(T0);
    expect(coordinator.getCurrentLSN()).toBe(8);
    expect(coordinator.validateEntry(entry)).toBe(true);
  });

  it('rejects an entry moved to another sequence number', () => {
    const coordinator = new WALCoordinatorImpl(() => T0);
    const entry = coordinator.createEntry(update);

    expect(coordinator.validateEntry({ ...entry, logSequenceNumber: 2 })).toBe(false);
  });
});
