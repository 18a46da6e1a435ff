import { LivenessSweeper, SweepResult } from '../../../src/monitoring/LivenessSweeper';
import { InMemoryInstanceStore } from '../../../src/persistence/memory/InMemoryInstanceStore';
import { StoreError } from '../../../src/common/errors';
import { Instance, InstancePredicate } from '../../../src/types';
import { makeRegistration, manualClock, ManualClock, T0 } from '../../fixtures/instances';
import { SpyLogger } from '../../helpers/spyLogger';

class FailingStore extends InMemoryInstanceStore {
  async deleteWhere(_predicate: InstancePredicate): Promise<Instance[]> {
    throw new StoreError('deleteWhere', new Error('disk full'));
  }
}

describe('LivenessSweeper', () => {
  let clock: ManualClock;
  let store: InMemoryInstanceStore;
  let sweeper: LivenessSweeper;

  beforeEach(async () => {
    clock = manualClock();
    store = new InMemoryInstanceStore({ clock: clock.clock });
    await store.start();
    sweeper = new LivenessSweeper(store, { sweepInterval: 20, heartbeatTtl: 30000 }, clock.clock);
  });

  afterEach(async () => {
    await sweeper.stop();
    await store.stop();
  });

  it('falls back to default intervals for undefined settings', () => {
    const defaults = new LivenessSweeper(store, { sweepInterval: undefined, heartbeatTtl: 5000 });

    expect(defaults.getConfig()).toEqual({ sweepInterval: 10000, heartbeatTtl: 5000 });
  });

  it('evicts instances whose heartbeat is older than the TTL', async () => {
    await store.upsert(makeRegistration({ id: 'stale' }));
    clock.advance(20000);
    await store.upsert(makeRegistration({ id: 'fresh' }));
    clock.advance(15000);

    const result = await sweeper.sweepOnce();

    expect(result.cutoff).toBe(T0 + 5000);
    expect(result.evicted.map(instance => instance.id)).toEqual(['stale']);
    expect(store.count()).toBe(1);
  });

  it('keeps an instance whose heartbeat sits exactly on the cutoff', async () => {
    await store.upsert(makeRegistration());
    clock.advance(30000);

    const result = await sweeper.sweepOnce();

    expect(result.evicted).toEqual([]);
    expect(store.count()).toBe(1);
  });

  it('emits the evicted records only when something was removed', async () => {
    const evicted: Instance[][] = [];
    sweeper.on('evicted', instances => evicted.push(instances));

    await sweeper.sweepOnce();
    await store.upsert(makeRegistration());
    clock.advance(30001);
    await sweeper.sweepOnce();

    expect(evicted).toHaveLength(1);
    expect(evicted[0].map(instance => instance.id)).toEqual(['p-1']);
    expect(sweeper.getStats()).toMatchObject({ runs: 2, evicted: 1, failures: 0 });
  });

  it('sweeps on its timer', async () => {
    await store.upsert(makeRegistration());
    clock.advance(60000);

    const completed = new Promise<SweepResult>(resolve => sweeper.once('sweep-completed', resolve));
    sweeper.start();

    const result = await completed;
    expect(result.evicted).toHaveLength(1);
    expect(sweeper.getStats().isRunning).toBe(true);
  });

  it('logs a failed sweep and keeps running', async () => {
    const logger = new SpyLogger();
    const failing = new FailingStore({ clock: clock.clock });
    const failingSweeper = new LivenessSweeper(failing, { sweepInterval: 20, heartbeatTtl: 30000 }, clock.clock, logger);

    const failed = new Promise<unknown>(resolve => failingSweeper.once('sweep-failed', resolve));
    failingSweeper.start();

    const error = await failed;
    await new Promise(resolve => setImmediate(resolve));
    await failingSweeper.stop();

    expect(error).toBeInstanceOf(StoreError);
    expect(failingSweeper.getStats().failures).toBeGreaterThanOrEqual(1);
    expect(failingSweeper.getStats().lastError).toBe('Store deleteWhere failed: disk full');
    expect(logger.getLogs('error')[0].message).toBe('[LivenessSweeper] Sweep failed, retrying on next tick:');
  });

  it('rejects sweepOnce when the store fails', async () => {
    const failing = new FailingStore({ clock: clock.clock });
    const failingSweeper = new LivenessSweeper(failing, {}, clock.clock);

    await expect(failingSweeper.sweepOnce()).rejects.toThrow('Store deleteWhere failed: disk full');
    expect(failingSweeper.getStats().failures).toBe(1);
  });
});
