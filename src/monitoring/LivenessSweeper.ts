import { EventEmitter } from 'events';
import { Clock, Instance, InstanceStore, systemClock } from '../types';
import { RegistryLogger } from '../common/logger';

export interface LivenessSweeperConfig {
  sweepInterval: number;   // How often to sweep (ms)
  heartbeatTtl: number;    // Max age of the last heartbeat before eviction (ms)
}

export interface SweepResult {
  cutoff: number;
  evicted: Instance[];
}

export interface SweeperStats {
  isRunning: boolean;
  runs: number;
  evicted: number;
  failures: number;
  lastRunAt: number | null;
  lastError: string | null;
}

export interface LivenessSweeper {
  on(event: 'evicted', listener: (instances: Instance[]) => void): this;
  on(event: 'sweep-completed', listener: (result: SweepResult) => void): this;
  on(event: 'sweep-failed', listener: (error: unknown) => void): this;

  emit(event: 'evicted', instances: Instance[]): boolean;
  emit(event: 'sweep-completed', result: SweepResult): boolean;
  emit(event: 'sweep-failed', error: unknown): boolean;
}

/**
 * Periodically deletes instances whose last heartbeat is older than the
 * TTL. Runs on its own timer, independent of requests. A failed sweep is
 * logged and the next tick tries again.
 */
export class LivenessSweeper extends EventEmitter {
  private timer?: NodeJS.Timeout;
  private inFlight: Promise<SweepResult> | null = null;
  private readonly config: LivenessSweeperConfig;
  private stats: SweeperStats = {
    isRunning: false,
    runs: 0,
    evicted: 0,
    failures: 0,
    lastRunAt: null,
    lastError: null
  };

  constructor(
    private readonly store: InstanceStore,
    config: Partial<LivenessSweeperConfig> = {},
    private readonly clock: Clock = systemClock,
    private readonly logger: RegistryLogger = new RegistryLogger()
  ) {
    super();
    this.config = {
      sweepInterval: config.sweepInterval ?? 10000,   // 10 seconds
      heartbeatTtl: config.heartbeatTtl ?? 30000      // 30 seconds
    };
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => this.tick(), this.config.sweepInterval);
    this.timer.unref();
    this.stats.isRunning = true;
    this.logger.sweeper(
      `Started (interval ${this.config.sweepInterval}ms, ttl ${this.config.heartbeatTtl}ms)`
    );
  }

  /**
   * Stop the timer and wait for a sweep that is still running.
   */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.stats.isRunning = false;

    if (this.inFlight) {
      await this.inFlight.catch(() => undefined);
    }
    this.logger.sweeper('Stopped');
  }

  /**
   * Run one sweep now. Rejects if the store fails; the timer path catches
   * that and logs it.
   */
  async sweepOnce(): Promise<SweepResult> {
    const cutoff = this.clock() - this.config.heartbeatTtl;
    this.stats.runs++;
    this.stats.lastRunAt = this.clock();

    try {
      const evicted = await this.store.deleteWhere({ heartbeatBefore: cutoff });
      this.stats.evicted += evicted.length;
      this.stats.lastError = null;

      if (evicted.length > 0) {
        this.logger.sweeper(`Evicted ${evicted.length} stale instance(s) older than ${new Date(cutoff).toISOString()}`);
        this.emit('evicted', evicted);
      }

      const result: SweepResult = { cutoff, evicted };
      this.emit('sweep-completed', result);
      return result;
    } catch (error) {
      this.stats.failures++;
      this.stats.lastError = error instanceof Error ? error.message : String(error);
      this.emit('sweep-failed', error);
      throw error;
    }
  }

  getStats(): SweeperStats {
    return { ...this.stats };
  }

  getConfig(): Readonly<LivenessSweeperConfig> {
    return { ...this.config };
  }

  private tick(): void {
    // Skip the tick while the previous sweep is still running
    if (this.inFlight) return;

    this.inFlight = this.sweepOnce();
    void this.inFlight
      .catch(error => {
        this.logger.error('[LivenessSweeper] Sweep failed, retrying on next tick:', error);
      })
      .finally(() => {
        this.inFlight = null;
      });
  }
}
