import { WALWriter, InstanceUpdate, WALConfig } from './types';
import { WALFileImpl } from './WALFile';
import { WALCoordinatorImpl } from './WALCoordinator';
import { RegistryLogger } from '../../common/logger';
import { Clock, systemClock } from '../../types';

export class WALWriterImpl implements WALWriter {
  private walFile: WALFileImpl;
  private coordinator: WALCoordinatorImpl;
  private config: Required<WALConfig>;
  private syncTimer: NodeJS.Timeout | null = null;
  private readonly logger: RegistryLogger;

  constructor(config: WALConfig = {}, logger: RegistryLogger = new RegistryLogger(), clock: Clock = systemClock) {
    this.config = {
      filePath: config.filePath || './data/registry.wal',
      maxFileSize: config.maxFileSize || 100 * 1024 * 1024, // 100MB
      syncInterval: config.syncInterval !== undefined ? config.syncInterval : 1000
    };
    this.logger = logger;

    this.walFile = new WALFileImpl(this.config.filePath, logger);
    this.coordinator = new WALCoordinatorImpl(clock);
  }

  async initialize(): Promise<void> {
    await this.walFile.open();

    // Continue numbering after the last entry on disk
    const lastLSN = await this.walFile.getLastLSN();
    this.coordinator.restartAfter(lastLSN);

    this.setupPeriodicSync();
  }

  /**
   * True once the log has grown past `maxFileSize` and should be rewritten.
   */
  async exceedsSizeLimit(): Promise<boolean> {
    return (await this.walFile.getSize()) > this.config.maxFileSize;
  }

  async append(update: InstanceUpdate): Promise<number> {
    const entry = this.coordinator.createEntry(update);
    await this.walFile.append(entry);

    return entry.logSequenceNumber;
  }

  /**
   * Replace the log with the given updates, renumbered from 1.
   */
  async rewrite(updates: InstanceUpdate[]): Promise<void> {
    this.coordinator.restartAfter(0);
    const entries = updates.map(update => this.coordinator.createEntry(update));
    await this.walFile.replaceAll(entries);
  }

  async flush(): Promise<void> {
    await this.walFile.flush();
  }

  async close(): Promise<void> {
    if (this.syncTimer) {
      clearInterval(this.syncTimer);
      this.syncTimer = null;
    }

    await this.flush();
    await this.walFile.close();
  }

  getCurrentLSN(): number {
    return this.coordinator.getCurrentLSN();
  }

  private setupPeriodicSync(): void {
    if (this.config.syncInterval > 0 && !this.syncTimer) {
      this.syncTimer = setInterval(() => {
        this.flush().catch(error => {
          this.logger.error('[WALWriter] Periodic sync failed:', error);
        });
      }, this.config.syncInterval);
      this.syncTimer.unref(); // Allow process to exit if only sync timer is running
    }
  }
}
