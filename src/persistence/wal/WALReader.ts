import { WALReader, WALEntry, ReplayResult } from './types';
import { WALFileImpl } from './WALFile';
import { WALCoordinatorImpl } from './WALCoordinator';
import { RegistryLogger } from '../../common/logger';

export class WALReaderImpl implements WALReader {
  private walFile: WALFileImpl;
  private coordinator: WALCoordinatorImpl;
  private logger: RegistryLogger;

  constructor(filePath: string, logger: RegistryLogger = new RegistryLogger()) {
    this.walFile = new WALFileImpl(filePath, logger);
    this.coordinator = new WALCoordinatorImpl();
    this.logger = logger;
  }

  /**
   * Feed every entry whose checksum verifies to `handler`, in log order.
   */
  async replay(handler: (entry: WALEntry) => void): Promise<ReplayResult> {
    const entries = await this.walFile.readEntries();
    this.logger.store(`[WALReader] Replaying ${entries.length} entries`);

    let applied = 0;
    let skipped = 0;

    for (const entry of entries) {
      if (!this.coordinator.validateEntry(entry)) {
        skipped++;
        this.logger.warn(`[WALReader] Invalid checksum at LSN ${entry.logSequenceNumber}, skipping`);
        continue;
      }
      handler(entry);
      applied++;
    }

    this.logger.store(`[WALReader] Replay completed: ${applied} applied, ${skipped} skipped`);
    return { applied, skipped };
  }

  async close(): Promise<void> {
    await this.walFile.close();
  }
}
