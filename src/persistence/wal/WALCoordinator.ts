import crypto from 'crypto';
import { Clock, systemClock } from '../../types';
import { WALEntry, InstanceUpdate, WALCoordinator } from './types';

/**
 * Hands out log sequence numbers and seals each entry with a sha256
 * checksum over its sequence number and payload, so an entry copied to
 * another position in the log no longer verifies.
 */
export class WALCoordinatorImpl implements WALCoordinator {
  private lastIssued: number;

  constructor(private readonly clock: Clock = systemClock, startAfter = 0) {
    this.lastIssued = startAfter;
  }

  getCurrentLSN(): number {
    return this.lastIssued;
  }

  restartAfter(lsn: number): void {
    this.lastIssued = lsn;
  }

  createEntry(update: InstanceUpdate): WALEntry {
    const logSequenceNumber = ++this.lastIssued;
    return {
      logSequenceNumber,
      timestamp: this.clock(),
      checksum: WALCoordinatorImpl.seal(logSequenceNumber, update),
      data: update
    };
  }

  validateEntry(entry: WALEntry): boolean {
    return entry.checksum === WALCoordinatorImpl.seal(entry.logSequenceNumber, entry.data);
  }

  private static seal(logSequenceNumber: number, update: InstanceUpdate): string {
    return crypto
      .createHash('sha256')
      .update(`${logSequenceNumber}:${JSON.stringify(update)}`)
      .digest('hex');
  }
}
