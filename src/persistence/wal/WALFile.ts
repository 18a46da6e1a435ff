import fs from 'fs/promises';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import { InstanceUpdate, WALEntry, WALFile } from './types';
import { isInstance, isInstanceKey } from '../records';
import { RegistryLogger } from '../../common/logger';

/**
 * Matches on `code` alone: errors raised by `fs` in another realm fail
 * `instanceof Error`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string';
}

function isInstanceUpdate(value: unknown): value is InstanceUpdate {
  if (typeof value !== 'object' || value === null) return false;
  if (!('operation' in value)) return false;

  switch (value.operation) {
    case 'UPSERT':
      return 'instance' in value && isInstance(value.instance);
    case 'TOUCH':
      return 'key' in value && isInstanceKey(value.key)
        && 'lastHeartbeat' in value && typeof value.lastHeartbeat === 'string';
    case 'DELETE':
      return 'keys' in value && Array.isArray(value.keys) && value.keys.every(isInstanceKey);
    default:
      return false;
  }
}

export function isWALEntry(value: unknown): value is WALEntry {
  if (typeof value !== 'object' || value === null) return false;
  return 'logSequenceNumber' in value && typeof value.logSequenceNumber === 'number'
    && 'timestamp' in value && typeof value.timestamp === 'number'
    && 'checksum' in value && typeof value.checksum === 'string'
    && 'data' in value && isInstanceUpdate(value.data);
}

/**
 * Append-only JSON-lines file, one WAL entry per line.
 */
export class WALFileImpl implements WALFile {
  private filePath: string;
  private fileHandle: FileHandle | null = null;
  private isOpen: boolean = false;
  private readonly logger: RegistryLogger;

  constructor(filePath: string, logger: RegistryLogger = new RegistryLogger()) {
    this.filePath = filePath;
    this.logger = logger;
  }

  async open(): Promise<void> {
    if (this.isOpen) return;

    // Ensure directory exists
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });

    this.fileHandle = await fs.open(this.filePath, 'a+');
    this.isOpen = true;
  }

  async append(entry: WALEntry): Promise<void> {
    if (!this.isOpen || !this.fileHandle) {
      throw new Error('WAL file not open');
    }

    await this.fileHandle.write(JSON.stringify(entry) + '\n');
  }

  async readEntries(): Promise<WALEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return []; // File doesn't exist yet
      }
      throw error;
    }

    const entries: WALEntry[] = [];
    for (const line of content.split('\n')) {
      if (!line.trim()) continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        this.logger.warn(`[WALFile] Skipping unparseable entry in ${this.filePath}`);
        continue;
      }

      if (isWALEntry(parsed)) {
        entries.push(parsed);
      } else {
        this.logger.warn(`[WALFile] Skipping malformed entry in ${this.filePath}`);
      }
    }

    return entries.sort((a, b) => a.logSequenceNumber - b.logSequenceNumber);
  }

  /**
   * Replace the whole log. The new content is written beside the old file
   * and renamed over it, so a crash leaves one complete version.
   */
  async replaceAll(entries: WALEntry[]): Promise<void> {
    const tempPath = `${this.filePath}.compact`;
    const content = entries.map(entry => JSON.stringify(entry) + '\n').join('');

    await this.close();
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, this.filePath);
    await this.open();
  }

  async getSize(): Promise<number> {
    try {
      const stats = await fs.stat(this.filePath);
      return stats.size;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }
  }

  async getLastLSN(): Promise<number> {
    const entries = await this.readEntries();
    return entries.reduce((max, entry) => Math.max(max, entry.logSequenceNumber), 0);
  }

  async flush(): Promise<void> {
    if (this.fileHandle) {
      await this.fileHandle.sync();
    }
  }

  async close(): Promise<void> {
    if (this.fileHandle) {
      await this.fileHandle.close();
      this.fileHandle = null;
    }
    this.isOpen = false;
  }
}
