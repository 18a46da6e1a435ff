import { Instance, InstanceKey } from '../../types';

export type InstanceUpdate =
  | { operation: 'UPSERT'; instance: Instance }
  | { operation: 'TOUCH'; key: InstanceKey; lastHeartbeat: string }
  | { operation: 'DELETE'; keys: InstanceKey[] };

export interface WALEntry {
  logSequenceNumber: number;
  timestamp: number;
  checksum: string;
  data: InstanceUpdate;
}

export interface WALConfig {
  filePath?: string;
  maxFileSize?: number;
  syncInterval?: number;
}

export interface WALWriter {
  append(update: InstanceUpdate): Promise<number>;
  rewrite(updates: InstanceUpdate[]): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export interface WALReader {
  replay(handler: (entry: WALEntry) => void): Promise<ReplayResult>;
  close(): Promise<void>;
}

export interface ReplayResult {
  applied: number;
  skipped: number;
}

export interface WALFile {
  append(entry: WALEntry): Promise<void>;
  readEntries(): Promise<WALEntry[]>;
  replaceAll(entries: WALEntry[]): Promise<void>;
  getLastLSN(): Promise<number>;
  getSize(): Promise<number>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export interface WALCoordinator {
  createEntry(update: InstanceUpdate): WALEntry;
  validateEntry(entry: WALEntry): boolean;
  getCurrentLSN(): number;
  restartAfter(lsn: number): void;
}
