import { EntityOperation } from '../types';

export interface WALEntry {
  logSequenceNumber: number;
  timestamp: number;
  data: EntityOperation[];
  checksum?: string;
}

export interface WALConfig {
  filePath?: string;
  checksumEnabled?: boolean;
}
