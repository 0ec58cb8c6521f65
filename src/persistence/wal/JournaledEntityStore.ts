import crypto from 'crypto';
import { InMemoryEntityStore } from '../memory/InMemoryEntityStore';
import { EntityCounters, EntityOperation } from '../types';
import { WALConfig, WALEntry } from './types';
import { WALFile } from './WALFile';
import { FrameworkLogger, createLogger } from '../../common/logger';

export const DEFAULT_WAL_PATH = './data/netdeploy.wal';

/**
 * In-memory entity store made durable by a write-ahead log. Every committed
 * transaction is appended as one entry before it is applied; `open()` rebuilds
 * state by replaying the log.
 */
export class JournaledEntityStore extends InMemoryEntityStore {
  private readonly walFile: WALFile;
  private readonly checksumEnabled: boolean;
  private currentLSN = 0;
  private opened = false;

  constructor(config: WALConfig = {}, private readonly logger: FrameworkLogger = createLogger()) {
    super();
    this.walFile = new WALFile(config.filePath ?? DEFAULT_WAL_PATH);
    this.checksumEnabled = config.checksumEnabled ?? true;
    // Unusable until the log has been replayed
    this.closed = true;
  }

  getCurrentLSN(): number {
    return this.currentLSN;
  }

  async open(): Promise<void> {
    if (this.opened) return;

    const entries = await this.walFile.readEntries(line => {
      this.logger.warn(`[JournaledEntityStore] Skipping malformed entry: ${line}`);
    });

    for (const entry of entries) {
      if (this.checksumEnabled && entry.checksum !== undefined && !this.validateEntry(entry)) {
        this.logger.warn(`[JournaledEntityStore] Skipping entry ${entry.logSequenceNumber} with bad checksum`);
        continue;
      }
      for (const operation of entry.data) {
        this.applyOperation(operation);
        this.advanceCounters(operation);
      }
      this.currentLSN = Math.max(this.currentLSN, entry.logSequenceNumber);
    }

    await this.walFile.open();
    this.opened = true;
    this.closed = false;
  }

  async close(): Promise<void> {
    if (!this.opened) return;
    await super.close();
    await this.walFile.flush();
    await this.walFile.close();
    this.opened = false;
  }

  calculateChecksum(data: EntityOperation[]): string {
    return crypto.createHash('sha256').update(JSON.stringify(data)).digest('hex');
  }

  validateEntry(entry: WALEntry): boolean {
    return entry.checksum === this.calculateChecksum(entry.data);
  }

  protected async commit(operations: EntityOperation[], counters: EntityCounters): Promise<void> {
    const entry: WALEntry = {
      logSequenceNumber: this.currentLSN + 1,
      timestamp: Date.now(),
      data: operations
    };
    if (this.checksumEnabled) {
      entry.checksum = this.calculateChecksum(operations);
    }

    await this.walFile.append(entry);
    this.currentLSN = entry.logSequenceNumber;
    await super.commit(operations, counters);
  }

  private advanceCounters(operation: EntityOperation): void {
    switch (operation.op) {
      case 'insertDeployment':
        this.counters.deployment = Math.max(this.counters.deployment, operation.record.id);
        break;
      case 'insertNode':
        this.counters.node = Math.max(this.counters.node, operation.record.id);
        break;
      case 'insertSample':
        this.counters.sample = Math.max(this.counters.sample, operation.record.id);
        break;
      case 'appendEvent':
        this.counters.event = Math.max(this.counters.event, operation.record.id);
        break;
      default:
        break;
    }
  }
}
