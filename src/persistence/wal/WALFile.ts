import { promises as fs } from 'fs';
import { FileHandle } from 'fs/promises';
import path from 'path';
import { WALEntry } from './types';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function isWALEntry(value: unknown): value is WALEntry {
  if (typeof value !== 'object' || value === null) return false;
  return 'logSequenceNumber' in value && typeof value.logSequenceNumber === 'number'
    && 'timestamp' in value && typeof value.timestamp === 'number'
    && 'data' in value && Array.isArray(value.data);
}

/**
 * Append-only JSON-lines journal file
 */
export class WALFile {
  private fileHandle: FileHandle | null = null;
  private isOpen = false;

  constructor(private readonly filePath: string) {}

  async open(): Promise<void> {
    if (this.isOpen) return;

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    this.fileHandle = await fs.open(this.filePath, 'a+');
    this.isOpen = true;

    // A crash mid-append leaves an unterminated line; new entries start on their own line
    if (await this.endsWithPartialLine(this.fileHandle)) {
      await this.fileHandle.write('\n');
    }
  }

  async append(entry: WALEntry): Promise<void> {
    if (!this.isOpen || !this.fileHandle) {
      throw new Error('WAL file not open');
    }

    await this.fileHandle.write(JSON.stringify(entry) + '\n');
  }

  /**
   * Read entries ordered by log sequence number. Lines that fail to parse are
   * reported through `onMalformed` and skipped.
   */
  async readEntries(onMalformed?: (line: string) => void): Promise<WALEntry[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
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
        parsed = undefined;
      }
      if (isWALEntry(parsed)) {
        entries.push(parsed);
      } else {
        onMalformed?.(line);
      }
    }

    return entries.sort((a, b) => a.logSequenceNumber - b.logSequenceNumber);
  }

  private async endsWithPartialLine(handle: FileHandle): Promise<boolean> {
    const { size } = await handle.stat();
    if (size === 0) return false;
    const { buffer } = await handle.read(Buffer.alloc(1), 0, 1, size - 1);
    return buffer[0] !== 0x0a;
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
