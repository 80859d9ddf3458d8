import fs from 'node:fs/promises';
import { NO_RETRY, withWriteRetry, writeFileAtomic } from './atomic-file.js';
import type { WriteRetryOptions } from './atomic-file.js';
import type { LoggerLike } from '../logging/logger-like.js';

/** Parse the offset file. Anything but a non-negative integer reads as 0. */
export function parseCursor(text: string): number {
  const trimmed = text.trim();
  if (!/^\d+$/.test(trimmed)) return 0;
  const n = Number(trimmed);
  return Number.isSafeInteger(n) ? n : 0;
}

/**
 * Highest fully processed update_id, persisted as a single integer.
 */
export class CursorStore {
  private filePath: string;
  private retry: WriteRetryOptions;
  private log?: LoggerLike;

  constructor(filePath: string, opts?: { retry?: WriteRetryOptions; log?: LoggerLike }) {
    this.filePath = filePath;
    this.retry = opts?.retry ?? NO_RETRY;
    this.log = opts?.log;
  }

  /** Returns 0 when the file is absent, unreadable or corrupt. */
  async load(): Promise<number> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
        this.log?.warn({ err, filePath: this.filePath }, 'cursor:unreadable, starting from 0');
      }
      return 0;
    }
    const cursor = parseCursor(raw);
    if (cursor === 0 && raw.trim() !== '' && raw.trim() !== '0') {
      this.log?.warn({ filePath: this.filePath }, 'cursor:corrupt, starting from 0');
    }
    return cursor;
  }

  async store(value: number): Promise<void> {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new RangeError(`cursor must be a non-negative integer, got ${value}`);
    }
    await withWriteRetry(this.filePath, () => writeFileAtomic(this.filePath, `${value}`), this.retry);
  }
}
