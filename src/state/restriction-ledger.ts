import { NO_RETRY, readTextIfExists, withWriteRetry, writeFileAtomic } from './atomic-file.js';
import type { WriteRetryOptions } from './atomic-file.js';

/**
 * Parse the ledger file: one user id per line. Older daemons appended without
 * de-duplicating, so repeated ids collapse here.
 */
export function parseLedgerFile(text: string): Set<number> {
  const ids = new Set<number>();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!/^\d+$/.test(line)) continue;
    const id = Number(line);
    if (Number.isSafeInteger(id)) ids.add(id);
  }
  return ids;
}

export function serializeLedger(ids: Iterable<number>): string {
  let out = '';
  for (const id of ids) out += `${id}\n`;
  return out;
}

/**
 * Users the daemon restricted and has not yet seen confirmed as restricted.
 * This is a hint for message deletion; platform status stays authoritative.
 */
export class RestrictionLedger {
  private filePath: string;
  private retry: WriteRetryOptions;

  constructor(filePath: string, opts?: { retry?: WriteRetryOptions }) {
    this.filePath = filePath;
    this.retry = opts?.retry ?? NO_RETRY;
  }

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<Set<number>> {
    const text = await readTextIfExists(this.filePath);
    return text == null ? new Set() : parseLedgerFile(text);
  }

  /** Returns false when the id was already present (nothing written). */
  async add(userId: number): Promise<boolean> {
    const ids = await this.load();
    if (ids.has(userId)) return false;
    ids.add(userId);
    await this.save(ids);
    return true;
  }

  /** Returns false when the id was absent (nothing written). */
  async remove(userId: number): Promise<boolean> {
    const ids = await this.load();
    if (!ids.delete(userId)) return false;
    await this.save(ids);
    return true;
  }

  private async save(ids: Set<number>): Promise<void> {
    const content = serializeLedger(ids);
    await withWriteRetry(this.filePath, () => writeFileAtomic(this.filePath, content), this.retry);
  }
}
