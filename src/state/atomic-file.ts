import fs from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import type { LoggerLike } from '../logging/logger-like.js';

/** A state file could not be written, even after retrying. */
export class PersistenceError extends Error {
  readonly filePath: string;

  constructor(filePath: string, attempts: number, cause: unknown) {
    const msg = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${filePath} after ${attempts} attempt(s): ${msg}`, { cause });
    this.name = 'PersistenceError';
    this.filePath = filePath;
  }
}

export type WriteRetryOptions = {
  attempts: number;
  delayMs: number;
  /** Injectable for tests. */
  sleep?: (ms: number) => Promise<void>;
  log?: LoggerLike;
};

export const NO_RETRY: WriteRetryOptions = { attempts: 1, delayMs: 0 };

/**
 * Read a text file, returning null when it does not exist.
 * Other read errors propagate.
 */
export async function readTextIfExists(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw err;
  }
}

/**
 * Replace a file's contents via write-to-temp-then-rename, so readers
 * (including the web admin panel) never observe a partial write.
 * Creates the parent directory if it does not exist.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.tmp.${process.pid}`;
  try {
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.unlink(tmpPath).catch(() => undefined);
    throw err;
  }
}

/**
 * Run a write, retrying up to `opts.attempts` times with a fixed pause.
 * Throws PersistenceError carrying the last failure.
 */
export async function withWriteRetry(
  filePath: string,
  write: () => Promise<void>,
  opts: WriteRetryOptions,
): Promise<void> {
  const sleep = opts.sleep ?? ((ms: number) => delay(ms));
  const attempts = Math.max(1, opts.attempts);
  let lastErr: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      await write();
      return;
    } catch (err) {
      lastErr = err;
      if (attempt < attempts) {
        opts.log?.warn({ err, filePath, attempt, attempts }, 'state:write failed, retrying');
        await sleep(opts.delayMs);
      }
    }
  }
  throw new PersistenceError(filePath, attempts, lastErr);
}
