import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { PersistenceError, readTextIfExists, withWriteRetry, writeFileAtomic } from './atomic-file.js';

const dirs: string[] = [];

async function tmpDir(): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'atomic-file-'));
  dirs.push(dir);
  return dir;
}

afterEach(async () => {
  for (const d of dirs) {
    await fs.rm(d, { recursive: true, force: true });
  }
  dirs.length = 0;
});

describe('readTextIfExists', () => {
  it('returns null for a missing file', async () => {
    const dir = await tmpDir();
    expect(await readTextIfExists(path.join(dir, 'nope.inc'))).toBeNull();
  });

  it('returns the file contents', async () => {
    const dir = await tmpDir();
    const filePath = path.join(dir, 'a.inc');
    await fs.writeFile(filePath, '42\n', 'utf-8');
    expect(await readTextIfExists(filePath)).toBe('42\n');
  });

  it('propagates errors other than ENOENT', async () => {
    const dir = await tmpDir();
    // Reading a directory fails with EISDIR.
    await expect(readTextIfExists(dir)).rejects.toMatchObject({ code: 'EISDIR' });
  });
});

describe('writeFileAtomic', () => {
  it('creates parent directories and writes the content', async () => {
    const dir = await tmpDir();
    const filePath = path.join(dir, 'nested', 'deeper', 'state.inc');
    await writeFileAtomic(filePath, 'hello\n');
    expect(await fs.readFile(filePath, 'utf-8')).toBe('hello\n');
  });

  it('replaces existing content and leaves no temp file behind', async () => {
    const dir = await tmpDir();
    const filePath = path.join(dir, 'state.inc');
    await fs.writeFile(filePath, 'old\n', 'utf-8');
    await writeFileAtomic(filePath, 'new\n');
    expect(await fs.readFile(filePath, 'utf-8')).toBe('new\n');
    expect(await fs.readdir(dir)).toEqual(['state.inc']);
  });

  it('cleans up the temp file when the rename fails', async () => {
    const dir = await tmpDir();
    // Target is a non-empty directory, so rename onto it fails.
    const target = path.join(dir, 'target');
    await fs.mkdir(target);
    await fs.writeFile(path.join(target, 'keep'), 'x', 'utf-8');
    await expect(writeFileAtomic(target, 'data')).rejects.toThrow();
    expect((await fs.readdir(dir)).sort()).toEqual(['target']);
  });
});

describe('withWriteRetry', () => {
  it('returns after the first successful attempt', async () => {
    const write = vi.fn().mockResolvedValue(undefined);
    const sleep = vi.fn().mockResolvedValue(undefined);
    await withWriteRetry('/tmp/x', write, { attempts: 3, delayMs: 10, sleep });
    expect(write).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries until a write succeeds', async () => {
    const write = vi
      .fn()
      .mockRejectedValueOnce(new Error('ENOSPC'))
      .mockResolvedValueOnce(undefined);
    const sleep = vi.fn().mockResolvedValue(undefined);
    const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await withWriteRetry('/tmp/x', write, { attempts: 3, delayMs: 250, sleep, log });
    expect(write).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it('throws PersistenceError after exhausting attempts', async () => {
    const write = vi.fn().mockRejectedValue(new Error('EACCES: permission denied'));
    const sleep = vi.fn().mockResolvedValue(undefined);
    const err = await withWriteRetry('/data/groups_list.inc', write, { attempts: 3, delayMs: 1, sleep }).catch(
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(PersistenceError);
    expect((err as PersistenceError).filePath).toBe('/data/groups_list.inc');
    expect((err as PersistenceError).message).toBe(
      'Failed to write /data/groups_list.inc after 3 attempt(s): EACCES: permission denied',
    );
    expect(write).toHaveBeenCalledTimes(3);
    // No pause after the final attempt.
    expect(sleep).toHaveBeenCalledTimes(2);
  });
});
