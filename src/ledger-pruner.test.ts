import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { afterEach, describe, expect, it } from 'vitest';

import { LedgerPruner } from './ledger-pruner.js';
import { RestrictionLedger } from './state/restriction-ledger.js';
import { FakeOracle, mockLog } from './testing/fakes.js';

const dirs: string[] = [];

afterEach(async () => {
  for (const d of dirs) {
    await fs.rm(d, { recursive: true, force: true });
  }
  dirs.length = 0;
});

async function setup(ledgerText: string, schedule?: string) {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'pruner-'));
  dirs.push(dir);
  const ledgerFile = path.join(dir, 'restricted_users.inc');
  await fs.writeFile(ledgerFile, ledgerText, 'utf-8');
  const ledger = new RestrictionLedger(ledgerFile);
  const oracle = new FakeOracle();
  const log = mockLog();
  const pruner = new LedgerPruner({ ledger, oracle, log, schedule });
  return { ledger, oracle, log, pruner, ledgerFile };
}

describe('LedgerPruner.prune', () => {
  it('removes verified users and keeps the rest', async () => {
    const { pruner, oracle, ledger } = await setup('7\n8\n9\n');
    oracle.verify(7);
    oracle.verify(9);

    expect(await pruner.prune()).toEqual({ checked: 3, removed: [7, 9], aborted: false });
    expect(await ledger.load()).toEqual(new Set([8]));
  });

  it('leaves the file untouched when nobody is verified', async () => {
    const { pruner, ledgerFile } = await setup('7\n8\n');

    expect(await pruner.prune()).toEqual({ checked: 2, removed: [], aborted: false });
    expect(await fs.readFile(ledgerFile, 'utf-8')).toBe('7\n8\n');
  });

  it('aborts with a warning when the verification store is down', async () => {
    const { pruner, oracle, ledger, log } = await setup('7\n8\n');
    oracle.verify(7);
    oracle.unavailable = true;

    expect(await pruner.prune()).toEqual({ checked: 0, removed: [], aborted: true });
    expect(await ledger.load()).toEqual(new Set([7, 8]));
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ checked: 0, removed: 0 }),
      'prune:aborted (verification store unavailable)',
    );
  });
});

describe('LedgerPruner scheduling', () => {
  it('only prunes once marked due', async () => {
    const { pruner, oracle, ledger } = await setup('7\n');
    oracle.verify(7);

    expect(await pruner.runIfDue()).toBeNull();
    expect(oracle.lookups).toEqual([]);

    pruner.markDue();
    expect(pruner.isDue).toBe(true);
    expect(await pruner.runIfDue()).toEqual({ checked: 1, removed: [7], aborted: false });
    expect(pruner.isDue).toBe(false);
    expect(await ledger.load()).toEqual(new Set());
  });

  it('does nothing on start without a schedule', async () => {
    const { pruner } = await setup('');
    pruner.start();
    expect(pruner.nextRun()).toBeNull();
  });

  it('reports the next run once started and clears it on stop', async () => {
    const { pruner, log } = await setup('', '0 3 * * *');
    pruner.start();
    try {
      const next = pruner.nextRun();
      expect(next).toBeInstanceOf(Date);
      expect(next?.getHours()).toBe(3);
      expect(log.info).toHaveBeenCalledWith(expect.objectContaining({ schedule: '0 3 * * *' }), 'prune:scheduled');
    } finally {
      pruner.stop();
    }
    expect(pruner.nextRun()).toBeNull();
  });
});
