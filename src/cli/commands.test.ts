import fs from 'node:fs/promises';
import path from 'node:path';
import os from 'node:os';
import { afterEach, describe, expect, it } from 'vitest';

import { LedgerPruner } from '../ledger-pruner.js';
import { GroupRegistry } from '../state/group-registry.js';
import { RestrictionLedger } from '../state/restriction-ledger.js';
import { FakeOracle, FakePlatform, mockLog } from '../testing/fakes.js';
import { CliUsageError, listAdmins, listGroups, listLedger, parseGroupId, pruneLedger, setGroupFlag } from './commands.js';

const dirs: string[] = [];

afterEach(async () => {
  for (const d of dirs) {
    await fs.rm(d, { recursive: true, force: true });
  }
  dirs.length = 0;
});

async function tmpFile(name: string, content?: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-'));
  dirs.push(dir);
  const file = path.join(dir, name);
  if (content !== undefined) await fs.writeFile(file, content, 'utf-8');
  return file;
}

describe('parseGroupId', () => {
  it('accepts negative supergroup ids', () => {
    expect(parseGroupId('-1001234567890')).toBe(-1001234567890);
  });

  it.each([undefined, '', 'abc', '12.5', '0x10'])('rejects %s', (raw) => {
    expect(() => parseGroupId(raw)).toThrow(CliUsageError);
  });
});

describe('groups', () => {
  it('lists each group with its flag', async () => {
    const groups = new GroupRegistry(await tmpFile('groups_list.inc', '-1001\n-1002:true\n'));
    expect(await listGroups(groups)).toEqual(['-1001\tdelete-messages=off', '-1002\tdelete-messages=on']);
  });

  it('lists nothing when the file is missing', async () => {
    const groups = new GroupRegistry(await tmpFile('groups_list.inc'));
    expect(await listGroups(groups)).toEqual([]);
  });

  it('toggles the flag of a known group', async () => {
    const file = await tmpFile('groups_list.inc', '-1001\n');
    const groups = new GroupRegistry(file);

    expect(await setGroupFlag(groups, '-1001', 'ON')).toBe('-1001\tdelete-messages=on');
    expect(await fs.readFile(file, 'utf-8')).toBe('-1001:true\n');

    expect(await setGroupFlag(groups, '-1001', 'off')).toBe('-1001\tdelete-messages=off');
    expect(await fs.readFile(file, 'utf-8')).toBe('-1001\n');
  });

  it('refuses to register a group that the bot never joined', async () => {
    const groups = new GroupRegistry(await tmpFile('groups_list.inc', '-1001\n'));
    await expect(setGroupFlag(groups, '-2002', 'on')).rejects.toThrow('Group -2002 is not registered');
    expect(await groups.load()).toEqual(new Map([[-1001, { deleteMessagesFromRestricted: false }]]));
  });

  it('rejects a flag value other than on/off', async () => {
    const groups = new GroupRegistry(await tmpFile('groups_list.inc', '-1001\n'));
    await expect(setGroupFlag(groups, '-1001', 'yes')).rejects.toThrow(CliUsageError);
  });
});

describe('ledger', () => {
  it('lists the ledger ids', async () => {
    const ledger = new RestrictionLedger(await tmpFile('restricted_users.inc', '7\n8\n'));
    expect(await listLedger(ledger)).toEqual(['7', '8']);
  });

  it('summarises a prune', async () => {
    const ledger = new RestrictionLedger(await tmpFile('restricted_users.inc', '7\n8\n'));
    const oracle = new FakeOracle();
    oracle.verify(8);
    const pruner = new LedgerPruner({ ledger, oracle, log: mockLog() });

    expect(await pruneLedger(pruner)).toBe('checked 2, removed 1');
    expect(await listLedger(ledger)).toEqual(['7']);
  });

  it('says when a prune was aborted', async () => {
    const ledger = new RestrictionLedger(await tmpFile('restricted_users.inc', '7\n'));
    const oracle = new FakeOracle();
    oracle.unavailable = true;
    const pruner = new LedgerPruner({ ledger, oracle, log: mockLog() });

    expect(await pruneLedger(pruner)).toBe('checked 0, removed 0 (aborted: verification store unavailable)');
  });
});

describe('admins', () => {
  it('shows the linked wiki account of each administrator', async () => {
    const platform = new FakePlatform();
    platform.setAdmins(-1001, [
      { id: 1, username: 'owner', isBot: false, status: 'creator' },
      { id: 2, isBot: false, status: 'administrator' },
      { id: 3, username: 'gate_bot', isBot: true, status: 'administrator' },
    ]);
    const oracle = new FakeOracle();
    oracle.verify(1, 'Owner Wiki');

    expect(await listAdmins(platform, oracle, '-1001')).toEqual([
      '1\t@owner\tcreator\tOwner Wiki',
      '2\t-\tadministrator\t(unverified)',
      '3\t@gate_bot\tadministrator\t(bot)',
    ]);
    expect(oracle.lookups).toEqual([1, 2]);
  });

  it('fails when the administrators cannot be fetched', async () => {
    await expect(listAdmins(new FakePlatform(), new FakeOracle(), '-1001')).rejects.toThrow(
      'Could not fetch administrators of -1001',
    );
  });
});
