import type { LedgerPruner } from '../ledger-pruner.js';
import type { GroupRegistry } from '../state/group-registry.js';
import type { RestrictionLedger } from '../state/restriction-ledger.js';
import type { PlatformActuator } from '../telegram/actuator.js';
import type { VerificationOracle } from '../verification/oracle.js';

/** Bad arguments: printed with the help text, exit code 1. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export function parseGroupId(raw: string | undefined): number {
  if (raw == null || !/^-?\d+$/.test(raw)) {
    throw new CliUsageError(`Expected a numeric group id, got "${raw ?? ''}"`);
  }
  const id = Number(raw);
  if (!Number.isSafeInteger(id)) {
    throw new CliUsageError(`Group id out of range: ${raw}`);
  }
  return id;
}

function parseOnOff(raw: string | undefined): boolean {
  const normalized = raw?.trim().toLowerCase();
  if (normalized === 'on') return true;
  if (normalized === 'off') return false;
  throw new CliUsageError(`Expected "on" or "off", got "${raw ?? ''}"`);
}

export async function listGroups(groups: GroupRegistry): Promise<string[]> {
  const map = await groups.load();
  return [...map].map(([id, c]) => `${id}\tdelete-messages=${c.deleteMessagesFromRestricted ? 'on' : 'off'}`);
}

export async function setGroupFlag(groups: GroupRegistry, rawId: string | undefined, rawValue: string | undefined): Promise<string> {
  const id = parseGroupId(rawId);
  const enabled = parseOnOff(rawValue);
  if (!(await groups.setDeleteMessages(id, enabled))) {
    throw new CliUsageError(`Group ${id} is not registered (the bot has to be added to it first)`);
  }
  return `${id}\tdelete-messages=${enabled ? 'on' : 'off'}`;
}

export async function listLedger(ledger: RestrictionLedger): Promise<string[]> {
  return [...(await ledger.load())].map(String);
}

export async function pruneLedger(pruner: LedgerPruner): Promise<string> {
  const result = await pruner.prune();
  const summary = `checked ${result.checked}, removed ${result.removed.length}`;
  return result.aborted ? `${summary} (aborted: verification store unavailable)` : summary;
}

/**
 * One line per administrator: id, @username, status and the linked wiki
 * account. Bots are listed but never looked up.
 */
export async function listAdmins(
  platform: Pick<PlatformActuator, 'getChatAdministrators'>,
  oracle: Pick<VerificationOracle, 'lookup'>,
  rawGroupId: string | undefined,
): Promise<string[]> {
  const groupId = parseGroupId(rawGroupId);
  const admins = await platform.getChatAdministrators(groupId);
  if (admins == null) {
    throw new Error(`Could not fetch administrators of ${groupId}`);
  }

  const lines: string[] = [];
  for (const admin of admins) {
    const handle = admin.username ? `@${admin.username}` : '-';
    let wiki: string;
    if (admin.isBot) {
      wiki = '(bot)';
    } else {
      const identity = await oracle.lookup(admin.id);
      wiki = identity ? (identity.wikiUsername ?? `wiki#${identity.wikiUserId ?? '?'}`) : '(unverified)';
    }
    lines.push(`${admin.id}\t${handle}\t${admin.status}\t${wiki}`);
  }
  return lines;
}
