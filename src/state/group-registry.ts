import { NO_RETRY, readTextIfExists, withWriteRetry, writeFileAtomic } from './atomic-file.js';
import type { WriteRetryOptions } from './atomic-file.js';

export type GroupConfig = {
  deleteMessagesFromRestricted: boolean;
};

export type GroupMap = Map<number, GroupConfig>;

const TRUE_FLAGS = new Set(['1', 'true', 'on', 'yes']);

/**
 * Parse the registry file: one `groupId[:flag]` per line.
 * Lines without a flag are legacy entries and default to false. Lines whose id
 * is not an integer are dropped. A repeated id takes the value of its last line.
 */
export function parseGroupsFile(text: string): GroupMap {
  const groups: GroupMap = new Map();
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    const sep = line.indexOf(':');
    const idPart = sep === -1 ? line : line.slice(0, sep);
    const flagPart = sep === -1 ? '' : line.slice(sep + 1);
    const id = idPart.trim();
    if (!/^-?\d+$/.test(id)) continue;
    const groupId = Number(id);
    if (!Number.isSafeInteger(groupId)) continue;
    groups.set(groupId, { deleteMessagesFromRestricted: TRUE_FLAGS.has(flagPart.trim().toLowerCase()) });
  }
  return groups;
}

/**
 * Groups without message deletion are written in the bare legacy form, which
 * is what the web panel writes for a newly added group.
 */
export function serializeGroups(groups: GroupMap): string {
  let out = '';
  for (const [groupId, cfg] of groups) {
    out += cfg.deleteMessagesFromRestricted ? `${groupId}:true\n` : `${groupId}\n`;
  }
  return out;
}

export type UpsertResult = {
  config: GroupConfig;
  created: boolean;
};

/**
 * File-backed group registry. Every mutation re-reads the file before writing
 * it back, so lines appended by other processes since the last load survive.
 */
export class GroupRegistry {
  private filePath: string;
  private retry: WriteRetryOptions;

  constructor(filePath: string, opts?: { retry?: WriteRetryOptions }) {
    this.filePath = filePath;
    this.retry = opts?.retry ?? NO_RETRY;
  }

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<GroupMap> {
    const text = await readTextIfExists(this.filePath);
    return text == null ? new Map() : parseGroupsFile(text);
  }

  /**
   * Ensure the group is registered. An existing entry keeps its flag unless
   * `deleteMessages` is given; a new entry defaults to false.
   */
  async upsert(groupId: number, deleteMessages?: boolean): Promise<UpsertResult> {
    const groups = await this.load();
    const existing = groups.get(groupId);
    const next: GroupConfig = {
      deleteMessagesFromRestricted: deleteMessages ?? existing?.deleteMessagesFromRestricted ?? false,
    };
    if (existing && existing.deleteMessagesFromRestricted === next.deleteMessagesFromRestricted) {
      return { config: existing, created: false };
    }
    groups.set(groupId, next);
    await this.save(groups);
    return { config: next, created: !existing };
  }

  /** Returns false when the group was not registered (nothing written). */
  async remove(groupId: number): Promise<boolean> {
    const groups = await this.load();
    if (!groups.delete(groupId)) return false;
    await this.save(groups);
    return true;
  }

  /** Admin toggle. Returns false when the group is unknown. */
  async setDeleteMessages(groupId: number, enabled: boolean): Promise<boolean> {
    const groups = await this.load();
    if (!groups.has(groupId)) return false;
    await this.upsert(groupId, enabled);
    return true;
  }

  private async save(groups: GroupMap): Promise<void> {
    const content = serializeGroups(groups);
    await withWriteRetry(this.filePath, () => writeFileAtomic(this.filePath, content), this.retry);
  }
}
