import type { LoggerLike } from './logging/logger-like.js';
import type { GroupMap, GroupRegistry } from './state/group-registry.js';
import type { RestrictionLedger } from './state/restriction-ledger.js';
import { DENY_ALL_PERMISSIONS } from './telegram/actuator.js';
import type { PlatformActuator } from './telegram/actuator.js';
import type { BotMembershipChanged, DaemonEvent, MessagePosted, UserMembershipChanged } from './telegram/updates.js';
import type { VerificationOracle } from './verification/oracle.js';

/**
 * Snapshot of the registry and ledger for one batch. Loaded at the start of
 * each iteration and kept in step with every write made while handling it.
 */
export type ReconcileState = {
  groups: GroupMap;
  restricted: Set<number>;
};

export type ReconcileStats = {
  events: number;
  groupsAdded: number;
  groupsRemoved: number;
  alreadyVerified: number;
  restricted: number;
  restrictFailed: number;
  statusUnknown: number;
  ledgerCleared: number;
  deleted: number;
  deleteFailed: number;
};

export function emptyStats(): ReconcileStats {
  return {
    events: 0,
    groupsAdded: 0,
    groupsRemoved: 0,
    alreadyVerified: 0,
    restricted: 0,
    restrictFailed: 0,
    statusUnknown: 0,
    ledgerCleared: 0,
    deleted: 0,
    deleteFailed: 0,
  };
}

export type ReconcilerDeps = {
  groups: GroupRegistry;
  ledger: RestrictionLedger;
  platform: PlatformActuator;
  oracle: VerificationOracle;
  log: LoggerLike;
};

/**
 * Per-event state machine. Every handler is safe to re-run on a redelivered
 * event: registry and ledger writes are idempotent, and a repeated join is
 * re-checked against the member's live status before any restriction.
 *
 * OracleUnavailableError and PersistenceError propagate to the daemon loop;
 * platform failures are logged and absorbed here.
 */
export class Reconciler {
  private deps: ReconcilerDeps;

  constructor(deps: ReconcilerDeps) {
    this.deps = deps;
  }

  async handle(event: DaemonEvent, state: ReconcileState, stats: ReconcileStats): Promise<void> {
    stats.events++;
    switch (event.kind) {
      case 'bot-membership':
        await this.onBotMembership(event, state, stats);
        return;
      case 'message':
        await this.onMessage(event, state, stats);
        return;
      case 'user-membership':
        // A member update feeds both handlers: it may confirm a pending
        // restriction and it may be a fresh join.
        await this.onRestrictionConfirmed(event, state, stats);
        await this.onMemberJoined(event, state, stats);
        return;
    }
  }

  private async onBotMembership(event: BotMembershipChanged, state: ReconcileState, stats: ReconcileStats): Promise<void> {
    const { log, groups } = this.deps;
    const ctx = { updateId: event.updateId, groupId: event.groupId, status: event.status };

    if (event.chatKind === 'private') {
      log.trace?.(ctx, 'reconcile:bot-membership skipped (private chat)');
      return;
    }

    if (event.status === 'member' || event.status === 'administrator') {
      const { config, created } = await groups.upsert(event.groupId);
      state.groups.set(event.groupId, config);
      if (created) {
        stats.groupsAdded++;
        log.info(ctx, 'group:added');
      } else {
        log.trace?.(ctx, 'reconcile:bot-membership group already registered');
      }
      return;
    }

    if (event.status === 'kicked' || event.status === 'left') {
      const removed = await groups.remove(event.groupId);
      state.groups.delete(event.groupId);
      if (removed) {
        stats.groupsRemoved++;
        log.info(ctx, 'group:removed');
      } else {
        log.trace?.(ctx, 'reconcile:bot-membership group was not registered');
      }
      return;
    }

    log.trace?.(ctx, 'reconcile:bot-membership skipped (status not tracked)');
  }

  private async onMessage(event: MessagePosted, state: ReconcileState, stats: ReconcileStats): Promise<void> {
    const { log, platform } = this.deps;
    const ctx = { updateId: event.updateId, groupId: event.groupId, userId: event.authorId, messageId: event.messageId };

    const group = state.groups.get(event.groupId);
    if (!group?.deleteMessagesFromRestricted) {
      log.trace?.(ctx, 'reconcile:message skipped (deletion not enabled for group)');
      return;
    }
    if (!state.restricted.has(event.authorId)) {
      log.trace?.(ctx, 'reconcile:message skipped (author not in ledger)');
      return;
    }

    const result = await platform.deleteMessage(event.groupId, event.messageId);
    if (result.ok) {
      stats.deleted++;
      log.info(ctx, 'moderation:deleted message from restricted user');
    } else {
      stats.deleteFailed++;
      log.warn({ ...ctx, error: result.error }, 'moderation:delete failed');
    }
  }

  private async onRestrictionConfirmed(event: UserMembershipChanged, state: ReconcileState, stats: ReconcileStats): Promise<void> {
    const { log, ledger } = this.deps;
    if (event.status !== 'restricted') return;
    const ctx = { updateId: event.updateId, groupId: event.groupId, userId: event.user.id };

    if (!state.restricted.has(event.user.id)) {
      log.trace?.(ctx, 'reconcile:restriction confirmed for user not in ledger');
      return;
    }
    await ledger.remove(event.user.id);
    state.restricted.delete(event.user.id);
    stats.ledgerCleared++;
    log.info(ctx, 'ledger:removed user (restriction confirmed)');
  }

  private async onMemberJoined(event: UserMembershipChanged, state: ReconcileState, stats: ReconcileStats): Promise<void> {
    const { log, oracle, platform, ledger } = this.deps;
    const { user } = event;
    const ctx = { updateId: event.updateId, groupId: event.groupId, userId: user.id, username: user.username };

    if (event.chatKind === 'private') {
      log.trace?.(ctx, 'reconcile:join skipped (private chat)');
      return;
    }
    if (user.isBot) {
      log.trace?.(ctx, 'reconcile:join skipped (bot account)');
      return;
    }
    if (event.status !== 'member') {
      log.trace?.({ ...ctx, status: event.status }, 'reconcile:join skipped (status is not member)');
      return;
    }

    // Before any mutation: verified users are never touched.
    const identity = await oracle.lookup(user.id);
    if (identity) {
      stats.alreadyVerified++;
      log.info({ ...ctx, wikiUser: identity.wikiUsername, wikiUserId: identity.wikiUserId }, 'reconcile:join already verified');
      return;
    }

    // The user may have left or been handled since the event was emitted.
    const current = await platform.getChatMember(event.groupId, user.id);
    if (current == null) {
      stats.statusUnknown++;
      log.warn(ctx, 'reconcile:join skipped (could not fetch current status)');
      return;
    }
    if (current !== 'member') {
      log.trace?.({ ...ctx, current }, 'reconcile:join skipped (current status is not member)');
      return;
    }

    const result = await platform.restrictChatMember(event.groupId, user.id, DENY_ALL_PERMISSIONS);
    if (!result.ok) {
      stats.restrictFailed++;
      log.error({ ...ctx, error: result.error }, 'moderation:restrict failed');
      return;
    }

    await ledger.add(user.id);
    state.restricted.add(user.id);
    stats.restricted++;
    log.info(ctx, 'moderation:restricted unverified member');
  }
}
