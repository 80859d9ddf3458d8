import { setTimeout as delay } from 'node:timers/promises';
import type { LoggerLike } from './logging/logger-like.js';
import type { LedgerPruner } from './ledger-pruner.js';
import { emptyStats } from './reconciler.js';
import type { ReconcileStats, Reconciler } from './reconciler.js';
import { PersistenceError } from './state/atomic-file.js';
import type { CursorStore } from './state/cursor-store.js';
import type { GroupRegistry } from './state/group-registry.js';
import type { RestrictionLedger } from './state/restriction-ledger.js';
import type { EventSource } from './telegram/event-source.js';
import { OracleUnavailableError } from './verification/oracle.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves early (without throwing) when the signal aborts. */
export async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
}

export type DaemonOptions = {
  source: EventSource;
  cursor: CursorStore;
  groups: GroupRegistry;
  ledger: RestrictionLedger;
  reconciler: Reconciler;
  pruner?: LedgerPruner;
  log: LoggerLike;
  retryDelayMs: number;
  idleDelayMs: number;
  oracleFailureDelayMs: number;
  sleep?: SleepFn;
};

export type IterationOutcome =
  | { kind: 'poll-failed'; error: string }
  | { kind: 'idle' }
  | { kind: 'processed'; cursor: number; skipped: number; stats: ReconcileStats };

export type ExitReason = 'stopped' | 'oracle-unavailable';

/**
 * The single worker: reload state, long-poll, reconcile the batch in order,
 * then persist the cursor once. Nothing else mutates the state files from
 * inside the process.
 */
export class MembershipDaemon {
  private opts: DaemonOptions;
  private sleep: SleepFn;

  constructor(opts: DaemonOptions) {
    this.opts = opts;
    this.sleep = opts.sleep ?? abortableSleep;
  }

  /**
   * One pass of the loop. Throws OracleUnavailableError and PersistenceError
   * from the batch; in both cases the cursor is left where it was.
   */
  async runIteration(signal?: AbortSignal): Promise<IterationOutcome> {
    const { source, cursor: cursorStore, groups, ledger, reconciler, pruner, log } = this.opts;

    await pruner?.runIfDue();

    // Reloaded every pass so edits from the web admin panel take effect.
    const state = { groups: await groups.load(), restricted: await ledger.load() };
    const cursor = await cursorStore.load();
    log.trace?.({ cursor, groups: state.groups.size, restricted: state.restricted.size }, 'poll:start');

    const result = await source.fetch(cursor, signal);
    if (!result.ok) return { kind: 'poll-failed', error: result.error };
    if (result.highestUpdateId == null) return { kind: 'idle' };

    const stats = emptyStats();
    for (const event of result.events) {
      if (event.updateId <= cursor) {
        log.trace?.({ updateId: event.updateId, cursor }, 'poll:skipped already processed update');
        continue;
      }
      await reconciler.handle(event, state, stats);
    }

    const next = Math.max(cursor, result.highestUpdateId);
    if (next > cursor) {
      try {
        await cursorStore.store(next);
      } catch (err) {
        if (!(err instanceof PersistenceError)) throw err;
        // Costs only a redundant replay of this batch.
        log.error({ err, cursor: next }, 'cursor:store failed');
      }
    }
    return { kind: 'processed', cursor: next, skipped: result.skipped, stats };
  }

  /** Runs until the signal aborts or the verification store becomes unreachable. */
  async run(signal?: AbortSignal): Promise<ExitReason> {
    const { log, retryDelayMs, idleDelayMs, oracleFailureDelayMs } = this.opts;
    log.info({ retryDelayMs, idleDelayMs }, 'daemon:started');

    while (!signal?.aborted) {
      let outcome: IterationOutcome;
      try {
        outcome = await this.runIteration(signal);
      } catch (err) {
        if (err instanceof OracleUnavailableError) {
          log.error({ err, pauseMs: oracleFailureDelayMs }, 'oracle:unavailable, exiting for restart');
          await this.sleep(oracleFailureDelayMs, signal);
          return 'oracle-unavailable';
        }
        log.error({ err, retryDelayMs }, 'daemon:iteration failed, batch will be replayed');
        await this.sleep(retryDelayMs, signal);
        continue;
      }

      switch (outcome.kind) {
        case 'poll-failed':
          if (signal?.aborted) break;
          log.warn({ error: outcome.error, retryDelayMs }, 'poll:failed');
          await this.sleep(retryDelayMs, signal);
          break;
        case 'idle':
          await this.sleep(idleDelayMs, signal);
          break;
        case 'processed':
          log.debug?.({ cursor: outcome.cursor, skipped: outcome.skipped, ...outcome.stats }, 'poll:batch processed');
          break;
      }
    }

    log.info('daemon:stopped');
    return 'stopped';
  }
}
