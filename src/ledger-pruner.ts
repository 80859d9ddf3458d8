import { Cron } from 'croner';
import type { LoggerLike } from './logging/logger-like.js';
import type { RestrictionLedger } from './state/restriction-ledger.js';
import { OracleUnavailableError } from './verification/oracle.js';
import type { VerificationOracle } from './verification/oracle.js';

export type PruneResult = {
  checked: number;
  removed: number[];
  /** True when the verification store went away part-way through. */
  aborted: boolean;
};

/**
 * Drops ledger entries for users who have since been verified through the
 * web flow. Only the ledger changes; platform restrictions are left as-is.
 *
 * The cron tick only marks a prune as due. The daemon loop runs it between
 * iterations, so the ledger keeps a single writer.
 */
export class LedgerPruner {
  private ledger: RestrictionLedger;
  private oracle: VerificationOracle;
  private log: LoggerLike;
  private schedule?: string;
  private cron: Cron | null = null;
  private due = false;

  constructor(opts: { ledger: RestrictionLedger; oracle: VerificationOracle; log: LoggerLike; schedule?: string }) {
    this.ledger = opts.ledger;
    this.oracle = opts.oracle;
    this.log = opts.log;
    this.schedule = opts.schedule;
  }

  start(): void {
    if (!this.schedule || this.cron) return;
    this.cron = new Cron(this.schedule, () => {
      this.markDue();
    });
    this.log.info({ schedule: this.schedule, nextRun: this.cron.nextRun() }, 'prune:scheduled');
  }

  stop(): void {
    this.cron?.stop();
    this.cron = null;
  }

  nextRun(): Date | null {
    return this.cron?.nextRun() ?? null;
  }

  markDue(): void {
    this.due = true;
    this.log.debug?.({}, 'prune:due');
  }

  get isDue(): boolean {
    return this.due;
  }

  async runIfDue(): Promise<PruneResult | null> {
    if (!this.due) return null;
    this.due = false;
    return this.prune();
  }

  async prune(): Promise<PruneResult> {
    const ids = await this.ledger.load();
    const removed: number[] = [];
    let checked = 0;

    for (const id of ids) {
      let verified: boolean;
      try {
        verified = await this.oracle.isVerified(id);
      } catch (err) {
        if (!(err instanceof OracleUnavailableError)) throw err;
        // Housekeeping only: try again on the next tick.
        this.log.warn({ err, checked, removed: removed.length }, 'prune:aborted (verification store unavailable)');
        return { checked, removed, aborted: true };
      }
      checked++;
      if (verified && (await this.ledger.remove(id))) {
        removed.push(id);
        this.log.info({ userId: id }, 'ledger:removed user (verified)');
      }
    }

    this.log.info({ checked, removed: removed.length }, 'prune:done');
    return { checked, removed, aborted: false };
  }
}
