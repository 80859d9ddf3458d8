import type { BotApi } from '../telegram/actuator.js';
import { describePlatformError, isPlatformError } from '../telegram/errors.js';

export type CredentialStatus = 'ok' | 'fail';

export type CredentialCheckResult = {
  /** Stable identifier for this check (e.g. 'telegram-token', 'verification-store'). */
  name: string;
  status: CredentialStatus;
  /** Human-readable detail; present on 'fail' and sometimes on 'ok'. */
  message?: string;
};

export type CredentialCheckReport = {
  results: CredentialCheckResult[];
  /** Names of checks that are both critical AND failed. */
  criticalFailures: string[];
  /** True when every check is 'ok'. */
  allOk: boolean;
};

// The daemon cannot poll without a working token. A store outage is only
// fatal once a join needs it, so it is reported but not critical here.
const CRITICAL = new Set(['telegram-token']);

/**
 * Validate the bot token by calling getMe.
 * Always resolves: returns a 'fail' result on API or network error instead of throwing.
 */
export async function checkTelegramToken(api: Pick<BotApi, 'getMe'>): Promise<CredentialCheckResult> {
  const name = 'telegram-token';
  try {
    const me = await api.getMe();
    return { name, status: 'ok', message: me.username ? `@${me.username}` : undefined };
  } catch (err) {
    if (isPlatformError(err)) {
      return { name, status: 'fail', message: describePlatformError(err) };
    }
    const msg = err instanceof Error ? err.message : String(err);
    return { name, status: 'fail', message: msg };
  }
}

/**
 * Check that the verification store answers a trivial query.
 * Always resolves.
 */
export async function checkVerificationStore(store: { ping(): Promise<void> }): Promise<CredentialCheckResult> {
  const name = 'verification-store';
  try {
    await store.ping();
    return { name, status: 'ok' };
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    return { name, status: 'fail', message: msg };
  }
}

/**
 * Run all startup checks concurrently and return a structured report.
 * Never throws.
 */
export async function runCredentialChecks(opts: {
  api: Pick<BotApi, 'getMe'>;
  store: { ping(): Promise<void> };
}): Promise<CredentialCheckReport> {
  const results = await Promise.all([checkTelegramToken(opts.api), checkVerificationStore(opts.store)]);

  const criticalFailures = results
    .filter((r) => r.status === 'fail' && CRITICAL.has(r.name))
    .map((r) => r.name);

  const allOk = results.every((r) => r.status === 'ok');

  return { results, criticalFailures, allOk };
}

/**
 * Format a report into a single line for the startup log.
 *
 * Example: "telegram-token: ok (@gate_bot), verification-store: FAIL (connect ECONNREFUSED)"
 */
export function formatCredentialReport(report: CredentialCheckReport): string {
  return report.results
    .map((r) => {
      const tag = r.status === 'ok' ? 'ok' : 'FAIL';
      const detail = r.message ? ` (${r.message})` : '';
      return `${r.name}: ${tag}${detail}`;
    })
    .join(', ');
}
