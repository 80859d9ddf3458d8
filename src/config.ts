import path from 'node:path';
import { Cron } from 'croner';

export const DEFAULT_POLL_TIMEOUT_SECONDS = 10;
export const MAX_POLL_TIMEOUT_SECONDS = 50;
export const DEFAULT_RETRY_DELAY_MS = 5_000;
export const DEFAULT_IDLE_DELAY_MS = 200;
export const DEFAULT_ORACLE_FAILURE_DELAY_MS = 15_000;
export const DEFAULT_WRITE_RETRY_ATTEMPTS = 3;
export const DEFAULT_WRITE_RETRY_DELAY_MS = 1_000;
export const DEFAULT_VERIFICATION_TABLE = 'verifications';

// File names are shared with the web admin panel; keep them stable.
export const GROUPS_FILENAME = 'groups_list.inc';
export const RESTRICTED_USERS_FILENAME = 'restricted_users.inc';
export const OFFSET_FILENAME = 'telegram_offset.inc';

type ParseResult = {
  config: JoingateConfig;
  warnings: string[];
  infos: string[];
};

export type JoingateConfig = {
  botToken: string;
  apiRoot?: string;

  verificationDbUrl: string;
  verificationTable: string;

  dataDir: string;
  groupsFile: string;
  restrictedUsersFile: string;
  offsetFile: string;

  pollTimeoutSeconds: number;
  retryDelayMs: number;
  idleDelayMs: number;
  oracleFailureDelayMs: number;
  writeRetryAttempts: number;
  writeRetryDelayMs: number;

  ledgerPruneCron?: string;

  verbose: boolean;
  logLevel: string;
};

export type ParseConfigOptions = {
  /** Base for the default data dir (`<projectRoot>/data`). */
  projectRoot: string;
  /** Set by the `--verbose` CLI flag; wins over JOINGATE_VERBOSE. */
  verbose?: boolean;
};

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parseNonNegativeInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n) || n < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  if (!Number.isInteger(n)) {
    throw new Error(`${name} must be an integer, got "${n}"`);
  }
  return n;
}

function parsePositiveInt(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const n = parseNonNegativeInt(env, name, defaultValue);
  if (n === 0) {
    throw new Error(`${name} must be a positive integer, got "${env[name]}"`);
  }
  return n;
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

function parseHttpUrl(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const val = parseTrimmedString(env, name);
  if (val && !val.startsWith('http://') && !val.startsWith('https://')) {
    throw new Error(`${name} must be an http(s) URL`);
  }
  return val?.replace(/\/+$/, '');
}

function parseCronPattern(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const pattern = parseTrimmedString(env, name);
  if (!pattern) return undefined;
  try {
    // A paused instance never fires; constructing it is enough to validate the pattern.
    new Cron(pattern, { paused: true }).stop();
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`${name} is not a valid cron pattern ("${pattern}"): ${msg}`);
  }
  return pattern;
}

export function parseConfig(env: NodeJS.ProcessEnv, opts: ParseConfigOptions): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const botToken = parseTrimmedString(env, 'TELEGRAM_BOT_TOKEN');
  if (!botToken) {
    throw new Error('Missing TELEGRAM_BOT_TOKEN');
  }

  const verificationDbUrl = parseTrimmedString(env, 'VERIFICATION_DB_URL');
  if (!verificationDbUrl) {
    throw new Error('Missing VERIFICATION_DB_URL');
  }
  if (!/^mysql2?:\/\//.test(verificationDbUrl)) {
    throw new Error('VERIFICATION_DB_URL must be a mysql:// connection URL');
  }

  const verificationTable = parseTrimmedString(env, 'VERIFICATION_DB_TABLE') ?? DEFAULT_VERIFICATION_TABLE;
  if (!/^[A-Za-z0-9_]+$/.test(verificationTable)) {
    throw new Error(`VERIFICATION_DB_TABLE must match [A-Za-z0-9_]+, got "${verificationTable}"`);
  }

  const dataDir = path.resolve(parseTrimmedString(env, 'JOINGATE_DATA_DIR') ?? path.join(opts.projectRoot, 'data'));
  const groupsFile = parseTrimmedString(env, 'JOINGATE_GROUPS_FILE') ?? path.join(dataDir, GROUPS_FILENAME);
  const restrictedUsersFile =
    parseTrimmedString(env, 'JOINGATE_RESTRICTED_USERS_FILE') ?? path.join(dataDir, RESTRICTED_USERS_FILENAME);
  const offsetFile = parseTrimmedString(env, 'JOINGATE_OFFSET_FILE') ?? path.join(dataDir, OFFSET_FILENAME);

  const pollTimeoutSeconds = parseNonNegativeInt(env, 'JOINGATE_POLL_TIMEOUT_SECONDS', DEFAULT_POLL_TIMEOUT_SECONDS);
  if (pollTimeoutSeconds > MAX_POLL_TIMEOUT_SECONDS) {
    throw new Error(`JOINGATE_POLL_TIMEOUT_SECONDS must be at most ${MAX_POLL_TIMEOUT_SECONDS}, got "${pollTimeoutSeconds}"`);
  }
  if (pollTimeoutSeconds === 0) {
    warnings.push('JOINGATE_POLL_TIMEOUT_SECONDS=0 disables long polling: the daemon will short-poll every JOINGATE_IDLE_DELAY_MS');
  }

  const ledgerPruneCron = parseCronPattern(env, 'JOINGATE_LEDGER_PRUNE_CRON');
  if (ledgerPruneCron) {
    infos.push(`Ledger pruning enabled (schedule: ${ledgerPruneCron})`);
  }

  const verbose = opts.verbose === true || parseBoolean(env, 'JOINGATE_VERBOSE', false);
  const logLevel = verbose ? 'trace' : (parseTrimmedString(env, 'LOG_LEVEL') ?? 'info');

  return {
    config: {
      botToken,
      apiRoot: parseHttpUrl(env, 'TELEGRAM_API_ROOT'),

      verificationDbUrl,
      verificationTable,

      dataDir,
      groupsFile,
      restrictedUsersFile,
      offsetFile,

      pollTimeoutSeconds,
      retryDelayMs: parseNonNegativeInt(env, 'JOINGATE_RETRY_DELAY_MS', DEFAULT_RETRY_DELAY_MS),
      idleDelayMs: parseNonNegativeInt(env, 'JOINGATE_IDLE_DELAY_MS', DEFAULT_IDLE_DELAY_MS),
      oracleFailureDelayMs: parseNonNegativeInt(env, 'JOINGATE_ORACLE_FAILURE_DELAY_MS', DEFAULT_ORACLE_FAILURE_DELAY_MS),
      writeRetryAttempts: parsePositiveInt(env, 'JOINGATE_WRITE_RETRY_ATTEMPTS', DEFAULT_WRITE_RETRY_ATTEMPTS),
      writeRetryDelayMs: parseNonNegativeInt(env, 'JOINGATE_WRITE_RETRY_DELAY_MS', DEFAULT_WRITE_RETRY_DELAY_MS),

      ledgerPruneCron,

      verbose,
      logLevel,
    },
    warnings,
    infos,
  };
}
