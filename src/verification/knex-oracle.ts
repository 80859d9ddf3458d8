import knex from 'knex';
import type { Knex } from 'knex';
import { OracleUnavailableError } from './oracle.js';
import type { LinkedIdentity, VerificationOracle } from './oracle.js';

/**
 * Read a row of the web flow's `verifications` table (t_id, t_username,
 * w_username, w_id). A non-null w_id means the account is linked.
 */
function toLinkedIdentity(telegramUserId: number, row: unknown): LinkedIdentity | null {
  if (!row || typeof row !== 'object') return null;
  const { w_id: wikiId, w_username: wikiUsername } = row as Record<string, unknown>;
  if (wikiId == null) return null;
  // mysql2 returns BIGINT columns as strings.
  const wikiUserId = typeof wikiId === 'number' ? wikiId : Number(wikiId);
  return {
    telegramId: telegramUserId,
    wikiUserId: Number.isFinite(wikiUserId) ? wikiUserId : null,
    wikiUsername: typeof wikiUsername === 'string' ? wikiUsername : null,
  };
}

export const createVerificationDb = (connectionString: string): Knex =>
  knex({
    client: 'mysql2',
    connection: connectionString,
    pool: { min: 0, max: 2 },
  });

export class KnexVerificationOracle implements VerificationOracle {
  private db: Knex;
  private table: string;

  constructor(db: Knex, table: string) {
    this.db = db;
    this.table = table;
  }

  async lookup(telegramUserId: number): Promise<LinkedIdentity | null> {
    let row: unknown;
    try {
      row = await this.db(this.table).select('t_id', 'w_username', 'w_id').where('t_id', telegramUserId).first();
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new OracleUnavailableError(`verification lookup failed: ${msg}`, { cause: err });
    }
    return toLinkedIdentity(telegramUserId, row);
  }

  async isVerified(telegramUserId: number): Promise<boolean> {
    return (await this.lookup(telegramUserId)) !== null;
  }

  /** Connectivity probe for the startup check. */
  async ping(): Promise<void> {
    try {
      await this.db.raw('select 1');
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new OracleUnavailableError(`verification store unreachable: ${msg}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.db.destroy();
  }
}
