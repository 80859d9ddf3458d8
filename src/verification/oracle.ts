/** A Telegram account linked to a verified wiki identity. */
export type LinkedIdentity = {
  telegramId: number;
  /** Null when the store holds a wiki id that is not numeric. */
  wikiUserId: number | null;
  wikiUsername: string | null;
};

/**
 * Read-only view of the verification store, which the web flow owns.
 * Implementations throw OracleUnavailableError when the store cannot be
 * reached; callers must not read that as "not verified".
 */
export type VerificationOracle = {
  lookup(telegramUserId: number): Promise<LinkedIdentity | null>;
  isVerified(telegramUserId: number): Promise<boolean>;
};

export class OracleUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleUnavailableError';
  }
}
