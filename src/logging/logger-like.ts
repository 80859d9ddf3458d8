/**
 * Minimal logger surface the daemon components depend on.
 * A pino logger satisfies it; tests pass `{ info: vi.fn(), warn: vi.fn(), error: vi.fn() }`.
 */
export type LoggerLike = {
  trace?(obj: unknown, msg?: string): void;
  debug?(obj: unknown, msg?: string): void;
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
};
