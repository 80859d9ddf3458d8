import { GrammyError, HttpError } from 'grammy';

/** Errors that come from the Bot API or the transport to it, as opposed to bugs. */
export function isPlatformError(err: unknown): err is GrammyError | HttpError {
  return err instanceof GrammyError || err instanceof HttpError;
}

export function describePlatformError(err: GrammyError | HttpError): string {
  if (err instanceof GrammyError) {
    return `${err.method} failed (${err.error_code}): ${err.description}`;
  }
  return `network error: ${err.message}`;
}
