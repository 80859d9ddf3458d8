import type { Update } from 'grammy/types';
import type { LoggerLike } from '../logging/logger-like.js';
import type { BotApi } from './actuator.js';
import { describePlatformError, isPlatformError } from './errors.js';
import { ALLOWED_UPDATES, parseUpdate, readUpdateId } from './updates.js';
import type { DaemonEvent } from './updates.js';

export type FetchResult =
  | {
      ok: true;
      /** Parsed events in increasing update_id order. */
      events: DaemonEvent[];
      /** Highest update_id in the batch, including skipped updates; null when empty. */
      highestUpdateId: number | null;
      /** Updates that matched no event shape. */
      skipped: number;
    }
  | { ok: false; error: string };

export type EventSource = {
  fetch(cursor: number, signal?: AbortSignal): Promise<FetchResult>;
};

/**
 * Long-polls getUpdates from the update after `cursor`. Transport and API
 * failures are returned, never thrown: the caller pauses and polls again.
 */
export class TelegramEventSource implements EventSource {
  private api: Pick<BotApi, 'getUpdates'>;
  private timeoutSeconds: number;
  private log?: LoggerLike;

  constructor(api: Pick<BotApi, 'getUpdates'>, opts: { timeoutSeconds: number; log?: LoggerLike }) {
    this.api = api;
    this.timeoutSeconds = opts.timeoutSeconds;
    this.log = opts.log;
  }

  async fetch(cursor: number, signal?: AbortSignal): Promise<FetchResult> {
    let updates: Update[];
    try {
      updates = await this.api.getUpdates(
        {
          // Omitted on a fresh start so Telegram begins at the earliest unconfirmed update.
          offset: cursor > 0 ? cursor + 1 : undefined,
          timeout: this.timeoutSeconds,
          allowed_updates: [...ALLOWED_UPDATES],
        },
        signal,
      );
    } catch (err) {
      if (!isPlatformError(err)) throw err;
      return { ok: false, error: describePlatformError(err) };
    }

    const events: DaemonEvent[] = [];
    let highestUpdateId: number | null = null;
    let skipped = 0;
    for (const update of updates) {
      const updateId = readUpdateId(update);
      if (updateId != null && (highestUpdateId == null || updateId > highestUpdateId)) {
        highestUpdateId = updateId;
      }
      const event = parseUpdate(update);
      if (event) {
        events.push(event);
      } else {
        skipped++;
        this.log?.trace?.({ updateId, keys: Object.keys(update) }, 'poll:skipped update');
      }
    }
    events.sort((a, b) => a.updateId - b.updateId);

    return { ok: true, events, highestUpdateId, skipped };
  }
}
