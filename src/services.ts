import { Api } from 'grammy';
import type { JoingateConfig } from './config.js';
import { LedgerPruner } from './ledger-pruner.js';
import type { LoggerLike } from './logging/logger-like.js';
import { Reconciler } from './reconciler.js';
import type { WriteRetryOptions } from './state/atomic-file.js';
import { CursorStore } from './state/cursor-store.js';
import { GroupRegistry } from './state/group-registry.js';
import { RestrictionLedger } from './state/restriction-ledger.js';
import { TelegramActuator } from './telegram/actuator.js';
import { TelegramEventSource } from './telegram/event-source.js';
import { KnexVerificationOracle, createVerificationDb } from './verification/knex-oracle.js';

export type Services = {
  api: Api;
  groups: GroupRegistry;
  ledger: RestrictionLedger;
  cursor: CursorStore;
  actuator: TelegramActuator;
  source: TelegramEventSource;
  oracle: KnexVerificationOracle;
  reconciler: Reconciler;
  pruner: LedgerPruner;
};

/** Builds every collaborator from config. Nothing connects until first use. */
export function createServices(cfg: JoingateConfig, log: LoggerLike): Services {
  const api = new Api(cfg.botToken, cfg.apiRoot ? { apiRoot: cfg.apiRoot } : undefined);

  const retry: WriteRetryOptions = { attempts: cfg.writeRetryAttempts, delayMs: cfg.writeRetryDelayMs, log };
  const groups = new GroupRegistry(cfg.groupsFile, { retry });
  const ledger = new RestrictionLedger(cfg.restrictedUsersFile, { retry });
  const cursor = new CursorStore(cfg.offsetFile, { retry, log });

  const actuator = new TelegramActuator(api, {
    onFailure: (op, error) => log.debug?.({ op, error }, 'telegram:call failed'),
  });
  const source = new TelegramEventSource(api, { timeoutSeconds: cfg.pollTimeoutSeconds, log });

  const db = createVerificationDb(cfg.verificationDbUrl);
  const oracle = new KnexVerificationOracle(db, cfg.verificationTable);

  const reconciler = new Reconciler({ groups, ledger, platform: actuator, oracle, log });
  const pruner = new LedgerPruner({ ledger, oracle, log, schedule: cfg.ledgerPruneCron });

  return { api, groups, ledger, cursor, actuator, source, oracle, reconciler, pruner };
}
