import 'dotenv/config';
import pino from 'pino';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { parseConfig } from './config.js';
import { MembershipDaemon } from './daemon.js';
import { formatCredentialReport, runCredentialChecks } from './health/credential-check.js';
import { createServices } from './services.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const projectRoot = path.resolve(__dirname, '..');

const verboseFlag = process.argv.slice(2).some((arg) => arg === '--verbose' || arg === '-v');

let parsedConfig;
try {
  parsedConfig = parseConfig(process.env, { projectRoot, verbose: verboseFlag });
} catch (err) {
  pino().error({ err }, 'Invalid configuration');
  process.exit(1);
}
const cfg = parsedConfig.config;

const log = pino({ level: cfg.logLevel });
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}
log.info(
  { dataDir: cfg.dataDir, groupsFile: cfg.groupsFile, restrictedUsersFile: cfg.restrictedUsersFile, offsetFile: cfg.offsetFile },
  'boot:state files',
);

const services = createServices(cfg, log);

const controller = new AbortController();
const shutdown = () => {
  if (controller.signal.aborted) return;
  log.info('Shutting down');
  controller.abort();
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);

const credentialReport = await runCredentialChecks({ api: services.api, store: services.oracle });
const credentialLine = formatCredentialReport(credentialReport);
if (credentialReport.criticalFailures.length > 0) {
  for (const name of credentialReport.criticalFailures) {
    const result = credentialReport.results.find((r) => r.name === name);
    log.error({ name, message: result?.message }, 'boot:credential-check: critical credential failed');
  }
  await services.oracle.close();
  process.exit(1);
}
if (credentialReport.allOk) {
  log.info({ report: credentialLine }, 'boot:credential-check');
} else {
  log.warn({ report: credentialLine }, 'boot:credential-check: some checks failed');
}

services.pruner.start();

const daemon = new MembershipDaemon({
  source: services.source,
  cursor: services.cursor,
  groups: services.groups,
  ledger: services.ledger,
  reconciler: services.reconciler,
  pruner: services.pruner,
  log,
  retryDelayMs: cfg.retryDelayMs,
  idleDelayMs: cfg.idleDelayMs,
  oracleFailureDelayMs: cfg.oracleFailureDelayMs,
});

let exitCode = 0;
try {
  const reason = await daemon.run(controller.signal);
  // A supervisor is expected to restart the process.
  if (reason === 'oracle-unavailable') exitCode = 1;
} catch (err) {
  log.error({ err }, 'daemon:crashed');
  exitCode = 1;
} finally {
  services.pruner.stop();
  await services.oracle.close();
}
process.exit(exitCode);
