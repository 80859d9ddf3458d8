#!/usr/bin/env node
/**
 * joingate CLI entrypoint.
 * Usage: joingate <command> [options]
 */

import 'dotenv/config';
import pino from 'pino';
import path from 'node:path';
import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';
import { parseConfig } from '../config.js';
import { createServices } from '../services.js';
import type { Services } from '../services.js';
import { CliUsageError, listAdmins, listGroups, listLedger, pruneLedger, setGroupFlag } from './commands.js';

const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');

const [, , command, ...args] = process.argv;

/** Builds the services for a one-shot admin command and tears them down afterwards. */
async function withServices<T>(fn: (services: Services) => Promise<T>): Promise<T> {
  const { config } = parseConfig(process.env, { projectRoot });
  // stdout carries command output; logs go to stderr.
  const log = pino({ level: config.logLevel }, pino.destination(2));
  const services = createServices(config, log);
  try {
    return await fn(services);
  } finally {
    await services.oracle.close();
  }
}

function print(lines: string[]): void {
  if (lines.length > 0) console.log(lines.join('\n'));
}

try {
  switch (command) {
    case 'run':
      await import('../index.js');
      break;
    case 'groups':
      if (args[0] === 'set') {
        print([await withServices((s) => setGroupFlag(s.groups, args[1], args[2]))]);
      } else if (args[0] === undefined) {
        print(await withServices((s) => listGroups(s.groups)));
      } else {
        throw new CliUsageError(`Unknown groups subcommand: ${args[0]}`);
      }
      break;
    case 'ledger':
      if (args[0] === 'prune') {
        print([await withServices((s) => pruneLedger(s.pruner))]);
      } else if (args[0] === undefined) {
        print(await withServices((s) => listLedger(s.ledger)));
      } else {
        throw new CliUsageError(`Unknown ledger subcommand: ${args[0]}`);
      }
      break;
    case 'admins':
      print(await withServices((s) => listAdmins(s.actuator, s.oracle, args[0])));
      break;
    case '--version':
      console.log(version);
      break;
    case '--help':
    case '-h':
    case undefined:
      printHelp(version);
      break;
    default:
      throw new CliUsageError(`Unknown command: ${command}`);
  }
} catch (err) {
  if (err instanceof CliUsageError) {
    console.error(`${err.message}\n`);
    printHelp(version);
  } else {
    console.error(err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
}

function printHelp(ver: string): void {
  console.log(
    `joingate v${ver} - membership gate for Telegram groups\n` +
      `\nUsage: joingate <command>\n` +
      `\nCommands:\n` +
      `  run [-v|--verbose]            Start the moderation daemon (verbose logs every decision)\n` +
      `  groups                        List registered groups and their delete-messages flag\n` +
      `  groups set <groupId> <on|off> Toggle message deletion for a registered group\n` +
      `  ledger                        List users currently in the restriction ledger\n` +
      `  ledger prune                  Drop ledger entries of users who have since verified\n` +
      `  admins <groupId>              List a group's administrators and their wiki accounts\n` +
      `\nOptions:\n` +
      `  --version       Print version\n` +
      `  -h, --help      Print this help\n`,
  );
}
