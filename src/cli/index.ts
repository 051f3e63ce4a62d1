#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig } from '../config/index.js';
import { createLedgerRuntime } from '../bootstrap/ledger.js';
import { createLogger } from '../log.js';
import { describeError } from '../utils/errors.js';
import { runCommand } from './commands.js';
import { createUi } from './ui.js';

dotenv.config({ override: false });

const log = createLogger('cli');

function main(argv: string[]): number {
  const ui = createUi();
  let code = 1;
  try {
    const rt = createLedgerRuntime(loadConfig());
    try {
      code = runCommand(rt, argv, ui);
    } finally {
      rt.close();
    }
  } catch (err) {
    log.error({ msg: 'cli_crashed', error: describeError(err) });
    ui.say(err instanceof Error ? err.message : String(err), 'error');
    code = 1;
  }
  return code;
}

process.exitCode = main(process.argv.slice(2));
