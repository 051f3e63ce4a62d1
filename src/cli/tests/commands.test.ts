import { defaultConfig } from '../../config/index.js';
import { createLedgerRuntime, type LedgerRuntime } from '../../bootstrap/ledger.js';
import { openLedgerDb } from '../../db/connection.js';
import { ManualClock } from '../../util/clock.js';
import { parseArgs, runCommand } from '../commands.js';
import { createUi } from '../ui.js';

const T0 = 1_700_000_000;

describe('credit-ledger cli', () => {
  let rt: LedgerRuntime;
  let lines: string[];

  const run = (...argv: string[]) => runCommand(rt, argv, createUi((l) => lines.push(l), true));

  beforeEach(() => {
    rt = createLedgerRuntime(defaultConfig(), { db: openLedgerDb(':memory:'), clock: new ManualClock(T0) });
    lines = [];
  });

  afterEach(() => rt.close());

  test('parses the caller flag anywhere', () => {
    expect(parseArgs(['--as', 'ops', 'pause'])).toEqual({ as: 'ops', command: 'pause', args: [] });
    expect(parseArgs(['repay', '1', '--as=alice', '50'])).toEqual({ as: 'alice', command: 'repay', args: ['1', '50'] });
    expect(parseArgs([])).toEqual({ as: null, command: null, args: [] });
  });

  test('admin flow: seed, mint, borrow, repay', () => {
    expect(run('seed-super', 'ops')).toBe(0);
    expect(run('--as', 'ops', 'mint', 'USDC', 'ledger', '10_000_000')).toBe(0);
    expect(run('--as', 'ops', 'mint', 'USDC', 'alice', '1500000')).toBe(0);
    expect(lines).toEqual([
      '✔ seeded super admin ops',
      '✔ ledger now holds 10000000 USDC',
      '✔ alice now holds 1500000 USDC',
    ]);

    lines = [];
    expect(run('--as', 'alice', 'open', 'USDC', '1000000', 'USDC', '1500000', '864000')).toBe(0);
    expect(run('debt', '1')).toBe(0);
    expect(run('--as', 'alice', 'repay', '1', '400000')).toBe(0);
    expect(lines).toEqual([
      '✔ opened loan 1',
      'debt 995000 outstanding 995000',
      'paid 400000, 400000/995000 repaid',
    ]);
    expect(rt.custody.balanceOf('USDC', 'alice')).toBe(595_000n);
  });

  test('ledger errors exit with 1 and print the code', () => {
    expect(run('--as', 'mallory', 'mint', 'USDC', 'mallory', '5')).toBe(1);
    expect(lines).toEqual(['✖ NotAuthorized: ADMIN role required']);
    lines = [];
    expect(run('--as', 'alice', 'repay', '9', '1')).toBe(1);
    expect(lines).toEqual(['✖ LoanNotFound: loan 9 not found']);
  });

  test('usage errors exit with 2', () => {
    expect(run('frobnicate')).toBe(2);
    expect(lines[0]).toBe('✖ unknown command: frobnicate');
    lines = [];
    expect(run('pause')).toBe(2);
    expect(lines[0]).toBe('✖ this command needs --as <id>');
    lines = [];
    expect(run('show', 'x')).toBe(2);
    expect(lines[0]).toBe('✖ <loanId> must be a non-negative integer');
  });

  test('score and status', () => {
    rt.reputation.setScore('alice', 400);
    expect(run('score', 'alice')).toBe(0);
    expect(lines).toEqual(['score 400, ratio 7500 bps']);

    lines = [];
    expect(run('status')).toBe(0);
    expect(lines[0]).toBe('Credit ledger');
    expect(lines).toContain('paused            false');
  });
});
