import type { LedgerRuntime } from '../bootstrap/ledger.js';
import type { Loan } from '../loans/types.js';
import { AuthzError, Role } from '../admin/roles.js';
import { LedgerError } from '../util/errors.js';
import { toBigInt } from '../utils/bigint.js';
import { createLogger } from '../log.js';
import type { Ui } from './ui.js';

const log = createLogger('cli');

export const USAGE = [
  'credit-ledger [--as <id>] <command>',
  '  status',
  '  show <loanId>',
  '  debt <loanId>',
  '  loans <borrower>',
  '  open <asset> <amount> <collateralAsset> <collateralAmount> <durationSeconds> [proof]   (as borrower)',
  '  repay <loanId> <amount>                                                               (as borrower)',
  '  default <loanId>                                                                      (as caller)',
  '  mint <asset> <owner> <amount>                                                         (admin)',
  '  balance <asset> <owner>',
  '  score <address>',
  '  pause | unpause                                                                       (admin)',
  '  seed-super <id>',
].join('\n');

class UsageError extends Error {}

export type ParsedArgs = { as: string | null; command: string | null; args: string[] };

export function parseArgs(argv: readonly string[]): ParsedArgs {
  let as: string | null = null;
  const rest: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--as') {
      const v = argv[i + 1];
      if (!v) throw new UsageError('--as needs a value');
      as = v;
      i++;
    } else if (a.startsWith('--as=')) {
      as = a.slice('--as='.length);
    } else if (a === '--no-color' || a === '--quiet') {
      continue;
    } else {
      rest.push(a);
    }
  }
  const [command = null, ...args] = rest;
  return { as, command, args };
}

function arg(args: readonly string[], i: number, name: string): string {
  const v = args[i];
  if (v === undefined || v === '') throw new UsageError(`missing <${name}>`);
  return v;
}

function intArg(args: readonly string[], i: number, name: string): number {
  const raw = arg(args, i, name);
  const n = Number(raw);
  if (!Number.isInteger(n) || n < 0) throw new UsageError(`<${name}> must be a non-negative integer`);
  return n;
}

function amountArg(args: readonly string[], i: number, name: string): bigint {
  const raw = arg(args, i, name);
  try {
    return toBigInt(raw);
  } catch {
    throw new UsageError(`<${name}> must be an integer amount`);
  }
}

function caller(parsed: ParsedArgs): string {
  if (!parsed.as) throw new UsageError('this command needs --as <id>');
  return parsed.as;
}

function loanRow(loan: Loan): Record<string, string | number> {
  return {
    id: loan.id,
    borrower: loan.borrower,
    status: loan.status,
    asset: loan.asset,
    principal: loan.principal.toString(),
    repaid: loan.principalRepaid.toString(),
    collateral: `${loan.collateralAmount} ${loan.collateralAsset}`,
    due: new Date(loan.dueTs * 1000).toISOString(),
  };
}

/** Runs one command against an open runtime; returns the process exit code. */
export function runCommand(rt: LedgerRuntime, argv: readonly string[], ui: Ui): number {
  try {
    return dispatch(rt, parseArgs(argv), ui);
  } catch (err) {
    if (err instanceof UsageError) {
      ui.say(err.message, 'error');
      ui.say(USAGE, 'dim');
      return 2;
    }
    if (err instanceof LedgerError || err instanceof AuthzError) {
      log.warn({ msg: 'cli_command_failed', argv, code: err.code, error: err.message });
      ui.say(`${err.code}: ${err.message}`, 'error');
      return 1;
    }
    throw err;
  }
}

function dispatch(rt: LedgerRuntime, parsed: ParsedArgs, ui: Ui): number {
  const { ledger } = rt;
  const { args } = parsed;
  switch (parsed.command) {
    case 'status': {
      const s = ledger.settings();
      ui.say('Credit ledger', 'title');
      ui.table([
        { key: 'paused', value: String(ledger.isPaused()) },
        { key: 'nextLoanId', value: ledger.nextLoanId() },
        { key: 'lockedCollateral', value: ledger.lockedCollateral().toString() },
        { key: 'ledgerAccount', value: s.ledgerAccount },
        { key: 'treasury', value: s.treasury },
        { key: 'fees', value: `origination ${s.fees.originationFeeBps} / protocol ${s.fees.protocolFeeBps} / bounty ${s.fees.defaultBountyBps} bps` },
        { key: 'durations', value: `${s.durations.minDuration}..${s.durations.maxDuration}s` },
        { key: 'gracePeriod', value: `${s.gracePeriod}s` },
      ]);
      const due = ledger.defaultable();
      if (due.length > 0) ui.say(`${due.length} loan(s) can be marked defaulted`, 'warn');
      return 0;
    }
    case 'show': {
      const id = intArg(args, 0, 'loanId');
      const loan = ledger.getLoan(id);
      if (!loan) {
        ui.say(`loan ${id} not found`, 'error');
        return 1;
      }
      ui.table([loanRow(loan)]);
      return 0;
    }
    case 'debt': {
      const id = intArg(args, 0, 'loanId');
      ui.say(`debt ${ledger.getDebt(id)} outstanding ${ledger.getOutstanding(id)}`);
      return 0;
    }
    case 'loans': {
      ui.table(ledger.loansOf(arg(args, 0, 'borrower')).map(loanRow));
      return 0;
    }
    case 'open': {
      const borrower = caller(parsed);
      const proof = args[5];
      const id = ledger.open(borrower, {
        asset: arg(args, 0, 'asset'),
        amount: amountArg(args, 1, 'amount'),
        collateralAsset: arg(args, 2, 'collateralAsset'),
        collateralAmount: amountArg(args, 3, 'collateralAmount'),
        duration: intArg(args, 4, 'durationSeconds'),
        ...(proof ? { proof } : {}),
      });
      ui.say(`opened loan ${id}`, 'success');
      return 0;
    }
    case 'repay': {
      const res = ledger.repay(caller(parsed), intArg(args, 0, 'loanId'), amountArg(args, 1, 'amount'));
      ui.say(
        `paid ${res.paidNet}, ${res.totalRepaid}/${res.totalDebt} repaid${res.fullyRepaid ? ' (closed)' : ''}`,
        res.fullyRepaid ? 'success' : 'info',
      );
      if (res.refund > 0n) ui.say(`refunded ${res.refund}`, 'dim');
      return 0;
    }
    case 'default': {
      const id = intArg(args, 0, 'loanId');
      const res = ledger.markDefault(caller(parsed), id);
      ui.say(`loan ${id} defaulted, bounty ${res.bounty}`, 'warn');
      return 0;
    }
    case 'mint': {
      rt.access.require(caller(parsed), Role.ADMIN);
      const asset = arg(args, 0, 'asset');
      const owner = arg(args, 1, 'owner');
      rt.custody.mint(asset, owner, amountArg(args, 2, 'amount'));
      ui.say(`${owner} now holds ${rt.custody.balanceOf(asset, owner)} ${asset}`, 'success');
      return 0;
    }
    case 'balance': {
      const asset = arg(args, 0, 'asset');
      const owner = arg(args, 1, 'owner');
      ui.say(`${rt.custody.balanceOf(asset, owner)} ${asset}`);
      return 0;
    }
    case 'score': {
      const addr = arg(args, 0, 'address');
      const badge = rt.reputation.hasBadge(addr) ? ' (defaulter)' : '';
      ui.say(`score ${rt.reputation.scoreOf(addr)}, ratio ${rt.policy.collateralRatioBps(addr)} bps${badge}`);
      return 0;
    }
    case 'pause':
    case 'unpause': {
      const paused = parsed.command === 'pause';
      ledger.setPaused(caller(parsed), paused);
      ui.say(paused ? 'ledger paused' : 'ledger unpaused', 'warn');
      return 0;
    }
    case 'seed-super': {
      const uid = arg(args, 0, 'id');
      rt.access.seedSuperAdmin(uid);
      ui.say(`seeded super admin ${uid}`, 'success');
      return 0;
    }
    case null:
      throw new UsageError('no command given');
    default:
      throw new UsageError(`unknown command: ${parsed.command}`);
  }
}
