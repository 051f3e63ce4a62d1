import type Database from 'better-sqlite3';
import type { AssetCustody } from '../economy/custody.js';
import type { ReputationHook } from '../reputation/hook.js';
import type { InterestModel } from './calculator.js';
import type { RiskPolicy } from './underwrite.js';
import type {
  Address,
  AssetId,
  BorrowRequest,
  DefaultResult,
  DurationBounds,
  FeeSchedule,
  Loan,
  RepayResult,
} from './types.js';
import { LedgerEvents, type LedgerModule } from './events.js';
import { LoanStore } from './store.js';
import { AccessControl, Role } from '../admin/roles.js';
import { getStateFlag, setStateFlag } from '../db/kv.js';
import { createLogger } from '../log.js';
import { systemClock, type Clock } from '../util/clock.js';
import { ReentrancyGuard } from '../util/locks.js';
import {
  DependencyUnavailableError,
  InvalidInputError,
  PolicyRejectionError,
  ResourceExhaustionError,
  StateConflictError,
} from '../util/errors.js';
import { bps, maxBig } from '../utils/bigint.js';

const log = createLogger('ledger');

const PAUSED_KEY = 'paused';

export type LedgerParams = {
  /** Custody account holding liquidity and escrowed collateral. */
  ledgerAccount: Address;
  treasury: Address;
  fees: FeeSchedule;
  durations: DurationBounds;
  /** Seconds after `dueTs` during which a loan cannot be marked defaulted. */
  gracePeriod: number;
};

export type LedgerDeps = {
  db: Database.Database;
  custody: AssetCustody;
  access: AccessControl;
  riskPolicy: RiskPolicy | null;
  interestModel: InterestModel | null;
  /** `null` runs without reputation effects. */
  hook: ReputationHook | null;
  clock?: Clock;
};

type Outcome<T> = { value: T; after: Array<() => void> };

function validateFees(fees: FeeSchedule): FeeSchedule {
  for (const [name, v] of Object.entries(fees)) {
    if (!Number.isInteger(v) || v < 0 || v > 10_000) {
      throw new InvalidInputError('BadConfig', `${name} must be an integer in 0..10000`);
    }
  }
  return { ...fees };
}

function validateDurations(d: DurationBounds): DurationBounds {
  if (!Number.isInteger(d.minDuration) || !Number.isInteger(d.maxDuration) || d.minDuration <= 0 || d.minDuration > d.maxDuration) {
    throw new InvalidInputError('BadConfig', 'duration bounds must satisfy 0 < min <= max');
  }
  return { ...d };
}

function validateGrace(seconds: number): number {
  if (!Number.isInteger(seconds) || seconds < 0) throw new InvalidInputError('BadConfig', 'grace period must be a non-negative integer');
  return seconds;
}

/**
 * Owns loan records and the locked-collateral counters. Every mutating entry
 * point runs inside one SQLite transaction behind a reentrancy guard: any
 * error, including one raised by custody or the reputation hook, leaves the
 * database exactly as it was before the call.
 */
export class LoanLedger {
  readonly events = new LedgerEvents();

  private readonly db: Database.Database;
  private readonly store: LoanStore;
  private readonly custody: AssetCustody;
  private readonly access: AccessControl;
  private readonly clock: Clock;
  private readonly guard = new ReentrancyGuard();

  private riskPolicy: RiskPolicy | null;
  private interestModel: InterestModel | null;
  private hook: ReputationHook | null;

  private ledgerAccount: Address;
  private treasury: Address;
  private fees: FeeSchedule;
  private durations: DurationBounds;
  private gracePeriod: number;

  constructor(params: LedgerParams, deps: LedgerDeps) {
    if (!params.ledgerAccount || !params.treasury) {
      throw new InvalidInputError('ZeroAddress', 'ledger account and treasury are required');
    }
    this.db = deps.db;
    this.store = new LoanStore(deps.db);
    this.custody = deps.custody;
    this.access = deps.access;
    this.clock = deps.clock ?? systemClock;
    this.riskPolicy = deps.riskPolicy;
    this.interestModel = deps.interestModel;
    this.hook = deps.hook;
    this.ledgerAccount = params.ledgerAccount;
    this.treasury = params.treasury;
    this.fees = validateFees(params.fees);
    this.durations = validateDurations(params.durations);
    this.gracePeriod = validateGrace(params.gracePeriod);
  }

  // ── lifecycle ──────────────────────────────────────────────────────────────

  open(borrower: Address, request: BorrowRequest): number {
    return this.mutate('open', () => {
      if (!borrower) throw new InvalidInputError('ZeroAddress', 'borrower is required');
      if (!request.asset) throw new InvalidInputError('ZeroAddress', 'asset is required');
      if (request.amount <= 0n) throw new InvalidInputError('ZeroAmount', 'borrow amount must be positive');
      if (request.collateralAmount < 0n) throw new InvalidInputError('ZeroAmount', 'collateral must not be negative');
      if (request.collateralAmount > 0n && !request.collateralAsset) {
        throw new InvalidInputError('ZeroAddress', 'collateral asset is required when collateral is posted');
      }
      const fee = bps(request.amount, this.fees.originationFeeBps);
      if (fee >= request.amount) throw new InvalidInputError('ZeroAmount', 'borrow amount must exceed the origination fee');
      const { minDuration, maxDuration } = this.durations;
      if (!Number.isInteger(request.duration) || request.duration < minDuration || request.duration > maxDuration) {
        throw new InvalidInputError('DurationOutOfBounds', `duration must be within [${minDuration}, ${maxDuration}] seconds`);
      }
      if (this.store.activeLoanOf(borrower) !== null) throw new StateConflictError('LoanAlreadyActive');

      const policy = this.riskPolicy;
      if (!policy) throw new DependencyUnavailableError('NoRiskPolicy');
      const risk = policy.assessBorrow(borrower, request);
      if (!risk.allowed || request.amount > risk.maxBorrow) {
        const reason = risk.reason === 'OK' ? 'LIMIT' : risk.reason;
        throw new PolicyRejectionError(reason, risk.maxBorrow, risk.collateralRatioBps);
      }

      const now = this.clock.now();
      const id = this.store.allocateId();
      const dueTs = now + request.duration;
      const { asset, amount, collateralAsset, collateralAmount } = request;

      if (collateralAmount > 0n) {
        this.custody.debit(collateralAsset, borrower, collateralAmount, `loan:${id}:collateral`);
        this.custody.credit(collateralAsset, this.ledgerAccount, collateralAmount, `loan:${id}:collateral`);
        this.store.adjustLocked(collateralAsset, collateralAmount);
      }

      const free = this.freeLiquidity(asset);
      if (free < amount) {
        throw new ResourceExhaustionError('InsufficientLiquidity', `free liquidity ${free} ${asset} < ${amount}`);
      }
      const principal = amount - fee;
      this.custody.debit(asset, this.ledgerAccount, amount, `loan:${id}:disburse`);
      this.custody.credit(asset, borrower, principal, `loan:${id}:disburse`);
      if (fee > 0n) this.custody.credit(asset, this.treasury, fee, `loan:${id}:origination_fee`);

      const loan: Loan = {
        id,
        borrower,
        asset,
        collateralAsset,
        principal,
        originationFee: fee,
        principalRepaid: 0n,
        collateralAmount,
        startTs: now,
        dueTs,
        closedTs: null,
        status: 'Active',
      };
      this.store.insert(loan);
      this.store.setActive(borrower, id);
      this.hook?.onLoanOpened(id, borrower);

      return {
        value: id,
        after: [() => {
          log.info({ msg: 'loan_opened', loanId: id, borrower, asset, principal: principal.toString(), fee: fee.toString(), collateral: collateralAmount.toString(), dueTs });
          this.events.emit('loanOpened', { loanId: id, borrower, asset, principal, originationFee: fee, collateralAsset, collateralAmount, dueTs });
        }],
      };
    });
  }

  repay(caller: Address, loanId: number, amount: bigint): RepayResult {
    return this.mutate('repay', () => {
      if (amount <= 0n) throw new InvalidInputError('ZeroAmount', 'repay amount must be positive');
      const loan = this.activeLoan(loanId);
      if (caller !== loan.borrower) throw new InvalidInputError('NotBorrower', `loan ${loanId} belongs to another borrower`);
      const model = this.requireInterestModel();

      this.custody.debit(loan.asset, caller, amount, `loan:${loanId}:repay`);
      this.custody.credit(loan.asset, this.ledgerAccount, amount, `loan:${loanId}:repay`);

      const now = this.clock.now();
      const totalDebt = model.debtWithPenalty(loan.principal, loan.startTs, loan.dueTs, now);
      let totalRepaid = loan.principalRepaid + amount;
      const fullyRepaid = totalRepaid >= totalDebt;
      let refund = 0n;
      let protocolFee = 0n;

      if (fullyRepaid) {
        refund = totalRepaid - totalDebt;
        if (refund > 0n) {
          this.custody.debit(loan.asset, this.ledgerAccount, refund, `loan:${loanId}:refund`);
          this.custody.credit(loan.asset, caller, refund, `loan:${loanId}:refund`);
        }
        totalRepaid = totalDebt;
        if (loan.collateralAmount > 0n) {
          this.custody.debit(loan.collateralAsset, this.ledgerAccount, loan.collateralAmount, `loan:${loanId}:release`);
          this.custody.credit(loan.collateralAsset, loan.borrower, loan.collateralAmount, `loan:${loanId}:release`);
          this.store.adjustLocked(loan.collateralAsset, -loan.collateralAmount);
        }
        protocolFee = bps(maxBig(0n, totalDebt - loan.principal), this.fees.protocolFeeBps);
        if (protocolFee > 0n) {
          this.custody.debit(loan.asset, this.ledgerAccount, protocolFee, `loan:${loanId}:protocol_fee`);
          this.custody.credit(loan.asset, this.treasury, protocolFee, `loan:${loanId}:protocol_fee`);
        }
        this.store.clearActive(loan.borrower);
      }

      const next: Loan = {
        ...loan,
        principalRepaid: totalRepaid,
        status: fullyRepaid ? 'Repaid' : 'Active',
        closedTs: fullyRepaid ? now : null,
      };
      this.store.update(next);

      const paidNet = amount - refund;
      this.hook?.onLoanRepaid(loanId, loan.borrower, paidNet, totalRepaid, totalDebt, fullyRepaid);

      const result: RepayResult = { paidNet, totalRepaid, totalDebt, fullyRepaid, refund, protocolFee };
      return {
        value: result,
        after: [() => {
          log.info({ msg: 'loan_repaid', loanId, borrower: loan.borrower, paidNet: paidNet.toString(), totalRepaid: totalRepaid.toString(), totalDebt: totalDebt.toString(), fullyRepaid });
          this.events.emit('loanRepaid', { loanId, borrower: loan.borrower, paidNet, totalRepaid, totalDebt, fullyRepaid });
        }],
      };
    });
  }

  /** Permissionless once the deadline and grace period have passed; pays the caller a bounty from the collateral. */
  markDefault(caller: Address, loanId: number): DefaultResult {
    return this.mutate('markDefault', () => {
      if (!caller) throw new InvalidInputError('ZeroAddress', 'caller is required');
      const loan = this.activeLoan(loanId);
      const now = this.clock.now();
      if (now <= loan.dueTs + this.gracePeriod) throw new StateConflictError('NotPastDue');

      const bounty = bps(loan.collateralAmount, this.fees.defaultBountyBps);
      if (bounty > 0n) {
        this.custody.debit(loan.collateralAsset, this.ledgerAccount, bounty, `loan:${loanId}:bounty`);
        this.custody.credit(loan.collateralAsset, caller, bounty, `loan:${loanId}:bounty`);
      }
      if (loan.collateralAmount > 0n) this.store.adjustLocked(loan.collateralAsset, -loan.collateralAmount);
      this.store.update({ ...loan, status: 'Defaulted', closedTs: now });
      this.store.clearActive(loan.borrower);
      this.hook?.onLoanDefaulted(loanId, loan.borrower);

      const result: DefaultResult = { bounty, retainedCollateral: loan.collateralAmount - bounty };
      return {
        value: result,
        after: [() => {
          log.warn({ msg: 'loan_defaulted', loanId, borrower: loan.borrower, caller, bounty: bounty.toString() });
          this.events.emit('loanDefaulted', { loanId, borrower: loan.borrower, caller, bounty });
        }],
      };
    });
  }

  // ── reads ──────────────────────────────────────────────────────────────────

  /** Live debt of an Active loan; 0 for closed or unknown loans. */
  getDebt(loanId: number): bigint {
    const loan = this.store.get(loanId);
    if (!loan || loan.status !== 'Active') return 0n;
    return this.requireInterestModel().debtWithPenalty(loan.principal, loan.startTs, loan.dueTs, this.clock.now());
  }

  /** What still has to be paid to close the loan. */
  getOutstanding(loanId: number): bigint {
    const loan = this.store.get(loanId);
    if (!loan || loan.status !== 'Active') return 0n;
    return maxBig(0n, this.getDebt(loanId) - loan.principalRepaid);
  }

  getLoan(loanId: number): Loan | null {
    return this.store.get(loanId);
  }

  activeLoanOf(borrower: Address): number | null {
    return this.store.activeLoanOf(borrower);
  }

  loansOf(borrower: Address): Loan[] {
    return this.store.listByBorrower(borrower);
  }

  activeLoans(): Loan[] {
    return this.store.listActive();
  }

  /** Active loans that `markDefault` would accept right now. */
  defaultable(): Loan[] {
    return this.store.listPastDue(this.clock.now(), this.gracePeriod);
  }

  lockedCollateral(): bigint {
    return this.store.lockedTotal();
  }

  lockedCollateralOf(asset: AssetId): bigint {
    return this.store.lockedOf(asset);
  }

  freeLiquidity(asset: AssetId): bigint {
    return maxBig(0n, this.custody.balanceOf(asset, this.ledgerAccount) - this.store.lockedOf(asset));
  }

  nextLoanId(): number {
    return this.store.peekNextId();
  }

  isPaused(): boolean {
    return getStateFlag(this.db, PAUSED_KEY);
  }

  settings(): { ledgerAccount: Address; treasury: Address; fees: FeeSchedule; durations: DurationBounds; gracePeriod: number } {
    return {
      ledgerAccount: this.ledgerAccount,
      treasury: this.treasury,
      fees: { ...this.fees },
      durations: { ...this.durations },
      gracePeriod: this.gracePeriod,
    };
  }

  // ── administration ─────────────────────────────────────────────────────────

  setRiskPolicy(caller: Address, policy: RiskPolicy | null): void {
    this.admin('setRiskPolicy', caller, () => { this.riskPolicy = policy; });
    this.moduleChanged('riskPolicy', caller);
  }

  setInterestModel(caller: Address, model: InterestModel | null): void {
    this.admin('setInterestModel', caller, () => { this.interestModel = model; });
    this.moduleChanged('interestModel', caller);
  }

  setReputationHook(caller: Address, hook: ReputationHook | null): void {
    this.admin('setReputationHook', caller, () => { this.hook = hook; });
    this.moduleChanged('reputationHook', caller);
  }

  setFees(caller: Address, fees: FeeSchedule): void {
    this.admin('setFees', caller, () => { this.fees = validateFees(fees); });
    log.info({ msg: 'fees_updated', by: caller, ...fees });
  }

  setDurationBounds(caller: Address, bounds: DurationBounds): void {
    this.admin('setDurationBounds', caller, () => { this.durations = validateDurations(bounds); });
    log.info({ msg: 'duration_bounds_updated', by: caller, ...bounds });
  }

  setGracePeriod(caller: Address, seconds: number): void {
    this.admin('setGracePeriod', caller, () => { this.gracePeriod = validateGrace(seconds); });
    log.info({ msg: 'grace_period_updated', by: caller, seconds });
  }

  setTreasury(caller: Address, treasury: Address): void {
    this.admin('setTreasury', caller, () => {
      if (!treasury) throw new InvalidInputError('ZeroAddress', 'treasury is required');
      this.treasury = treasury;
    });
    log.info({ msg: 'treasury_updated', by: caller, treasury });
  }

  setPaused(caller: Address, paused: boolean): void {
    this.admin('setPaused', caller, () => { setStateFlag(this.db, PAUSED_KEY, paused); });
    log.warn({ msg: paused ? 'ledger_paused' : 'ledger_unpaused', by: caller });
    this.publish('setPaused', () => this.events.emit('paused', { paused, by: caller }));
  }

  // ── internals ──────────────────────────────────────────────────────────────

  private mutate<T>(entry: string, fn: () => Outcome<T>): T {
    return this.guard.runExclusive(entry, () => {
      if (this.isPaused()) throw new StateConflictError('Paused', 'ledger is paused');
      const out = this.db.transaction(fn)();
      for (const publish of out.after) this.publish(entry, publish);
      return out.value;
    });
  }

  private admin(entry: string, caller: Address, fn: () => void): void {
    this.guard.runExclusive(entry, () => {
      this.access.require(caller, Role.ADMIN);
      fn();
    });
  }

  private moduleChanged(module: LedgerModule, by: Address): void {
    log.info({ msg: 'module_changed', module, by });
    this.publish('moduleChanged', () => this.events.emit('moduleChanged', { module, by }));
  }

  /** Runs after commit; a failing listener cannot undo the operation it observes. */
  private publish(entry: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      log.error({ msg: 'listener_failed', entry, err });
    }
  }

  private activeLoan(loanId: number): Loan {
    const loan = this.store.get(loanId);
    if (!loan) throw new StateConflictError('LoanNotFound', `loan ${loanId} not found`);
    if (loan.status !== 'Active') throw new StateConflictError('LoanNotActive', `loan ${loanId} is ${loan.status}`);
    return loan;
  }

  private requireInterestModel(): InterestModel {
    if (!this.interestModel) throw new DependencyUnavailableError('NoInterestModel');
    return this.interestModel;
  }
}
