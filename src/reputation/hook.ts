import type { Address } from '../loans/types.js';
import type { ReputationStore } from './store.js';
import { createLogger } from '../log.js';
import { InvalidInputError } from '../util/errors.js';
import { describeError } from '../utils/errors.js';

const log = createLogger('reputation-hook');

/**
 * Lifecycle notifications from the ledger. Throwing from any of them aborts
 * the ledger operation that triggered it.
 */
export interface ReputationHook {
  onLoanOpened(loanId: number, borrower: Address): void;
  onLoanRepaid(
    loanId: number,
    borrower: Address,
    paid: bigint,
    totalRepaid: bigint,
    totalDebt: bigint,
    fullyRepaid: boolean,
  ): void;
  onLoanDefaulted(loanId: number, borrower: Address): void;
}

export type CreditScoreHookOptions = {
  /** Points added for each fully repaid loan. */
  scoreStep: number;
  /** Reject inconsistent notifications and let store failures abort the ledger call. */
  strict: boolean;
};

/**
 * The only writer of credit scores: full repayment earns `scoreStep`, a
 * default mints the badge and zeroes the score.
 */
export class CreditScoreHook implements ReputationHook {
  constructor(
    private readonly store: ReputationStore,
    private readonly opts: CreditScoreHookOptions = { scoreStep: 50, strict: true },
  ) {}

  onLoanOpened(loanId: number, borrower: Address): void {
    log.debug({ msg: 'hook_loan_opened', loanId, borrower });
  }

  onLoanRepaid(
    loanId: number,
    borrower: Address,
    paid: bigint,
    totalRepaid: bigint,
    totalDebt: bigint,
    fullyRepaid: boolean,
  ): void {
    if (this.opts.strict) {
      if (paid <= 0n) throw new InvalidInputError('ZeroAmount', `loan ${loanId}: repayment notification without payment`);
      if (fullyRepaid && totalRepaid < totalDebt) {
        throw new InvalidInputError('BadConfig', `loan ${loanId}: marked repaid with ${totalRepaid} of ${totalDebt}`);
      }
    }
    if (!fullyRepaid) return;
    this.write('full_repayment', loanId, borrower, () => {
      const prev = this.store.scoreOf(borrower);
      this.store.setScore(borrower, prev + this.opts.scoreStep);
    });
  }

  onLoanDefaulted(loanId: number, borrower: Address): void {
    this.write('default', loanId, borrower, () => {
      this.store.mintBadge(borrower);
      this.store.setScore(borrower, 0);
    });
  }

  private write(reason: string, loanId: number, borrower: Address, fn: () => void): void {
    if (this.opts.strict) {
      fn();
      return;
    }
    try {
      fn();
    } catch (err) {
      log.warn({ msg: 'hook_store_failed', reason, loanId, borrower, error: describeError(err) });
    }
  }
}
