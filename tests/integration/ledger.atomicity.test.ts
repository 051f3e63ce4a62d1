import { jest } from '@jest/globals';
import { ADMIN, DAY, makeLedger, usdcLoan, type Fixture } from './helpers.js';
import {
  DependencyUnavailableError,
  ReentrancyError,
  ResourceExhaustionError,
  StateConflictError,
  isRecoverable,
} from '../../src/util/errors.js';
import { AuthzError } from '../../src/admin/roles.js';
import type { ReputationHook } from '../../src/reputation/hook.js';
import type { LoanRepaidEvent } from '../../src/loans/events.js';

function quietHook(overrides: Partial<ReputationHook> = {}): ReputationHook {
  return {
    onLoanOpened: () => undefined,
    onLoanRepaid: () => undefined,
    onLoanDefaulted: () => undefined,
    ...overrides,
  };
}

describe('ledger atomicity', () => {
  let f: Fixture;

  beforeEach(() => {
    f = makeLedger();
    f.custody.mint('USDC', 'alice', 1_500_000n);
  });

  afterEach(() => f.close());

  test('a failing hook rolls back the whole repayment', () => {
    const id = f.ledger.open('alice', usdcLoan());
    f.ledger.setReputationHook(ADMIN, quietHook({
      onLoanRepaid: () => {
        throw new Error('hook down');
      },
    }));
    f.clock.advance(DAY);
    const before = {
      alice: f.custody.balanceOf('USDC', 'alice'),
      ledger: f.custody.balanceOf('USDC', 'ledger'),
      treasury: f.custody.balanceOf('USDC', 'treasury'),
    };

    expect(() => f.ledger.repay('alice', id, 900_000n)).toThrow('hook down');

    expect(f.custody.balanceOf('USDC', 'alice')).toBe(before.alice);
    expect(f.custody.balanceOf('USDC', 'ledger')).toBe(before.ledger);
    expect(f.custody.balanceOf('USDC', 'treasury')).toBe(before.treasury);
    const loan = f.ledger.getLoan(id);
    expect(loan?.principalRepaid).toBe(0n);
    expect(loan?.status).toBe('Active');
    expect(f.ledger.lockedCollateral()).toBe(1_500_000n);
  });

  test('a failing default hook keeps the loan active and the bounty unpaid', () => {
    const id = f.ledger.open('alice', usdcLoan());
    f.ledger.setReputationHook(ADMIN, quietHook({
      onLoanDefaulted: () => {
        throw new Error('hook down');
      },
    }));
    f.clock.advance(10 * DAY + 1);
    expect(() => f.ledger.markDefault('bob', id)).toThrow('hook down');
    expect(f.custody.balanceOf('USDC', 'bob')).toBe(0n);
    expect(f.ledger.activeLoanOf('alice')).toBe(id);
    expect(f.ledger.lockedCollateral()).toBe(1_500_000n);
    expect(f.reputation.hasBadge('alice')).toBe(false);
  });

  test('insufficient liquidity leaves collateral and ids untouched', () => {
    const g = makeLedger({}, { liquidity: 0n });
    try {
      g.custody.mint('USDC', 'alice', 1_500_000n);
      let caught: unknown;
      try {
        g.ledger.open('alice', usdcLoan());
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(ResourceExhaustionError);
      expect(isRecoverable(caught)).toBe(true);
      expect(g.custody.balanceOf('USDC', 'alice')).toBe(1_500_000n);
      expect(g.custody.balanceOf('USDC', 'ledger')).toBe(0n);
      expect(g.ledger.lockedCollateral()).toBe(0n);
      expect(g.ledger.activeLoanOf('alice')).toBeNull();
      expect(g.ledger.nextLoanId()).toBe(1);
    } finally {
      g.close();
    }
  });

  test('collateral the borrower does not hold aborts the open', () => {
    expect(() => f.ledger.open('alice', usdcLoan({ collateralAmount: 2_000_000n, amount: 1_000_000n })))
      .toThrow(ResourceExhaustionError);
    expect(f.custody.balanceOf('USDC', 'alice')).toBe(1_500_000n);
    expect(f.ledger.lockedCollateral()).toBe(0n);
  });

  test('re-entering the ledger from a hook is rejected and rolled back', () => {
    f.custody.mint('USDC', 'bob', 1_500_000n);
    f.ledger.setReputationHook(ADMIN, quietHook({
      onLoanOpened: () => {
        f.ledger.open('bob', usdcLoan());
      },
    }));
    expect(() => f.ledger.open('alice', usdcLoan())).toThrow(ReentrancyError);
    expect(f.ledger.nextLoanId()).toBe(1);
    expect(f.ledger.activeLoanOf('alice')).toBeNull();
    expect(f.ledger.activeLoanOf('bob')).toBeNull();
    expect(f.custody.balanceOf('USDC', 'alice')).toBe(1_500_000n);
  });

  test('pause blocks lifecycle calls until lifted', () => {
    const id = f.ledger.open('alice', usdcLoan());
    const seen: boolean[] = [];
    f.ledger.events.on('paused', (e) => seen.push(e.paused));

    f.ledger.setPaused(ADMIN, true);
    expect(f.ledger.isPaused()).toBe(true);
    expect(() => f.ledger.repay('alice', id, 1n)).toThrow(StateConflictError);
    expect(() => f.ledger.markDefault('bob', id)).toThrow('ledger is paused');

    f.ledger.setPaused(ADMIN, false);
    expect(f.ledger.repay('alice', id, 1n).totalRepaid).toBe(1n);
    expect(seen).toEqual([true, false]);
  });

  test('configured pause is applied at start-up', () => {
    const g = makeLedger({ paused: true });
    try {
      expect(g.ledger.isPaused()).toBe(true);
      expect(() => g.ledger.open('alice', usdcLoan())).toThrow('ledger is paused');
    } finally {
      g.close();
    }
  });

  test('administrative setters require the admin role', () => {
    expect(() => f.ledger.setPaused('mallory', true)).toThrow(AuthzError);
    expect(() => f.ledger.setRiskPolicy('mallory', null)).toThrow(AuthzError);
    expect(() => f.ledger.setFees('mallory', { originationFeeBps: 0, protocolFeeBps: 0, defaultBountyBps: 0 }))
      .toThrow(AuthzError);
    expect(f.ledger.isPaused()).toBe(false);
    expect(f.ledger.settings().fees.originationFeeBps).toBe(50);
  });

  test('missing strategy modules surface as dependency errors', () => {
    const id = f.ledger.open('alice', usdcLoan());
    const changed: string[] = [];
    f.ledger.events.on('moduleChanged', (e) => changed.push(e.module));

    f.ledger.setInterestModel(ADMIN, null);
    expect(() => f.ledger.repay('alice', id, 1n)).toThrow(DependencyUnavailableError);
    expect(() => f.ledger.getDebt(id)).toThrow('NoInterestModel');

    f.ledger.setRiskPolicy(ADMIN, null);
    f.custody.mint('USDC', 'bob', 1_500_000n);
    expect(() => f.ledger.open('bob', usdcLoan())).toThrow('NoRiskPolicy');
    expect(changed).toEqual(['interestModel', 'riskPolicy']);
  });

  test('events fire after commit and a failing listener does not undo the call', () => {
    const repaid: LoanRepaidEvent[] = [];
    f.ledger.events.on('loanOpened', () => {
      throw new Error('listener bug');
    });
    f.ledger.events.on('loanRepaid', (e) => repaid.push(e));
    const id = f.ledger.open('alice', usdcLoan());
    expect(f.ledger.getLoan(id)?.status).toBe('Active');

    f.ledger.repay('alice', id, 400_000n);
    expect(repaid).toEqual([{
      loanId: id,
      borrower: 'alice',
      paidNet: 400_000n,
      totalRepaid: 400_000n,
      totalDebt: 995_000n,
      fullyRepaid: false,
    }]);
  });

  test('unsubscribing stops delivery', () => {
    const listener = jest.fn();
    const off = f.ledger.events.on('loanOpened', listener);
    off();
    f.ledger.open('alice', usdcLoan());
    expect(listener).not.toHaveBeenCalled();
  });
});
