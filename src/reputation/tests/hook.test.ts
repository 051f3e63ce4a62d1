import { openLedgerDb, type LedgerDb } from '../../db/connection.js';
import { SqliteReputationStore, type ReputationStore } from '../store.js';
import { CreditScoreHook } from '../hook.js';
import { InvalidInputError } from '../../util/errors.js';

class FailingStore implements ReputationStore {
  scoreOf(): number { return 0; }
  setScore(): void { throw new Error('store offline'); }
  hasBadge(): boolean { return false; }
  mintBadge(): void { throw new Error('store offline'); }
}

describe('reputation store and credit score hook', () => {
  let db: LedgerDb;
  let store: SqliteReputationStore;

  beforeEach(() => {
    db = openLedgerDb(':memory:');
    store = new SqliteReputationStore(db, 1_000);
  });

  afterEach(() => db.close());

  test('scores default to zero and are clamped', () => {
    expect(store.scoreOf('alice')).toBe(0);
    store.setScore('alice', 1_500);
    expect(store.scoreOf('alice')).toBe(1_000);
    store.setScore('alice', -20);
    expect(store.scoreOf('alice')).toBe(0);
    store.setScore('alice', 12.9);
    expect(store.scoreOf('alice')).toBe(12);
  });

  test('badge minting is idempotent', () => {
    expect(store.hasBadge('bob')).toBe(false);
    store.mintBadge('bob');
    store.mintBadge('bob');
    expect(store.hasBadge('bob')).toBe(true);
    const n = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM default_badges').get();
    expect(n?.n).toBe(1);
  });

  test('full repayments raise the score by one step', () => {
    const hook = new CreditScoreHook(store, { scoreStep: 50, strict: true });
    hook.onLoanRepaid(1, 'alice', 100n, 100n, 100n, true);
    hook.onLoanRepaid(2, 'alice', 100n, 100n, 100n, true);
    expect(store.scoreOf('alice')).toBe(100);

    store.setScore('alice', 990);
    hook.onLoanRepaid(3, 'alice', 100n, 100n, 100n, true);
    expect(store.scoreOf('alice')).toBe(1_000);
  });

  test('partial repayments leave the score alone', () => {
    const hook = new CreditScoreHook(store);
    hook.onLoanRepaid(1, 'alice', 40n, 40n, 100n, false);
    expect(store.scoreOf('alice')).toBe(0);
  });

  test('a default mints the badge and zeroes the score', () => {
    const hook = new CreditScoreHook(store);
    store.setScore('alice', 700);
    hook.onLoanDefaulted(1, 'alice');
    expect(store.hasBadge('alice')).toBe(true);
    expect(store.scoreOf('alice')).toBe(0);
  });

  test('strict mode rejects inconsistent notifications', () => {
    const hook = new CreditScoreHook(store, { scoreStep: 50, strict: true });
    expect(() => hook.onLoanRepaid(1, 'alice', 0n, 100n, 100n, true)).toThrow(InvalidInputError);
    expect(() => hook.onLoanRepaid(1, 'alice', 10n, 90n, 100n, true)).toThrow('marked repaid with 90 of 100');
    expect(store.scoreOf('alice')).toBe(0);
  });

  test('store failures propagate in strict mode and are logged in lenient mode', () => {
    const failing = new FailingStore();
    const strict = new CreditScoreHook(failing, { scoreStep: 50, strict: true });
    expect(() => strict.onLoanDefaulted(1, 'alice')).toThrow('store offline');

    const lenient = new CreditScoreHook(failing, { scoreStep: 50, strict: false });
    expect(() => lenient.onLoanDefaulted(1, 'alice')).not.toThrow();
    expect(() => lenient.onLoanRepaid(1, 'alice', 100n, 100n, 100n, true)).not.toThrow();
  });
});
