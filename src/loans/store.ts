import type Database from 'better-sqlite3';
import { getState, setState } from '../db/kv.js';
import { bigintToDb, dbToBigint } from '../utils/bigint.js';
import type { Address, AssetId, Loan, LoanStatus } from './types.js';

type LoanRow = {
  id: number;
  borrower: string;
  asset: string;
  collateral_asset: string;
  principal: string;
  origination_fee: string;
  principal_repaid: string;
  collateral_amount: string;
  start_ts: number;
  due_ts: number;
  closed_ts: number | null;
  status: string;
};

const STATUSES: readonly LoanStatus[] = ['None', 'Active', 'Repaid', 'Defaulted', 'Liquidated'];

function toStatus(raw: string): LoanStatus {
  const found = STATUSES.find((s) => s === raw);
  if (!found) throw new TypeError(`Unknown loan status in store: ${raw}`);
  return found;
}

function toLoan(row: LoanRow): Loan {
  return {
    id: row.id,
    borrower: row.borrower,
    asset: row.asset,
    collateralAsset: row.collateral_asset,
    principal: dbToBigint(row.principal),
    originationFee: dbToBigint(row.origination_fee),
    principalRepaid: dbToBigint(row.principal_repaid),
    collateralAmount: dbToBigint(row.collateral_amount),
    startTs: row.start_ts,
    dueTs: row.due_ts,
    closedTs: row.closed_ts,
    status: toStatus(row.status),
  };
}

const NEXT_ID_KEY = 'next_loan_id';

/**
 * Row-level access to loans, the active-loan pointers and the locked
 * collateral counters. Callers own transaction boundaries.
 */
export class LoanStore {
  constructor(private readonly db: Database.Database) {}

  /** Reserves and returns the next loan id; ids start at 1 and are never reused. */
  allocateId(): number {
    const id = this.peekNextId();
    setState(this.db, NEXT_ID_KEY, String(id + 1));
    return id;
  }

  peekNextId(): number {
    const raw = getState(this.db, NEXT_ID_KEY);
    const n = raw == null ? 1 : Number(raw);
    return Number.isInteger(n) && n > 0 ? n : 1;
  }

  get(id: number): Loan | null {
    const row = this.db.prepare<[number], LoanRow>('SELECT * FROM loans WHERE id = ?').get(id);
    return row ? toLoan(row) : null;
  }

  listByBorrower(borrower: Address): Loan[] {
    const rows = this.db.prepare<[string], LoanRow>('SELECT * FROM loans WHERE borrower = ? ORDER BY id ASC').all(borrower);
    return rows.map(toLoan);
  }

  listActive(): Loan[] {
    const rows = this.db.prepare<[], LoanRow>("SELECT * FROM loans WHERE status = 'Active' ORDER BY id ASC").all();
    return rows.map(toLoan);
  }

  /** Active loans whose deadline (plus grace) has passed at `now`. */
  listPastDue(now: number, gracePeriod: number): Loan[] {
    const rows = this.db
      .prepare<[number], LoanRow>("SELECT * FROM loans WHERE status = 'Active' AND due_ts < ? ORDER BY due_ts ASC, id ASC")
      .all(now - gracePeriod);
    return rows.map(toLoan);
  }

  insert(loan: Loan): void {
    this.db.prepare(
      `INSERT INTO loans(id, borrower, asset, collateral_asset, principal, origination_fee, principal_repaid,
                         collateral_amount, start_ts, due_ts, closed_ts, status)
       VALUES(?,?,?,?,?,?,?,?,?,?,?,?)`,
    ).run(
      loan.id, loan.borrower, loan.asset, loan.collateralAsset,
      bigintToDb(loan.principal), bigintToDb(loan.originationFee), bigintToDb(loan.principalRepaid),
      bigintToDb(loan.collateralAmount), loan.startTs, loan.dueTs, loan.closedTs, loan.status,
    );
  }

  /** Only the fields that change after origination are written back. */
  update(loan: Loan): void {
    this.db.prepare('UPDATE loans SET principal_repaid = ?, status = ?, closed_ts = ? WHERE id = ?')
      .run(bigintToDb(loan.principalRepaid), loan.status, loan.closedTs, loan.id);
  }

  activeLoanOf(borrower: Address): number | null {
    const row = this.db.prepare<[string], { loan_id: number }>('SELECT loan_id FROM active_loans WHERE borrower = ?').get(borrower);
    return row ? row.loan_id : null;
  }

  setActive(borrower: Address, loanId: number): void {
    this.db.prepare('INSERT INTO active_loans(borrower, loan_id) VALUES(?, ?)').run(borrower, loanId);
  }

  clearActive(borrower: Address): void {
    this.db.prepare('DELETE FROM active_loans WHERE borrower = ?').run(borrower);
  }

  lockedOf(asset: AssetId): bigint {
    const row = this.db.prepare<[string], { amount: string }>('SELECT amount FROM locked_collateral WHERE asset = ?').get(asset);
    return row ? dbToBigint(row.amount) : 0n;
  }

  lockedTotal(): bigint {
    const rows = this.db.prepare<[], { amount: string }>('SELECT amount FROM locked_collateral').all();
    return rows.reduce((sum, r) => sum + dbToBigint(r.amount), 0n);
  }

  adjustLocked(asset: AssetId, delta: bigint): bigint {
    const next = this.lockedOf(asset) + delta;
    if (next < 0n) throw new RangeError(`locked collateral for ${asset} would go negative`);
    this.db.prepare(
      'INSERT INTO locked_collateral(asset, amount) VALUES(?, ?) ON CONFLICT(asset) DO UPDATE SET amount = excluded.amount',
    ).run(asset, bigintToDb(next));
    return next;
  }
}
