import type Database from 'better-sqlite3';
import type { Address, AssetId } from '../loans/types.js';
import { bigintToDb, dbToBigint } from '../utils/bigint.js';
import { InvalidInputError, ResourceExhaustionError } from '../util/errors.js';

/**
 * Fungible asset custody. Assets must be fee-less and non-rebasing: the
 * ledger's collateral accounting assumes a credit of `n` raises a balance by
 * exactly `n` and that balances never move on their own.
 */
export interface AssetCustody {
  debit(asset: AssetId, owner: Address, amount: bigint, reason?: string): void;
  credit(asset: AssetId, owner: Address, amount: bigint, reason?: string): void;
  balanceOf(asset: AssetId, owner: Address): bigint;
}

type BalanceRow = { balance: string };

/**
 * Balances kept in the ledger database, so that custody writes commit and roll
 * back together with the ledger's own unit of work.
 */
export class SqliteAssetCustody implements AssetCustody {
  constructor(private readonly db: Database.Database) {}

  balanceOf(asset: AssetId, owner: Address): bigint {
    const row = this.db
      .prepare<[string, string], BalanceRow>('SELECT balance FROM balances WHERE asset = ? AND owner = ?')
      .get(asset, owner);
    if (!row) return 0n;
    return dbToBigint(row.balance);
  }

  credit(asset: AssetId, owner: Address, amount: bigint, reason = 'credit'): void {
    if (amount < 0n) throw new InvalidInputError('ZeroAmount', 'credit amount must not be negative');
    this.adjust(asset, owner, amount, reason);
  }

  debit(asset: AssetId, owner: Address, amount: bigint, reason = 'debit'): void {
    if (amount < 0n) throw new InvalidInputError('ZeroAmount', 'debit amount must not be negative');
    this.adjust(asset, owner, -amount, reason);
  }

  /** Creates units out of nothing; for operators seeding liquidity and for tests. */
  mint(asset: AssetId, owner: Address, amount: bigint): void {
    if (amount < 0n) throw new InvalidInputError('ZeroAmount', 'mint amount must not be negative');
    this.adjust(asset, owner, amount, 'mint');
  }

  private adjust(asset: AssetId, owner: Address, delta: bigint, reason: string): void {
    if (!asset || !owner) throw new InvalidInputError('ZeroAddress', 'asset and owner are required');
    if (delta === 0n) return;
    const now = Date.now();
    const txn = this.db.transaction(() => {
      const current = this.balanceOf(asset, owner);
      const next = current + delta;
      if (next < 0n) {
        throw new ResourceExhaustionError('InsufficientBalance', `${owner} holds ${current} ${asset}, needs ${-delta}`);
      }
      this.db.prepare(
        'INSERT INTO balances(asset, owner, balance, updated_at) VALUES(?, ?, ?, ?) ON CONFLICT(asset, owner) DO UPDATE SET balance = excluded.balance, updated_at = excluded.updated_at',
      ).run(asset, owner, bigintToDb(next), now);
      this.db.prepare(
        'INSERT INTO transfers(asset, owner, delta, reason, created_at) VALUES (?, ?, ?, ?, ?)',
      ).run(asset, owner, bigintToDb(delta), reason, now);
    });
    txn();
  }
}
