/**
 * Reputation storage: a credit score and a permanent default badge per address.
 * The ledger reads it through the risk policy and writes it only through the
 * reputation hook.
 */

import type Database from 'better-sqlite3';
import type { Address } from '../loans/types.js';
import { createLogger } from '../log.js';

const log = createLogger('reputation');

export interface ReputationStore {
  scoreOf(addr: Address): number;
  setScore(addr: Address, score: number): void;
  hasBadge(addr: Address): boolean;
  mintBadge(addr: Address): void;
}

export const DEFAULT_MAX_SCORE = 1000;

export class SqliteReputationStore implements ReputationStore {
  constructor(
    private readonly db: Database.Database,
    readonly maxScore: number = DEFAULT_MAX_SCORE,
  ) {}

  /** Unknown addresses score 0. */
  scoreOf(addr: Address): number {
    const row = this.db
      .prepare<[string], { score: number }>('SELECT score FROM credit_scores WHERE address = ?')
      .get(addr);
    if (!row) return 0;
    return this.clamp(row.score);
  }

  setScore(addr: Address, score: number): void {
    const s = this.clamp(score);
    const prev = this.scoreOf(addr);
    this.db.prepare(
      'INSERT INTO credit_scores(address, score, updated_at) VALUES(?,?,?) ON CONFLICT(address) DO UPDATE SET score=excluded.score, updated_at=excluded.updated_at',
    ).run(addr, s, Date.now());
    log.info({ msg: 'credit_change', address: addr, from: prev, to: s });
  }

  hasBadge(addr: Address): boolean {
    const row = this.db
      .prepare<[string], { address: string }>('SELECT address FROM default_badges WHERE address = ?')
      .get(addr);
    return row !== undefined;
  }

  /** Idempotent: a second mint keeps the original timestamp. */
  mintBadge(addr: Address): void {
    const res = this.db
      .prepare('INSERT OR IGNORE INTO default_badges(address, minted_at) VALUES(?, ?)')
      .run(addr, Date.now());
    if (res.changes > 0) log.info({ msg: 'default_badge_minted', address: addr });
  }

  private clamp(score: number): number {
    return Math.max(0, Math.min(this.maxScore, Math.floor(score)));
  }
}
