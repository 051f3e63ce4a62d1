import type Database from 'better-sqlite3';

export function getState(db: Database.Database, key: string): string | null {
    const row = db.prepare<[string], { value: string }>('SELECT value FROM ledger_state WHERE key = ?').get(key);
    return row?.value ?? null;
}

export function setState(db: Database.Database, key: string, value: string): void {
    db.prepare(`
    INSERT INTO ledger_state(key, value, updated_at)
    VALUES (?, ?, strftime('%s','now'))
    ON CONFLICT(key) DO UPDATE SET value=excluded.value, updated_at=excluded.updated_at;
  `).run(key, value);
}

export function getStateNum(db: Database.Database, key: string, fallback: number): number {
    const v = getState(db, key);
    const n = v == null ? NaN : Number(v);
    return Number.isFinite(n) ? n : fallback;
}

export function getStateFlag(db: Database.Database, key: string): boolean {
    return getState(db, key) === '1';
}

export function setStateFlag(db: Database.Database, key: string, on: boolean): void {
    setState(db, key, on ? '1' : '0');
}
