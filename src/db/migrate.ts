// Idempotent migration runner with applied_migrations tracking.
import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { createLogger } from '../log.js';

const log = createLogger('migrate');

export const MIGRATIONS_DIR = path.join(__dirname, 'migrations');

function ensureAppliedTable(db: Database.Database) {
  db.exec(`CREATE TABLE IF NOT EXISTS applied_migrations(id TEXT PRIMARY KEY, applied_at TEXT NOT NULL DEFAULT (datetime('now')));`);
}

function listMigrationFiles(dir: string): { id: string; path: string }[] {
  if (!fs.existsSync(dir)) return [];
  const files = fs.readdirSync(dir).filter((f) => /^(\d+).*\.sql$/.test(f)).sort();
  return files.map((f) => ({ id: f.replace(/\.sql$/i, ''), path: path.join(dir, f) }));
}

function hasApplied(db: Database.Database, id: string): boolean {
  const row = db.prepare<[string], { id: string }>('SELECT id FROM applied_migrations WHERE id = ?').get(id);
  return row !== undefined;
}

/** Applies every pending `NNN_*.sql` file in order; returns the ids applied. */
export function runMigrations(db: Database.Database, dir: string = MIGRATIONS_DIR): string[] {
  ensureAppliedTable(db);
  const files = listMigrationFiles(dir);
  if (files.length === 0) {
    log.warn({ msg: 'migrations_dir_missing', dir });
    return [];
  }
  const applied: string[] = [];
  for (const mig of files) {
    if (hasApplied(db, mig.id)) continue;
    const sql = fs.readFileSync(mig.path, 'utf8');
    db.transaction(() => {
      db.exec(sql);
      db.prepare('INSERT INTO applied_migrations(id) VALUES(?)').run(mig.id);
    })();
    applied.push(mig.id);
  }
  if (applied.length) log.debug({ msg: 'migrations_applied', applied });
  return applied;
}
