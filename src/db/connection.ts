import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { runMigrations } from "./migrate.js";
import { createLogger } from "../log.js";

const log = createLogger("db");

export type LedgerDb = Database.Database;

function ensureDirExists(dirPath: string) {
  if (!fs.existsSync(dirPath)) fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * Opens (or creates) a ledger database and brings its schema up to date.
 * `:memory:` gives a private in-process database.
 */
export function openLedgerDb(file: string = ":memory:", opts: { busyTimeoutMs?: number } = {}): LedgerDb {
  const inMemory = file === ":memory:";
  const target = inMemory ? file : path.resolve(file);
  if (!inMemory) ensureDirExists(path.dirname(target));
  const db = new Database(target, { fileMustExist: false });
  if (!inMemory) db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.pragma(`busy_timeout = ${opts.busyTimeoutMs ?? 5000}`);
  runMigrations(db);
  log.debug({ msg: "ledger_db_open", path: target });
  return db;
}
