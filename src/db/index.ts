import Database from 'better-sqlite3';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { mkdirSync, existsSync } from 'fs';
import { SCHEMA } from './schema.js';

export const DATA_DIR = join(homedir(), '.rss-triage');
export const DB_PATH = join(DATA_DIR, 'rss-triage.db');

// How long a writer waits on a locked database before giving up
const BUSY_TIMEOUT_MS = 5000;

export type Db = Database.Database;

/**
 * Opens (creating if needed) the store at `path`. Pass `':memory:'` for a
 * throwaway database. Throws when the file cannot be opened.
 */
export function openDb(path: string = DB_PATH): Db {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path, { timeout: BUSY_TIMEOUT_MS });
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.exec(SCHEMA);
  return db;
}

export function closeDb(db: Db): void {
  if (db.open) {
    db.close();
  }
}
