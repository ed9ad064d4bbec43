import BetterSqlite3 from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { DHTWATCH_DB_FILE } from '@dhtwatch/shared';
import { runMigrations } from './migrations/index.js';

/**
 * Open (creating when needed) and migrate a store file. `:memory:` gives a
 * throwaway database.
 */
export function openDatabase(dbPath: string = DHTWATCH_DB_FILE): BetterSqlite3.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new BetterSqlite3(dbPath);

  // WAL keeps API readers off the scheduler's write lock
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('busy_timeout = 5000');

  runMigrations(db);

  return db;
}
