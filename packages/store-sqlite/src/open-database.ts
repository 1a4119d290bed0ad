import Database from 'better-sqlite3';
import type { SQLiteDatabaseOption } from './schema.js';

export interface OpenedDatabase {
  db: Database.Database;
  /** True when the store opened the connection and must close it. */
  owned: boolean;
}

export function openDatabase(
  database: SQLiteDatabaseOption = ':memory:',
): OpenedDatabase {
  if (typeof database === 'string') {
    const db = new Database(database);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
    return { db, owned: true };
  }
  return { db: database, owned: false };
}
