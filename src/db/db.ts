import Database from 'better-sqlite3';
import { createTables } from './schema.js';

/**
 * Open (or create) the SQLite database holding stored operators and the
 * audit log, and initialize its tables.
 */
export function getDb(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  createTables(db);
  return db;
}
