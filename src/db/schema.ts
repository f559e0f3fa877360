import type Database from 'better-sqlite3';

const CREATE_OPERATORS = `
CREATE TABLE IF NOT EXISTS operators (
  name TEXT PRIMARY KEY,
  document TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
)`;

const CREATE_AUDIT_LOG = `
CREATE TABLE IF NOT EXISTS audit_log (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL DEFAULT (datetime('now')),
  event TEXT NOT NULL,
  operator TEXT,
  details TEXT NOT NULL DEFAULT '{}'
)`;

const CREATE_AUDIT_LOG_INDEXES = [
  `CREATE INDEX IF NOT EXISTS idx_audit_log_operator ON audit_log(operator)`,
  `CREATE INDEX IF NOT EXISTS idx_audit_log_event ON audit_log(event)`,
];

export function createTables(db: Database.Database): void {
  db.exec(CREATE_OPERATORS);
  db.exec(CREATE_AUDIT_LOG);
  for (const idx of CREATE_AUDIT_LOG_INDEXES) {
    db.exec(idx);
  }
}
