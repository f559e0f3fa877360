import type Database from 'better-sqlite3';
import type { ResolutionError } from '../errors.js';

export type AuditEvent = 'operator_resolved' | 'resolution_failed' | 'operator_validated';

export interface AuditEntry {
  id: number;
  timestamp: string;
  event: string;
  operator: string | null;
  details: Record<string, unknown>;
}

export interface AuditFilters {
  after?: string;
  before?: string;
  event?: string;
  operator?: string;
  limit?: number;
}

export class AuditLog {
  constructor(private db: Database.Database) {}

  private insert(event: AuditEvent, operator: string | null, details: Record<string, unknown>): void {
    this.db
      .prepare(
        `INSERT INTO audit_log (timestamp, event, operator, details) VALUES (?, ?, ?, ?)`,
      )
      .run(new Date().toISOString(), event, operator, JSON.stringify(details));
  }

  logResolved(operator: string, chain: string[], theme: string | null, section: string | null): void {
    this.insert('operator_resolved', operator, { chain, theme, section });
  }

  logResolutionFailed(operator: string, error: ResolutionError): void {
    this.insert('resolution_failed', operator, { code: error.code, message: error.message });
  }

  logValidated(operator: string, errors: number, warnings: number): void {
    this.insert('operator_validated', operator, { errors, warnings });
  }

  getEntries(filters?: AuditFilters): AuditEntry[] {
    let query = 'SELECT * FROM audit_log WHERE 1=1';
    const params: unknown[] = [];

    if (filters?.after) {
      query += ' AND timestamp >= ?';
      params.push(filters.after);
    }

    if (filters?.before) {
      query += ' AND timestamp <= ?';
      params.push(filters.before);
    }

    if (filters?.event) {
      query += ' AND event = ?';
      params.push(filters.event);
    }

    if (filters?.operator) {
      query += ' AND operator = ?';
      params.push(filters.operator);
    }

    query += ' ORDER BY id ASC';

    if (filters?.limit) {
      query += ' LIMIT ?';
      params.push(filters.limit);
    }

    const rows = this.db.prepare(query).all(...params) as Array<{
      id: number;
      timestamp: string;
      event: string;
      operator: string | null;
      details: string;
    }>;

    return rows.map((row) => ({
      id: row.id,
      timestamp: row.timestamp,
      event: row.event,
      operator: row.operator,
      details: parseDetails(row.details),
    }));
  }
}

function parseDetails(json: string): Record<string, unknown> {
  const parsed: unknown = JSON.parse(json);
  if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
    return Object.fromEntries(Object.entries(parsed));
  }
  return {};
}
