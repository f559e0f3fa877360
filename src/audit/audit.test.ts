import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { rmSync } from 'node:fs';
import { getDb } from '../db/db.js';
import { AuditLog } from './log.js';
import { CircularDependencyError, NotFoundError } from '../errors.js';
import { makeTmpDir } from '../test-utils.js';
import type Database from 'better-sqlite3';

describe('AuditLog', () => {
  let tmpDir: string;
  let db: Database.Database;
  let audit: AuditLog;

  beforeEach(() => {
    tmpDir = makeTmpDir();
    db = getDb(join(tmpDir, 'test.db'));
    audit = new AuditLog(db);
  });

  afterEach(() => {
    db.close();
    rmSync(tmpDir, { recursive: true, force: true });
  });

  it('logResolved creates entry with event "operator_resolved" and the chain', () => {
    audit.logResolved('hacker', ['base', 'developer', 'hacker'], 'matrix', null);

    const entries = audit.getEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0].event).toBe('operator_resolved');
    expect(entries[0].operator).toBe('hacker');
    expect(entries[0].details).toEqual({ chain: ['base', 'developer', 'hacker'], theme: 'matrix', section: null });
  });

  it('logResolutionFailed records the error code and message', () => {
    audit.logResolutionFailed('x', new CircularDependencyError(['x', 'y', 'x'], ['x', 'y', 'x'], 'extends'));

    const entries = audit.getEntries();
    expect(entries).toHaveLength(1);
    expect(entries[0].event).toBe('resolution_failed');
    expect(entries[0].details).toEqual({
      code: 'CIRCULAR_DEPENDENCY',
      message: 'Circular dependency in extends chain: x -> y -> x',
    });
  });

  it('logValidated records finding counts', () => {
    audit.logValidated('dev', 2, 1);

    const entries = audit.getEntries();
    expect(entries[0].event).toBe('operator_validated');
    expect(entries[0].details).toEqual({ errors: 2, warnings: 1 });
  });

  it('resolved → failed → validated creates 3 entries in order', () => {
    audit.logResolved('dev', ['base', 'dev'], null, 'shell');
    audit.logResolutionFailed('ghost', new NotFoundError('ghost'));
    audit.logValidated('dev', 0, 0);

    const entries = audit.getEntries();
    expect(entries.map((e) => e.event)).toEqual(['operator_resolved', 'resolution_failed', 'operator_validated']);
    expect(entries[1].operator).toBe('ghost');
  });

  it('getEntries({ event }) filters correctly', () => {
    audit.logResolved('dev', ['dev'], null, null);
    audit.logValidated('dev', 0, 0);
    audit.logResolved('ops', ['ops'], null, null);

    const resolved = audit.getEntries({ event: 'operator_resolved' });
    expect(resolved.map((e) => e.operator)).toEqual(['dev', 'ops']);
  });

  it('getEntries({ operator, limit }) filters and caps', () => {
    audit.logValidated('dev', 0, 0);
    audit.logValidated('ops', 0, 0);
    audit.logValidated('dev', 1, 0);
    audit.logValidated('dev', 2, 0);

    const entries = audit.getEntries({ operator: 'dev', limit: 2 });
    expect(entries.map((e) => e.details.errors)).toEqual([0, 1]);
  });

  it('getEntries({ after, before }) filters by time', () => {
    const insert = db.prepare(`INSERT INTO audit_log (timestamp, event, operator, details) VALUES (?, ?, ?, ?)`);
    insert.run('2026-02-19T10:00:00.000Z', 'operator_validated', 'dev', '{"errors":0}');
    insert.run('2026-02-21T10:00:00.000Z', 'operator_validated', 'dev', '{"errors":1}');
    insert.run('2026-02-23T10:00:00.000Z', 'operator_validated', 'dev', '{"errors":2}');

    const entries = audit.getEntries({ after: '2026-02-20T00:00:00.000Z', before: '2026-02-22T00:00:00.000Z' });
    expect(entries).toHaveLength(1);
    expect(entries[0].details.errors).toBe(1);
  });

  it('reads non-object details as empty', () => {
    db.prepare(`INSERT INTO audit_log (event, operator, details) VALUES (?, ?, ?)`).run('operator_validated', 'dev', '[1]');

    expect(audit.getEntries()[0].details).toEqual({});
  });

  it('entries are append-only (no update/delete methods exposed)', () => {
    audit.logValidated('dev', 0, 0);

    expect(typeof (audit as unknown as Record<string, unknown>).updateEntry).toBe('undefined');
    expect(typeof (audit as unknown as Record<string, unknown>).deleteEntry).toBe('undefined');
  });
});
