import type Database from 'better-sqlite3';
import type { ConfigValue } from '../operators/types.js';
import { toConfigValue } from '../operators/values.js';
import { ValidationError } from '../errors.js';
import type { DefinitionStore } from './types.js';

interface OperatorRow {
  name: string;
  document: string;
}

/**
 * Definitions stored as JSON documents in the `operators` table.
 */
export class SqliteDefinitionStore implements DefinitionStore {
  constructor(private db: Database.Database) {}

  get(name: string): ConfigValue | undefined {
    const row = this.db
      .prepare('SELECT name, document FROM operators WHERE name = ?')
      .get(name) as OperatorRow | undefined;
    if (!row) return undefined;

    try {
      return toConfigValue(JSON.parse(row.document));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError(name, [
        {
          field: 'document',
          severity: 'error',
          message: `Stored document for operator "${name}" is unreadable: ${reason}`,
          operator: name,
        },
      ]);
    }
  }

  has(name: string): boolean {
    return this.db.prepare('SELECT 1 FROM operators WHERE name = ?').get(name) !== undefined;
  }

  list(): string[] {
    const rows = this.db.prepare('SELECT name FROM operators ORDER BY name ASC').all() as Array<{ name: string }>;
    return rows.map((row) => row.name);
  }

  put(name: string, document: unknown): void {
    const json = JSON.stringify(toConfigValue(document));
    this.db
      .prepare(
        `INSERT INTO operators (name, document) VALUES (?, ?)
         ON CONFLICT(name) DO UPDATE SET document = excluded.document, updated_at = datetime('now')`,
      )
      .run(name, json);
  }

  remove(name: string): boolean {
    return this.db.prepare('DELETE FROM operators WHERE name = ?').run(name).changes > 0;
  }

  /**
   * Copy every definition from another store, replacing same-named rows.
   * Returns the number of definitions copied.
   */
  importFrom(source: DefinitionStore): number {
    let copied = 0;
    const copy = this.db.transaction(() => {
      for (const name of source.list()) {
        const document = source.get(name);
        if (document !== undefined) {
          this.put(name, document);
          copied++;
        }
      }
    });
    copy();
    return copied;
  }
}
