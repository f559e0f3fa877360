import { join } from 'node:path';
import { rmSync, writeFileSync } from 'node:fs';
import type Database from 'better-sqlite3';
import type { Hono } from 'hono';
import { getDb } from '../../src/db/db.js';
import { configBaseDir, loadConfig, resolveConfigPaths } from '../../src/config/loader.js';
import { loadSchema } from '../../src/schema/loader.js';
import { FileDefinitionStore } from '../../src/store/file-store.js';
import { SqliteDefinitionStore } from '../../src/store/sqlite-store.js';
import type { DefinitionStore } from '../../src/store/types.js';
import { AuditLog } from '../../src/audit/log.js';
import { OperatorResolver } from '../../src/resolver/resolver.js';
import { createServer } from '../../src/server/server.js';
import { BUNDLED_OPERATORS_DIR, BUNDLED_SCHEMA_PATH, makeTmpDir } from '../../src/test-utils.js';

export interface E2eApp {
  app: Hono;
  resolver: OperatorResolver;
  store: DefinitionStore;
  audit?: AuditLog;
  db?: Database.Database;
  tmpDir: string;
}

export interface E2eOptions {
  store?: 'file' | 'sqlite';
  audit?: boolean;
}

/**
 * Wire the engine the way the entry point does, from a config file written
 * to a fresh temp directory. The bundled operators and schema are used.
 */
export function setupE2eApp(options: E2eOptions = {}): E2eApp {
  const tmpDir = makeTmpDir();
  const configPath = join(tmpDir, 'opsmith.yaml');
  writeFileSync(
    configPath,
    `
store:
  type: ${options.store ?? 'file'}
${options.store === 'sqlite' ? '' : `  dir: ${BUNDLED_OPERATORS_DIR}\n`}schema_path: ${BUNDLED_SCHEMA_PATH}
database_path: ./engine.db
audit:
  enabled: ${options.audit ?? false}
`,
  );

  const config = resolveConfigPaths(loadConfig(configPath), configBaseDir(configPath));
  const schema = loadSchema(config.schema_path);

  let db: Database.Database | undefined;
  const database = (): Database.Database => (db ??= getDb(config.database_path));

  let store: DefinitionStore;
  if (config.store.type === 'sqlite') {
    const sqlite = new SqliteDefinitionStore(database());
    sqlite.importFrom(new FileDefinitionStore(BUNDLED_OPERATORS_DIR));
    store = sqlite;
  } else {
    store = new FileDefinitionStore(config.store.dir, { fileName: config.store.file_name });
  }

  const audit = config.audit.enabled ? new AuditLog(database()) : undefined;
  const resolver = new OperatorResolver({
    store,
    schema,
    rootName: config.root_operator,
    includeInfo: config.include_info,
    audit,
  });

  return { app: createServer({ resolver, store, audit }), resolver, store, audit, db, tmpDir };
}

export function cleanup(env: E2eApp): void {
  env.db?.close();
  rmSync(env.tmpDir, { recursive: true, force: true });
}
