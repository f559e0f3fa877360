import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type Database from 'better-sqlite3';
import { getDb } from './db/db.js';
import { configBaseDir, loadConfig, resolveConfigPaths } from './config/loader.js';
import { loadSchema } from './schema/loader.js';
import { FileDefinitionStore } from './store/file-store.js';
import { SqliteDefinitionStore } from './store/sqlite-store.js';
import type { DefinitionStore } from './store/types.js';
import { AuditLog } from './audit/log.js';
import { OperatorResolver } from './resolver/resolver.js';
import { startServer, SERVER_VERSION } from './server/server.js';

const configPath = process.argv[2] ?? resolve('opsmith.yaml');

if (!existsSync(configPath)) {
  console.log(`opsmith v${SERVER_VERSION}`);
  console.log(`\nNo config file found at: ${configPath}`);
  process.exit(1);
}

const config = resolveConfigPaths(loadConfig(configPath), configBaseDir(configPath));
const schema = loadSchema(config.schema_path);

// Opened only when the sqlite store or the audit log needs it
let db: Database.Database | undefined;
const database = (): Database.Database => (db ??= getDb(config.database_path));

const store: DefinitionStore =
  config.store.type === 'sqlite'
    ? new SqliteDefinitionStore(database())
    : new FileDefinitionStore(config.store.dir, { fileName: config.store.file_name });

const audit = config.audit.enabled ? new AuditLog(database()) : undefined;

const resolver = new OperatorResolver({
  store,
  schema,
  rootName: config.root_operator,
  includeInfo: config.include_info,
  audit,
});

const stored = store.list();
console.log(`Loaded schema from ${config.schema_path}`);
console.log(`${stored.length} operator(s) available: ${stored.join(', ') || '(none)'}`);

startServer({ resolver, store, audit }, config.port);
