import { join } from 'node:path';
import { mkdirSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { loadSchema } from './schema/loader.js';
import type { OperatorSchema } from './schema/types.js';

export const REPO_ROOT = fileURLToPath(new URL('../', import.meta.url));
export const BUNDLED_SCHEMA_PATH = join(REPO_ROOT, 'schema', 'operator-schema.yml');
export const BUNDLED_OPERATORS_DIR = join(REPO_ROOT, 'operators');

export function makeTmpDir(): string {
  const dir = join(tmpdir(), `opsmith-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function loadBundledSchema(): OperatorSchema {
  return loadSchema(BUNDLED_SCHEMA_PATH);
}

/**
 * A document that passes the bundled schema, with `extra` merged over the
 * top level.
 */
export function operatorDoc(name: string, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    name,
    version: '1.0.0',
    description: `Test operator ${name}`,
    ...extra,
  };
}
