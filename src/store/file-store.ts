import { existsSync, readdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'yaml';
import type { ConfigValue } from '../operators/types.js';
import { toConfigValue } from '../operators/values.js';
import { ValidationError } from '../errors.js';
import type { DefinitionStore } from './types.js';

export const DEFAULT_DEFINITION_FILE = 'vars.yml';

// Names that could escape the operators directory are never looked up.
const STORABLE_NAME = /^[A-Za-z0-9_-]+$/;

export interface FileStoreOptions {
  fileName?: string;
}

/**
 * Definitions stored one per directory: `<dir>/<name>/vars.yml`.
 */
export class FileDefinitionStore implements DefinitionStore {
  private fileName: string;

  constructor(private dir: string, options: FileStoreOptions = {}) {
    this.fileName = options.fileName ?? DEFAULT_DEFINITION_FILE;
  }

  pathFor(name: string): string {
    return join(this.dir, name, this.fileName);
  }

  has(name: string): boolean {
    return STORABLE_NAME.test(name) && existsSync(this.pathFor(name));
  }

  get(name: string): ConfigValue | undefined {
    if (!this.has(name)) return undefined;

    const path = this.pathFor(name);
    const text = readFileSync(path, 'utf-8');

    try {
      return toConfigValue(parse(text));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationError(name, [
        {
          field: 'file',
          severity: 'error',
          message: `Failed to load operator file ${path}: ${reason}`,
          operator: name,
        },
      ]);
    }
  }

  list(): string[] {
    if (!existsSync(this.dir)) return [];

    return readdirSync(this.dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory() && this.has(entry.name))
      .map((entry) => entry.name)
      .sort();
  }
}
