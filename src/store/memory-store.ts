import type { ConfigValue } from '../operators/types.js';
import { cloneValue, toConfigValue } from '../operators/values.js';
import type { DefinitionStore } from './types.js';

/**
 * Definitions held in process. Documents are copied in and out, so callers
 * cannot change stored definitions through a returned value.
 */
export class MemoryDefinitionStore implements DefinitionStore {
  private documents = new Map<string, ConfigValue>();

  constructor(documents: Record<string, unknown> = {}) {
    for (const [name, document] of Object.entries(documents)) {
      this.set(name, document);
    }
  }

  set(name: string, document: unknown): void {
    this.documents.set(name, toConfigValue(document));
  }

  delete(name: string): boolean {
    return this.documents.delete(name);
  }

  get(name: string): ConfigValue | undefined {
    const document = this.documents.get(name);
    return document === undefined ? undefined : cloneValue(document);
  }

  has(name: string): boolean {
    return this.documents.has(name);
  }

  list(): string[] {
    return [...this.documents.keys()].sort();
  }
}
