import type { ConfigValue } from '../operators/types.js';

/**
 * Read access to raw operator definitions. `get` returns `undefined` when the
 * store holds no definition under that name.
 */
export interface DefinitionStore {
  get(name: string): ConfigValue | undefined;
  has(name: string): boolean;
  /** Names of every stored definition, sorted. */
  list(): string[];
}
