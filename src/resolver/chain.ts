import type { ChainAxis, OperatorDefinition, ResolutionChain } from '../operators/types.js';
import { synthesizeRoot } from '../operators/parser.js';
import { CircularDependencyError, MissingParentError, NotFoundError } from '../errors.js';

/** Returns the definition stored under `name`, or undefined when there is none. */
export type DefinitionLoader = (name: string) => OperatorDefinition | undefined;

/** The reference that led to the start of a chain. */
export interface ChainOrigin {
  operator: string;
  kind: ChainAxis;
}

export interface ResolveChainOptions {
  axis: ChainAxis;
  /** Materialized empty when the loader has no definition for it. */
  rootName: string;
  /** Unset when `start` was requested directly rather than referenced. */
  origin?: ChainOrigin;
}

/**
 * Follow `extends` references from `start` until a definition without a
 * parent is reached. Returns the definitions ordered root first.
 *
 * @throws CircularDependencyError when a name is reached twice
 * @throws MissingParentError when a referenced definition does not exist
 * @throws NotFoundError when `start` itself does not exist and has no origin
 */
export function resolveChain(start: string, load: DefinitionLoader, options: ResolveChainOptions): ResolutionChain {
  const visited: string[] = [];
  const definitions: OperatorDefinition[] = [];

  let name = start;
  let referrer = options.origin;

  for (;;) {
    const seenAt = visited.indexOf(name);
    if (seenAt !== -1) {
      throw new CircularDependencyError([...visited.slice(seenAt), name], [...visited, name], options.axis);
    }

    const definition = load(name) ?? (name === options.rootName ? synthesizeRoot(name) : undefined);
    if (!definition) {
      if (!referrer) throw new NotFoundError(name);
      throw new MissingParentError(referrer.operator, name, referrer.kind);
    }

    visited.push(name);
    definitions.push(definition);

    if (definition.extends === undefined) break;

    referrer = { operator: name, kind: 'extends' };
    name = definition.extends;
  }

  return { axis: options.axis, definitions: definitions.reverse() };
}

export function chainNames(chain: ResolutionChain): string[] {
  return chain.definitions.map((definition) => definition.name);
}
