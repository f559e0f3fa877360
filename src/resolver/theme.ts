import type { ConfigMap, ResolutionChain } from '../operators/types.js';
import { mergeSections } from './merge.js';

export interface ThemeReference {
  theme: string;
  declaredBy: string;
  /** Position of `declaredBy` in the extends chain, root first. */
  declaredAt: number;
}

/**
 * The theme in effect for an extends chain: the declaration nearest to the
 * leaf wins, like any other scalar.
 */
export function effectiveTheme(chain: ResolutionChain): ThemeReference | undefined {
  for (let i = chain.definitions.length - 1; i >= 0; i--) {
    const definition = chain.definitions[i];
    if (definition.theme !== undefined) {
      return { theme: definition.theme, declaredBy: definition.name, declaredAt: i };
    }
  }
  return undefined;
}

/**
 * Overlay a resolved theme chain on the sections merged from the ancestors of
 * the operator that declares the theme. Theme ancestors that are also in the
 * extends chain (typically the root) are skipped, so they cannot undo more
 * specific ancestors.
 *
 * The declaring operator and its descendants down to the leaf are merged after
 * this, by the caller.
 */
export function applyTheme(
  ancestorSections: Readonly<Record<string, ConfigMap>>,
  themeChain: ResolutionChain,
  alreadyMerged: ReadonlySet<string>,
): Record<string, ConfigMap> {
  const overlay = themeChain.definitions.filter((definition) => !alreadyMerged.has(definition.name));
  return mergeSections(overlay, ancestorSections);
}
