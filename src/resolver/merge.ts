import type { ConfigMap, ConfigValue, OperatorDefinition } from '../operators/types.js';
import { cloneValue, getEntry, isConfigMap, setEntry, valuesEqual } from '../operators/values.js';

/**
 * Append the incoming elements the base does not already contain, compared by
 * value. Order of first appearance is kept.
 */
export function mergeSequences(base: readonly ConfigValue[], incoming: readonly ConfigValue[]): ConfigValue[] {
  const result = base.map((item) => cloneValue(item));
  for (const item of incoming) {
    if (!result.some((existing) => valuesEqual(existing, item))) {
      result.push(cloneValue(item));
    }
  }
  return result;
}

/**
 * Deep-merge two mappings key by key; the incoming side wins scalar conflicts.
 */
export function mergeMaps(base: ConfigMap, incoming: ConfigMap): ConfigMap {
  const result = cloneValue(base);
  for (const [key, value] of Object.entries(incoming)) {
    setEntry(result, key, mergeValues(getEntry(result, key), value));
  }
  return result;
}

/**
 * Merge one incoming value over a base value.
 *
 * - sequence over sequence: base followed by incoming elements not yet present
 * - mapping over mapping: recursive merge
 * - anything else (scalars, or differing kinds): incoming replaces base
 *
 * Neither argument is modified and the result shares no objects with them.
 */
export function mergeValues(base: ConfigValue | undefined, incoming: ConfigValue): ConfigValue {
  if (base === undefined) return cloneValue(incoming);

  if (Array.isArray(base) && Array.isArray(incoming)) {
    return mergeSequences(base, incoming);
  }

  if (isConfigMap(base) && isConfigMap(incoming)) {
    return mergeMaps(base, incoming);
  }

  return cloneValue(incoming);
}

/**
 * Fold the sections of each definition, in order, over `initial`.
 * Later definitions take precedence.
 */
export function mergeSections(
  definitions: readonly OperatorDefinition[],
  initial: Readonly<Record<string, ConfigMap>> = {},
): Record<string, ConfigMap> {
  const result: Record<string, ConfigMap> = {};
  for (const [section, fragment] of Object.entries(initial)) {
    setEntry(result, section, cloneValue(fragment));
  }

  for (const definition of definitions) {
    for (const [section, fragment] of Object.entries(definition.sections)) {
      const current = getEntry(result, section);
      setEntry(result, section, isConfigMap(current) ? mergeMaps(current, fragment) : cloneValue(fragment));
    }
  }

  return result;
}
