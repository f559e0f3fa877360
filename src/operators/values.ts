import { isDeepStrictEqual } from 'node:util';
import type { ConfigMap, ConfigValue, ConfigValueKind } from './types.js';

export function isConfigMap(value: ConfigValue | undefined): value is ConfigMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function kindOf(value: ConfigValue): ConfigValueKind {
  if (Array.isArray(value)) return 'sequence';
  if (isConfigMap(value)) return 'mapping';
  return 'scalar';
}

/**
 * Name of a value's type as it appears in diagnostics.
 */
export function describeType(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'number';
  return typeof value;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Convert a parsed YAML/JSON document into a configuration value.
 * Throws a TypeError naming the path of the first value that is not a
 * scalar, sequence or plain mapping.
 */
export function toConfigValue(raw: unknown, path = ''): ConfigValue {
  if (raw === null || raw === undefined) return null;

  if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
    return raw;
  }

  if (Array.isArray(raw)) {
    return raw.map((item, i) => toConfigValue(item, `${path}[${i}]`));
  }

  if (typeof raw === 'object' && isPlainObject(raw)) {
    const map: ConfigMap = {};
    for (const [key, value] of Object.entries(raw)) {
      setEntry(map, key, toConfigValue(value, path ? `${path}.${key}` : key));
    }
    return map;
  }

  throw new TypeError(`Unsupported configuration value at "${path || '<root>'}": ${typeof raw}`);
}

/**
 * Assign a key as an own data property. Plain assignment would treat a
 * `__proto__` key from a document as a prototype change.
 */
export function setEntry(map: ConfigMap, key: string, value: ConfigValue): void {
  Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

export function getEntry(map: ConfigMap, key: string): ConfigValue | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

export function valuesEqual(a: ConfigValue, b: ConfigValue): boolean {
  return isDeepStrictEqual(a, b);
}

export function cloneValue<T extends ConfigValue>(value: T): T {
  return structuredClone(value);
}
