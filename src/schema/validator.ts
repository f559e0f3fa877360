import type { ConfigMap, ConfigValue, OperatorDefinition, ResolvedConfig } from '../operators/types.js';
import { splitDocument } from '../operators/parser.js';
import { describeType, isConfigMap, setEntry } from '../operators/values.js';
import type { DefinitionStore } from '../store/types.js';
import type { FieldRule, FieldType, OperatorSchema, Severity, ValidationFinding } from './types.js';

export interface ValidateOptions {
  /** Keep info-level findings (unknown sections and fields). */
  includeInfo?: boolean;
  /** Name the document is stored under; a differing `name` field is an error. */
  expectedName?: string;
  /** Attached to every finding so callers can tell which definition produced it. */
  operator?: string;
}

const patternCache = new Map<string, RegExp>();

function compilePattern(pattern: string): RegExp {
  let regex = patternCache.get(pattern);
  if (!regex) {
    regex = new RegExp(pattern);
    patternCache.set(pattern, regex);
  }
  return regex;
}

function matchesType(value: ConfigValue, type: FieldType): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'number':
      return typeof value === 'number';
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return isConfigMap(value);
  }
}

function formatValue(value: ConfigValue): string {
  return typeof value === 'string' ? `"${value}"` : JSON.stringify(value);
}

class FindingCollector {
  readonly findings: ValidationFinding[] = [];

  constructor(private operator?: string) {}

  add(field: string, severity: Severity, message: string, suggestion?: string): void {
    const finding: ValidationFinding = { field, severity, message };
    if (suggestion) finding.suggestion = suggestion;
    if (this.operator) finding.operator = this.operator;
    this.findings.push(finding);
  }

  result(includeInfo: boolean): ValidationFinding[] {
    return includeInfo ? this.findings : this.findings.filter((f) => f.severity !== 'info');
  }
}

function checkValue(out: FindingCollector, path: string, value: ConfigValue, rule: FieldRule): void {
  if (rule.type && !matchesType(value, rule.type)) {
    out.add(path, 'error', `Field "${path}" must be of type ${rule.type}, got ${describeType(value)}`, rule.suggestion);
    return;
  }

  if (typeof value === 'string') {
    if (rule.pattern !== undefined && !compilePattern(rule.pattern).test(value)) {
      out.add(
        path,
        'error',
        `Field "${path}" value ${formatValue(value)} does not match the required pattern`,
        rule.suggestion ?? `Pattern: ${rule.pattern}`,
      );
    }
    if (rule.min_length !== undefined && value.length < rule.min_length) {
      out.add(path, 'error', `Field "${path}" must be at least ${rule.min_length} characters long, got ${value.length}`);
    }
    if (rule.max_length !== undefined && value.length > rule.max_length) {
      out.add(path, 'error', `Field "${path}" must be at most ${rule.max_length} characters long, got ${value.length}`);
    }
  }

  if (typeof value === 'number') {
    if (rule.minimum !== undefined && value < rule.minimum) {
      out.add(path, 'error', `Field "${path}" must be >= ${rule.minimum}, got ${value}`);
    }
    if (rule.maximum !== undefined && value > rule.maximum) {
      out.add(path, 'error', `Field "${path}" must be <= ${rule.maximum}, got ${value}`);
    }
  }

  if (rule.enum && !rule.enum.some((allowed) => allowed === value)) {
    out.add(
      path,
      'error',
      `Field "${path}" value ${formatValue(value)} is not one of: ${rule.enum.join(', ')}`,
      rule.suggestion,
    );
  }

  if (Array.isArray(value)) {
    if (rule.max_items !== undefined && value.length > rule.max_items) {
      out.add(path, 'error', `Field "${path}" has ${value.length} items, maximum is ${rule.max_items}`, rule.suggestion);
    } else if (rule.warn_items !== undefined && value.length > rule.warn_items) {
      out.add(
        path,
        'warning',
        `Field "${path}" has ${value.length} items, more than the recommended ${rule.warn_items}`,
        rule.suggestion,
      );
    }
    if (rule.items) {
      const itemRule = rule.items;
      value.forEach((item, i) => checkValue(out, `${path}[${i}]`, item, itemRule));
    }
  }

  if (isConfigMap(value) && (rule.properties || rule.values)) {
    const properties = rule.properties ?? {};
    for (const [key, nested] of Object.entries(value)) {
      const nestedRule = ownEntry(properties, key) ?? rule.values;
      if (nestedRule) {
        checkValue(out, `${path}.${key}`, nested, nestedRule);
      } else {
        out.add(`${path}.${key}`, 'info', `Field "${path}.${key}" is not described by the schema`);
      }
    }
  }
}

function checkSections(out: FindingCollector, sections: Record<string, ConfigValue>, schema: OperatorSchema): void {
  for (const [section, value] of Object.entries(sections)) {
    if (!isConfigMap(value)) {
      out.add(section, 'error', `Section "${section}" must be a mapping, got ${describeType(value)}`);
      continue;
    }

    const sectionSchema = ownEntry(schema.sections, section);
    if (!sectionSchema) {
      out.add(section, 'info', `Section "${section}" is not described by the schema`);
      continue;
    }

    for (const [field, fieldValue] of Object.entries(value)) {
      const path = `${section}.${field}`;
      const rule = ownEntry(sectionSchema.fields, field);
      if (rule) {
        checkValue(out, path, fieldValue, rule);
      } else {
        out.add(path, 'info', `Field "${path}" is not described by the schema`);
      }
    }
  }
}

/**
 * Validate one raw definition document, independently of inheritance.
 */
export function validateDocument(
  document: ConfigValue,
  schema: OperatorSchema,
  options: ValidateOptions = {},
): ValidationFinding[] {
  const out = new FindingCollector(options.operator);

  if (!isConfigMap(document)) {
    out.add('document', 'error', `Operator definition must be a mapping, got ${describeType(document)}`);
    return out.result(options.includeInfo ?? false);
  }

  for (const field of schema.metadata.required) {
    if (!Object.hasOwn(document, field)) {
      out.add(field, 'error', `Required field "${field}" is missing`, `Add "${field}: <value>" to the operator definition`);
    }
  }

  const { metadata, sections } = splitDocument(document);
  for (const [field, rule] of Object.entries(schema.metadata.fields)) {
    const value = metadata[field];
    if (value !== undefined) {
      checkValue(out, field, value, rule);
    }
  }

  if (options.expectedName !== undefined && typeof document.name === 'string' && document.name !== options.expectedName) {
    out.add(
      'name',
      'error',
      `Field "name" is "${document.name}" but the operator is stored as "${options.expectedName}"`,
      `Rename the operator to "${options.expectedName}" or move it`,
    );
  }

  checkSections(out, sections, schema);

  return out.result(options.includeInfo ?? false);
}

/**
 * Validate a fully merged configuration. Only the metadata that survives
 * resolution (name, version, description, author, tags) is checked.
 */
export function validateResolved(
  config: ResolvedConfig,
  schema: OperatorSchema,
  options: Pick<ValidateOptions, 'includeInfo'> = {},
): ValidationFinding[] {
  const document: ConfigMap = {
    name: config.name,
    version: config.version,
    description: config.description,
    tags: [...config.tags],
  };
  if (config.author !== undefined) document.author = config.author;
  for (const [section, value] of Object.entries(config.sections)) {
    setEntry(document, section, value);
  }
  return validateDocument(document, schema, options);
}

/**
 * Check that the definitions a definition refers to exist. The root operator
 * always counts as existing.
 */
export function validateReferences(
  definition: OperatorDefinition,
  store: DefinitionStore,
  rootName: string,
): ValidationFinding[] {
  const out = new FindingCollector(definition.name);
  const exists = (name: string): boolean => name === rootName || store.has(name);

  if (definition.extends !== undefined) {
    if (definition.extends === definition.name) {
      out.add('extends', 'error', `Operator "${definition.name}" cannot extend itself`);
    } else if (!exists(definition.extends)) {
      out.add(
        'extends',
        'error',
        `Parent operator "${definition.extends}" not found`,
        'Create the parent operator or fix the "extends" field',
      );
    }
  }

  if (definition.theme !== undefined && !exists(definition.theme)) {
    out.add(
      'theme',
      'error',
      `Theme operator "${definition.theme}" not found`,
      'Create the theme operator or fix the "theme" field',
    );
  }

  return out.findings;
}

/** Schema records are plain objects; a `__proto__` section or field must not reach their prototype. */
function ownEntry<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

export function hasErrors(findings: readonly ValidationFinding[]): boolean {
  return findings.some((f) => f.severity === 'error');
}
