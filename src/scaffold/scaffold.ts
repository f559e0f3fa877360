import { mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse, stringify } from 'yaml';
import type { ConfigMap } from '../operators/types.js';
import { isConfigMap, setEntry, toConfigValue } from '../operators/values.js';
import { FileDefinitionStore } from '../store/file-store.js';
import type { DefinitionStore } from '../store/types.js';
import type { OperatorSchema } from '../schema/types.js';
import { hasErrors, validateDocument } from '../schema/validator.js';
import { MissingParentError, ValidationError } from '../errors.js';
import { DEFAULT_ROOT_OPERATOR } from '../resolver/resolver.js';

export const TEMPLATE_NAMES = ['minimal', 'standard', 'advanced'] as const;

export type TemplateName = (typeof TEMPLATE_NAMES)[number];

export const DEFAULT_TEMPLATES_DIR = fileURLToPath(new URL('../../templates/', import.meta.url));

const OPERATOR_NAME = /^[a-z0-9_]+$/;
const MAX_NAME_LENGTH = 50;

export interface ScaffoldOptions {
  description: string;
  template?: TemplateName;
  parent?: string;
  version?: string;
  author?: string;
  tags?: string[];
  rootName?: string;
  templatesDir?: string;
  /** When given, the generated document must pass pre-merge validation before it is written. */
  schema?: OperatorSchema;
}

export interface ScaffoldResult {
  path: string;
  document: ConfigMap;
}

/**
 * Read a template's sections.
 */
export function loadTemplate(template: TemplateName, templatesDir = DEFAULT_TEMPLATES_DIR): ConfigMap {
  const raw = toConfigValue(parse(readFileSync(join(templatesDir, `${template}.yml`), 'utf-8')));
  if (!isConfigMap(raw)) {
    throw new Error(`Template "${template}" must contain a mapping of sections`);
  }
  return raw;
}

/**
 * Names a new operator may extend: every stored operator plus the root.
 */
export function listParents(store: DefinitionStore, rootName = DEFAULT_ROOT_OPERATOR): string[] {
  const names = new Set(store.list());
  names.add(rootName);
  return [...names].sort();
}

/**
 * Write a new operator definition, built from a template, to
 * `<operatorsDir>/<name>/vars.yml`.
 */
export function scaffoldOperator(operatorsDir: string, name: string, options: ScaffoldOptions): ScaffoldResult {
  if (!OPERATOR_NAME.test(name) || name.length > MAX_NAME_LENGTH) {
    throw new Error(
      `Invalid operator name "${name}": use at most ${MAX_NAME_LENGTH} lowercase letters, numbers and underscores`,
    );
  }

  const store = new FileDefinitionStore(operatorsDir);
  if (store.has(name)) {
    throw new Error(`Operator "${name}" already exists at ${store.pathFor(name)}`);
  }

  const rootName = options.rootName ?? DEFAULT_ROOT_OPERATOR;
  if (options.parent !== undefined && options.parent !== rootName && !store.has(options.parent)) {
    throw new MissingParentError(name, options.parent, 'extends');
  }

  const document: ConfigMap = {
    name,
    version: options.version ?? '1.0.0',
    description: options.description,
  };
  if (options.author) document.author = options.author;
  if (options.parent !== undefined) document.extends = options.parent;
  if (options.tags && options.tags.length > 0) document.tags = [...options.tags];

  const sections = loadTemplate(options.template ?? 'standard', options.templatesDir);
  for (const [section, fragment] of Object.entries(sections)) {
    setEntry(document, section, fragment);
  }

  if (options.schema) {
    const findings = validateDocument(document, options.schema, { expectedName: name, operator: name });
    if (hasErrors(findings)) {
      throw new ValidationError(name, findings);
    }
  }

  const path = store.pathFor(name);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, stringify(document), 'utf-8');

  return { path, document };
}
