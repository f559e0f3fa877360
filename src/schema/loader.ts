import { readFileSync } from 'node:fs';
import { parse } from 'yaml';
import { operatorSchemaSchema, type OperatorSchema } from './types.js';

/**
 * Check a raw schema document and return it typed.
 */
export function parseSchema(raw: unknown, origin = 'schema'): OperatorSchema {
  const result = operatorSchemaSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid operator schema in ${origin}: ${issues}`);
  }
  return result.data;
}

/**
 * Load the operator schema from a YAML file. Load it once and share the
 * result; validation never modifies it.
 */
export function loadSchema(schemaPath: string): OperatorSchema {
  const text = readFileSync(schemaPath, 'utf-8');
  return parseSchema(parse(text), schemaPath);
}
