import { z } from 'zod';

export type Severity = 'error' | 'warning' | 'info';

export interface ValidationFinding {
  /** Dotted path of the offending field, e.g. `shell.oh_my_zsh_plugins`. */
  field: string;
  severity: Severity;
  message: string;
  suggestion?: string;
  /** Operator whose raw definition produced the finding; unset for post-merge findings. */
  operator?: string;
  /** Names forming an `extends` cycle, first name repeated at the end. */
  cycle?: string[];
}

export interface ValidationReport {
  operator: string;
  valid: boolean;
  findings: ValidationFinding[];
}

export const FIELD_TYPES = ['string', 'integer', 'number', 'boolean', 'array', 'object'] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export interface FieldRule {
  type?: FieldType;
  pattern?: string;
  enum?: Array<string | number | boolean>;
  min_length?: number;
  max_length?: number;
  minimum?: number;
  maximum?: number;
  /** Hard cap on sequence length. */
  max_items?: number;
  /** Advisory threshold on sequence length. */
  warn_items?: number;
  items?: FieldRule;
  properties?: Record<string, FieldRule>;
  values?: FieldRule;
  suggestion?: string;
}

export const fieldRuleSchema: z.ZodType<FieldRule> = z.lazy(() =>
  z
    .object({
      type: z.enum(FIELD_TYPES).optional(),
      pattern: z
        .string()
        .refine(isCompilablePattern, { message: 'pattern is not a valid regular expression' })
        .optional(),
      enum: z.array(z.union([z.string(), z.number(), z.boolean()])).min(1).optional(),
      min_length: z.number().int().nonnegative().optional(),
      max_length: z.number().int().nonnegative().optional(),
      minimum: z.number().optional(),
      maximum: z.number().optional(),
      max_items: z.number().int().nonnegative().optional(),
      warn_items: z.number().int().nonnegative().optional(),
      items: fieldRuleSchema.optional(),
      properties: z.record(fieldRuleSchema).optional(),
      values: fieldRuleSchema.optional(),
      suggestion: z.string().optional(),
    })
    .strict(),
);

const sectionSchema = z
  .object({
    description: z.string().optional(),
    fields: z.record(fieldRuleSchema).default({}),
  })
  .strict();

export const operatorSchemaSchema = z
  .object({
    metadata: z
      .object({
        required: z.array(z.string()).default([]),
        fields: z.record(fieldRuleSchema).default({}),
      })
      .strict(),
    sections: z.record(sectionSchema).default({}),
  })
  .strict();

export type OperatorSchema = z.infer<typeof operatorSchemaSchema>;

export type SectionSchema = z.infer<typeof sectionSchema>;

function isCompilablePattern(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}
