import { z } from 'zod';

const operatorName = z.string().regex(/^[a-z0-9_]+$/, 'must be lowercase letters, numbers and underscores');

const fileStoreSchema = z.object({
  type: z.literal('file'),
  dir: z.string().default('./operators'),
  file_name: z.string().default('vars.yml'),
});

const sqliteStoreSchema = z.object({
  type: z.literal('sqlite'),
});

const auditSchema = z.object({
  enabled: z.boolean().default(false),
});

export const engineConfigSchema = z.object({
  store: z.discriminatedUnion('type', [fileStoreSchema, sqliteStoreSchema]).default({ type: 'file' }),
  schema_path: z.string().default('./schema/operator-schema.yml'),
  database_path: z.string().default('./opsmith.db'),
  root_operator: operatorName.default('base'),
  include_info: z.boolean().default(false),
  audit: auditSchema.default({ enabled: false }),
  port: z.number().int().min(1).max(65535).default(3000),
});

export type EngineConfig = z.input<typeof engineConfigSchema>;
export type EngineConfigParsed = z.infer<typeof engineConfigSchema>;
