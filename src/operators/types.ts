import type { ValidationFinding } from '../schema/types.js';

export type ConfigScalar = string | number | boolean | null;

export interface ConfigMap {
  [key: string]: ConfigValue;
}

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMap;

export type ConfigValueKind = 'scalar' | 'sequence' | 'mapping';

/** Top-level document keys that describe the operator rather than a section. */
export const METADATA_KEYS = ['name', 'version', 'description', 'author', 'extends', 'theme', 'tags'] as const;

export type MetadataKey = (typeof METADATA_KEYS)[number];

export interface OperatorDefinition {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly author?: string;
  readonly extends?: string;
  readonly theme?: string;
  readonly tags: readonly string[];
  readonly sections: Readonly<Record<string, ConfigMap>>;
  /** Set only on a root that was materialized because the store had none. */
  readonly synthetic: boolean;
}

export type ChainAxis = 'extends' | 'theme';

/**
 * Result of resolving one operator. Holds names only, never the definitions
 * it was merged from.
 */
export interface ResolvedConfig {
  name: string;
  version: string;
  description: string;
  author?: string;
  tags: string[];
  /** Names of the extends chain, root first. */
  chain: string[];
  theme?: { name: string; chain: string[] };
  sections: Record<string, ConfigMap>;
  /** Warnings (and info findings, when requested) gathered while resolving. */
  findings: ValidationFinding[];
}

export interface ResolutionChain {
  readonly axis: ChainAxis;
  /** Ordered from the most distant ancestor to the requested definition. */
  readonly definitions: readonly OperatorDefinition[];
}
