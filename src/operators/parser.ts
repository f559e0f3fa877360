import { METADATA_KEYS, type ConfigMap, type ConfigValue, type MetadataKey, type OperatorDefinition } from './types.js';
import { cloneValue, isConfigMap, setEntry } from './values.js';

const METADATA_KEY_SET: ReadonlySet<string> = new Set(METADATA_KEYS);

export function isMetadataKey(key: string): key is MetadataKey {
  return METADATA_KEY_SET.has(key);
}

/**
 * Split a definition document into its metadata keys and its sections.
 * Every top-level key that is not metadata is a section.
 */
export function splitDocument(doc: ConfigMap): { metadata: ConfigMap; sections: Record<string, ConfigValue> } {
  const metadata: ConfigMap = {};
  const sections: Record<string, ConfigValue> = {};

  for (const [key, value] of Object.entries(doc)) {
    if (isMetadataKey(key)) {
      metadata[key] = value;
    } else {
      setEntry(sections, key, value);
    }
  }

  return { metadata, sections };
}

function readString(doc: ConfigMap, key: MetadataKey): string | undefined {
  const value = doc[key];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Build an operator definition from a document that passed pre-merge
 * validation. The stored name is used when the document carries none.
 */
export function parseDefinition(storedName: string, doc: ConfigMap): OperatorDefinition {
  const { sections: rawSections } = splitDocument(doc);

  const sections: Record<string, ConfigMap> = {};
  for (const [key, value] of Object.entries(rawSections)) {
    if (isConfigMap(value)) {
      sections[key] = cloneValue(value);
    }
  }

  const rawTags = doc.tags;
  const tags = Array.isArray(rawTags)
    ? rawTags.filter((tag): tag is string => typeof tag === 'string')
    : [];

  return {
    name: readString(doc, 'name') ?? storedName,
    version: readString(doc, 'version') ?? '0.0.0',
    description: readString(doc, 'description') ?? '',
    author: readString(doc, 'author'),
    extends: readString(doc, 'extends'),
    theme: readString(doc, 'theme'),
    tags,
    sections,
    synthetic: false,
  };
}

/**
 * An empty root definition, used when the store has no definition for the
 * root operator.
 */
export function synthesizeRoot(name: string): OperatorDefinition {
  return {
    name,
    version: '0.0.0',
    description: `Synthesized empty root operator "${name}"`,
    tags: [],
    sections: {},
    synthetic: true,
  };
}
