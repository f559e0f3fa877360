import { readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { parse } from 'yaml';
import type { ConfigMap, ConfigValue } from '../operators/types.js';
import { isConfigMap, setEntry, toConfigValue } from '../operators/values.js';
import { mergeValues } from '../resolver/merge.js';
import { engineConfigSchema, type EngineConfigParsed } from './schema.js';

const ENV_PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function substituteEnv(value: ConfigValue): ConfigValue {
  if (typeof value === 'string') {
    return value.replace(ENV_PLACEHOLDER, (_match, name: string) => {
      const resolved = process.env[name];
      if (resolved === undefined) {
        throw new Error(`Environment variable ${name} is not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map(substituteEnv);
  }
  if (isConfigMap(value)) {
    const result: ConfigMap = {};
    for (const [key, nested] of Object.entries(value)) {
      setEntry(result, key, substituteEnv(nested));
    }
    return result;
  }
  return value;
}

function readConfigFile(configPath: string): ConfigMap {
  const raw = toConfigValue(parse(readFileSync(configPath, 'utf-8')));
  if (raw === null) return {};
  if (!isConfigMap(raw)) {
    throw new Error(`Config file ${configPath} must contain a mapping`);
  }
  return raw;
}

function parseConfig(raw: ConfigValue, origin: string): EngineConfigParsed {
  const result = engineConfigSchema.safeParse(substituteEnv(raw));
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config in ${origin}: ${issues}`);
  }
  return result.data;
}

/**
 * Load and validate an engine config file. `${VAR}` placeholders in string
 * values are replaced from the environment.
 */
export function loadConfig(configPath: string): EngineConfigParsed {
  return parseConfig(readConfigFile(configPath), configPath);
}

/**
 * Load several config files, merging them in order (later files win) before
 * validation.
 */
export function loadConfigFiles(configPaths: string[]): EngineConfigParsed {
  let merged: ConfigValue = {};
  for (const configPath of configPaths) {
    merged = mergeValues(merged, readConfigFile(configPath));
  }
  return parseConfig(merged, configPaths.join(', ') || '<defaults>');
}

/**
 * Make the relative paths in a config absolute, relative to `baseDir`
 * (normally the directory of the config file).
 */
export function resolveConfigPaths(config: EngineConfigParsed, baseDir: string): EngineConfigParsed {
  const absolute = (path: string): string => (isAbsolute(path) ? path : resolve(baseDir, path));
  return {
    ...config,
    store: config.store.type === 'file' ? { ...config.store, dir: absolute(config.store.dir) } : config.store,
    schema_path: absolute(config.schema_path),
    database_path: absolute(config.database_path),
  };
}

export function configBaseDir(configPath: string): string {
  return dirname(resolve(configPath));
}
