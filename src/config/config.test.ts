import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { configBaseDir, loadConfig, loadConfigFiles, resolveConfigPaths } from './loader.js';
import { engineConfigSchema } from './schema.js';
import { makeTmpDir } from '../test-utils.js';

describe('Config', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = makeTmpDir();
  });

  afterEach(() => {
    rmSync(tmpDir, { recursive: true, force: true });
  });

  function writeConfig(name: string, yaml: string): string {
    const configPath = join(tmpDir, name);
    writeFileSync(configPath, yaml);
    return configPath;
  }

  it('parses valid config YAML and returns typed object', () => {
    const configPath = writeConfig(
      'config.yaml',
      `
store:
  type: file
  dir: ./my-operators
schema_path: ./schema.yml
root_operator: core
include_info: true
audit:
  enabled: true
port: 4000
`,
    );
    const config = loadConfig(configPath);

    expect(config.store).toEqual({ type: 'file', dir: './my-operators', file_name: 'vars.yml' });
    expect(config.schema_path).toBe('./schema.yml');
    expect(config.root_operator).toBe('core');
    expect(config.include_info).toBe(true);
    expect(config.audit.enabled).toBe(true);
    expect(config.port).toBe(4000);
  });

  it('fills every default for an empty file', () => {
    const config = loadConfig(writeConfig('config.yaml', ''));

    expect(config).toEqual({
      store: { type: 'file', dir: './operators', file_name: 'vars.yml' },
      schema_path: './schema/operator-schema.yml',
      database_path: './opsmith.db',
      root_operator: 'base',
      include_info: false,
      audit: { enabled: false },
      port: 3000,
    });
  });

  it('accepts the sqlite store', () => {
    const config = loadConfig(
      writeConfig(
        'config.yaml',
        `
store:
  type: sqlite
database_path: ./data/engine.db
`,
      ),
    );

    expect(config.store).toEqual({ type: 'sqlite' });
    expect(config.database_path).toBe('./data/engine.db');
  });

  it('rejects config with bad types', () => {
    const configPath = writeConfig(
      'config.yaml',
      `
include_info: "yes"
`,
    );

    expect(() => loadConfig(configPath)).toThrow(`Invalid config in ${configPath}: include_info:`);
  });

  it('rejects an unknown store type', () => {
    const configPath = writeConfig(
      'config.yaml',
      `
store:
  type: redis
`,
    );

    expect(() => loadConfig(configPath)).toThrow('Invalid config');
  });

  it('rejects a root operator name the schema would never accept', () => {
    const configPath = writeConfig('config.yaml', 'root_operator: Base-Root\n');
    expect(() => loadConfig(configPath)).toThrow('root_operator: must be lowercase letters, numbers and underscores');
  });

  it('rejects a file that is not a mapping', () => {
    const configPath = writeConfig('config.yaml', '- just\n- a list\n');
    expect(() => loadConfig(configPath)).toThrow(`Config file ${configPath} must contain a mapping`);
  });

  it('resolves ${ENV_VAR} placeholders from process.env', () => {
    process.env.TEST_OPERATORS_DIR = '/srv/operators';

    const configPath = writeConfig(
      'config.yaml',
      `
store:
  type: file
  dir: "\${TEST_OPERATORS_DIR}/active"
`,
    );
    const config = loadConfig(configPath);

    expect(config.store).toEqual({ type: 'file', dir: '/srv/operators/active', file_name: 'vars.yml' });

    delete process.env.TEST_OPERATORS_DIR;
  });

  it('throws when env var is not set', () => {
    delete process.env.MISSING_VAR;

    const configPath = writeConfig(
      'config.yaml',
      `
schema_path: "\${MISSING_VAR}"
`,
    );

    expect(() => loadConfig(configPath)).toThrow('Environment variable MISSING_VAR is not set');
  });

  it('schema rejects direct invalid input', () => {
    const result = engineConfigSchema.safeParse({ port: 70000 });
    expect(result.success).toBe(false);
  });

  it('schema defaults the port to 3000', () => {
    expect(engineConfigSchema.parse({}).port).toBe(3000);
  });

  it('loadConfigFiles merges config files in order', () => {
    const basePath = writeConfig(
      'base.yaml',
      `
store:
  type: file
  dir: ./shared
audit:
  enabled: true
port: 4000
`,
    );
    const localPath = writeConfig(
      'local.yaml',
      `
store:
  type: file
  file_name: operator.yml
port: 5000
`,
    );

    const config = loadConfigFiles([basePath, localPath]);
    expect(config.store).toEqual({ type: 'file', dir: './shared', file_name: 'operator.yml' });
    expect(config.audit.enabled).toBe(true);
    expect(config.port).toBe(5000);
  });

  it('loadConfigFiles returns defaults for empty list', () => {
    const config = loadConfigFiles([]);
    expect(config.store).toEqual({ type: 'file', dir: './operators', file_name: 'vars.yml' });
    expect(config.port).toBe(3000);
  });

  it('resolveConfigPaths anchors relative paths at the config directory', () => {
    const configPath = writeConfig('config.yaml', 'schema_path: /etc/engine/schema.yml\n');
    const config = resolveConfigPaths(loadConfig(configPath), configBaseDir(configPath));

    expect(config.store).toEqual({ type: 'file', dir: join(tmpDir, 'operators'), file_name: 'vars.yml' });
    expect(config.schema_path).toBe('/etc/engine/schema.yml');
    expect(config.database_path).toBe(join(tmpDir, 'opsmith.db'));
  });
});
