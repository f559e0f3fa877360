import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { setupE2eApp, cleanup, type E2eApp } from './helpers.js';

describe('E2E: bundled operators from the file store', () => {
  let env: E2eApp;

  beforeEach(() => {
    env = setupE2eApp();
  });

  afterEach(() => cleanup(env));

  it('lists the bundled operators', async () => {
    const res = await env.app.request('/api/v1/operators');
    expect(await res.json()).toEqual({ ok: true, operators: ['base', 'developer', 'hacker', 'matrix'] });
  });

  it('every bundled operator validates cleanly', () => {
    const reports = env.resolver.validateAll();
    expect(reports.map((r) => [r.operator, r.valid, r.findings.length])).toEqual([
      ['base', true, 0],
      ['developer', true, 0],
      ['hacker', true, 0],
      ['matrix', true, 0],
    ]);
  });

  it('resolves hacker through developer, base and the inherited matrix theme', () => {
    const config = env.resolver.resolve('hacker');

    expect(config.name).toBe('hacker');
    expect(config.version).toBe('0.3.0');
    expect(config.author).toBeUndefined();
    expect(config.chain).toEqual(['base', 'developer', 'hacker']);
    expect(config.theme).toEqual({ name: 'matrix', chain: ['base', 'matrix'] });
    expect(config.tags).toEqual(['core', 'development', 'kubernetes']);
    expect(config.findings).toEqual([]);

    expect(config.sections).toEqual({
      shell: {
        preferred_shell: 'zsh',
        framework: 'oh-my-zsh',
        oh_my_zsh_theme: 'agnoster',
        oh_my_zsh_plugins: ['git', 'docker', 'zsh-autosuggestions', 'kubectl'],
        aliases: {
          '..': 'cd ..',
          ll: 'ls -alF',
          la: 'ls -A',
          ls: 'eza',
          matrix: 'cmatrix -C green',
          gs: 'git status',
          k: 'kubectl',
        },
        environment: { EDITOR: 'nvim', PAGER: 'less', MATRIX_COLOR: '#00ff00' },
      },
      tmux: {
        prefix: 'C-a',
        settings: { base_index: 1, history_limit: 10000, mouse: true },
        theme: 'matrix',
        status_bar: { position: 'bottom', justify: 'left', interval: 5 },
      },
      tools: {
        essential_tools: [
          { name: 'fd', description: 'Better find' },
          { name: 'ripgrep', description: 'Better grep' },
          { name: 'fzf', description: 'Fuzzy finder' },
          { name: 'htop', description: 'Process viewer' },
        ],
        development_tools: [
          { name: 'jq', description: 'JSON processor' },
          { name: 'yq', description: 'YAML processor' },
        ],
        modern_cli_tools: [{ name: 'cmatrix', description: 'Digital rain' }],
      },
      docker: { install_compose: true, compose_version: 'v2' },
    });
  });

  it("developer's own alias beats the theme it declares", () => {
    const shell = env.resolver.resolve('developer', 'shell').sections.shell;

    expect(shell.aliases).toEqual({
      '..': 'cd ..',
      ll: 'ls -alF',
      la: 'ls -A',
      ls: 'eza',
      matrix: 'cmatrix -C green',
      gs: 'git status',
    });
    expect(shell.oh_my_zsh_theme).toBe('agnoster');
  });

  it('resolves hacker with the same inherited fields as developer', () => {
    const developer = env.resolver.resolve('developer', 'shell').sections.shell;
    const hacker = env.resolver.resolve('hacker', 'shell').sections.shell;

    expect(hacker.aliases).toEqual(Object.assign({}, developer.aliases, { k: 'kubectl' }));
    expect(hacker.environment).toEqual(developer.environment);
    expect(hacker.oh_my_zsh_theme).toBe(developer.oh_my_zsh_theme);
  });

  it('resolves the theme operator on its own', () => {
    const config = env.resolver.resolve('matrix');
    expect(config.chain).toEqual(['base', 'matrix']);
    expect(config.theme).toBeUndefined();
    expect(config.tags).toEqual(['core', 'theme']);
    expect(config.sections.shell.aliases).toEqual({
      '..': 'cd ..',
      ll: 'ls -alF',
      la: 'ls -A',
      ls: 'ls --color=auto',
      matrix: 'cmatrix -C green',
    });
  });

  it('serves a scoped resolution over HTTP', async () => {
    const res = await env.app.request('/api/v1/operators/hacker/resolve?section=docker');
    expect(res.status).toBe(200);
    const json = (await res.json()) as { ok: boolean; config: { sections: unknown } };
    expect(json.config.sections).toEqual({ docker: { install_compose: true, compose_version: 'v2' } });
  });
});
