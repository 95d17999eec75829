/**
 * Configuration Loader Tests
 * @module tests/config/loader
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ConfigLoader,
  DEFAULT_CONFIG_FILE,
  StaticConfigSource,
  deepMerge,
  defaultConfig,
  filterUndefined,
  loadConfig,
  validateConfig,
} from '../../src/config/index.js';
import { ConfigurationError } from '../../src/errors/index.js';

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays', () => {
    const merged = deepMerge(
      { exclusions: { policy: 'pattern', names: ['a'] } },
      { exclusions: { names: ['b'] } }
    );

    expect(merged).toEqual({ exclusions: { policy: 'pattern', names: ['b'] } });
  });

  it('replaces a source of a different kind whole', () => {
    const merged = deepMerge(
      { source: { kind: 'command', command: './controller --help' } },
      { source: { kind: 'file', path: 'flags.txt' } }
    );

    expect(merged).toEqual({ source: { kind: 'file', path: 'flags.txt' } });
  });

  it('merges a source of the same kind', () => {
    const merged = deepMerge(
      { source: { kind: 'command', command: './controller --help', buildCommand: 'make' } },
      { source: { kind: 'command', command: './other --help' } }
    );

    expect(merged).toEqual({
      source: { kind: 'command', command: './other --help', buildCommand: 'make' },
    });
  });
});

describe('filterUndefined', () => {
  it('drops undefined values and emptied objects', () => {
    expect(filterUndefined({ a: undefined, b: { c: undefined }, d: 1 })).toEqual({ d: 1 });
  });
});

describe('validateConfig', () => {
  it('fills in every default', () => {
    const config = validateConfig({});

    expect(config).toEqual(defaultConfig());
    expect(config.source).toEqual({ kind: 'builtin' });
    expect(config.exclusions).toEqual({ policy: 'pattern', names: [], patterns: [] });
    expect(config.collisions).toBe('warn');
    expect(config.output).toEqual({ sections: 'all', indent: 8, valuesRoot: 'configuration' });
    expect(config.defaults.ttl).toBe(120);
  });

  it('applies command source defaults', () => {
    const config = validateConfig({ source: { kind: 'command', command: './controller --help' } });

    expect(config.source).toEqual({
      kind: 'command',
      command: './controller --help',
      marker: '--',
      timeoutMs: 300000,
    });
  });

  it('coerces a numeric indent given as text', () => {
    expect(validateConfig({ output: { indent: '4' } }).output.indent).toBe(4);
  });

  it('rejects invalid patterns with their path', () => {
    try {
      validateConfig({ exclusions: { patterns: ['('] } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        issues: ['exclusions.patterns.0: Must be a valid regular expression'],
      });
    }
  });

  it('rejects acronym corrections that change more than case', () => {
    expect(() => validateConfig({ acronyms: [{ from: 'azureDns', to: 'azure' }] })).toThrow(
      'acronyms.0: An acronym correction may only change letter case'
    );
  });

  it('rejects an unknown collision mode', () => {
    expect(() => validateConfig({ collisions: 'sometimes' })).toThrow(ConfigurationError);
  });
});

describe('ConfigLoader', () => {
  let cwd: string;

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'chart-options-config-'));
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it('loads defaults when nothing else is configured', async () => {
    const loader = new ConfigLoader({ cwd, env: {} });

    expect(loader.getSourceNames()).toEqual([
      'defaults',
      `file:${join(cwd, DEFAULT_CONFIG_FILE)}`,
      'environment',
    ]);
    await expect(loader.load()).resolves.toEqual(defaultConfig());
  });

  it('reads the default config file from the working directory', async () => {
    await writeFile(
      join(cwd, DEFAULT_CONFIG_FILE),
      ['source:', '  kind: file', '  path: flags.txt', 'exclusions:', '  names: [kubeconfig]', 'defaults:', '  setup: 4', ''].join('\n'),
      'utf-8'
    );

    const config = await loadConfig({ cwd, env: {} });

    expect(config.source).toEqual({ kind: 'file', path: 'flags.txt' });
    expect(config.exclusions.names).toEqual(['kubeconfig']);
    expect(config.defaults).toMatchObject({ setup: 4, ttl: 120, controllers: 'all' });
  });

  it('reads a JSON config file given explicitly', async () => {
    await writeFile(join(cwd, 'options.json'), JSON.stringify({ output: { valuesRoot: 'controller' } }), 'utf-8');

    const config = await loadConfig({ cwd, env: {}, configFile: 'options.json' });

    expect(config.output.valuesRoot).toBe('controller');
  });

  it('treats an empty config file as empty configuration', async () => {
    await writeFile(join(cwd, DEFAULT_CONFIG_FILE), '', 'utf-8');

    await expect(loadConfig({ cwd, env: {} })).resolves.toEqual(defaultConfig());
  });

  it('fails when an explicit config file is missing', async () => {
    await expect(loadConfig({ cwd, env: {}, configFile: 'missing.yaml' })).rejects.toBeInstanceOf(
      ConfigurationError
    );
  });

  it('rejects a config file that is not a mapping', async () => {
    await writeFile(join(cwd, DEFAULT_CONFIG_FILE), '- a\n- b\n', 'utf-8');

    await expect(loadConfig({ cwd, env: {} })).rejects.toThrow('expected a mapping at the top level');
  });

  it('lets the environment override the config file', async () => {
    await writeFile(join(cwd, DEFAULT_CONFIG_FILE), 'source:\n  kind: file\n  path: flags.txt\ncollisions: error\n', 'utf-8');

    const config = await loadConfig({
      cwd,
      env: {
        CHART_OPTIONS_COMMAND: './controller --help',
        CHART_OPTIONS_BUILD_COMMAND: 'make build',
        CHART_OPTIONS_COLLISIONS: 'ignore',
        CHART_OPTIONS_EXCLUSION_POLICY: 'exact-set',
      },
    });

    expect(config.source).toEqual({
      kind: 'command',
      command: './controller --help',
      buildCommand: 'make build',
      marker: '--',
      timeoutMs: 300000,
    });
    expect(config.collisions).toBe('ignore');
    expect(config.exclusions.policy).toBe('exact-set');
  });

  it('lets overrides win over the environment', async () => {
    const config = await loadConfig({
      cwd,
      env: { CHART_OPTIONS_SOURCE_FILE: 'env-flags.txt', CHART_OPTIONS_COLLISIONS: 'ignore' },
      overrides: { source: { kind: 'stdin' }, collisions: 'error' },
    });

    expect(config.source).toEqual({ kind: 'stdin' });
    expect(config.collisions).toBe('error');
  });

  it('accepts custom sources', async () => {
    const loader = new ConfigLoader({
      sources: [new StaticConfigSource('test', { output: { sections: 'template' } }, 1)],
    });

    expect(loader.getSourceNames()).toEqual(['test']);
    await expect(loader.load()).resolves.toMatchObject({ output: { sections: 'template' } });
  });
});
