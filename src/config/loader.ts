/**
 * Configuration Loader
 * @module config/loader
 *
 * Multi-source configuration loading with validation. Sources are merged in
 * priority order (lowest first): built-in defaults, config files, environment
 * variables, then command-line arguments.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';
import { ConfigurationError, getErrorMessage } from '../errors/index.js';
import { createModuleLogger, type GeneratorLogger } from '../logging/index.js';
import { DEFAULT_VALUES } from '../render/configuration-renderer.js';
import { GeneratorConfigSchema, type GeneratorConfig } from './schema.js';

// ============================================================================
// Raw Configuration
// ============================================================================

/**
 * Unvalidated configuration fragment as produced by a source
 */
export type RawConfig = Record<string, unknown>;

export function isPlainObject(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Merge `source` into `target`. Nested objects merge; arrays and scalars replace.
 * An object whose `kind` differs from the existing one replaces it whole.
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) {
      continue;
    }
    const existing = target[key];
    if (isPlainObject(value) && isPlainObject(existing) && value.kind === existing.kind) {
      target[key] = deepMerge({ ...existing }, value);
    } else if (isPlainObject(value)) {
      target[key] = deepMerge({}, value);
    } else {
      target[key] = value;
    }
  }
  return target;
}

/**
 * Recursively remove undefined values and objects left empty by that
 */
export function filterUndefined(obj: RawConfig): RawConfig {
  const result: RawConfig = {};

  for (const [key, value] of Object.entries(obj)) {
    if (value === undefined) {
      continue;
    }
    if (isPlainObject(value)) {
      const filtered = filterUndefined(value);
      if (Object.keys(filtered).length > 0) {
        result[key] = filtered;
      }
    } else {
      result[key] = value;
    }
  }

  return result;
}

// ============================================================================
// Configuration Source Interface
// ============================================================================

/**
 * Configuration source interface
 * Sources are loaded in order of priority (lowest first, highest overrides)
 */
export interface ConfigSource {
  /** Unique name for the source */
  readonly name: string;
  /** Priority level (higher = overrides lower) */
  readonly priority: number;
  /** Load configuration from this source */
  load(): Promise<RawConfig>;
  /** Whether this source is available */
  isAvailable(): boolean;
}

// ============================================================================
// Built-in Defaults Source
// ============================================================================

/**
 * Seeds the default-value table so that a config file's `defaults` extend it
 * instead of replacing it
 */
export class DefaultsConfigSource implements ConfigSource {
  public readonly name = 'defaults';
  public readonly priority = 0;

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<RawConfig> {
    return { defaults: { ...DEFAULT_VALUES } };
  }
}

// ============================================================================
// File Configuration Source
// ============================================================================

/**
 * YAML or JSON file configuration source
 */
export class FileConfigSource implements ConfigSource {
  public readonly name: string;
  public readonly priority: number;

  constructor(
    private readonly filePath: string,
    priority = 5,
    private readonly required = false
  ) {
    this.name = `file:${filePath}`;
    this.priority = priority;
  }

  isAvailable(): boolean {
    return this.required || existsSync(this.filePath);
  }

  async load(): Promise<RawConfig> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new ConfigurationError(
        this.name,
        `Failed to read configuration file ${this.filePath}: ${getErrorMessage(error)}`
      );
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(content);
    } catch (error) {
      throw new ConfigurationError(
        this.name,
        `Failed to parse configuration file ${this.filePath}: ${getErrorMessage(error)}`
      );
    }

    // An empty file parses to null
    if (parsed === null || parsed === undefined) {
      return {};
    }
    if (!isPlainObject(parsed)) {
      throw ConfigurationError.invalid(this.name, 'a mapping at the top level', parsed);
    }
    return parsed;
  }
}

// ============================================================================
// Environment Variable Configuration Source
// ============================================================================

/**
 * Environment variable configuration source
 */
export class EnvironmentConfigSource implements ConfigSource {
  public readonly name = 'environment';
  public readonly priority = 10;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<RawConfig> {
    const env = this.env;

    return filterUndefined({
      source: this.loadSourceConfig(env),
      exclusions: {
        policy: env.CHART_OPTIONS_EXCLUSION_POLICY,
      },
      collisions: env.CHART_OPTIONS_COLLISIONS,
      output: {
        valuesRoot: env.CHART_OPTIONS_VALUES_ROOT,
      },
    });
  }

  private loadSourceConfig(env: NodeJS.ProcessEnv): RawConfig | undefined {
    if (env.CHART_OPTIONS_COMMAND) {
      return {
        kind: 'command',
        command: env.CHART_OPTIONS_COMMAND,
        buildCommand: env.CHART_OPTIONS_BUILD_COMMAND,
      };
    }
    if (env.CHART_OPTIONS_SOURCE_FILE) {
      return { kind: 'file', path: env.CHART_OPTIONS_SOURCE_FILE };
    }
    return undefined;
  }
}

// ============================================================================
// Static Configuration Source
// ============================================================================

/**
 * In-memory configuration, used for command-line overrides
 */
export class StaticConfigSource implements ConfigSource {
  constructor(
    public readonly name: string,
    private readonly values: RawConfig,
    public readonly priority = 20
  ) {}

  isAvailable(): boolean {
    return true;
  }

  async load(): Promise<RawConfig> {
    return filterUndefined(this.values);
  }
}

// ============================================================================
// Configuration Loader
// ============================================================================

/**
 * Configuration loader options
 */
export interface ConfigLoaderOptions {
  /** Explicit config file; missing file is an error */
  configFile?: string;
  /** Command-line overrides (highest priority) */
  overrides?: RawConfig;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Working directory for the default config file lookup */
  cwd?: string;
  /** Custom config sources; replaces the defaults */
  sources?: ConfigSource[];
  logger?: GeneratorLogger;
}

/** Config file picked up from the working directory when present */
export const DEFAULT_CONFIG_FILE = '.chart-options.yaml';

/**
 * Format zod issues as `path: message` lines
 */
export function formatIssues(error: ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Multi-source configuration loader with validation
 */
export class ConfigLoader {
  private sources: ConfigSource[] = [];
  private readonly logger: GeneratorLogger;

  constructor(options: ConfigLoaderOptions = {}) {
    this.logger = options.logger ?? createModuleLogger('config-loader');

    if (options.sources && options.sources.length > 0) {
      this.sources = [...options.sources];
    } else {
      this.initializeDefaultSources(options);
    }

    this.sources.sort((a, b) => a.priority - b.priority);
  }

  private initializeDefaultSources(options: ConfigLoaderOptions): void {
    const cwd = options.cwd ?? process.cwd();

    this.addSource(new DefaultsConfigSource());

    if (options.configFile) {
      this.addSource(new FileConfigSource(resolve(cwd, options.configFile), 5, true));
    } else {
      this.addSource(new FileConfigSource(resolve(cwd, DEFAULT_CONFIG_FILE), 5));
    }

    this.addSource(new EnvironmentConfigSource(options.env));

    if (options.overrides) {
      this.addSource(new StaticConfigSource('arguments', options.overrides));
    }
  }

  /**
   * Add a configuration source
   */
  addSource(source: ConfigSource): this {
    this.sources.push(source);
    this.sources.sort((a, b) => a.priority - b.priority);
    return this;
  }

  /**
   * Names of the sources in load order
   */
  getSourceNames(): string[] {
    return this.sources.map((s) => s.name);
  }

  /**
   * Load, merge and validate configuration from all sources
   */
  async load(): Promise<GeneratorConfig> {
    const merged: RawConfig = {};

    for (const source of this.sources) {
      if (!source.isAvailable()) {
        this.logger.debug({ source: source.name }, 'Config source not available, skipping');
        continue;
      }

      const partial = await source.load();
      deepMerge(merged, partial);
      this.logger.debug({ source: source.name }, 'Loaded config from source');
    }

    return validateConfig(merged);
  }
}

/**
 * Validate a merged configuration
 *
 * @throws ConfigurationError listing every failing path
 */
export function validateConfig(raw: unknown): GeneratorConfig {
  const result = GeneratorConfigSchema.safeParse(raw);

  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new ConfigurationError(
      'configuration',
      `Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`,
      issues
    );
  }

  return result.data;
}
