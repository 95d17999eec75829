/**
 * Configuration Module
 * @module config
 *
 * @example
 * ```typescript
 * import { loadConfig } from './config/index.js';
 *
 * const config = await loadConfig({ configFile: 'chart-options.yaml' });
 * console.log(config.exclusions.policy); // 'pattern'
 * ```
 */

import { ConfigLoader, type ConfigLoaderOptions } from './loader.js';
import type { GeneratorConfig } from './schema.js';

export {
  SourceConfigSchema,
  ExclusionConfigSchema,
  AcronymCorrectionSchema,
  OutputConfigSchema,
  DefaultValueSchema,
  GeneratorConfigSchema,
  defaultConfig,
  type SourceConfig,
  type SourceKind,
  type ExclusionConfig,
  type OutputConfig,
  type GeneratorConfig,
  type CollisionPolicy,
} from './schema.js';

export {
  ConfigLoader,
  DefaultsConfigSource,
  FileConfigSource,
  EnvironmentConfigSource,
  StaticConfigSource,
  DEFAULT_CONFIG_FILE,
  deepMerge,
  filterUndefined,
  isPlainObject,
  formatIssues,
  validateConfig,
  type ConfigSource,
  type ConfigLoaderOptions,
  type RawConfig,
} from './loader.js';

/**
 * Load configuration from the default sources
 */
export async function loadConfig(options: ConfigLoaderOptions = {}): Promise<GeneratorConfig> {
  return new ConfigLoader(options).load();
}
