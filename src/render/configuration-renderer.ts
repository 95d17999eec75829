/**
 * Default-Configuration Renderer
 * @module render/configuration-renderer
 *
 * Renders the values-file stanza listing every option: active when a default
 * is known, commented out otherwise.
 */

import type {
  ChartOption,
  ConfigKey,
  DefaultValue,
  DefaultValueTable,
} from '../types/chart-options.js';
import { DEFAULT_VALUES_ROOT } from './template-renderer.js';

export interface ConfigurationRenderOptions {
  /** Values section holding the keys (default: `configuration`) */
  valuesRoot?: string;
}

/**
 * Known defaults for the controller's chart
 */
export const DEFAULT_VALUES: DefaultValueTable = {
  controllers: 'all',
  persistentCache: 'false',
  persistentCacheStorageSize: '1Gi',
  persistentCacheStorageSizeAlicloud: '20Gi',
  serverPortHttp: '8080',
  ttl: 120,
};

/**
 * Look up a key's default; inherited object properties never count
 */
export function lookupDefault(key: ConfigKey | string, defaults: DefaultValueTable): DefaultValue | undefined {
  return Object.hasOwn(defaults, key) ? defaults[key] : undefined;
}

/**
 * Render a default literal bare: no quoting, numbers and booleans as written
 */
export function formatDefaultValue(value: DefaultValue): string {
  return String(value);
}

/**
 * Render the stanza line for one key
 *
 * @example
 * renderConfigurationLine('controllers', { controllers: 'all' }) // '  controllers: all'
 * renderConfigurationLine('setup', {})                            // '# setup:'
 */
export function renderConfigurationLine(key: ConfigKey | string, defaults: DefaultValueTable): string {
  const value = lookupDefault(key, defaults);
  return value === undefined ? `# ${key}:` : `  ${key}: ${formatDefaultValue(value)}`;
}

/**
 * Render the header and one line per option, in option order
 */
export function renderConfigurationStanza(
  options: readonly Pick<ChartOption, 'key'>[],
  defaults: DefaultValueTable = DEFAULT_VALUES,
  { valuesRoot = DEFAULT_VALUES_ROOT }: ConfigurationRenderOptions = {}
): string[] {
  return [`${valuesRoot}:`, ...options.map((option) => renderConfigurationLine(option.key, defaults))];
}
