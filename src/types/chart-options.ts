/**
 * Chart Option Types
 * @module types/chart-options
 *
 * Domain types shared by the extraction, transformation and rendering stages.
 */

// ============================================================================
// Branded Types for Type Safety
// ============================================================================

/**
 * Camel-case configuration key derived from a flag's long name
 * @example
 * const key = createConfigKey('awsRoute53DnsPoolSize');
 */
export type ConfigKey = string & { readonly __brand: 'ConfigKey' };

/**
 * Create a ConfigKey from a string
 */
export function createConfigKey(key: string): ConfigKey {
  return key as ConfigKey;
}

// ============================================================================
// Flags
// ============================================================================

/**
 * A flag found in a help listing.
 * Only the long name matters to the generator; type and help text are dropped.
 */
export interface FlagRecord {
  /** Long name without the leading dashes, e.g. `aws-route53.dns.pool.size` */
  readonly name: string;
  /** 1-based line in the listing */
  readonly line: number;
}

// ============================================================================
// Defaults
// ============================================================================

/**
 * Literal default written into the configuration stanza
 */
export type DefaultValue = string | number | boolean;

/**
 * Mapping from configuration key to its known default
 */
export type DefaultValueTable = Readonly<Record<string, DefaultValue>>;

// ============================================================================
// Acronym Corrections
// ============================================================================

/**
 * Literal substring replacement applied after camel-casing
 * @example
 * { from: 'azureDns', to: 'azureDNS' }
 */
export interface AcronymCorrection {
  readonly from: string;
  readonly to: string;
}

// ============================================================================
// Generated Options
// ============================================================================

/**
 * A flag that survived exclusion, joined with its configuration key
 */
export interface ChartOption {
  readonly flag: FlagRecord;
  readonly key: ConfigKey;
}

/**
 * Flags that collapse to the same configuration key
 */
export interface KeyCollision {
  readonly key: ConfigKey;
  readonly flags: readonly string[];
}

/**
 * Which artifacts to print
 */
export type OutputSection = 'all' | 'template' | 'configuration';
