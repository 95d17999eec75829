/**
 * Flag Name Transformation
 * @module transform/name-transform
 *
 * Turns a dash/dot-delimited flag name into the camel-case key used in the
 * chart's `configuration` values.
 */

import { InvalidFlagNameError } from '../errors/index.js';
import {
  createConfigKey,
  type AcronymCorrection,
  type ConfigKey,
} from '../types/chart-options.js';

// ============================================================================
// Acronym Corrections
// ============================================================================

/**
 * Provider and source prefixes whose `dns` part is written as an acronym.
 * Applied in order; new providers are appended.
 */
export const DEFAULT_ACRONYM_CORRECTIONS: readonly AcronymCorrection[] = [
  { from: 'alicloudDns', to: 'alicloudDNS' },
  { from: 'azureDns', to: 'azureDNS' },
  { from: 'azurePrivateDns', to: 'azurePrivateDNS' },
  { from: 'googleClouddns', to: 'googleCloudDNS' },
  { from: 'ingressDns', to: 'ingressDNS' },
  { from: 'serviceDns', to: 'serviceDNS' },
  { from: 'cloudflareDns', to: 'cloudflareDNS' },
  { from: 'infobloxDns', to: 'infobloxDNS' },
  { from: 'netlifyDns', to: 'netlifyDNS' },
];

// ============================================================================
// Transformation
// ============================================================================

const SEGMENT_DELIMITER = /[.-]/;

function capitalize(segment: string): string {
  return segment.charAt(0).toUpperCase() + segment.slice(1);
}

/**
 * Camel-case a flag name without acronym corrections.
 *
 * @example
 * camelCase('aws-route53.dns.pool.size') // 'awsRoute53DnsPoolSize'
 */
export function camelCase(name: string): string {
  const joined = name.split(SEGMENT_DELIMITER).map(capitalize).join('');
  return joined.charAt(0).toLowerCase() + joined.slice(1);
}

/**
 * Apply acronym corrections in table order
 */
export function applyAcronymCorrections(
  key: string,
  corrections: readonly AcronymCorrection[] = DEFAULT_ACRONYM_CORRECTIONS
): string {
  return corrections.reduce((current, { from, to }) => current.replaceAll(from, to), key);
}

/**
 * Derive the configuration key for a flag name.
 *
 * Idempotent: passing an already-derived key returns it unchanged.
 *
 * @example
 * toConfigKey('azure-dns.dns-class') // 'azureDNSDnsClass'
 */
export function toConfigKey(
  name: string,
  corrections: readonly AcronymCorrection[] = DEFAULT_ACRONYM_CORRECTIONS
): ConfigKey {
  if (name.length === 0) {
    throw new InvalidFlagNameError(name);
  }
  return createConfigKey(applyAcronymCorrections(camelCase(name), corrections));
}
