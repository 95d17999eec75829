/**
 * Exclusion Rules
 * @module transform/exclusion
 *
 * Decides which flags never become chart configuration. Rules form a single
 * ordered list; the first rule that matches a flag name excludes it.
 */

// ============================================================================
// Rule Types
// ============================================================================

/**
 * Excludes one flag name exactly
 */
export interface ExactExclusionRule {
  readonly kind: 'exact';
  readonly name: string;
}

/**
 * Excludes every flag name the pattern matches anywhere
 */
export interface PatternExclusionRule {
  readonly kind: 'pattern';
  readonly pattern: RegExp;
}

export type ExclusionRule = ExactExclusionRule | PatternExclusionRule;

/**
 * Built-in rule sets.
 * - `exact-set`: fixed names, one cache-dir entry per provider
 * - `pattern`: a few fixed names plus suffix/substring patterns
 * - `none`: no built-in rules
 */
export type ExclusionPolicy = 'exact-set' | 'pattern' | 'none';

// ============================================================================
// Rule Constructors
// ============================================================================

export function exact(name: string): ExactExclusionRule {
  return { kind: 'exact', name };
}

export function pattern(source: string | RegExp): PatternExclusionRule {
  return { kind: 'pattern', pattern: typeof source === 'string' ? new RegExp(source) : source };
}

// ============================================================================
// Built-in Policies
// ============================================================================

/** Core flags that identify or drive the process itself */
export const CORE_EXCLUDED_NAMES: readonly string[] = ['name', 'help', 'identifier', 'dry-run'];

/** Providers listed one by one in the exact-set policy */
export const CACHE_DIR_PROVIDERS: readonly string[] = [
  'alicloud-dns',
  'aws-route53',
  'azure-dns',
  'google-clouddns',
  'openstack-designate',
  'cloudflare-dns',
  'infoblox-dns',
];

/** Operational concerns that are never chart-configurable, for any provider */
export const OPERATIONAL_PATTERNS: readonly string[] = [
  'cache-dir$',
  'blocked-zone$',
  'remote-access-.+',
];

const POLICY_RULES: Record<ExclusionPolicy, readonly ExclusionRule[]> = {
  'exact-set': [
    ...CORE_EXCLUDED_NAMES.map(exact),
    exact('cache-dir'),
    ...CACHE_DIR_PROVIDERS.map((provider) => exact(`${provider}.cache-dir`)),
  ],
  pattern: [...CORE_EXCLUDED_NAMES.map(exact), ...OPERATIONAL_PATTERNS.map((p) => pattern(p))],
  none: [],
};

/**
 * Rules of a built-in policy
 */
export function policyRules(policy: ExclusionPolicy): readonly ExclusionRule[] {
  return POLICY_RULES[policy];
}

/**
 * Build the ordered rule list: policy rules first, then extra names and patterns
 */
export function buildExclusionRules(
  policy: ExclusionPolicy,
  extraNames: readonly string[] = [],
  extraPatterns: readonly string[] = []
): readonly ExclusionRule[] {
  return [
    ...policyRules(policy),
    ...extraNames.map(exact),
    ...extraPatterns.map((p) => pattern(p)),
  ];
}

// ============================================================================
// Matching
// ============================================================================

export function ruleMatches(rule: ExclusionRule, name: string): boolean {
  switch (rule.kind) {
    case 'exact':
      return rule.name === name;
    case 'pattern':
      return rule.pattern.test(name);
  }
}

/**
 * Find the first rule excluding a flag name
 *
 * @returns the matching rule, or undefined when the flag is kept
 */
export function findExclusion(name: string, rules: readonly ExclusionRule[]): ExclusionRule | undefined {
  return rules.find((rule) => ruleMatches(rule, name));
}

export function isExcluded(name: string, rules: readonly ExclusionRule[]): boolean {
  return findExclusion(name, rules) !== undefined;
}

/**
 * Human-readable form of a rule, for logs
 */
export function describeRule(rule: ExclusionRule): string {
  return rule.kind === 'exact' ? `exact:${rule.name}` : `pattern:${rule.pattern.source}`;
}
