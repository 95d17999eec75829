/**
 * Transformation Module
 * @module transform
 */

export {
  DEFAULT_ACRONYM_CORRECTIONS,
  camelCase,
  applyAcronymCorrections,
  toConfigKey,
} from './name-transform.js';

export {
  type ExactExclusionRule,
  type PatternExclusionRule,
  type ExclusionRule,
  type ExclusionPolicy,
  exact,
  pattern,
  CORE_EXCLUDED_NAMES,
  CACHE_DIR_PROVIDERS,
  OPERATIONAL_PATTERNS,
  policyRules,
  buildExclusionRules,
  ruleMatches,
  findExclusion,
  isExcluded,
  describeRule,
} from './exclusion.js';
