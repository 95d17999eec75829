/**
 * Chart Options Generator
 * @module generator
 *
 * Pure pipeline from help-listing text to the two chart fragments:
 * extract flags, drop excluded ones, derive keys, render.
 */

import type { CollisionPolicy, GeneratorConfig } from './config/schema.js';
import { KeyCollisionError } from './errors/index.js';
import { createModuleLogger, type GeneratorLogger } from './logging/index.js';
import { countLines, extractFlagNames } from './parsers/help/index.js';
import {
  DEFAULT_VALUES,
  renderConfigurationStanza,
  renderTemplateLines,
} from './render/index.js';
import {
  buildExclusionRules,
  DEFAULT_ACRONYM_CORRECTIONS,
  describeRule,
  findExclusion,
  policyRules,
  toConfigKey,
  type ExclusionRule,
} from './transform/index.js';
import type {
  AcronymCorrection,
  ChartOption,
  ConfigKey,
  DefaultValueTable,
  FlagRecord,
  KeyCollision,
  OutputSection,
} from './types/chart-options.js';

// ============================================================================
// Types
// ============================================================================

export interface GenerationOptions {
  /** Ordered exclusion rules (default: the `pattern` policy) */
  rules?: readonly ExclusionRule[];
  acronyms?: readonly AcronymCorrection[];
  defaults?: DefaultValueTable;
  collisions?: CollisionPolicy;
  indent?: number;
  valuesRoot?: string;
  logger?: GeneratorLogger;
}

export interface ExcludedFlag {
  readonly flag: FlagRecord;
  readonly rule: ExclusionRule;
}

export interface GenerationResult {
  /** Surviving flags with their keys, in listing order */
  readonly options: readonly ChartOption[];
  readonly excluded: readonly ExcludedFlag[];
  readonly collisions: readonly KeyCollision[];
  readonly templateLines: readonly string[];
  readonly configurationLines: readonly string[];
}

// ============================================================================
// Pipeline Stages
// ============================================================================

/**
 * Split the flags of a listing into kept options and excluded flags
 */
export function collectChartOptions(
  text: string,
  rules: readonly ExclusionRule[] = policyRules('pattern'),
  acronyms: readonly AcronymCorrection[] = DEFAULT_ACRONYM_CORRECTIONS
): { options: ChartOption[]; excluded: ExcludedFlag[] } {
  const options: ChartOption[] = [];
  const excluded: ExcludedFlag[] = [];

  for (const flag of extractFlagNames(text)) {
    const rule = findExclusion(flag.name, rules);
    if (rule) {
      excluded.push({ flag, rule });
    } else {
      options.push({ flag, key: toConfigKey(flag.name, acronyms) });
    }
  }

  return { options, excluded };
}

/**
 * Keys shared by more than one distinct flag name, in order of first appearance
 */
export function findKeyCollisions(options: readonly ChartOption[]): KeyCollision[] {
  const flagsByKey = new Map<ConfigKey, string[]>();

  for (const { key, flag } of options) {
    const flags = flagsByKey.get(key);
    if (!flags) {
      flagsByKey.set(key, [flag.name]);
    } else if (!flags.includes(flag.name)) {
      flags.push(flag.name);
    }
  }

  return [...flagsByKey.entries()]
    .filter(([, flags]) => flags.length > 1)
    .map(([key, flags]) => ({ key, flags }));
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Turn a help listing into template lines and a configuration stanza.
 *
 * Colliding keys are reported according to `collisions`: `warn` logs and keeps
 * both blocks, `ignore` keeps them silently, `error` throws.
 *
 * @throws KeyCollisionError when `collisions` is `error` and two flags share a key
 */
export function generateChartOptions(text: string, options: GenerationOptions = {}): GenerationResult {
  const logger = options.logger ?? createModuleLogger('generator');
  const startTime = Date.now();

  const collected = collectChartOptions(text, options.rules, options.acronyms);
  logger.flagsExtracted(collected.options.length + collected.excluded.length, countLines(text));

  for (const { flag, rule } of collected.excluded) {
    logger.flagExcluded(flag.name, describeRule(rule));
  }

  const collisions = findKeyCollisions(collected.options);
  const policy = options.collisions ?? 'warn';

  if (collisions.length > 0 && policy === 'error') {
    const [first] = collisions;
    throw new KeyCollisionError(first.key, first.flags);
  }
  if (policy === 'warn') {
    for (const collision of collisions) {
      logger.keyCollision(collision.key, collision.flags);
    }
  }

  const renderOptions = { indent: options.indent, valuesRoot: options.valuesRoot };
  const result: GenerationResult = {
    options: collected.options,
    excluded: collected.excluded,
    collisions,
    templateLines: renderTemplateLines(collected.options, renderOptions),
    configurationLines: renderConfigurationStanza(
      collected.options,
      options.defaults ?? DEFAULT_VALUES,
      renderOptions
    ),
  };

  logger.generationCompleted(result.options.length, result.excluded.length, Date.now() - startTime);
  return result;
}

/**
 * Join the requested artifacts into the text printed on stdout.
 * Every line, the last included, ends with a newline.
 */
export function formatOutput(result: GenerationResult, sections: OutputSection = 'all'): string {
  const lines = [
    ...(sections === 'configuration' ? [] : result.templateLines),
    ...(sections === 'template' ? [] : result.configurationLines),
  ];
  return lines.map((line) => `${line}\n`).join('');
}

/**
 * Map validated configuration onto generation options
 */
export function generationOptionsFromConfig(
  config: GeneratorConfig,
  logger?: GeneratorLogger
): GenerationOptions {
  return {
    rules: buildExclusionRules(
      config.exclusions.policy,
      config.exclusions.names,
      config.exclusions.patterns
    ),
    acronyms: config.acronyms,
    defaults: config.defaults,
    collisions: config.collisions,
    indent: config.output.indent,
    valuesRoot: config.output.valuesRoot,
    logger,
  };
}
