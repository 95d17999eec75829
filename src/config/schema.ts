/**
 * Configuration Schema Definitions
 * @module config/schema
 *
 * Zod schemas validating the generator configuration.
 * Every field has a default, so an empty object is a complete configuration.
 */

import { z } from 'zod';
import { DEFAULT_VALUES } from '../render/configuration-renderer.js';
import { DEFAULT_TEMPLATE_INDENT, DEFAULT_VALUES_ROOT } from '../render/template-renderer.js';
import { DEFAULT_ACRONYM_CORRECTIONS } from '../transform/name-transform.js';

// ============================================================================
// Helpers
// ============================================================================

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const RegexSourceSchema = z.string().min(1).refine(isValidRegex, {
  message: 'Must be a valid regular expression',
});

// ============================================================================
// Input Source Configuration
// ============================================================================

/**
 * Where the help listing comes from
 */
export const SourceConfigSchema = z.discriminatedUnion('kind', [
  /** Bundled sample listing */
  z.object({ kind: z.literal('builtin') }),
  /** Listing saved to a file */
  z.object({ kind: z.literal('file'), path: z.string().min(1) }),
  /** Listing piped on standard input */
  z.object({ kind: z.literal('stdin') }),
  /** Listing captured from running the controller */
  z.object({
    kind: z.literal('command'),
    /** Command printing the help listing, e.g. `./bin/controller --help` */
    command: z.string().min(1),
    /** Optional build step run first */
    buildCommand: z.string().min(1).optional(),
    /** Only output lines containing this marker are kept */
    marker: z.string().min(1).default('--'),
    /** Working directory for both commands */
    cwd: z.string().min(1).optional(),
    /** Timeout per command in milliseconds */
    timeoutMs: z.coerce.number().int().min(1000).default(5 * 60 * 1000),
  }),
]);

export type SourceConfig = z.infer<typeof SourceConfigSchema>;
export type SourceKind = SourceConfig['kind'];

// ============================================================================
// Exclusion Configuration
// ============================================================================

export const ExclusionConfigSchema = z.object({
  /** Built-in rule set */
  policy: z.enum(['exact-set', 'pattern', 'none']).default('pattern'),
  /** Additional flag names excluded exactly */
  names: z.array(z.string().min(1)).default([]),
  /** Additional regular expressions matched anywhere in the flag name */
  patterns: z.array(RegexSourceSchema).default([]),
});

export type ExclusionConfig = z.infer<typeof ExclusionConfigSchema>;

// ============================================================================
// Acronym Corrections
// ============================================================================

export const AcronymCorrectionSchema = z
  .object({
    from: z.string().min(1),
    to: z.string().min(1),
  })
  .refine((c) => c.from.toLowerCase() === c.to.toLowerCase(), {
    message: 'An acronym correction may only change letter case',
  });

// ============================================================================
// Output Configuration
// ============================================================================

export const OutputConfigSchema = z.object({
  /** Which artifacts to print */
  sections: z.enum(['all', 'template', 'configuration']).default('all'),
  /** Indentation of template lines */
  indent: z.coerce.number().int().min(0).max(32).default(DEFAULT_TEMPLATE_INDENT),
  /** Values section holding the generated keys */
  valuesRoot: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Must be a plain identifier')
    .default(DEFAULT_VALUES_ROOT),
  /** Write to this file instead of stdout */
  file: z.string().min(1).optional(),
});

export type OutputConfig = z.infer<typeof OutputConfigSchema>;

// ============================================================================
// Complete Configuration
// ============================================================================

export const DefaultValueSchema = z.union([z.string(), z.number(), z.boolean()]);

export const GeneratorConfigSchema = z.object({
  source: SourceConfigSchema.default({ kind: 'builtin' }),
  exclusions: ExclusionConfigSchema.default({}),
  /** Applied in order after camel-casing */
  acronyms: z.array(AcronymCorrectionSchema).default([...DEFAULT_ACRONYM_CORRECTIONS]),
  /** Known defaults written as active lines in the configuration stanza */
  defaults: z.record(DefaultValueSchema).default({ ...DEFAULT_VALUES }),
  /** What to do when two flags map to the same key */
  collisions: z.enum(['warn', 'error', 'ignore']).default('warn'),
  output: OutputConfigSchema.default({}),
});

export type GeneratorConfig = z.infer<typeof GeneratorConfigSchema>;
export type CollisionPolicy = GeneratorConfig['collisions'];

/**
 * Fully defaulted configuration
 */
export function defaultConfig(): GeneratorConfig {
  return GeneratorConfigSchema.parse({});
}
