/**
 * Chart Options Generator
 * @module chart-options-generator
 *
 * Library entry point. The command-line tool lives in `cli/`.
 *
 * @example
 * ```typescript
 * import { generateChartOptions, formatOutput } from 'chart-options-generator';
 *
 * const result = generateChartOptions('      --ttl duration   Record TTL\n');
 * process.stdout.write(formatOutput(result));
 * ```
 */

export * from './types/chart-options.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './parsers/help/index.js';
export * from './transform/index.js';
export * from './render/index.js';
export * from './config/index.js';
export * from './sources/index.js';
export {
  type GenerationOptions,
  type GenerationResult,
  type ExcludedFlag,
  collectChartOptions,
  findKeyCollisions,
  generateChartOptions,
  formatOutput,
  generationOptionsFromConfig,
} from './generator.js';
export { run, type CliEnvironment } from './cli/run.js';
export { parseArgs, type CliArguments } from './cli/args.js';
