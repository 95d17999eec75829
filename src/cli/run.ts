/**
 * CLI Runner
 * @module cli/run
 *
 * Wires argument parsing, configuration, input capture and generation
 * together and maps every failure to a process exit status.
 */

import { writeFile } from 'fs/promises';
import { resolve } from 'path';
import type { DestinationStream } from 'pino';
import { loadConfig } from '../config/index.js';
import {
  EXIT_SUCCESS,
  EXIT_USAGE,
  InputCaptureError,
  InternalError,
  UsageError,
  getErrorMessage,
  isBaseError,
} from '../errors/index.js';
import { formatOutput, generateChartOptions, generationOptionsFromConfig } from '../generator.js';
import { initLogger, type GeneratorLogger } from '../logging/index.js';
import { createInputSource, readInput, type CommandExecutor } from '../sources/index.js';
import { HELP_TEXT, parseArgs, type CliArguments } from './args.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Process surroundings, replaceable in tests
 */
export interface CliEnvironment {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  stdin: NodeJS.ReadableStream;
  env: NodeJS.ProcessEnv;
  cwd: string;
  executor?: CommandExecutor;
  logDestination?: DestinationStream;
}

function defaultEnvironment(): CliEnvironment {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    stdin: process.stdin,
    env: process.env,
    cwd: process.cwd(),
  };
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Run the generator and resolve to the exit status
 */
export async function run(argv: readonly string[], overrides: Partial<CliEnvironment> = {}): Promise<number> {
  const io: CliEnvironment = { ...defaultEnvironment(), ...overrides };

  let args: CliArguments;
  try {
    args = parseArgs(argv);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr.write(`${error.message}\nRun with --help for usage.\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  if (args.help) {
    io.stdout.write(HELP_TEXT);
    return EXIT_SUCCESS;
  }

  const logger = initLogger({
    level: args.verbose ? 'debug' : undefined,
    destination: io.logDestination,
  });

  try {
    const config = await loadConfig({
      configFile: args.configFile,
      overrides: args.overrides,
      env: io.env,
      cwd: io.cwd,
      logger: logger.withContext({ module: 'config-loader' }),
    });

    const source = createInputSource(config.source, {
      stdin: io.stdin,
      executor: io.executor,
      logger: logger.withContext({ module: 'sources' }),
    });
    const text = await readInput(source, logger);

    const result = generateChartOptions(
      text,
      generationOptionsFromConfig(config, logger.withContext({ module: 'generator' }))
    );
    const output = formatOutput(result, config.output.sections);

    if (config.output.file) {
      await writeFile(resolve(io.cwd, config.output.file), output, 'utf-8');
    } else {
      io.stdout.write(output);
    }

    return EXIT_SUCCESS;
  } catch (error) {
    return reportFailure(error, logger, io);
  }
}

/**
 * Log a failure and choose the exit status
 */
function reportFailure(error: unknown, logger: GeneratorLogger, io: CliEnvironment): number {
  if (error instanceof InputCaptureError) {
    // The command's own diagnostics, passed through untouched
    if (error.stderr) {
      io.stderr.write(error.stderr);
    }
    return error.exitStatus;
  }

  const failure = isBaseError(error)
    ? error
    : new InternalError(`Unexpected failure: ${getErrorMessage(error)}`, error instanceof Error ? error : undefined);

  if (failure.isOperational) {
    logger.error({ failure: failure.toJSON() }, failure.message);
  } else {
    logger.error({ err: failure.getRootCause(), code: failure.code }, failure.message);
  }
  return failure.exitStatus;
}
