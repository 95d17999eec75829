/**
 * Input Sources Module
 * @module sources
 */

import type { SourceConfig } from '../config/schema.js';
import type { GeneratorLogger } from '../logging/index.js';
import { CommandSource, type CommandExecutor } from './command-source.js';
import {
  BuiltinSource,
  FileSource,
  StdinSource,
  type InputSource,
} from './input-source.js';

export {
  type InputSource,
  LiteralSource,
  FileSource,
  BuiltinSource,
  StdinSource,
  BUILTIN_LISTING_PATH,
} from './input-source.js';

export {
  type CommandResult,
  type ExecuteOptions,
  type CommandExecutor,
  type CommandSourceOptions,
  CommandSource,
  shellExecutor,
  filterMarkedLines,
} from './command-source.js';

/**
 * Collaborators a source may need, injectable for tests
 */
export interface InputSourceDependencies {
  stdin?: NodeJS.ReadableStream;
  executor?: CommandExecutor;
  logger?: GeneratorLogger;
}

/**
 * Create the input source described by the configuration
 */
export function createInputSource(
  config: SourceConfig,
  deps: InputSourceDependencies = {}
): InputSource {
  switch (config.kind) {
    case 'builtin':
      return new BuiltinSource();
    case 'file':
      return new FileSource(config.path);
    case 'stdin':
      return new StdinSource(deps.stdin);
    case 'command':
      return new CommandSource({
        command: config.command,
        buildCommand: config.buildCommand,
        marker: config.marker,
        cwd: config.cwd,
        timeoutMs: config.timeoutMs,
        executor: deps.executor,
        logger: deps.logger,
      });
  }
}

/**
 * Read a source, logging its size and timing
 */
export async function readInput(source: InputSource, logger: GeneratorLogger): Promise<string> {
  const startTime = Date.now();
  const content = await source.read();
  logger.sourceRead(source.name, Buffer.byteLength(content, 'utf-8'), Date.now() - startTime);
  return content;
}
