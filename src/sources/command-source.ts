/**
 * Command Capture Source
 * @module sources/command-source
 *
 * Optionally builds the controller, runs it with its help flag, and captures
 * the listing through a temporary file. A failing command aborts the run with
 * the command's own exit status.
 */

import { exec } from 'child_process';
import { randomUUID } from 'crypto';
import { readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { promisify } from 'util';
import { InputCaptureError, InputReadError, getErrorMessage } from '../errors/index.js';
import { createModuleLogger, type GeneratorLogger } from '../logging/index.js';
import type { InputSource } from './input-source.js';

const execAsync = promisify(exec);

// ============================================================================
// Command Execution
// ============================================================================

/**
 * Outcome of running a shell command
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface ExecuteOptions {
  cwd?: string;
  timeout: number;
}

/**
 * Runs a shell command and reports its exit status instead of throwing on it
 */
export type CommandExecutor = (command: string, options: ExecuteOptions) => Promise<CommandResult>;

function exitCodeOf(error: unknown): number | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

function outputOf(error: unknown, stream: 'stdout' | 'stderr'): string {
  if (error instanceof Error && stream in error) {
    const value: unknown = Reflect.get(error, stream);
    return typeof value === 'string' ? value : '';
  }
  return '';
}

/**
 * Default executor backed by `child_process.exec`
 */
export const shellExecutor: CommandExecutor = async (command, { cwd, timeout }) => {
  try {
    const { stdout, stderr } = await execAsync(command, {
      cwd,
      timeout,
      encoding: 'utf8',
      maxBuffer: 10 * 1024 * 1024,
    });
    return { exitCode: 0, stdout, stderr };
  } catch (error) {
    const exitCode = exitCodeOf(error);
    if (exitCode === undefined) {
      // Killed by a signal (timeout) or never started
      throw new InputReadError(`command:${command}`, getErrorMessage(error), {
        cause: error instanceof Error ? error : undefined,
      });
    }
    return { exitCode, stdout: outputOf(error, 'stdout'), stderr: outputOf(error, 'stderr') };
  }
};

// ============================================================================
// Command Source
// ============================================================================

export interface CommandSourceOptions {
  /** Command printing the help listing */
  command: string;
  /** Build step run before the help command */
  buildCommand?: string;
  /** Only lines containing this marker are kept (default: `--`) */
  marker?: string;
  cwd?: string;
  /** Timeout per command in milliseconds (default: 5 minutes) */
  timeoutMs?: number;
  /** Directory for the capture file (default: the OS temp dir) */
  tempDir?: string;
  executor?: CommandExecutor;
  logger?: GeneratorLogger;
}

/**
 * Keep only the lines containing the flag marker
 */
export function filterMarkedLines(content: string, marker: string): string {
  return content
    .split(/\r?\n/)
    .filter((line) => line.includes(marker))
    .join('\n');
}

/**
 * Captures a help listing by running the controller
 */
export class CommandSource implements InputSource {
  public readonly name: string;
  private readonly marker: string;
  private readonly timeoutMs: number;
  private readonly executor: CommandExecutor;
  private readonly logger: GeneratorLogger;

  constructor(private readonly options: CommandSourceOptions) {
    this.name = `command:${options.command}`;
    this.marker = options.marker ?? '--';
    this.timeoutMs = options.timeoutMs ?? 5 * 60 * 1000;
    this.executor = options.executor ?? shellExecutor;
    this.logger = options.logger ?? createModuleLogger('command-source');
  }

  async read(): Promise<string> {
    const { buildCommand, command, cwd } = this.options;

    if (buildCommand) {
      await this.run(buildCommand);
    }

    const captureFile = join(this.options.tempDir ?? tmpdir(), `chart-options-${randomUUID()}.txt`);

    try {
      await this.run(`${command} > "${captureFile}"`, command);
      const content = await readFile(captureFile, 'utf-8');
      this.logger.debug({ captureFile, cwd }, 'Captured help listing');
      return filterMarkedLines(content, this.marker);
    } finally {
      await rm(captureFile, { force: true });
    }
  }

  /**
   * Run a command, failing with its exit status when it is non-zero
   *
   * @param label - Command as reported in errors, when it differs from what runs
   */
  private async run(commandLine: string, label: string = commandLine): Promise<void> {
    this.logger.debug({ command: label }, 'Running command');

    const result = await this.executor(commandLine, {
      cwd: this.options.cwd,
      timeout: this.timeoutMs,
    });

    if (result.exitCode !== 0) {
      this.logger.captureFailed(label, result.exitCode);
      throw new InputCaptureError(label, result.exitCode, result.stderr);
    }
  }
}
