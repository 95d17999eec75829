/**
 * CLI Runner Tests
 * @module tests/cli/run
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { Readable, Writable } from 'stream';
import { run, type CliEnvironment } from '../../src/cli/run.js';
import { HELP_TEXT } from '../../src/cli/args.js';
import type { CommandExecutor, CommandResult } from '../../src/sources/index.js';

const LISTING = `      --ttl int                 Default time-to-live
      --google-clouddns.ttl int Default time-to-live of controller google-clouddns
`;

const EXPECTED_OUTPUT = [
  '        {{- if .Values.configuration.ttl }}',
  '        - --ttl={{ .Values.configuration.ttl }}',
  '        {{- end }}',
  '        {{- if .Values.configuration.googleCloudDNSTtl }}',
  '        - --google-clouddns.ttl={{ .Values.configuration.googleCloudDNSTtl }}',
  '        {{- end }}',
  'configuration:',
  '  ttl: 120',
  '# googleCloudDNSTtl:',
  '',
].join('\n');

function collector() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('run', () => {
  let cwd: string;
  let stdout: ReturnType<typeof collector>;
  let stderr: ReturnType<typeof collector>;

  function environment(overrides: Partial<CliEnvironment> = {}): Partial<CliEnvironment> {
    return {
      stdout: stdout.stream,
      stderr: stderr.stream,
      stdin: Readable.from([]),
      env: {},
      cwd,
      ...overrides,
    };
  }

  beforeEach(async () => {
    cwd = await mkdtemp(join(tmpdir(), 'chart-options-cli-'));
    stdout = collector();
    stderr = collector();
    await writeFile(join(cwd, 'flags.txt'), LISTING, 'utf-8');
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  it('prints both artifacts for a listing file', async () => {
    const status = await run(['--file', join(cwd, 'flags.txt')], environment());

    expect(status).toBe(0);
    expect(stdout.text()).toBe(EXPECTED_OUTPUT);
  });

  it('reads the listing from stdin', async () => {
    const status = await run(['--stdin'], environment({ stdin: Readable.from([Buffer.from(LISTING)]) }));

    expect(status).toBe(0);
    expect(stdout.text()).toBe(EXPECTED_OUTPUT);
  });

  it('writes a single artifact to a file', async () => {
    const status = await run(
      ['--file', join(cwd, 'flags.txt'), '--only', 'configuration', '--out', 'values.yaml'],
      environment()
    );

    expect(status).toBe(0);
    expect(stdout.text()).toBe('');
    await expect(readFile(join(cwd, 'values.yaml'), 'utf-8')).resolves.toBe(
      'configuration:\n  ttl: 120\n# googleCloudDNSTtl:\n'
    );
  });

  it('prints help', async () => {
    await expect(run(['--help'], environment())).resolves.toBe(0);
    expect(stdout.text()).toBe(HELP_TEXT);
  });

  it('exits with 2 on bad arguments', async () => {
    await expect(run(['--bogus'], environment())).resolves.toBe(2);
    expect(stderr.text()).toBe('Unknown argument: --bogus\nRun with --help for usage.\n');
    expect(stdout.text()).toBe('');
  });

  it('exits with 2 on invalid configuration', async () => {
    await expect(run(['--policy', 'strict'], environment())).resolves.toBe(2);
    expect(stdout.text()).toBe('');
  });

  it('exits with 1 when the listing cannot be read', async () => {
    await expect(run(['--file', join(cwd, 'missing.txt')], environment())).resolves.toBe(1);
  });

  it('exits with 1 on a key collision in error mode', async () => {
    const listing = '      --pool.size int  size\n      --pool-size int  size\n';
    const status = await run(
      ['--stdin', '--collisions', 'error'],
      environment({ stdin: Readable.from([Buffer.from(listing)]) })
    );

    expect(status).toBe(1);
    expect(stdout.text()).toBe('');
  });

  describe('command capture', () => {
    function executor(exitCode: number) {
      return vi.fn<CommandExecutor>(async (command): Promise<CommandResult> => {
        const redirect = / > "(.*)"$/.exec(command);
        if (redirect) {
          await writeFile(redirect[1], LISTING, 'utf-8');
        }
        return { exitCode, stdout: '', stderr: exitCode === 0 ? '' : 'controller: build is broken\n' };
      });
    }

    it('generates from the captured help output', async () => {
      const status = await run(
        ['--command', './controller --help'],
        environment({ executor: executor(0) })
      );

      expect(status).toBe(0);
      expect(stdout.text()).toBe(EXPECTED_OUTPUT);
    });

    it('propagates the command exit status verbatim', async () => {
      const status = await run(
        ['--build-command', 'make build', '--command', './controller --help'],
        environment({ executor: executor(3) })
      );

      expect(status).toBe(3);
      expect(stdout.text()).toBe('');
      expect(stderr.text()).toBe('controller: build is broken\n');
    });

    it('adds a build step to a command from the environment', async () => {
      const exec = executor(0);
      const status = await run(
        ['--build-command', 'make build'],
        environment({ executor: exec, env: { CHART_OPTIONS_COMMAND: './controller --help' } })
      );

      expect(status).toBe(0);
      expect(exec.mock.calls.map(([command]) => command.split(' > ')[0])).toEqual([
        'make build',
        './controller --help',
      ]);
      expect(stdout.text()).toBe(EXPECTED_OUTPUT);
    });

    it('exits with 2 when a build step has no command to go with', async () => {
      const exec = executor(0);

      await expect(run(['--build-command', 'make build'], environment({ executor: exec }))).resolves.toBe(2);
      expect(exec).not.toHaveBeenCalled();
    });

    it('reports an unexpected failure as an internal error', async () => {
      const lines: string[] = [];
      const failing = vi.fn<CommandExecutor>(async () => {
        throw new Error('spawn failed');
      });

      const status = await run(
        ['--verbose', '--command', './controller --help'],
        environment({ executor: failing, logDestination: { write: (msg: string) => lines.push(msg) } })
      );

      const errors = lines
        .map((line): Record<string, unknown> => JSON.parse(line))
        .filter((entry) => entry.level === 'error');
      expect(status).toBe(1);
      expect(errors).toEqual([
        expect.objectContaining({
          code: 'INTERNAL_ERROR',
          msg: 'Unexpected failure: spawn failed',
          err: expect.objectContaining({ message: 'spawn failed' }),
        }),
      ]);
    });

    it('logs operational failures without a stack', async () => {
      const lines: string[] = [];

      const status = await run(
        ['--verbose', '--file', join(cwd, 'missing.txt')],
        environment({ logDestination: { write: (msg: string) => lines.push(msg) } })
      );

      const errors = lines
        .map((line): Record<string, unknown> => JSON.parse(line))
        .filter((entry) => entry.level === 'error');
      expect(status).toBe(1);
      expect(errors).toEqual([
        expect.objectContaining({
          failure: expect.objectContaining({ code: 'INPUT_READ_FAILED', exitStatus: 1 }),
        }),
      ]);
    });

    it('takes the command from the environment', async () => {
      const exec = executor(0);
      const status = await run(
        [],
        environment({ executor: exec, env: { CHART_OPTIONS_COMMAND: './controller --help' } })
      );

      expect(status).toBe(0);
      expect(exec.mock.calls[0][0]).toMatch(/^\.\/controller --help > /);
    });
  });
});
