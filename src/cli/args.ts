/**
 * Command-line Argument Parsing
 * @module cli/args
 *
 * Turns argv into configuration overrides for the highest-priority config
 * layer. Nothing here validates values beyond what is needed to build the
 * override object; the zod schema does the rest.
 */

import { UsageError } from '../errors/index.js';
import type { RawConfig } from '../config/index.js';

// ============================================================================
// Types
// ============================================================================

export interface CliArguments {
  help: boolean;
  verbose: boolean;
  /** Explicit configuration file; must exist */
  configFile?: string;
  overrides: RawConfig;
}

// ============================================================================
// Option Table
// ============================================================================

/** Options that take a value, with their short aliases */
const VALUE_OPTIONS = new Map<string, string>([
  ['--config', '--config'],
  ['--file', '--file'],
  ['-f', '--file'],
  ['--command', '--command'],
  ['--build-command', '--build-command'],
  ['--marker', '--marker'],
  ['--cwd', '--cwd'],
  ['--policy', '--policy'],
  ['--exclude', '--exclude'],
  ['--exclude-pattern', '--exclude-pattern'],
  ['--only', '--only'],
  ['--out', '--out'],
  ['-o', '--out'],
  ['--values-root', '--values-root'],
  ['--indent', '--indent'],
  ['--collisions', '--collisions'],
]);

const SWITCH_OPTIONS = new Map<string, string>([
  ['--builtin', '--builtin'],
  ['--stdin', '--stdin'],
  ['--help', '--help'],
  ['-h', '--help'],
  ['--verbose', '--verbose'],
  ['-v', '--verbose'],
]);

const COMMAND_ONLY_OPTIONS = ['--build-command', '--marker', '--cwd'] as const;

// ============================================================================
// Parsing
// ============================================================================

/**
 * Parse command-line arguments (without the node and script entries)
 *
 * @throws UsageError on unknown options, missing values or conflicting sources
 */
export function parseArgs(argv: readonly string[]): CliArguments {
  const values = new Map<string, string>();
  const excludes: string[] = [];
  const excludePatterns: string[] = [];
  const sources: string[] = [];
  let help = false;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);

    const switchName = SWITCH_OPTIONS.get(name);
    if (switchName && eq === -1) {
      if (switchName === '--help') {
        help = true;
      } else if (switchName === '--verbose') {
        verbose = true;
      } else {
        sources.push(switchName);
      }
      continue;
    }

    const valueName = VALUE_OPTIONS.get(name);
    if (!valueName) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      // A value starting with a dash must be attached: --marker=--
      const nextArg = argv[i + 1];
      if (nextArg !== undefined && !nextArg.startsWith('-')) {
        value = nextArg;
        i++;
      }
    }
    if (value === undefined || value === '') {
      throw new UsageError(`Option ${valueName} requires a value`);
    }

    if (valueName === '--exclude') {
      excludes.push(value);
    } else if (valueName === '--exclude-pattern') {
      excludePatterns.push(value);
    } else {
      if (valueName === '--file' || valueName === '--command') {
        sources.push(valueName);
      }
      values.set(valueName, value);
    }
  }

  if (sources.length > 1) {
    throw new UsageError(`Only one input source may be given, got ${sources.join(', ')}`);
  }

  // Without a source flag, command options refine a command configured elsewhere
  const [source] = sources;
  if (source !== undefined && source !== '--command') {
    const stray = COMMAND_ONLY_OPTIONS.find((option) => values.has(option));
    if (stray) {
      throw new UsageError(`Option ${stray} cannot be combined with ${source}`);
    }
  }

  return {
    help,
    verbose,
    configFile: values.get('--config'),
    overrides: {
      source: sourceOverride(source, values),
      exclusions: {
        policy: values.get('--policy'),
        names: excludes.length > 0 ? excludes : undefined,
        patterns: excludePatterns.length > 0 ? excludePatterns : undefined,
      },
      collisions: values.get('--collisions'),
      output: {
        sections: values.get('--only'),
        file: values.get('--out'),
        valuesRoot: values.get('--values-root'),
        indent: values.get('--indent'),
      },
    },
  };
}

/**
 * Source override for the argument layer. Command options given without
 * `--command` yield a command source with no command, which merges into a
 * command source from the environment or config file; the schema rejects it
 * when there is none.
 */
function sourceOverride(source: string | undefined, values: Map<string, string>): RawConfig | undefined {
  if (source === undefined && COMMAND_ONLY_OPTIONS.some((option) => values.has(option))) {
    source = '--command';
  }
  switch (source) {
    case '--builtin':
      return { kind: 'builtin' };
    case '--stdin':
      return { kind: 'stdin' };
    case '--file':
      return { kind: 'file', path: values.get('--file') };
    case '--command':
      return {
        kind: 'command',
        command: values.get('--command'),
        buildCommand: values.get('--build-command'),
        marker: values.get('--marker'),
        cwd: values.get('--cwd'),
      };
    default:
      return undefined;
  }
}

// ============================================================================
// Help
// ============================================================================

export const HELP_TEXT = `
Chart Options Generator

Generates Helm container-argument template blocks and a default
configuration stanza from a controller's --help listing.

Usage:
  generate-chart-options [options]

A value that starts with a dash must be attached: --marker=--

Input (one of; default: the bundled sample listing):
  --builtin                  Use the bundled sample listing
  -f, --file <path>          Read a saved help listing
  --stdin                    Read the help listing from standard input
  --command <cmd>            Run <cmd> and capture its help output
  --build-command <cmd>      Build step run before the help command
  --marker <text>            Keep only captured lines containing <text> (default: --)
  --cwd <dir>                Working directory for both commands
                             These three also refine a command set by
                             CHART_OPTIONS_COMMAND or the config file

Filtering:
  --policy <name>            Exclusion policy: pattern, exact-set or none (default: pattern)
  --exclude <flag>           Also exclude this flag name (repeatable)
  --exclude-pattern <regex>  Also exclude flags matching <regex> (repeatable)
  --collisions <mode>        Shared keys: warn, error or ignore (default: warn)

Output:
  --only <section>           Print only template or configuration
  -o, --out <path>           Write to <path> instead of standard output
  --values-root <name>       Values section holding the keys (default: configuration)
  --indent <n>               Indentation of template lines (default: 8)

General:
  --config <path>            Configuration file (default: .chart-options.yaml if present)
  -v, --verbose              Log debug output to stderr
  -h, --help                 Show this help message

Examples:
  generate-chart-options --file flags.txt
  generate-chart-options --build-command "make build" --command "./bin/controller --help"
  ./bin/controller --help | generate-chart-options --stdin --only configuration
`;
