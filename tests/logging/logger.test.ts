/**
 * Logger Tests
 * @module tests/logging/logger
 */

import { describe, it, expect } from 'vitest';
import type { DestinationStream } from 'pino';
import { createLogger, getLogger, initLogger, resetLogger } from '../../src/logging/index.js';

function memoryDestination(): DestinationStream & { entries(): Record<string, unknown>[] } {
  const lines: string[] = [];
  return {
    write(msg: string) {
      lines.push(msg);
    },
    entries() {
      return lines.map((line): Record<string, unknown> => JSON.parse(line));
    },
  };
}

describe('createLogger', () => {
  it('writes structured entries with a label level', () => {
    const destination = memoryDestination();
    const logger = createLogger('test', { level: 'debug', destination });

    logger.keyCollision('googleCloudDNSTtl', ['google-clouddns.ttl', 'google-clouddns-ttl']);

    expect(destination.entries()).toEqual([
      expect.objectContaining({
        level: 'warn',
        name: 'test',
        event: 'key_collision',
        key: 'googleCloudDNSTtl',
        flags: ['google-clouddns.ttl', 'google-clouddns-ttl'],
        msg: 'Configuration key googleCloudDNSTtl is shared by --google-clouddns.ttl, --google-clouddns-ttl',
      }),
    ]);
  });

  it('logs exclusions at debug level', () => {
    const destination = memoryDestination();
    const logger = createLogger('test', { level: 'debug', destination });

    logger.flagExcluded('help', 'exact:help');

    expect(destination.entries()).toEqual([
      expect.objectContaining({ level: 'debug', event: 'flag_excluded', msg: 'Excluded --help (exact:help)' }),
    ]);
  });

  it('drops entries below the configured level', () => {
    const destination = memoryDestination();
    const logger = createLogger('test', { level: 'warn', destination });

    logger.flagExcluded('help', 'exact:help');
    logger.generationCompleted(3, 1, 5);

    expect(destination.entries()).toEqual([]);
  });

  it('keeps domain methods on context loggers', () => {
    const destination = memoryDestination();
    const logger = createLogger('test', { level: 'info', destination }).withContext({ module: 'generator' });

    logger.generationCompleted(42, 10, 3);

    expect(destination.entries()).toEqual([
      expect.objectContaining({
        level: 'info',
        module: 'generator',
        event: 'generation_completed',
        optionCount: 42,
        excludedCount: 10,
        durationMs: 3,
        msg: 'Generated 42 chart options (10 excluded) in 3ms',
      }),
    ]);
  });

  it('reports failed commands at error level', () => {
    const destination = memoryDestination();
    const logger = createLogger('test', { level: 'error', destination });

    logger.captureFailed('make build', 2);

    expect(destination.entries()).toEqual([
      expect.objectContaining({
        level: 'error',
        command: 'make build',
        exitCode: 2,
        msg: 'Command failed with exit status 2: make build',
      }),
    ]);
  });
});

describe('root logger', () => {
  it('is created once and replaced by initLogger', () => {
    resetLogger();
    const first = getLogger();

    expect(getLogger()).toBe(first);

    const replaced = initLogger({ level: 'silent' });
    expect(getLogger()).toBe(replaced);
    expect(replaced).not.toBe(first);
  });

  it('takes its level from LOG_LEVEL', () => {
    resetLogger();

    expect(getLogger().level).toBe('silent');
  });
});
