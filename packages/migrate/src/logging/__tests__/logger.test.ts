/**
 * @fileoverview Tests for MigrationLogger
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Writable } from 'node:stream';
import pino from 'pino';
import { MigrationLogger, createLogger, getLogger, resetLogger } from '../logger.js';
import { isLogLevel } from '../types.js';

function captureLogger(level: pino.Level = 'trace'): { logger: MigrationLogger; lines: () => Record<string, unknown>[] } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  const logger = new MigrationLogger(pino({ level, base: undefined, timestamp: false }, stream));
  return {
    logger,
    lines: () =>
      chunks
        .join('')
        .split('\n')
        .filter((line) => line.length > 0)
        .map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe('MigrationLogger', () => {
  it('should accept (msg), (msg, data) and (data, msg)', () => {
    const { logger, lines } = captureLogger();
    logger.info('plain');
    logger.info('with data', { table: 'people' });
    logger.warn({ version: 2 }, 'data first');

    expect(lines()).toEqual([
      { level: 30, msg: 'plain' },
      { level: 30, msg: 'with data', table: 'people' },
      { level: 40, msg: 'data first', version: 2 },
    ]);
  });

  it('should serialize errors under err', () => {
    const { logger, lines } = captureLogger();
    logger.error('failed', new Error('boom'));

    const [entry] = lines();
    expect(entry?.msg).toBe('failed');
    expect(entry?.err).toMatchObject({ type: 'Error', message: 'boom' });
  });

  it('should carry context into child loggers', () => {
    const { logger, lines } = captureLogger();
    const child = logger.child({ component: 'executor', version: 3 });
    child.debug('applying');

    expect(child.getContext()).toEqual({ component: 'executor', version: 3 });
    expect(lines()).toEqual([{ level: 20, msg: 'applying', component: 'executor', version: 3 }]);
  });

  it('should respect the configured level', () => {
    const { logger, lines } = captureLogger('warn');
    logger.info('hidden');
    logger.warn('shown');

    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(lines()).toEqual([{ level: 40, msg: 'shown' }]);
  });

  it('should time work and log the duration at debug level', () => {
    const { logger, lines } = captureLogger();
    const done = logger.startTimer('Version applied', { version: 1 });
    const duration = done();

    expect(duration).toBeGreaterThanOrEqual(0);
    const [entry] = lines();
    expect(entry).toMatchObject({ level: 20, msg: 'Version applied completed', version: 1 });
    expect(typeof entry?.durationMs).toBe('number');
  });
});

describe('default logger', () => {
  beforeEach(() => {
    resetLogger();
  });

  afterEach(() => {
    resetLogger();
  });

  it('should be a singleton until reset', () => {
    const first = getLogger({ level: 'fatal' });
    expect(getLogger()).toBe(first);
    resetLogger();
    expect(getLogger({ level: 'fatal' })).not.toBe(first);
  });

  it('should create component loggers with context', () => {
    getLogger({ level: 'fatal' });
    expect(createLogger('schema', { schema: 'app' }).getContext()).toEqual({ component: 'schema', schema: 'app' });
  });
});

describe('isLogLevel', () => {
  it('should recognize pino levels', () => {
    expect(isLogLevel('trace')).toBe(true);
    expect(isLogLevel('silent')).toBe(false);
  });
});
