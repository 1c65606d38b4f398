import { describe, expect, it } from 'vitest';

import {
  createLogger,
  isLogLevel,
  logLevelFromEnv,
  silentLogger,
} from '../logger.js';

describe('createLogger', () => {
  it('writes prefixed lines at or above the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger('warn', (line) => lines.push(line));

    logger.error('boom');
    logger.warn('careful');
    logger.info('fyi');
    logger.debug('noise');

    expect(lines).toEqual(['[nsmap] error: boom\n', '[nsmap] warn: careful\n']);
  });

  it('writes everything at debug and nothing when silent', () => {
    const lines: string[] = [];
    const debug = createLogger('debug', (line) => lines.push(line));
    debug.debug('d');
    debug.info('i');
    expect(lines).toEqual(['[nsmap] debug: d\n', '[nsmap] info: i\n']);

    const quiet: string[] = [];
    const silent = createLogger('silent', (line) => quiet.push(line));
    silent.error('e');
    expect(quiet).toEqual([]);
    expect(silentLogger.level).toBe('silent');
  });
});

describe('log levels', () => {
  it('validates level names', () => {
    expect(isLogLevel('info')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });

  it('reads NSMAP_LOG_LEVEL case-insensitively with a warn default', () => {
    expect(logLevelFromEnv({ NSMAP_LOG_LEVEL: ' Debug ' })).toBe('debug');
    expect(logLevelFromEnv({ NSMAP_LOG_LEVEL: 'loud' })).toBe('warn');
    expect(logLevelFromEnv({})).toBe('warn');
  });
});
