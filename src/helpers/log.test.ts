import { test, expect, describe } from 'vitest';
import { Logger, createMemorySink, levelFromFlags } from './log';

describe('Logger', () => {
  test('picks the level from flags, debug first', () => {
    expect(levelFromFlags({})).toBe('normal');
    expect(levelFromFlags({ verbose: true })).toBe('verbose');
    expect(levelFromFlags({ verbose: true, debug: true })).toBe('debug');
  });

  test('prefixes severities and routes them to stderr', () => {
    const sink = createMemorySink();
    const logger = new Logger('normal', sink);
    logger.error('restore failed');
    logger.warn('remote repository');
    logger.info('Duration: 3s');
    logger.success('done');
    expect(sink.errors).toEqual(['❌ Error: restore failed', '⚠️  Warning: remote repository']);
    expect(sink.lines).toEqual(['Duration: 3s', '✅ done']);
  });

  test('drops verbose and debug output at normal level', () => {
    const sink = createMemorySink();
    const logger = new Logger('normal', sink);
    logger.verbose('hidden');
    logger.debug('hidden');
    expect(sink.lines).toEqual([]);
    expect(sink.errors).toEqual([]);
  });

  test('debug level includes verbose output', () => {
    const sink = createMemorySink();
    const logger = new Logger('debug', sink);
    logger.verbose('loaded set');
    logger.debug('restic check');
    expect(sink.lines).toEqual(['» loaded set']);
    expect(sink.errors).toEqual(['🐛 Debug: restic check']);
  });
});
