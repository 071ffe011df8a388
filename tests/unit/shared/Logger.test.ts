import { describe, it, expect } from 'vitest';
import { isLogLevel, Logger } from '../../../src/shared/Logger.js';

function capture(level: 'debug' | 'info' | 'warn' | 'error' = 'info') {
  const lines: string[] = [];
  const logger = new Logger('Test', level, (line) => lines.push(line));
  return { logger, lines };
}

describe('Logger', () => {
  it('should write one JSON object per entry', () => {
    const { logger, lines } = capture();

    logger.info('Session committed', { lines: 3 });

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 'info',
      context: 'Test',
      message: 'Session committed',
      lines: 3,
    });
    expect(typeof entry.timestamp).toBe('string');
  });

  it('should drop entries below the minimum level', () => {
    const { logger, lines } = capture('warn');

    logger.debug('a');
    logger.info('b');
    logger.warn('c');
    logger.error('d');

    expect(lines.map((l) => JSON.parse(l).message)).toEqual(['c', 'd']);
  });

  it('should share level and sink with child loggers', () => {
    const { logger, lines } = capture('warn');
    const child = logger.child('Dispatcher');

    child.info('hidden');
    child.warn('shown');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({ context: 'Dispatcher', message: 'shown' });
  });

  it('isLogLevel should accept only known levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('')).toBe(false);
  });
});
