import { describe, it, expect } from 'vitest';
import { Logger, isLogLevel } from '../../../src/shared/Logger.js';

describe('Logger', () => {
  it('should write one JSON line per entry with context and data', () => {
    const lines: string[] = [];
    const logger = new Logger('SyncOrchestrator', 'debug', (line) => lines.push(line));

    logger.info('Source synced', { sourceId: 'team', filesFetched: 2 });

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 'info',
      context: 'SyncOrchestrator',
      message: 'Source synced',
      sourceId: 'team',
      filesFetched: 2,
    });
    expect(entry).toHaveProperty('timestamp');
  });

  it('should drop entries below the minimum level', () => {
    const lines: string[] = [];
    const logger = new Logger('PriorityResolver', 'warn', (line) => lines.push(line));

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown too');

    expect(lines.map((line) => JSON.parse(line).level)).toEqual(['warn', 'error']);
  });

  it('should recognise valid levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('error')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
