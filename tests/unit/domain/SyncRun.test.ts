import { describe, it, expect } from 'vitest';
import { deriveRunStatus } from '../../../src/domain/entities/SyncRun.js';
import { compareSources } from '../../../src/domain/entities/Source.js';

describe('deriveRunStatus', () => {
  it('should be success when nothing failed', () => {
    expect(deriveRunStatus(3, 0)).toBe('success');
    expect(deriveRunStatus(0, 0)).toBe('success');
  });

  it('should be partial when some files failed', () => {
    expect(deriveRunStatus(2, 1)).toBe('partial');
  });

  it('should be error when every file failed', () => {
    expect(deriveRunStatus(0, 4)).toBe('error');
  });
});

describe('compareSources', () => {
  it('should order by priority, then by id', () => {
    const sources = [
      { id: 'zeta', priority: 10 },
      { id: 'beta', priority: 20 },
      { id: 'alpha', priority: 10 },
    ];
    expect([...sources].sort(compareSources).map((s) => s.id)).toEqual(['alpha', 'zeta', 'beta']);
  });
});
