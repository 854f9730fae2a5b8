import { describe, it, expect } from 'vitest';
import { OutputFormatter } from '../../../src/cli/formatters/OutputFormatter.js';
import type { SyncReport } from '../../../src/application/dto/SyncReport.js';
import type { MergedArtifactSet } from '../../../src/application/dto/MergedArtifactSet.js';

const formatter = new OutputFormatter();

const report: SyncReport = {
  startedAt: 0,
  durationMs: 12,
  sources: [{
    sourceId: 'team',
    priority: 1,
    status: 'partial',
    filesFetched: 1,
    filesUnchanged: 2,
    filesFailed: 1,
    errors: [{ path: 'agents/x.md', detail: 'HTTP 500' }],
    rejectedPaths: ['../y.md'],
    divergences: ['agents/z.md'],
    runId: 7,
    durationMs: 10,
    artifacts: [],
  }],
  totals: { filesFetched: 1, filesUnchanged: 2, filesFailed: 1 },
};

describe('OutputFormatter', () => {
  it('should render a sync report as text', () => {
    expect(formatter.formatSyncReport(report, 'text').split('\n')).toEqual([
      'team [partial] fetched=1 unchanged=2 failed=1 (10ms)',
      '    ! agents/x.md: HTTP 500',
      '    rejected path: ../y.md',
      '    refetched after hash mismatch: agents/z.md',
      'Total: fetched=1 unchanged=2 failed=1',
    ]);
  });

  it('should say so when no source was synced', () => {
    const empty: SyncReport = { ...report, sources: [] };
    expect(formatter.formatSyncReport(empty, 'text')).toBe('No enabled sources.');
  });

  it('should serialize Map values as objects in json mode', () => {
    const merged: MergedArtifactSet = {
      artifacts: new Map([['reviewer', {
        name: 'reviewer',
        sourceId: 'team',
        priority: 1,
        path: 'agents/reviewer.md',
        contentHash: 'abc',
        localCachePath: '/cache/team/agents/reviewer.md',
      }]]),
      conflicts: [],
      warnings: [],
    };

    const parsed: unknown = JSON.parse(formatter.formatMerged(merged, 'json'));

    expect(parsed).toEqual({
      artifacts: {
        reviewer: {
          name: 'reviewer',
          sourceId: 'team',
          priority: 1,
          path: 'agents/reviewer.md',
          contentHash: 'abc',
          localCachePath: '/cache/team/agents/reviewer.md',
        },
      },
      conflicts: [],
      warnings: [],
    });
  });

  it('should flatten nested objects to indented text', () => {
    expect(formatter.formatObject({ action: 'purged', counts: { runs: 2 } }, 'text'))
      .toBe('action: purged\ncounts:\n  runs: 2');
  });
});
