import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { openWorkspace, type Workspace } from '../../src/workspace.js';
import { NotFoundError } from '../../src/domain/errors/DomainErrors.js';
import { FakeRemote } from '../helpers/FakeRemote.js';

const TEAM = 'https://cdn.example.test/team';
const DAY_MS = 24 * 60 * 60 * 1000;

describe('StatusUseCase', () => {
  let tmpDir: string;
  let remote: FakeRemote;
  let ws: Workspace;

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'artisync-status-'));
    remote = new FakeRemote();
    ws = openWorkspace(tmpDir, { fetchImpl: remote.fetch });

    ws.registry.register({ id: 'team', url: TEAM, priority: 1 });
    remote.set(`${TEAM}/manifest.txt`, 'agents/a.md\nagents/b.md\nskills/lint/SKILL.md\n', '"m1"');
    remote.set(`${TEAM}/agents/a.md`, 'aaaa', '"a1"');
    remote.set(`${TEAM}/agents/b.md`, 'bb', '"b1"');
    remote.set(`${TEAM}/skills/lint/SKILL.md`, 'skill', '"s1"');
    await ws.orchestrator.sync(ws.registry.list(true));
  });

  afterEach(() => {
    ws.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('summarize', () => {
    it('should count tracked artifacts and bytes per source', () => {
      ws.registry.register({ id: 'idle', url: 'https://cdn.example.test/idle', priority: 9 });

      const summary = ws.status.summarize();

      expect(summary.map((s) => [s.source.id, s.trackedArtifacts, s.totalBytes])).toEqual([
        ['team', 3, 11],
        ['idle', 0, 0],
      ]);
      expect(summary[0].lastRun?.status).toBe('success');
      expect(summary[1].lastRun).toBeUndefined();
    });
  });

  describe('history', () => {
    it('should return runs newest first within the limit', async () => {
      await ws.orchestrator.sync(ws.registry.list(true));

      const runs = ws.status.history('team', 1);

      expect(runs).toHaveLength(1);
      expect(runs[0].filesUnchanged).toBe(3);
    });

    it('should reject an unknown source', () => {
      expect(() => ws.status.history('ghost')).toThrow(NotFoundError);
    });
  });

  describe('checkForUpdates', () => {
    /**
     * Scenario: 只用 HEAD 探測
     * Given b.md 在遠端已更新、SKILL.md 暫時無法取得
     * When checkForUpdates
     * Then b.md 為 changed、SKILL.md 為 unknown，且沒有任何 GET
     */
    it('should classify each tracked file with conditional HEAD requests', async () => {
      remote.set(`${TEAM}/agents/b.md`, 'bb v2', '"b2"');
      remote.fail(`${TEAM}/skills/lint/SKILL.md`, 500);
      remote.requests.length = 0;

      const report = await ws.status.checkForUpdates('team');

      expect(report).toMatchObject({
        sourceId: 'team',
        checked: 3,
        changed: ['agents/b.md'],
        unknown: ['skills/lint/SKILL.md'],
      });
      expect(report.results.find((r) => r.path === 'agents/a.md')?.state).toBe('unchanged');
      expect(remote.requests.every((r) => r.method === 'HEAD')).toBe(true);
      expect(ws.store.getArtifact('team', 'agents/b.md')?.etag).toBe('"b1"');
    });

    it('should reject an unknown source', async () => {
      await expect(ws.status.checkForUpdates('ghost')).rejects.toThrow(NotFoundError);
    });
  });

  describe('pruneHistory', () => {
    it('should delete runs older than the retention window', () => {
      const now = Date.now();
      ws.store.recordSyncRun({
        sourceId: 'team', startedAt: now - 40 * DAY_MS, status: 'success',
        filesFetched: 1, filesUnchanged: 0, filesFailed: 0, durationMs: 5,
      });

      const deleted = ws.status.pruneHistory(30, now);

      expect(deleted).toBe(1);
      expect(ws.status.history('team')).toHaveLength(1);
    });
  });

  describe('collectTracked', () => {
    it('should list cached artifacts of enabled sources', async () => {
      const collected = await ws.status.collectTracked();

      expect(collected).toHaveLength(1);
      expect(collected[0].sourceId).toBe('team');
      expect(collected[0].priority).toBe(1);
      expect(collected[0].artifacts.map((a) => a.path)).toEqual([
        'agents/a.md', 'agents/b.md', 'skills/lint/SKILL.md',
      ]);
    });

    it('should skip entries whose cache file was deleted', async () => {
      const tracked = ws.store.getArtifact('team', 'agents/a.md');
      if (!tracked) throw new Error('expected agents/a.md to be tracked');
      fs.rmSync(tracked.localCachePath);

      const collected = await ws.status.collectTracked();

      expect(collected[0].artifacts.map((a) => a.path)).toEqual(['agents/b.md', 'skills/lint/SKILL.md']);
    });

    /**
     * Scenario: 遠端移除 artifact
     * Given manifest 原本列出 a.md、b.md、SKILL.md
     * When manifest 改為只列 b.md 並重新 sync
     * Then collectTracked 只回傳 b.md，store 的紀錄仍保留
     */
    it('should drop artifacts that are no longer listed', async () => {
      remote.set(`${TEAM}/manifest.txt`, 'agents/b.md\n', '"m2"');
      await ws.orchestrator.sync(ws.registry.list(true));

      const collected = await ws.status.collectTracked();

      expect(collected[0].artifacts.map((a) => a.path)).toEqual(['agents/b.md']);
      expect([...ws.resolver.resolve(collected).artifacts.keys()]).toEqual(['b']);
      expect(ws.store.listArtifacts('team')).toHaveLength(3);
    });

    it('should keep the last valid listing when a new one is rejected', async () => {
      remote.set(`${TEAM}/manifest.txt`, '{ "files": ', '"m3"');
      const report = await ws.orchestrator.sync(ws.registry.list(true));

      const collected = await ws.status.collectTracked();

      expect(report.sources[0].status).toBe('error');
      expect(collected[0].artifacts.map((a) => a.path)).toEqual([
        'agents/a.md', 'agents/b.md', 'skills/lint/SKILL.md',
      ]);
    });

    it('should return no artifacts for a source that was never synced', async () => {
      ws.registry.register({ id: 'idle', url: 'https://cdn.example.test/idle', priority: 9 });

      const collected = await ws.status.collectTracked();

      expect(collected.map((c) => [c.sourceId, c.artifacts.length])).toEqual([['team', 3], ['idle', 0]]);
    });

    it('should feed the priority resolver', async () => {
      const merged = ws.resolver.resolve(await ws.status.collectTracked());

      expect([...merged.artifacts.keys()]).toEqual(['a', 'b', 'lint']);
      expect(merged.artifacts.get('lint')?.sourceId).toBe('team');
    });
  });
});
