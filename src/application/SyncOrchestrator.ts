import path from 'node:path';
import type { ArtifactCachePort } from '../domain/ports/ArtifactCachePort.js';
import type { ArtifactDiscoveryPort, DiscoveryResult } from '../domain/ports/ArtifactDiscoveryPort.js';
import type { ContentHashStorePort } from '../domain/ports/ContentHashStorePort.js';
import type { FetchPort, UpdatedResult } from '../domain/ports/FetchPort.js';
import type { TrackedArtifact } from '../domain/entities/TrackedArtifact.js';
import { compareSources, type Source } from '../domain/entities/Source.js';
import { deriveRunStatus } from '../domain/entities/SyncRun.js';
import { IntegrityError, StoreError, describeError } from '../domain/errors/DomainErrors.js';
import { ContentHash } from '../domain/value-objects/ContentHash.js';
import { artifactUrl } from '../domain/value-objects/SourceLocation.js';
import type { SourceRegistry } from './SourceRegistry.js';
import type { ArtifactRef, FileFailure, SourceSyncResult, SyncReport } from './dto/SyncReport.js';
import { KeyedMutex } from '../shared/KeyedMutex.js';
import { mapWithConcurrency } from '../shared/ConcurrencyPool.js';
import { Logger } from '../shared/Logger.js';

export interface SyncOrchestratorConfig {
  /** 單一 source 內的平行 worker 數，預設 4 */
  concurrency?: number;
}

export interface SyncOptions {
  /** 忽略 ETag，全部重新下載 */
  force?: boolean;
}

/** 單一 source 同步過程中的累計 */
interface Tally {
  fetched: number;
  unchanged: number;
  errors: FileFailure[];
  divergences: string[];
  succeeded: Set<string>;
}

/** errorDetail 最多列出幾個失敗檔案 */
const MAX_DETAILED_FAILURES = 5;

function summarizeFailures(errors: FileFailure[]): string {
  const listed = errors
    .slice(0, MAX_DETAILED_FAILURES)
    .map((failure) => `${failure.path}: ${failure.detail}`);
  const more = errors.length > MAX_DETAILED_FAILURES ? ` (+${errors.length - MAX_DETAILED_FAILURES} more)` : '';
  return `${errors.length} file(s) failed: ${listed.join('; ')}${more}`;
}

/**
 * Sync Orchestrator
 *
 * 對每個啟用的 source（priority 升冪）：列舉路徑 → conditional fetch →
 * 原子寫入快取 → 記錄雜湊 → 寫入一筆 sync_runs。
 *
 * 單檔或單一 source 的失敗只會累計到報告裡，不會中斷其他工作。
 * ETag 回報 304 時仍以內容雜湊驗證快取檔（雙重驗證），
 * 不一致就強制重抓：內容雜湊才是判斷是否變更的依據。
 */
export class SyncOrchestrator {
  private readonly logger = new Logger('SyncOrchestrator');
  private readonly mutex = new KeyedMutex();
  private readonly concurrency: number;

  constructor(
    private readonly registry: SourceRegistry,
    private readonly discovery: ArtifactDiscoveryPort,
    private readonly fetcher: FetchPort,
    private readonly store: ContentHashStorePort,
    private readonly cache: ArtifactCachePort,
    config: SyncOrchestratorConfig = {},
  ) {
    this.concurrency = Math.max(1, Math.floor(config.concurrency ?? 4));
  }

  async sync(sources: Source[], options: SyncOptions = {}): Promise<SyncReport> {
    const startedAt = Date.now();
    const force = options.force ?? false;
    const ordered = sources.filter((source) => source.enabled).sort(compareSources);

    // 逐一處理 source；報告順序即 priority 順序
    const results: SourceSyncResult[] = [];
    for (const source of ordered) {
      results.push(await this.syncSource(source, force));
    }

    const totals = results.reduce(
      (acc, r) => ({
        filesFetched: acc.filesFetched + r.filesFetched,
        filesUnchanged: acc.filesUnchanged + r.filesUnchanged,
        filesFailed: acc.filesFailed + r.filesFailed,
      }),
      { filesFetched: 0, filesUnchanged: 0, filesFailed: 0 },
    );

    const report: SyncReport = {
      startedAt,
      durationMs: Date.now() - startedAt,
      sources: results,
      totals,
    };

    this.logger.info('Sync complete', {
      sources: results.length,
      ...totals,
      durationMs: report.durationMs,
    });
    return report;
  }

  private async syncSource(source: Source, force: boolean): Promise<SourceSyncResult> {
    const start = Date.now();
    const tally: Tally = { fetched: 0, unchanged: 0, errors: [], divergences: [], succeeded: new Set() };

    this.logger.info('Syncing source', { sourceId: source.id, url: source.url, force });

    let discovered: DiscoveryResult;
    try {
      discovered = await this.discovery.discover(source, { force });
    } catch (err) {
      discovered = { ok: false, detail: `discovery failed: ${describeError(err)}` };
    }

    let errorDetail: string | undefined;
    let rejectedPaths: string[] = [];
    let paths: string[] = [];

    if (discovered.ok) {
      rejectedPaths = discovered.rejected;
      paths = [...new Set(discovered.paths)];
      const sourceDir = this.cache.sourceDir(source);

      await mapWithConcurrency(paths, this.concurrency, (relPath) =>
        this.mutex.runExclusive(`${source.id}\u0000${relPath}`, () =>
          this.syncFile(source, sourceDir, relPath, force, tally),
        ),
      );

      if (tally.errors.length > 0) {
        errorDetail = summarizeFailures(tally.errors);
      }
    } else {
      errorDetail = discovered.detail;
      this.logger.warn('Discovery failed', { sourceId: source.id, detail: discovered.detail });
    }

    const status = discovered.ok
      ? deriveRunStatus(tally.fetched + tally.unchanged, tally.errors.length)
      : 'error';
    const durationMs = Date.now() - start;

    let runId: number | undefined;
    try {
      runId = this.store.recordSyncRun({
        sourceId: source.id,
        startedAt: start,
        status,
        filesFetched: tally.fetched,
        filesUnchanged: tally.unchanged,
        filesFailed: tally.errors.length,
        errorDetail,
        durationMs,
      });
    } catch (err) {
      const storeError = new StoreError(`Failed to record sync run: ${describeError(err)}`, { cause: err });
      this.logger.error(storeError.message, { sourceId: source.id });
    }

    try {
      this.registry.markSynced(source.id, {
        lastSyncTime: Date.now(),
        lastEtag: discovered.ok ? discovered.etag : source.lastEtag,
      });
    } catch (err) {
      this.logger.error('Failed to update source sync metadata', { sourceId: source.id, error: describeError(err) });
    }

    const result: SourceSyncResult = {
      sourceId: source.id,
      priority: source.priority,
      status,
      filesFetched: tally.fetched,
      filesUnchanged: tally.unchanged,
      filesFailed: tally.errors.length,
      errors: tally.errors,
      rejectedPaths,
      divergences: tally.divergences,
      runId,
      durationMs,
      artifacts: this.collectArtifacts(source.id, paths.filter((p) => tally.succeeded.has(p))),
    };

    this.logger.info('Source synced', {
      sourceId: source.id,
      status,
      filesFetched: result.filesFetched,
      filesUnchanged: result.filesUnchanged,
      filesFailed: result.filesFailed,
      durationMs,
    });
    return result;
  }

  /** 處理單一檔案；所有預期內的失敗都記進 tally，不拋出 */
  private async syncFile(
    source: Source,
    sourceDir: string,
    relPath: string,
    force: boolean,
    tally: Tally,
  ): Promise<void> {
    const url = artifactUrl(source, relPath);
    const localPath = path.join(sourceDir, ...relPath.split('/'));

    const fail = (detail: string): void => {
      tally.errors.push({ path: relPath, detail });
      this.logger.warn('Artifact sync failed', { sourceId: source.id, path: relPath, detail });
    };

    try {
      const tracked = this.store.getArtifact(source.id, relPath);
      const result = await this.fetcher.fetch(url, tracked?.etag, force);

      if (result.kind === 'error') {
        fail(result.detail);
        return;
      }

      if (result.kind === 'updated') {
        await this.storeContent(source, relPath, localPath, result);
        tally.fetched++;
        tally.succeeded.add(relPath);
        return;
      }

      const divergence = await this.verifyCached(source, relPath, localPath, tracked);
      if (!divergence) {
        tally.unchanged++;
        tally.succeeded.add(relPath);
        return;
      }

      tally.divergences.push(relPath);
      this.logger.warn(divergence.message, {
        sourceId: source.id,
        path: relPath,
        code: divergence.code,
        expectedHash: divergence.expectedHash,
        actualHash: divergence.actualHash,
      });

      const refetch = await this.fetcher.fetch(url, undefined, true);
      if (refetch.kind === 'updated') {
        await this.storeContent(source, relPath, localPath, refetch);
        tally.fetched++;
        tally.succeeded.add(relPath);
      } else if (refetch.kind === 'error') {
        fail(refetch.detail);
      } else {
        fail('server reported not modified on a forced refetch');
      }
    } catch (err) {
      fail(describeError(err));
    }
  }

  /**
   * 雙重驗證：304 時重新計算快取檔雜湊並與 store 比對
   * 回傳 undefined 表示快取可信
   */
  private async verifyCached(
    source: Source,
    relPath: string,
    localPath: string,
    tracked: TrackedArtifact | undefined,
  ): Promise<IntegrityError | undefined> {
    const currentHash = await this.cache.hashFile(localPath);
    if (currentHash === undefined) {
      return new IntegrityError(
        `Cache file missing for ${relPath} although the server reported it unchanged, refetching`,
        relPath, tracked?.contentHash, undefined,
      );
    }
    if (this.store.hasChanged(source.id, relPath, currentHash)) {
      return new IntegrityError(
        `Hash/ETag divergence for ${relPath}: cached content does not match the recorded hash, refetching`,
        relPath, tracked?.contentHash, currentHash,
      );
    }
    return undefined;
  }

  private async storeContent(
    source: Source,
    relPath: string,
    localPath: string,
    result: UpdatedResult,
  ): Promise<void> {
    await this.cache.writeAtomic(localPath, result.content);
    this.store.recordFile({
      sourceId: source.id,
      path: relPath,
      contentHash: ContentHash.fromBytes(result.content).value,
      localCachePath: localPath,
      sizeBytes: result.content.byteLength,
      etag: result.etag,
    });
    this.logger.debug('Artifact updated', { sourceId: source.id, path: relPath, sizeBytes: result.content.byteLength });
  }

  private collectArtifacts(sourceId: string, paths: string[]): ArtifactRef[] {
    const refs: ArtifactRef[] = [];
    for (const relPath of paths) {
      const tracked = this.store.getArtifact(sourceId, relPath);
      if (tracked) {
        refs.push({
          path: tracked.path,
          contentHash: tracked.contentHash,
          localCachePath: tracked.localCachePath,
          sizeBytes: tracked.sizeBytes,
        });
      }
    }
    return refs;
  }
}
