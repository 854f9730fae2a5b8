import type { ArtifactCachePort } from '../domain/ports/ArtifactCachePort.js';
import type { ArtifactDiscoveryPort } from '../domain/ports/ArtifactDiscoveryPort.js';
import type { ContentHashStorePort } from '../domain/ports/ContentHashStorePort.js';
import type { FetchPort, ProbeResult } from '../domain/ports/FetchPort.js';
import type { Source } from '../domain/entities/Source.js';
import type { SyncRun } from '../domain/entities/SyncRun.js';
import { NotFoundError } from '../domain/errors/DomainErrors.js';
import { artifactUrl } from '../domain/value-objects/SourceLocation.js';
import type { SourceArtifacts } from './dto/MergedArtifactSet.js';
import type { SourceRegistry } from './SourceRegistry.js';
import { mapWithConcurrency } from '../shared/ConcurrencyPool.js';
import { Logger } from '../shared/Logger.js';

export interface SourceStatus {
  source: Source;
  trackedArtifacts: number;
  totalBytes: number;
  lastRun?: SyncRun;
}

export interface UpdateCheck {
  path: string;
  state: ProbeResult;
}

export interface UpdateCheckReport {
  sourceId: string;
  checked: number;
  changed: string[];
  unknown: string[];
  results: UpdateCheck[];
}

/**
 * 狀態查詢用例：registry 與 store 的唯讀報表，
 * 加上歷史清理與遠端更新探測。
 */
export class StatusUseCase {
  private readonly logger = new Logger('StatusUseCase');

  constructor(
    private readonly registry: SourceRegistry,
    private readonly store: ContentHashStorePort,
    private readonly fetcher: FetchPort,
    private readonly cache: ArtifactCachePort,
    private readonly discovery: ArtifactDiscoveryPort,
    private readonly probeConcurrency: number = 4,
  ) {}

  summarize(): SourceStatus[] {
    return this.registry.list().map((source) => {
      const tracked = this.store.listArtifacts(source.id);
      const [lastRun] = this.store.getRecentRuns(source.id, 1);
      return {
        source,
        trackedArtifacts: tracked.length,
        totalBytes: tracked.reduce((sum, artifact) => sum + artifact.sizeBytes, 0),
        lastRun,
      };
    });
  }

  history(sourceId: string, limit: number = 10): SyncRun[] {
    this.requireSource(sourceId);
    return this.store.getRecentRuns(sourceId, limit);
  }

  /** 以 conditional HEAD 探測每個已追蹤檔案，不下載內容也不寫入 store */
  async checkForUpdates(sourceId: string): Promise<UpdateCheckReport> {
    const source = this.requireSource(sourceId);
    const tracked = this.store.listArtifacts(sourceId);

    const results = await mapWithConcurrency(tracked, this.probeConcurrency, async (artifact) => ({
      path: artifact.path,
      state: await this.fetcher.probe(artifactUrl(source, artifact.path), artifact.etag),
    }));

    const report: UpdateCheckReport = {
      sourceId,
      checked: results.length,
      changed: results.filter((r) => r.state === 'changed').map((r) => r.path),
      unknown: results.filter((r) => r.state === 'unknown').map((r) => r.path),
      results,
    };

    this.logger.info('Update check complete', {
      sourceId,
      checked: report.checked,
      changed: report.changed.length,
      unknown: report.unknown.length,
    });
    return report;
  }

  pruneHistory(days: number, now: number = Date.now()): number {
    const deleted = this.store.pruneRunsOlderThan(days, now);
    this.logger.info('Sync history pruned', { days, deleted });
    return deleted;
  }

  /**
   * 從 store 組出 PriorityResolver 的輸入
   *
   * 只保留出現在上一份有效 listing 中、且快取檔仍存在的項目：
   * 遠端已移除的 artifact 不再進入合併結果，store 的紀錄本身保留。
   * 預設使用所有啟用的 sources。
   */
  async collectTracked(sources: Source[] = this.registry.list(true)): Promise<SourceArtifacts[]> {
    const collected: SourceArtifacts[] = [];

    for (const source of sources) {
      const listed = await this.discovery.lastListing(source);
      if (listed === undefined) {
        this.logger.warn('No cached listing for source, run sync first', { sourceId: source.id });
      }
      const current = new Set(listed ?? []);

      const artifacts = [];
      for (const artifact of this.store.listArtifacts(source.id)) {
        if (!current.has(artifact.path)) {
          this.logger.debug('Tracked artifact no longer listed', { sourceId: source.id, path: artifact.path });
          continue;
        }
        const onDisk = await this.cache.hashFile(artifact.localCachePath);
        if (onDisk === undefined) {
          this.logger.warn('Tracked artifact missing from cache', { sourceId: source.id, path: artifact.path });
          continue;
        }
        artifacts.push({
          path: artifact.path,
          contentHash: artifact.contentHash,
          localCachePath: artifact.localCachePath,
          sizeBytes: artifact.sizeBytes,
        });
      }
      collected.push({ sourceId: source.id, priority: source.priority, artifacts });
    }

    return collected;
  }

  private requireSource(sourceId: string): Source {
    const source = this.registry.get(sourceId);
    if (!source) throw new NotFoundError('Source', sourceId);
    return source;
  }
}
