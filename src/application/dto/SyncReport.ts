import type { SyncRunStatus } from '../../domain/entities/SyncRun.js';

export interface FileFailure {
  path: string;
  detail: string;
}

/** 同步後可在快取中取得的 artifact，作為 PriorityResolver 的輸入 */
export interface ArtifactRef {
  path: string;
  contentHash: string;
  localCachePath: string;
  sizeBytes: number;
}

/** 單一 source 的同步結果 */
export interface SourceSyncResult {
  sourceId: string;
  priority: number;
  status: SyncRunStatus;
  filesFetched: number;
  filesUnchanged: number;
  filesFailed: number;
  errors: FileFailure[];
  /** 被路徑安全規則拒絕的 manifest 條目 */
  rejectedPaths: string[];
  /** ETag 回報未變更但雜湊不一致、已強制重抓的路徑 */
  divergences: string[];
  /** sync_runs 紀錄 id；寫入失敗時為 undefined */
  runId?: number;
  durationMs: number;
  artifacts: ArtifactRef[];
}

/** 一次 sync 呼叫的完整報告，sources 依 priority 排序 */
export interface SyncReport {
  startedAt: number;
  durationMs: number;
  sources: SourceSyncResult[];
  totals: {
    filesFetched: number;
    filesUnchanged: number;
    filesFailed: number;
  };
}
