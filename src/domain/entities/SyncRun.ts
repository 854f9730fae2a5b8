export type SyncRunStatus = 'success' | 'partial' | 'error';

/** 單一 source 單次同步的審計紀錄；寫入後不可變更 */
export interface SyncRun {
  id: number;
  sourceId: string;
  startedAt: number;
  status: SyncRunStatus;
  filesFetched: number;
  filesUnchanged: number;
  filesFailed: number;
  errorDetail?: string;
  durationMs: number;
}

export type NewSyncRun = Omit<SyncRun, 'id'>;

/**
 * 由計數推導狀態：
 * 無失敗 → success；有失敗也有成功 → partial；全部失敗 → error
 */
export function deriveRunStatus(succeeded: number, failed: number): SyncRunStatus {
  if (failed === 0) return 'success';
  return succeeded > 0 ? 'partial' : 'error';
}
