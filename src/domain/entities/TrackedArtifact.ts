/** 每個 (sourceId, path) 最後一次已知的內容雜湊與快取位置 */
export interface TrackedArtifact {
  sourceId: string;
  /** 相對於 source 根目錄的路徑（forward slash） */
  path: string;
  contentHash: string;
  localCachePath: string;
  sizeBytes: number;
  /** 伺服器最後回傳的 ETag，下次 conditional GET 使用 */
  etag?: string;
  syncedAt: number;
}
