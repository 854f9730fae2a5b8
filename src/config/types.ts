import type { LogLevel } from '../shared/Logger.js';
import type { SourceInput } from '../domain/entities/Source.js';

/** 快取與 state store 位置（相對路徑以設定檔所在目錄為基準） */
export interface CacheConfig {
  root: string;
  dbPath: string;
}

/** HTTP 抓取設定 */
export interface FetchConfig {
  /** 單次請求逾時（毫秒）；逾時會重試一次 */
  timeoutMs: number;
  userAgent: string;
}

/** 同步設定 */
export interface SyncConfig {
  /** 單一 source 內平行抓檔的 worker 數 */
  concurrency: number;
  /** `history prune` 預設保留天數 */
  historyRetentionDays: number;
}

export interface LoggingConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface ArtisyncConfig {
  version: number;
  cache: CacheConfig;
  fetch: FetchConfig;
  sync: SyncConfig;
  logging: LoggingConfig;
  /** 設定檔宣告的 sources，sync 前 upsert 進 registry */
  sources: SourceInput[];
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in Exclude<keyof ArtisyncConfig, 'sources'>]?: Partial<ArtisyncConfig[K]>;
} & {
  sources?: SourceInput[];
};
