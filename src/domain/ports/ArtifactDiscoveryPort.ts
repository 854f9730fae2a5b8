import type { Source } from '../entities/Source.js';

export interface DiscoveryOptions {
  force?: boolean;
}

export interface DiscoveredPaths {
  ok: true;
  /** 已通過安全規則、去重且排序的相對路徑 */
  paths: string[];
  /** 被安全規則拒絕的原始條目 */
  rejected: string[];
  /** manifest 的 ETag（寫回 Source.lastEtag） */
  etag?: string;
}

export interface DiscoveryFailure {
  ok: false;
  detail: string;
}

export type DiscoveryResult = DiscoveredPaths | DiscoveryFailure;

/** 列舉 source 可同步的 artifact 路徑；不同 hosting API 各自實作 */
export interface ArtifactDiscoveryPort {
  discover(source: Source, options?: DiscoveryOptions): Promise<DiscoveryResult>;
  /** 上一次成功 discover 的路徑（不連網）；從未成功過時回傳 undefined */
  lastListing(source: Source): Promise<string[] | undefined>;
}
