import type { ArtifactRef } from './SyncReport.js';

/** 各 source 提供的 artifacts */
export interface SourceArtifacts {
  sourceId: string;
  priority: number;
  artifacts: ArtifactRef[];
}

/** 勝出的 artifact */
export interface ResolvedArtifact {
  name: string;
  sourceId: string;
  priority: number;
  path: string;
  contentHash: string;
  localCachePath: string;
}

/** 被較高優先權 source 遮蔽的同名 artifact（僅供診斷） */
export interface ShadowedConflict {
  name: string;
  winner: { sourceId: string; path: string; priority: number };
  shadowed: { sourceId: string; path: string; priority: number };
  /** 同 priority，以 source id 字典序決定勝負 */
  samePriority: boolean;
}

export interface MergedArtifactSet {
  /** 邏輯名稱 → 勝出的 artifact，依名稱排序插入 */
  artifacts: Map<string, ResolvedArtifact>;
  conflicts: ShadowedConflict[];
  warnings: string[];
}
