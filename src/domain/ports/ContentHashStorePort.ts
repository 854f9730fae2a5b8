import type { TrackedArtifact } from '../entities/TrackedArtifact.js';
import type { NewSyncRun, SyncRun } from '../entities/SyncRun.js';

export interface RecordFileInput {
  sourceId: string;
  path: string;
  contentHash: string;
  localCachePath: string;
  sizeBytes: number;
  etag?: string;
}

export interface PurgeResult {
  artifactsDeleted: number;
  runsDeleted: number;
}

export interface ContentHashStorePort {
  getHash(sourceId: string, path: string): string | undefined;
  getArtifact(sourceId: string, path: string): TrackedArtifact | undefined;
  listArtifacts(sourceId: string): TrackedArtifact[];
  recordFile(input: RecordFileInput): void;
  /** 沒見過的路徑一律視為已變更 */
  hasChanged(sourceId: string, path: string, currentHash: string): boolean;

  recordSyncRun(run: NewSyncRun): number;
  getRecentRuns(sourceId: string, limit?: number): SyncRun[];
  pruneRunsOlderThan(days: number, now?: number): number;

  purgeSource(sourceId: string): PurgeResult;
}
