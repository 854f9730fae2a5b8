import type Database from 'better-sqlite3';
import type {
  ContentHashStorePort,
  PurgeResult,
  RecordFileInput,
} from '../../domain/ports/ContentHashStorePort.js';
import type { TrackedArtifact } from '../../domain/entities/TrackedArtifact.js';
import type { NewSyncRun, SyncRun, SyncRunStatus } from '../../domain/entities/SyncRun.js';

interface ArtifactRow {
  source_id: string;
  path: string;
  content_hash: string;
  local_cache_path: string;
  size_bytes: number;
  etag: string | null;
  synced_at: number;
}

interface RunRow {
  run_id: number;
  source_id: string;
  started_at: number;
  status: SyncRunStatus;
  files_fetched: number;
  files_unchanged: number;
  files_failed: number;
  error_detail: string | null;
  duration_ms: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function toArtifact(row: ArtifactRow): TrackedArtifact {
  return {
    sourceId: row.source_id,
    path: row.path,
    contentHash: row.content_hash,
    localCachePath: row.local_cache_path,
    sizeBytes: row.size_bytes,
    etag: row.etag ?? undefined,
    syncedAt: row.synced_at,
  };
}

function toRun(row: RunRow): SyncRun {
  return {
    id: row.run_id,
    sourceId: row.source_id,
    startedAt: row.started_at,
    status: row.status,
    filesFetched: row.files_fetched,
    filesUnchanged: row.files_unchanged,
    filesFailed: row.files_failed,
    errorDetail: row.error_detail ?? undefined,
    durationMs: row.duration_ms,
  };
}

/**
 * Content hash store：每檔內容雜湊與 sync 歷史
 *
 * tracked_artifacts 以 (source_id, path) upsert；
 * sync_runs 只追加，UPDATE 會被 trigger 擋下。
 * 每次寫入都是獨立的 statement/transaction。
 */
export class SqliteContentHashStore implements ContentHashStorePort {
  constructor(private readonly db: Database.Database) {}

  getHash(sourceId: string, path: string): string | undefined {
    const row = this.db.prepare(
      'SELECT content_hash FROM tracked_artifacts WHERE source_id = ? AND path = ?'
    ).get(sourceId, path) as { content_hash: string } | undefined;
    return row?.content_hash;
  }

  getArtifact(sourceId: string, path: string): TrackedArtifact | undefined {
    const row = this.db.prepare(
      'SELECT * FROM tracked_artifacts WHERE source_id = ? AND path = ?'
    ).get(sourceId, path) as ArtifactRow | undefined;
    return row ? toArtifact(row) : undefined;
  }

  listArtifacts(sourceId: string): TrackedArtifact[] {
    const rows = this.db.prepare(
      'SELECT * FROM tracked_artifacts WHERE source_id = ? ORDER BY path'
    ).all(sourceId) as ArtifactRow[];
    return rows.map(toArtifact);
  }

  recordFile(input: RecordFileInput): void {
    this.db.prepare(`
      INSERT INTO tracked_artifacts(source_id, path, content_hash, local_cache_path, size_bytes, etag, synced_at)
      VALUES(?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(source_id, path) DO UPDATE SET
        content_hash = excluded.content_hash,
        local_cache_path = excluded.local_cache_path,
        size_bytes = excluded.size_bytes,
        etag = excluded.etag,
        synced_at = excluded.synced_at
    `).run(
      input.sourceId, input.path, input.contentHash,
      input.localCachePath, input.sizeBytes, input.etag ?? null, Date.now(),
    );
  }

  hasChanged(sourceId: string, path: string, currentHash: string): boolean {
    const stored = this.getHash(sourceId, path);
    return stored === undefined || stored !== currentHash;
  }

  recordSyncRun(run: NewSyncRun): number {
    const result = this.db.prepare(`
      INSERT INTO sync_runs(source_id, started_at, status, files_fetched, files_unchanged, files_failed, error_detail, duration_ms)
      VALUES(?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      run.sourceId, run.startedAt, run.status,
      run.filesFetched, run.filesUnchanged, run.filesFailed,
      run.errorDetail ?? null, run.durationMs,
    );
    return Number(result.lastInsertRowid);
  }

  /** 最新的在前 */
  getRecentRuns(sourceId: string, limit: number = 10): SyncRun[] {
    const rows = this.db.prepare(
      'SELECT * FROM sync_runs WHERE source_id = ? ORDER BY run_id DESC LIMIT ?'
    ).all(sourceId, Math.max(0, Math.floor(limit))) as RunRow[];
    return rows.map(toRun);
  }

  /** 刪除早於 days 天前開始的 sync 紀錄，回傳刪除筆數 */
  pruneRunsOlderThan(days: number, now: number = Date.now()): number {
    const cutoff = now - days * DAY_MS;
    const result = this.db.prepare(
      'DELETE FROM sync_runs WHERE started_at < ?'
    ).run(cutoff);
    return result.changes;
  }

  /** 清除 source 的所有追蹤紀錄與歷史，source 本身保留 */
  purgeSource(sourceId: string): PurgeResult {
    const purge = this.db.transaction((id: string): PurgeResult => {
      const artifacts = this.db.prepare('DELETE FROM tracked_artifacts WHERE source_id = ?').run(id);
      const runs = this.db.prepare('DELETE FROM sync_runs WHERE source_id = ?').run(id);
      return { artifactsDeleted: artifacts.changes, runsDeleted: runs.changes };
    });
    return purge(sourceId);
  }
}
