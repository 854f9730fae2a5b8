export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
PRAGMA foreign_keys = ON;
`;

export const CURRENT_SCHEMA_VERSION = 1;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sources (
  id TEXT PRIMARY KEY,
  url TEXT NOT NULL,
  subdirectory TEXT,
  priority INTEGER NOT NULL CHECK(priority >= 0),
  enabled INTEGER NOT NULL DEFAULT 1 CHECK(enabled IN (0, 1)),
  branch TEXT NOT NULL DEFAULT 'main',
  discovery TEXT NOT NULL DEFAULT 'manifest'
    CHECK(discovery IN ('manifest', 'github-tree')),
  manifest_path TEXT NOT NULL DEFAULT 'manifest.txt',
  last_sync_time INTEGER,
  last_etag TEXT,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS tracked_artifacts (
  source_id TEXT NOT NULL,
  path TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  local_cache_path TEXT NOT NULL,
  size_bytes INTEGER NOT NULL,
  etag TEXT,
  synced_at INTEGER NOT NULL,
  PRIMARY KEY (source_id, path),
  FOREIGN KEY(source_id) REFERENCES sources(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS sync_runs (
  run_id INTEGER PRIMARY KEY AUTOINCREMENT,
  source_id TEXT NOT NULL,
  started_at INTEGER NOT NULL,
  status TEXT NOT NULL CHECK(status IN ('success', 'partial', 'error')),
  files_fetched INTEGER NOT NULL DEFAULT 0,
  files_unchanged INTEGER NOT NULL DEFAULT 0,
  files_failed INTEGER NOT NULL DEFAULT 0,
  error_detail TEXT,
  duration_ms INTEGER NOT NULL DEFAULT 0,
  FOREIGN KEY(source_id) REFERENCES sources(id) ON DELETE CASCADE
);

CREATE TRIGGER IF NOT EXISTS sync_runs_append_only
BEFORE UPDATE ON sync_runs
BEGIN
  SELECT RAISE(ABORT, 'sync_runs is append-only');
END;

CREATE INDEX IF NOT EXISTS idx_sources_priority ON sources(priority, id);
CREATE INDEX IF NOT EXISTS idx_tracked_content_hash ON tracked_artifacts(content_hash);
CREATE INDEX IF NOT EXISTS idx_sync_runs_source ON sync_runs(source_id, run_id);
CREATE INDEX IF NOT EXISTS idx_sync_runs_started ON sync_runs(started_at);
`;

/**
 * 版本升級用的 migration，key 為目標版本
 * v1 即 SCHEMA_SQL 本身，之後的版本在此追加
 */
export const MIGRATIONS: Record<number, string> = {};
