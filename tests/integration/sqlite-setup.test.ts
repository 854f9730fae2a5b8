import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { CURRENT_SCHEMA_VERSION } from '../../src/infrastructure/sqlite/schema.js';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';

describe('DatabaseManager', () => {
  let tmpDir: string;
  let dbPath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'artisync-db-'));
    dbPath = path.join(tmpDir, 'nested', 'state.db');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function schemaVersion(mgr: DatabaseManager): string | undefined {
    const row = mgr.getDb().prepare(
      "SELECT value FROM schema_meta WHERE key = 'version'"
    ).get() as { value: string } | undefined;
    return row?.value;
  }

  it('should create database with WAL mode and all tables', () => {
    const mgr = new DatabaseManager(dbPath);
    const db = mgr.getDb();

    // 確認 WAL 模式
    expect(db.pragma('journal_mode', { simple: true })).toBe('wal');
    expect(db.pragma('foreign_keys', { simple: true })).toBe(1);

    const tables = (db.prepare(
      "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name"
    ).all() as Array<{ name: string }>).map((r) => r.name);

    expect(tables).toContain('schema_meta');
    expect(tables).toContain('sources');
    expect(tables).toContain('tracked_artifacts');
    expect(tables).toContain('sync_runs');

    const triggers = (db.prepare(
      "SELECT name FROM sqlite_master WHERE type='trigger'"
    ).all() as Array<{ name: string }>).map((r) => r.name);
    expect(triggers).toEqual(['sync_runs_append_only']);

    expect(schemaVersion(mgr)).toBe(String(CURRENT_SCHEMA_VERSION));
    expect(mgr.wasRecreated()).toBe(false);
    mgr.close();
  });

  it('should set busy_timeout', () => {
    const mgr = new DatabaseManager(dbPath);
    const timeout = mgr.getDb().pragma('busy_timeout', { simple: true });
    expect(Number(timeout)).toBeGreaterThanOrEqual(5000);
    mgr.close();
  });

  it('should keep data across reopen', () => {
    const first = new DatabaseManager(dbPath);
    first.getDb().prepare(
      "INSERT INTO sources(id, url, priority, created_at, updated_at) VALUES('team', 'https://example.test', 1, 0, 0)"
    ).run();
    first.close();

    const second = new DatabaseManager(dbPath);
    const count = second.getDb().prepare('SELECT COUNT(*) AS cnt FROM sources').get() as { cnt: number };
    expect(count.cnt).toBe(1);
    expect(second.wasRecreated()).toBe(false);
    second.close();
  });

  /**
   * Scenario: state store 損毀
   * Given state.db 是一個不是 SQLite 的檔案
   * When 開啟
   * Then 刪除後重建空的 schema，wasRecreated() 為 true
   */
  it('should recreate a corrupt database file', () => {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    fs.writeFileSync(dbPath, Buffer.alloc(1024, 'x'));

    const mgr = new DatabaseManager(dbPath);

    expect(mgr.wasRecreated()).toBe(true);
    expect(schemaVersion(mgr)).toBe(String(CURRENT_SCHEMA_VERSION));
    const count = mgr.getDb().prepare('SELECT COUNT(*) AS cnt FROM sources').get() as { cnt: number };
    expect(count.cnt).toBe(0);
    mgr.close();
  });

  it('should recreate a database written by a newer schema version', () => {
    const first = new DatabaseManager(dbPath);
    first.getDb().prepare(
      "INSERT INTO sources(id, url, priority, created_at, updated_at) VALUES('team', 'https://example.test', 1, 0, 0)"
    ).run();
    first.getDb().prepare("UPDATE schema_meta SET value = '99' WHERE key = 'version'").run();
    first.close();

    const second = new DatabaseManager(dbPath);

    expect(second.wasRecreated()).toBe(true);
    expect(schemaVersion(second)).toBe(String(CURRENT_SCHEMA_VERSION));
    const count = second.getDb().prepare('SELECT COUNT(*) AS cnt FROM sources').get() as { cnt: number };
    expect(count.cnt).toBe(0);
    second.close();
  });

  it('should tolerate close() being called twice', () => {
    const mgr = new DatabaseManager(dbPath);
    mgr.close();
    expect(() => mgr.close()).not.toThrow();
  });
});
