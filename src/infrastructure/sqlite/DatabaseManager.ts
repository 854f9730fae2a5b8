import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { CURRENT_SCHEMA_VERSION, MIGRATIONS, PRAGMA_SQL, SCHEMA_SQL } from './schema.js';
import { StoreError, describeError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

/** SQLite 回報的損毀類錯誤（檔案不是資料庫、頁面損毀） */
function isCorruption(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  const code = err.code;
  return typeof code === 'string' && (code === 'SQLITE_NOTADB' || code.startsWith('SQLITE_CORRUPT'));
}

/** 無法辨識的 schema（未來版本或 integrity check 失敗），可丟棄重建 */
class UnusableSchemaError extends StoreError {}

/**
 * State store 資料庫管理器
 *
 * 負責：開啟 DB、設定 PRAGMA、integrity check、建立 schema 與版本升級。
 * DB 只是遠端內容的快取：檔案損毀或 schema 無法辨識時直接刪除重建，
 * 下一次完整 sync 會重新下載所有內容。
 */
export class DatabaseManager {
  private db: Database.Database;
  private readonly logger = new Logger('DatabaseManager');
  private recreated = false;

  constructor(private readonly dbPath: string) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });

    try {
      this.db = this.open();
    } catch (err) {
      if (!isCorruption(err) && !(err instanceof UnusableSchemaError)) {
        throw new StoreError(`Cannot open state store at ${dbPath}: ${describeError(err)}`, { cause: err });
      }
      const storeError = new StoreError(`State store is unusable, recreating: ${describeError(err)}`, { cause: err });
      this.logger.warn(storeError.message, { dbPath, code: storeError.code });
      this.discardFiles();
      this.db = this.open();
      this.recreated = true;
    }

    this.logger.debug('State store initialized', { dbPath, schemaVersion: CURRENT_SCHEMA_VERSION });
  }

  getDb(): Database.Database {
    return this.db;
  }

  /** 本次開啟時是否因損毀而重建 */
  wasRecreated(): boolean {
    return this.recreated;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private open(): Database.Database {
    const db = new Database(this.dbPath);
    try {
      // PRAGMA 逐行執行，因為 pragma() 不支援批次
      for (const line of PRAGMA_SQL.trim().split('\n')) {
        const trimmed = line.trim();
        if (trimmed && !trimmed.startsWith('--')) {
          db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
        }
      }

      const check = db.pragma('quick_check', { simple: true });
      if (check !== 'ok') {
        throw new UnusableSchemaError(`quick_check reported: ${String(check)}`);
      }

      db.exec(SCHEMA_SQL);
      this.migrate(db);
      return db;
    } catch (err) {
      db.close();
      throw err;
    }
  }

  /** 依 schema_meta.version 逐版執行 migration */
  private migrate(db: Database.Database): void {
    const row = db.prepare(
      "SELECT value FROM schema_meta WHERE key = 'version'"
    ).get() as { value: string } | undefined;

    if (!row) {
      db.prepare(
        "INSERT INTO schema_meta(key, value) VALUES('version', ?)"
      ).run(String(CURRENT_SCHEMA_VERSION));
      return;
    }

    const stored = Number.parseInt(row.value, 10);
    if (!Number.isInteger(stored) || stored > CURRENT_SCHEMA_VERSION) {
      throw new UnusableSchemaError(
        `schema version ${row.value} is not supported (expected <= ${CURRENT_SCHEMA_VERSION})`,
      );
    }

    if (stored === CURRENT_SCHEMA_VERSION) return;

    const upgrade = db.transaction(() => {
      for (let version = stored + 1; version <= CURRENT_SCHEMA_VERSION; version++) {
        const sql = MIGRATIONS[version];
        if (sql) db.exec(sql);
      }
      db.prepare(
        "UPDATE schema_meta SET value = ? WHERE key = 'version'"
      ).run(String(CURRENT_SCHEMA_VERSION));
    });
    upgrade();
    this.logger.info('State store migrated', { from: stored, to: CURRENT_SCHEMA_VERSION });
  }

  private discardFiles(): void {
    for (const suffix of ['', '-wal', '-shm']) {
      fs.rmSync(this.dbPath + suffix, { force: true });
    }
  }
}
