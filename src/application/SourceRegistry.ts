import type Database from 'better-sqlite3';
import type { ZodError } from 'zod';
import {
  SourceInputSchema,
  SourceUpdateSchema,
  compareSources,
  type DiscoveryKind,
  type Source,
  type SourceInput,
  type SourceUpdate,
} from '../domain/entities/Source.js';
import { NotFoundError, ValidationError } from '../domain/errors/DomainErrors.js';
import { Logger } from '../shared/Logger.js';

interface SourceRow {
  id: string;
  url: string;
  subdirectory: string | null;
  priority: number;
  enabled: number;
  branch: string;
  discovery: DiscoveryKind;
  manifest_path: string;
  last_sync_time: number | null;
  last_etag: string | null;
}

function toSource(row: SourceRow): Source {
  return {
    id: row.id,
    url: row.url,
    subdirectory: row.subdirectory ?? undefined,
    priority: row.priority,
    enabled: row.enabled === 1,
    branch: row.branch,
    discovery: row.discovery,
    manifestPath: row.manifest_path,
    lastSyncTime: row.last_sync_time ?? undefined,
    lastEtag: row.last_etag ?? undefined,
  };
}

function toValidationError(err: ZodError): ValidationError {
  const issue = err.issues[0];
  const field = issue.path.join('.');
  return new ValidationError(field ? `${field}: ${issue.message}` : issue.message, field || undefined);
}

export interface UpsertSummary {
  registered: string[];
  updated: string[];
}

/**
 * Source Registry
 *
 * 管理遠端 source 設定。所有輸入先經 zod 驗證，失敗時同步拋出
 * ValidationError，不會寫入任何資料。刪除 source 時由外鍵
 * ON DELETE CASCADE 一併刪除其 tracked_artifacts 與 sync_runs。
 */
export class SourceRegistry {
  private readonly logger = new Logger('SourceRegistry');

  constructor(private readonly db: Database.Database) {}

  register(input: SourceInput): Source {
    const parsed = SourceInputSchema.safeParse(input);
    if (!parsed.success) throw toValidationError(parsed.error);
    const source = parsed.data;

    if (this.get(source.id)) {
      throw new ValidationError(`Source "${source.id}" is already registered`, 'id');
    }

    const now = Date.now();
    this.db.prepare(`
      INSERT INTO sources(id, url, subdirectory, priority, enabled, branch, discovery, manifest_path, created_at, updated_at)
      VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      source.id, source.url, source.subdirectory || null, source.priority,
      source.enabled ? 1 : 0, source.branch, source.discovery, source.manifestPath,
      now, now,
    );

    this.logger.info('Source registered', { sourceId: source.id, url: source.url, priority: source.priority });
    return this.require(source.id);
  }

  update(id: string, fields: SourceUpdate): Source {
    const existing = this.require(id);
    const parsed = SourceUpdateSchema.safeParse(fields);
    if (!parsed.success) throw toValidationError(parsed.error);
    const patch = parsed.data;

    const next: Source = {
      ...existing,
      url: patch.url ?? existing.url,
      subdirectory: patch.subdirectory !== undefined ? patch.subdirectory || undefined : existing.subdirectory,
      priority: patch.priority ?? existing.priority,
      enabled: patch.enabled ?? existing.enabled,
      branch: patch.branch ?? existing.branch,
      discovery: patch.discovery ?? existing.discovery,
      manifestPath: patch.manifestPath ?? existing.manifestPath,
    };

    // 位置改變後舊的 manifest ETag 不再有意義
    const locationChanged = next.url !== existing.url
      || next.subdirectory !== existing.subdirectory
      || next.branch !== existing.branch
      || next.manifestPath !== existing.manifestPath
      || next.discovery !== existing.discovery;

    this.db.prepare(`
      UPDATE sources
      SET url = ?, subdirectory = ?, priority = ?, enabled = ?, branch = ?, discovery = ?,
          manifest_path = ?, last_etag = ?, updated_at = ?
      WHERE id = ?
    `).run(
      next.url, next.subdirectory ?? null, next.priority, next.enabled ? 1 : 0,
      next.branch, next.discovery, next.manifestPath,
      locationChanged ? null : existing.lastEtag ?? null, Date.now(), id,
    );

    this.logger.info('Source updated', { sourceId: id, fields: Object.keys(fields) });
    return this.require(id);
  }

  remove(id: string): void {
    const result = this.db.prepare('DELETE FROM sources WHERE id = ?').run(id);
    if (result.changes === 0) {
      throw new NotFoundError('Source', id);
    }
    this.logger.info('Source removed', { sourceId: id });
  }

  get(id: string): Source | undefined {
    const row = this.db.prepare(
      'SELECT * FROM sources WHERE id = ?'
    ).get(id) as SourceRow | undefined;
    return row ? toSource(row) : undefined;
  }

  /** priority 升冪，同 priority 以 id 字典序 */
  list(enabledOnly: boolean = false): Source[] {
    const rows = this.db.prepare(
      enabledOnly ? 'SELECT * FROM sources WHERE enabled = 1' : 'SELECT * FROM sources'
    ).all() as SourceRow[];
    return rows.map(toSource).sort(compareSources);
  }

  /** sync 結束後由 orchestrator 寫回 */
  markSynced(id: string, meta: { lastSyncTime: number; lastEtag?: string }): void {
    const result = this.db.prepare(
      'UPDATE sources SET last_sync_time = ?, last_etag = ?, updated_at = ? WHERE id = ?'
    ).run(meta.lastSyncTime, meta.lastEtag ?? null, Date.now(), id);
    if (result.changes === 0) {
      throw new NotFoundError('Source', id);
    }
  }

  /**
   * 將設定檔宣告的 sources 同步進 registry：不存在則註冊，存在則更新
   * 任何一筆驗證失敗時整批不寫入
   */
  upsertMany(inputs: SourceInput[]): UpsertSummary {
    const summary: UpsertSummary = { registered: [], updated: [] };
    const apply = this.db.transaction(() => {
      for (const input of inputs) {
        const { id, ...fields } = input;
        if (this.get(id)) {
          this.update(id, fields);
          summary.updated.push(id);
        } else {
          this.register(input);
          summary.registered.push(id);
        }
      }
    });
    apply();
    return summary;
  }

  private require(id: string): Source {
    const source = this.get(id);
    if (!source) throw new NotFoundError('Source', id);
    return source;
  }
}
