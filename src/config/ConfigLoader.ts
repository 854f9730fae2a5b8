import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG, MAX_CONCURRENCY } from './defaults.js';
import type { ArtisyncConfig, PartialConfig } from './types.js';
import { SourceInputSchema } from '../domain/entities/Source.js';
import { ValidationError } from '../domain/errors/DomainErrors.js';
import { isLogLevel } from '../shared/Logger.js';

export type { ArtisyncConfig, PartialConfig } from './types.js';

/** 設定檔的外型檢查；細部數值交給 validate() */
const FileConfigSchema = z.object({
  version: z.number().optional(),
  cache: z.object({ root: z.string(), dbPath: z.string() }).partial().optional(),
  fetch: z.object({ timeoutMs: z.number(), userAgent: z.string() }).partial().optional(),
  sync: z.object({ concurrency: z.number(), historyRetentionDays: z.number() }).partial().optional(),
  logging: z.object({ level: z.string() }).partial().optional(),
  sources: z.array(z.unknown()).optional(),
});

/** 逐區塊合併：partial 覆蓋 base */
function merge(base: ArtisyncConfig, partial: PartialConfig): ArtisyncConfig {
  return {
    version: partial.version ?? base.version,
    cache: { ...base.cache, ...partial.cache },
    fetch: { ...base.fetch, ...partial.fetch },
    sync: { ...base.sync, ...partial.sync },
    logging: { ...base.logging, ...partial.logging },
    sources: partial.sources ?? base.sources,
  };
}

function readConfigFile(configPath: string): PartialConfig {
  if (!fs.existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ValidationError(`${CONFIG_FILE_NAME} is not valid JSON`, undefined, { cause: err });
  }

  const parsed = FileConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`${CONFIG_FILE_NAME}: ${issue.path.join('.')} ${issue.message}`, issue.path.join('.'));
  }

  const { logging, sources, ...rest } = parsed.data;
  const level = logging?.level;
  if (level !== undefined && !isLogLevel(level)) {
    throw new ValidationError(`logging.level must be one of debug, info, warn, error`, 'logging.level');
  }
  return {
    ...rest,
    logging: level !== undefined ? { level } : undefined,
    sources: sources?.map((entry, i) => parseSource(entry, i)),
  };
}

function parseSource(entry: unknown, index: number) {
  const parsed = SourceInputSchema.safeParse(entry);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(`sources[${index}].${issue.path.join('.')}: ${issue.message}`, `sources[${index}]`);
  }
  return parsed.data;
}

/** 環境變數覆蓋：ARTISYNC_CACHE_DIR → cache.root，ARTISYNC_LOG_LEVEL → logging.level */
function applyEnvOverrides(config: ArtisyncConfig): void {
  const cacheDir = process.env.ARTISYNC_CACHE_DIR;
  if (cacheDir) {
    config.cache.root = cacheDir;
  }
  const level = process.env.ARTISYNC_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    config.logging.level = level;
  }
}

/** 驗證設定值的合法性 */
function validate(config: ArtisyncConfig): void {
  if (!Number.isInteger(config.fetch.timeoutMs) || config.fetch.timeoutMs <= 0) {
    throw new ValidationError('fetch.timeoutMs must be a positive integer', 'fetch.timeoutMs');
  }
  const { concurrency } = config.sync;
  if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
    throw new ValidationError(`sync.concurrency must be an integer between 1 and ${MAX_CONCURRENCY}`, 'sync.concurrency');
  }
  if (!Number.isInteger(config.sync.historyRetentionDays) || config.sync.historyRetentionDays <= 0) {
    throw new ValidationError('sync.historyRetentionDays must be a positive integer', 'sync.historyRetentionDays');
  }

  const seen = new Set<string>();
  for (const source of config.sources) {
    if (seen.has(source.id)) {
      throw new ValidationError(`duplicate source id "${source.id}" in configuration`, 'sources');
    }
    seen.add(source.id);
  }
}

/**
 * 載入設定：讀取 .artisync.json（若存在）並合併到預設值上
 * @param rootDir - 設定檔所在目錄，也是相對路徑的基準
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  rootDir: string,
  overrides?: PartialConfig,
): ArtisyncConfig {
  const fileConfig = readConfigFile(path.join(rootDir, CONFIG_FILE_NAME));

  // 合併順序：defaults < file config < overrides
  let merged = merge(structuredClone(DEFAULT_CONFIG), fileConfig);
  if (overrides) {
    merged = merge(merged, overrides);
  }

  applyEnvOverrides(merged);

  validate(merged);
  return merged;
}

/** 相對路徑以 rootDir 為基準轉為絕對路徑 */
export function resolveConfigPath(rootDir: string, target: string): string {
  return path.isAbsolute(target) ? target : path.resolve(rootDir, target);
}
