import type { ArtisyncConfig } from './types.js';

export const CONFIG_FILE_NAME = '.artisync.json';

export const DEFAULT_CONFIG: ArtisyncConfig = {
  version: 1,
  cache: {
    root: '.artisync/cache',
    dbPath: '.artisync/state.db',
  },
  fetch: {
    timeoutMs: 30000, // 30 秒
    userAgent: 'artisync',
  },
  sync: {
    concurrency: 4,
    historyRetentionDays: 30,
  },
  logging: {
    level: 'info',
  },
  sources: [],
};

export const MAX_CONCURRENCY = 16;
