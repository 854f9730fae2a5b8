import { loadConfig, resolveConfigPath } from './config/ConfigLoader.js';
import type { ArtisyncConfig, PartialConfig } from './config/types.js';
import { SourceRegistry } from './application/SourceRegistry.js';
import { SyncOrchestrator } from './application/SyncOrchestrator.js';
import { PriorityResolver } from './application/PriorityResolver.js';
import { StatusUseCase } from './application/StatusUseCase.js';
import { DatabaseManager } from './infrastructure/sqlite/DatabaseManager.js';
import { SqliteContentHashStore } from './infrastructure/sqlite/SqliteContentHashStore.js';
import { ConditionalFetcher, type FetchImpl } from './infrastructure/http/ConditionalFetcher.js';
import { FileSystemArtifactCache } from './infrastructure/cache/FileSystemArtifactCache.js';
import { DiscoveryRouter } from './infrastructure/discovery/DiscoveryRouter.js';
import { ManifestDiscovery } from './infrastructure/discovery/ManifestDiscovery.js';
import { GitHubTreeDiscovery } from './infrastructure/discovery/GitHubTreeDiscovery.js';
import { setDefaultLogLevel } from './shared/Logger.js';

export interface WorkspaceOptions {
  overrides?: PartialConfig;
  /** 測試時注入假的 fetch */
  fetchImpl?: FetchImpl;
}

export interface Workspace {
  rootDir: string;
  config: ArtisyncConfig;
  dbManager: DatabaseManager;
  registry: SourceRegistry;
  store: SqliteContentHashStore;
  cache: FileSystemArtifactCache;
  fetcher: ConditionalFetcher;
  orchestrator: SyncOrchestrator;
  resolver: PriorityResolver;
  status: StatusUseCase;
  close(): void;
}

/**
 * 依設定組裝所有元件
 *
 * 呼叫端負責 close()；CLI 以 withWorkspace 包起來。
 */
export function openWorkspace(rootDir: string, options: WorkspaceOptions = {}): Workspace {
  const config = loadConfig(rootDir, options.overrides);
  setDefaultLogLevel(config.logging.level);

  const dbManager = new DatabaseManager(resolveConfigPath(rootDir, config.cache.dbPath));
  const db = dbManager.getDb();

  const registry = new SourceRegistry(db);
  const store = new SqliteContentHashStore(db);
  const cache = new FileSystemArtifactCache(resolveConfigPath(rootDir, config.cache.root));
  const fetcher = new ConditionalFetcher({
    timeoutMs: config.fetch.timeoutMs,
    userAgent: config.fetch.userAgent,
    fetchImpl: options.fetchImpl,
  });
  const discovery = new DiscoveryRouter({
    'manifest': new ManifestDiscovery(fetcher, cache),
    'github-tree': new GitHubTreeDiscovery(fetcher, cache),
  });

  return {
    rootDir,
    config,
    dbManager,
    registry,
    store,
    cache,
    fetcher,
    orchestrator: new SyncOrchestrator(registry, discovery, fetcher, store, cache, {
      concurrency: config.sync.concurrency,
    }),
    resolver: new PriorityResolver(),
    status: new StatusUseCase(registry, store, fetcher, cache, discovery, config.sync.concurrency),
    close: () => dbManager.close(),
  };
}

export async function withWorkspace<T>(
  rootDir: string,
  fn: (workspace: Workspace) => T | Promise<T>,
  options: WorkspaceOptions = {},
): Promise<T> {
  const workspace = openWorkspace(rootDir, options);
  try {
    return await fn(workspace);
  } finally {
    workspace.close();
  }
}
