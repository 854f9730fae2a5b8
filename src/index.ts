export { openWorkspace, withWorkspace } from './workspace.js';
export type { Workspace, WorkspaceOptions } from './workspace.js';

export { loadConfig, resolveConfigPath } from './config/ConfigLoader.js';
export type { ArtisyncConfig, PartialConfig } from './config/types.js';

export { SourceRegistry } from './application/SourceRegistry.js';
export { SyncOrchestrator } from './application/SyncOrchestrator.js';
export type { SyncOptions, SyncOrchestratorConfig } from './application/SyncOrchestrator.js';
export { PriorityResolver } from './application/PriorityResolver.js';
export { StatusUseCase } from './application/StatusUseCase.js';
export type { SourceStatus, UpdateCheckReport } from './application/StatusUseCase.js';
export type * from './application/dto/SyncReport.js';
export type * from './application/dto/MergedArtifactSet.js';

export { DatabaseManager } from './infrastructure/sqlite/DatabaseManager.js';
export { SqliteContentHashStore } from './infrastructure/sqlite/SqliteContentHashStore.js';
export { ConditionalFetcher } from './infrastructure/http/ConditionalFetcher.js';
export type { ConditionalFetcherConfig, FetchImpl } from './infrastructure/http/ConditionalFetcher.js';
export { FileSystemArtifactCache } from './infrastructure/cache/FileSystemArtifactCache.js';
export { DiscoveryRouter } from './infrastructure/discovery/DiscoveryRouter.js';
export { ManifestDiscovery } from './infrastructure/discovery/ManifestDiscovery.js';
export { GitHubTreeDiscovery } from './infrastructure/discovery/GitHubTreeDiscovery.js';
export { parseManifest } from './infrastructure/discovery/ManifestParser.js';

export type { Source, SourceInput, SourceUpdate, DiscoveryKind } from './domain/entities/Source.js';
export type { TrackedArtifact } from './domain/entities/TrackedArtifact.js';
export type { SyncRun, SyncRunStatus } from './domain/entities/SyncRun.js';
export type { FetchPort, FetchResult, ProbeResult } from './domain/ports/FetchPort.js';
export type { ContentHashStorePort } from './domain/ports/ContentHashStorePort.js';
export type { ArtifactDiscoveryPort, DiscoveryResult } from './domain/ports/ArtifactDiscoveryPort.js';
export type { ArtifactCachePort } from './domain/ports/ArtifactCachePort.js';
export {
  ArtisyncError,
  ValidationError,
  NotFoundError,
  FetchError,
  IntegrityError,
  StoreError,
} from './domain/errors/DomainErrors.js';
export { isSafeRelativePath, artifactNameOf } from './domain/value-objects/ArtifactPath.js';
export { ContentHash } from './domain/value-objects/ContentHash.js';
