import type {
  ArtifactDiscoveryPort,
  DiscoveryOptions,
  DiscoveryResult,
} from '../../domain/ports/ArtifactDiscoveryPort.js';
import type { DiscoveryKind, Source } from '../../domain/entities/Source.js';

/** 依 source.discovery 分派到對應的實作 */
export class DiscoveryRouter implements ArtifactDiscoveryPort {
  constructor(private readonly strategies: Record<DiscoveryKind, ArtifactDiscoveryPort>) {}

  discover(source: Source, options?: DiscoveryOptions): Promise<DiscoveryResult> {
    return this.strategies[source.discovery].discover(source, options);
  }

  lastListing(source: Source): Promise<string[] | undefined> {
    return this.strategies[source.discovery].lastListing(source);
  }
}
