import type { ArtifactCachePort } from '../../domain/ports/ArtifactCachePort.js';
import type { FetchPort } from '../../domain/ports/FetchPort.js';
import type { Source } from '../../domain/entities/Source.js';
import { artifactUrl } from '../../domain/value-objects/SourceLocation.js';
import { ConditionalListingDiscovery } from './ConditionalListingDiscovery.js';
import { parseManifest, type ParsedManifest } from './ManifestParser.js';

/** 由 repo 內提交的 index 檔（純文字或 JSON）列舉 artifacts */
export class ManifestDiscovery extends ConditionalListingDiscovery {
  protected readonly cacheFileName = '.artisync-manifest';

  constructor(fetcher: FetchPort, cache: ArtifactCachePort) {
    super(fetcher, cache, 'ManifestDiscovery');
  }

  protected listingUrl(source: Source): { url: string } {
    return { url: artifactUrl(source, source.manifestPath) };
  }

  protected parse(text: string): ParsedManifest {
    return parseManifest(text);
  }
}
