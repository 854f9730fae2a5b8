import { z } from 'zod';
import type { ArtifactCachePort } from '../../domain/ports/ArtifactCachePort.js';
import type { FetchPort } from '../../domain/ports/FetchPort.js';
import type { Source } from '../../domain/entities/Source.js';
import { ValidationError } from '../../domain/errors/DomainErrors.js';
import { parseGitHubRepo } from '../../domain/value-objects/SourceLocation.js';
import { ConditionalListingDiscovery } from './ConditionalListingDiscovery.js';
import { sanitizeEntries, type ParsedManifest } from './ManifestParser.js';

const TreeResponseSchema = z.object({
  tree: z.array(z.object({
    path: z.string(),
    type: z.string(),
  })),
  truncated: z.boolean().optional(),
});

export const GITHUB_API_BASE = 'https://api.github.com';

/**
 * 透過 GitHub git trees API（recursive）列舉 subdirectory 下的 `.md` blob
 *
 * 未認證的 API 有 rate limit（每小時 60 次），
 * 靠 ETag 讓未變更的 tree 回 304。
 */
export class GitHubTreeDiscovery extends ConditionalListingDiscovery {
  protected readonly cacheFileName = '.artisync-tree.json';

  constructor(
    fetcher: FetchPort,
    cache: ArtifactCachePort,
    private readonly apiBase: string = GITHUB_API_BASE,
  ) {
    super(fetcher, cache, 'GitHubTreeDiscovery');
  }

  protected listingUrl(source: Source): { url: string } | { error: string } {
    const repo = parseGitHubRepo(source.url);
    if (!repo) {
      return { error: `github-tree discovery requires a github.com repository URL, got ${source.url}` };
    }
    const branch = encodeURIComponent(source.branch);
    return { url: `${this.apiBase}/repos/${repo.owner}/${repo.repo}/git/trees/${branch}?recursive=1` };
  }

  protected parse(text: string, source: Source): ParsedManifest {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new ValidationError('Tree listing is not valid JSON', 'tree', { cause: err });
    }
    const parsed = TreeResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError('Tree listing does not match the git trees API format', 'tree');
    }
    if (parsed.data.truncated) {
      this.logger.warn('Tree listing truncated by GitHub, some artifacts may be missing', { sourceId: source.id });
    }

    const prefix = source.subdirectory ? `${source.subdirectory}/` : '';
    const entries = parsed.data.tree
      .filter((entry) => entry.type === 'blob')
      .map((entry) => entry.path)
      .filter((entryPath) => entryPath.startsWith(prefix) && entryPath.toLowerCase().endsWith('.md'))
      .map((entryPath) => entryPath.slice(prefix.length));

    return sanitizeEntries(entries);
  }
}
