import path from 'node:path';
import type {
  ArtifactDiscoveryPort,
  DiscoveryOptions,
  DiscoveryResult,
} from '../../domain/ports/ArtifactDiscoveryPort.js';
import type { ArtifactCachePort } from '../../domain/ports/ArtifactCachePort.js';
import type { FetchPort, FetchResult } from '../../domain/ports/FetchPort.js';
import type { Source } from '../../domain/entities/Source.js';
import { describeError } from '../../domain/errors/DomainErrors.js';
import type { ParsedManifest } from './ManifestParser.js';
import { Logger } from '../../shared/Logger.js';

/**
 * 以 conditional GET 取得 listing（manifest 或 tree API 回應）的共用流程
 *
 * 304 時讀取快取中的上一份 listing；快取遺失時強制重抓。
 * listing 與 artifact 走同一個 FetchPort。
 */
export abstract class ConditionalListingDiscovery implements ArtifactDiscoveryPort {
  protected readonly logger: Logger;

  constructor(
    protected readonly fetcher: FetchPort,
    protected readonly cache: ArtifactCachePort,
    loggerContext: string,
  ) {
    this.logger = new Logger(loggerContext);
  }

  /** listing 的 URL；無法建構時回傳錯誤訊息 */
  protected abstract listingUrl(source: Source): { url: string } | { error: string };

  /** 快取在 source 目錄下的檔名 */
  protected abstract readonly cacheFileName: string;

  /** 解析 listing；格式錯誤時拋出 ValidationError */
  protected abstract parse(text: string, source: Source): ParsedManifest;

  async discover(source: Source, options: DiscoveryOptions = {}): Promise<DiscoveryResult> {
    const target = this.listingUrl(source);
    if ('error' in target) {
      return { ok: false, detail: target.error };
    }

    const cachedPath = this.cachedListingPath(source);
    let result: FetchResult = await this.fetcher.fetch(target.url, source.lastEtag, options.force ?? false);
    let text: string | undefined;
    let etag = source.lastEtag;

    if (result.kind === 'fresh') {
      const cached = await this.cache.readBytes(cachedPath);
      if (cached) {
        text = cached.toString('utf-8');
      } else {
        this.logger.warn('Cached listing missing, refetching', { sourceId: source.id, url: target.url });
        result = await this.fetcher.fetch(target.url, undefined, true);
      }
    }

    if (result.kind === 'error') {
      return { ok: false, detail: `listing unavailable: ${result.detail}` };
    }
    if (result.kind === 'updated') {
      text = result.content.toString('utf-8');
      etag = result.etag;
    }
    if (text === undefined) {
      return { ok: false, detail: `listing unavailable: server reported not modified without a cached copy` };
    }

    let parsed: ParsedManifest;
    try {
      parsed = this.parse(text, source);
    } catch (err) {
      return { ok: false, detail: `listing rejected: ${describeError(err)}` };
    }

    // 只保存解析成功的 listing，快取副本永遠是最後一份有效列表
    if (result.kind === 'updated') {
      await this.cache.writeAtomic(cachedPath, result.content);
    }

    if (parsed.rejected.length > 0) {
      this.logger.warn('Unsafe paths dropped from listing', { sourceId: source.id, rejected: parsed.rejected });
    }
    this.logger.debug('Listing discovered', { sourceId: source.id, paths: parsed.paths.length });

    return { ok: true, paths: parsed.paths, rejected: parsed.rejected, etag };
  }

  async lastListing(source: Source): Promise<string[] | undefined> {
    const cached = await this.cache.readBytes(this.cachedListingPath(source));
    if (!cached) return undefined;

    try {
      return this.parse(cached.toString('utf-8'), source).paths;
    } catch (err) {
      this.logger.warn('Cached listing unreadable', { sourceId: source.id, error: describeError(err) });
      return undefined;
    }
  }

  private cachedListingPath(source: Source): string {
    return path.join(this.cache.sourceDir(source), this.cacheFileName);
  }
}
