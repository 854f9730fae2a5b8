import type { FetchPort, FetchResult, ProbeResult } from '../../domain/ports/FetchPort.js';
import { FetchError, describeError } from '../../domain/errors/DomainErrors.js';
import { withRetry } from '../../shared/RetryPolicy.js';
import { Logger } from '../../shared/Logger.js';

export type FetchImpl = typeof globalThis.fetch;

export interface ConditionalFetcherConfig {
  /** 單次請求逾時（毫秒），預設 30 秒 */
  timeoutMs?: number;
  userAgent?: string;
  /** 測試時注入假的 fetch */
  fetchImpl?: FetchImpl;
}

interface RawResponse {
  status: number;
  statusText: string;
  etag?: string;
  body?: Buffer;
}

export function isTimeoutError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('name' in err)) return false;
  return err.name === 'TimeoutError';
}

/**
 * Conditional Fetcher
 *
 * 以 ETag 做 conditional GET：304 → fresh，2xx → updated，
 * 其餘狀態、網路錯誤、逾時 → error（不拋出）。
 * 逾時只重試一次且不退避；sync 是隨需執行，不需要持續重試。
 */
export class ConditionalFetcher implements FetchPort {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchImpl: FetchImpl;
  private readonly logger = new Logger('ConditionalFetcher');

  constructor(config: ConditionalFetcherConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? 30000;
    this.userAgent = config.userAgent ?? 'artisync';
    this.fetchImpl = config.fetchImpl ?? ((input, init) => globalThis.fetch(input, init));
  }

  async fetch(url: string, knownEtag?: string, force: boolean = false): Promise<FetchResult> {
    const headers = this.buildHeaders(force ? undefined : knownEtag);

    let response: RawResponse;
    try {
      response = await this.requestWithTimeoutRetry(url, 'GET', headers);
    } catch (err) {
      const fetchError = new FetchError(`GET ${url} failed: ${describeError(err)}`, url, undefined, { cause: err });
      this.logger.warn(fetchError.message, { url, timedOut: isTimeoutError(err) });
      return { kind: 'error', detail: fetchError.message, timedOut: isTimeoutError(err) };
    }

    if (response.status === 304) {
      return { kind: 'fresh' };
    }
    if (response.status >= 200 && response.status < 300) {
      return {
        kind: 'updated',
        content: response.body ?? Buffer.alloc(0),
        etag: response.etag,
      };
    }

    const fetchError = new FetchError(
      `GET ${url} returned HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ''}`,
      url,
      response.status,
    );
    this.logger.warn(fetchError.message, { url, status: response.status });
    return { kind: 'error', detail: fetchError.message, status: response.status };
  }

  /**
   * 以 conditional HEAD 檢查是否有更新
   * 部分伺服器對 HEAD 忽略 If-None-Match，因此也比對回傳的 ETag
   */
  async probe(url: string, knownEtag?: string): Promise<ProbeResult> {
    try {
      const response = await this.requestWithTimeoutRetry(url, 'HEAD', this.buildHeaders(knownEtag));
      if (response.status === 304) return 'unchanged';
      if (response.status >= 200 && response.status < 300) {
        return knownEtag !== undefined && response.etag === knownEtag ? 'unchanged' : 'changed';
      }
      return 'unknown';
    } catch (err) {
      this.logger.debug('HEAD probe failed', { url, error: describeError(err) });
      return 'unknown';
    }
  }

  private buildHeaders(etag?: string): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'text/plain, */*',
      'User-Agent': this.userAgent,
    };
    if (etag) {
      headers['If-None-Match'] = etag;
    }
    return headers;
  }

  private requestWithTimeoutRetry(
    url: string,
    method: 'GET' | 'HEAD',
    headers: Record<string, string>,
  ): Promise<RawResponse> {
    return withRetry(() => this.request(url, method, headers), {
      maxRetries: 1,
      baseDelayMs: 0,
      backoff: 'none',
      isRetryable: isTimeoutError,
      onRetry: (attempt) => {
        this.logger.info('Request timed out, retrying', { url, method, attempt, timeoutMs: this.timeoutMs });
      },
    });
  }

  /** body 也在逾時範圍內讀取，逾時時整個 attempt 失敗 */
  private async request(
    url: string,
    method: 'GET' | 'HEAD',
    headers: Record<string, string>,
  ): Promise<RawResponse> {
    const response = await this.fetchImpl(url, {
      method,
      headers,
      redirect: 'follow',
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const readBody = method === 'GET' && response.status >= 200 && response.status < 300;
    return {
      status: response.status,
      statusText: response.statusText,
      etag: response.headers.get('etag') ?? undefined,
      body: readBody ? Buffer.from(await response.arrayBuffer()) : undefined,
    };
  }
}
