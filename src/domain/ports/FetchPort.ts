/** 內容沒變（HTTP 304） */
export interface FreshResult {
  kind: 'fresh';
}

/** 取得新內容（HTTP 2xx） */
export interface UpdatedResult {
  kind: 'updated';
  content: Buffer;
  /** 伺服器沒有回傳 ETag 時為 undefined */
  etag?: string;
}

/** 網路錯誤、逾時或非 2xx/304 狀態；對呼叫端不是致命錯誤 */
export interface ErrorResult {
  kind: 'error';
  detail: string;
  status?: number;
  timedOut?: boolean;
}

export type FetchResult = FreshResult | UpdatedResult | ErrorResult;

export type ProbeResult = 'changed' | 'unchanged' | 'unknown';

export interface FetchPort {
  fetch(url: string, knownEtag?: string, force?: boolean): Promise<FetchResult>;
  /** 以 conditional HEAD 檢查遠端是否有更新，不下載內容 */
  probe(url: string, knownEtag?: string): Promise<ProbeResult>;
}
