export type ErrorClassification = 'configuration' | 'non-fatal' | 'transient' | 'integrity' | 'storage';

/** 所有 artisync domain 錯誤的基底類別 */
export abstract class ArtisyncError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Configuration：註冊時同步拋出，絕不寫入 ---

export class ValidationError extends ArtisyncError {
  readonly classification = 'configuration' as const;
  readonly code = 'VALIDATION';

  constructor(
    message: string,
    public readonly field?: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class NotFoundError extends ArtisyncError {
  readonly classification = 'non-fatal' as const;
  readonly code = 'NOT_FOUND';

  constructor(
    public readonly entity: string,
    public readonly id: string,
    options?: ErrorOptions,
  ) {
    super(`${entity} "${id}" not found`, options);
  }
}

// --- Transient：單檔失敗，記錄在 SyncRun 而非拋出 ---

export class FetchError extends ArtisyncError {
  readonly classification = 'transient' as const;
  readonly code = 'FETCH_FAILED';

  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// --- Integrity：ETag 說沒變，但內容雜湊不一致 ---

export class IntegrityError extends ArtisyncError {
  readonly classification = 'integrity' as const;
  readonly code = 'HASH_ETAG_DIVERGENCE';

  constructor(
    message: string,
    public readonly path: string,
    public readonly expectedHash: string | undefined,
    public readonly actualHash: string | undefined,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

// --- Storage：state store 損毀或無法使用，schema 重建即可 ---

export class StoreError extends ArtisyncError {
  readonly classification = 'storage' as const;
  readonly code = 'STORE_UNAVAILABLE';
}

/** 把任意 throw 出來的值轉成可記錄的訊息 */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
