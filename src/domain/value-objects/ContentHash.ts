import { createHash } from 'node:crypto';

/** 不可變的 SHA-256 內容雜湊值物件 */
export class ContentHash {
  private constructor(public readonly value: string) {}

  /** 從原始位元組計算 SHA-256（artifact 一律以 bytes 計算） */
  static fromBytes(bytes: Uint8Array): ContentHash {
    const hash = createHash('sha256').update(bytes).digest('hex');
    return new ContentHash(hash);
  }
}
