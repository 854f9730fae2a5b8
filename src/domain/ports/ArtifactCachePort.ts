import type { Source } from '../entities/Source.js';

export interface ArtifactCachePort {
  /** source 的快取根目錄（絕對路徑） */
  sourceDir(source: Pick<Source, 'id' | 'url'>): string;
  /** 先寫入同目錄的暫存檔再 rename，中斷時不會留下半寫入的檔案 */
  writeAtomic(filePath: string, content: Uint8Array): Promise<void>;
  readBytes(filePath: string): Promise<Buffer | undefined>;
  /** 重新計算快取檔的 SHA-256；檔案不存在時回傳 undefined */
  hashFile(filePath: string): Promise<string | undefined>;
  removeSourceDir(source: Pick<Source, 'id' | 'url'>): Promise<void>;
}
