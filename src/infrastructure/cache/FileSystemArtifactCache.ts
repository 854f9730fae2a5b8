import fs from 'node:fs/promises';
import path from 'node:path';
import { randomBytes } from 'node:crypto';
import type { ArtifactCachePort } from '../../domain/ports/ArtifactCachePort.js';
import type { Source } from '../../domain/entities/Source.js';
import { ContentHash } from '../../domain/value-objects/ContentHash.js';
import { sourceCacheKey } from '../../domain/value-objects/SourceLocation.js';

function isMissing(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * 本地快取目錄：<root>/<source slug>/<artifact 相對路徑>
 */
export class FileSystemArtifactCache implements ArtifactCachePort {
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  get rootDir(): string {
    return this.root;
  }

  sourceDir(source: Pick<Source, 'id' | 'url'>): string {
    return path.join(this.root, sourceCacheKey(source));
  }

  /** 同目錄暫存檔 + rename，rename 在同一檔案系統內是原子操作 */
  async writeAtomic(filePath: string, content: Uint8Array): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });

    const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${randomBytes(6).toString('hex')}.tmp`);
    try {
      await fs.writeFile(tmpPath, content);
      await fs.rename(tmpPath, filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
  }

  async readBytes(filePath: string): Promise<Buffer | undefined> {
    try {
      return await fs.readFile(filePath);
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }
  }

  async hashFile(filePath: string): Promise<string | undefined> {
    const bytes = await this.readBytes(filePath);
    return bytes ? ContentHash.fromBytes(bytes).value : undefined;
  }

  async removeSourceDir(source: Pick<Source, 'id' | 'url'>): Promise<void> {
    await fs.rm(this.sourceDir(source), { recursive: true, force: true });
  }
}
