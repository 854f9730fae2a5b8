import { createHash } from 'node:crypto';
import type { Source } from '../entities/Source.js';

type LocatableSource = Pick<Source, 'url' | 'subdirectory' | 'branch'>;

/** 解析 `https://github.com/<owner>/<repo>[.git]`，其他 URL 回傳 undefined */
export function parseGitHubRepo(url: string): { owner: string; repo: string } | undefined {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return undefined;
  }
  if (parsed.hostname !== 'github.com' && parsed.hostname !== 'www.github.com') return undefined;

  const [owner, rawRepo] = parsed.pathname.split('/').filter(Boolean);
  if (!owner || !rawRepo) return undefined;
  return { owner, repo: rawRepo.replace(/\.git$/, '') };
}

/**
 * 取得 source 的 raw 內容根 URL（不含結尾斜線）
 *
 * github.com repo URL 改寫為 raw.githubusercontent.com/<owner>/<repo>/<branch>，
 * 繞過 API rate limit；其他 URL 視為已是 raw 根目錄。
 */
export function sourceBaseUrl(source: LocatableSource): string {
  const repo = parseGitHubRepo(source.url);
  const root = repo
    ? `https://raw.githubusercontent.com/${repo.owner}/${repo.repo}/${source.branch}`
    : source.url.replace(/\/+$/, '');
  return source.subdirectory ? `${root}/${source.subdirectory}` : root;
}

/** artifact 的完整下載 URL；每個 segment 個別 encode */
export function artifactUrl(source: LocatableSource, artifactPath: string): string {
  const encoded = artifactPath.split('/').map(encodeURIComponent).join('/');
  return `${sourceBaseUrl(source)}/${encoded}`;
}

/**
 * 每個 source 的快取子目錄名稱：URL 的可讀 slug + source id 雜湊前 12 碼
 * 例：`github.com-acme-agents-3f2a9c0b1d4e`
 *
 * 以 id 區分目錄：同一個 URL 上不同 branch、manifest 或 discovery 的 source
 * 各自擁有 listing 副本與 artifact 檔案。
 */
export function sourceCacheKey(source: Pick<Source, 'id' | 'url'>): string {
  const digest = createHash('sha256').update(source.id).digest('hex').slice(0, 12);

  let readable: string;
  try {
    const parsed = new URL(source.url);
    readable = `${parsed.hostname}${parsed.pathname}`;
  } catch {
    readable = source.url;
  }
  const slug = readable
    .toLowerCase()
    .replace(/\.git$/, '')
    .replace(/[^a-z0-9.]+/g, '-')
    .slice(0, 48)
    .replace(/^-+|-+$/g, '');

  return slug ? `${slug}-${digest}` : digest;
}
