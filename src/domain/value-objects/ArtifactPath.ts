import path from 'node:path';

/**
 * 相對路徑安全規則：manifest 與設定中的路徑在 fetch 前都要通過。
 *
 * 拒絕：絕對路徑、Windows drive letter、反斜線、NUL、
 * 空 segment（//）、`.` 與 `..` segment。
 */
export function isSafeRelativePath(candidate: string): boolean {
  if (candidate.length === 0 || candidate.length > 1024) return false;
  if (candidate.includes('\0') || candidate.includes('\\')) return false;
  if (candidate.startsWith('/') || /^[A-Za-z]:/.test(candidate)) return false;

  return candidate
    .split('/')
    .every((segment) => segment.length > 0 && segment !== '.' && segment !== '..');
}

/**
 * 正規化 manifest 條目：去除前後空白與開頭的 `./`，
 * 不安全時回傳 undefined
 */
export function normalizeArtifactPath(raw: string): string | undefined {
  let candidate = raw.trim();
  while (candidate.startsWith('./')) {
    candidate = candidate.slice(2);
  }
  return isSafeRelativePath(candidate) ? candidate : undefined;
}

/** 目錄型 artifact（skills）的進入點檔名 */
const ENTRY_FILE = 'skill.md';

/**
 * 由路徑推導邏輯名稱：
 * - `agents/research.md` → `research`
 * - `skills/code-review/SKILL.md` → `code-review`
 */
export function artifactNameOf(artifactPath: string): string {
  const base = path.posix.basename(artifactPath);
  if (base.toLowerCase() === ENTRY_FILE) {
    const parent = path.posix.basename(path.posix.dirname(artifactPath));
    if (parent && parent !== '.') return parent;
  }
  return base.replace(/\.md$/i, '');
}
