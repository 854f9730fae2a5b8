import { z } from 'zod';
import { normalizeArtifactPath } from '../../domain/value-objects/ArtifactPath.js';
import { ValidationError } from '../../domain/errors/DomainErrors.js';

export interface ParsedManifest {
  paths: string[];
  rejected: string[];
}

/** JSON manifest：路徑陣列，或 `{ "files": [...] }` */
const JsonManifestSchema = z.union([
  z.array(z.string()),
  z.object({ files: z.array(z.string()) }),
]);

/** 驗證、正規化、去重並排序；不安全的條目放進 rejected */
export function sanitizeEntries(entries: readonly string[]): ParsedManifest {
  const accepted = new Set<string>();
  const rejected: string[] = [];
  for (const entry of entries) {
    const normalized = normalizeArtifactPath(entry);
    if (normalized === undefined) {
      rejected.push(entry);
    } else {
      accepted.add(normalized);
    }
  }
  return { paths: [...accepted].sort(), rejected };
}

/**
 * 解析 manifest 內容
 *
 * 內容以 `[` 或 `{` 開頭時視為 JSON，否則為純文字：
 * 一行一個相對路徑，空行與 `#` 開頭的註解忽略。
 */
export function parseManifest(text: string): ParsedManifest {
  const trimmed = text.replace(/^\uFEFF/, '').trim();

  if (trimmed.startsWith('[') || trimmed.startsWith('{')) {
    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch (err) {
      throw new ValidationError('Manifest is not valid JSON', 'manifest', { cause: err });
    }
    const parsed = JsonManifestSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError('Manifest JSON must be an array of paths or { "files": [...] }', 'manifest');
    }
    return sanitizeEntries(Array.isArray(parsed.data) ? parsed.data : parsed.data.files);
  }

  const lines = trimmed
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith('#'));
  return sanitizeEntries(lines);
}
