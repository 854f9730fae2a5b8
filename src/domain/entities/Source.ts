import { z } from 'zod';
import { isSafeRelativePath } from '../value-objects/ArtifactPath.js';

export type DiscoveryKind = 'manifest' | 'github-tree';

export interface Source {
  id: string;
  url: string;
  subdirectory?: string;
  /** 非負整數，數字越小優先權越高 */
  priority: number;
  enabled: boolean;
  /** url 為 github.com repo 時使用的分支 */
  branch: string;
  discovery: DiscoveryKind;
  manifestPath: string;
  lastSyncTime?: number;
  /** manifest 最後一次的 ETag */
  lastEtag?: string;
}

export const DEFAULT_BRANCH = 'main';
export const DEFAULT_MANIFEST_PATH = 'manifest.txt';

const httpUrl = z.string().trim().refine((value) => {
  try {
    const parsed = new URL(value);
    return (parsed.protocol === 'http:' || parsed.protocol === 'https:') && parsed.hostname.length > 0;
  } catch {
    return false;
  }
}, 'url must be a well-formed http(s) URL');

const safePath = (label: string) =>
  z.string().trim().transform((value) => value.replace(/^\/+|\/+$/g, ''))
    .refine((value) => value === '' || isSafeRelativePath(value), `${label} must be a safe relative path`);

/** 註冊 source 時的輸入格式 */
export const SourceInputSchema = z.object({
  id: z.string().trim().regex(/^[A-Za-z0-9._-]+$/, 'id must match [A-Za-z0-9._-]+').max(128),
  url: httpUrl,
  subdirectory: safePath('subdirectory').optional(),
  priority: z.number().int('priority must be an integer').nonnegative('priority must be non-negative').default(100),
  enabled: z.boolean().default(true),
  branch: z.string().trim().min(1).regex(/^[^\s]+$/, 'branch must not contain whitespace').default(DEFAULT_BRANCH),
  discovery: z.enum(['manifest', 'github-tree']).default('manifest'),
  manifestPath: safePath('manifestPath').refine((value) => value !== '', 'manifestPath must not be empty').default(DEFAULT_MANIFEST_PATH),
});

export type SourceInput = z.input<typeof SourceInputSchema>;

/** update() 允許變更的欄位（id 不可改） */
export const SourceUpdateSchema = SourceInputSchema.omit({ id: true }).partial();

export type SourceUpdate = z.input<typeof SourceUpdateSchema>;

/** registry 的排序規則：priority 升冪，同 priority 以 id 字典序 */
export function compareSources(a: Pick<Source, 'id' | 'priority'>, b: Pick<Source, 'id' | 'priority'>): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
