import type {
  MergedArtifactSet,
  ResolvedArtifact,
  ShadowedConflict,
  SourceArtifacts,
} from './dto/MergedArtifactSet.js';
import type { SyncReport } from './dto/SyncReport.js';
import { artifactNameOf } from '../domain/value-objects/ArtifactPath.js';
import { Logger } from '../shared/Logger.js';

function compareBySourceOrder(a: SourceArtifacts, b: SourceArtifacts): number {
  if (a.priority !== b.priority) return a.priority - b.priority;
  return a.sourceId < b.sourceId ? -1 : a.sourceId > b.sourceId ? 1 : 0;
}

/**
 * Priority Resolver
 *
 * 以邏輯名稱合併多個 source 的 artifacts：priority 數字越小越優先，
 * 同 priority 以 source id 字典序決定，並發出警告。
 * 純函式，不做任何 I/O；結果與輸入順序無關。
 */
export class PriorityResolver {
  private readonly logger = new Logger('PriorityResolver');

  resolve(perSource: SourceArtifacts[]): MergedArtifactSet {
    const ordered = [...perSource].sort(compareBySourceOrder);
    const winners = new Map<string, ResolvedArtifact>();
    const conflicts: ShadowedConflict[] = [];
    const warnings: string[] = [];

    for (const entry of ordered) {
      const artifacts = [...entry.artifacts].sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

      for (const artifact of artifacts) {
        const name = artifactNameOf(artifact.path);
        const existing = winners.get(name);

        if (!existing) {
          winners.set(name, {
            name,
            sourceId: entry.sourceId,
            priority: entry.priority,
            path: artifact.path,
            contentHash: artifact.contentHash,
            localCachePath: artifact.localCachePath,
          });
          continue;
        }

        // 同一 source 內的同名（例如 a/x.md 與 b/x.md）也算遮蔽，但不算同 priority 衝突
        const samePriority = existing.sourceId !== entry.sourceId && existing.priority === entry.priority;
        conflicts.push({
          name,
          winner: { sourceId: existing.sourceId, path: existing.path, priority: existing.priority },
          shadowed: { sourceId: entry.sourceId, path: artifact.path, priority: entry.priority },
          samePriority,
        });

        if (samePriority) {
          const message = `Artifact "${name}" is provided by "${existing.sourceId}" and "${entry.sourceId}" `
            + `at equal priority ${entry.priority}; using "${existing.sourceId}"`;
          warnings.push(message);
          this.logger.warn(message);
        } else {
          this.logger.debug('Artifact shadowed', {
            name,
            winner: existing.sourceId,
            shadowed: entry.sourceId,
          });
        }
      }
    }

    const sortedNames = [...winners.keys()].sort();
    const artifacts = new Map<string, ResolvedArtifact>();
    for (const name of sortedNames) {
      const winner = winners.get(name);
      if (winner) artifacts.set(name, winner);
    }

    return { artifacts, conflicts, warnings };
  }

  /** 直接以 sync 報告作為輸入 */
  resolveReport(report: SyncReport): MergedArtifactSet {
    return this.resolve(report.sources.map((result) => ({
      sourceId: result.sourceId,
      priority: result.priority,
      artifacts: result.artifacts,
    })));
  }
}
