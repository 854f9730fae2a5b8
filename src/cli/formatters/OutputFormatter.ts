import type { SyncReport } from '../../application/dto/SyncReport.js';
import type { MergedArtifactSet } from '../../application/dto/MergedArtifactSet.js';
import type { SourceStatus } from '../../application/StatusUseCase.js';

export type OutputFormat = 'json' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text'];

function formatTime(epochMs: number | undefined): string {
  return epochMs === undefined ? 'never' : new Date(epochMs).toISOString();
}

/**
 * 指令輸出格式化：json 給程式讀，text 給人看
 *
 * Map 在 json 模式下轉成一般物件，JSON.stringify 才看得到內容。
 */
export class OutputFormatter {
  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, (_key, value: unknown) =>
        value instanceof Map ? Object.fromEntries(value) : value, 2);
    }
    return this.flattenToText(data);
  }

  formatSyncReport(report: SyncReport, format: OutputFormat): string {
    if (format === 'json') return this.formatObject(report, format);

    if (report.sources.length === 0) return 'No enabled sources.';

    const lines: string[] = [];
    for (const result of report.sources) {
      lines.push(
        `${result.sourceId} [${result.status}] fetched=${result.filesFetched} `
        + `unchanged=${result.filesUnchanged} failed=${result.filesFailed} (${result.durationMs}ms)`,
      );
      for (const failure of result.errors) {
        lines.push(`    ! ${failure.path}: ${failure.detail}`);
      }
      for (const rejected of result.rejectedPaths) {
        lines.push(`    rejected path: ${rejected}`);
      }
      for (const diverged of result.divergences) {
        lines.push(`    refetched after hash mismatch: ${diverged}`);
      }
    }
    const { totals } = report;
    lines.push(`Total: fetched=${totals.filesFetched} unchanged=${totals.filesUnchanged} failed=${totals.filesFailed}`);
    return lines.join('\n');
  }

  formatStatus(statuses: SourceStatus[], format: OutputFormat): string {
    if (format === 'json') return this.formatObject(statuses, format);
    if (statuses.length === 0) return 'No sources registered.';

    return statuses
      .map(({ source, trackedArtifacts, totalBytes, lastRun }) => {
        const flag = source.enabled ? '' : ' (disabled)';
        const lines = [
          `${source.id}${flag} priority=${source.priority} ${source.url}`,
          `    tracked: ${trackedArtifacts} file(s), ${totalBytes} bytes`,
          `    last sync: ${formatTime(source.lastSyncTime)}`,
        ];
        if (lastRun) {
          lines.push(`    last run: #${lastRun.id} ${lastRun.status} `
            + `fetched=${lastRun.filesFetched} unchanged=${lastRun.filesUnchanged} failed=${lastRun.filesFailed}`);
        }
        return lines.join('\n');
      })
      .join('\n');
  }

  formatMerged(merged: MergedArtifactSet, format: OutputFormat): string {
    if (format === 'json') return this.formatObject(merged, format);
    if (merged.artifacts.size === 0) return 'No artifacts available.';

    const lines = [...merged.artifacts.values()].map((a) =>
      `${a.name}  ${a.sourceId}:${a.path}  ${a.contentHash.slice(0, 12)}`);
    for (const conflict of merged.conflicts) {
      lines.push(`shadowed: ${conflict.name} from ${conflict.shadowed.sourceId}:${conflict.shadowed.path} `
        + `(winner ${conflict.winner.sourceId})`);
    }
    return lines.join('\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    const entries: Array<[unknown, unknown]> = data instanceof Map ? [...data.entries()] : Object.entries(data);
    return entries
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${String(key)}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${String(key)}: ${String(val)}`;
      })
      .join('\n');
  }
}
