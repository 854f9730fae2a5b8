import type { Command } from 'commander';
import { withWorkspace } from '../../workspace.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { addCommonOptions, parsePositiveInt, type CommonOptions } from '../options.js';

interface ShowOptions extends CommonOptions {
  limit: number;
}

interface PruneOptions extends CommonOptions {
  days?: number;
}

/**
 * 註冊 history 指令群組
 *
 * 用法：
 *   artisync history show <sourceId> [--limit 10]
 *   artisync history prune [--days 30]
 */
export function registerHistoryCommand(program: Command): void {
  const historyCmd = program
    .command('history')
    .description('Inspect or prune sync run history');

  addCommonOptions(
    historyCmd
      .command('show <sourceId>')
      .description('Show the most recent sync runs of a source')
      .option('--limit <n>', 'Number of runs to show', parsePositiveInt, 10),
  ).action(async (sourceId: string, opts: ShowOptions) => {
    const formatter = new OutputFormatter();

    const runs = await withWorkspace(opts.root, ({ status }) => status.history(sourceId, opts.limit));
    process.stdout.write(formatter.formatObject({ sourceId, runs }, opts.format) + '\n');
  });

  addCommonOptions(
    historyCmd
      .command('prune')
      .description('Delete sync runs older than the retention window')
      .option('--days <n>', 'Retention in days (default: sync.historyRetentionDays)', parsePositiveInt),
  ).action(async (opts: PruneOptions) => {
    const formatter = new OutputFormatter();

    const result = await withWorkspace(opts.root, ({ config, status }) => {
      const days = opts.days ?? config.sync.historyRetentionDays;
      return { days, deleted: status.pruneHistory(days) };
    });
    process.stdout.write(formatter.formatObject(result, opts.format) + '\n');
  });
}
