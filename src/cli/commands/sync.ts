import type { Command } from 'commander';
import { ValidationError } from '../../domain/errors/DomainErrors.js';
import { withWorkspace } from '../../workspace.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { addCommonOptions, type CommonOptions } from '../options.js';

interface SyncCommandOptions extends CommonOptions {
  force?: boolean;
  source?: string[];
}

/**
 * 註冊 sync 指令
 *
 * 先把 .artisync.json 宣告的 sources upsert 進 registry，再同步所有啟用的 source。
 * 任一 source 狀態不是 success 時 exit code 為 1。
 */
export function registerSyncCommand(program: Command): void {
  addCommonOptions(
    program
      .command('sync')
      .description('Fetch changed artifacts from every enabled source')
      .option('--force', 'Ignore stored ETags and download everything')
      .option('--source <ids...>', 'Only sync the given source ids'),
  ).action(async (opts: SyncCommandOptions) => {
    const formatter = new OutputFormatter();

    const report = await withWorkspace(opts.root, async ({ config, registry, orchestrator }) => {
      if (config.sources.length > 0) {
        registry.upsertMany(config.sources);
      }

      let sources = registry.list(true);
      if (opts.source) {
        const wanted = new Set(opts.source);
        for (const id of wanted) {
          if (!registry.get(id)) throw new ValidationError(`Unknown source "${id}"`, 'source');
        }
        sources = sources.filter((source) => wanted.has(source.id));
      }

      return orchestrator.sync(sources, { force: opts.force ?? false });
    });

    process.stdout.write(formatter.formatSyncReport(report, opts.format) + '\n');
    if (report.sources.some((result) => result.status !== 'success')) {
      process.exitCode = 1;
    }
  });
}
