import type { Command } from 'commander';
import { withWorkspace } from '../../workspace.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { addCommonOptions, type CommonOptions } from '../options.js';

/** 註冊 status 指令：各 source 的追蹤檔案數與最近一次 sync */
export function registerStatusCommand(program: Command): void {
  addCommonOptions(
    program
      .command('status')
      .description('Show tracked artifacts and the latest sync run per source'),
  ).action(async (opts: CommonOptions) => {
    const formatter = new OutputFormatter();

    const { statuses, recreated } = await withWorkspace(opts.root, ({ dbManager, status }) => ({
      statuses: status.summarize(),
      recreated: dbManager.wasRecreated(),
    }));
    if (recreated) {
      process.stderr.write('Warning: the state store was unusable and has been recreated; run sync to repopulate it\n');
    }
    process.stdout.write(formatter.formatStatus(statuses, opts.format) + '\n');
  });
}
