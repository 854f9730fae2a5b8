import type { Command } from 'commander';
import { withWorkspace } from '../../workspace.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { addCommonOptions, type CommonOptions } from '../options.js';

/** 註冊 resolve 指令：依 priority 合併已快取的 artifacts */
export function registerResolveCommand(program: Command): void {
  addCommonOptions(
    program
      .command('resolve')
      .description('Merge cached artifacts of all enabled sources by priority'),
  ).action(async (opts: CommonOptions) => {
    const formatter = new OutputFormatter();

    const merged = await withWorkspace(opts.root, async ({ status, resolver }) =>
      resolver.resolve(await status.collectTracked()));

    if (opts.format === 'text' && merged.warnings.length > 0) {
      process.stderr.write(merged.warnings.map((w) => `Warning: ${w}`).join('\n') + '\n');
    }
    process.stdout.write(formatter.formatMerged(merged, opts.format) + '\n');
  });
}
