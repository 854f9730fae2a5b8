import type { Command } from 'commander';
import { withWorkspace } from '../../workspace.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { addCommonOptions, type CommonOptions } from '../options.js';

/** 註冊 check-updates 指令：以 HEAD 探測遠端，不下載 */
export function registerCheckUpdatesCommand(program: Command): void {
  addCommonOptions(
    program
      .command('check-updates <sourceId>')
      .description('Probe tracked artifacts of a source for remote changes without downloading'),
  ).action(async (sourceId: string, opts: CommonOptions) => {
    const formatter = new OutputFormatter();

    const report = await withWorkspace(opts.root, ({ status }) => status.checkForUpdates(sourceId));
    process.stdout.write(formatter.formatObject({
      sourceId: report.sourceId,
      checked: report.checked,
      changed: report.changed,
      unknown: report.unknown,
    }, opts.format) + '\n');
  });
}
