import { Option, type Command } from 'commander';
import type { SourceInput, SourceUpdate } from '../../domain/entities/Source.js';
import { NotFoundError } from '../../domain/errors/DomainErrors.js';
import { withWorkspace } from '../../workspace.js';
import { OutputFormatter } from '../formatters/OutputFormatter.js';
import { addCommonOptions, parseNonNegativeInt, type CommonOptions } from '../options.js';

interface LocationOptions {
  subdirectory?: string;
  priority?: number;
  branch?: string;
  discovery?: 'manifest' | 'github-tree';
  manifestPath?: string;
}

interface AddOptions extends CommonOptions, LocationOptions {
  disabled?: boolean;
}

interface UpdateOptions extends CommonOptions, LocationOptions {
  url?: string;
  enable?: boolean;
  disable?: boolean;
}

function addLocationOptions(command: Command): Command {
  return command
    .option('--subdirectory <path>', 'Subdirectory inside the source that holds artifacts')
    .option('--priority <n>', 'Priority, lower wins', parseNonNegativeInt)
    .option('--branch <name>', 'Branch for github.com repository URLs')
    .addOption(new Option('--discovery <kind>', 'How artifact paths are listed').choices(['manifest', 'github-tree']))
    .option('--manifest-path <path>', 'Manifest location relative to the source root');
}

/**
 * 註冊 source 指令群組
 *
 * 用法：
 *   artisync source add <id> <url> [--priority 10]
 *   artisync source update <id> --priority 5
 *   artisync source remove <id>
 *   artisync source list
 *   artisync source purge <id>
 */
export function registerSourceCommand(program: Command): void {
  const sourceCmd = program
    .command('source')
    .description('Manage remote artifact sources');

  addLocationOptions(addCommonOptions(
    sourceCmd
      .command('add <id> <url>')
      .description('Register a new source')
      .option('--disabled', 'Register the source without enabling it'),
  )).action(async (id: string, url: string, opts: AddOptions) => {
    const formatter = new OutputFormatter();
    const input: SourceInput = {
      id,
      url,
      subdirectory: opts.subdirectory,
      priority: opts.priority,
      branch: opts.branch,
      discovery: opts.discovery,
      manifestPath: opts.manifestPath,
      enabled: !opts.disabled,
    };

    const source = await withWorkspace(opts.root, ({ registry }) => registry.register(input));
    process.stdout.write(formatter.formatObject({ action: 'registered', source }, opts.format) + '\n');
  });

  addLocationOptions(addCommonOptions(
    sourceCmd
      .command('update <id>')
      .description('Change fields of a registered source')
      .option('--url <url>', 'New source URL')
      .option('--enable', 'Enable the source')
      .option('--disable', 'Disable the source'),
  )).action(async (id: string, opts: UpdateOptions) => {
    const formatter = new OutputFormatter();
    const fields: SourceUpdate = {
      url: opts.url,
      subdirectory: opts.subdirectory,
      priority: opts.priority,
      branch: opts.branch,
      discovery: opts.discovery,
      manifestPath: opts.manifestPath,
      enabled: opts.enable ? true : opts.disable ? false : undefined,
    };

    const source = await withWorkspace(opts.root, async ({ registry, cache }) => {
      const before = registry.get(id);
      const updated = registry.update(id, fields);
      // 快取目錄名稱含 URL slug，URL 改變後舊目錄不再被引用
      if (before && cache.sourceDir(before) !== cache.sourceDir(updated)) {
        await cache.removeSourceDir(before);
      }
      return updated;
    });
    process.stdout.write(formatter.formatObject({ action: 'updated', source }, opts.format) + '\n');
  });

  addCommonOptions(
    sourceCmd
      .command('remove <id>')
      .description('Remove a source, its tracked artifacts, history and cached files'),
  ).action(async (id: string, opts: CommonOptions) => {
    const formatter = new OutputFormatter();

    await withWorkspace(opts.root, async ({ registry, cache }) => {
      const source = registry.get(id);
      registry.remove(id);
      if (source) await cache.removeSourceDir(source);
    });
    process.stdout.write(formatter.formatObject({ action: 'removed', sourceId: id }, opts.format) + '\n');
  });

  addCommonOptions(
    sourceCmd
      .command('list')
      .description('List registered sources in priority order'),
  ).action(async (opts: CommonOptions) => {
    const formatter = new OutputFormatter();

    const sources = await withWorkspace(opts.root, ({ registry }) => registry.list());
    process.stdout.write(formatter.formatObject({ totalSources: sources.length, sources }, opts.format) + '\n');
  });

  addCommonOptions(
    sourceCmd
      .command('purge <id>')
      .description('Forget tracked artifacts and history of a source, keeping its configuration'),
  ).action(async (id: string, opts: CommonOptions) => {
    const formatter = new OutputFormatter();

    const result = await withWorkspace(opts.root, async ({ registry, store, cache }) => {
      const source = registry.get(id);
      if (!source) throw new NotFoundError('Source', id);
      const purged = store.purgeSource(id);
      await cache.removeSourceDir(source);
      return purged;
    });
    process.stdout.write(formatter.formatObject({ action: 'purged', sourceId: id, ...result }, opts.format) + '\n');
  });
}
