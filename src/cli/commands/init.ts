import { Option, type Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from '../../config/defaults.js';
import { describeError } from '../../domain/errors/DomainErrors.js';
import { openWorkspace } from '../../workspace.js';
import { OUTPUT_FORMATS, OutputFormatter, type OutputFormat } from '../formatters/OutputFormatter.js';

/** init 指令的結果型別 */
export interface InitResult {
  root: string;
  configCreated: boolean;
  gitignoreUpdated: boolean;
  dbInitialized: boolean;
  /** 既有的 state store 無法使用，已刪除重建 */
  dbRecreated: boolean;
  dbError?: string;
}

interface InitOptions {
  root: string;
  skipDb: boolean;
  format: OutputFormat;
}

/**
 * 建立預設的 .artisync.json；已存在時不覆寫
 * @returns 是否新建
 */
export function ensureProjectConfig(root: string): boolean {
  const configPath = path.join(root, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    return false;
  }

  const config = {
    version: DEFAULT_CONFIG.version,
    cache: DEFAULT_CONFIG.cache,
    fetch: DEFAULT_CONFIG.fetch,
    sync: DEFAULT_CONFIG.sync,
    sources: [],
  };

  fs.mkdirSync(root, { recursive: true });
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');
  return true;
}

/**
 * 確保 .gitignore 包含指定項目，避免快取與 state store 進版控
 * @returns 是否有寫入
 */
export function ensureGitignoreEntry(root: string, entry: string): boolean {
  const gitignorePath = path.join(root, '.gitignore');
  if (!fs.existsSync(gitignorePath)) {
    fs.writeFileSync(gitignorePath, `${entry}\n`, 'utf-8');
    return true;
  }

  const content = fs.readFileSync(gitignorePath, 'utf-8');
  if (content.split(/\r?\n/).some((line) => line.trim() === entry)) {
    return false;
  }
  const separator = content.length === 0 || content.endsWith('\n') ? '' : '\n';
  fs.appendFileSync(gitignorePath, `${separator}${entry}\n`, 'utf-8');
  return true;
}

function describeStore(result: InitResult): string {
  if (result.dbError) return `failed (${result.dbError})`;
  if (!result.dbInitialized) return 'skipped';
  return result.dbRecreated ? 'ready (previous store was unusable and has been recreated)' : 'ready';
}

export function formatTextResult(result: InitResult): string {
  const lines = [
    `Initialized artisync in ${result.root}`,
    `Config created: ${result.configCreated ? `yes (new ${CONFIG_FILE_NAME})` : 'already exists'}`,
    `.gitignore updated: ${result.gitignoreUpdated ? 'yes' : 'no'}`,
    `State store: ${describeStore(result)}`,
  ];
  return lines.join('\n');
}

/**
 * 註冊 init 指令
 *
 * 用法：
 *   artisync init [--root <path>] [--skip-db]
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create .artisync.json and the local state store')
    .option('--root <path>', 'Project root directory', '.')
    .option('--skip-db', 'Skip state store initialization', false)
    .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'))
    .action((opts: InitOptions) => {
      const root = path.resolve(opts.root);

      const configCreated = ensureProjectConfig(root);
      const gitignoreUpdated = ensureGitignoreEntry(root, '.artisync/');

      let dbInitialized = false;
      let dbRecreated = false;
      let dbError: string | undefined;
      if (!opts.skipDb) {
        try {
          const workspace = openWorkspace(root);
          dbRecreated = workspace.dbManager.wasRecreated();
          workspace.close();
          dbInitialized = true;
        } catch (err) {
          dbError = describeError(err);
          process.exitCode = 1;
        }
      }

      const result: InitResult = { root, configCreated, gitignoreUpdated, dbInitialized, dbRecreated, dbError };
      if (opts.format === 'json') {
        process.stdout.write(new OutputFormatter().formatObject(result, 'json') + '\n');
      } else {
        process.stdout.write(formatTextResult(result) + '\n');
      }
    });
}
