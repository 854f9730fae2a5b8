#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';
import { registerInitCommand } from './commands/init.js';
import { registerSourceCommand } from './commands/source.js';
import { registerSyncCommand } from './commands/sync.js';
import { registerStatusCommand } from './commands/status.js';
import { registerResolveCommand } from './commands/resolve.js';
import { registerCheckUpdatesCommand } from './commands/check-updates.js';
import { registerHistoryCommand } from './commands/history.js';
import { describeError } from '../domain/errors/DomainErrors.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('artisync')
  .description('Sync and cache markdown agents and skills from prioritized remote sources')
  .version(version);

/** 全域錯誤處理；子指令建立前設定才會被繼承 */
program.exitOverride();

registerInitCommand(program);
registerSourceCommand(program);
registerSyncCommand(program);
registerStatusCommand(program);
registerResolveCommand(program);
registerCheckUpdatesCommand(program);
registerHistoryCommand(program);

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    // commander 已自行輸出 help、version 與參數錯誤訊息
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    process.stderr.write(`Error: ${describeError(err)}\n`);
    process.exit(1);
  }
}

void main();
