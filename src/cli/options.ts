import { InvalidArgumentError, Option, type Command } from 'commander';
import { OUTPUT_FORMATS, type OutputFormat } from './formatters/OutputFormatter.js';

/** 所有指令共用的選項 */
export interface CommonOptions {
  root: string;
  format: OutputFormat;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('--root <path>', 'Project root containing .artisync.json', '.')
    .addOption(
      new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('text'),
    );
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}
