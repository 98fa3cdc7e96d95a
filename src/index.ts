import path from 'node:path';

import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';

import { runCheckCommand } from './commands/check';
import { runListCommand } from './commands/list';
import { runArchiveCommand } from './commands/run';
import { APP_NAME, APP_VERSION } from './config/app-info';
import { logger } from './infrastructure/logging/logger';

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

// コマンド実行前に .env を読み込む（設定の検証は各コマンドで行う）
const envPath = path.resolve(readArgValue(process.argv.slice(2), '--env-file') ?? '.env');
dotenv.config({ path: envPath });

const program = new Command();

program
  .name(APP_NAME)
  .description('Archive new Discord channel messages as HTML in Supabase Storage')
  .version(APP_VERSION)
  .option('--env-file <path>', 'Path to .env file', envPath);

program
  .command('run', { isDefault: true })
  .description('Check the channel once and archive any new messages')
  .action(async () => {
    process.exitCode = await runArchiveCommand();
  });

program
  .command('check')
  .description('Verify configuration, Discord access and the storage bucket')
  .action(async () => {
    process.exitCode = await runCheckCommand();
  });

program
  .command('list')
  .description('Print the most recent archive paths for the channel')
  .option('--limit <n>', 'Maximum number of paths', parsePositiveInt, 20)
  .action(async (opts: { limit: number }) => {
    process.exitCode = await runListCommand({ limit: opts.limit });
  });

program.parseAsync().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exitCode = 1;
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection', reason);
  process.exitCode = 1;
});
