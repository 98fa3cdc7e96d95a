import { archivePrefix } from '../domain/archive/paths';
import { logger } from '../infrastructure/logging/logger';

import {
  loadCommandConfig,
  openComponents,
  writeStdout,
  type CommandOptions,
} from './context';

export interface ListCommandOptions extends CommandOptions {
  limit?: number;
}

/**
 * 設定されたチャンネルのアーカイブを新しい順に出力する
 */
export async function runListCommand(options: ListCommandOptions = {}): Promise<number> {
  const config = loadCommandConfig(options.env);
  if (!config) return 1;

  const components = openComponents(config, options);
  if (!components) return 1;
  const { source, store } = components;
  try {
    const paths = await store.listFiles(archivePrefix(config.channelId), options.limit ?? 20);
    if (paths.length === 0) {
      logger.info(`No archives found for channel ${config.channelId}`);
    }
    paths.forEach((path) => (options.write ?? writeStdout)(path));
    return 0;
  } finally {
    source.close();
  }
}
