import { createArchiveRunner, formatRunSummary } from '../domain/archive/archive-runner';
import { createCheckpointStore } from '../domain/archive/checkpoint-store';
import { createHtmlRenderer } from '../domain/archive/html-renderer';
import { logger } from '../infrastructure/logging/logger';

import {
  loadCommandConfig,
  openComponents,
  writeStdout,
  type CommandOptions,
} from './context';

/**
 * 未読メッセージを 1 回チェックしてアーカイブする
 * @returns プロセスの終了コード（成功時 0、致命的なエラーで 1）
 */
export async function runArchiveCommand(options: CommandOptions = {}): Promise<number> {
  const config = loadCommandConfig(options.env);
  if (!config) return 1;

  logger.info('Initializing Discord bot components...');
  const components = openComponents(config, options);
  if (!components) return 1;
  const { source, store } = components;

  try {
    const runner = createArchiveRunner({
      config,
      source,
      store,
      checkpoints: createCheckpointStore(store),
      renderer: createHtmlRenderer({ timeZone: config.timeZone, now: options.now }),
      now: options.now,
    });

    const result = await runner.run();
    (options.write ?? writeStdout)(formatRunSummary(result));
    return 0;
  } catch (error) {
    logger.error('Error during message check', error);
    return 1;
  } finally {
    source.close();
  }
}
