import { logger } from '../infrastructure/logging/logger';

import { loadCommandConfig, openComponents, type CommandOptions } from './context';

function reason(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * 設定・Discord 接続・ストレージを事前確認する（何も書き込まない）
 * @returns すべて成功すれば 0
 */
export async function runCheckCommand(options: CommandOptions = {}): Promise<number> {
  const config = loadCommandConfig(options.env);
  if (!config) return 1;
  logger.info('✓ All required settings are present');

  const components = openComponents(config, options);
  if (!components) return 1;
  const { source, store } = components;
  let failures = 0;

  try {
    try {
      const bot = await source.fetchCurrentUser();
      logger.info(`✓ Connected to Discord as: ${bot.username}#${bot.discriminator}`);
    } catch (error) {
      failures++;
      logger.error(`✗ Discord authentication failed: ${reason(error)}`);
    }

    try {
      const channel = await source.fetchChannelInfo(config.channelId);
      logger.info(`✓ Channel is readable: ${channel.name} (${channel.id})`);
    } catch (error) {
      failures++;
      logger.error(`✗ Channel ${config.channelId} is not readable: ${reason(error)}`);
    }

    const bucket = await store.getBucketInfo();
    if (bucket.exists) {
      logger.info(
        `✓ Bucket ${bucket.name} exists (public: ${bucket.public ?? 'unknown'}, created: ${bucket.createdAt ?? 'unknown'})`
      );
    } else {
      failures++;
      logger.error(`✗ Bucket ${bucket.name} is not available: ${bucket.error ?? 'unknown error'}`);
    }
  } finally {
    source.close();
  }

  if (failures > 0) {
    logger.error(`${failures} check(s) failed`);
    return 1;
  }
  logger.info('All checks passed');
  return 0;
}
