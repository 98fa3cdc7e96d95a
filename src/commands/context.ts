import { loadEnv, type AppConfig } from '../config/env';
import type { MessageSource, ObjectStore } from '../domain/archive/types';
import { createMessageFetcher } from '../infrastructure/discord/message-fetcher';
import { logger, setLogLevel } from '../infrastructure/logging/logger';
import { createStorageClient } from '../infrastructure/supabase/client';
import { createSupabaseObjectStore } from '../infrastructure/supabase/object-store';
import { isBaseError } from '../shared/errors/base-error';

export interface ArchiveComponents {
  source: MessageSource;
  store: ObjectStore;
}

export type ComponentFactory = (config: AppConfig) => ArchiveComponents;

export interface CommandOptions {
  env?: NodeJS.ProcessEnv;
  createComponents?: ComponentFactory;
  now?: () => Date;
  /** 機械可読な出力（1 行ずつ）を書き出す先 */
  write?: (line: string) => void;
}

export const writeStdout = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

/**
 * 設定から Discord / Supabase の実装を組み立てる
 * 途中で失敗した場合は作成済みの Discord クライアントを閉じてから投げ直す
 */
export function createArchiveComponents(config: AppConfig): ArchiveComponents {
  const source = createMessageFetcher({
    token: config.discordToken,
    timeoutMs: config.requestTimeoutMs,
    rateLimitWarningThreshold: config.rateLimitWarningThreshold,
  });
  try {
    const client = createStorageClient({
      url: config.supabaseUrl,
      key: config.supabaseKey,
      timeoutMs: config.requestTimeoutMs,
    });
    return { source, store: createSupabaseObjectStore(client, config.storageBucket) };
  } catch (error) {
    source.close();
    throw error;
  }
}

/**
 * コンポーネントを組み立てる。失敗はログに出して null を返す
 */
export function openComponents(config: AppConfig, options: CommandOptions): ArchiveComponents | null {
  try {
    return (options.createComponents ?? createArchiveComponents)(config);
  } catch (error) {
    logger.error('Failed to initialize components', error);
    return null;
  }
}

/**
 * 設定を読み込みログレベルを反映する。設定不備はログに出して null を返す
 */
export function loadCommandConfig(env: NodeJS.ProcessEnv = process.env): AppConfig | null {
  try {
    const config = loadEnv(env);
    setLogLevel(config.logLevel);
    return config;
  } catch (error) {
    if (isBaseError(error, 'CONFIG_INVALID')) {
      logger.error(error.message);
      return null;
    }
    throw error;
  }
}
