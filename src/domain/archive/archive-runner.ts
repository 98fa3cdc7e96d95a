import { logger } from '../../infrastructure/logging/logger';
import { createStorageError } from '../../shared/errors/base-error';
import { toZonedIsoString } from '../../shared/utils/time';

import type { CheckpointStore } from './checkpoint-store';
import type { HtmlRenderer } from './html-renderer';
import { archivePath } from './paths';
import type { ChannelInfo, Checkpoint, MessageSource, ObjectStore, RunResult } from './types';

export const HTML_CONTENT_TYPE = 'text/html; charset=utf-8';

// 同一秒に複数回実行された場合の連番の上限
const MAX_PATH_ATTEMPTS = 50;

export interface ArchiveRunnerConfig {
  channelId: string;
  timeZone: string;
  storageLocation: string;
  fetchLimit: number;
}

export interface ArchiveRunnerDeps {
  config: ArchiveRunnerConfig;
  source: MessageSource;
  store: ObjectStore;
  checkpoints: CheckpointStore;
  renderer: HtmlRenderer;
  now?: () => Date;
}

/**
 * チャンネルの未読メッセージを 1 回分アーカイブするランナーを作成する
 *
 * チェックポイントはアップロードが成功した後にのみ進める。保存に失敗した場合は
 * 次回同じメッセージを再取得する（重複はあっても欠落はしない）。
 * 同じチェックポイントに対する同時実行は想定しておらず、呼び出し側のスケジューラで防ぐこと。
 */
export function createArchiveRunner(deps: ArchiveRunnerDeps) {
  const { config, source, store, checkpoints, renderer } = deps;
  const now = deps.now ?? (() => new Date());

  /**
   * バケットの準備（確認できなければ致命的）
   */
  const ensureStorageReady = async (): Promise<void> => {
    if (!(await store.ensureBucketExists(config.storageLocation))) {
      throw createStorageError('Failed to create or verify bucket existence', 'STORAGE_UNAVAILABLE');
    }
  };

  /**
   * チャンネル情報の取得（失敗してもレンダリングが劣化するだけ）
   */
  const fetchChannelInfo = async (): Promise<ChannelInfo | null> => {
    try {
      const info = await source.fetchChannelInfo(config.channelId);
      logger.info(`Connected to channel: ${info.name}`);
      return info;
    } catch (error) {
      logger.warn('Failed to get channel info', error instanceof Error ? error.message : error);
      return null;
    }
  };

  /**
   * 既存のアーカイブを上書きせずに書き込む。同じ秒のファイルがあれば _2, _3 ... を付ける
   * exists() が誤って false を返しても、書き込み側の衝突検知で次の連番へ進む
   */
  const writeArtifact = async (at: Date, html: string): Promise<string> => {
    for (let sequence = 1; sequence <= MAX_PATH_ATTEMPTS; sequence++) {
      const path = archivePath(config.channelId, at, config.timeZone, sequence);
      if (await store.exists(path)) continue;

      const outcome = await store.createText(path, html, HTML_CONTENT_TYPE);
      if (outcome === 'created') return path;
      if (outcome === 'failed') {
        throw createStorageError('Failed to upload HTML archive', 'ARTIFACT_UPLOAD_FAILED', { path });
      }
    }
    throw createStorageError('Could not find an unused archive path', 'ARTIFACT_UPLOAD_FAILED', {
      channelId: config.channelId,
    });
  };

  const run = async (): Promise<RunResult> => {
    await ensureStorageReady();

    const previous = await checkpoints.load();
    logger.info(
      `Checking channel ${config.channelId} for messages after ID: ${previous.lastReadMessageId ?? 'none'}`
    );

    const channel = await fetchChannelInfo();

    const { messages } = await source.fetchMessages(config.channelId, {
      after: previous.lastReadMessageId,
      limit: config.fetchLimit,
    });

    const checkedAt = now();
    let next: Checkpoint;
    let filePath: string | null = null;

    if (messages.length === 0) {
      logger.info('No unread messages found');
      next = {
        ...previous,
        lastCheckTime: toZonedIsoString(checkedAt, config.timeZone),
        lastMessageCount: 0,
      };
    } else {
      logger.info(`Found ${messages.length} unread messages`);
      const html = renderer.render(messages, channel);
      const path = await writeArtifact(checkedAt, html);
      logger.info(`Successfully saved ${messages.length} messages to: ${path}`);

      filePath = path;
      next = {
        lastReadMessageId: messages[messages.length - 1].id,
        lastCheckTime: toZonedIsoString(checkedAt, config.timeZone),
        lastMessageCount: messages.length,
        lastFilePath: path,
      };
    }

    const checkpointSaved = await checkpoints.save(next);
    if (checkpointSaved) {
      logger.info(`Updated last read message ID to: ${next.lastReadMessageId ?? 'none'}`);
    } else if (messages.length > 0) {
      logger.error('Failed to save state after processing messages');
    } else {
      logger.warn('Failed to save state after an empty check');
    }

    return {
      channelId: config.channelId,
      messageCount: messages.length,
      fileCreated: filePath !== null,
      filePath,
      previousMessageId: previous.lastReadMessageId,
      newMessageId: next.lastReadMessageId,
      checkpointSaved,
    };
  };

  return { run };
}

export type ArchiveRunner = ReturnType<typeof createArchiveRunner>;

/**
 * 実行結果を 1 行の構造化ログ（JSON）に変換する
 */
export function formatRunSummary(result: RunResult): string {
  return JSON.stringify({
    message: 'Message check completed',
    labels: {
      channel_id: result.channelId,
      unread_count: result.messageCount,
      file_created: result.fileCreated,
      last_read_id: result.previousMessageId,
      new_last_read_id: result.newMessageId,
    },
  });
}
