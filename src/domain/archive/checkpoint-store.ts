import { z } from 'zod';

import { logger } from '../../infrastructure/logging/logger';

import type { Checkpoint, ObjectStore } from './types';

export const CHECKPOINT_KEY = '_state/bot_state.json';

export const EMPTY_CHECKPOINT: Readonly<Checkpoint> = Object.freeze({
  lastReadMessageId: null,
  lastCheckTime: null,
  lastMessageCount: 0,
  lastFilePath: null,
});

const nullableText = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

// 保存形式は snake_case のまま
const persistedCheckpointSchema = z.object({
  last_read_message_id: nullableText,
  last_check_time: nullableText,
  last_message_count: z.number().int().nonnegative().optional().default(0),
  last_file_path: nullableText,
});

type PersistedCheckpoint = z.input<typeof persistedCheckpointSchema>;

export interface CheckpointStore {
  load(): Promise<Checkpoint>;
  save(checkpoint: Checkpoint): Promise<boolean>;
}

/**
 * 状態ファイル（最後に読んだメッセージ ID など）の読み書きを行うストアを作成する
 */
export function createCheckpointStore(store: ObjectStore, key = CHECKPOINT_KEY): CheckpointStore {
  /**
   * 状態を読み込む。存在しない・壊れている場合は初期状態を返し、例外は投げない
   */
  const load = async (): Promise<Checkpoint> => {
    let text: string | null;
    try {
      text = await store.downloadText(key);
    } catch (error) {
      logger.warn('Failed to load state', error);
      return { ...EMPTY_CHECKPOINT };
    }

    if (text === null) {
      logger.info('No saved state found, starting from the beginning');
      return { ...EMPTY_CHECKPOINT };
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      logger.warn('Failed to parse state, starting from the beginning', error);
      return { ...EMPTY_CHECKPOINT };
    }

    const parsed = persistedCheckpointSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('Saved state has an unexpected shape, starting from the beginning', parsed.error.issues);
      return { ...EMPTY_CHECKPOINT };
    }

    return {
      lastReadMessageId: parsed.data.last_read_message_id,
      lastCheckTime: parsed.data.last_check_time,
      lastMessageCount: parsed.data.last_message_count,
      lastFilePath: parsed.data.last_file_path,
    };
  };

  /**
   * 状態を上書き保存する。失敗時は false を返し、致命的かどうかは呼び出し元が判断する
   */
  const save = async (checkpoint: Checkpoint): Promise<boolean> => {
    const persisted: PersistedCheckpoint = {
      last_read_message_id: checkpoint.lastReadMessageId,
      last_check_time: checkpoint.lastCheckTime,
      last_message_count: checkpoint.lastMessageCount,
      last_file_path: checkpoint.lastFilePath,
    };

    try {
      return await store.uploadText(key, JSON.stringify(persisted, null, 2), 'application/json');
    } catch (error) {
      logger.error('Failed to save state', error);
      return false;
    }
  };

  return { load, save };
}
