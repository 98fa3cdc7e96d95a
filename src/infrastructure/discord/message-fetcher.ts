import { DiscordAPIError, HTTPError, RateLimitError, RESTEvents } from '@discordjs/rest';
import { Routes } from 'discord.js';

import type {
  BotIdentity,
  ChannelInfo,
  FetchMessagesOptions,
  FetchMessagesResult,
  MessageSource,
  RateLimitInfo,
} from '../../domain/archive/types';
import {
  createApiError,
  createParseError,
  createTransportError,
  type BaseError,
} from '../../shared/errors/base-error';
import { logger } from '../logging/logger';

import { createDiscordRestClient, type DiscordRestOptions } from './discord-client';
import {
  parseBotIdentity,
  parseChannelInfo,
  parseMessageList,
  readRateLimit,
  type ParseOutcome,
} from './message-schema';

export const MAX_FETCH_LIMIT = 100;

export interface MessageFetcherOptions extends DiscordRestOptions {
  rateLimitWarningThreshold: number;
}

/**
 * 1..100 に丸める（Discord API の上限は 100 件）
 */
export function clampFetchLimit(limit: number): number {
  if (!Number.isFinite(limit)) return MAX_FETCH_LIMIT;
  return Math.min(MAX_FETCH_LIMIT, Math.max(1, Math.trunc(limit)));
}

/**
 * REST クライアントの例外をエラー分類に変換する
 */
function toSourceError(context: string, error: unknown): BaseError {
  if (error instanceof DiscordAPIError) {
    return createApiError(context, error.status, error.rawError);
  }
  if (error instanceof HTTPError) {
    return createApiError(context, error.status, error.message);
  }
  if (error instanceof RateLimitError) {
    return createApiError(context, 429, {
      route: error.route,
      global: error.global,
      timeToReset: error.timeToReset,
    });
  }
  return createTransportError(context, error);
}

/**
 * メッセージフェッチャーを作成する
 * REST セッションを保持するため、使い終わったら必ず close() を呼ぶこと
 */
export function createMessageFetcher(options: MessageFetcherOptions): MessageSource {
  const rest = createDiscordRestClient(options);
  let latestRateLimit: RateLimitInfo | null = null;

  rest.on(RESTEvents.Response, (_request, response) => {
    latestRateLimit = readRateLimit(response.headers);
  });

  /**
   * 直近のレスポンスのレート制限情報を取り出し、残りが少なければ警告する
   */
  const takeRateLimit = (context: string): RateLimitInfo | null => {
    const info = latestRateLimit;
    latestRateLimit = null;
    if (!info) return null;

    logger.debug(`Rate limit info (${context})`, info);
    if (info.remaining !== null && info.remaining < options.rateLimitWarningThreshold) {
      logger.warn(`Rate limit warning: Only ${info.remaining} requests remaining!`);
    }
    return info;
  };

  const get = async <T>(
    route: `/${string}`,
    context: string,
    parse: (raw: unknown) => ParseOutcome<T>,
    query?: URLSearchParams
  ): Promise<{ value: T; rateLimit: RateLimitInfo | null }> => {
    let raw: unknown;
    try {
      raw = await rest.get(route, query ? { query } : {});
    } catch (error) {
      // ログの重要度は呼び出し元が決める
      takeRateLimit(context);
      throw toSourceError(context, error);
    }

    const rateLimit = takeRateLimit(context);
    const parsed = parse(raw);
    if (!parsed.ok) {
      throw createParseError(context, parsed.issues);
    }
    return { value: parsed.value, rateLimit };
  };

  /**
   * チャンネルのメッセージを 1 ページ取得する（古い順に並べ替えて返す）
   */
  const fetchMessages = async (
    channelId: string,
    fetchOptions: FetchMessagesOptions = {}
  ): Promise<FetchMessagesResult> => {
    const query = new URLSearchParams({
      limit: String(clampFetchLimit(fetchOptions.limit ?? MAX_FETCH_LIMIT)),
    });
    if (fetchOptions.after) query.set('after', fetchOptions.after);
    if (fetchOptions.before) query.set('before', fetchOptions.before);

    logger.info(`Fetching messages from channel ${channelId} with params: ${query.toString()}`);

    const { value, rateLimit } = await get(
      Routes.channelMessages(channelId),
      `Failed to fetch messages from channel ${channelId}`,
      parseMessageList,
      query
    );

    logger.info(`Successfully fetched ${value.length} messages`);
    // API は新しい順で返すので時系列順に反転する
    return { messages: [...value].reverse(), rateLimit };
  };

  /**
   * チャンネル情報を取得する
   */
  const fetchChannelInfo = async (channelId: string): Promise<ChannelInfo> => {
    logger.info(`Fetching channel info for ${channelId}`);
    const { value } = await get(
      Routes.channel(channelId),
      `Failed to fetch channel info for ${channelId}`,
      parseChannelInfo
    );
    logger.info(`Successfully fetched channel info: ${value.name}`);
    return value;
  };

  /**
   * トークンに対応する Bot ユーザーを取得する
   */
  const fetchCurrentUser = async (): Promise<BotIdentity> => {
    const { value } = await get(Routes.user('@me'), 'Failed to fetch bot identity', parseBotIdentity);
    return value;
  };

  const close = (): void => {
    rest.clearHashSweeper();
    rest.clearHandlerSweeper();
    rest.removeAllListeners();
  };

  return {
    fetchMessages,
    fetchChannelInfo,
    fetchCurrentUser,
    close,
  };
}
