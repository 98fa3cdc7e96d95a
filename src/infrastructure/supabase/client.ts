import { StorageClient } from '@supabase/storage-js';

import { APP_NAME } from '../../config/app-info';

export interface StorageClientOptions {
  url: string;
  key: string;
  timeoutMs: number;
  /** テスト時に HTTP 層を差し替えるためのフック */
  fetch?: typeof fetch;
}

/**
 * Supabase Storage のクライアントを作成する
 * Realtime や Auth は使わないため Storage API だけを直接扱う
 * ストレージ呼び出しごとにタイムアウトを設定する
 */
export function createStorageClient(options: StorageClientOptions): StorageClient {
  const baseFetch = options.fetch ?? fetch;
  const timedFetch: typeof fetch = (input, init = {}) =>
    baseFetch(input, {
      ...init,
      signal: AbortSignal.timeout(options.timeoutMs),
    });

  return new StorageClient(
    `${options.url.replace(/\/+$/, '')}/storage/v1`,
    {
      apikey: options.key,
      Authorization: `Bearer ${options.key}`,
      'x-client-info': APP_NAME,
    },
    timedFetch
  );
}
