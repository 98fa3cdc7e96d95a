import { REST, type RESTOptions } from '@discordjs/rest';

import { APP_NAME, APP_VERSION } from '../../config/app-info';

export interface DiscordRestOptions {
  token: string;
  timeoutMs: number;
  /** テスト時に HTTP 層を差し替えるためのフック */
  makeRequest?: RESTOptions['makeRequest'];
}

/**
 * "Bot " 付きで渡されたトークンから接頭辞を取り除く（REST 側で付与するため）
 */
export function normalizeBotToken(token: string): string {
  return token.trim().replace(/^Bot\s+/i, '');
}

/**
 * Discord REST クライアントを作成する
 * リトライもレート制限待ちもせず、1 回の試行で失敗を呼び出し元へ返す
 */
export function createDiscordRestClient(options: DiscordRestOptions): REST {
  const rest = new REST({
    version: '10',
    timeout: options.timeoutMs,
    retries: 0,
    rejectOnRateLimit: () => true,
    userAgentAppendix: `${APP_NAME}/${APP_VERSION}`,
    ...(options.makeRequest ? { makeRequest: options.makeRequest } : {}),
  });
  return rest.setToken(normalizeBotToken(options.token));
}
