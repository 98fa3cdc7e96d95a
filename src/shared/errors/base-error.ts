export type BaseError = Error & {
  code: string;
  details?: Record<string, unknown>;
};

export type ErrorCode =
  | 'INTERNAL_ERROR'
  | 'CONFIG_INVALID'
  | 'DISCORD_TRANSPORT_FAILED'
  | 'DISCORD_API_ERROR'
  | 'DISCORD_INVALID_RESPONSE'
  | 'STORAGE_UNAVAILABLE'
  | 'ARTIFACT_UPLOAD_FAILED';

/**
 * ベースエラーを作成する
 */
export function createBaseError(
  message: string,
  code: ErrorCode = 'INTERNAL_ERROR',
  details?: Record<string, unknown>
): BaseError {
  const cause = details?.cause;
  const error = new Error(message, cause === undefined ? undefined : { cause });
  return Object.assign(error, { name: 'BaseError', code, details });
}

/**
 * BaseError かどうかを判定する（code を指定した場合はコードも照合する）
 */
export function isBaseError(error: unknown, code?: ErrorCode): error is BaseError {
  if (!(error instanceof Error) || !('code' in error) || typeof error.code !== 'string') {
    return false;
  }
  return code === undefined || error.code === code;
}

/**
 * 設定値の検証エラー
 */
export function createConfigError(issues: string[]): BaseError {
  return createBaseError(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_INVALID', {
    issues,
  });
}

/**
 * Discord API への通信自体が失敗した（ネットワーク断・タイムアウトなど）
 */
export function createTransportError(context: string, cause: unknown): BaseError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return createBaseError(`${context}: ${reason}`, 'DISCORD_TRANSPORT_FAILED', { cause });
}

/**
 * Discord API が 2xx 以外を返した
 */
export function createApiError(context: string, statusCode: number, body: unknown): BaseError {
  return createBaseError(`${context}: HTTP ${statusCode}`, 'DISCORD_API_ERROR', {
    statusCode,
    body,
  });
}

/**
 * Discord API のレスポンスが想定した形になっていない
 */
export function createParseError(context: string, issues: string[]): BaseError {
  return createBaseError(`${context}: unexpected response shape`, 'DISCORD_INVALID_RESPONSE', {
    issues,
  });
}

export function createStorageError(
  message: string,
  code: Extract<ErrorCode, 'STORAGE_UNAVAILABLE' | 'ARTIFACT_UPLOAD_FAILED'>,
  details?: Record<string, unknown>
): BaseError {
  return createBaseError(message, code, details);
}
