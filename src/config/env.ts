import { z } from 'zod';

import { LOG_LEVEL_NAMES, type LogLevelName } from '../infrastructure/logging/logger';
import { createConfigError } from '../shared/errors/base-error';
import { isValidTimeZone } from '../shared/utils/time';

const requiredString = z.string().trim().min(1, 'is required');

const envSchema = z
  .object({
    DISCORD_BOT_TOKEN: requiredString,
    DISCORD_CHANNEL_ID: requiredString,
    STORAGE_BUCKET: requiredString,
    STORAGE_LOCATION: z.string().trim().min(1).default('us-central1'),
    SUPABASE_URL: z.string().url(),
    SUPABASE_SERVICE_ROLE_KEY: z.string().trim().optional(),
    SUPABASE_ANON_KEY: z.string().trim().optional(),
    TIMEZONE: z
      .string()
      .default('America/New_York')
      .refine(isValidTimeZone, { message: 'must be a valid IANA time zone' }),
    API_CALL_TIMEOUT: z.coerce.number().positive().default(30),
    RATE_LIMIT_WARNING_THRESHOLD: z.coerce.number().int().nonnegative().default(10),
    MESSAGE_FETCH_LIMIT: z.coerce.number().int().min(1).max(100).default(100),
    LOG_LEVEL: z
      .string()
      .default('info')
      .transform((value) => value.toLowerCase())
      .pipe(z.enum(LOG_LEVEL_NAMES)),
  })
  .refine((env) => Boolean(env.SUPABASE_SERVICE_ROLE_KEY || env.SUPABASE_ANON_KEY), {
    message: 'SUPABASE_SERVICE_ROLE_KEY or SUPABASE_ANON_KEY is required',
    path: ['SUPABASE_SERVICE_ROLE_KEY'],
  });

export interface AppConfig {
  readonly discordToken: string;
  readonly channelId: string;
  readonly storageBucket: string;
  readonly storageLocation: string;
  readonly supabaseUrl: string;
  readonly supabaseKey: string;
  readonly timeZone: string;
  readonly requestTimeoutMs: number;
  readonly rateLimitWarningThreshold: number;
  readonly fetchLimit: number;
  readonly logLevel: LogLevelName;
}

/**
 * 環境変数を読み込み、バリデーションして不変の設定オブジェクトを返す
 * 空文字の環境変数は未設定として扱う
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== '')
  );
  const result = envSchema.safeParse(present);

  if (!result.success) {
    throw createConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'env'} ${issue.message}`)
    );
  }

  const env = result.data;
  return Object.freeze({
    discordToken: env.DISCORD_BOT_TOKEN,
    channelId: env.DISCORD_CHANNEL_ID,
    storageBucket: env.STORAGE_BUCKET,
    storageLocation: env.STORAGE_LOCATION,
    supabaseUrl: env.SUPABASE_URL,
    supabaseKey: env.SUPABASE_SERVICE_ROLE_KEY || env.SUPABASE_ANON_KEY || '',
    timeZone: env.TIMEZONE,
    requestTimeoutMs: Math.round(env.API_CALL_TIMEOUT * 1000),
    rateLimitWarningThreshold: env.RATE_LIMIT_WARNING_THRESHOLD,
    fetchLimit: env.MESSAGE_FETCH_LIMIT,
    logLevel: env.LOG_LEVEL,
  });
}
