import { z } from 'zod';

import type {
  ArchivedMessage,
  BotIdentity,
  ChannelInfo,
  RateLimitInfo,
} from '../../domain/archive/types';

// 欠けている任意項目は null に正規化する
const optionalText = z
  .string()
  .nullish()
  .catch(null)
  .transform((value) => value ?? null);

const attachmentSchema = z.object({
  filename: z.string().catch('Unknown'),
  url: z.string().catch('#'),
  size: z.number().int().nonnegative().catch(0),
});

const embedFieldSchema = z.object({
  name: z.string().catch(''),
  value: z.string().catch(''),
  inline: z.boolean().catch(false),
});

const embedSchema = z.object({
  title: optionalText,
  url: optionalText,
  description: optionalText,
  fields: z.array(embedFieldSchema).catch([]),
  footer: z
    .object({ text: z.string().catch('') })
    .nullish()
    .catch(null)
    .transform((value) => value ?? null),
});

const authorSchema = z
  .object({
    username: z.string().catch('Unknown'),
    discriminator: z.string().catch('0000'),
  })
  .catch({ username: 'Unknown', discriminator: '0000' });

const messageSchema = z.object({
  id: z.string().min(1),
  author: authorSchema,
  content: z.string().catch(''),
  timestamp: z.string().catch(''),
  attachments: z.array(attachmentSchema).catch([]),
  embeds: z.array(embedSchema).catch([]),
});

export const messageListSchema = z.array(messageSchema);

export const channelInfoSchema = z.object({
  id: z.string().catch('Unknown'),
  name: z
    .string()
    .min(1)
    .nullish()
    .catch(null)
    .transform((value) => value ?? 'Unknown'),
});

export const botIdentitySchema = z.object({
  id: z.string(),
  username: z.string(),
  discriminator: z.string().catch('0'),
});

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; issues: string[] };

function toOutcome<I, T>(result: z.SafeParseReturnType<I, T>): ParseOutcome<T> {
  if (result.success) return { ok: true, value: result.data };
  return {
    ok: false,
    issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
  };
}

export function parseMessageList(raw: unknown): ParseOutcome<ArchivedMessage[]> {
  return toOutcome(messageListSchema.safeParse(raw));
}

export function parseChannelInfo(raw: unknown): ParseOutcome<ChannelInfo> {
  return toOutcome(channelInfoSchema.safeParse(raw));
}

export function parseBotIdentity(raw: unknown): ParseOutcome<BotIdentity> {
  return toOutcome(botIdentitySchema.safeParse(raw));
}

interface HeaderSource {
  get(name: string): string | null;
}

function toNumber(value: string | null): number | null {
  if (value === null || value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * X-RateLimit-* ヘッダーを読み取る（いずれも無ければ null）
 */
export function readRateLimit(headers: HeaderSource): RateLimitInfo | null {
  const raw = {
    limit: headers.get('x-ratelimit-limit'),
    remaining: headers.get('x-ratelimit-remaining'),
    reset: headers.get('x-ratelimit-reset'),
    resetAfter: headers.get('x-ratelimit-reset-after'),
    bucket: headers.get('x-ratelimit-bucket'),
    global: headers.get('x-ratelimit-global'),
  };

  if (Object.values(raw).every((value) => value === null)) return null;

  return {
    limit: toNumber(raw.limit),
    remaining: toNumber(raw.remaining),
    reset: toNumber(raw.reset),
    resetAfter: toNumber(raw.resetAfter),
    bucket: raw.bucket,
    global: raw.global?.toLowerCase() === 'true',
  };
}
