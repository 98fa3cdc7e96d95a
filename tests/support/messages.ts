import type { ArchivedMessage } from '../../src/domain/archive/types';

export function makeMessage(overrides: Partial<ArchivedMessage> = {}): ArchivedMessage {
  return {
    id: '123456789',
    author: { username: 'TestUser', discriminator: '1234' },
    content: 'Hello, this is a test message!',
    timestamp: '2024-01-15T15:00:00+00:00',
    attachments: [],
    embeds: [],
    ...overrides,
  };
}

/**
 * Discord API が返す形のメッセージ（新しい順に並べて使う）
 */
export function wireMessage(id: string, content = `message ${id}`) {
  return {
    id,
    channel_id: '555',
    author: { id: '42', username: 'TestUser', discriminator: '0' },
    content,
    timestamp: '2024-01-15T14:00:00.000000+00:00',
    attachments: [],
    embeds: [],
  };
}
