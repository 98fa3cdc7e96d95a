import { formatFileSize } from '../../shared/formatters/file-size';
import { escapeHtml, escapeMultiline } from '../../shared/formatters/html';
import { formatDisplayTime, parseIsoTimestamp } from '../../shared/utils/time';
import { logger } from '../../infrastructure/logging/logger';

import { ARCHIVE_STYLES } from './html-styles';
import type { ArchivedMessage, Attachment, ChannelInfo, Embed, EmbedField } from './types';

const UNKNOWN = 'Unknown';

export interface HtmlRendererOptions {
  timeZone: string;
  now?: () => Date;
}

export interface HtmlRenderer {
  render(messages: readonly ArchivedMessage[], channel: ChannelInfo | null): string;
}

/**
 * "1 new message" / "N new messages"
 */
export function describeMessageCount(count: number): string {
  return `${count} new message${count === 1 ? '' : 's'}`;
}

/**
 * メッセージ一覧を 1 つの HTML ドキュメントに変換するレンダラーを作成する
 * 出力に含めるユーザー由来の文字列はすべてここでエスケープする
 */
export function createHtmlRenderer(options: HtmlRendererOptions): HtmlRenderer {
  const now = options.now ?? (() => new Date());

  const formatTimestamp = (timestamp: string): string => {
    if (!timestamp) return UNKNOWN;
    const parsed = parseIsoTimestamp(timestamp);
    if (!parsed) {
      logger.warn(`Failed to parse timestamp: ${timestamp}`);
      return timestamp;
    }
    return formatDisplayTime(parsed, options.timeZone);
  };

  const renderAttachment = (attachment: Attachment): string =>
    [
      '                <div class="attachment">',
      '                    <span class="attachment-icon">📎</span>',
      `                    <a href="${escapeHtml(attachment.url)}" target="_blank" rel="noopener noreferrer">${escapeHtml(attachment.filename)}</a>`,
      `                    <span class="attachment-size">(${formatFileSize(attachment.size)})</span>`,
      '                </div>',
    ].join('\n');

  const renderField = (field: EmbedField): string =>
    [
      `                        <div class="embed-field${field.inline ? ' inline' : ''}">`,
      `                            <div class="embed-field-name">${escapeHtml(field.name)}</div>`,
      `                            <div class="embed-field-value">${escapeMultiline(field.value)}</div>`,
      '                        </div>',
    ].join('\n');

  const renderEmbed = (embed: Embed): string => {
    const parts = ['                <div class="embed">'];

    if (embed.title !== null) {
      const title = escapeHtml(embed.title);
      const inner =
        embed.url !== null
          ? `<a href="${escapeHtml(embed.url)}" target="_blank" rel="noopener noreferrer">${title}</a>`
          : title;
      parts.push(`                    <div class="embed-title">${inner}</div>`);
    }

    if (embed.description !== null) {
      parts.push(
        `                    <div class="embed-description">${escapeMultiline(embed.description)}</div>`
      );
    }

    if (embed.fields.length > 0) {
      parts.push('                    <div class="embed-fields">');
      parts.push(...embed.fields.map(renderField));
      parts.push('                    </div>');
    }

    if (embed.footer !== null) {
      parts.push(`                    <div class="embed-footer">${escapeHtml(embed.footer.text)}</div>`);
    }

    parts.push('                </div>');
    return parts.join('\n');
  };

  const renderMessage = (message: ArchivedMessage): string => {
    const author = `${message.author.username}#${message.author.discriminator || '0000'}`;
    const parts = [
      `        <div class="message" data-message-id="${escapeHtml(message.id)}">`,
      '            <div class="message-header">',
      `                <span class="author">${escapeHtml(author)}</span>`,
      `                <span class="timestamp">${escapeHtml(formatTimestamp(message.timestamp))}</span>`,
      '            </div>',
    ];

    if (message.content) {
      parts.push(`            <div class="content">${escapeMultiline(message.content)}</div>`);
    }

    if (message.attachments.length > 0) {
      parts.push('            <div class="attachments">');
      parts.push(...message.attachments.map(renderAttachment));
      parts.push('            </div>');
    }

    if (message.embeds.length > 0) {
      parts.push('            <div class="embeds">');
      parts.push(...message.embeds.map(renderEmbed));
      parts.push('            </div>');
    }

    parts.push('        </div>');
    return parts.join('\n');
  };

  const render = (messages: readonly ArchivedMessage[], channel: ChannelInfo | null): string => {
    const channelName = escapeHtml(channel?.name || UNKNOWN);
    const channelId = escapeHtml(channel?.id || UNKNOWN);
    const retrievedAt = formatDisplayTime(now(), options.timeZone);

    return [
      '<!DOCTYPE html>',
      '<html lang="en">',
      '<head>',
      '    <meta charset="UTF-8">',
      '    <meta name="viewport" content="width=device-width, initial-scale=1.0">',
      `    <title>Unread Discord Messages - Channel ${channelId}</title>`,
      ARCHIVE_STYLES,
      '</head>',
      '<body>',
      '    <header class="header">',
      '        <h1>Unread Messages Archive</h1>',
      `        <p>Channel: ${channelName} (${channelId})</p>`,
      `        <p>Retrieved: ${escapeHtml(retrievedAt)}</p>`,
      `        <p class="message-count">${describeMessageCount(messages.length)}</p>`,
      '    </header>',
      '    <main class="messages-container">',
      ...messages.map(renderMessage),
      '    </main>',
      '</body>',
      '</html>',
    ].join('\n');
  };

  return { render };
}
