import { describe, expect, it } from 'vitest';

import { createHtmlRenderer, describeMessageCount } from '../src/domain/archive/html-renderer';
import type { ChannelInfo } from '../src/domain/archive/types';

import { makeMessage } from './support/messages';

const channel: ChannelInfo = { id: '987654321', name: 'test-channel' };
const renderer = createHtmlRenderer({
  timeZone: 'America/New_York',
  now: () => new Date('2024-01-15T15:00:00Z'),
});

function countOccurrences(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe('createHtmlRenderer', () => {
  it('renders a complete document with the header', () => {
    const html = renderer.render([makeMessage()], channel);

    expect(html.startsWith('<!DOCTYPE html>\n<html lang="en">')).toBe(true);
    expect(html.endsWith('</body>\n</html>')).toBe(true);
    expect(html).toContain('<title>Unread Discord Messages - Channel 987654321</title>');
    expect(html).toContain('<style>');
    expect(html).toContain('<p>Channel: test-channel (987654321)</p>');
    expect(html).toContain('<p>Retrieved: 2024-01-15 10:00:00 AM EST</p>');
    expect(html).toContain('<p class="message-count">1 new message</p>');
    expect(countOccurrences(html, '<header class="header">')).toBe(1);
  });

  it('renders one block per message in input order', () => {
    const messages = ['1', '2', '3'].map((id) => makeMessage({ id, content: `message ${id}` }));
    const html = renderer.render(messages, channel);

    expect(countOccurrences(html, '<div class="message" ')).toBe(3);
    const positions = messages.map((message) => html.indexOf(`data-message-id="${message.id}"`));
    expect(positions.every((position) => position > 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
    expect(html).toContain('<p class="message-count">3 new messages</p>');
  });

  it('renders an empty batch', () => {
    const html = renderer.render([], channel);
    expect(countOccurrences(html, '<div class="message" ')).toBe(0);
    expect(html).toContain('<p class="message-count">0 new messages</p>');
  });

  it('renders the author and the converted timestamp', () => {
    const html = renderer.render([makeMessage()], channel);
    expect(html).toContain('<span class="author">TestUser#1234</span>');
    expect(html).toContain('<span class="timestamp">2024-01-15 10:00:00 AM EST</span>');
  });

  it('falls back to placeholders for missing data', () => {
    const html = renderer.render(
      [
        makeMessage({
          author: { username: 'Unknown', discriminator: '' },
          content: '',
          timestamp: '',
        }),
      ],
      null
    );

    expect(html).toContain('<p>Channel: Unknown (Unknown)</p>');
    expect(html).toContain('<span class="author">Unknown#0000</span>');
    expect(html).toContain('<span class="timestamp">Unknown</span>');
    expect(html).not.toContain('class="content"');
  });

  it('keeps an unparsable timestamp as-is', () => {
    const html = renderer.render([makeMessage({ timestamp: 'yesterday-ish' })], channel);
    expect(html).toContain('<span class="timestamp">yesterday-ish</span>');
  });

  it('escapes content and author names', () => {
    const html = renderer.render(
      [
        makeMessage({
          author: { username: 'User<script>', discriminator: '1234' },
          content: '<script>alert(1)</script> & "quoted"',
        }),
      ],
      { id: '1', name: '<b>chan</b>' }
    );

    expect(html).not.toContain('<script');
    expect(html).toContain(
      '<div class="content">&lt;script&gt;alert(1)&lt;/script&gt; &amp; &quot;quoted&quot;</div>'
    );
    expect(html).toContain('<span class="author">User&lt;script&gt;#1234</span>');
    expect(html).toContain('<p>Channel: &lt;b&gt;chan&lt;/b&gt; (1)</p>');
  });

  it('converts newlines in content to line breaks', () => {
    const html = renderer.render([makeMessage({ content: 'A\nB\nC' })], channel);
    expect(html).toContain('<div class="content">A<br>B<br>C</div>');
  });

  it('renders attachments with escaped links and sizes', () => {
    const html = renderer.render(
      [
        makeMessage({
          attachments: [
            { filename: 'test.png', url: 'https://example.com/test.png', size: 51200 },
            { filename: 'a"b.txt', url: 'https://example.com/a?x=1&y=2', size: 500 },
          ],
        }),
      ],
      channel
    );

    expect(html).toContain('<div class="attachments">');
    expect(html).toContain(
      '<a href="https://example.com/test.png" target="_blank" rel="noopener noreferrer">test.png</a>'
    );
    expect(html).toContain('<span class="attachment-size">(50.00 KB)</span>');
    expect(html).toContain(
      '<a href="https://example.com/a?x=1&amp;y=2" target="_blank" rel="noopener noreferrer">a&quot;b.txt</a>'
    );
    expect(html).toContain('<span class="attachment-size">(500 bytes)</span>');
  });

  it('renders embeds with title link, description, fields and footer', () => {
    const html = renderer.render(
      [
        makeMessage({
          embeds: [
            {
              title: 'Embed Title',
              url: 'https://example.com',
              description: 'First line\nSecond <line>',
              fields: [
                { name: 'Field 1', value: 'Value 1', inline: true },
                { name: 'Field 2', value: 'Multi\nline', inline: false },
              ],
              footer: { text: 'Footer & text' },
            },
          ],
        }),
      ],
      channel
    );

    expect(html).toContain(
      '<div class="embed-title"><a href="https://example.com" target="_blank" rel="noopener noreferrer">Embed Title</a></div>'
    );
    expect(html).toContain('<div class="embed-description">First line<br>Second &lt;line&gt;</div>');
    expect(html).toContain('<div class="embed-field inline">');
    expect(html).toContain('<div class="embed-field-name">Field 1</div>');
    expect(html).toContain('<div class="embed-field">');
    expect(html).toContain('<div class="embed-field-value">Multi<br>line</div>');
    expect(html).toContain('<div class="embed-footer">Footer &amp; text</div>');
  });

  it('renders a title without a link when the embed has no url', () => {
    const html = renderer.render(
      [
        makeMessage({
          embeds: [{ title: 'Plain', url: null, description: null, fields: [], footer: null }],
        }),
      ],
      channel
    );

    expect(html).toContain('<div class="embed-title">Plain</div>');
    expect(html).not.toContain('class="embed-description"');
    expect(html).not.toContain('class="embed-fields"');
    expect(html).not.toContain('class="embed-footer"');
  });

  it('is deterministic and leaves its input untouched', () => {
    const messages = [makeMessage({ content: 'x\ny' })];
    const snapshot = structuredClone(messages);

    const first = renderer.render(messages, channel);
    const second = renderer.render(messages, channel);

    expect(first).toBe(second);
    expect(messages).toEqual(snapshot);
  });
});

describe('describeMessageCount', () => {
  it('pluralizes everything except one', () => {
    expect(describeMessageCount(0)).toBe('0 new messages');
    expect(describeMessageCount(1)).toBe('1 new message');
    expect(describeMessageCount(2)).toBe('2 new messages');
  });
});
