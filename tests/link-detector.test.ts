import { describe, expect, it } from 'vitest';
import { collectModeratedText, extractLinks, findUnlistedLinks } from '../src/moderation/link-detector';
import { IncomingMessage } from '../src/moderation/updates';

function makeMessage(
  text: string,
  attachments: unknown[] = [],
  link?: IncomingMessage['link'],
): IncomingMessage {
  return {
    sender: { user_id: 10 },
    recipient: { chat_id: 100, chat_type: 'chat' },
    body: {
      mid: 'm1',
      text,
      attachments,
    },
    link,
  };
}

describe('link detector', () => {
  it('detects scheme links', () => {
    expect(extractLinks('check https://example.com/path')).toEqual(['https://example.com/path']);
  });

  it('detects bare domains and ipv4 hosts without protocol', () => {
    expect(extractLinks('visit example.org, then 192.168.10.15/admin')).toEqual([
      'example.org',
      '192.168.10.15/admin',
    ]);
  });

  it('reports an html href once', () => {
    expect(extractLinks('привет <a href="https://max.ru">x</a>')).toEqual(['https://max.ru']);
  });

  it('detects non-http schemes', () => {
    expect(extractLinks('invite tg://resolve?domain=my_channel')).toEqual(['tg://resolve?domain=my_channel']);
  });

  it('ignores invalid ipv4 and plain text', () => {
    expect(extractLinks('version 999.1.1.1 released')).toEqual([]);
    expect(extractLinks('просто текст без ссылок')).toEqual([]);
    expect(extractLinks(null)).toEqual([]);
  });

  it('filters whitelisted links by case-insensitive containment', () => {
    expect(findUnlistedLinks(['https://max.ru/x', 'spam.io'], ['MAX.ru'])).toEqual(['spam.io']);
    expect(findUnlistedLinks(['spam.io'], [])).toEqual(['spam.io']);
  });

  it('collects links hidden in link buttons but not media urls', () => {
    const message = makeMessage('смотри', [
      {
        type: 'inline_keyboard',
        payload: {
          buttons: [[{ type: 'link', text: 'go', url: 'https://spam.example.org' }]],
        },
      },
      {
        type: 'image',
        payload: { url: 'https://media.example.net/photo/123', token: 'abc' },
      },
    ]);

    expect(collectModeratedText(message)).toBe('смотри\nhttps://spam.example.org');
  });

  it('includes forwarded message text', () => {
    const message = makeMessage('hi', [], { type: 'forward', message: { text: 'перейди на spam.io' } });

    expect(collectModeratedText(message)).toBe('hi\nперейди на spam.io');
    expect(extractLinks(collectModeratedText(message))).toEqual(['spam.io']);
  });
});
