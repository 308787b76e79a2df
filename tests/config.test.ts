import { describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config';

describe('loadConfig', () => {
  it('requires a bot token', () => {
    expect(() => loadConfig({})).toThrow('BOT_TOKEN is required');
  });

  it('reads explicit values', () => {
    const config = loadConfig({
      BOT_TOKEN: 'test-token',
      TIMEZONE: 'UTC',
      DATABASE_PATH: '/tmp/moderation.sqlite',
      LOG_CHAT_ID: '-500',
      SUPERADMIN_ID: '42',
      DATA_HASH_SALT: 'test-secret',
      NOTICE_IN_CHAT: 'off',
      CLEANUP_INTERVAL_SEC: '60',
      ADMIN_CACHE_TTL_SEC: '30',
    });

    expect(config).toEqual({
      botToken: 'test-token',
      timezone: 'UTC',
      databasePath: '/tmp/moderation.sqlite',
      logChatId: -500,
      superadminId: 42,
      dataHashSalt: 'test-secret',
      dataHashSaltGenerated: false,
      noticeInChat: false,
      cleanupIntervalSec: 60,
      adminCacheTtlSec: 30,
    });
  });

  it('falls back to defaults and generates a salt', () => {
    const config = loadConfig({ BOT_TOKEN: 'test-token' });

    expect(config.timezone).toBe('Europe/Moscow');
    expect(config.logChatId).toBeUndefined();
    expect(config.noticeInChat).toBe(true);
    expect(config.cleanupIntervalSec).toBe(300);
    expect(config.dataHashSaltGenerated).toBe(true);
    expect(config.dataHashSalt).toMatch(/^[0-9a-f]{64}$/);
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ BOT_TOKEN: 'test-token', TIMEZONE: 'Mars/Olympus' }))
      .toThrow('Environment variable TIMEZONE must be a valid IANA time zone');
    expect(() => loadConfig({ BOT_TOKEN: 'test-token', CLEANUP_INTERVAL_SEC: '0' }))
      .toThrow('Environment variable CLEANUP_INTERVAL_SEC must be a positive integer');
    expect(() => loadConfig({ BOT_TOKEN: 'test-token', LOG_CHAT_ID: 'chat' }))
      .toThrow('Environment variable LOG_CHAT_ID must be an integer');
  });
});
