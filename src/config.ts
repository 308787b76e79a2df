import crypto from 'node:crypto';
import path from 'node:path';
import { BotConfig } from './types';

function parsePositiveInt(value: string | undefined, fallback: number, key: string): number {
  if (!value || value.trim() === '') return fallback;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Environment variable ${key} must be a positive integer`);
  }
  return parsed;
}

function parseOptionalInt(value: string | undefined, key: string): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer`);
  }
  return parsed;
}

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

function parseTimezone(value: string | undefined, fallback: string): string {
  const candidate = value?.trim();
  if (!candidate) return fallback;

  try {
    new Intl.DateTimeFormat('en-US', { timeZone: candidate });
  } catch {
    throw new Error('Environment variable TIMEZONE must be a valid IANA time zone');
  }

  return candidate;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const botToken = env.BOT_TOKEN?.trim();
  if (!botToken) {
    throw new Error('BOT_TOKEN is required');
  }

  const configuredSalt = env.DATA_HASH_SALT?.trim();

  return {
    botToken,
    timezone: parseTimezone(env.TIMEZONE, 'Europe/Moscow'),
    databasePath: env.DATABASE_PATH?.trim() || path.resolve(process.cwd(), 'data/moderation.sqlite'),
    logChatId: parseOptionalInt(env.LOG_CHAT_ID, 'LOG_CHAT_ID'),
    superadminId: parseOptionalInt(env.SUPERADMIN_ID, 'SUPERADMIN_ID'),
    dataHashSalt: configuredSalt || crypto.randomBytes(32).toString('hex'),
    dataHashSaltGenerated: !configuredSalt,
    noticeInChat: parseBoolean(env.NOTICE_IN_CHAT, true),
    cleanupIntervalSec: parsePositiveInt(env.CLEANUP_INTERVAL_SEC, 300, 'CLEANUP_INTERVAL_SEC'),
    adminCacheTtlSec: parsePositiveInt(env.ADMIN_CACHE_TTL_SEC, 300, 'ADMIN_CACHE_TTL_SEC'),
  };
}
