import { ModAction } from '../types';
import { IdentifierContext, IdentifierMasker } from './identifier-masker';

export interface LogEvent {
  level: 'info' | 'warn' | 'error';
  message: string;
  meta?: Record<string, unknown>;
}

export type LogChatSender = (text: string) => Promise<unknown>;

const MASKED_META_KEYS: Record<string, IdentifierContext> = {
  chatId: 'chat',
  auditSinkChatId: 'chat',
  userId: 'user',
  adminId: 'user',
  targetUserId: 'user',
};

const REASON_LOG_LIMIT = 50;

export class BotLogger {
  constructor(
    private readonly masker: IdentifierMasker,
    private readonly sendToLogChat?: LogChatSender,
  ) {}

  async info(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'info', message, meta });
  }

  async warn(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'warn', message, meta });
  }

  async error(message: string, meta?: Record<string, unknown>): Promise<void> {
    await this.emit({ level: 'error', message, meta });
  }

  async moderation(action: ModAction): Promise<void> {
    const target = action.targetUserId === null ? '-' : this.masker.maskUser(action.targetUserId);
    const actor = action.adminId === null ? 'auto' : this.masker.maskUser(action.adminId);
    const message = [
      '[moderation]',
      `chat=${this.masker.maskChat(action.chatId)}`,
      `user=${target}`,
      `by=${actor}`,
      `action=${action.actionType}`,
      `reason=${sanitizeReason(action.reason)}`,
    ].join(' ');

    await this.emit({ level: 'info', message });
  }

  private async emit(event: LogEvent): Promise<void> {
    const meta = event.meta ? this.maskMeta(event.meta) : undefined;
    const payload = {
      ts: new Date().toISOString(),
      level: event.level,
      message: event.message,
      ...(meta ? { meta } : {}),
    };

    if (event.level === 'error') {
      console.error(JSON.stringify(payload));
    } else if (event.level === 'warn') {
      console.warn(JSON.stringify(payload));
    } else {
      console.log(JSON.stringify(payload));
    }

    if (event.level !== 'error' || !this.sendToLogChat) {
      return;
    }

    const text = [
      `[#${event.level.toUpperCase()}] ${event.message}`,
      meta ? `meta: ${JSON.stringify(meta)}` : null,
    ].filter(Boolean).join('\n');

    try {
      await this.sendToLogChat(text);
    } catch (error) {
      // Logging the failure through emit() again could loop on a broken log chat.
      console.error(JSON.stringify({
        ts: new Date().toISOString(),
        level: 'error',
        message: 'Failed to forward log event to log chat',
        meta: { error: error instanceof Error ? error.message : String(error) },
      }));
    }
  }

  private maskMeta(meta: Record<string, unknown>): Record<string, unknown> {
    const masked: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(meta)) {
      const context = MASKED_META_KEYS[key];
      if (context && (typeof value === 'number' || typeof value === 'string')) {
        masked[key] = this.masker.mask(value, context);
        continue;
      }

      masked[key] = value;
    }

    return masked;
  }
}

export function sanitizeReason(reason: string): string {
  const withoutMentions = reason.replace(/@[\p{L}\p{N}_]+/gu, '@***');
  return withoutMentions.length > REASON_LOG_LIMIT
    ? `${withoutMentions.slice(0, REASON_LOG_LIMIT)}…`
    : withoutMentions;
}
