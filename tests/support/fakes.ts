import { vi } from 'vitest';
import { SqliteDatabase } from '../../src/db/sqlite';
import { Moderation, ModerationConfig, ModerationOptions, createModeration } from '../../src/moderation';
import { createRepositories, Repositories } from '../../src/repos';
import { IdentifierMasker } from '../../src/services/identifier-masker';
import { BotLogger } from '../../src/services/logger';
import { MaxApi, MaxSendExtra, MaxChatTransport } from '../../src/transport/max-transport';

export interface SentRecord {
  target: { chatId: number } | { userId: number };
  text: string;
  extra?: MaxSendExtra;
  messageId: string;
}

interface RemoveMemberPayload {
  chat_id: number;
  user_id: number;
  block?: boolean;
}

/** In-process stand-in for the MAX API client that records every call. */
export class FakeMaxApi implements MaxApi {
  readonly sent: SentRecord[] = [];
  readonly deleted: string[] = [];
  readonly deleteAttempts: string[] = [];
  readonly removed: RemoveMemberPayload[] = [];
  readonly callbackAnswers: Array<{ callbackId: string; notification: string }> = [];
  readonly admins = new Set<number>();
  readonly failingDeletes = new Set<string>();
  readonly missingMessages = new Set<string>();
  failRemoveMember = false;
  failSend = false;
  chatTitle = 'Тестовый чат';
  memberCount = 42;

  private nextMessage = 1;

  readonly raw = {
    chats: {
      removeChatMember: async (payload: RemoveMemberPayload): Promise<unknown> => {
        if (this.failRemoveMember) {
          throw Object.assign(new Error('forbidden'), { status: 403 });
        }
        this.removed.push(payload);
        return { success: true };
      },
    },
  };

  async sendMessageToChat(chatId: number, text: string, extra?: MaxSendExtra): Promise<unknown> {
    return this.record({ chatId }, text, extra);
  }

  async sendMessageToUser(userId: number, text: string, extra?: MaxSendExtra): Promise<unknown> {
    return this.record({ userId }, text, extra);
  }

  async deleteMessage(messageId: string): Promise<unknown> {
    this.deleteAttempts.push(messageId);
    if (this.missingMessages.has(messageId)) {
      throw Object.assign(new Error('message not found'), { status: 404 });
    }
    if (this.failingDeletes.has(messageId)) {
      throw Object.assign(new Error('internal error'), { status: 500 });
    }
    this.deleted.push(messageId);
    return { success: true };
  }

  async getChatMembers(_chatId: number, extra: { user_ids: number[] }): Promise<unknown> {
    return {
      members: extra.user_ids.map((userId) => ({
        user_id: userId,
        is_admin: this.admins.has(userId),
        is_owner: false,
      })),
    };
  }

  async getChat(chatId: number): Promise<unknown> {
    return { chat_id: chatId, title: this.chatTitle, participants_count: this.memberCount };
  }

  async answerOnCallback(callbackId: string, extra: { notification: string }): Promise<unknown> {
    this.callbackAnswers.push({ callbackId, notification: extra.notification });
    return { success: true };
  }

  sentTo(target: { chatId: number } | { userId: number }): SentRecord[] {
    return this.sent.filter((record) => JSON.stringify(record.target) === JSON.stringify(target));
  }

  private record(target: SentRecord['target'], text: string, extra?: MaxSendExtra): unknown {
    if (this.failSend) {
      throw new Error('send failed');
    }
    const messageId = `bot-${this.nextMessage}`;
    this.nextMessage += 1;
    this.sent.push({ target, text, extra, messageId });
    return { body: { mid: messageId } };
  }
}

/** Deterministic Park-Miller source for reproducible challenges. Seed must be positive. */
export function seededRandom(seed: number = 42): () => number {
  let state = seed % 2147483647;
  return () => {
    state = (state * 48271) % 2147483647;
    return (state - 1) / 2147483646;
  };
}

export const TEST_CONFIG: ModerationConfig = {
  timezone: 'UTC',
  noticeInChat: false,
  adminCacheTtlSec: 60,
};

export function silenceConsole(): void {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
}

export function createTestLogger(): BotLogger {
  return new BotLogger(new IdentifierMasker('test-secret'));
}

export interface TestHarness {
  db: SqliteDatabase;
  repos: Repositories;
  api: FakeMaxApi;
  transport: MaxChatTransport;
  logger: BotLogger;
  moderation: Moderation;
  close(): void;
}

export function createHarness(config: Partial<ModerationConfig> = {}, options: ModerationOptions = {}): TestHarness {
  const db = new SqliteDatabase(':memory:');
  const repos = createRepositories(db.db);
  const api = new FakeMaxApi();
  const transport = new MaxChatTransport(api, repos.restrictions);
  const logger = createTestLogger();
  const moderation = createModeration(repos, transport, logger, { ...TEST_CONFIG, ...config }, {
    random: options.random ?? seededRandom(),
    sleep: options.sleep ?? (async () => {}),
  });

  return {
    db,
    repos,
    api,
    transport,
    logger,
    moderation,
    close() {
      moderation.challenges.cancelAll();
      db.close();
    },
  };
}

export interface ChatMessageInput {
  chatId?: number;
  userId: number;
  mid: string;
  text?: string | null;
  name?: string;
  isBot?: boolean;
  chatType?: 'dialog' | 'chat' | 'channel';
}

export function chatMessage(input: ChatMessageInput): { message: unknown; myId: number } {
  return {
    myId: 1,
    message: {
      sender: { user_id: input.userId, name: input.name ?? 'Участник', is_bot: input.isBot ?? false },
      recipient: { chat_id: input.chatId ?? 100, chat_type: input.chatType ?? 'chat' },
      body: { mid: input.mid, text: input.text ?? null, attachments: null },
    },
  };
}
