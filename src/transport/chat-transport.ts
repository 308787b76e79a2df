import { MemberStatus } from '../types';

export type MessageTarget = { chatId: number } | { userId: number };

export interface InlineButton {
  text: string;
  payload: string;
}

export interface SendMessageOptions {
  format?: 'html' | 'markdown';
  buttons?: InlineButton[][];
  notify?: boolean;
}

export interface SentMessage {
  messageId: string | null;
}

export interface ChatPermissions {
  canSendMessages: boolean;
}

export interface ChatInfo {
  title?: string;
  memberCount?: number;
}

export interface ChatTransport {
  sendMessage(target: MessageTarget, text: string, options?: SendMessageOptions): Promise<SentMessage>;
  deleteMessage(chatId: number, messageId: string): Promise<void>;
  restrictUser(chatId: number, userId: number, permissions: ChatPermissions, untilTs: number): Promise<void>;
  banUser(chatId: number, userId: number): Promise<void>;
  unbanUser(chatId: number, userId: number): Promise<void>;
  kickUser(chatId: number, userId: number): Promise<void>;
  getMemberStatus(chatId: number, userId: number): Promise<MemberStatus>;
  getChatInfo(chatId: number): Promise<ChatInfo>;
  answerCallback(callbackId: string, notification: string): Promise<void>;
}

export abstract class BaseChatTransport implements ChatTransport {
  abstract sendMessage(target: MessageTarget, text: string, options?: SendMessageOptions): Promise<SentMessage>;
  abstract deleteMessage(chatId: number, messageId: string): Promise<void>;
  abstract restrictUser(chatId: number, userId: number, permissions: ChatPermissions, untilTs: number): Promise<void>;
  abstract banUser(chatId: number, userId: number): Promise<void>;
  abstract unbanUser(chatId: number, userId: number): Promise<void>;
  abstract getMemberStatus(chatId: number, userId: number): Promise<MemberStatus>;
  abstract getChatInfo(chatId: number): Promise<ChatInfo>;
  abstract answerCallback(callbackId: string, notification: string): Promise<void>;

  async kickUser(chatId: number, userId: number): Promise<void> {
    await this.banUser(chatId, userId);
    await this.unbanUser(chatId, userId);
  }
}

export function isChatTarget(target: MessageTarget): target is { chatId: number } {
  return 'chatId' in target;
}
