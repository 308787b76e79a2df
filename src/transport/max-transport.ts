import { TransportError, extractErrorStatus } from '../errors';
import { RestrictionsRepo } from '../repos/restrictions-repo';
import { extractMessageId } from '../services/bot-message-autodelete';
import { MemberStatus } from '../types';
import {
  BaseChatTransport,
  ChatInfo,
  ChatPermissions,
  InlineButton,
  MessageTarget,
  SendMessageOptions,
  SentMessage,
  isChatTarget,
} from './chat-transport';

interface MaxCallbackButton {
  type: 'callback';
  text: string;
  payload: string;
}

interface MaxInlineKeyboard {
  type: 'inline_keyboard';
  payload: {
    buttons: MaxCallbackButton[][];
  };
}

export interface MaxSendExtra {
  format?: 'html' | 'markdown';
  notify?: boolean;
  attachments?: MaxInlineKeyboard[];
}

type RemoveChatMember = (payload: { chat_id: number; user_id: number; block?: boolean }) => Promise<unknown>;

export interface MaxApi {
  sendMessageToChat(chatId: number, text: string, extra?: MaxSendExtra): Promise<unknown>;
  sendMessageToUser(userId: number, text: string, extra?: MaxSendExtra): Promise<unknown>;
  deleteMessage(messageId: string): Promise<unknown>;
  getChatMembers(chatId: number, extra: { user_ids: number[] }): Promise<unknown>;
  getChat(chatId: number): Promise<unknown>;
  answerOnCallback(callbackId: string, extra: { notification: string }): Promise<unknown>;
  raw: { chats: object };
}

interface ChatMemberLike {
  user_id?: unknown;
  is_admin?: unknown;
  is_owner?: unknown;
}

function readMembers(response: unknown): ChatMemberLike[] | null {
  if (!response || typeof response !== 'object' || !('members' in response)) {
    return null;
  }

  const { members } = response;
  if (!Array.isArray(members)) return null;
  return members.filter((member): member is ChatMemberLike => Boolean(member) && typeof member === 'object');
}

function toKeyboard(buttons: InlineButton[][]): MaxInlineKeyboard {
  return {
    type: 'inline_keyboard',
    payload: {
      buttons: buttons.map((row) => row.map((button) => ({
        type: 'callback' as const,
        text: button.text,
        payload: button.payload,
      }))),
    },
  };
}

function toExtra(options: SendMessageOptions | undefined): MaxSendExtra | undefined {
  if (!options) return undefined;

  return {
    ...(options.format ? { format: options.format } : {}),
    ...(options.notify !== undefined ? { notify: options.notify } : {}),
    ...(options.buttons && options.buttons.length > 0 ? { attachments: [toKeyboard(options.buttons)] } : {}),
  };
}

// MAX has no per-member send permission: mutes are local restrictions.
export class MaxChatTransport extends BaseChatTransport {
  constructor(
    private readonly api: MaxApi,
    private readonly restrictions: RestrictionsRepo,
  ) {
    super();
  }

  async sendMessage(target: MessageTarget, text: string, options?: SendMessageOptions): Promise<SentMessage> {
    const extra = toExtra(options);

    const sent = await this.call('sendMessage', () => (isChatTarget(target)
      ? this.api.sendMessageToChat(target.chatId, text, extra)
      : this.api.sendMessageToUser(target.userId, text, extra)));

    return { messageId: extractMessageId(sent) };
  }

  async deleteMessage(_chatId: number, messageId: string): Promise<void> {
    await this.call('deleteMessage', () => this.api.deleteMessage(messageId));
  }

  async restrictUser(chatId: number, userId: number, permissions: ChatPermissions, untilTs: number): Promise<void> {
    await this.call('restrictUser', async () => {
      if (permissions.canSendMessages) {
        this.restrictions.remove(chatId, userId, 'mute');
        return;
      }

      this.restrictions.upsert(chatId, userId, 'mute', untilTs);
    });
  }

  async banUser(chatId: number, userId: number): Promise<void> {
    await this.call('banUser', () => this.removeChatMember({ chat_id: chatId, user_id: userId, block: true }));
  }

  async unbanUser(chatId: number, userId: number): Promise<void> {
    await this.call('unbanUser', async () => {
      this.restrictions.remove(chatId, userId);
    });
  }

  override async kickUser(chatId: number, userId: number): Promise<void> {
    await this.call('kickUser', () => this.removeChatMember({ chat_id: chatId, user_id: userId, block: false }));
  }

  async getMemberStatus(chatId: number, userId: number): Promise<MemberStatus> {
    const response = await this.call('getMemberStatus', () => this.api.getChatMembers(chatId, { user_ids: [userId] }));
    const members = readMembers(response);
    if (!members) return 'unknown';

    const member = members.find((item) => item.user_id === userId);
    if (!member) return 'left';
    if (member.is_owner === true) return 'owner';
    if (member.is_admin === true) return 'admin';
    return 'member';
  }

  async getChatInfo(chatId: number): Promise<ChatInfo> {
    const chat = await this.call('getChatInfo', () => this.api.getChat(chatId));
    if (!chat || typeof chat !== 'object') return {};

    const title = 'title' in chat && typeof chat.title === 'string' ? chat.title : undefined;
    const memberCount = 'participants_count' in chat && typeof chat.participants_count === 'number'
      ? chat.participants_count
      : undefined;

    return { title, memberCount };
  }

  async answerCallback(callbackId: string, notification: string): Promise<void> {
    await this.call('answerCallback', () => this.api.answerOnCallback(callbackId, { notification }));
  }

  private removeChatMember(payload: { chat_id: number; user_id: number; block?: boolean }): Promise<unknown> {
    return (this.api.raw.chats as { removeChatMember: RemoveChatMember }).removeChatMember(payload);
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new TransportError(operation, error, extractErrorStatus(error));
    }
  }
}
