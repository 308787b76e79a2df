import { errorMessage } from '../errors';
import { Repositories } from '../repos';
import { AdminResolver } from '../services/admin-resolver';
import { InMemoryIdempotencyGuard } from '../services/idempotency';
import { BotLogger } from '../services/logger';
import { ChatTransport } from '../transport/chat-transport';
import { ChatUser } from '../types';
import { parseChallengeCallback } from './challenge-manager';
import { EnforcementService } from './enforcement';
import { collectModeratedText } from './link-detector';
import { JoinOutcome, ModerationController } from './moderation-controller';
import {
  IncomingMessage,
  UpdateContext,
  readCallback,
  readMessage,
  readNumber,
  readSender,
  toChatUser,
} from './updates';

export const CALLBACK_NOT_YOURS = 'Эта проверка не для вас';
export const CALLBACK_SOLVED = '✅ Проверка пройдена';
export const CALLBACK_WRONG = '❌ Неверный ответ';

interface MessageScope {
  chatId: number;
  user: ChatUser;
  messageId: string;
  message: IncomingMessage;
}

export class ModerationEngine {
  constructor(
    private readonly controller: ModerationController,
    private readonly enforcement: EnforcementService,
    private readonly adminResolver: AdminResolver,
    private readonly idempotency: InMemoryIdempotencyGuard,
    private readonly repos: Pick<Repositories, 'processedMessages' | 'restrictions'>,
    private readonly transport: ChatTransport,
    private readonly logger: BotLogger,
  ) {}

  async handleMessage(ctx: UpdateContext, nowTs: number = Date.now()): Promise<void> {
    const scope = this.resolveScope(ctx);
    if (!scope) return;

    const { chatId, user, messageId, message } = scope;

    if (!this.idempotency.tryMark(chatId, messageId, nowTs)) {
      return;
    }

    try {
      if (!this.repos.processedMessages.markIfNew(chatId, messageId, nowTs)) {
        return;
      }
    } catch (error) {
      await this.logger.warn('DB dedupe failed, fallback to memory guard', {
        chatId,
        messageId,
        error: errorMessage(error),
      });
    }

    const isAdmin = await this.adminResolver.isAdmin(chatId, user.userId);
    if (isAdmin) {
      return;
    }

    const text = collectModeratedText(message);
    const ref = { chatId, user, messageId, text };

    try {
      const activeRestriction = this.repos.restrictions.getActive(chatId, user.userId, nowTs);
      if (activeRestriction) {
        await this.enforcement.enforceActiveRestriction(ref, activeRestriction);
        return;
      }
    } catch (error) {
      await this.logger.error('Restriction check failed', {
        chatId,
        userId: user.userId,
        error: errorMessage(error),
      });
    }

    if (this.controller.hasPendingChallenge(chatId, user.userId)) {
      // Until the challenge is settled every message is an answer attempt and is not kept in the chat.
      await this.controller.verifyChallenge(chatId, user, message.body.text?.trim() ?? '');
      await this.enforcement.deleteMessageSafe(chatId, messageId);
      return;
    }

    const settings = this.controller.getSettings(chatId);
    const result = this.controller.onMessage(chatId, user.userId, messageId, text, nowTs);
    await this.enforcement.apply(settings, ref, result);
  }

  async handleUserAdded(ctx: UpdateContext): Promise<JoinOutcome> {
    const chatId = readNumber(ctx.chatId);
    const sender = readSender(ctx.user);
    if (chatId === null || !sender) return 'ignored';
    if (sender.user_id === readNumber(ctx.myId)) return 'ignored';

    this.adminResolver.invalidate(chatId, sender.user_id);
    return this.controller.onJoin(chatId, toChatUser(sender));
  }

  async handleCallback(ctx: UpdateContext): Promise<boolean> {
    const callback = readCallback(ctx.callback);
    const chatId = readNumber(ctx.chatId);
    if (!callback || chatId === null) return false;

    const answer = parseChallengeCallback(callback.payload ?? '');
    if (answer === null) return false;

    const user = toChatUser(callback.user);
    const challenge = this.controller.getChallenge(chatId, user.userId);
    const pressedMessageId = callback.message?.body.mid;
    const isOwnChallenge = challenge !== null
      && (!pressedMessageId || !challenge.messageId || challenge.messageId === pressedMessageId);

    if (!isOwnChallenge) {
      await this.answer(callback.callback_id, CALLBACK_NOT_YOURS);
      return true;
    }

    const solved = await this.controller.verifyChallenge(chatId, user, answer);
    await this.answer(callback.callback_id, solved ? CALLBACK_SOLVED : CALLBACK_WRONG);
    return true;
  }

  private resolveScope(ctx: UpdateContext): MessageScope | null {
    const message = readMessage(ctx.message);
    if (!message) return null;

    const chatType = message.recipient.chat_type;
    if (chatType !== 'chat' && chatType !== 'channel') return null;

    const chatId = message.recipient.chat_id ?? readNumber(ctx.chatId);
    const sender = message.sender;
    if (!chatId || !sender) return null;

    if (sender.is_bot || sender.user_id === readNumber(ctx.myId)) {
      return null;
    }

    return {
      chatId,
      user: toChatUser(sender),
      messageId: message.body.mid,
      message,
    };
  }

  private async answer(callbackId: string, notification: string): Promise<void> {
    try {
      await this.transport.answerCallback(callbackId, notification);
    } catch (error) {
      await this.logger.warn('Failed to answer callback', { error: errorMessage(error) });
    }
  }
}
