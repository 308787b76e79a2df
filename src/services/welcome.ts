import { errorMessage } from '../errors';
import { BotMessageDeletesRepo } from '../repos/bot-message-deletes-repo';
import { WelcomeMarksRepo } from '../repos/welcome-marks-repo';
import { ChatInfo, ChatTransport, SentMessage } from '../transport/chat-transport';
import { ChatUser, PolicySettings } from '../types';
import { escapeHtml } from '../utils/text';
import { secondsToMs } from '../utils/time';
import { BotLogger } from './logger';

export const WELCOME_DEDUPE_TTL_MS = 60 * 60 * 1000;

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export function formatWelcome(template: string, user: ChatUser, chat: ChatInfo): string {
  const username = user.username ? `@${user.username}` : (user.name?.trim() || 'Участник');

  return template
    .replaceAll('{username}', escapeHtml(username))
    .replaceAll('{chatname}', escapeHtml(chat.title || 'Чат'))
    .replaceAll('{membercount}', chat.memberCount === undefined ? '?' : String(chat.memberCount));
}

export class WelcomeService {
  constructor(
    private readonly transport: ChatTransport,
    private readonly marks: WelcomeMarksRepo,
    private readonly botMessageDeletes: BotMessageDeletesRepo,
    private readonly logger: BotLogger,
    private readonly sleep: Sleep = defaultSleep,
  ) {}

  async send(settings: PolicySettings, user: ChatUser): Promise<boolean> {
    if (!settings.welcomeEnabled) return false;

    const { chatId } = settings;
    try {
      if (!this.marks.tryMark(chatId, user.userId, Date.now(), WELCOME_DEDUPE_TTL_MS)) {
        return false;
      }
    } catch (error) {
      await this.logger.warn('Welcome dedupe check failed, sending anyway', {
        chatId,
        userId: user.userId,
        error: errorMessage(error),
      });
    }

    let chat: ChatInfo = {};
    try {
      chat = await this.transport.getChatInfo(chatId);
    } catch (error) {
      await this.logger.warn('Failed to load chat info for welcome', {
        chatId,
        error: errorMessage(error),
      });
    }

    const text = formatWelcome(settings.welcomeMessage, user, chat);

    if (settings.welcomeDelaySec > 0) {
      await this.sleep(secondsToMs(settings.welcomeDelaySec));
    }

    let sent: SentMessage;
    try {
      const target = settings.welcomePrivate ? { userId: user.userId } : { chatId };
      sent = await this.transport.sendMessage(target, text, { format: 'html' });
    } catch (error) {
      await this.logger.error('Failed to send welcome', {
        chatId,
        userId: user.userId,
        error: errorMessage(error),
      });
      return false;
    }

    if (sent.messageId && settings.welcomeAutoDeleteSec > 0 && !settings.welcomePrivate) {
      try {
        this.botMessageDeletes.schedule(
          chatId,
          sent.messageId,
          Date.now() + secondsToMs(settings.welcomeAutoDeleteSec),
        );
      } catch (error) {
        await this.logger.warn('Failed to schedule welcome auto-delete', { chatId, error: errorMessage(error) });
      }
    }

    await this.logger.info('Welcome sent', { chatId, userId: user.userId });
    return true;
  }
}
