import { errorMessage, isMessageAlreadyDeleted } from '../errors';
import { Repositories } from '../repos';
import { ChatTransport } from '../transport/chat-transport';
import { hoursToMs } from '../utils/time';
import { BotLogger } from './logger';
import {
  BOT_MESSAGE_DELETE_RETRY_DELAY_MS,
  BOT_MESSAGE_DELETE_RETENTION_MS,
} from './bot-message-autodelete';

// Longer than the widest flood window, so live windows are never cut short.
export const FLOOD_EVENT_RETENTION_MS = hoursToMs(2);
export const PROCESSED_MESSAGE_RETENTION_MS = hoursToMs(48);
const BOT_MESSAGE_DELETE_BATCH_SIZE = 200;

export class CleanupService {
  private botMessageDeleteRunInProgress = false;

  constructor(
    private readonly repos: Repositories,
    private readonly transport: ChatTransport,
    private readonly logger: BotLogger,
  ) {}

  async run(nowTs: number = Date.now()): Promise<void> {
    this.repos.joinRecords.purgeExpired(nowTs);
    this.repos.welcomeMarks.purgeExpired(nowTs);
    this.repos.challenges.purgeExpired(nowTs);
    this.repos.restrictions.purgeExpired(nowTs);
    this.repos.processedMessages.purgeOlderThan(nowTs - PROCESSED_MESSAGE_RETENTION_MS);
    this.repos.floodWindows.purgeOlderThan(nowTs - FLOOD_EVENT_RETENTION_MS);
    this.repos.botMessageDeletes.purgeOlderThan(nowTs - BOT_MESSAGE_DELETE_RETENTION_MS);

    await this.runBotMessageDeletes(nowTs);
  }

  async runBotMessageDeletes(nowTs: number = Date.now()): Promise<void> {
    if (this.botMessageDeleteRunInProgress) {
      return;
    }

    this.botMessageDeleteRunInProgress = true;
    try {
      await this.processPendingBotMessageDeletes(nowTs);
    } finally {
      this.botMessageDeleteRunInProgress = false;
    }
  }

  private async processPendingBotMessageDeletes(nowTs: number): Promise<void> {
    const dueMessages = this.repos.botMessageDeletes.listDue(nowTs, BOT_MESSAGE_DELETE_BATCH_SIZE);

    for (const entry of dueMessages) {
      try {
        await this.transport.deleteMessage(entry.chatId, entry.messageId);
        this.repos.botMessageDeletes.remove(entry.messageId);
      } catch (error) {
        if (isMessageAlreadyDeleted(error)) {
          this.repos.botMessageDeletes.remove(entry.messageId);
          continue;
        }

        const nextAttemptTs = nowTs + BOT_MESSAGE_DELETE_RETRY_DELAY_MS;
        this.repos.botMessageDeletes.postpone(entry.messageId, nextAttemptTs);

        await this.logger.warn('Failed to auto-delete bot message; retry postponed', {
          chatId: entry.chatId,
          messageId: entry.messageId,
          nextAttemptTs,
          error: errorMessage(error),
        });
      }
    }
  }
}
