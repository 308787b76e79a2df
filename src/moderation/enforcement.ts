import { errorMessage, isMessageAlreadyDeleted } from '../errors';
import { BotMessageDeletesRepo } from '../repos/bot-message-deletes-repo';
import { RestrictionsRepo } from '../repos/restrictions-repo';
import { AuditLogger } from '../services/audit-logger';
import { computeBotMessageDeleteAt } from '../services/bot-message-autodelete';
import { BotLogger } from '../services/logger';
import { ChatTransport } from '../transport/chat-transport';
import { ActiveRestriction, ChatUser, ModerationResult, PolicySettings } from '../types';
import { escapeHtml } from '../utils/text';
import { formatDateTime, hoursToMs, minutesToMs } from '../utils/time';
import { displayName } from './challenge-manager';
import { FloodDetector } from './flood-detector';
import { FILTER_REASON_PREFIX, ModerationController } from './moderation-controller';
import { WarnOutcome } from './warn-tracker';

// A ban the platform refused is kept as a software restriction for this long.
export const BAN_FALLBACK_DURATION_MS = hoursToMs(24 * 365);
const HOLD_PREVIEW_LIMIT = 500;

export interface MessageRef {
  chatId: number;
  user: ChatUser;
  messageId: string;
  text: string;
}

export type BanOutcome = 'banned' | 'fallback' | 'failed';

export interface EnforcementOptions {
  noticeInChat: boolean;
  timezone: string;
}

export class EnforcementService {
  constructor(
    private readonly transport: ChatTransport,
    private readonly controller: ModerationController,
    private readonly floodDetector: FloodDetector,
    private readonly restrictions: RestrictionsRepo,
    private readonly botMessageDeletes: BotMessageDeletesRepo,
    private readonly audit: AuditLogger,
    private readonly logger: BotLogger,
    private readonly options: EnforcementOptions,
  ) {}

  async apply(settings: PolicySettings, ref: MessageRef, result: ModerationResult): Promise<void> {
    switch (result.action) {
      case 'none':
        return;
      case 'delete':
        await this.enforceDelete(settings, ref, result);
        return;
      case 'hold':
        await this.enforceHold(ref, result);
        return;
      case 'warn':
        await this.deleteMessageSafe(ref.chatId, ref.messageId);
        await this.warn(settings, ref.chatId, ref.user, null, result.details);
        return;
      case 'mute':
        await this.enforceFloodMute(ref, result);
        return;
      case 'ban':
        await this.deleteMessageSafe(ref.chatId, ref.messageId);
        await this.ban(ref.chatId, ref.user, null, result.details);
        return;
    }
  }

  async enforceActiveRestriction(ref: MessageRef, restriction: ActiveRestriction): Promise<void> {
    await this.deleteMessageSafe(ref.chatId, ref.messageId);

    await this.logger.info('Message from restricted user deleted', {
      chatId: ref.chatId,
      userId: ref.user.userId,
      restrictionType: restriction.type,
      untilTs: restriction.untilTs,
    });
  }

  async warn(
    settings: PolicySettings,
    chatId: number,
    user: ChatUser,
    adminId: number | null,
    reason: string,
  ): Promise<WarnOutcome> {
    const outcome = await this.controller.addWarning(chatId, user.userId, adminId, reason);

    if (outcome.escalation === 'ban') {
      await this.ban(chatId, user, null, `Достигнут лимит предупреждений (${outcome.totalCount}/${settings.warnBanThreshold})`);
      return outcome;
    }

    if (outcome.escalation === 'mute') {
      await this.mute(
        chatId,
        user,
        hoursToMs(outcome.muteDurationHours),
        null,
        `Достигнут порог предупреждений (${outcome.totalCount}/${settings.warnMuteThreshold})`,
      );
      return outcome;
    }

    await this.notice(chatId, `${escapeHtml(displayName(user))}, предупреждение ${outcome.totalCount}/${settings.warnBanThreshold}.`);
    return outcome;
  }

  async mute(
    chatId: number,
    user: ChatUser,
    durationMs: number,
    adminId: number | null,
    reason: string,
    nowTs: number = Date.now(),
  ): Promise<number | null> {
    const untilTs = nowTs + durationMs;

    try {
      await this.transport.restrictUser(chatId, user.userId, { canSendMessages: false }, untilTs);
    } catch (error) {
      await this.logger.warn('Failed to restrict user', {
        chatId,
        userId: user.userId,
        error: errorMessage(error),
      });
      return null;
    }

    await this.audit.log({ chatId, actionType: 'mute', targetUserId: user.userId, adminId, reason, nowTs });
    await this.notice(
      chatId,
      `${escapeHtml(displayName(user))}, мут до ${formatDateTime(untilTs, this.options.timezone)}.`,
    );
    return untilTs;
  }

  async unmute(chatId: number, userId: number, adminId: number): Promise<boolean> {
    try {
      await this.transport.restrictUser(chatId, userId, { canSendMessages: true }, Date.now());
    } catch (error) {
      await this.logger.warn('Failed to lift restriction', { chatId, userId, error: errorMessage(error) });
      return false;
    }

    await this.audit.log({ chatId, actionType: 'unmute', targetUserId: userId, adminId, reason: 'Снятие мута' });
    return true;
  }

  async ban(chatId: number, user: ChatUser, adminId: number | null, reason: string): Promise<BanOutcome> {
    try {
      await this.transport.banUser(chatId, user.userId);
      await this.audit.log({ chatId, actionType: 'ban', targetUserId: user.userId, adminId, reason });
      await this.notice(chatId, `${escapeHtml(displayName(user))} заблокирован.`);
      return 'banned';
    } catch (error) {
      await this.logger.warn('Ban failed, falling back to software restriction', {
        chatId,
        userId: user.userId,
        error: errorMessage(error),
      });
    }

    const untilTs = Date.now() + BAN_FALLBACK_DURATION_MS;
    try {
      this.restrictions.upsert(chatId, user.userId, 'ban_fallback', untilTs);
    } catch (error) {
      await this.logger.error('Failed to store ban fallback', {
        chatId,
        userId: user.userId,
        error: errorMessage(error),
      });
      return 'failed';
    }

    await this.audit.log({
      chatId,
      actionType: 'ban',
      targetUserId: user.userId,
      adminId,
      reason: `${reason} (блокировка сообщений)`,
    });
    await this.notice(
      chatId,
      `${escapeHtml(displayName(user))}: сообщения блокируются до ${formatDateTime(untilTs, this.options.timezone)}.`,
    );
    return 'fallback';
  }

  async kick(chatId: number, user: ChatUser, adminId: number | null, reason: string): Promise<boolean> {
    try {
      await this.transport.kickUser(chatId, user.userId);
    } catch (error) {
      await this.logger.warn('Failed to kick user', { chatId, userId: user.userId, error: errorMessage(error) });
      return false;
    }

    await this.audit.log({ chatId, actionType: 'kick', targetUserId: user.userId, adminId, reason });
    return true;
  }

  async deleteMessageSafe(chatId: number, messageId: string): Promise<boolean> {
    try {
      await this.transport.deleteMessage(chatId, messageId);
      return true;
    } catch (error) {
      if (isMessageAlreadyDeleted(error)) {
        return true;
      }

      await this.logger.warn('Failed to delete message', {
        chatId,
        messageId,
        error: errorMessage(error),
      });
      return false;
    }
  }

  private async enforceDelete(settings: PolicySettings, ref: MessageRef, result: ModerationResult): Promise<void> {
    await this.deleteMessageSafe(ref.chatId, ref.messageId);

    const isFilterHit = result.reason.startsWith(FILTER_REASON_PREFIX);
    await this.audit.log({
      chatId: ref.chatId,
      actionType: isFilterHit ? 'filter' : 'spam',
      targetUserId: ref.user.userId,
      adminId: null,
      reason: result.details,
    });

    if (isFilterHit && settings.filterNotifyUser) {
      try {
        await this.transport.sendMessage({ userId: ref.user.userId }, result.details);
      } catch (error) {
        await this.logger.warn('Failed to notify user about filtered message', {
          chatId: ref.chatId,
          userId: ref.user.userId,
          error: errorMessage(error),
        });
      }
    }
  }

  private async enforceHold(ref: MessageRef, result: ModerationResult): Promise<void> {
    await this.deleteMessageSafe(ref.chatId, ref.messageId);

    const preview = ref.text.length > HOLD_PREVIEW_LIMIT ? `${ref.text.slice(0, HOLD_PREVIEW_LIMIT)}…` : ref.text;
    await this.audit.forward(ref.chatId, [
      '⏳ <b>Сообщение на проверке</b>',
      '',
      `👤 ${escapeHtml(displayName(ref.user))} (<code>${ref.user.userId}</code>)`,
      `💬 Чат: <code>${ref.chatId}</code>`,
      '',
      escapeHtml(preview),
    ].join('\n'));

    await this.audit.log({
      chatId: ref.chatId,
      actionType: 'hold',
      targetUserId: ref.user.userId,
      adminId: null,
      reason: result.details,
    });
  }

  private async enforceFloodMute(ref: MessageRef, result: ModerationResult): Promise<void> {
    const messageIds = result.offendingMessageIds.length > 0 ? result.offendingMessageIds : [ref.messageId];
    for (const messageId of messageIds) {
      await this.deleteMessageSafe(ref.chatId, messageId);
    }

    const untilTs = await this.mute(ref.chatId, ref.user, minutesToMs(result.muteDurationMin), null, result.details);
    if (untilTs === null) return;

    try {
      this.floodDetector.clear(ref.chatId, ref.user.userId);
    } catch (error) {
      await this.logger.warn('Failed to clear flood window', {
        chatId: ref.chatId,
        userId: ref.user.userId,
        error: errorMessage(error),
      });
    }
  }

  private async notice(chatId: number, html: string): Promise<void> {
    if (!this.options.noticeInChat) return;

    try {
      const sent = await this.transport.sendMessage({ chatId }, html, { format: 'html', notify: false });
      if (sent.messageId) {
        this.botMessageDeletes.schedule(chatId, sent.messageId, computeBotMessageDeleteAt());
      }
    } catch (error) {
      await this.logger.warn('Failed to send chat notice', {
        chatId,
        error: errorMessage(error),
      });
    }
  }
}
