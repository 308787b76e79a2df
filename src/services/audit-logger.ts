import crypto from 'node:crypto';
import { errorMessage } from '../errors';
import { ModerationActionsRepo } from '../repos/moderation-actions-repo';
import { ChatTransport } from '../transport/chat-transport';
import { ModAction, ModActionType } from '../types';
import { escapeHtml } from '../utils/text';
import { formatDateTime } from '../utils/time';
import { BotLogger } from './logger';

export const DEFAULT_MOD_LOG_LIMIT = 20;
const USER_FILTER_SCAN_FACTOR = 5;

const ACTION_LABELS: Record<ModActionType, { icon: string; title: string }> = {
  warn: { icon: '⚠️', title: 'Предупреждение' },
  mute: { icon: '🔇', title: 'Мут' },
  unmute: { icon: '🔊', title: 'Размут' },
  ban: { icon: '🚫', title: 'Бан' },
  kick: { icon: '👢', title: 'Кик' },
  delete: { icon: '🗑', title: 'Удаление' },
  filter: { icon: '🚫', title: 'Фильтр' },
  hold: { icon: '⏳', title: 'Задержка' },
  clearwarns: { icon: '🧹', title: 'Очистка предупреждений' },
  spam: { icon: '🛡', title: 'Антиспам' },
  settings: { icon: '⚙️', title: 'Настройки' },
};

export interface AuditEntryInput {
  chatId: number;
  actionType: ModActionType;
  targetUserId: number | null;
  adminId: number | null;
  reason: string;
  nowTs?: number;
}

export type AuditSinkResolver = (chatId: number) => number | null;

export class AuditLogger {
  constructor(
    private readonly actions: ModerationActionsRepo,
    private readonly logger: BotLogger,
    private readonly transport: ChatTransport,
    private readonly resolveSink: AuditSinkResolver,
    private readonly timezone: string,
  ) {}

  async log(input: AuditEntryInput): Promise<ModAction> {
    const entry: ModAction = {
      id: crypto.randomUUID(),
      chatId: input.chatId,
      actionType: input.actionType,
      targetUserId: input.targetUserId,
      adminId: input.adminId,
      reason: input.reason,
      createdAt: input.nowTs ?? Date.now(),
      auto: input.adminId === null,
    };

    try {
      this.actions.append(entry);
    } catch (error) {
      await this.logger.error('Failed to store moderation action', {
        chatId: entry.chatId,
        actionType: entry.actionType,
        error: errorMessage(error),
      });
    }

    await this.logger.moderation(entry);
    await this.forward(entry.chatId, this.formatEntry(entry));
    return entry;
  }

  getLog(chatId: number, limit: number = DEFAULT_MOD_LOG_LIMIT, userId?: number): ModAction[] {
    if (userId === undefined) {
      return this.actions.listNewestFirst(chatId, limit);
    }

    return this.actions
      .listNewestFirst(chatId, limit * USER_FILTER_SCAN_FACTOR)
      .filter((entry) => entry.targetUserId === userId)
      .slice(0, limit);
  }

  async forward(chatId: number, html: string): Promise<boolean> {
    const sinkChatId = this.resolveSink(chatId);
    if (sinkChatId === null) return false;

    try {
      await this.transport.sendMessage({ chatId: sinkChatId }, html, { format: 'html', notify: false });
      return true;
    } catch (error) {
      await this.logger.warn('Failed to forward to audit sink', {
        chatId,
        auditSinkChatId: sinkChatId,
        error: errorMessage(error),
      });
      return false;
    }
  }

  formatEntry(entry: ModAction): string {
    const label = ACTION_LABELS[entry.actionType];
    const lines = [
      `${label.icon} <b>${label.title}</b>`,
      '',
      `👤 Пользователь: <code>${entry.targetUserId ?? '—'}</code>`,
      entry.auto ? '🤖 Автоматическое действие' : `👮 Админ: <code>${entry.adminId}</code>`,
      `📝 Причина: ${entry.reason ? escapeHtml(entry.reason) : 'Не указана'}`,
      `🕐 Время: ${formatDateTime(entry.createdAt, this.timezone)}`,
      `💬 Чат: <code>${entry.chatId}</code>`,
    ];

    return lines.join('\n');
  }
}
