import { ValidationError, errorMessage } from '../errors';
import { EnforcementService } from '../moderation/enforcement';
import { ModerationController } from '../moderation/moderation-controller';
import { IncomingMessage, UpdateContext, readMessage, readNumber, toChatUser } from '../moderation/updates';
import { PolicyPatch } from '../policy/policy-settings';
import { AdminResolver } from '../services/admin-resolver';
import { BotLogger } from '../services/logger';
import { ChatTransport } from '../transport/chat-transport';
import { ChatUser, ModAction, PolicySettings } from '../types';
import { formatDateTime, minutesToMs } from '../utils/time';

export const ADMIN_COMMANDS = [
  { name: 'warn', description: 'Выдать предупреждение: /warn <userId> [причина]' },
  { name: 'warns', description: 'Предупреждения пользователя: /warns <userId>' },
  { name: 'clearwarns', description: 'Снять предупреждения: /clearwarns <userId>' },
  { name: 'ban', description: 'Заблокировать: /ban <userId> [причина]' },
  { name: 'kick', description: 'Исключить: /kick <userId> [причина]' },
  { name: 'mute', description: 'Мут: /mute <userId> <минуты> [причина]' },
  { name: 'unmute', description: 'Снять мут: /unmute <userId>' },
  { name: 'addfilter', description: 'Добавить слово в фильтр' },
  { name: 'removefilter', description: 'Удалить слово из фильтра' },
  { name: 'filters', description: 'Список слов фильтра' },
  { name: 'modlog', description: 'Журнал модерации: /modlog [userId]' },
  { name: 'mod_status', description: 'Показать настройки модерации' },
  { name: 'mod_set', description: 'Изменить настройку: /mod_set <поле> <значение>' },
  { name: 'mod_export', description: 'Экспорт настроек в JSON' },
  { name: 'mod_import', description: 'Импорт настроек из JSON' },
  { name: 'mod_reset', description: 'Сбросить настройки' },
] as const;

export type AdminCommandName = (typeof ADMIN_COMMANDS)[number]['name'];

const COMMAND_NAMES: ReadonlySet<string> = new Set(ADMIN_COMMANDS.map((command) => command.name));

function isAdminCommandName(value: string): value is AdminCommandName {
  return COMMAND_NAMES.has(value);
}

const MUTE_MINUTES_MAX = 60 * 24 * 30;
const MOD_LOG_PAGE = 10;

export interface ParsedCommand {
  command: AdminCommandName;
  rawArgs: string;
}

export interface AdminCommandsOptions {
  timezone: string;
}

type SettingKey = keyof Omit<PolicySettings, 'chatId'>;

export function parseAdminCommand(text: string): ParsedCommand | null {
  const match = text.trim().match(/^\/([a-z0-9_]+)(?:@[a-z0-9_]+)?(?:\s+([\s\S]+))?$/i);
  if (!match) return null;

  const command = (match[1] ?? '').toLowerCase();
  const rawArgs = (match[2] ?? '').trim();

  if (!isAdminCommandName(command)) {
    return null;
  }

  return { command, rawArgs };
}

function parseUserId(raw: string | undefined): number | null {
  if (!raw || !/^\d+$/.test(raw)) return null;
  const value = Number.parseInt(raw, 10);
  return Number.isSafeInteger(value) && value > 0 ? value : null;
}

function splitFirst(rawArgs: string): [string, string] {
  const trimmed = rawArgs.trim();
  const spaceIndex = trimmed.search(/\s/);
  if (spaceIndex === -1) return [trimmed, ''];
  return [trimmed.slice(0, spaceIndex), trimmed.slice(spaceIndex + 1).trim()];
}

function isSettingKey(field: string, settings: PolicySettings): field is SettingKey {
  return field !== 'chatId' && Object.prototype.hasOwnProperty.call(settings, field);
}

function patchOf<K extends SettingKey>(field: K, value: Omit<PolicySettings, 'chatId'>[K]): PolicyPatch {
  const patch: PolicyPatch = {};
  patch[field] = value;
  return patch;
}

const TRUE_VALUES = new Set(['on', 'true', 'yes', '1', 'вкл']);
const FALSE_VALUES = new Set(['off', 'false', 'no', '0', 'выкл']);

export function parseSettingPatch(settings: PolicySettings, field: string, rawValue: string): PolicyPatch | string {
  if (!isSettingKey(field, settings)) {
    return `Неизвестное поле: ${field}`;
  }

  const value = rawValue.trim();
  const current = settings[field];

  if (typeof current === 'boolean') {
    const lowered = value.toLowerCase();
    if (TRUE_VALUES.has(lowered)) return patchOf(field, true);
    if (FALSE_VALUES.has(lowered)) return patchOf(field, false);
    return `Ожидается on/off для ${field}`;
  }

  if (Array.isArray(current)) {
    const items = value === '-' ? [] : value.split(',').map((item) => item.trim()).filter(Boolean);
    return patchOf(field, items);
  }

  if (field === 'auditSinkChatId') {
    if (value === '-' || value.toLowerCase() === 'none') return { auditSinkChatId: null };
    const chatId = Number(value);
    return Number.isInteger(chatId) ? { auditSinkChatId: chatId } : `Ожидается id чата для ${field}`;
  }

  if (typeof current === 'number') {
    const numeric = Number(value);
    return value !== '' && Number.isFinite(numeric) ? patchOf(field, numeric) : `Ожидается число для ${field}`;
  }

  return value ? patchOf(field, value) : `Пустое значение для ${field}`;
}

export function formatSettings(settings: PolicySettings): string {
  const { chatId, ...fields } = settings;
  const lines = Object.entries(fields).map(([key, value]) => {
    const shown = Array.isArray(value)
      ? (value.length > 0 ? value.join(', ') : '(пусто)')
      : String(value ?? '(не задан)');
    return `- ${key}: ${shown}`;
  });

  return [`Настройки модерации чата ${chatId}:`, ...lines].join('\n');
}

export class AdminCommands {
  constructor(
    private readonly controller: ModerationController,
    private readonly enforcement: EnforcementService,
    private readonly adminResolver: AdminResolver,
    private readonly transport: ChatTransport,
    private readonly logger: BotLogger,
    private readonly options: AdminCommandsOptions,
  ) {}

  async tryHandle(ctx: UpdateContext): Promise<boolean> {
    const message = readMessage(ctx.message);
    if (!message?.body.text) return false;

    const parsed = parseAdminCommand(message.body.text);
    if (!parsed) return false;

    const chatType = message.recipient.chat_type;
    const chatId = message.recipient.chat_id ?? readNumber(ctx.chatId);
    const userId = message.sender?.user_id;

    if ((chatType !== 'chat' && chatType !== 'channel') || !chatId || !userId) {
      return true;
    }

    const isAdmin = await this.adminResolver.isAdmin(chatId, userId);
    if (!isAdmin) {
      await this.reply(chatId, 'Команда доступна только администраторам чата.');
      await this.logger.warn('Admin command denied', { chatId, userId, command: parsed.command });
      return false;
    }

    try {
      await this.dispatch(chatId, userId, parsed, message);
    } catch (error) {
      if (error instanceof ValidationError) {
        await this.reply(chatId, [
          'Некорректные настройки:',
          ...error.violations.map((violation) => `- ${violation.field}: ${violation.message}`),
        ].join('\n'));
        return true;
      }

      await this.reply(chatId, 'Не удалось выполнить команду. Проверьте аргументы.');
      await this.logger.error('Admin command failed', {
        chatId,
        userId,
        command: parsed.command,
        error: errorMessage(error),
      });
    }

    return true;
  }

  private async dispatch(chatId: number, adminId: number, parsed: ParsedCommand, message: IncomingMessage): Promise<void> {
    const { command, rawArgs } = parsed;

    switch (command) {
      case 'warn':
      case 'ban':
      case 'kick':
        await this.handleSanction(chatId, adminId, command, rawArgs, message);
        return;
      case 'mute':
        await this.handleMute(chatId, adminId, rawArgs, message);
        return;
      case 'unmute':
        await this.handleUnmute(chatId, adminId, rawArgs, message);
        return;
      case 'warns':
        await this.handleWarns(chatId, rawArgs, message);
        return;
      case 'clearwarns':
        await this.handleClearWarns(chatId, adminId, rawArgs, message);
        return;
      case 'addfilter':
        await this.handleAddFilter(chatId, adminId, rawArgs);
        return;
      case 'removefilter':
        await this.handleRemoveFilter(chatId, adminId, rawArgs);
        return;
      case 'filters':
        await this.handleFilters(chatId);
        return;
      case 'modlog':
        await this.handleModLog(chatId, rawArgs);
        return;
      case 'mod_status':
        await this.reply(chatId, formatSettings(this.controller.getSettings(chatId)));
        return;
      case 'mod_set':
        await this.handleModSet(chatId, adminId, rawArgs);
        return;
      case 'mod_export':
        await this.reply(chatId, this.controller.exportSettings(chatId));
        return;
      case 'mod_import':
        await this.handleModImport(chatId, adminId, rawArgs);
        return;
      case 'mod_reset':
        await this.controller.resetSettings(chatId, adminId);
        await this.reply(chatId, 'Настройки сброшены к значениям по умолчанию.');
        return;
    }
  }

  private resolveTarget(rawArgs: string, message: IncomingMessage): { user: ChatUser; rest: string } | null {
    const [first, rest] = splitFirst(rawArgs);
    const userId = parseUserId(first);
    if (userId !== null) {
      return { user: { userId }, rest };
    }

    const repliedSender = message.link?.type === 'reply' ? message.link.sender : null;
    if (repliedSender) {
      return { user: toChatUser(repliedSender), rest: rawArgs.trim() };
    }

    return null;
  }

  private async handleSanction(
    chatId: number,
    adminId: number,
    command: 'warn' | 'ban' | 'kick',
    rawArgs: string,
    message: IncomingMessage,
  ): Promise<void> {
    const target = this.resolveTarget(rawArgs, message);
    if (!target) {
      await this.reply(chatId, `Использование: /${command} <userId> [причина]`);
      return;
    }

    const reason = target.rest || 'Не указана';

    if (command === 'warn') {
      const settings = this.controller.getSettings(chatId);
      const outcome = await this.enforcement.warn(settings, chatId, target.user, adminId, reason);
      await this.reply(chatId, `Предупреждение выдано (${outcome.totalCount}/${settings.warnBanThreshold}).`);
      return;
    }

    if (command === 'ban') {
      const outcome = await this.enforcement.ban(chatId, target.user, adminId, reason);
      await this.reply(chatId, outcome === 'failed' ? 'Не удалось заблокировать пользователя.' : 'Пользователь заблокирован.');
      return;
    }

    const kicked = await this.enforcement.kick(chatId, target.user, adminId, reason);
    await this.reply(chatId, kicked ? 'Пользователь исключён.' : 'Не удалось исключить пользователя.');
  }

  private async handleMute(chatId: number, adminId: number, rawArgs: string, message: IncomingMessage): Promise<void> {
    const target = this.resolveTarget(rawArgs, message);
    const [minutesRaw, reason] = splitFirst(target?.rest ?? '');
    const minutes = Number.parseInt(minutesRaw, 10);

    if (!target || !/^\d+$/.test(minutesRaw) || minutes < 1 || minutes > MUTE_MINUTES_MAX) {
      await this.reply(chatId, `Использование: /mute <userId> <1..${MUTE_MINUTES_MAX}> [причина]`);
      return;
    }

    const untilTs = await this.enforcement.mute(chatId, target.user, minutesToMs(minutes), adminId, reason || 'Не указана');
    await this.reply(chatId, untilTs === null
      ? 'Не удалось выдать мут.'
      : `Мут до ${formatDateTime(untilTs, this.options.timezone)}.`);
  }

  private async handleUnmute(chatId: number, adminId: number, rawArgs: string, message: IncomingMessage): Promise<void> {
    const target = this.resolveTarget(rawArgs, message);
    if (!target) {
      await this.reply(chatId, 'Использование: /unmute <userId>');
      return;
    }

    const lifted = await this.enforcement.unmute(chatId, target.user.userId, adminId);
    await this.reply(chatId, lifted ? 'Мут снят.' : 'Не удалось снять мут.');
  }

  private async handleWarns(chatId: number, rawArgs: string, message: IncomingMessage): Promise<void> {
    const target = this.resolveTarget(rawArgs, message);
    if (!target) {
      await this.reply(chatId, 'Использование: /warns <userId>');
      return;
    }

    const warnings = this.controller.listWarnings(chatId, target.user.userId);
    if (warnings.length === 0) {
      await this.reply(chatId, 'Предупреждений нет.');
      return;
    }

    const lines = warnings.map((warning) => (
      `- ${formatDateTime(warning.createdAt, this.options.timezone)}: ${warning.reason}`
    ));
    await this.reply(chatId, [`Предупреждения (${warnings.length}):`, ...lines].join('\n'));
  }

  private async handleClearWarns(chatId: number, adminId: number, rawArgs: string, message: IncomingMessage): Promise<void> {
    const target = this.resolveTarget(rawArgs, message);
    if (!target) {
      await this.reply(chatId, 'Использование: /clearwarns <userId>');
      return;
    }

    const cleared = await this.controller.clearWarnings(chatId, target.user.userId, adminId);
    await this.reply(chatId, `Снято предупреждений: ${cleared}`);
  }

  private async handleAddFilter(chatId: number, adminId: number, rawArgs: string): Promise<void> {
    if (!rawArgs) {
      await this.reply(chatId, 'Использование: /addfilter <слово>');
      return;
    }

    const result = await this.controller.addFilterWord(chatId, rawArgs, adminId);
    const replies: Record<typeof result, string> = {
      added: `Слово добавлено в фильтр: ${rawArgs.toLowerCase()}`,
      duplicate: 'Это слово уже в фильтре.',
      too_long: 'Слово слишком длинное.',
      limit_reached: 'Достигнут лимит слов фильтра.',
      empty: 'Использование: /addfilter <слово>',
    };
    await this.reply(chatId, replies[result]);
  }

  private async handleRemoveFilter(chatId: number, adminId: number, rawArgs: string): Promise<void> {
    if (!rawArgs) {
      await this.reply(chatId, 'Использование: /removefilter <слово>');
      return;
    }

    const removed = await this.controller.removeFilterWord(chatId, rawArgs, adminId);
    await this.reply(chatId, removed ? 'Слово удалено из фильтра.' : 'Такого слова нет в фильтре.');
  }

  private async handleFilters(chatId: number): Promise<void> {
    const words = this.controller.listFilterWords(chatId);
    await this.reply(chatId, words.length > 0
      ? `Слова фильтра:\n${words.map((word) => `- ${word}`).join('\n')}`
      : 'Фильтр пуст.');
  }

  private async handleModLog(chatId: number, rawArgs: string): Promise<void> {
    const userId = rawArgs ? parseUserId(rawArgs) : undefined;
    if (userId === null) {
      await this.reply(chatId, 'Использование: /modlog [userId]');
      return;
    }

    const entries = this.controller.getModLog(chatId, MOD_LOG_PAGE, userId);
    if (entries.length === 0) {
      await this.reply(chatId, 'Журнал модерации пуст.');
      return;
    }

    await this.reply(chatId, ['Журнал модерации:', ...entries.map((entry) => this.formatLogLine(entry))].join('\n'));
  }

  private async handleModSet(chatId: number, adminId: number, rawArgs: string): Promise<void> {
    const [field, value] = splitFirst(rawArgs);
    if (!field || !value) {
      await this.reply(chatId, 'Использование: /mod_set <поле> <значение>');
      return;
    }

    const patch = parseSettingPatch(this.controller.getSettings(chatId), field, value);
    if (typeof patch === 'string') {
      await this.reply(chatId, patch);
      return;
    }

    await this.controller.updateSettings(chatId, patch, adminId);
    await this.reply(chatId, `Настройка ${field} обновлена.`);
  }

  private async handleModImport(chatId: number, adminId: number, rawArgs: string): Promise<void> {
    if (!rawArgs) {
      await this.reply(chatId, 'Использование: /mod_import <json>');
      return;
    }

    await this.controller.importSettings(chatId, rawArgs, adminId);
    await this.reply(chatId, 'Настройки импортированы.');
  }

  private formatLogLine(entry: ModAction): string {
    const actor = entry.auto ? 'авто' : String(entry.adminId);
    const target = entry.targetUserId ?? '—';
    return `- ${formatDateTime(entry.createdAt, this.options.timezone)} ${entry.actionType} ${target} (${actor}): ${entry.reason}`;
  }

  private async reply(chatId: number, text: string): Promise<void> {
    try {
      await this.transport.sendMessage({ chatId }, text);
    } catch (error) {
      await this.logger.warn('Failed to reply to admin command', { chatId, error: errorMessage(error) });
    }
  }
}
