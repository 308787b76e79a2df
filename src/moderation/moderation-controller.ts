import { errorMessage } from '../errors';
import { PolicyPatch } from '../policy/policy-settings';
import { PolicyStore } from '../policy/policy-store';
import { SettingsCache } from '../policy/settings-cache';
import { AuditLogger } from '../services/audit-logger';
import { BotLogger } from '../services/logger';
import { WelcomeService } from '../services/welcome';
import { Challenge, ChatUser, ModAction, ModerationResult, PolicySettings, SpamCategory, Warning } from '../types';
import { ChallengeManager } from './challenge-manager';
import { AddWordResult, ContentFilter } from './content-filter';
import { FloodDetector } from './flood-detector';
import { NewbieLinkGate } from './link-gate';
import { matchSpamPattern } from './spam-patterns';
import { WarnOutcome, WarnTracker } from './warn-tracker';

export const NEWBIE_LINK_REASON = 'newbie_link';
export const FLOOD_REASON = 'flood';
export const FILTER_REASON_PREFIX = 'filter:';

const REASON_DETAILS: Record<SpamCategory | typeof FLOOD_REASON | typeof NEWBIE_LINK_REASON, string> = {
  flood: '🚫 Флуд: слишком много сообщений за короткое время',
  crypto_scam: '🚫 Обнаружена подозрительная крипто-ссылка',
  adult_content: '🚫 Обнаружена ссылка на запрещённый контент',
  spam_pattern: '🚫 Обнаружен спам-паттерн',
  newbie_link: '⏳ Ссылки от новых участников требуют проверки',
};

export type JoinOutcome = 'ignored' | 'challenged' | 'welcomed' | 'admitted';

export interface ModerationControllerDeps {
  store: PolicyStore;
  settings: SettingsCache;
  contentFilter: ContentFilter;
  floodDetector: FloodDetector;
  linkGate: NewbieLinkGate;
  warnTracker: WarnTracker;
  challenges: ChallengeManager;
  welcome: WelcomeService;
  audit: AuditLogger;
  logger: BotLogger;
}

export function noAction(): ModerationResult {
  return {
    action: 'none',
    reason: '',
    shouldDelete: false,
    muteDurationMin: 0,
    details: '',
    offendingMessageIds: [],
  };
}

export class ModerationController {
  constructor(private readonly deps: ModerationControllerDeps) {}

  getSettings(chatId: number): PolicySettings {
    return this.deps.settings.get(chatId);
  }

  async updateSettings(chatId: number, patch: PolicyPatch, adminId: number): Promise<PolicySettings> {
    const updated = this.deps.store.update(chatId, patch);
    await this.auditSettings(chatId, adminId, `update:${Object.keys(patch).join(',')}`);
    return updated;
  }

  async importSettings(chatId: number, json: string, adminId: number): Promise<PolicySettings> {
    const imported = this.deps.store.importJSON(chatId, json);
    await this.auditSettings(chatId, adminId, 'import');
    return imported;
  }

  exportSettings(chatId: number): string {
    return this.deps.store.exportJSON(chatId);
  }

  async resetSettings(chatId: number, adminId: number): Promise<boolean> {
    const removed = this.deps.store.reset(chatId);
    await this.auditSettings(chatId, adminId, 'reset');
    return removed;
  }

  async onJoin(chatId: number, user: ChatUser, nowTs: number = Date.now()): Promise<JoinOutcome> {
    if (user.isBot) return 'ignored';

    const settings = this.getSettings(chatId);

    try {
      this.deps.linkGate.recordJoin(chatId, user.userId, nowTs);
    } catch (error) {
      await this.deps.logger.warn('Failed to record join', {
        chatId,
        userId: user.userId,
        error: errorMessage(error),
      });
    }

    if (settings.captchaEnabled) {
      const challenge = await this.deps.challenges.issue(settings, user);
      return challenge ? 'challenged' : 'admitted';
    }

    if (settings.welcomeEnabled) {
      const sent = await this.deps.welcome.send(settings, user);
      return sent ? 'welcomed' : 'admitted';
    }

    return 'admitted';
  }

  onMessage(
    chatId: number,
    userId: number,
    messageId: string,
    text: string | null | undefined,
    nowTs: number = Date.now(),
  ): ModerationResult {
    const settings = this.getSettings(chatId);

    if (settings.filterWords.length > 0) {
      const filtered = this.deps.contentFilter.check(settings, text);
      if (filtered.filtered && filtered.matchedWord) {
        return {
          ...noAction(),
          action: 'delete',
          reason: `${FILTER_REASON_PREFIX}${filtered.matchedWord}`,
          shouldDelete: true,
          details: `Сообщение содержит запрещённое слово: ${filtered.matchedWord}`,
          matchedWord: filtered.matchedWord,
        };
      }
    }

    if (!settings.spamEnabled && !settings.linkFilterEnabled) {
      return noAction();
    }

    const category = matchSpamPattern(text);
    if (category) {
      return {
        ...noAction(),
        action: 'delete',
        reason: category,
        shouldDelete: true,
        details: REASON_DETAILS[category],
      };
    }

    const linkDecision = this.deps.linkGate.check(settings, userId, text, nowTs);
    if (linkDecision) {
      return {
        ...noAction(),
        action: linkDecision.action,
        reason: NEWBIE_LINK_REASON,
        shouldDelete: linkDecision.action === 'delete',
        details: REASON_DETAILS.newbie_link,
      };
    }

    if (settings.spamEnabled) {
      try {
        const flood = this.deps.floodDetector.checkRate(settings, userId, messageId, nowTs);
        if (flood.tripped) {
          return {
            ...noAction(),
            action: 'mute',
            reason: FLOOD_REASON,
            shouldDelete: true,
            muteDurationMin: flood.muteDurationMin,
            details: REASON_DETAILS.flood,
            offendingMessageIds: flood.offendingMessageIds,
          };
        }
      } catch (error) {
        void this.deps.logger.error('Flood check failed, message allowed', {
          chatId,
          userId,
          error: errorMessage(error),
        });
      }
    }

    return noAction();
  }

  async verifyChallenge(chatId: number, user: ChatUser, answer: string): Promise<boolean> {
    const solved = await this.deps.challenges.verify(chatId, user.userId, answer);
    if (!solved) return false;

    const settings = this.getSettings(chatId);
    if (settings.welcomeEnabled) {
      await this.deps.welcome.send(settings, user);
    }

    return true;
  }

  hasPendingChallenge(chatId: number, userId: number): boolean {
    return this.deps.challenges.hasPending(chatId, userId);
  }

  getChallenge(chatId: number, userId: number): Challenge | null {
    return this.deps.challenges.get(chatId, userId);
  }

  async addFilterWord(chatId: number, word: string, adminId: number): Promise<AddWordResult> {
    const result = this.deps.contentFilter.addWord(this.getSettings(chatId), word);
    if (result === 'added') {
      await this.auditSettings(chatId, adminId, `addfilter:${word.trim().toLowerCase()}`);
    }
    return result;
  }

  async removeFilterWord(chatId: number, word: string, adminId: number): Promise<boolean> {
    const removed = this.deps.contentFilter.removeWord(this.getSettings(chatId), word);
    if (removed) {
      await this.auditSettings(chatId, adminId, `removefilter:${word.trim().toLowerCase()}`);
    }
    return removed;
  }

  listFilterWords(chatId: number): string[] {
    return this.deps.contentFilter.listWords(this.getSettings(chatId));
  }

  async clearFilterWords(chatId: number, adminId: number): Promise<number> {
    const cleared = this.deps.contentFilter.clearWords(this.getSettings(chatId));
    if (cleared > 0) {
      await this.auditSettings(chatId, adminId, `clearfilters:${cleared}`);
    }
    return cleared;
  }

  async addWarning(chatId: number, userId: number, adminId: number | null, reason: string): Promise<WarnOutcome> {
    const outcome = this.deps.warnTracker.addWarning(this.getSettings(chatId), userId, adminId, reason);

    await this.deps.audit.log({
      chatId,
      actionType: 'warn',
      targetUserId: userId,
      adminId,
      reason,
    });

    return outcome;
  }

  listWarnings(chatId: number, userId: number): Warning[] {
    return this.deps.warnTracker.listWarnings(chatId, userId);
  }

  async clearWarnings(chatId: number, userId: number, adminId: number): Promise<number> {
    const cleared = this.deps.warnTracker.clearWarnings(chatId, userId);
    if (cleared > 0) {
      await this.deps.audit.log({
        chatId,
        actionType: 'clearwarns',
        targetUserId: userId,
        adminId,
        reason: `Снято предупреждений: ${cleared}`,
      });
    }
    return cleared;
  }

  getModLog(chatId: number, limit?: number, userId?: number): ModAction[] {
    return this.deps.audit.getLog(chatId, limit, userId);
  }

  private async auditSettings(chatId: number, adminId: number, reason: string): Promise<void> {
    await this.deps.audit.log({
      chatId,
      actionType: 'settings',
      targetUserId: null,
      adminId,
      reason,
    });
  }
}
