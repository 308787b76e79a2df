import crypto from 'node:crypto';
import { withStore } from '../errors';
import { WarningsRepo } from '../repos/warnings-repo';
import { EscalationTier, PolicySettings, Warning } from '../types';

export interface WarnOutcome {
  warning: Warning;
  totalCount: number;
  escalation: EscalationTier;
  muteDurationHours: number;
}

export function resolveEscalation(settings: PolicySettings, totalCount: number): EscalationTier {
  if (totalCount >= settings.warnBanThreshold) return 'ban';
  if (totalCount >= settings.warnMuteThreshold) return 'mute';
  return 'none';
}

export class WarnTracker {
  constructor(private readonly warnings: WarningsRepo) {}

  addWarning(
    settings: PolicySettings,
    userId: number,
    adminId: number | null,
    reason: string,
    nowTs: number = Date.now(),
  ): WarnOutcome {
    const warning: Warning = {
      id: crypto.randomUUID(),
      chatId: settings.chatId,
      userId,
      adminId,
      reason,
      createdAt: nowTs,
    };

    const totalCount = withStore('warnings.add', () => this.warnings.addAndCount(warning));

    return {
      warning,
      totalCount,
      escalation: resolveEscalation(settings, totalCount),
      muteDurationHours: settings.warnMuteDurationHours,
    };
  }

  listWarnings(chatId: number, userId: number): Warning[] {
    return withStore('warnings.list', () => this.warnings.listNewestFirst(chatId, userId));
  }

  countWarnings(chatId: number, userId: number): number {
    return withStore('warnings.count', () => this.warnings.count(chatId, userId));
  }

  clearWarnings(chatId: number, userId: number): number {
    return withStore('warnings.clear', () => this.warnings.clear(chatId, userId));
  }
}
