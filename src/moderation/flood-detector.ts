import { withStore } from '../errors';
import { FloodWindowsRepo } from '../repos/flood-windows-repo';
import { PolicySettings } from '../types';
import { secondsToMs } from '../utils/time';

export interface FloodCheck {
  tripped: boolean;
  count: number;
  limit: number;
  muteDurationMin: number;
  offendingMessageIds: string[];
}

export class FloodDetector {
  constructor(private readonly floodWindows: FloodWindowsRepo) {}

  checkRate(
    settings: PolicySettings,
    userId: number,
    messageId: string,
    nowTs: number,
  ): FloodCheck {
    const windowMs = secondsToMs(settings.spamTimeWindowSec);
    const snapshot = withStore('flood.recordAndCount', () => this.floodWindows.recordAndCount(
      settings.chatId,
      userId,
      messageId,
      nowTs,
      windowMs,
    ));

    const tripped = snapshot.count >= settings.spamMessageLimit;

    return {
      tripped,
      count: snapshot.count,
      limit: settings.spamMessageLimit,
      muteDurationMin: settings.spamMuteDurationMin,
      offendingMessageIds: tripped ? snapshot.messageIds : [],
    };
  }

  clear(chatId: number, userId: number): void {
    withStore('flood.clear', () => this.floodWindows.clear(chatId, userId));
  }
}
