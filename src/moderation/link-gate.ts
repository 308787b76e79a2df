import { errorMessage, withStore } from '../errors';
import { JoinRecordsRepo } from '../repos/join-records-repo';
import { BotLogger } from '../services/logger';
import { LinkAction, PolicySettings } from '../types';
import { hoursToMs } from '../utils/time';
import { extractLinks, findUnlistedLinks } from './link-detector';

export const JOIN_RECORD_TTL_MS = hoursToMs(168);

export interface LinkGateDecision {
  action: LinkAction;
  links: string[];
}

export class NewbieLinkGate {
  constructor(
    private readonly joinRecords: JoinRecordsRepo,
    private readonly logger: BotLogger,
  ) {}

  recordJoin(chatId: number, userId: number, nowTs: number): void {
    withStore('joins.record', () => this.joinRecords.upsert(chatId, userId, nowTs, JOIN_RECORD_TTL_MS));
  }

  isNewbie(settings: PolicySettings, userId: number, nowTs: number): boolean {
    let joinedAt: number | null;
    try {
      joinedAt = this.joinRecords.getJoinedAt(settings.chatId, userId, nowTs);
    } catch (error) {
      void this.logger.warn('Join record lookup failed, treating member as newbie', {
        chatId: settings.chatId,
        userId,
        error: errorMessage(error),
      });
      return true;
    }

    if (joinedAt === null) return true;
    return nowTs - joinedAt < hoursToMs(settings.linkNewbieHours);
  }

  check(settings: PolicySettings, userId: number, text: string | null | undefined, nowTs: number): LinkGateDecision | null {
    if (!settings.linkFilterEnabled) return null;
    if (!this.isNewbie(settings, userId, nowTs)) return null;

    const links = findUnlistedLinks(extractLinks(text), settings.linkWhitelist);
    if (links.length === 0) return null;

    return { action: settings.linkAction, links };
  }
}
