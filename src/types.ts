export type LinkAction = 'delete' | 'warn' | 'hold';

export type CaptchaDifficulty = 'easy' | 'medium' | 'hard';

export type CaptchaFailAction = 'kick' | 'mute';

export type RestrictionType = 'mute' | 'ban_fallback';

export type MemberStatus = 'owner' | 'admin' | 'member' | 'left' | 'unknown';

export type ModActionType =
  | 'warn'
  | 'mute'
  | 'unmute'
  | 'ban'
  | 'kick'
  | 'delete'
  | 'filter'
  | 'hold'
  | 'clearwarns'
  | 'spam'
  | 'settings';

export type ModerationAction = 'none' | 'delete' | 'warn' | 'mute' | 'ban' | 'hold';

export type SpamCategory = 'crypto_scam' | 'adult_content' | 'spam_pattern';

export type EscalationTier = 'none' | 'mute' | 'ban';

export interface BotConfig {
  botToken: string;
  timezone: string;
  databasePath: string;
  logChatId?: number;
  superadminId?: number;
  dataHashSalt: string;
  dataHashSaltGenerated: boolean;
  noticeInChat: boolean;
  cleanupIntervalSec: number;
  adminCacheTtlSec: number;
}

export interface PolicySettings {
  chatId: number;
  welcomeEnabled: boolean;
  welcomeMessage: string;
  welcomeDelaySec: number;
  welcomeAutoDeleteSec: number;
  welcomePrivate: boolean;
  spamEnabled: boolean;
  spamMessageLimit: number;
  spamTimeWindowSec: number;
  spamMuteDurationMin: number;
  linkFilterEnabled: boolean;
  linkNewbieHours: number;
  linkAction: LinkAction;
  linkWhitelist: string[];
  warnMuteThreshold: number;
  warnBanThreshold: number;
  warnMuteDurationHours: number;
  captchaEnabled: boolean;
  captchaTimeoutSec: number;
  captchaDifficulty: CaptchaDifficulty;
  captchaFailAction: CaptchaFailAction;
  filterWords: string[];
  filterNotifyUser: boolean;
  auditSinkChatId: number | null;
}

export interface Violation {
  field: string;
  message: string;
}

export interface ChatUser {
  userId: number;
  name?: string;
  username?: string;
  isBot?: boolean;
}

export interface Warning {
  id: string;
  chatId: number;
  userId: number;
  adminId: number | null;
  reason: string;
  createdAt: number;
}

export interface ModAction {
  id: string;
  chatId: number;
  actionType: ModActionType;
  targetUserId: number | null;
  adminId: number | null;
  reason: string;
  createdAt: number;
  auto: boolean;
}

export interface Challenge {
  id: string;
  chatId: number;
  userId: number;
  question: string;
  answer: string;
  options: number[];
  expiresAt: number;
  messageId: string | null;
  state: 'issued';
  createdAt: number;
}

export interface ModerationResult {
  action: ModerationAction;
  reason: string;
  shouldDelete: boolean;
  muteDurationMin: number;
  details: string;
  matchedWord?: string;
  offendingMessageIds: string[];
}

export interface ActiveRestriction {
  chatId: number;
  userId: number;
  type: RestrictionType;
  untilTs: number;
  createdAtTs: number;
}

export interface PendingBotMessageDelete {
  chatId: number;
  messageId: string;
  deleteAtTs: number;
  createdAtTs: number;
}
