import crypto from 'node:crypto';
import { errorMessage } from '../errors';
import { ChallengesRepo } from '../repos/challenges-repo';
import { AuditLogger } from '../services/audit-logger';
import { BotLogger } from '../services/logger';
import { ChatTransport } from '../transport/chat-transport';
import { Challenge, ChatUser, PolicySettings } from '../types';
import { escapeHtml } from '../utils/text';
import { hoursToMs, secondsToMs } from '../utils/time';
import { RandomSource, answersMatch, generateChallenge } from './challenge-generator';

export const CHALLENGE_CALLBACK_PREFIX = 'captcha:';
export const CHALLENGE_STORE_GRACE_MS = 60 * 1000;
export const CHALLENGE_FAIL_MUTE_MS = hoursToMs(24);
export const CHALLENGE_TIMEOUT_REASON = 'Провал проверки (таймаут)';

export interface ChallengeManagerOptions {
  random?: RandomSource;
}

function timerKey(chatId: number, userId: number): string {
  return `${chatId}:${userId}`;
}

export function displayName(user: ChatUser): string {
  const name = user.name?.trim() || user.username?.trim();
  return name || `Пользователь ${user.userId}`;
}

export function parseChallengeCallback(payload: string): string | null {
  if (!payload.startsWith(CHALLENGE_CALLBACK_PREFIX)) return null;
  const value = payload.slice(CHALLENGE_CALLBACK_PREFIX.length).trim();
  return value || null;
}

export class ChallengeManager {
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly random: RandomSource;

  constructor(
    private readonly challenges: ChallengesRepo,
    private readonly transport: ChatTransport,
    private readonly audit: AuditLogger,
    private readonly logger: BotLogger,
    options: ChallengeManagerOptions = {},
  ) {
    this.random = options.random ?? Math.random;
  }

  get pendingTimers(): number {
    return this.timers.size;
  }

  async issue(settings: PolicySettings, user: ChatUser): Promise<Challenge | null> {
    const { chatId } = settings;
    const nowTs = Date.now();

    this.cancelTimer(chatId, user.userId);
    await this.discardSuperseded(chatId, user.userId, nowTs);

    const generated = generateChallenge(settings.captchaDifficulty, this.random);
    const challenge: Challenge = {
      id: crypto.randomUUID(),
      chatId,
      userId: user.userId,
      question: generated.question,
      answer: generated.answer,
      options: generated.options,
      expiresAt: nowTs + secondsToMs(settings.captchaTimeoutSec),
      messageId: null,
      state: 'issued',
      createdAt: nowTs,
    };

    try {
      this.challenges.put(challenge, challenge.expiresAt + CHALLENGE_STORE_GRACE_MS);
    } catch (error) {
      await this.logger.error('Failed to store challenge', {
        chatId,
        userId: user.userId,
        error: errorMessage(error),
      });
      return null;
    }

    const text = [
      `👋 Привет, <b>${escapeHtml(displayName(user))}</b>!`,
      '',
      '🔐 Для входа в чат реши простую задачу:',
      '',
      `<b>${challenge.question}</b>`,
      '',
      `⏱ У тебя ${settings.captchaTimeoutSec} секунд.`,
    ].join('\n');

    try {
      const sent = await this.transport.sendMessage({ chatId }, text, {
        format: 'html',
        buttons: [challenge.options.map((option) => ({
          text: String(option),
          payload: `${CHALLENGE_CALLBACK_PREFIX}${option}`,
        }))],
      });

      if (sent.messageId) {
        challenge.messageId = sent.messageId;
        this.challenges.setMessageId(chatId, user.userId, challenge.id, sent.messageId);
      }
    } catch (error) {
      await this.logger.error('Failed to send challenge', {
        chatId,
        userId: user.userId,
        error: errorMessage(error),
      });
      this.claim(challenge);
      return null;
    }

    if (!this.isCurrent(challenge)) {
      await this.deleteChallengeMessage(challenge);
      await this.logger.info('Challenge superseded before its timer started', {
        chatId,
        userId: user.userId,
      });
      return null;
    }

    this.startTimer(challenge, settings, secondsToMs(settings.captchaTimeoutSec));

    await this.logger.info('Challenge issued', {
      chatId,
      userId: user.userId,
      difficulty: settings.captchaDifficulty,
    });

    return challenge;
  }

  async verify(chatId: number, userId: number, answer: string): Promise<boolean> {
    const challenge = this.get(chatId, userId);
    if (!challenge || !answersMatch(answer, challenge.answer)) {
      return false;
    }

    this.cancelTimer(chatId, userId);
    if (!this.claim(challenge)) {
      return false;
    }

    await this.deleteChallengeMessage(challenge);
    await this.logger.info('Challenge solved', { chatId, userId });
    return true;
  }

  get(chatId: number, userId: number): Challenge | null {
    try {
      return this.challenges.get(chatId, userId, Date.now());
    } catch (error) {
      void this.logger.error('Failed to read challenge', {
        chatId,
        userId,
        error: errorMessage(error),
      });
      return null;
    }
  }

  hasPending(chatId: number, userId: number): boolean {
    return this.get(chatId, userId) !== null;
  }

  restorePending(settingsOf: (chatId: number) => PolicySettings, nowTs: number = Date.now()): number {
    let pending: Challenge[];
    try {
      pending = this.challenges.listLive(nowTs);
    } catch (error) {
      void this.logger.error('Failed to load pending challenges', { error: errorMessage(error) });
      return 0;
    }

    for (const challenge of pending) {
      this.startTimer(challenge, settingsOf(challenge.chatId), Math.max(0, challenge.expiresAt - nowTs));
    }

    return pending.length;
  }

  cancelAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  private startTimer(challenge: Challenge, settings: PolicySettings, delayMs: number): void {
    const key = timerKey(challenge.chatId, challenge.userId);
    this.cancelTimer(challenge.chatId, challenge.userId);

    const timer = setTimeout(() => {
      if (this.timers.get(key) === timer) {
        this.timers.delete(key);
      }
      void this.handleTimeout(challenge.chatId, challenge.userId, challenge.id, settings);
    }, delayMs);

    this.timers.set(key, timer);
  }

  private cancelTimer(chatId: number, userId: number): void {
    const key = timerKey(chatId, userId);
    const timer = this.timers.get(key);
    if (!timer) return;

    clearTimeout(timer);
    this.timers.delete(key);
  }

  private async handleTimeout(
    chatId: number,
    userId: number,
    challengeId: string,
    settings: PolicySettings,
  ): Promise<void> {
    try {
      const challenge = this.get(chatId, userId);
      if (!challenge || challenge.id !== challengeId) {
        return;
      }

      if (!this.claim(challenge)) {
        return;
      }

      await this.deleteChallengeMessage(challenge);
      const applied = await this.applyFailAction(settings, userId);
      if (!applied) {
        return;
      }

      await this.audit.log({
        chatId,
        actionType: settings.captchaFailAction,
        targetUserId: userId,
        adminId: null,
        reason: CHALLENGE_TIMEOUT_REASON,
      });
    } catch (error) {
      await this.logger.error('Challenge timeout handling failed', {
        chatId,
        userId,
        error: errorMessage(error),
      });
    }
  }

  private async applyFailAction(settings: PolicySettings, userId: number): Promise<boolean> {
    const { chatId } = settings;

    try {
      if (settings.captchaFailAction === 'kick') {
        await this.transport.kickUser(chatId, userId);
      } else {
        await this.transport.restrictUser(
          chatId,
          userId,
          { canSendMessages: false },
          Date.now() + CHALLENGE_FAIL_MUTE_MS,
        );
      }
      return true;
    } catch (error) {
      await this.logger.error('Failed to apply challenge fail action', {
        chatId,
        userId,
        failAction: settings.captchaFailAction,
        error: errorMessage(error),
      });
      return false;
    }
  }

  private claim(challenge: Challenge): boolean {
    try {
      return this.challenges.remove(challenge.chatId, challenge.userId, challenge.id);
    } catch (error) {
      void this.logger.error('Failed to remove challenge', {
        chatId: challenge.chatId,
        userId: challenge.userId,
        error: errorMessage(error),
      });
      return false;
    }
  }

  private async discardSuperseded(chatId: number, userId: number, nowTs: number): Promise<void> {
    let previous: Challenge | null = null;
    try {
      previous = this.challenges.get(chatId, userId, nowTs);
    } catch (error) {
      await this.logger.warn('Failed to read superseded challenge', {
        chatId,
        userId,
        error: errorMessage(error),
      });
    }

    if (!previous) return;
    this.claim(previous);
    await this.deleteChallengeMessage(previous);
  }

  private isCurrent(challenge: Challenge): boolean {
    return this.get(challenge.chatId, challenge.userId)?.id === challenge.id;
  }

  private async deleteChallengeMessage(challenge: Challenge): Promise<void> {
    if (!challenge.messageId) return;

    try {
      await this.transport.deleteMessage(challenge.chatId, challenge.messageId);
    } catch (error) {
      await this.logger.warn('Failed to delete challenge message', {
        chatId: challenge.chatId,
        userId: challenge.userId,
        error: errorMessage(error),
      });
    }
  }
}
