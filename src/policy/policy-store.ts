import { ValidationError, errorMessage, withStore } from '../errors';
import { PolicySettingsRepo } from '../repos/policy-settings-repo';
import { BotLogger } from '../services/logger';
import { PolicySettings, Violation } from '../types';
import {
  PolicyPatch,
  defaultPolicySettings,
  exportablePolicySettings,
  parseImportedSettings,
  parsePolicySettings,
  validatePolicySettings,
} from './policy-settings';

export type SettingsChangeListener = (chatId: number) => void;

export class PolicyStore {
  private readonly listeners = new Set<SettingsChangeListener>();

  constructor(
    private readonly repo: PolicySettingsRepo,
    private readonly logger: BotLogger,
  ) {}

  onChange(listener: SettingsChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get(chatId: number): PolicySettings {
    let stored: string | null;
    try {
      stored = this.repo.findJson(chatId);
    } catch (error) {
      void this.logger.warn('Failed to read policy settings, using defaults', {
        chatId,
        error: errorMessage(error),
      });
      return defaultPolicySettings(chatId);
    }

    if (stored === null) {
      return defaultPolicySettings(chatId);
    }

    const outcome = this.decodeStored(chatId, stored);
    if (!outcome.ok) {
      void this.logger.warn('Stored policy settings are invalid, using defaults', {
        chatId,
        violations: outcome.violations.map((violation) => violation.field),
      });
      return defaultPolicySettings(chatId);
    }

    return outcome.settings;
  }

  validate(settings: PolicySettings): Violation[] {
    return validatePolicySettings(settings);
  }

  save(settings: PolicySettings): PolicySettings {
    const outcome = parsePolicySettings(settings);
    if (!outcome.ok) {
      throw new ValidationError(outcome.violations);
    }

    this.persist(outcome.settings);
    return outcome.settings;
  }

  update(chatId: number, patch: PolicyPatch): PolicySettings {
    return this.save({ ...this.get(chatId), ...patch, chatId });
  }

  exportJSON(chatId: number): string {
    return JSON.stringify(exportablePolicySettings(this.get(chatId)), null, 2);
  }

  importJSON(chatId: number, text: string): PolicySettings {
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new ValidationError([{ field: '$', message: `invalid JSON: ${errorMessage(error)}` }]);
    }

    const outcome = parseImportedSettings(chatId, payload);
    if (!outcome.ok) {
      throw new ValidationError(outcome.violations);
    }

    this.persist(outcome.settings);
    return outcome.settings;
  }

  reset(chatId: number): boolean {
    const removed = withStore('policy.reset', () => this.repo.remove(chatId));
    this.notify(chatId);
    return removed;
  }

  private persist(settings: PolicySettings): void {
    const json = JSON.stringify(exportablePolicySettings(settings));
    withStore('policy.save', () => this.repo.replace(settings.chatId, json));
    this.notify(settings.chatId);
  }

  private decodeStored(chatId: number, stored: string) {
    let payload: unknown;
    try {
      payload = JSON.parse(stored);
    } catch {
      return { ok: false as const, violations: [{ field: '$', message: 'stored settings are not valid JSON' }] };
    }

    return parseImportedSettings(chatId, payload);
  }

  private notify(chatId: number): void {
    for (const listener of this.listeners) {
      listener(chatId);
    }
  }
}
