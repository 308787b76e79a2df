import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteDatabase } from '../src/db/sqlite';
import { ValidationError } from '../src/errors';
import { defaultPolicySettings } from '../src/policy/policy-settings';
import { PolicyStore } from '../src/policy/policy-store';
import { SettingsCache } from '../src/policy/settings-cache';
import { createRepositories, Repositories } from '../src/repos';
import { createTestLogger, silenceConsole } from './support/fakes';

function captureViolations(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ValidationError) return error;
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('policy store', () => {
  let db: SqliteDatabase;
  let repos: Repositories;
  let store: PolicyStore;

  beforeEach(() => {
    silenceConsole();
    db = new SqliteDatabase(':memory:');
    repos = createRepositories(db.db);
    store = new PolicyStore(repos.policySettings, createTestLogger());
  });

  afterEach(() => {
    db.close();
  });

  it('returns conservative defaults for an unknown chat', () => {
    const settings = store.get(100);

    expect(settings).toEqual(defaultPolicySettings(100));
    expect(settings.spamEnabled).toBe(true);
    expect(settings.spamMessageLimit).toBe(5);
    expect(settings.spamTimeWindowSec).toBe(10);
    expect(settings.linkAction).toBe('hold');
    expect(settings.warnMuteThreshold).toBe(3);
    expect(settings.warnBanThreshold).toBe(5);
    expect(settings.captchaEnabled).toBe(false);
    expect(settings.captchaFailAction).toBe('kick');
    expect(settings.filterNotifyUser).toBe(true);
    expect(settings.auditSinkChatId).toBeNull();
  });

  it('persists updates and normalises list entries', () => {
    store.update(100, { filterWords: [' Spam ', 'spam', 'ЛОХОТРОН'], linkWhitelist: ['Example.COM'] });

    const settings = store.get(100);
    expect(settings.filterWords).toEqual(['spam', 'лохотрон']);
    expect(settings.linkWhitelist).toEqual(['example.com']);
  });

  it('rejects a mute threshold that is not below the ban threshold', () => {
    const error = captureViolations(() => store.update(100, { warnMuteThreshold: 5, warnBanThreshold: 5 }));

    expect(error.violations).toEqual([
      { field: 'warnBanThreshold', message: 'must be greater than warnMuteThreshold' },
    ]);
    expect(store.get(100).warnBanThreshold).toBe(5);
    expect(store.get(100).warnMuteThreshold).toBe(3);
  });

  it('reports every out-of-range field and saves nothing', () => {
    const error = captureViolations(() => store.update(100, { spamMessageLimit: 0, captchaTimeoutSec: 10 }));

    expect(error.violations.map((violation) => violation.field)).toEqual(['spamMessageLimit', 'captchaTimeoutSec']);
    expect(repos.policySettings.findJson(100)).toBeNull();
  });

  it('validates without saving', () => {
    expect(store.validate(defaultPolicySettings(1))).toEqual([]);
    expect(store.validate({ ...defaultPolicySettings(1), welcomeDelaySec: 31 }).map((item) => item.field))
      .toEqual(['welcomeDelaySec']);
  });

  it('round-trips settings through export and import', () => {
    store.update(100, {
      spamEnabled: false,
      linkFilterEnabled: true,
      linkAction: 'warn',
      filterWords: ['casino'],
      auditSinkChatId: -500,
    });

    const exported = store.exportJSON(100);
    expect(JSON.parse(exported)).not.toHaveProperty('chatId');

    const imported = store.importJSON(200, exported);
    expect(imported).toEqual({ ...store.get(100), chatId: 200 });
    expect(store.get(200)).toEqual(imported);
  });

  it('imports a partial payload over defaults and ignores the embedded chat id', () => {
    const imported = store.importJSON(300, JSON.stringify({ chatId: 999, spamEnabled: false }));

    expect(imported).toEqual({ ...defaultPolicySettings(300), spamEnabled: false });
  });

  it('rejects malformed JSON and unknown keys', () => {
    const malformed = captureViolations(() => store.importJSON(300, '{not json'));
    expect(malformed.violations[0]?.field).toBe('$');

    const notObject = captureViolations(() => store.importJSON(300, '[1, 2]'));
    expect(notObject.violations).toEqual([{ field: '$', message: 'settings payload must be a JSON object' }]);

    const unknownKey = captureViolations(() => store.importJSON(300, JSON.stringify({ nightMode: true })));
    expect(unknownKey.violations[0]?.field).toBe('$');
  });

  it('falls back to defaults when the stored row is corrupt', () => {
    repos.policySettings.replace(400, '{broken');
    expect(store.get(400)).toEqual(defaultPolicySettings(400));

    repos.policySettings.replace(401, JSON.stringify({ spamMessageLimit: 99 }));
    expect(store.get(401)).toEqual(defaultPolicySettings(401));
  });

  it('resets a chat to defaults', () => {
    store.update(100, { captchaEnabled: true });

    expect(store.reset(100)).toBe(true);
    expect(store.get(100)).toEqual(defaultPolicySettings(100));
    expect(store.reset(100)).toBe(false);
  });

  it('keeps the settings cache in step with writes', () => {
    const cache = new SettingsCache(store);

    expect(cache.get(100).spamEnabled).toBe(true);
    expect(cache.size).toBe(1);

    store.update(100, { spamEnabled: false });
    expect(cache.size).toBe(0);
    expect(cache.get(100).spamEnabled).toBe(false);

    store.reset(100);
    expect(cache.get(100).spamEnabled).toBe(true);
  });

  it('stops notifying an unsubscribed listener', () => {
    const changed: number[] = [];
    const unsubscribe = store.onChange((chatId) => changed.push(chatId));

    store.update(1, { welcomeEnabled: true });
    unsubscribe();
    store.update(2, { welcomeEnabled: true });

    expect(changed).toEqual([1]);
  });
});
