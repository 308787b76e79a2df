import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { defaultPolicySettings } from '../src/policy/policy-settings';
import { WelcomeService, formatWelcome } from '../src/services/welcome';
import { TestHarness, createHarness, silenceConsole } from './support/fakes';

describe('formatWelcome', () => {
  it('fills placeholders and escapes user input', () => {
    const template = 'Привет, {username}! Это {chatname}, нас {membercount}.';

    expect(formatWelcome(template, { userId: 7, name: '<b>Гость</b>' }, { title: 'Клуб', memberCount: 10 }))
      .toBe('Привет, &lt;b&gt;Гость&lt;/b&gt;! Это Клуб, нас 10.');
    expect(formatWelcome(template, { userId: 7, name: 'Гость', username: 'guest' }, {}))
      .toBe('Привет, @guest! Это Чат, нас ?.');
    expect(formatWelcome('{username}', { userId: 7 }, {})).toBe('Участник');
  });
});

describe('welcome service', () => {
  const user = { userId: 7, name: 'Гость' };
  let harness: TestHarness;
  let sleep: (ms: number) => Promise<void>;
  let service: WelcomeService;

  beforeEach(() => {
    silenceConsole();
    harness = createHarness();
    sleep = vi.fn(async (_ms: number) => {});
    service = new WelcomeService(
      harness.transport,
      harness.repos.welcomeMarks,
      harness.repos.botMessageDeletes,
      harness.logger,
      sleep,
    );
  });

  afterEach(() => {
    harness.close();
  });

  it('greets a member once', async () => {
    const settings = { ...defaultPolicySettings(100), welcomeEnabled: true };

    expect(await service.send(settings, user)).toBe(true);
    expect(await service.send(settings, user)).toBe(false);
    expect(harness.api.sentTo({ chatId: 100 }).map((record) => record.text)).toEqual(['Добро пожаловать, Гость!']);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('does nothing when disabled', async () => {
    expect(await service.send(defaultPolicySettings(100), user)).toBe(false);
    expect(harness.api.sent).toEqual([]);
  });

  it('waits, then schedules removal of the greeting', async () => {
    const settings = {
      ...defaultPolicySettings(100),
      welcomeEnabled: true,
      welcomeDelaySec: 5,
      welcomeAutoDeleteSec: 30,
    };

    const before = Date.now();
    expect(await service.send(settings, user)).toBe(true);

    expect(sleep).toHaveBeenCalledWith(5_000);
    const [scheduled] = harness.repos.botMessageDeletes.listDue(Number.MAX_SAFE_INTEGER);
    expect(scheduled?.messageId).toBe('bot-1');
    expect(scheduled?.deleteAtTs).toBeGreaterThanOrEqual(before + 30_000);
  });

  it('greets privately without scheduling a removal', async () => {
    const settings = {
      ...defaultPolicySettings(100),
      welcomeEnabled: true,
      welcomePrivate: true,
      welcomeAutoDeleteSec: 30,
    };

    expect(await service.send(settings, user)).toBe(true);

    expect(harness.api.sent.map((record) => record.target)).toEqual([{ userId: 7 }]);
    expect(harness.repos.botMessageDeletes.listDue(Number.MAX_SAFE_INTEGER)).toEqual([]);
  });

  it('reports a failed send', async () => {
    harness.api.failSend = true;

    expect(await service.send({ ...defaultPolicySettings(100), welcomeEnabled: true }, user)).toBe(false);
  });
});
