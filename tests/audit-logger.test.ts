import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TestHarness, createHarness, silenceConsole } from './support/fakes';

const ts = Date.parse('2026-01-10T12:00:00Z');

describe('audit logger', () => {
  let harness: TestHarness;

  beforeEach(() => {
    silenceConsole();
    harness = createHarness({ logChatId: -900 });
  });

  afterEach(() => {
    harness.close();
  });

  it('stores the entry and forwards it to the log chat', async () => {
    const entry = await harness.moderation.audit.log({
      chatId: 100,
      actionType: 'warn',
      targetUserId: 7,
      adminId: 2,
      reason: 'флуд <b>',
      nowTs: ts,
    });

    expect(entry.auto).toBe(false);
    expect(harness.moderation.audit.getLog(100)).toEqual([entry]);
    expect(harness.api.sentTo({ chatId: -900 }).map((record) => record.text)).toEqual([[
      '⚠️ <b>Предупреждение</b>',
      '',
      '👤 Пользователь: <code>7</code>',
      '👮 Админ: <code>2</code>',
      '📝 Причина: флуд &lt;b&gt;',
      '🕐 Время: 10.01.2026, 12:00',
      '💬 Чат: <code>100</code>',
    ].join('\n')]);
  });

  it('marks automatic actions', async () => {
    await harness.moderation.audit.log({
      chatId: 100,
      actionType: 'spam',
      targetUserId: 7,
      adminId: null,
      reason: '',
      nowTs: ts,
    });

    const [forwarded] = harness.api.sent;
    expect(forwarded?.text.split('\n').slice(3, 5)).toEqual(['🤖 Автоматическое действие', '📝 Причина: Не указана']);
    expect(harness.moderation.audit.getLog(100)[0]?.auto).toBe(true);
  });

  it('prefers the chat audit sink over the log chat', async () => {
    harness.moderation.store.update(100, { auditSinkChatId: -500 });

    await harness.moderation.audit.log({ chatId: 100, actionType: 'kick', targetUserId: 7, adminId: 2, reason: 'x' });

    expect(harness.api.sent.map((record) => record.target)).toEqual([{ chatId: -500 }]);
  });

  it('never throws when the store or the sink fails', async () => {
    vi.spyOn(harness.repos.moderationActions, 'append').mockImplementation(() => {
      throw new Error('disk full');
    });

    await expect(harness.moderation.audit.log({
      chatId: 100,
      actionType: 'ban',
      targetUserId: 7,
      adminId: 2,
      reason: 'x',
    })).resolves.toMatchObject({ actionType: 'ban' });
    expect(harness.api.sentTo({ chatId: -900 })).toHaveLength(1);

    harness.api.failSend = true;
    expect(await harness.moderation.audit.forward(100, 'text')).toBe(false);
  });
});
