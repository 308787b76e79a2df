import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { SqliteDatabase } from '../src/db/sqlite';
import { NewbieLinkGate } from '../src/moderation/link-gate';
import { defaultPolicySettings } from '../src/policy/policy-settings';
import { JoinRecordsRepo } from '../src/repos/join-records-repo';
import { createRepositories } from '../src/repos';
import { hoursToMs } from '../src/utils/time';
import { createTestLogger, silenceConsole } from './support/fakes';

describe('newbie link gate', () => {
  const settings = { ...defaultPolicySettings(100), linkFilterEnabled: true, linkWhitelist: ['example.org'] };
  const joinedAt = 1_700_000_000_000;
  let db: SqliteDatabase;
  let joinRecords: JoinRecordsRepo;
  let gate: NewbieLinkGate;

  beforeEach(() => {
    silenceConsole();
    db = new SqliteDatabase(':memory:');
    joinRecords = createRepositories(db.db).joinRecords;
    gate = new NewbieLinkGate(joinRecords, createTestLogger());
  });

  afterEach(() => {
    db.close();
  });

  it('returns the configured action for a newbie posting a link', () => {
    gate.recordJoin(100, 7, joinedAt);

    expect(gate.check(settings, 7, 'смотри https://promo.test/x', joinedAt + hoursToMs(1))).toEqual({
      action: 'hold',
      links: ['https://promo.test/x'],
    });
  });

  it('lets members through once the newbie period is over', () => {
    gate.recordJoin(100, 7, joinedAt);

    expect(gate.check(settings, 7, 'https://promo.test', joinedAt + hoursToMs(24))).toBeNull();
  });

  it('treats members without a join record as newbies', () => {
    expect(gate.isNewbie(settings, 8, joinedAt)).toBe(true);
  });

  it('treats members as newbies when the join record cannot be read', () => {
    gate.recordJoin(100, 7, joinedAt);
    vi.spyOn(joinRecords, 'getJoinedAt').mockImplementation(() => {
      throw new Error('disk I/O error');
    });

    const longAfterJoin = joinedAt + hoursToMs(48);
    expect(gate.isNewbie(settings, 7, longAfterJoin)).toBe(true);
    expect(gate.check(settings, 7, 'https://promo.test', longAfterJoin)).toEqual({
      action: 'hold',
      links: ['https://promo.test'],
    });
  });

  it('ignores whitelisted links and plain text', () => {
    gate.recordJoin(100, 7, joinedAt);

    expect(gate.check(settings, 7, 'docs at https://example.org/start', joinedAt + 1)).toBeNull();
    expect(gate.check(settings, 7, 'просто текст', joinedAt + 1)).toBeNull();
  });

  it('does nothing when the gate is disabled', () => {
    const disabled = { ...settings, linkFilterEnabled: false };

    expect(gate.check(disabled, 7, 'https://promo.test', joinedAt)).toBeNull();
  });

  it('uses the configured action', () => {
    const deleting = { ...settings, linkAction: 'delete' as const };

    expect(gate.check(deleting, 9, 'promo.test', joinedAt)?.action).toBe('delete');
  });
});
