import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteDatabase } from '../src/db/sqlite';
import { FloodDetector } from '../src/moderation/flood-detector';
import { defaultPolicySettings } from '../src/policy/policy-settings';
import { createRepositories } from '../src/repos';

describe('flood detector', () => {
  const settings = defaultPolicySettings(100);
  let db: SqliteDatabase;
  let detector: FloodDetector;

  beforeEach(() => {
    db = new SqliteDatabase(':memory:');
    detector = new FloodDetector(createRepositories(db.db).floodWindows);
  });

  afterEach(() => {
    db.close();
  });

  it('trips on the fifth message inside the window', () => {
    const base = 1_000_000;
    const results = [0, 1_000, 2_000, 3_000, 4_000].map((offset, index) => (
      detector.checkRate(settings, 7, `m${index + 1}`, base + offset)
    ));

    expect(results.slice(0, 4).map((result) => result.tripped)).toEqual([false, false, false, false]);
    expect(results[3]?.offendingMessageIds).toEqual([]);
    expect(results[4]).toEqual({
      tripped: true,
      count: 5,
      limit: 5,
      muteDurationMin: 5,
      offendingMessageIds: ['m1', 'm2', 'm3', 'm4', 'm5'],
    });
  });

  it('keeps tripping while the member stays over the limit', () => {
    const base = 1_000_000;
    const results = [0, 2_000, 4_000, 6_000, 9_000, 10_000].map((offset, index) => (
      detector.checkRate(settings, 7, `m${index + 1}`, base + offset)
    ));

    expect(results.map((result) => result.tripped)).toEqual([false, false, false, false, true, true]);
    expect(results[4]?.count).toBe(5);
    expect(results[5]).toEqual({
      tripped: true,
      count: 6,
      limit: 5,
      muteDurationMin: 5,
      offendingMessageIds: ['m1', 'm2', 'm3', 'm4', 'm5', 'm6'],
    });
  });

  it('does not count messages that left the window', () => {
    const base = 1_000_000;
    for (const [index, offset] of [0, 1_000, 2_000, 3_000].entries()) {
      detector.checkRate(settings, 7, `m${index + 1}`, base + offset);
    }

    const late = detector.checkRate(settings, 7, 'm5', base + 15_000);
    expect(late.tripped).toBe(false);
    expect(late.count).toBe(1);
  });

  it('counts a redelivered message once', () => {
    const base = 1_000_000;
    detector.checkRate(settings, 7, 'm1', base);
    const again = detector.checkRate(settings, 7, 'm1', base + 100);

    expect(again.count).toBe(1);
  });

  it('keeps windows per user', () => {
    const base = 1_000_000;
    for (let index = 0; index < 4; index += 1) {
      detector.checkRate(settings, 7, `a${index}`, base + index);
    }

    expect(detector.checkRate(settings, 8, 'b0', base + 10).count).toBe(1);
  });

  it('starts from zero after clear', () => {
    const base = 1_000_000;
    for (let index = 0; index < 4; index += 1) {
      detector.checkRate(settings, 7, `m${index}`, base + index);
    }

    detector.clear(100, 7);
    expect(detector.checkRate(settings, 7, 'm9', base + 10).count).toBe(1);
  });

  it('honours a custom limit', () => {
    const strict = { ...settings, spamMessageLimit: 2, spamMuteDurationMin: 30 };
    detector.checkRate(strict, 7, 'm1', 1_000);
    const second = detector.checkRate(strict, 7, 'm2', 2_000);

    expect(second.tripped).toBe(true);
    expect(second.muteDurationMin).toBe(30);
  });
});
