import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SqliteDatabase } from '../src/db/sqlite';
import { ContentFilter } from '../src/moderation/content-filter';
import { FILTER_WORD_MAX_LENGTH, defaultPolicySettings } from '../src/policy/policy-settings';
import { PolicyStore } from '../src/policy/policy-store';
import { createRepositories } from '../src/repos';
import { createTestLogger, silenceConsole } from './support/fakes';

describe('content filter', () => {
  let db: SqliteDatabase;
  let store: PolicyStore;
  let filter: ContentFilter;

  beforeEach(() => {
    silenceConsole();
    db = new SqliteDatabase(':memory:');
    store = new PolicyStore(createRepositories(db.db).policySettings, createTestLogger());
    filter = new ContentFilter(store);
  });

  afterEach(() => {
    db.close();
  });

  it('matches whole words regardless of case and punctuation', () => {
    const settings = { ...defaultPolicySettings(1), filterWords: ['spam'] };

    expect(filter.check(settings, 'spam, anyone?')).toEqual({ filtered: true, matchedWord: 'spam' });
    expect(filter.check(settings, 'SPAM')).toEqual({ filtered: true, matchedWord: 'spam' });
    expect(filter.check(settings, 'spammy offer')).toEqual({ filtered: false });
    expect(filter.check(settings, 'antispam')).toEqual({ filtered: false });
  });

  it('applies word boundaries to cyrillic text', () => {
    const settings = { ...defaultPolicySettings(1), filterWords: ['лох'] };

    expect(filter.check(settings, 'ты лох!')).toEqual({ filtered: true, matchedWord: 'лох' });
    expect(filter.check(settings, 'лохотрон')).toEqual({ filtered: false });
  });

  it('treats regex metacharacters literally', () => {
    const settings = { ...defaultPolicySettings(1), filterWords: ['c++'] };

    expect(filter.check(settings, 'я пишу на c++ давно').filtered).toBe(true);
    expect(filter.check(settings, 'я пишу на c давно').filtered).toBe(false);
  });

  it('returns the first listed word that matches', () => {
    const settings = { ...defaultPolicySettings(1), filterWords: ['casino', 'spam'] };

    expect(filter.check(settings, 'spam and casino').matchedWord).toBe('casino');
  });

  it('ignores empty text and empty lists', () => {
    expect(filter.check({ ...defaultPolicySettings(1), filterWords: ['spam'] }, null)).toEqual({ filtered: false });
    expect(filter.check(defaultPolicySettings(1), 'spam')).toEqual({ filtered: false });
  });

  it('adds, lists and removes words through the store', () => {
    expect(filter.addWord(store.get(1), '  Casino ')).toBe('added');
    expect(filter.addWord(store.get(1), 'casino')).toBe('duplicate');
    expect(filter.addWord(store.get(1), '   ')).toBe('empty');
    expect(filter.addWord(store.get(1), 'x'.repeat(FILTER_WORD_MAX_LENGTH + 1))).toBe('too_long');
    expect(filter.listWords(store.get(1))).toEqual(['casino']);

    expect(filter.check(store.get(1), 'best casino here').matchedWord).toBe('casino');

    expect(filter.removeWord(store.get(1), 'CASINO')).toBe(true);
    expect(filter.removeWord(store.get(1), 'casino')).toBe(false);
    expect(filter.check(store.get(1), 'best casino here').filtered).toBe(false);
  });

  it('clears the whole list', () => {
    filter.addWord(store.get(1), 'one');
    filter.addWord(store.get(1), 'two');

    expect(filter.clearWords(store.get(1))).toBe(2);
    expect(filter.listWords(store.get(1))).toEqual([]);
    expect(filter.clearWords(store.get(1))).toBe(0);
  });
});
