import { describe, expect, it } from 'vitest';
import { matchSpamPattern } from '../src/moderation/spam-patterns';

describe('spam patterns', () => {
  it('detects crypto scam domains', () => {
    expect(matchSpamPattern('забирай бонус на binance-gift.com')).toBe('crypto_scam');
    expect(matchSpamPattern('airdrop.io раздаёт токены')).toBe('crypto_scam');
  });

  it('detects adult domains', () => {
    expect(matchSpamPattern('мой профиль onlyfans.com/someone')).toBe('adult_content');
  });

  it('detects solicitation phrasing', () => {
    expect(matchSpamPattern('Заработок от 5000 в день')).toBe('spam_pattern');
    expect(matchSpamPattern('пассивный доход без вложений')).toBe('spam_pattern');
    expect(matchSpamPattern('лучшее CASINO онлайн')).toBe('spam_pattern');
  });

  it('prefers the crypto category when several match', () => {
    expect(matchSpamPattern('казино и claim-reward.com')).toBe('crypto_scam');
  });

  it('leaves ordinary text alone', () => {
    expect(matchSpamPattern('Привет! Встречаемся завтра в 10')).toBeNull();
    expect(matchSpamPattern('')).toBeNull();
    expect(matchSpamPattern(null)).toBeNull();
  });
});
