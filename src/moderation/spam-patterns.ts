import { SpamCategory } from '../types';

const SCAM_TLD = '\\.(?:com|org|net|io)';

const CRYPTO_SCAM_DOMAINS = [
  `binance-?\\w*${SCAM_TLD}`,
  `coinbase-?\\w*${SCAM_TLD}`,
  `metamask-?\\w*${SCAM_TLD}`,
  `trustwallet-?\\w*${SCAM_TLD}`,
  `airdrop-?\\w*${SCAM_TLD}`,
  `claim-?\\w*${SCAM_TLD}`,
  `free-?crypto${SCAM_TLD}`,
  `earn-?btc${SCAM_TLD}`,
];

const ADULT_DOMAINS = [
  'onlyfans\\.com',
  'pornhub\\.com',
  'xvideos\\.com',
  'chaturbate\\.com',
  'livejasmin\\.com',
  'stripchat\\.com',
];

const SOLICITATION_PATTERNS = [
  '(?:заработ|зароб)[а-яё]*\\s*(?:от|до)?\\s*\\d+',
  '(?:пассивн|легк)[а-яё]*\\s*(?:доход|заработ)',
  '(?:работа|вакансия)\\s*(?:на\\s*дому|удалённ)',
  '(?:инвест|вложи)[а-яё]*\\s*(?:от)?\\s*\\d+',
  '(?:казино|casino|slots?|рулетк)',
  '(?:ставки|betting|1xbet|fonbet)',
];

const CATEGORIES: ReadonlyArray<readonly [SpamCategory, RegExp]> = [
  ['crypto_scam', new RegExp(CRYPTO_SCAM_DOMAINS.join('|'), 'iu')],
  ['adult_content', new RegExp(ADULT_DOMAINS.join('|'), 'iu')],
  ['spam_pattern', new RegExp(SOLICITATION_PATTERNS.join('|'), 'iu')],
];

export function matchSpamPattern(text: string | null | undefined): SpamCategory | null {
  if (!text) return null;

  for (const [category, regex] of CATEGORIES) {
    if (regex.test(text)) {
      return category;
    }
  }

  return null;
}
