import { PolicyStore } from '../policy/policy-store';
import { FILTER_WORD_MAX_LENGTH, FILTER_WORDS_LIMIT } from '../policy/policy-settings';
import { PolicySettings } from '../types';

export interface FilterCheck {
  filtered: boolean;
  matchedWord?: string;
}

export type AddWordResult = 'added' | 'duplicate' | 'too_long' | 'limit_reached' | 'empty';

interface CompiledWord {
  word: string;
  regex: RegExp;
}

interface CompiledList {
  signature: string;
  words: CompiledWord[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compileWord(word: string): RegExp {
  return new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(word)}(?![\\p{L}\\p{N}])`, 'iu');
}

export function normalizeFilterWord(word: string): string {
  return word.trim().toLowerCase();
}

export class ContentFilter {
  private readonly compiled = new Map<number, CompiledList>();

  constructor(private readonly store: PolicyStore) {
    store.onChange((chatId) => this.invalidate(chatId));
  }

  check(settings: PolicySettings, text: string | null | undefined): FilterCheck {
    if (!text || settings.filterWords.length === 0) {
      return { filtered: false };
    }

    for (const { word, regex } of this.getCompiled(settings)) {
      if (regex.test(text)) {
        return { filtered: true, matchedWord: word };
      }
    }

    return { filtered: false };
  }

  addWord(settings: PolicySettings, rawWord: string): AddWordResult {
    const word = normalizeFilterWord(rawWord);
    if (!word) return 'empty';
    if (word.length > FILTER_WORD_MAX_LENGTH) return 'too_long';
    if (settings.filterWords.includes(word)) return 'duplicate';
    if (settings.filterWords.length >= FILTER_WORDS_LIMIT) return 'limit_reached';

    this.store.update(settings.chatId, { filterWords: [...settings.filterWords, word] });
    return 'added';
  }

  removeWord(settings: PolicySettings, rawWord: string): boolean {
    const word = normalizeFilterWord(rawWord);
    if (!settings.filterWords.includes(word)) {
      return false;
    }

    this.store.update(settings.chatId, {
      filterWords: settings.filterWords.filter((item) => item !== word),
    });
    return true;
  }

  listWords(settings: PolicySettings): string[] {
    return [...settings.filterWords];
  }

  clearWords(settings: PolicySettings): number {
    const count = settings.filterWords.length;
    if (count > 0) {
      this.store.update(settings.chatId, { filterWords: [] });
    }
    return count;
  }

  invalidate(chatId: number): void {
    this.compiled.delete(chatId);
  }

  private getCompiled(settings: PolicySettings): CompiledWord[] {
    const signature = settings.filterWords.join('\u0000');
    const cached = this.compiled.get(settings.chatId);
    if (cached && cached.signature === signature) {
      return cached.words;
    }

    const words = settings.filterWords.map((word) => ({ word, regex: compileWord(word) }));
    this.compiled.set(settings.chatId, { signature, words });
    return words;
  }
}
