import { PolicySettings } from '../types';
import { PolicyStore } from './policy-store';

export class SettingsCache {
  private readonly entries = new Map<number, PolicySettings>();

  constructor(private readonly store: PolicyStore) {
    store.onChange((chatId) => this.invalidate(chatId));
  }

  get(chatId: number): PolicySettings {
    const cached = this.entries.get(chatId);
    if (cached) return cached;

    const settings = this.store.get(chatId);
    this.entries.set(chatId, settings);
    return settings;
  }

  invalidate(chatId: number): void {
    this.entries.delete(chatId);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
