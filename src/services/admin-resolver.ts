import { errorMessage } from '../errors';
import { ChatTransport } from '../transport/chat-transport';
import { MemberStatus } from '../types';

interface CacheItem {
  isAdmin: boolean;
  expiresAt: number;
}

// A failed lookup is cached briefly so a flaky API is not hammered.
const FAILURE_CACHE_MAX_MS = 20_000;

export type AdminResolverWarn = (message: string, meta?: Record<string, unknown>) => void;

export function isAdminStatus(status: MemberStatus): boolean {
  return status === 'owner' || status === 'admin';
}

export class AdminResolver {
  private readonly cache = new Map<string, CacheItem>();
  private lastPruneAt = 0;

  constructor(
    private readonly transport: ChatTransport,
    private readonly ttlMs: number = 60_000,
    private readonly superadminId?: number,
    private readonly onWarn?: AdminResolverWarn,
  ) {}

  async isAdmin(chatId: number, userId: number, now: number = Date.now()): Promise<boolean> {
    if (this.superadminId !== undefined && userId === this.superadminId) {
      return true;
    }

    this.pruneExpired(now);

    const key = `${chatId}:${userId}`;
    const cached = this.cache.get(key);

    if (cached) {
      if (cached.expiresAt > now) {
        return cached.isAdmin;
      }
      this.cache.delete(key);
    }

    try {
      const status = await this.transport.getMemberStatus(chatId, userId);
      const isAdmin = isAdminStatus(status);
      this.cache.set(key, { isAdmin, expiresAt: now + this.ttlMs });
      return isAdmin;
    } catch (error) {
      this.onWarn?.('getMemberStatus failed in AdminResolver', {
        chatId,
        userId,
        error: errorMessage(error),
      });
      this.cache.set(key, { isAdmin: false, expiresAt: now + Math.min(this.ttlMs, FAILURE_CACHE_MAX_MS) });
      return false;
    }
  }

  get size(): number {
    return this.cache.size;
  }

  pruneExpired(now: number = Date.now()): void {
    if (now - this.lastPruneAt < this.ttlMs) return;
    this.lastPruneAt = now;

    for (const [key, item] of this.cache.entries()) {
      if (item.expiresAt <= now) {
        this.cache.delete(key);
      }
    }
  }

  invalidate(chatId: number, userId?: number): void {
    if (userId !== undefined) {
      this.cache.delete(`${chatId}:${userId}`);
      return;
    }

    const prefix = `${chatId}:`;
    for (const key of this.cache.keys()) {
      if (key.startsWith(prefix)) {
        this.cache.delete(key);
      }
    }
  }
}
