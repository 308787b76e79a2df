import { BetterSqliteDb } from '../db/sqlite';

export interface FloodWindowSnapshot {
  count: number;
  messageIds: string[];
}

interface FloodEventRow {
  message_id: string;
}

export class FloodWindowsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  recordAndCount(
    chatId: number,
    userId: number,
    messageId: string,
    nowTs: number,
    windowMs: number,
  ): FloodWindowSnapshot {
    const run = this.db.transaction((): FloodWindowSnapshot => {
      this.db.prepare(`
        INSERT INTO flood_events (chat_id, user_id, message_id, ts)
        VALUES (?, ?, ?, ?)
        ON CONFLICT(chat_id, user_id, message_id) DO NOTHING
      `).run(chatId, userId, messageId, nowTs);

      this.db.prepare(`
        DELETE FROM flood_events
        WHERE chat_id = ? AND user_id = ? AND ts < ?
      `).run(chatId, userId, nowTs - 2 * windowMs);

      const rows = this.db.prepare(`
        SELECT message_id
        FROM flood_events
        WHERE chat_id = ? AND user_id = ? AND ts >= ? AND ts <= ?
        ORDER BY ts ASC
      `).all(chatId, userId, nowTs - windowMs, nowTs) as FloodEventRow[];

      return {
        count: rows.length,
        messageIds: rows.map((row) => row.message_id),
      };
    });

    return run();
  }

  clear(chatId: number, userId: number): void {
    this.db.prepare('DELETE FROM flood_events WHERE chat_id = ? AND user_id = ?').run(chatId, userId);
  }

  purgeOlderThan(cutoffTs: number): void {
    this.db.prepare('DELETE FROM flood_events WHERE ts < ?').run(cutoffTs);
  }
}
