import { BetterSqliteDb } from '../db/sqlite';

export class WelcomeMarksRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  tryMark(chatId: number, userId: number, nowTs: number, ttlMs: number): boolean {
    const run = this.db.transaction((): boolean => {
      this.db.prepare(`
        DELETE FROM welcome_marks
        WHERE chat_id = ? AND user_id = ? AND expires_at <= ?
      `).run(chatId, userId, nowTs);

      const result = this.db.prepare(`
        INSERT INTO welcome_marks (chat_id, user_id, expires_at)
        VALUES (?, ?, ?)
        ON CONFLICT(chat_id, user_id) DO NOTHING
      `).run(chatId, userId, nowTs + ttlMs);

      return result.changes > 0;
    });

    return run();
  }

  purgeExpired(nowTs: number): void {
    this.db.prepare('DELETE FROM welcome_marks WHERE expires_at <= ?').run(nowTs);
  }
}
