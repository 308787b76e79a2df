import { BetterSqliteDb } from '../db/sqlite';

interface JoinRecordRow {
  joined_at: number;
}

export class JoinRecordsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  upsert(chatId: number, userId: number, joinedAt: number, ttlMs: number): void {
    this.db.prepare(`
      INSERT INTO join_records (chat_id, user_id, joined_at, expires_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(chat_id, user_id)
      DO UPDATE SET
        joined_at = excluded.joined_at,
        expires_at = excluded.expires_at
    `).run(chatId, userId, joinedAt, joinedAt + ttlMs);
  }

  getJoinedAt(chatId: number, userId: number, nowTs: number): number | null {
    const row = this.db.prepare(`
      SELECT joined_at
      FROM join_records
      WHERE chat_id = ? AND user_id = ? AND expires_at > ?
    `).get(chatId, userId, nowTs) as JoinRecordRow | undefined;

    return row?.joined_at ?? null;
  }

  purgeExpired(nowTs: number): void {
    this.db.prepare('DELETE FROM join_records WHERE expires_at <= ?').run(nowTs);
  }
}
