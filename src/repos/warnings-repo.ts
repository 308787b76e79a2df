import { BetterSqliteDb } from '../db/sqlite';
import { Warning } from '../types';

interface WarningRow {
  id: string;
  chat_id: number;
  user_id: number;
  admin_id: number | null;
  reason: string;
  created_at: number;
}

function toWarning(row: WarningRow): Warning {
  return {
    id: row.id,
    chatId: row.chat_id,
    userId: row.user_id,
    adminId: row.admin_id,
    reason: row.reason,
    createdAt: row.created_at,
  };
}

export class WarningsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  addAndCount(warning: Warning): number {
    const run = this.db.transaction((): number => {
      this.db.prepare(`
        INSERT INTO warnings (id, chat_id, user_id, admin_id, reason, created_at)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(
        warning.id,
        warning.chatId,
        warning.userId,
        warning.adminId,
        warning.reason,
        warning.createdAt,
      );

      return this.count(warning.chatId, warning.userId);
    });

    return run();
  }

  count(chatId: number, userId: number): number {
    const row = this.db.prepare(`
      SELECT COUNT(*) AS count
      FROM warnings
      WHERE chat_id = ? AND user_id = ?
    `).get(chatId, userId) as { count: number };

    return row.count;
  }

  listNewestFirst(chatId: number, userId: number): Warning[] {
    const rows = this.db.prepare(`
      SELECT id, chat_id, user_id, admin_id, reason, created_at
      FROM warnings
      WHERE chat_id = ? AND user_id = ?
      ORDER BY created_at DESC, rowid DESC
    `).all(chatId, userId) as WarningRow[];

    return rows.map(toWarning);
  }

  clear(chatId: number, userId: number): number {
    const result = this.db.prepare('DELETE FROM warnings WHERE chat_id = ? AND user_id = ?').run(chatId, userId);
    return result.changes;
  }
}
