import { BetterSqliteDb } from '../db/sqlite';
import { ModAction, ModActionType } from '../types';

export const MOD_LOG_CAPACITY = 1000;

interface ModActionRow {
  id: string;
  chat_id: number;
  action_type: ModActionType;
  target_user_id: number | null;
  admin_id: number | null;
  reason: string;
  auto: number;
  created_at: number;
}

function toModAction(row: ModActionRow): ModAction {
  return {
    id: row.id,
    chatId: row.chat_id,
    actionType: row.action_type,
    targetUserId: row.target_user_id,
    adminId: row.admin_id,
    reason: row.reason,
    createdAt: row.created_at,
    auto: row.auto === 1,
  };
}

export class ModerationActionsRepo {
  constructor(
    private readonly db: BetterSqliteDb,
    private readonly capacity: number = MOD_LOG_CAPACITY,
  ) {}

  append(entry: ModAction): void {
    const run = this.db.transaction((): void => {
      const { seq } = this.db.prepare(`
        SELECT COALESCE(MAX(seq), 0) + 1 AS seq
        FROM moderation_actions
        WHERE chat_id = ?
      `).get(entry.chatId) as { seq: number };

      this.db.prepare(`
        INSERT INTO moderation_actions (
          id, seq, chat_id, action_type, target_user_id, admin_id, reason, auto, created_at
        )
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        entry.id,
        seq,
        entry.chatId,
        entry.actionType,
        entry.targetUserId,
        entry.adminId,
        entry.reason,
        entry.auto ? 1 : 0,
        entry.createdAt,
      );

      this.db.prepare(`
        DELETE FROM moderation_actions
        WHERE chat_id = ? AND seq <= ?
      `).run(entry.chatId, seq - this.capacity);
    });

    run();
  }

  listNewestFirst(chatId: number, limit: number): ModAction[] {
    const rows = this.db.prepare(`
      SELECT id, chat_id, action_type, target_user_id, admin_id, reason, auto, created_at
      FROM moderation_actions
      WHERE chat_id = ?
      ORDER BY seq DESC
      LIMIT ?
    `).all(chatId, limit) as ModActionRow[];

    return rows.map(toModAction);
  }

  count(chatId: number): number {
    const row = this.db.prepare(`
      SELECT COUNT(*) AS count
      FROM moderation_actions
      WHERE chat_id = ?
    `).get(chatId) as { count: number };

    return row.count;
  }
}
