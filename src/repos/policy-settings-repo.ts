import { BetterSqliteDb } from '../db/sqlite';

interface PolicySettingsRow {
  settings_json: string;
}

export class PolicySettingsRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  findJson(chatId: number): string | null {
    const row = this.db.prepare(`
      SELECT settings_json
      FROM policy_settings
      WHERE chat_id = ?
    `).get(chatId) as PolicySettingsRow | undefined;

    return row?.settings_json ?? null;
  }

  replace(chatId: number, settingsJson: string, nowTs: number = Date.now()): void {
    this.db.prepare(`
      INSERT INTO policy_settings (chat_id, settings_json, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(chat_id)
      DO UPDATE SET
        settings_json = excluded.settings_json,
        updated_at = excluded.updated_at
    `).run(chatId, settingsJson, nowTs);
  }

  remove(chatId: number): boolean {
    const result = this.db.prepare('DELETE FROM policy_settings WHERE chat_id = ?').run(chatId);
    return result.changes > 0;
  }
}
