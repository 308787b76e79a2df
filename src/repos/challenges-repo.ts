import { BetterSqliteDb } from '../db/sqlite';
import { Challenge } from '../types';

interface ChallengeRow {
  chat_id: number;
  user_id: number;
  id: string;
  question: string;
  answer: string;
  options_json: string;
  message_id: string | null;
  challenge_expires_at: number;
  created_at: number;
}

function parseOptions(json: string): number[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((value): value is number => typeof value === 'number');
}

function toChallenge(row: ChallengeRow): Challenge {
  return {
    id: row.id,
    chatId: row.chat_id,
    userId: row.user_id,
    question: row.question,
    answer: row.answer,
    options: parseOptions(row.options_json),
    expiresAt: row.challenge_expires_at,
    messageId: row.message_id,
    state: 'issued',
    createdAt: row.created_at,
  };
}

export class ChallengesRepo {
  constructor(private readonly db: BetterSqliteDb) {}

  put(challenge: Challenge, storeExpiresAt: number): void {
    this.db.prepare(`
      INSERT INTO challenges (
        chat_id, user_id, id, question, answer, options_json, message_id, state,
        challenge_expires_at, expires_at, created_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(chat_id, user_id)
      DO UPDATE SET
        id = excluded.id,
        question = excluded.question,
        answer = excluded.answer,
        options_json = excluded.options_json,
        message_id = excluded.message_id,
        state = excluded.state,
        challenge_expires_at = excluded.challenge_expires_at,
        expires_at = excluded.expires_at,
        created_at = excluded.created_at
    `).run(
      challenge.chatId,
      challenge.userId,
      challenge.id,
      challenge.question,
      challenge.answer,
      JSON.stringify(challenge.options),
      challenge.messageId,
      challenge.state,
      challenge.expiresAt,
      storeExpiresAt,
      challenge.createdAt,
    );
  }

  get(chatId: number, userId: number, nowTs: number): Challenge | null {
    const row = this.db.prepare(`
      SELECT chat_id, user_id, id, question, answer, options_json, message_id, challenge_expires_at, created_at
      FROM challenges
      WHERE chat_id = ? AND user_id = ? AND expires_at > ?
    `).get(chatId, userId, nowTs) as ChallengeRow | undefined;

    return row ? toChallenge(row) : null;
  }

  setMessageId(chatId: number, userId: number, challengeId: string, messageId: string): void {
    this.db.prepare(`
      UPDATE challenges
      SET message_id = ?
      WHERE chat_id = ? AND user_id = ? AND id = ?
    `).run(messageId, chatId, userId, challengeId);
  }

  listLive(nowTs: number): Challenge[] {
    const rows = this.db.prepare(`
      SELECT chat_id, user_id, id, question, answer, options_json, message_id, challenge_expires_at, created_at
      FROM challenges
      WHERE expires_at > ?
      ORDER BY challenge_expires_at ASC
    `).all(nowTs) as ChallengeRow[];

    return rows.map(toChallenge);
  }

  remove(chatId: number, userId: number, challengeId?: string): boolean {
    const result = challengeId === undefined
      ? this.db.prepare('DELETE FROM challenges WHERE chat_id = ? AND user_id = ?').run(chatId, userId)
      : this.db.prepare('DELETE FROM challenges WHERE chat_id = ? AND user_id = ? AND id = ?').run(chatId, userId, challengeId);
    return result.changes > 0;
  }

  purgeExpired(nowTs: number): void {
    this.db.prepare('DELETE FROM challenges WHERE expires_at <= ?').run(nowTs);
  }
}
