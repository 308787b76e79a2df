export const NOTICE_AUTO_DELETE_DELAY_MS = 60 * 1000;
export const BOT_MESSAGE_DELETE_POLL_INTERVAL_MS = 15 * 1000;
export const BOT_MESSAGE_DELETE_RETRY_DELAY_MS = 60 * 1000;
export const BOT_MESSAGE_DELETE_RETENTION_MS = 7 * 24 * 60 * 60 * 1000;

export function computeBotMessageDeleteAt(nowTs: number = Date.now(), delayMs: number = NOTICE_AUTO_DELETE_DELAY_MS): number {
  return nowTs + delayMs;
}

export function extractMessageId(message: unknown): string | null {
  if (!message || typeof message !== 'object' || !('body' in message)) return null;
  const { body } = message;
  if (!body || typeof body !== 'object' || !('mid' in body)) return null;
  const { mid } = body;
  return typeof mid === 'string' && mid.trim() !== '' ? mid : null;
}
