import { z } from 'zod';
import { ChatUser } from '../types';

export const incomingSenderSchema = z.object({
  user_id: z.number().int(),
  is_bot: z.boolean().optional(),
  name: z.string().optional(),
  username: z.string().nullish(),
});

const incomingBodySchema = z.object({
  mid: z.string().min(1),
  text: z.string().nullish(),
  attachments: z.array(z.unknown()).nullish(),
  markup: z.array(z.unknown()).nullish(),
});

const incomingLinkSchema = z.object({
  type: z.string().optional(),
  sender: incomingSenderSchema.nullish(),
  chat_id: z.number().optional(),
  message: incomingBodySchema.partial().nullish(),
});

export const incomingMessageSchema = z.object({
  sender: incomingSenderSchema.nullish(),
  recipient: z.object({
    chat_id: z.number().int().nullish(),
    chat_type: z.enum(['dialog', 'chat', 'channel']),
  }),
  body: incomingBodySchema,
  link: incomingLinkSchema.nullish(),
  url: z.string().nullish(),
});

export const incomingCallbackSchema = z.object({
  callback_id: z.string().min(1),
  payload: z.string().optional(),
  user: incomingSenderSchema,
  message: z.object({ body: z.object({ mid: z.string() }) }).nullish(),
});

export type IncomingSender = z.infer<typeof incomingSenderSchema>;
export type IncomingMessage = z.infer<typeof incomingMessageSchema>;
export type IncomingCallback = z.infer<typeof incomingCallbackSchema>;

export interface UpdateContext {
  message?: unknown;
  callback?: unknown;
  user?: unknown;
  chatId?: unknown;
  myId?: unknown;
}

export function readMessage(value: unknown): IncomingMessage | null {
  const result = incomingMessageSchema.safeParse(value);
  return result.success ? result.data : null;
}

export function readCallback(value: unknown): IncomingCallback | null {
  const result = incomingCallbackSchema.safeParse(value);
  return result.success ? result.data : null;
}

export function readSender(value: unknown): IncomingSender | null {
  const result = incomingSenderSchema.safeParse(value);
  return result.success ? result.data : null;
}

export function readNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function toChatUser(sender: IncomingSender): ChatUser {
  return {
    userId: sender.user_id,
    name: sender.name,
    username: sender.username ?? undefined,
    isBot: sender.is_bot === true,
  };
}
