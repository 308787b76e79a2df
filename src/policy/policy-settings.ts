import { z } from 'zod';
import { PolicySettings, Violation } from '../types';

export const DEFAULT_WELCOME_MESSAGE = 'Добро пожаловать, {username}!';

export const FILTER_WORD_MAX_LENGTH = 100;
export const FILTER_WORDS_LIMIT = 500;
export const LINK_WHITELIST_LIMIT = 200;

const int = (min: number, max: number) => z.number().int().min(min).max(max);

const dedupe = (values: string[]): string[] => [...new Set(values)];

export const policyFieldsSchema = z.object({
  welcomeEnabled: z.boolean().default(false),
  welcomeMessage: z.string().trim().min(1).max(1000).default(DEFAULT_WELCOME_MESSAGE),
  welcomeDelaySec: int(0, 30).default(0),
  welcomeAutoDeleteSec: int(0, 3600).default(0),
  welcomePrivate: z.boolean().default(false),
  spamEnabled: z.boolean().default(true),
  spamMessageLimit: int(1, 20).default(5),
  spamTimeWindowSec: int(5, 60).default(10),
  spamMuteDurationMin: int(1, 1440).default(5),
  linkFilterEnabled: z.boolean().default(false),
  linkNewbieHours: int(0, 168).default(24),
  linkAction: z.enum(['delete', 'warn', 'hold']).default('hold'),
  linkWhitelist: z
    .array(z.string().trim().toLowerCase().min(1).max(253))
    .max(LINK_WHITELIST_LIMIT)
    .transform(dedupe)
    .default([]),
  warnMuteThreshold: int(1, 10).default(3),
  warnBanThreshold: int(1, 20).default(5),
  warnMuteDurationHours: int(1, 720).default(24),
  captchaEnabled: z.boolean().default(false),
  captchaTimeoutSec: int(30, 600).default(120),
  captchaDifficulty: z.enum(['easy', 'medium', 'hard']).default('easy'),
  captchaFailAction: z.enum(['kick', 'mute']).default('kick'),
  filterWords: z
    .array(z.string().trim().toLowerCase().min(1).max(FILTER_WORD_MAX_LENGTH))
    .max(FILTER_WORDS_LIMIT)
    .transform(dedupe)
    .default([]),
  filterNotifyUser: z.boolean().default(true),
  auditSinkChatId: z.number().int().nullable().default(null),
}).strict();

type PolicyFields = z.output<typeof policyFieldsSchema>;

function checkThresholdOrder(
  value: { warnMuteThreshold: number; warnBanThreshold: number },
  ctx: z.RefinementCtx,
): void {
  if (value.warnMuteThreshold >= value.warnBanThreshold) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['warnBanThreshold'],
      message: 'must be greater than warnMuteThreshold',
    });
  }
}

const policySettingsSchema = policyFieldsSchema
  .extend({ chatId: z.number().int() })
  .superRefine(checkThresholdOrder);

const importedFieldsSchema = policyFieldsSchema.superRefine(checkThresholdOrder);

export type PolicyPatch = Partial<Omit<PolicySettings, 'chatId'>>;

export function defaultPolicySettings(chatId: number): PolicySettings {
  const defaults: PolicyFields = policyFieldsSchema.parse({});
  return { chatId, ...defaults };
}

export function toViolations(error: z.ZodError): Violation[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join('.') : '$',
    message: issue.message,
  }));
}

export function validatePolicySettings(settings: PolicySettings): Violation[] {
  const result = policySettingsSchema.safeParse(settings);
  return result.success ? [] : toViolations(result.error);
}

export type ParseOutcome =
  | { ok: true; settings: PolicySettings }
  | { ok: false; violations: Violation[] };

export function parsePolicySettings(input: unknown): ParseOutcome {
  const result = policySettingsSchema.safeParse(input);
  if (!result.success) {
    return { ok: false, violations: toViolations(result.error) };
  }

  const settings: PolicySettings = result.data;
  return { ok: true, settings };
}

export function parseImportedSettings(chatId: number, payload: unknown): ParseOutcome {
  if (!payload || typeof payload !== 'object' || Array.isArray(payload)) {
    return { ok: false, violations: [{ field: '$', message: 'settings payload must be a JSON object' }] };
  }

  const fields = Object.fromEntries(
    Object.entries(payload).filter(([key]) => key !== 'chatId'),
  );

  const result = importedFieldsSchema.safeParse(fields);
  if (!result.success) {
    return { ok: false, violations: toViolations(result.error) };
  }

  const parsed: PolicyFields = result.data;
  return { ok: true, settings: { chatId, ...parsed } };
}

export function exportablePolicySettings(settings: PolicySettings): Omit<PolicySettings, 'chatId'> {
  const { chatId: _chatId, ...fields } = settings;
  return fields;
}
