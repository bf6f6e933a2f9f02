import { z } from 'zod';

import type { UsageRecord } from './model';

// Upstream omits zero counters and empty sections, and sometimes sends null
// for them; both decode to the zero value.
const count = z
  .number()
  .int()
  .nullish()
  .transform((value) => value ?? 0);

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

function list<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .nullish()
    .transform((value): z.output<T>[] => value ?? []);
}

function section<T extends z.ZodTypeAny>(shape: T) {
  return z.preprocess((value) => value ?? {}, shape);
}

export const BreakdownEntrySchema = z.object({
  language: text,
  editor: text,
  model: text,
  suggestions_count: count,
  acceptances_count: count,
  lines_suggested: count,
  lines_accepted: count,
  active_users: count,
  chat_acceptances: count,
  chat_turns: count,
  active_chat_users: count,
});

export const RepositoryEntrySchema = z.object({
  name: text,
  total_engaged_users: count,
  models: list(BreakdownEntrySchema),
});

export const UsageRecordSchema = z.object({
  day: text,
  total_suggestions_count: count,
  total_acceptances_count: count,
  total_lines_suggested: count,
  total_lines_accepted: count,
  total_active_users: count,
  total_chat_acceptances: count,
  total_chat_turns: count,
  total_active_chat_users: count,
  breakdown: list(BreakdownEntrySchema),
  copilot_ide_code_completions: section(
    z.object({
      total_engaged_users: count,
      languages: list(BreakdownEntrySchema),
      editors: list(BreakdownEntrySchema),
      models: list(BreakdownEntrySchema),
    }),
  ),
  copilot_ide_chat: section(
    z.object({
      total_engaged_users: count,
      editors: list(BreakdownEntrySchema),
      models: list(BreakdownEntrySchema),
    }),
  ),
  copilot_dotcom_chat: section(
    z.object({
      total_engaged_users: count,
      models: list(BreakdownEntrySchema),
    }),
  ),
  copilot_dotcom_pull_requests: section(
    z.object({
      total_engaged_users: count,
      repositories: list(RepositoryEntrySchema),
      models: list(BreakdownEntrySchema),
    }),
  ),
});

export const UsageResponseSchema: z.ZodType<UsageRecord[], z.ZodTypeDef, unknown> = z
  .array(UsageRecordSchema)
  .nullable()
  .transform((records) => records ?? []);

export type DecodeResult =
  | { success: true; records: UsageRecord[] }
  | { success: false; issues: string[] };

export function decodeUsageResponse(payload: unknown): DecodeResult {
  const parsed = UsageResponseSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`),
    };
  }
  return { success: true, records: parsed.data };
}
