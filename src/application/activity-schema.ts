import { z } from 'zod';
import type { NewActivity } from '../domain/index.js';
import { ClientInputFault, DEFAULT_EDITOR } from '../domain/index.js';

/**
 * Zod schema for one decoded intake line.
 *
 * `type` selects the handler; `data` is only read for `activity`.
 * A null or missing `type` falls through to "unknown request type".
 */
export const requestEnvelopeSchema = z.object({
  type: z.string().nullish(),
  data: z.unknown().optional(),
});

export type RequestEnvelope = z.infer<typeof requestEnvelopeSchema>;

const text = z.string().nullish();
const lineCount = z.number().int().nullish();
const rate = z.number().nullish();

/**
 * Intake `activity` payload (snake_case, as editor plugins send it).
 *
 * Only field types are enforced here. `started_at` / `ended_at` are
 * checked separately so each gets its own error message; their relative
 * order is not checked.
 */
export const activityDataSchema = z.object({
  client_id: z.string().uuid().nullish(),
  project: text,
  git_remote: text,
  started_at: text,
  ended_at: text,
  filename: text,
  filetype: text,
  lines_added: lineCount,
  lines_removed: lineCount,
  git_branch: text,
  actions_per_minute: rate,
  words_per_minute: rate,
  editor: text,
});

export type ActivityData = z.infer<typeof activityDataSchema>;

/** RFC 3339: `Z` or a numeric offset, fractional seconds allowed. */
export const wireTimestampSchema = z.string().datetime({ offset: true });

export type ActivityParseResult =
  | { success: true; activity: NewActivity }
  | { success: false; fault: ClientInputFault };

function parseTimestamp(raw: string | null | undefined): Date | null {
  const parsed = wireTimestampSchema.safeParse(raw);
  if (!parsed.success) return null;
  const date = new Date(parsed.data);
  return Number.isNaN(date.getTime()) ? null : date;
}

function blankToNull(value: string | null | undefined): string | null {
  return value === undefined || value === null || value === '' ? null : value;
}

/**
 * Translates an intake payload into an activity ready for the buffer.
 *
 * `machine` always comes from the daemon's own configuration; whatever
 * the client sent is ignored. Returns a discriminated result so the
 * caller decides how to surface the fault.
 */
export function parseActivity(data: unknown, machine: string): ActivityParseResult {
  const parsed = activityDataSchema.safeParse(data);
  if (!parsed.success) {
    return { success: false, fault: new ClientInputFault('invalid activity data') };
  }

  const input = parsed.data;

  const startedAt = parseTimestamp(input.started_at);
  if (startedAt === null) {
    return { success: false, fault: new ClientInputFault('invalid started_at') };
  }

  const endedAt = parseTimestamp(input.ended_at);
  if (endedAt === null) {
    return { success: false, fault: new ClientInputFault('invalid ended_at') };
  }

  const editor = input.editor ? input.editor : DEFAULT_EDITOR;

  return {
    success: true,
    activity: {
      client_id: input.client_id ?? undefined,
      project: blankToNull(input.project),
      git_remote: blankToNull(input.git_remote),
      started_at: startedAt,
      ended_at: endedAt,
      filename: blankToNull(input.filename),
      filetype: blankToNull(input.filetype),
      lines_added: input.lines_added ?? 0,
      lines_removed: input.lines_removed ?? 0,
      git_branch: blankToNull(input.git_branch),
      actions_per_minute: input.actions_per_minute ?? 0,
      words_per_minute: input.words_per_minute ?? 0,
      editor,
      machine,
    },
  };
}
