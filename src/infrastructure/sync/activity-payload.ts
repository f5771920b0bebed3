import { z } from 'zod';
import type { Activity } from '../../domain/index.js';

/** Literal sent in place of identifying fields in metrics-only mode. */
export const REDACTED = 'private';

/**
 * One activity as the remote collection endpoint expects it (camelCase).
 *
 * Optional strings and zero rates are left out of the JSON.
 * Timestamps are RFC 3339 in UTC, whole seconds.
 */
export interface ActivityPayload {
  clientUUID: string;
  project?: string | undefined;
  gitRemote?: string | undefined;
  startedAt: string;
  endedAt: string;
  filename?: string | undefined;
  filetype?: string | undefined;
  linesAdded: number;
  linesRemoved: number;
  gitBranch?: string | undefined;
  actionsPerMinute?: number | undefined;
  wordsPerMinute?: number | undefined;
  editor: string;
  machine?: string | undefined;
}

export interface SyncRequestBody {
  activities: ActivityPayload[];
}

/**
 * Response of `POST /api/activities`.
 *
 * Only `success` is required; `count` and the echoed ids are informational.
 * A collector that deduplicated the whole batch answers `"activities": null`.
 */
export const syncResponseSchema = z.object({
  success: z.boolean(),
  count: z.number().int().nullish(),
  activities: z.array(z.object({ id: z.string() })).nullish(),
});

export type SyncResponse = z.infer<typeof syncResponseSchema>;

function present(value: string | null): string | undefined {
  return value === null || value === '' ? undefined : value;
}

function nonZero(value: number): number | undefined {
  return value === 0 ? undefined : value;
}

/** `2026-03-02T09:00:05Z`: sub-second precision is dropped. */
export function toWireTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Maps a buffered activity to the forwarding wire shape.
 *
 * With `metricsOnly`, project and git remote are replaced by `REDACTED`
 * and the filename is dropped, whatever the stored values are.
 */
export function toActivityPayload(activity: Activity, metricsOnly: boolean): ActivityPayload {
  return {
    clientUUID: activity.client_id,
    project: metricsOnly ? REDACTED : present(activity.project),
    gitRemote: metricsOnly ? REDACTED : present(activity.git_remote),
    startedAt: toWireTimestamp(activity.started_at),
    endedAt: toWireTimestamp(activity.ended_at),
    filename: metricsOnly ? undefined : present(activity.filename),
    filetype: present(activity.filetype),
    linesAdded: activity.lines_added,
    linesRemoved: activity.lines_removed,
    gitBranch: present(activity.git_branch),
    actionsPerMinute: nonZero(activity.actions_per_minute),
    wordsPerMinute: nonZero(activity.words_per_minute),
    editor: activity.editor,
    machine: present(activity.machine),
  };
}

export function buildSyncRequest(
  batch: readonly Activity[],
  metricsOnly: boolean,
): SyncRequestBody {
  return {
    activities: batch.map((activity) => toActivityPayload(activity, metricsOnly)),
  };
}
