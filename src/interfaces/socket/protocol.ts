/**
 * Wire types for the local intake protocol.
 *
 * One JSON object per line in each direction. Requests are
 * `{"type": ..., "data": ...}`; see activity-schema.ts for validation.
 */

export type IntakeRequestType = 'activity' | 'ping' | 'sync';

export interface IntakeResponse {
  ok: boolean;
  error?: string;
  message?: string;
}

export const OK: IntakeResponse = { ok: true };

export function success(message: string): IntakeResponse {
  return { ok: true, message };
}

export function failure(error: string): IntakeResponse {
  return { ok: false, error };
}

/** Serializes a response as one line; empty `error`/`message` are omitted. */
export function encodeResponse(response: IntakeResponse): string {
  const out: IntakeResponse = { ok: response.ok };
  if (response.error) out.error = response.error;
  if (response.message) out.message = response.message;
  return JSON.stringify(out) + '\n';
}
