import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { NewActivity } from '../src/domain/index.js';
import type { ActivityBuffer } from '../src/application/activity-buffer.js';
import { createActivityBuffer, createDbClient, ensureSchema } from '../src/infrastructure/db/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger;
}

let counter = 0;

/** Fixed base instant for deterministic ordering. */
export const BASE_TIME = new Date('2026-03-02T09:00:00Z').getTime();

/**
 * Factory for intake-ready activities with sensible defaults.
 * Timestamps advance by one minute per call unless overridden.
 */
export function makeActivity(overrides: Partial<NewActivity> = {}): NewActivity {
  counter++;
  const startedAt = overrides.started_at ?? new Date(BASE_TIME + counter * 60_000);
  return {
    client_id: overrides.client_id,
    project: overrides.project ?? 'relay',
    git_remote: overrides.git_remote ?? 'git@example.com:team/relay.git',
    started_at: startedAt,
    ended_at: overrides.ended_at ?? new Date(startedAt.getTime() + 30_000),
    filename: overrides.filename ?? 'src/index.ts',
    filetype: overrides.filetype ?? 'typescript',
    lines_added: overrides.lines_added ?? 3,
    lines_removed: overrides.lines_removed ?? 1,
    git_branch: overrides.git_branch ?? 'main',
    actions_per_minute: overrides.actions_per_minute ?? 42.5,
    words_per_minute: overrides.words_per_minute ?? 61,
    editor: overrides.editor ?? 'neovim',
    machine: overrides.machine ?? 'test-machine',
  };
}

/** In-memory SQLite buffer; `close()` releases the handle. */
export async function createTestBuffer(): Promise<{ buffer: ActivityBuffer; close: () => void }> {
  const { sqlite, db } = createDbClient(':memory:');
  await ensureSchema(sqlite);
  return {
    buffer: createActivityBuffer(db),
    close: () => sqlite.close(),
  };
}

/** Response body the collection endpoint returns on success. */
export function acceptedResponse(count: number): Response {
  return new Response(
    JSON.stringify({
      success: true,
      count,
      activities: Array.from({ length: count }, (_, i) => ({ id: `remote-${i + 1}` })),
    }),
    { status: 200, headers: { 'Content-Type': 'application/json' } },
  );
}

/** Parses the JSON body a mocked fetch was called with. */
export function sentBody(call: unknown[]): { activities: Array<Record<string, unknown>> } {
  const init = call[1];
  if (typeof init !== 'object' || init === null || !('body' in init)) {
    throw new Error('fetch was called without a request body');
  }
  return JSON.parse(String(init.body)) as { activities: Array<Record<string, unknown>> };
}
