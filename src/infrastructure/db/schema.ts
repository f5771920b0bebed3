import { sqliteTable, integer, text, real, index, uniqueIndex } from 'drizzle-orm/sqlite-core';
import { DEFAULT_EDITOR } from '../../domain/index.js';

/**
 * Drizzle schema for the `activities` table, the durable buffer.
 *
 * `id` is an AUTOINCREMENT rowid, so identities are monotonic and never
 * reused even after rows are deleted by external tooling.
 * `client_id` is the idempotency token forwarded to the remote endpoint.
 * Timestamps are stored as epoch milliseconds so ORDER BY is numeric.
 */
export const activities = sqliteTable('activities', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  client_id: text('client_id').notNull(),
  project: text('project'),
  git_remote: text('git_remote'),
  started_at: integer('started_at', { mode: 'timestamp_ms' }).notNull(),
  ended_at: integer('ended_at', { mode: 'timestamp_ms' }).notNull(),
  filename: text('filename'),
  filetype: text('filetype'),
  lines_added: integer('lines_added').notNull().default(0),
  lines_removed: integer('lines_removed').notNull().default(0),
  git_branch: text('git_branch'),
  actions_per_minute: real('actions_per_minute').notNull().default(0),
  words_per_minute: real('words_per_minute').notNull().default(0),
  editor: text('editor').notNull().default(DEFAULT_EDITOR),
  machine: text('machine').notNull(),
  consumed: integer('consumed', { mode: 'boolean' }).notNull().default(false),
  created_at: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
}, (table) => [
  uniqueIndex('idx_activities_client_id').on(table.client_id),
  index('idx_activities_consumed').on(table.consumed),
  index('idx_activities_started_at').on(table.started_at),
]);

/** Row shape returned by activity queries. */
export type ActivityRow = typeof activities.$inferSelect;
