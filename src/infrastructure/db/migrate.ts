import type { SqliteHandle } from './client.js';

/**
 * Sets connection pragmas and ensures the buffer table and its indexes exist.
 *
 * Lightweight bootstrap via raw SQL. Versioned migrations belong to
 * drizzle-kit (see drizzle.config.ts); this only guarantees the table is
 * present on first run. Must stay in step with schema.ts.
 */
export async function ensureSchema(sqlite: SqliteHandle): Promise<void> {
  // WAL lets external readers inspect the buffer while the daemon writes
  await sqlite.execute('PRAGMA journal_mode = WAL');
  await sqlite.execute('PRAGMA busy_timeout = 5000');

  await sqlite.executeMultiple(`
    CREATE TABLE IF NOT EXISTS activities (
      id                 INTEGER PRIMARY KEY AUTOINCREMENT,
      client_id          TEXT    NOT NULL,
      project            TEXT,
      git_remote         TEXT,
      started_at         INTEGER NOT NULL,
      ended_at           INTEGER NOT NULL,
      filename           TEXT,
      filetype           TEXT,
      lines_added        INTEGER NOT NULL DEFAULT 0,
      lines_removed      INTEGER NOT NULL DEFAULT 0,
      git_branch         TEXT,
      actions_per_minute REAL    NOT NULL DEFAULT 0,
      words_per_minute   REAL    NOT NULL DEFAULT 0,
      editor             TEXT    NOT NULL DEFAULT 'neovim',
      machine            TEXT    NOT NULL,
      consumed           INTEGER NOT NULL DEFAULT 0,
      created_at         INTEGER NOT NULL
    );
    CREATE UNIQUE INDEX IF NOT EXISTS idx_activities_client_id ON activities (client_id);
    CREATE INDEX IF NOT EXISTS idx_activities_consumed ON activities (consumed);
    CREATE INDEX IF NOT EXISTS idx_activities_started_at ON activities (started_at);
  `);
}
