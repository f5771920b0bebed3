import { createClient } from '@libsql/client';
import { drizzle } from 'drizzle-orm/libsql';
import * as schema from './schema.js';

function toUrl(dbPath: string): string {
  return dbPath === ':memory:' ? dbPath : `file:${dbPath}`;
}

/**
 * Creates a Drizzle client backed by a local libSQL (SQLite) file.
 *
 * Returns both the raw `sqlite` handle (for lifecycle management and
 * schema bootstrap) and the typed `db` instance (for queries).
 * Pass `':memory:'` for a throwaway database.
 */
export function createDbClient(dbPath: string) {
  const sqlite = createClient({ url: toUrl(dbPath) });
  const db = drizzle(sqlite, { schema });

  return { sqlite, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type SqliteHandle = ReturnType<typeof createDbClient>['sqlite'];
