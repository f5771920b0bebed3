import { randomUUID } from 'node:crypto';
import { and, asc, count, eq, inArray, sql } from 'drizzle-orm';
import type { Database } from './client.js';
import { activities } from './schema.js';
import type { Activity, NewActivity } from '../../domain/index.js';
import { StorageFault } from '../../domain/index.js';
import type { ActivityBuffer, BufferCounts } from '../../application/activity-buffer.js';

function toStorageFault(op: string, err: unknown): StorageFault {
  if (err instanceof StorageFault) return err;
  const reason = err instanceof Error ? err.message : String(err);
  return new StorageFault(`${op}: ${reason}`, { cause: err });
}

/**
 * Inserts an activity as unconsumed.
 *
 * Generates a UUID for `client_id` when the client did not supply one.
 * Returns the AUTOINCREMENT id assigned by SQLite.
 */
export async function insertActivity(db: Database, activity: NewActivity): Promise<number> {
  const [row] = await db
    .insert(activities)
    .values({
      client_id: activity.client_id ?? randomUUID(),
      project: activity.project,
      git_remote: activity.git_remote,
      started_at: activity.started_at,
      ended_at: activity.ended_at,
      filename: activity.filename,
      filetype: activity.filetype,
      lines_added: activity.lines_added,
      lines_removed: activity.lines_removed,
      git_branch: activity.git_branch,
      actions_per_minute: activity.actions_per_minute,
      words_per_minute: activity.words_per_minute,
      editor: activity.editor,
      machine: activity.machine,
      consumed: false,
      created_at: new Date(),
    })
    .returning({ id: activities.id });

  if (!row) {
    throw new StorageFault('append activity: no id returned');
  }
  return row.id;
}

/**
 * Fetches up to `limit` unconsumed activities.
 * Ordering: oldest interval first (started_at ASC), ties by id ASC.
 */
export async function findUnconsumed(db: Database, limit: number): Promise<Activity[]> {
  return db
    .select()
    .from(activities)
    .where(eq(activities.consumed, false))
    .orderBy(asc(activities.started_at), asc(activities.id))
    .limit(limit);
}

/**
 * Flips `consumed` for exactly the given ids, or for none of them.
 *
 * The UPDATE only applies when every distinct id exists, so one statement
 * either marks the whole set or changes nothing. SQLite counts every row
 * matched by the WHERE clause as affected, already consumed ones included.
 */
export async function markActivitiesConsumed(db: Database, ids: readonly number[]): Promise<void> {
  const unique = [...new Set(ids)];
  if (unique.length === 0) return;

  const result = await db
    .update(activities)
    .set({ consumed: true })
    .where(and(
      inArray(activities.id, unique),
      sql`(select count(*) from ${activities} where ${inArray(activities.id, unique)}) = ${unique.length}`,
    ))
    .run();

  if (result.rowsAffected !== unique.length) {
    const [matched] = await db
      .select({ value: count() })
      .from(activities)
      .where(inArray(activities.id, unique));
    throw new StorageFault(
      `mark consumed: matched ${matched?.value ?? 0} of ${unique.length} activities`,
    );
  }
}

export async function countActivities(db: Database): Promise<BufferCounts> {
  const [total] = await db.select({ value: count() }).from(activities);
  const [pending] = await db
    .select({ value: count() })
    .from(activities)
    .where(eq(activities.consumed, false));

  return {
    total: total?.value ?? 0,
    unconsumed: pending?.value ?? 0,
  };
}

/**
 * SQLite-backed `ActivityBuffer`. Each operation is a single statement.
 */
export function createActivityBuffer(db: Database): ActivityBuffer {
  return {
    async append(activity) {
      try {
        return await insertActivity(db, activity);
      } catch (err: unknown) {
        throw toStorageFault('append activity', err);
      }
    },

    async unconsumed(limit) {
      try {
        return await findUnconsumed(db, limit);
      } catch (err: unknown) {
        throw toStorageFault('get unconsumed activities', err);
      }
    },

    async markConsumed(ids) {
      try {
        await markActivitiesConsumed(db, ids);
      } catch (err: unknown) {
        throw toStorageFault('mark consumed', err);
      }
    },

    async counts() {
      try {
        return await countActivities(db);
      } catch (err: unknown) {
        throw toStorageFault('count activities', err);
      }
    },
  };
}
