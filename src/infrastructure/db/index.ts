export { activities } from './schema.js';
export type { ActivityRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqliteHandle } from './client.js';
export { ensureSchema } from './migrate.js';
export {
  insertActivity,
  findUnconsumed,
  markActivitiesConsumed,
  countActivities,
  createActivityBuffer,
} from './activity-repository.js';
