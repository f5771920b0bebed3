export {
  activities,
  createDbClient,
  ensureSchema,
  createActivityBuffer,
  insertActivity,
  findUnconsumed,
  markActivitiesConsumed,
  countActivities,
} from './db/index.js';
export type { Database, SqliteHandle, ActivityRow } from './db/index.js';
export { SyncEngine, toActivityPayload, buildSyncRequest, REDACTED } from './sync/index.js';
export type { SyncEngineOptions, ActivityPayload, SyncRequestBody } from './sync/index.js';
export { loadConfig } from './config/index.js';
export type { RelayConfig } from './config/index.js';
