export {
  SyncEngine,
  nextBackoff,
  DEFAULT_MIN_BACKOFF_MS,
  DEFAULT_MAX_BACKOFF_MS,
} from './sync-engine.js';
export type { SyncEngineOptions } from './sync-engine.js';
export {
  REDACTED,
  syncResponseSchema,
  toActivityPayload,
  toWireTimestamp,
  buildSyncRequest,
} from './activity-payload.js';
export type { ActivityPayload, SyncRequestBody, SyncResponse } from './activity-payload.js';
