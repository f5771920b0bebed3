export {
  requestEnvelopeSchema,
  activityDataSchema,
  wireTimestampSchema,
  parseActivity,
} from './activity-schema.js';
export type { RequestEnvelope, ActivityData, ActivityParseResult } from './activity-schema.js';
export { SyncRateLimiter, SYNC_RATE_LIMIT, SYNC_RATE_WINDOW_MS } from './sync-rate-limiter.js';
export type { SyncRateLimiterOptions } from './sync-rate-limiter.js';
export type { ActivityBuffer, BufferCounts } from './activity-buffer.js';
