export { IntakeServer } from './intake-server.js';
export type { IntakeServerOptions, SyncHandler } from './intake-server.js';
export { encodeResponse, failure, success, OK } from './protocol.js';
export type { IntakeRequestType, IntakeResponse } from './protocol.js';
