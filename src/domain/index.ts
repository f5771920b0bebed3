export type { Activity, NewActivity } from './activity.js';
export { DEFAULT_EDITOR } from './activity.js';
export {
  ClientInputFault,
  StorageFault,
  TransientFault,
  RateLimited,
  NoCredential,
  formatDuration,
} from './errors.js';
