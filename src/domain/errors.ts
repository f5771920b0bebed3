/**
 * Fault taxonomy shared by intake and forwarding.
 *
 * Each fault is contained at a fixed boundary: client input and storage
 * faults at the request, transient faults inside the drain loop.
 */

/** Malformed intake message or unparseable required field. */
export class ClientInputFault extends Error {
  override readonly name = 'ClientInputFault';
}

/** Durable buffer I/O or constraint failure. */
export class StorageFault extends Error {
  override readonly name = 'StorageFault';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Any forwarding failure. Always retried via backoff. */
export class TransientFault extends Error {
  override readonly name = 'TransientFault';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Manual sync refused by the sliding-window quota. */
export class RateLimited extends Error {
  override readonly name = 'RateLimited';
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super(`rate limited: try again in ${formatDuration(retryAfterMs)}`);
    this.retryAfterMs = retryAfterMs;
  }
}

/** Forwarding requested without a configured API token. */
export class NoCredential extends Error {
  override readonly name = 'NoCredential';

  constructor() {
    super('no API token configured');
  }
}

/**
 * Formats a duration rounded to whole seconds: `45s`, `9m59s`, `1h0m0s`.
 */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.round(ms / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;

  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}
