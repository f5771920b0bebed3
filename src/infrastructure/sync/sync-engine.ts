import type { Logger } from 'pino';
import type { Activity } from '../../domain/index.js';
import { NoCredential, TransientFault } from '../../domain/index.js';
import type { ActivityBuffer } from '../../application/activity-buffer.js';
import { buildSyncRequest, syncResponseSchema } from './activity-payload.js';

export const DEFAULT_MIN_BACKOFF_MS = 30_000;
export const DEFAULT_MAX_BACKOFF_MS = 30 * 60_000;

const ACTIVITIES_PATH = '/api/activities';

export interface SyncEngineOptions {
  buffer: ActivityBuffer;
  log: Logger;
  /** Shutdown broadcast. Observed by `run()` and by backoff sleeps. */
  signal: AbortSignal;
  serverUrl: string;
  /** Empty string disables forwarding. */
  apiToken: string;
  intervalMs: number;
  batchSize: number;
  metricsOnly?: boolean;
  minBackoffMs?: number;
  maxBackoffMs?: number;
}

/**
 * First failure waits `min`, each consecutive failure doubles, capped at `max`.
 */
export function nextBackoff(current: number, min: number, max: number): number {
  if (current === 0) return min;
  return Math.min(current * 2, max);
}

/**
 * Resolves `true` after `ms`, or `false` as soon as `signal` aborts.
 */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);

  return new Promise((resolve) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Forwarding engine: drains the durable buffer to the remote endpoint.
 *
 * Entry points (startup, periodic tick, manual sync, final flush) all
 * feed `drainBacklog()`. Drains are queued so that two never read the
 * same unconsumed batch concurrently.
 *
 * Order per batch: read → POST → validate response → mark consumed.
 * Nothing is marked consumed unless the endpoint confirmed the whole
 * batch; any failure leaves the batch to be re-sent after backoff.
 */
export class SyncEngine {
  private readonly buffer: ActivityBuffer;
  private readonly log: Logger;
  private readonly signal: AbortSignal;
  private readonly endpoint: string;
  private readonly apiToken: string;
  private readonly intervalMs: number;
  private readonly batchSize: number;
  private readonly metricsOnly: boolean;
  private readonly minBackoffMs: number;
  private readonly maxBackoffMs: number;

  private queue: Promise<void> = Promise.resolve();

  constructor(options: SyncEngineOptions) {
    this.buffer = options.buffer;
    this.log = options.log;
    this.signal = options.signal;
    this.endpoint = options.serverUrl.replace(/\/+$/, '') + ACTIVITIES_PATH;
    this.apiToken = options.apiToken;
    this.intervalMs = options.intervalMs;
    this.batchSize = options.batchSize;
    this.metricsOnly = options.metricsOnly ?? false;
    this.minBackoffMs = options.minBackoffMs ?? DEFAULT_MIN_BACKOFF_MS;
    this.maxBackoffMs = options.maxBackoffMs ?? DEFAULT_MAX_BACKOFF_MS;
  }

  get hasCredential(): boolean {
    return this.apiToken !== '';
  }

  /**
   * Main loop. Drains once on start, then every `intervalMs` until the
   * shutdown signal, then makes one final best-effort drain.
   * Resolves only after that final drain returns.
   */
  async run(): Promise<void> {
    this.log.info(
      { endpoint: this.endpoint, intervalMs: this.intervalMs, batchSize: this.batchSize },
      'Sync engine started',
    );

    await this.drainBacklog();

    while (await sleep(this.intervalMs, this.signal)) {
      await this.drainBacklog();
    }

    this.log.info('Shutdown requested, flushing backlog');
    await this.drainBacklog();
    this.log.info('Sync engine stopped');
  }

  /**
   * On-demand trigger. Rejects with `NoCredential` when forwarding is
   * disabled; otherwise resolves once one full drain has returned.
   */
  async syncNow(): Promise<void> {
    if (!this.hasCredential) {
      throw new NoCredential();
    }
    await this.drainBacklog();
  }

  /**
   * Forwards batches until the backlog is exhausted or shutdown
   * interrupts a backoff sleep. Never rejects.
   */
  drainBacklog(): Promise<void> {
    const next = this.queue.then(() => this.drain());
    this.queue = next.catch((err: unknown) => {
      this.log.error({ err }, 'Drain aborted unexpectedly');
    });
    return this.queue;
  }

  /**
   * POSTs one batch and marks it consumed once the endpoint confirms it.
   * Every failure is reported as a `TransientFault`.
   */
  async forwardBatch(batch: readonly Activity[]): Promise<void> {
    if (batch.length === 0) return;

    const body = buildSyncRequest(batch, this.metricsOnly);

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'Authorization': `Bearer ${this.apiToken}`,
        },
        body: JSON.stringify(body),
      });
    } catch (err: unknown) {
      throw new TransientFault(`request failed: ${reasonOf(err)}`, { cause: err });
    }

    if (response.status !== 200) {
      throw new TransientFault(`server returned status ${response.status}`);
    }

    let raw: unknown;
    try {
      raw = await response.json();
    } catch (err: unknown) {
      throw new TransientFault(`decode response: ${reasonOf(err)}`, { cause: err });
    }

    const parsed = syncResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new TransientFault('decode response: unexpected response shape');
    }
    if (!parsed.data.success) {
      throw new TransientFault('server returned success=false');
    }

    // The endpoint has the data now; a failure below means it will be
    // re-sent and deduplicated remotely by clientUUID.
    try {
      await this.buffer.markConsumed(batch.map((activity) => activity.id));
    } catch (err: unknown) {
      throw new TransientFault(`mark as consumed: ${reasonOf(err)}`, { cause: err });
    }

    this.log.info(
      { count: batch.length, accepted: parsed.data.count },
      'Activities synced',
    );
  }

  private async drain(): Promise<void> {
    if (!this.hasCredential) {
      this.log.info('No API token configured, skipping sync');
      return;
    }

    // Consecutive-failure state lives only as long as this drain
    let backoffMs = 0;

    for (;;) {
      let sent: number;
      try {
        sent = await this.syncBatch();
      } catch (err: unknown) {
        backoffMs = nextBackoff(backoffMs, this.minBackoffMs, this.maxBackoffMs);
        this.log.warn({ err, backoffMs }, 'Sync failed, retrying after backoff');

        if (!(await sleep(backoffMs, this.signal))) {
          this.log.info('Shutdown during backoff, abandoning drain');
          return;
        }
        continue;
      }

      backoffMs = 0;

      if (sent < this.batchSize) return;
    }
  }

  /** Returns the number of activities forwarded; 0 means drained. */
  private async syncBatch(): Promise<number> {
    const batch = await this.buffer.unconsumed(this.batchSize);
    if (batch.length === 0) return 0;

    this.log.debug({ count: batch.length }, 'Syncing activities');
    await this.forwardBatch(batch);
    return batch.length;
  }
}
