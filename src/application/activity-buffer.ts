import type { Activity, NewActivity } from '../domain/index.js';

export interface BufferCounts {
  total: number;
  unconsumed: number;
}

/**
 * Capability interface over the durable buffer.
 *
 * Every operation is individually atomic. Implementations report any
 * storage failure as a `StorageFault`; callers never see driver errors.
 */
export interface ActivityBuffer {
  /** Persists an unconsumed activity and returns its assigned id. */
  append(activity: NewActivity): Promise<number>;

  /**
   * Up to `limit` unconsumed activities, ordered by `started_at` then `id`.
   * An empty array means the buffer is drained.
   */
  unconsumed(limit: number): Promise<Activity[]>;

  /** All-or-nothing. Empty input is a no-op. */
  markConsumed(ids: readonly number[]): Promise<void>;

  counts(): Promise<BufferCounts>;
}
