/**
 * Core domain types for the activity relay.
 *
 * An activity is one recorded editing interval reported by an editor
 * plugin. These types carry no framework dependencies; both wire formats
 * (intake and forwarding) map to and from them.
 */

/** Editor recorded when the client leaves `editor` blank. */
export const DEFAULT_EDITOR = 'neovim';

/**
 * Fields supplied at intake time, before the buffer assigns identity.
 *
 * `client_id` is the idempotency token the remote endpoint deduplicates
 * on. When absent the buffer generates one at append time.
 */
export interface NewActivity {
  readonly client_id?: string | undefined;
  readonly project: string | null;
  readonly git_remote: string | null;
  readonly started_at: Date;
  readonly ended_at: Date;
  readonly filename: string | null;
  readonly filetype: string | null;
  readonly lines_added: number;
  readonly lines_removed: number;
  readonly git_branch: string | null;
  readonly actions_per_minute: number;
  readonly words_per_minute: number;
  readonly editor: string;
  readonly machine: string;
}

/**
 * Canonical Activity entity as stored in the durable buffer.
 *
 * `id` is assigned by the buffer and never reused. `consumed` flips
 * from false to true exactly once, after the remote endpoint accepted
 * a batch containing the row.
 */
export interface Activity extends NewActivity {
  readonly id: number;
  readonly client_id: string;
  readonly consumed: boolean;
  readonly created_at: Date;
}
