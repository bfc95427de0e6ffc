// ====================
// Sync Types
// ====================

export type SyncStage = 'auth' | 'list' | 'batch_enrich' | 'upsert' | 'purge' | 'preload' | 'commit_meta';

export interface SyncRateLimit {
  stage: SyncStage;
  resetAt: Date | null;
  retryAfterSeconds: number | null;
}

export interface SyncResult {
  new: number;
  updated: number;
  purged: number;
  /** Rows in the cache after the pass */
  total: number;
  preloaded: number;
  enrichFailures: number;
  /** Malformed notifications left out of the listing */
  skipped: number;
  rateLimit: SyncRateLimit | null;
  /** Why the listing stopped early, when something other than the rate limit stopped it */
  listError: string | null;
  /** last_sync_at was advanced */
  committed: boolean;
}
