// ====================
// Notification Types
// ====================

export type SubjectType = 'PullRequest' | 'Issue' | 'Other';

/**
 * Reasons GitHub attaches to a notification thread. Unknown future reasons
 * are kept as plain strings and fall through to the default priority band.
 */
export type KnownReason =
  | 'review_requested'
  | 'mention'
  | 'assign'
  | 'team_mention'
  | 'author'
  | 'comment'
  | 'subscribed'
  | 'state_change'
  | 'ci_activity'
  | 'manual'
  | 'invitation'
  | 'security_alert';

export type NotificationReason = KnownReason | (string & {});

export type PriorityTier = 'blocking' | 'action' | 'fyi';

export type CiStatus = 'success' | 'failure' | 'pending' | 'error';

export type SubjectState = 'open' | 'closed' | 'merged' | 'unknown';

/**
 * A cached notification row, exactly as stored in SQLite.
 * Booleans are 0/1 integers and timestamps ISO-8601 UTC strings.
 */
export interface Notification {
  notification_id: string;
  repo_owner: string;
  repo_name: string;
  subject_type: SubjectType;
  subject_title: string;
  subject_url: string | null;   // API URL, null for some subject types
  html_url: string | null;      // Browser URL derived from subject_url
  reason: NotificationReason;
  updated_at: string;
  unread: number;
  priority_score: number;
  priority_tier: PriorityTier;
  raw_json: string;             // Upstream payload, verbatim
  secondary_loaded: number;
  last_viewed_at: string | null;
  ci_status: CiStatus | null;
  subject_state: SubjectState;
  is_own: number;               // Authenticated user authored the subject
}

/**
 * Row written by a sync upsert. Local state (secondary_loaded, last_viewed_at)
 * is owned by the cache and never overwritten from upstream.
 */
export type NotificationUpsert = Omit<Notification, 'last_viewed_at' | 'secondary_loaded'>;

export type UpsertOutcome = 'new' | 'updated' | 'unchanged';

export interface CommentInput {
  comment_id: string;
  author: string;
  body: string;
  created_at: string;
  updated_at: string;
}

export interface Comment {
  comment_id: string;
  notification_id: string;
  author: string;
  body: string;
  created_at: string;
  updated_at: string;
}

export interface NotificationFilter {
  filterText?: string;
  filterReason?: string;
  tier?: PriorityTier;
  limit?: number;
}

export interface CountStat {
  label: string;
  count: number;
}

export interface NotificationStats {
  total: number;
  by_tier: CountStat[];
  by_repo: CountStat[];
  by_reason: CountStat[];
}

/**
 * Lightweight projection used when picking items to pre-load
 */
export interface NotificationPreload {
  notification_id: string;
  subject_url: string | null;
  priority_score: number;
}

// ====================
// Sync Metadata
// ====================

export type SyncMetaKey = 'last_sync_at' | 'last_sync_completed_at' | 'schema_version' | 'viewer_login';
