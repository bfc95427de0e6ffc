/**
 * Priority scoring for notifications
 *
 * Pure rule table, first match wins. Bands are spaced apart so new sub-tiers
 * can slot in without renumbering the existing ones.
 */

import type { CiStatus, Notification, NotificationReason, PriorityTier } from './types/index.js';

export const SCORE_REVIEW_REQUESTED_CI_PASS = 1000;
export const SCORE_REVIEW_REQUESTED = 800;
export const SCORE_MENTION_OR_ASSIGN = 600;
export const SCORE_OWN_CI_FAIL = 500;
export const SCORE_TEAM_MENTION = 200;
export const SCORE_DEFAULT = 100;

export interface PriorityInput {
  reason: NotificationReason;
  ciStatus: CiStatus | null;
  isOwn: boolean;
}

export interface Priority {
  score: number;
  tier: PriorityTier;
}

export function computePriority({ reason, ciStatus, isOwn }: PriorityInput): Priority {
  if (reason === 'review_requested') {
    if (ciStatus === 'success') {
      return { score: SCORE_REVIEW_REQUESTED_CI_PASS, tier: 'blocking' };
    }
    return { score: SCORE_REVIEW_REQUESTED, tier: 'blocking' };
  }

  if (reason === 'mention' || reason === 'assign') {
    return { score: SCORE_MENTION_OR_ASSIGN, tier: 'action' };
  }

  if (isOwn && ciStatus === 'failure') {
    return { score: SCORE_OWN_CI_FAIL, tier: 'action' };
  }

  if (reason === 'team_mention') {
    return { score: SCORE_TEAM_MENTION, tier: 'fyi' };
  }

  return { score: SCORE_DEFAULT, tier: 'fyi' };
}

type Sortable = Pick<Notification, 'notification_id' | 'priority_score' | 'updated_at'>;

/**
 * Display order: score desc, then most recently updated, then id for a total order.
 * Matches the ORDER BY used by the cache.
 */
export function comparePriority(a: Sortable, b: Sortable): number {
  if (a.priority_score !== b.priority_score) {
    return b.priority_score - a.priority_score;
  }
  if (a.updated_at !== b.updated_at) {
    return a.updated_at < b.updated_at ? 1 : -1;
  }
  if (a.notification_id === b.notification_id) return 0;
  return a.notification_id < b.notification_id ? -1 : 1;
}
