// ====================
// Pull Request Types
// ====================

import type { CommentInput } from './notifications.js';

export interface PrDetails {
  notification_id: string;
  pr_number: number;
  author: string;
  body: string | null;
  labels_json: string;          // JSON array of label names
  base_ref: string | null;
  head_ref: string | null;
  loaded_at: string;
}

export type PrDetailsInput = Omit<PrDetails, 'notification_id' | 'loaded_at'>;

export type ReviewState = 'APPROVED' | 'CHANGES_REQUESTED' | 'COMMENTED' | 'DISMISSED' | 'PENDING';

export interface PrReview {
  review_id: string;
  notification_id: string;
  author: string;
  state: ReviewState | (string & {});
  body: string;
  submitted_at: string | null;
}

export type PrReviewInput = Omit<PrReview, 'notification_id'>;

export type DiffSide = 'LEFT' | 'RIGHT';

export interface ReviewComment {
  comment_id: string;
  review_id: string | null;
  notification_id: string;
  thread_id: string | null;
  author: string;
  body: string;
  path: string | null;
  diff_hunk: string | null;
  line: number | null;
  side: DiffSide | null;
  in_reply_to_id: string | null;
  is_resolved: number;
  created_at: string;
  updated_at: string;
}

export type ReviewCommentInput = Omit<ReviewComment, 'notification_id'>;

/**
 * Comments of one thread share its resolution state
 */
export interface ReviewThread {
  thread_id: string;
  path: string | null;
  line: number | null;
  is_resolved: boolean;
  comments: ReviewComment[];
}

export type FileChangeStatus = 'added' | 'modified' | 'removed' | 'renamed' | 'copied' | 'changed' | 'unchanged';

export interface PrFile {
  file_id: number;
  notification_id: string;
  filename: string;
  status: FileChangeStatus | (string & {});
  additions: number;
  deletions: number;
  patch: string | null;         // null for binary or oversized diffs
}

export type PrFileInput = Omit<PrFile, 'file_id' | 'notification_id'>;

/**
 * Everything cached for a pull request, replaced as one unit on refresh
 */
export interface PrDetailBundle {
  details: PrDetailsInput;
  reviews: PrReviewInput[];
  reviewComments: ReviewCommentInput[];
  files: PrFileInput[];
}

export type ReviewEvent = 'APPROVE' | 'REQUEST_CHANGES' | 'COMMENT';

// ====================
// Secondary Data
// ====================

export type SecondaryKind = 'comments' | 'pr_detail';

export type SecondaryPayload =
  | { kind: 'comments'; comments: CommentInput[] }
  | { kind: 'pr_detail'; bundle: PrDetailBundle };
