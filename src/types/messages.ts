// ====================
// Worker Message Types
// ====================
// Requests flow front end -> worker, responses worker -> front end.
// Every request carries a requestId that its response echoes.

import type { ReviewEvent } from './pull-requests.js';
import type { SyncResult } from './sync.js';

export interface MarkDoneRequest {
  type: 'mark-done';
  requestId: string;
  notificationIds: string[];
}

export interface FetchCommentsRequest {
  type: 'fetch-comments';
  requestId: string;
  notificationId: string;
}

export interface PreloadBatchRequest {
  type: 'preload-batch';
  requestId: string;
  topN: number;
}

/**
 * One sync pass run by the worker, in order with the other requests
 */
export interface SyncRequest {
  type: 'sync';
  requestId: string;
  maxNotifications?: number;
}

export interface MarkViewedRequest {
  type: 'mark-viewed';
  requestId: string;
  notificationId: string;
}

export interface FetchPrDetailRequest {
  type: 'fetch-pr-detail';
  requestId: string;
  notificationId: string;
}

export interface PostReviewReplyRequest {
  type: 'post-review-reply';
  requestId: string;
  notificationId: string;
  commentId: number;
  body: string;
}

export interface SubmitReviewRequest {
  type: 'submit-review';
  requestId: string;
  notificationId: string;
  event: ReviewEvent;
  body?: string;
}

export interface ResolveThreadRequest {
  type: 'resolve-thread';
  requestId: string;
  notificationId: string;
  threadId: string;
  resolve: boolean;
}

export type MutationRequest = PostReviewReplyRequest | SubmitReviewRequest | ResolveThreadRequest;

export type WorkerRequest =
  | SyncRequest
  | MarkDoneRequest
  | MarkViewedRequest
  | FetchCommentsRequest
  | PreloadBatchRequest
  | FetchPrDetailRequest
  | MutationRequest;

export type WorkerRequestType = WorkerRequest['type'];

/**
 * A request as handed to submit(); the bus assigns the id
 */
export type RequestInput = DistributiveOmit<WorkerRequest, 'requestId'>;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

export interface SyncComplete {
  type: 'sync-result';
  requestId: string;
  result: SyncResult;
}

export interface MarkViewedResult {
  type: 'mark-viewed-result';
  requestId: string;
  notificationId: string;
}

export interface MarkDoneResult {
  type: 'mark-done-result';
  requestId: string;
  notificationIds: string[];
  errors: Array<{ notificationId: string; error: string }>;
}

export interface FetchCommentsResult {
  type: 'fetch-comments-result';
  requestId: string;
  notificationId: string;
  commentCount: number;
}

export interface PreloadComplete {
  type: 'preload-complete';
  requestId: string;
  loadedIds: string[];
  failedIds: string[];
  /** Set when the batch was cut short by the rate limit */
  rateLimit: { resetAt: Date | null; retryAfterSeconds: number | null } | null;
}

export interface PrDetailResult {
  type: 'pr-detail-result';
  requestId: string;
  notificationId: string;
  reviewCommentCount: number;
  fileCount: number;
}

export interface MutationResult {
  type: 'mutation-result';
  requestId: string;
  mutation: MutationRequest['type'];
  notificationId: string;
}

export interface ErrorResult {
  type: 'error-result';
  requestId: string;
  request: WorkerRequest;
  code: string;
  error: string;
}

export type WorkerResponse =
  | SyncComplete
  | MarkDoneResult
  | MarkViewedResult
  | FetchCommentsResult
  | PreloadComplete
  | PrDetailResult
  | MutationResult
  | ErrorResult;

export type WorkerResponseType = WorkerResponse['type'];
