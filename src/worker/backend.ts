/**
 * Request handlers for the worker
 *
 * Every cache write a front end asks for happens here. Each handler does its
 * network calls first and then applies the result to the cache in one go.
 */

import type { DatabaseManager } from '../database/index.js';
import type { GitHubClient, PullRequestRef } from '../github/client.js';
import { parseSubjectUrl } from '../github/subject.js';
import { syncNotifications } from '../sync.js';
import {
  ValidationError,
  errorMessage,
  type FetchCommentsRequest,
  type FetchCommentsResult,
  type FetchPrDetailRequest,
  type MarkDoneRequest,
  type MarkDoneResult,
  type MarkViewedRequest,
  type MarkViewedResult,
  type MutationRequest,
  type MutationResult,
  type Notification,
  type PrDetailResult,
  type PreloadBatchRequest,
  type PreloadComplete,
  type SyncComplete,
  type SyncRequest,
  type SyncStage,
  type WorkerRequest,
  type WorkerResponse,
} from '../types/index.js';
import { DEFAULT_MAX_NOTIFICATIONS, PRELOAD_CONCURRENCY, PRELOAD_COUNT } from '../utils/constants.js';
import { loadComments, preloadComments } from './comments.js';

export { loadComments, preloadComments, type PreloadOutcome } from './comments.js';

/**
 * Anything that can turn a request into its response. Handlers may throw;
 * the worker converts failures into error-result messages.
 */
export interface TriageBackend {
  handle(request: WorkerRequest): Promise<WorkerResponse>;
}

export interface GitHubBackendOptions {
  preloadConcurrency?: number;
  /** Items a sync request preloads comments for */
  preloadCount?: number;
  /** Cap for a sync request that names none */
  maxNotifications?: number;
  onSyncProgress?: (stage: SyncStage, current: number, total: number) => void;
}

/**
 * Backend over the real cache and GitHub client
 */
export class GitHubBackend implements TriageBackend {
  private readonly preloadConcurrency: number;
  private readonly preloadCount: number;
  private readonly maxNotifications: number;
  private readonly onSyncProgress: GitHubBackendOptions['onSyncProgress'];

  constructor(
    private readonly db: DatabaseManager,
    private readonly client: GitHubClient,
    options: GitHubBackendOptions = {}
  ) {
    this.preloadConcurrency = options.preloadConcurrency ?? PRELOAD_CONCURRENCY;
    this.preloadCount = options.preloadCount ?? PRELOAD_COUNT;
    this.maxNotifications = options.maxNotifications ?? DEFAULT_MAX_NOTIFICATIONS;
    this.onSyncProgress = options.onSyncProgress;
  }

  async handle(request: WorkerRequest): Promise<WorkerResponse> {
    switch (request.type) {
      case 'sync':
        return this.sync(request);
      case 'mark-done':
        return this.markDone(request);
      case 'mark-viewed':
        return this.markViewed(request);
      case 'fetch-comments':
        return this.fetchComments(request);
      case 'preload-batch':
        return this.preload(request);
      case 'fetch-pr-detail':
        return this.fetchPrDetail(request);
      case 'post-review-reply':
      case 'submit-review':
      case 'resolve-thread':
        return this.mutate(request);
    }
  }

  // ====================
  // Handlers
  // ====================

  private async sync(request: SyncRequest): Promise<SyncComplete> {
    const result = await syncNotifications(this.db, this.client, {
      maxNotifications: request.maxNotifications ?? this.maxNotifications,
      preloadCount: this.preloadCount,
      preloadConcurrency: this.preloadConcurrency,
      onProgress: this.onSyncProgress,
    });
    return { type: 'sync-result', requestId: request.requestId, result };
  }

  /**
   * Mark read upstream, then delete locally. Each id succeeds or fails on its own.
   */
  private async markDone(request: MarkDoneRequest): Promise<MarkDoneResult> {
    const done: string[] = [];
    const errors: MarkDoneResult['errors'] = [];

    for (const notificationId of request.notificationIds) {
      try {
        await this.client.markAsRead(notificationId);
        this.db.deleteNotification(notificationId);
        done.push(notificationId);
      } catch (error) {
        errors.push({ notificationId, error: errorMessage(error) });
      }
    }

    return { type: 'mark-done-result', requestId: request.requestId, notificationIds: done, errors };
  }

  private async markViewed(request: MarkViewedRequest): Promise<MarkViewedResult> {
    this.requireNotification(request.notificationId);
    this.db.updateLastViewed(request.notificationId);
    return { type: 'mark-viewed-result', requestId: request.requestId, notificationId: request.notificationId };
  }

  private async fetchComments(request: FetchCommentsRequest): Promise<FetchCommentsResult> {
    const commentCount = await loadComments(this.db, this.client, request.notificationId);
    return {
      type: 'fetch-comments-result',
      requestId: request.requestId,
      notificationId: request.notificationId,
      commentCount,
    };
  }

  private async preload(request: PreloadBatchRequest): Promise<PreloadComplete> {
    const outcome = await preloadComments(this.db, this.client, request.topN, this.preloadConcurrency);
    return {
      type: 'preload-complete',
      requestId: request.requestId,
      loadedIds: outcome.loadedIds,
      failedIds: outcome.failedIds,
      rateLimit: outcome.rateLimited
        ? { resetAt: outcome.rateLimited.resetAt, retryAfterSeconds: outcome.rateLimited.retryAfterSeconds }
        : null,
    };
  }

  /**
   * Fetch metadata, review threads and files, then replace the cached PR data in one transaction
   */
  private async fetchPrDetail(request: FetchPrDetailRequest): Promise<PrDetailResult> {
    const ref = this.pullRequestRef(request.notificationId);

    const details = await this.client.fetchPrMetadata(ref);
    const { reviewComments, reviews } = await this.client.fetchReviewThreads(ref);
    const files = await this.client.fetchPrFiles(ref);

    this.db.upsertSecondary(request.notificationId, {
      kind: 'pr_detail',
      bundle: { details, reviews, reviewComments, files },
    });

    return {
      type: 'pr-detail-result',
      requestId: request.requestId,
      notificationId: request.notificationId,
      reviewCommentCount: reviewComments.length,
      fileCount: files.length,
    };
  }

  private async mutate(request: MutationRequest): Promise<MutationResult> {
    const ref = this.pullRequestRef(request.notificationId);

    switch (request.type) {
      case 'post-review-reply':
        await this.client.postReviewReply(ref, request.commentId, request.body);
        // Thread contents changed upstream; next view re-fetches
        this.db.invalidateSecondary(request.notificationId, 'pr_detail');
        break;
      case 'submit-review':
        await this.client.submitReview(ref, request.event, request.body);
        this.db.invalidateSecondary(request.notificationId, 'pr_detail');
        break;
      case 'resolve-thread':
        if (request.resolve) {
          await this.client.resolveReviewThread(request.threadId);
        } else {
          await this.client.unresolveReviewThread(request.threadId);
        }
        this.db.setThreadResolved(request.notificationId, request.threadId, request.resolve);
        break;
    }

    return {
      type: 'mutation-result',
      requestId: request.requestId,
      mutation: request.type,
      notificationId: request.notificationId,
    };
  }

  private requireNotification(notificationId: string): Notification {
    const notification = this.db.getNotification(notificationId);
    if (!notification) {
      throw new ValidationError(`Notification ${notificationId} is not in the cache`, { notificationId });
    }
    return notification;
  }

  private pullRequestRef(notificationId: string): PullRequestRef {
    const notification = this.requireNotification(notificationId);
    const ref = parseSubjectUrl(notification.subject_url);
    if (!ref || ref.kind !== 'pull_request') {
      throw new ValidationError(`Notification ${notificationId} is not a pull request`, { notificationId });
    }
    return { owner: ref.owner, repo: ref.repo, number: ref.number };
  }
}
