/**
 * Conversation comment loading, shared by the worker and the sync pass
 */

import type { DatabaseManager } from '../database/index.js';
import type { GitHubClient } from '../github/client.js';
import { commentsUrlFor } from '../github/subject.js';
import { RateLimitedError, errorMessage } from '../types/index.js';
import { PRELOAD_CONCURRENCY } from '../utils/constants.js';
import { log } from '../logger.js';
import { Semaphore } from './semaphore.js';

export interface PreloadOutcome {
  loadedIds: string[];
  failedIds: string[];
  /** Set when the budget ran out; later items were skipped */
  rateLimited: RateLimitedError | null;
}

/**
 * Fetch and cache conversation comments for one notification.
 * Subjects without a comments endpoint are marked loaded with no comments.
 */
export async function loadComments(db: DatabaseManager, client: GitHubClient, notificationId: string): Promise<number> {
  const notification = db.getNotification(notificationId);
  if (!notification) {
    return 0;
  }

  const url = commentsUrlFor(notification.subject_url);
  const comments = url ? await client.fetchComments(url) : [];
  db.upsertSecondary(notificationId, { kind: 'comments', comments });
  return comments.length;
}

/**
 * Load comments for the top-N unloaded notifications with bounded concurrency.
 * Individual failures are logged and skipped.
 */
export async function preloadComments(
  db: DatabaseManager,
  client: GitHubClient,
  topN: number,
  concurrency: number = PRELOAD_CONCURRENCY
): Promise<PreloadOutcome> {
  const candidates = db.getUnloadedTopNotifications(topN);
  const semaphore = new Semaphore(concurrency);
  const loadedIds: string[] = [];
  const failedIds: string[] = [];
  let rateLimited: RateLimitedError | null = null;

  await Promise.all(
    candidates.map((candidate) =>
      semaphore.run(async () => {
        if (rateLimited) return;
        try {
          await loadComments(db, client, candidate.notification_id);
          loadedIds.push(candidate.notification_id);
        } catch (error) {
          if (error instanceof RateLimitedError) {
            rateLimited = error;
            return;
          }
          failedIds.push(candidate.notification_id);
          log.worker.warn(
            { notificationId: candidate.notification_id, error: errorMessage(error) },
            'preload failed for notification'
          );
        }
      })
    )
  );

  return { loadedIds, failedIds, rateLimited };
}
