/**
 * Sync orchestrator
 *
 * One forward pass: auth -> list -> batch_enrich -> upsert -> purge -> preload -> commit_meta.
 * Running out of rate limit, or a failed list page, stops fetching but keeps
 * what was already received; only AuthError and CacheError abort the pass.
 */

import type { DatabaseManager } from './database/index.js';
import type { GitHubClient } from './github/client.js';
import { parseSubjectUrl, toHtmlUrl } from './github/subject.js';
import { preloadComments } from './worker/comments.js';
import { computePriority } from './priority.js';
import {
  AuthError,
  CacheError,
  RateLimitedError,
  errorMessage,
  type GitHubNotification,
  type NotificationUpsert,
  type PartialFetchError,
  type Result,
  type SubjectDetails,
  type SubjectRef,
  type SyncRateLimit,
  type SyncResult,
  type SyncStage,
} from './types/index.js';
import { DEFAULT_MAX_NOTIFICATIONS, PRELOAD_CONCURRENCY, PRELOAD_COUNT } from './utils/constants.js';
import { log } from './logger.js';

export type { SyncRateLimit, SyncResult, SyncStage };

export interface SyncOptions {
  maxNotifications?: number;
  preloadCount?: number;
  preloadConcurrency?: number;
  onProgress?: (stage: SyncStage, current: number, total: number) => void;
}

type DetailResults = Map<string, Result<SubjectDetails, PartialFetchError>>;

function rateLimitAt(stage: SyncStage, error: RateLimitedError): SyncRateLimit {
  log.sync.warn({ stage, resetAt: error.resetAt?.toISOString() ?? null }, 'rate limit reached, halting fetches');
  return { stage, resetAt: error.resetAt, retryAfterSeconds: error.retryAfterSeconds };
}

function isFatal(error: unknown): boolean {
  return error instanceof AuthError || error instanceof CacheError;
}

/**
 * Subjects the batched lookup can resolve
 */
function enrichableSubjects(notifications: GitHubNotification[]): Map<string, SubjectRef> {
  const subjects = new Map<string, SubjectRef>();
  for (const notification of notifications) {
    if (notification.subjectType !== 'PullRequest' && notification.subjectType !== 'Issue') continue;
    const ref = parseSubjectUrl(notification.subjectUrl);
    if (ref) subjects.set(notification.id, ref);
  }
  return subjects;
}

export function toNotificationRow(
  notification: GitHubNotification,
  details: SubjectDetails | null,
  viewerLogin: string | null
): NotificationUpsert {
  const author = details?.author ?? null;
  const isOwn = author !== null && author === viewerLogin;
  const ciStatus = details?.ciStatus ?? null;
  const priority = computePriority({ reason: notification.reason, ciStatus, isOwn });

  return {
    notification_id: notification.id,
    repo_owner: notification.repoOwner,
    repo_name: notification.repoName,
    subject_type: notification.subjectType,
    subject_title: notification.subjectTitle,
    subject_url: notification.subjectUrl,
    html_url: toHtmlUrl(notification.subjectUrl),
    reason: notification.reason,
    updated_at: notification.updatedAt,
    unread: notification.unread ? 1 : 0,
    priority_score: priority.score,
    priority_tier: priority.tier,
    raw_json: JSON.stringify(notification.raw),
    ci_status: ciStatus,
    subject_state: details?.state ?? 'unknown',
    is_own: isOwn ? 1 : 0,
  };
}

export async function syncNotifications(
  db: DatabaseManager,
  client: GitHubClient,
  options: SyncOptions = {}
): Promise<SyncResult> {
  const maxNotifications = options.maxNotifications ?? DEFAULT_MAX_NOTIFICATIONS;
  const progress = options.onProgress ?? (() => undefined);
  let rateLimit: SyncRateLimit | null = null;

  // ====================
  // auth
  // ====================
  progress('auth', 0, 1);
  await client.authenticate();

  // ====================
  // list
  // ====================
  const since = db.getSyncMeta('last_sync_at');
  const fetched: GitHubNotification[] = [];
  let listComplete = true;
  let listError: string | null = null;
  let skipped = 0;
  try {
    for await (const page of client.listNotificationPages(since)) {
      fetched.push(...page.notifications);
      skipped += page.skipped;
      progress('list', fetched.length, maxNotifications);
      if (fetched.length >= maxNotifications) {
        fetched.length = maxNotifications;
        break;
      }
    }
  } catch (error) {
    if (isFatal(error)) throw error;
    listComplete = false;
    if (error instanceof RateLimitedError) {
      rateLimit = rateLimitAt('list', error);
    } else {
      listError = errorMessage(error);
      log.sync.warn({ error: listError, received: fetched.length }, 'listing failed; keeping pages already received');
    }
  }
  log.sync.info({ fetched: fetched.length, skipped, since, complete: listComplete }, 'list complete');

  // ====================
  // batch_enrich
  // ====================
  let details: DetailResults = new Map();
  let viewerLogin = db.getSyncMeta('viewer_login');
  const subjects = enrichableSubjects(fetched);

  if (rateLimit === null && subjects.size > 0) {
    progress('batch_enrich', 0, subjects.size);
    try {
      const batch = await client.fetchSubjectDetails(subjects);
      details = batch.results;
      if (batch.viewerLogin) viewerLogin = batch.viewerLogin;
      if (batch.rateLimited) {
        rateLimit = rateLimitAt('batch_enrich', batch.rateLimited);
      }
    } catch (error) {
      if (isFatal(error)) throw error;
      if (error instanceof RateLimitedError) {
        rateLimit = rateLimitAt('batch_enrich', error);
      } else {
        log.sync.warn({ error: errorMessage(error) }, 'batch enrichment failed; storing subjects as unknown');
      }
    }
    progress('batch_enrich', details.size, subjects.size);
  }

  let enrichFailures = 0;
  for (const result of details.values()) {
    if (!result.ok) {
      enrichFailures++;
      log.sync.warn({ notificationId: result.error.itemId, error: result.error.message }, 'subject lookup failed');
    }
  }

  // ====================
  // upsert
  // ====================
  let newCount = 0;
  let updatedCount = 0;
  db.transaction(() => {
    fetched.forEach((notification, index) => {
      const result = details.get(notification.id);
      const row = toNotificationRow(notification, result?.ok ? result.value : null, viewerLogin);
      const outcome = db.upsertNotification(row);
      if (outcome === 'new') newCount++;
      else if (outcome === 'updated') updatedCount++;
      progress('upsert', index + 1, fetched.length);
    });
    if (viewerLogin) {
      db.setSyncMeta('viewer_login', viewerLogin);
    }
  });

  // ====================
  // purge
  // ====================
  // Only a complete listing says anything about what no longer exists upstream
  let purged = 0;
  if (listComplete) {
    if (fetched.length === 0) {
      purged = db.purgeAllNotifications();
    } else {
      const oldest = fetched.reduce((min, n) => (n.updatedAt < min ? n.updatedAt : min), fetched[0].updatedAt);
      purged = db.purgeStaleNotifications(
        fetched.map((n) => n.id),
        oldest
      );
    }
    progress('purge', purged, purged);
  }

  // ====================
  // preload
  // ====================
  let preloaded = 0;
  if (rateLimit === null) {
    const preloadCount = options.preloadCount ?? PRELOAD_COUNT;
    progress('preload', 0, preloadCount);
    try {
      const outcome = await preloadComments(
        db,
        client,
        preloadCount,
        options.preloadConcurrency ?? PRELOAD_CONCURRENCY
      );
      preloaded = outcome.loadedIds.length;
      if (outcome.rateLimited) {
        rateLimit = rateLimitAt('preload', outcome.rateLimited);
      }
    } catch (error) {
      if (isFatal(error)) throw error;
      log.sync.warn({ error: errorMessage(error) }, 'preload failed');
    }
    progress('preload', preloaded, preloadCount);
  }

  // ====================
  // commit_meta
  // ====================
  let committed = false;
  if (listComplete) {
    db.transaction(() => {
      if (fetched.length > 0) {
        const newest = fetched.reduce((max, n) => (n.updatedAt > max ? n.updatedAt : max), fetched[0].updatedAt);
        db.setSyncMeta('last_sync_at', newest);
      }
      db.setSyncMeta('last_sync_completed_at', new Date().toISOString());
    });
    committed = true;
    progress('commit_meta', 1, 1);
  }

  const result: SyncResult = {
    new: newCount,
    updated: updatedCount,
    purged,
    total: db.getNotificationCount(),
    preloaded,
    enrichFailures,
    skipped,
    rateLimit,
    listError,
    committed,
  };
  log.sync.info({ ...result, rateLimit: rateLimit?.stage ?? null }, 'sync complete');
  return result;
}
