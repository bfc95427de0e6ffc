import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseManager, LATEST_SCHEMA_VERSION } from '../src/database/index.js';
import { SqlWriteBlockedError, type PrDetailBundle } from '../src/types/index.js';
import { makeRow, memoryDb } from './helpers.js';

function bundle(overrides: Partial<PrDetailBundle> = {}): PrDetailBundle {
  return {
    details: {
      pr_number: 1,
      author: 'octo',
      body: 'Adds widgets',
      labels_json: '["bug"]',
      base_ref: 'main',
      head_ref: 'feature',
    },
    reviews: [{ review_id: 'R1', author: 'rev', state: 'COMMENTED', body: '', submitted_at: '2024-01-01T00:00:00Z' }],
    reviewComments: [
      {
        comment_id: '11',
        review_id: 'R1',
        thread_id: 'T1',
        author: 'rev',
        body: 'nit',
        path: 'src/a.ts',
        diff_hunk: '@@ -1 +1 @@',
        line: 3,
        side: 'RIGHT',
        in_reply_to_id: null,
        is_resolved: 0,
        created_at: '2024-01-01T00:00:00Z',
        updated_at: '2024-01-01T00:00:00Z',
      },
      {
        comment_id: '12',
        review_id: 'R-missing',
        thread_id: 'T1',
        author: 'octo',
        body: 'fixed',
        path: 'src/a.ts',
        diff_hunk: null,
        line: 3,
        side: 'RIGHT',
        in_reply_to_id: '11',
        is_resolved: 0,
        created_at: '2024-01-02T00:00:00Z',
        updated_at: '2024-01-02T00:00:00Z',
      },
    ],
    files: [
      { filename: 'src/a.ts', status: 'modified', additions: 2, deletions: 1, patch: '@@' },
      { filename: 'logo.png', status: 'added', additions: 0, deletions: 0, patch: null },
    ],
    ...overrides,
  };
}

describe('DatabaseManager', () => {
  let db: DatabaseManager;

  beforeEach(() => {
    db = memoryDb();
  });

  afterEach(() => {
    db.close();
  });

  describe('schema', () => {
    it('stamps a fresh store at the latest version', () => {
      expect(db.getSchemaVersion()).toBe(LATEST_SCHEMA_VERSION);
      expect(db.getSyncMeta('schema_version')).toBe(String(LATEST_SCHEMA_VERSION));
    });
  });

  describe('upsertNotification', () => {
    it('reports new, unchanged and updated', () => {
      expect(db.upsertNotification(makeRow())).toBe('new');
      expect(db.upsertNotification(makeRow())).toBe('unchanged');
      expect(db.upsertNotification(makeRow({ updated_at: '2024-01-02T00:00:00Z' }))).toBe('updated');
    });

    it('is idempotent', () => {
      db.upsertNotification(makeRow());
      db.markSecondaryLoaded('1');
      db.updateLastViewed('1');
      const once = db.getNotification('1');

      db.upsertNotification(makeRow());
      expect(db.getNotification('1')).toEqual(once);
    });

    it('clears secondary_loaded when updated_at changes', () => {
      db.upsertNotification(makeRow());
      db.markSecondaryLoaded('1');
      expect(db.getNotification('1')?.secondary_loaded).toBe(1);

      db.upsertNotification(makeRow({ updated_at: '2024-01-02T00:00:00Z', subject_title: 'Renamed' }));
      const row = db.getNotification('1');
      expect(row?.secondary_loaded).toBe(0);
      expect(row?.subject_title).toBe('Renamed');
    });

    it('keeps secondary_loaded and last_viewed_at when nothing changed upstream', () => {
      db.upsertNotification(makeRow());
      db.markSecondaryLoaded('1');
      db.updateLastViewed('1');
      const viewed = db.getNotification('1')?.last_viewed_at;

      db.upsertNotification(makeRow({ priority_score: 600, priority_tier: 'action' }));
      const row = db.getNotification('1');
      expect(row?.secondary_loaded).toBe(1);
      expect(row?.last_viewed_at).toBe(viewed);
      expect(row?.priority_score).toBe(600);
    });
  });

  describe('listNotifications', () => {
    beforeEach(() => {
      db.upsertNotification(makeRow({ notification_id: 'y', reason: 'mention', priority_score: 600, priority_tier: 'action', updated_at: '2024-01-01T00:00:00Z' }));
      db.upsertNotification(makeRow({ notification_id: 'x', reason: 'mention', priority_score: 600, priority_tier: 'action', updated_at: '2024-01-02T00:00:00Z' }));
      db.upsertNotification(makeRow({ notification_id: 'z', priority_score: 100, subject_title: 'Fix 100%_done', repo_name: 'gadgets' }));
      db.upsertNotification(makeRow({ notification_id: 'w', reason: 'review_requested', priority_score: 800, priority_tier: 'blocking' }));
    });

    it('orders by score then most recent update', () => {
      expect(db.listNotifications().map((n) => n.notification_id)).toEqual(['w', 'x', 'y', 'z']);
    });

    it('filters by reason, tier and limit', () => {
      expect(db.listNotifications({ filterReason: 'mention' }).map((n) => n.notification_id)).toEqual(['x', 'y']);
      expect(db.listNotifications({ tier: 'blocking' }).map((n) => n.notification_id)).toEqual(['w']);
      expect(db.listNotifications({ limit: 2 }).map((n) => n.notification_id)).toEqual(['w', 'x']);
    });

    it('matches LIKE wildcards literally in the text filter', () => {
      expect(db.listNotifications({ filterText: '100%_' }).map((n) => n.notification_id)).toEqual(['z']);
      expect(db.listNotifications({ filterText: '%' }).map((n) => n.notification_id)).toEqual(['z']);
      expect(db.listNotifications({ filterText: 'acme/gadgets' }).map((n) => n.notification_id)).toEqual(['z']);
    });
  });

  describe('purgeStaleNotifications', () => {
    it('deletes absent items at or before the oldest fetched timestamp and keeps newer ones', () => {
      db.upsertNotification(makeRow({ notification_id: 'old', updated_at: '2024-01-01T00:00:00Z' }));
      db.upsertNotification(makeRow({ notification_id: 'edge', updated_at: '2024-01-05T00:00:00Z' }));
      db.upsertNotification(makeRow({ notification_id: 'newer', updated_at: '2024-01-09T00:00:00Z' }));
      db.upsertNotification(makeRow({ notification_id: 'kept', updated_at: '2024-01-02T00:00:00Z' }));

      const purged = db.purgeStaleNotifications(['kept'], '2024-01-05T00:00:00Z');

      expect(purged).toBe(2);
      expect(db.listNotifications().map((n) => n.notification_id).sort()).toEqual(['kept', 'newer']);
    });

    it('handles keep sets larger than the bound parameter limit', () => {
      const keep = Array.from({ length: 40000 }, (_, i) => `k${i}`);
      db.upsertNotification(makeRow({ notification_id: 'k7' }));
      db.upsertNotification(makeRow({ notification_id: 'gone' }));
      expect(db.purgeStaleNotifications(keep, '2024-01-01T00:00:00Z')).toBe(1);
      expect(db.getNotification('k7')).not.toBeNull();
    });
  });

  describe('secondary data', () => {
    beforeEach(() => {
      db.upsertNotification(makeRow());
    });

    it('stores comments and marks the item loaded', () => {
      db.upsertSecondary('1', {
        kind: 'comments',
        comments: [
          { comment_id: 'c2', author: 'b', body: 'second', created_at: '2024-01-02T00:00:00Z', updated_at: '2024-01-02T00:00:00Z' },
          { comment_id: 'c1', author: 'a', body: 'first', created_at: '2024-01-01T00:00:00Z', updated_at: '2024-01-01T00:00:00Z' },
        ],
      });

      expect(db.getComments('1').map((c) => c.body)).toEqual(['first', 'second']);
      expect(db.getNotification('1')?.secondary_loaded).toBe(1);
      expect(db.getUnloadedTopNotifications(10)).toEqual([]);
    });

    it('replaces comments wholesale', () => {
      const comment = { comment_id: 'c1', author: 'a', body: 'first', created_at: '2024-01-01T00:00:00Z', updated_at: '2024-01-01T00:00:00Z' };
      db.upsertSecondary('1', { kind: 'comments', comments: [comment, { ...comment, comment_id: 'c2' }] });
      db.upsertSecondary('1', { kind: 'comments', comments: [{ ...comment, body: 'edited' }] });
      expect(db.getComments('1').map((c) => [c.comment_id, c.body])).toEqual([['c1', 'edited']]);
    });

    it('stores PR detail and drops review links to reviews it does not have', () => {
      db.upsertSecondary('1', { kind: 'pr_detail', bundle: bundle() });

      expect(db.getPrDetails('1')?.author).toBe('octo');
      expect(db.getReviews('1').map((r) => r.review_id)).toEqual(['R1']);
      expect(db.getReviewComments('1').map((c) => [c.comment_id, c.review_id])).toEqual([
        ['11', 'R1'],
        ['12', null],
      ]);
      expect(db.getPrFiles('1').map((f) => [f.filename, f.patch])).toEqual([
        ['logo.png', null],
        ['src/a.ts', '@@'],
      ]);
    });

    it('replaces PR detail wholesale on refresh', () => {
      db.upsertSecondary('1', { kind: 'pr_detail', bundle: bundle() });
      db.upsertSecondary('1', {
        kind: 'pr_detail',
        bundle: bundle({ reviews: [], reviewComments: [], files: [{ filename: 'b.ts', status: 'added', additions: 1, deletions: 0, patch: '+' }] }),
      });

      expect(db.getReviews('1')).toEqual([]);
      expect(db.getReviewComments('1')).toEqual([]);
      expect(db.getPrFiles('1').map((f) => f.filename)).toEqual(['b.ts']);
    });

    it('groups review comments into threads that resolve together', () => {
      db.upsertSecondary('1', { kind: 'pr_detail', bundle: bundle() });

      const [thread] = db.getReviewThreads('1');
      expect(thread.thread_id).toBe('T1');
      expect(thread.path).toBe('src/a.ts');
      expect(thread.comments.map((c) => c.comment_id)).toEqual(['11', '12']);
      expect(thread.is_resolved).toBe(false);

      expect(db.setThreadResolved('1', 'T1', true)).toBe(2);
      expect(db.getReviewThreads('1')[0].is_resolved).toBe(true);
    });

    it('invalidates one kind without touching the other', () => {
      db.upsertSecondary('1', { kind: 'comments', comments: [{ comment_id: 'c1', author: 'a', body: 'x', created_at: '2024-01-01T00:00:00Z', updated_at: '2024-01-01T00:00:00Z' }] });
      db.upsertSecondary('1', { kind: 'pr_detail', bundle: bundle() });

      db.invalidateSecondary('1', 'pr_detail');
      expect(db.getPrDetails('1')).toBeNull();
      expect(db.getComments('1')).toHaveLength(1);
      expect(db.getNotification('1')?.secondary_loaded).toBe(1);

      db.invalidateSecondary('1', 'comments');
      expect(db.getComments('1')).toEqual([]);
      expect(db.getNotification('1')?.secondary_loaded).toBe(0);
    });

    it('rejects secondary data for an unknown item', () => {
      expect(() => db.upsertSecondary('missing', { kind: 'comments', comments: [] })).toThrow(/unknown notification/);
    });

    it('cascades every secondary row when the item is deleted', () => {
      db.upsertSecondary('1', { kind: 'comments', comments: [{ comment_id: 'c1', author: 'a', body: 'x', created_at: '2024-01-01T00:00:00Z', updated_at: '2024-01-01T00:00:00Z' }] });
      db.upsertSecondary('1', { kind: 'pr_detail', bundle: bundle() });

      expect(db.deleteNotification('1')).toBe(true);

      const counts = ['comments', 'pr_details', 'pr_reviews', 'review_comments', 'pr_files'].map(
        (table) => db.executeSql(`SELECT count(*) FROM ${table}`).rows[0][0]
      );
      expect(counts).toEqual([0, 0, 0, 0, 0]);
    });
  });

  describe('lookups', () => {
    it('finds ids by reason and by owner/repo#number', () => {
      db.upsertNotification(makeRow({ notification_id: '5', reason: 'mention' }));
      db.upsertNotification(makeRow({ notification_id: '6', reason: 'mention', subject_url: 'https://api.github.test/repos/acme/widgets/issues/42' }));
      db.upsertNotification(makeRow({ notification_id: '7', subject_url: 'https://api.github.test/repos/acme/widgets/pulls/142' }));

      expect(db.getNotificationIdsByReason('mention').sort()).toEqual(['5', '6']);
      expect(db.getNotificationIdsByRef('acme', 'widgets', 42)).toEqual(['6']);
    });

    it('picks the highest priority unloaded items for preload', () => {
      db.upsertNotification(makeRow({ notification_id: 'a', priority_score: 100 }));
      db.upsertNotification(makeRow({ notification_id: 'b', priority_score: 800 }));
      db.upsertNotification(makeRow({ notification_id: 'c', priority_score: 600 }));
      db.markSecondaryLoaded('b');

      expect(db.getUnloadedTopNotifications(1).map((n) => n.notification_id)).toEqual(['c']);
    });

    it('counts by tier, repo and reason', () => {
      db.upsertNotification(makeRow({ notification_id: 'a', reason: 'mention', priority_tier: 'action' }));
      db.upsertNotification(makeRow({ notification_id: 'b', reason: 'mention', priority_tier: 'action', repo_name: 'gadgets' }));
      db.upsertNotification(makeRow({ notification_id: 'c' }));

      const stats = db.getNotificationStats();
      expect(stats.total).toBe(3);
      expect(stats.by_tier).toEqual([
        { label: 'action', count: 2 },
        { label: 'fyi', count: 1 },
      ]);
      expect(stats.by_repo).toEqual([
        { label: 'acme/widgets', count: 2 },
        { label: 'acme/gadgets', count: 1 },
      ]);
      expect(stats.by_reason).toEqual([
        { label: 'mention', count: 2 },
        { label: 'subscribed', count: 1 },
      ]);
    });
  });

  describe('executeSql', () => {
    it('returns columns and rows for reads', () => {
      db.upsertNotification(makeRow());
      expect(db.executeSql('SELECT notification_id, priority_score FROM notifications')).toEqual({
        columns: ['notification_id', 'priority_score'],
        rows: [['1', 100]],
      });
    });

    it('blocks writes unless allowed', () => {
      db.upsertNotification(makeRow());
      expect(() => db.executeSql('DELETE FROM notifications')).toThrow(SqlWriteBlockedError);
      expect(db.getNotificationCount()).toBe(1);

      db.executeSql('DELETE FROM notifications', { allowWrite: true });
      expect(db.getNotificationCount()).toBe(0);
    });
  });
});
