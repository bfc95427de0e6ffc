/**
 * Database Manager
 * SQLite cache for notifications and their secondary data, in WAL mode so a
 * read-only front end connection can query while the worker writes.
 */

import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
import {
  CacheError,
  SqlWriteBlockedError,
  type Comment,
  type CommentInput,
  type Notification,
  type NotificationFilter,
  type NotificationPreload,
  type NotificationStats,
  type NotificationUpsert,
  type PrDetailBundle,
  type PrDetails,
  type PrFile,
  type PrReview,
  type ReviewComment,
  type ReviewThread,
  type SecondaryKind,
  type SecondaryPayload,
  type SyncMetaKey,
  type UpsertOutcome,
  type CountStat,
} from '../types/index.js';
import { DATABASE_FILENAME, SQLITE_BUSY_TIMEOUT_MS } from '../utils/constants.js';
import { getDefaultDataDir } from '../utils/config.js';
import { log } from '../logger.js';
import { LATEST_SCHEMA_VERSION, MIGRATIONS, tableExists, type Migration } from './migrations.js';

export interface DatabaseConfig {
  filename?: string;
  dataDir?: string;
  /** In-memory store with the full schema (tests) */
  memory?: boolean;
  /** Reader connection: never writes, never migrates */
  readonly?: boolean;
  /** Migration list to apply instead of the built-in one */
  migrations?: readonly Migration[];
}

export interface SqlResult {
  columns: string[] | null;
  rows: unknown[][];
}

/**
 * Escape LIKE special characters so they match literally
 */
function escapeLike(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/%/g, '\\%').replace(/_/g, '\\_');
}

export class DatabaseManager {
  private db: Database.Database;
  readonly path: string;
  readonly readonly: boolean;
  private readonly migrations: readonly Migration[];
  private readonly latestVersion: number;

  constructor(config: DatabaseConfig = {}) {
    this.readonly = config.readonly ?? false;
    this.migrations = config.migrations ?? MIGRATIONS;
    this.latestVersion = config.migrations
      ? config.migrations.reduce((max, m) => Math.max(max, m.version), 0)
      : LATEST_SCHEMA_VERSION;

    if (config.memory) {
      this.path = ':memory:';
    } else {
      // Default to ~/.local/share/triage-inbox
      const dataDir = config.dataDir || getDefaultDataDir();
      if (!this.readonly && !fs.existsSync(dataDir)) {
        // Raw payloads may carry auth-adjacent data; keep the directory private
        fs.mkdirSync(dataDir, { recursive: true, mode: 0o700 });
      }
      this.path = path.join(dataDir, config.filename || DATABASE_FILENAME);
    }

    try {
      this.db = new Database(this.path, this.readonly ? { readonly: true, fileMustExist: true } : {});
      this.initialize();
    } catch (error) {
      if (error instanceof CacheError) {
        throw error;
      }
      throw new CacheError('Failed to open notification cache', {
        path: this.path,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private initialize(): void {
    // Set busy timeout to handle the worker holding the write lock
    this.db.pragma(`busy_timeout = ${SQLITE_BUSY_TIMEOUT_MS}`);
    this.db.pragma('foreign_keys = ON');

    if (this.readonly) {
      const version = this.getSchemaVersion();
      if (version !== this.latestVersion) {
        throw new CacheError('Notification cache schema does not match this version; run a sync first', {
          path: this.path,
          found: version,
          expected: this.latestVersion,
        });
      }
      return;
    }

    // WAL lets readers proceed during a writer transaction
    this.db.pragma('journal_mode = WAL');
    this.migrate();
  }

  private readSchema(): string {
    const schemaPath = path.join(__dirname, 'schema.sql');
    return fs.readFileSync(schemaPath, 'utf-8');
  }

  /**
   * Create a fresh store at the latest version, or bring an existing one up to it.
   */
  private migrate(): void {
    const fresh = !tableExists(this.db, 'notifications');

    if (fresh) {
      this.transaction(() => {
        this.db.exec(this.readSchema());
        this.setSchemaVersion(this.latestVersion);
      });
      log.db.debug({ version: this.latestVersion }, 'created fresh cache');
      return;
    }

    this.db.exec('CREATE TABLE IF NOT EXISTS sync_metadata (key TEXT PRIMARY KEY, value TEXT NOT NULL)');
    const current = this.getSchemaVersion();
    if (current > this.latestVersion) {
      throw new CacheError('Notification cache was written by a newer version', {
        path: this.path,
        found: current,
        expected: this.latestVersion,
      });
    }

    let expected = current + 1;
    const ordered = [...this.migrations].sort((a, b) => a.version - b.version);
    for (const migration of ordered) {
      if (migration.version <= current) continue;
      if (migration.version !== expected) {
        throw new CacheError('Migration sequence has a gap', { expected, found: migration.version });
      }
      this.transaction(() => {
        migration.up(this.db);
        this.setSchemaVersion(migration.version);
      });
      log.db.info({ version: migration.version, description: migration.description }, 'applied migration');
      expected++;
    }

    // Tables and indexes introduced after the store was created
    this.db.exec(this.readSchema());
  }

  /**
   * Get the underlying database instance
   * Use for custom queries if needed
   */
  getDatabase(): Database.Database {
    return this.db;
  }

  /**
   * Execute a transaction
   * All operations run atomically
   */
  transaction<T>(fn: () => T): T {
    const transaction = this.db.transaction(fn);
    return transaction();
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close();
  }

  // ====================
  // Schema Version
  // ====================

  /**
   * Stored schema version; absent means a legacy store at version 0
   */
  getSchemaVersion(): number {
    const value = this.getSyncMeta('schema_version');
    return value === null ? 0 : parseInt(value, 10);
  }

  private setSchemaVersion(version: number): void {
    this.setSyncMeta('schema_version', String(version));
  }

  // ====================
  // Sync Metadata
  // ====================

  getSyncMeta(key: SyncMetaKey): string | null {
    const row = this.db
      .prepare<[string], { value: string }>('SELECT value FROM sync_metadata WHERE key = ?')
      .get(key);
    return row?.value ?? null;
  }

  setSyncMeta(key: SyncMetaKey, value: string): void {
    this.db
      .prepare<[string, string]>(
        `INSERT INTO sync_metadata (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`
      )
      .run(key, value);
  }

  // ====================
  // Notification Operations
  // ====================

  /**
   * Insert or update a notification.
   * secondary_loaded is cleared when updated_at changes; otherwise local state is kept,
   * so applying the same row twice leaves the store unchanged.
   */
  upsertNotification(row: NotificationUpsert): UpsertOutcome {
    return this.transaction(() => {
      const existing = this.db
        .prepare<[string], { updated_at: string }>('SELECT updated_at FROM notifications WHERE notification_id = ?')
        .get(row.notification_id);

      if (!existing) {
        this.db
          .prepare<NotificationUpsert>(`
            INSERT INTO notifications
              (notification_id, repo_owner, repo_name, subject_type, subject_title,
               subject_url, html_url, reason, updated_at, unread, priority_score,
               priority_tier, raw_json, secondary_loaded, ci_status, subject_state, is_own)
            VALUES
              (@notification_id, @repo_owner, @repo_name, @subject_type, @subject_title,
               @subject_url, @html_url, @reason, @updated_at, @unread, @priority_score,
               @priority_tier, @raw_json, 0, @ci_status, @subject_state, @is_own)
          `)
          .run(row);
        return 'new';
      }

      const changed = existing.updated_at !== row.updated_at;
      this.db
        .prepare<NotificationUpsert & { stale: number }>(`
          UPDATE notifications SET
            repo_owner = @repo_owner, repo_name = @repo_name,
            subject_type = @subject_type, subject_title = @subject_title,
            subject_url = @subject_url, html_url = @html_url,
            reason = @reason, updated_at = @updated_at, unread = @unread,
            priority_score = @priority_score, priority_tier = @priority_tier,
            raw_json = @raw_json, ci_status = @ci_status,
            subject_state = @subject_state, is_own = @is_own,
            secondary_loaded = CASE WHEN @stale = 1 THEN 0 ELSE secondary_loaded END
          WHERE notification_id = @notification_id
        `)
        .run({ ...row, stale: changed ? 1 : 0 });
      return changed ? 'updated' : 'unchanged';
    });
  }

  getNotification(notificationId: string): Notification | null {
    const stmt = this.db.prepare<[string], Notification>('SELECT * FROM notifications WHERE notification_id = ?');
    return stmt.get(notificationId) ?? null;
  }

  getNotificationCount(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT count(*) AS count FROM notifications').get();
    return row?.count ?? 0;
  }

  /**
   * Notifications in display order, with optional filters
   */
  listNotifications(filter: NotificationFilter = {}): Notification[] {
    let query = 'SELECT * FROM notifications WHERE 1=1';
    const params: Array<string | number> = [];

    if (filter.filterText) {
      query +=
        " AND (subject_title LIKE ? ESCAPE '\\' OR repo_owner || '/' || repo_name LIKE ? ESCAPE '\\')";
      const like = `%${escapeLike(filter.filterText)}%`;
      params.push(like, like);
    }

    if (filter.filterReason) {
      query += ' AND reason = ?';
      params.push(filter.filterReason);
    }

    if (filter.tier) {
      query += ' AND priority_tier = ?';
      params.push(filter.tier);
    }

    query += ' ORDER BY priority_score DESC, updated_at DESC, notification_id ASC';

    if (filter.limit !== undefined) {
      query += ' LIMIT ?';
      params.push(filter.limit);
    }

    return this.db.prepare<Array<string | number>, Notification>(query).all(...params);
  }

  /**
   * Delete a notification; CASCADE removes every secondary row
   */
  deleteNotification(notificationId: string): boolean {
    const result = this.db.prepare<[string]>('DELETE FROM notifications WHERE notification_id = ?').run(notificationId);
    return result.changes > 0;
  }

  getNotificationIdsByReason(reason: string): string[] {
    const rows = this.db
      .prepare<[string], { notification_id: string }>('SELECT notification_id FROM notifications WHERE reason = ?')
      .all(reason);
    return rows.map((row) => row.notification_id);
  }

  /**
   * Notifications whose subject is owner/repo#number
   */
  getNotificationIdsByRef(owner: string, repo: string, number: number): string[] {
    const rows = this.db
      .prepare<[string, string, string, string], { notification_id: string }>(`
        SELECT notification_id FROM notifications
        WHERE repo_owner = ? AND repo_name = ?
          AND (subject_url LIKE ? OR subject_url LIKE ?)
      `)
      .all(owner, repo, `%/pulls/${number}`, `%/issues/${number}`);
    return rows.map((row) => row.notification_id);
  }

  updateLastViewed(notificationId: string): void {
    this.db
      .prepare<[string]>(
        "UPDATE notifications SET last_viewed_at = strftime('%Y-%m-%dT%H:%M:%SZ', 'now') WHERE notification_id = ?"
      )
      .run(notificationId);
  }

  getNotificationStats(): NotificationStats {
    const countBy = (query: string): CountStat[] =>
      this.db.prepare<[], CountStat>(query).all();

    return {
      total: this.getNotificationCount(),
      by_tier: countBy(
        'SELECT priority_tier AS label, count(*) AS count FROM notifications GROUP BY priority_tier ORDER BY count DESC, label'
      ),
      by_repo: countBy(
        "SELECT repo_owner || '/' || repo_name AS label, count(*) AS count FROM notifications GROUP BY label ORDER BY count DESC, label"
      ),
      by_reason: countBy(
        'SELECT reason AS label, count(*) AS count FROM notifications GROUP BY reason ORDER BY count DESC, label'
      ),
    };
  }

  // ====================
  // Purge
  // ====================

  purgeAllNotifications(): number {
    return this.db.prepare('DELETE FROM notifications').run().changes;
  }

  /**
   * Delete notifications absent from keepIds whose updated_at <= oldestUpdatedAt,
   * i.e. inside the window the upstream listing covered
   */
  purgeStaleNotifications(keepIds: Iterable<string>, oldestUpdatedAt: string): number {
    return this.transaction(() => {
      // Temp table instead of a NOT IN list: SQLite caps bound parameters
      this.db.exec('CREATE TEMP TABLE IF NOT EXISTS purge_keep (notification_id TEXT PRIMARY KEY)');
      this.db.exec('DELETE FROM purge_keep');
      const insert = this.db.prepare<[string]>('INSERT OR IGNORE INTO purge_keep (notification_id) VALUES (?)');
      for (const id of keepIds) {
        insert.run(id);
      }
      const result = this.db
        .prepare<[string]>(`
          DELETE FROM notifications
          WHERE notification_id NOT IN (SELECT notification_id FROM purge_keep)
            AND updated_at <= ?
        `)
        .run(oldestUpdatedAt);
      this.db.exec('DELETE FROM purge_keep');
      return result.changes;
    });
  }

  // ====================
  // Secondary Data
  // ====================

  /**
   * Top-N notifications by priority whose secondary data is not loaded
   */
  getUnloadedTopNotifications(limit: number): NotificationPreload[] {
    return this.db
      .prepare<[number], NotificationPreload>(`
        SELECT notification_id, subject_url, priority_score FROM notifications
        WHERE secondary_loaded = 0
        ORDER BY priority_score DESC, updated_at DESC, notification_id ASC
        LIMIT ?
      `)
      .all(limit);
  }

  markSecondaryLoaded(notificationId: string): void {
    this.db
      .prepare<[string]>('UPDATE notifications SET secondary_loaded = 1 WHERE notification_id = ?')
      .run(notificationId);
  }

  /**
   * Replace one kind of secondary data for a notification in a single transaction.
   * Rows are never patched in place, so readers see either the old set or the new one.
   */
  upsertSecondary(notificationId: string, payload: SecondaryPayload): void {
    this.transaction(() => {
      if (!this.getNotification(notificationId)) {
        throw new CacheError('Cannot attach secondary data to an unknown notification', {
          notificationId,
          kind: payload.kind,
        });
      }

      if (payload.kind === 'comments') {
        this.replaceComments(notificationId, payload.comments);
        this.markSecondaryLoaded(notificationId);
      } else {
        this.replacePrData(notificationId, payload.bundle);
      }
    });
  }

  /**
   * Drop cached secondary data so the next lazy load re-fetches it
   */
  invalidateSecondary(notificationId: string, kind: SecondaryKind | 'all' = 'all'): void {
    this.transaction(() => {
      if (kind === 'comments' || kind === 'all') {
        this.db.prepare<[string]>('DELETE FROM comments WHERE notification_id = ?').run(notificationId);
        this.db
          .prepare<[string]>('UPDATE notifications SET secondary_loaded = 0 WHERE notification_id = ?')
          .run(notificationId);
      }
      if (kind === 'pr_detail' || kind === 'all') {
        this.deletePrData(notificationId);
      }
    });
  }

  private replaceComments(notificationId: string, comments: CommentInput[]): void {
    this.db.prepare<[string]>('DELETE FROM comments WHERE notification_id = ?').run(notificationId);
    const insert = this.db.prepare<Comment>(`
      INSERT INTO comments (comment_id, notification_id, author, body, created_at, updated_at)
      VALUES (@comment_id, @notification_id, @author, @body, @created_at, @updated_at)
      ON CONFLICT(comment_id) DO UPDATE SET
        notification_id = excluded.notification_id,
        body = excluded.body,
        updated_at = excluded.updated_at
    `);
    for (const comment of comments) {
      insert.run({ ...comment, notification_id: notificationId });
    }
  }

  private deletePrData(notificationId: string): void {
    for (const table of ['pr_files', 'review_comments', 'pr_reviews', 'pr_details']) {
      this.db.prepare<[string]>(`DELETE FROM ${table} WHERE notification_id = ?`).run(notificationId);
    }
  }

  private replacePrData(notificationId: string, bundle: PrDetailBundle): void {
    this.deletePrData(notificationId);

    this.db
      .prepare<Omit<PrDetails, 'loaded_at'>>(`
        INSERT INTO pr_details (notification_id, pr_number, author, body, labels_json, base_ref, head_ref)
        VALUES (@notification_id, @pr_number, @author, @body, @labels_json, @base_ref, @head_ref)
      `)
      .run({ ...bundle.details, notification_id: notificationId });

    const insertReview = this.db.prepare<PrReview>(`
      INSERT INTO pr_reviews (review_id, notification_id, author, state, body, submitted_at)
      VALUES (@review_id, @notification_id, @author, @state, @body, @submitted_at)
      ON CONFLICT(review_id) DO UPDATE SET
        notification_id = excluded.notification_id,
        state = excluded.state,
        body = excluded.body
    `);
    const reviewIds = new Set<string>();
    for (const review of bundle.reviews) {
      insertReview.run({ ...review, notification_id: notificationId });
      reviewIds.add(review.review_id);
    }

    const insertComment = this.db.prepare<ReviewComment>(`
      INSERT INTO review_comments
        (comment_id, review_id, notification_id, thread_id, author, body, path, diff_hunk,
         line, side, in_reply_to_id, is_resolved, created_at, updated_at)
      VALUES
        (@comment_id, @review_id, @notification_id, @thread_id, @author, @body, @path, @diff_hunk,
         @line, @side, @in_reply_to_id, @is_resolved, @created_at, @updated_at)
      ON CONFLICT(comment_id) DO UPDATE SET
        notification_id = excluded.notification_id,
        body = excluded.body,
        is_resolved = excluded.is_resolved,
        updated_at = excluded.updated_at
    `);
    for (const comment of bundle.reviewComments) {
      // Only link reviews we actually stored; the FK would reject the rest
      const reviewId = comment.review_id !== null && reviewIds.has(comment.review_id) ? comment.review_id : null;
      insertComment.run({ ...comment, review_id: reviewId, notification_id: notificationId });
    }

    const insertFile = this.db.prepare<Omit<PrFile, 'file_id'>>(`
      INSERT INTO pr_files (notification_id, filename, status, additions, deletions, patch)
      VALUES (@notification_id, @filename, @status, @additions, @deletions, @patch)
    `);
    for (const file of bundle.files) {
      insertFile.run({ ...file, notification_id: notificationId });
    }
  }

  getComments(notificationId: string): Comment[] {
    return this.db
      .prepare<[string], Comment>('SELECT * FROM comments WHERE notification_id = ? ORDER BY created_at, comment_id')
      .all(notificationId);
  }

  getPrDetails(notificationId: string): PrDetails | null {
    const stmt = this.db.prepare<[string], PrDetails>('SELECT * FROM pr_details WHERE notification_id = ?');
    return stmt.get(notificationId) ?? null;
  }

  getReviews(notificationId: string): PrReview[] {
    return this.db
      .prepare<[string], PrReview>('SELECT * FROM pr_reviews WHERE notification_id = ? ORDER BY submitted_at, review_id')
      .all(notificationId);
  }

  getReviewComments(notificationId: string): ReviewComment[] {
    return this.db
      .prepare<[string], ReviewComment>(
        'SELECT * FROM review_comments WHERE notification_id = ? ORDER BY created_at, comment_id'
      )
      .all(notificationId);
  }

  /**
   * Review comments grouped into threads, in order of each thread's first comment.
   * Comments without a thread id form a thread of their own.
   */
  getReviewThreads(notificationId: string): ReviewThread[] {
    const threads = new Map<string, ReviewThread>();
    for (const comment of this.getReviewComments(notificationId)) {
      const threadId = comment.thread_id ?? comment.comment_id;
      let thread = threads.get(threadId);
      if (!thread) {
        thread = {
          thread_id: threadId,
          path: comment.path,
          line: comment.line,
          is_resolved: comment.is_resolved === 1,
          comments: [],
        };
        threads.set(threadId, thread);
      }
      thread.comments.push(comment);
    }
    return [...threads.values()];
  }

  /**
   * Resolution is per thread: every comment in it flips together
   */
  setThreadResolved(notificationId: string, threadId: string, resolved: boolean): number {
    const result = this.db
      .prepare<[number, string, string]>(
        'UPDATE review_comments SET is_resolved = ? WHERE notification_id = ? AND thread_id = ?'
      )
      .run(resolved ? 1 : 0, notificationId, threadId);
    return result.changes;
  }

  getPrFiles(notificationId: string): PrFile[] {
    return this.db
      .prepare<[string], PrFile>('SELECT * FROM pr_files WHERE notification_id = ? ORDER BY filename, file_id')
      .all(notificationId);
  }

  // ====================
  // Ad-hoc SQL
  // ====================

  /**
   * Run one SQL statement. Writes are refused unless allowWrite is set.
   */
  executeSql(query: string, options: { allowWrite?: boolean } = {}): SqlResult {
    const stmt = this.db.prepare<unknown[], unknown[]>(query);

    if (!stmt.reader) {
      if (!options.allowWrite) {
        throw new SqlWriteBlockedError('Write statements are blocked; pass --write to allow them', { query });
      }
      stmt.run();
      return { columns: null, rows: [] };
    }

    const columns = stmt.columns().map((c) => c.name);
    const rows = stmt.raw(true).all();
    return { columns, rows };
  }
}

export { LATEST_SCHEMA_VERSION, MIGRATIONS } from './migrations.js';
