/**
 * Schema migrations
 *
 * Forward-only, applied in ascending version order, one transaction each.
 * schema.sql always describes the latest version; a fresh store is created
 * from it directly and stamped without running anything here.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  description: string;
  up: (db: Database.Database) => void;
}

export function tableExists(db: Database.Database, table: string): boolean {
  const row = db
    .prepare<[string], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table);
  return row !== undefined;
}

export function columnExists(db: Database.Database, table: string, column: string): boolean {
  const columns = db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
  return columns.some((c) => c.name === column);
}

export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    description: 'Cache subject state on notifications',
    up: (db) => {
      if (!columnExists(db, 'notifications', 'subject_state')) {
        db.exec("ALTER TABLE notifications ADD COLUMN subject_state TEXT NOT NULL DEFAULT 'unknown'");
      }
    },
  },
  {
    version: 2,
    // review_id used to be NOT NULL, which broke the foreign key for thread
    // comments without a known review. SQLite cannot relax a column constraint,
    // so the table is rebuilt; its contents are a cache and get re-fetched.
    description: 'Make review_comments.review_id nullable',
    up: (db) => {
      db.exec(`
        DROP TABLE IF EXISTS review_comments;
        CREATE TABLE review_comments (
          comment_id      TEXT PRIMARY KEY,
          review_id       TEXT REFERENCES pr_reviews(review_id) ON DELETE CASCADE,
          notification_id TEXT NOT NULL
              REFERENCES notifications(notification_id) ON DELETE CASCADE,
          thread_id       TEXT,
          author          TEXT NOT NULL,
          body            TEXT NOT NULL,
          path            TEXT,
          diff_hunk       TEXT,
          line            INTEGER,
          side            TEXT,
          in_reply_to_id  TEXT,
          is_resolved     INTEGER NOT NULL DEFAULT 0,
          created_at      TEXT NOT NULL,
          updated_at      TEXT NOT NULL
        );
      `);
    },
  },
  {
    version: 3,
    description: 'Track secondary data generically and authorship of subjects',
    up: (db) => {
      if (columnExists(db, 'notifications', 'comments_loaded')) {
        db.exec('ALTER TABLE notifications RENAME COLUMN comments_loaded TO secondary_loaded');
      } else if (!columnExists(db, 'notifications', 'secondary_loaded')) {
        db.exec('ALTER TABLE notifications ADD COLUMN secondary_loaded INTEGER NOT NULL DEFAULT 0');
      }
      if (!columnExists(db, 'notifications', 'is_own')) {
        db.exec('ALTER TABLE notifications ADD COLUMN is_own INTEGER NOT NULL DEFAULT 0');
      }
      // Everything must be re-fetched under the new flag semantics
      db.exec('UPDATE notifications SET secondary_loaded = 0');
    },
  },
];

export const LATEST_SCHEMA_VERSION = MIGRATIONS.length > 0 ? MIGRATIONS[MIGRATIONS.length - 1].version : 0;
