import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseManager, LATEST_SCHEMA_VERSION, MIGRATIONS } from '../src/database/index.js';
import { columnExists, type Migration } from '../src/database/migrations.js';
import { CacheError } from '../src/types/index.js';
import { makeRow } from './helpers.js';

const FILENAME = 'cache.db';

/**
 * A store as the first release wrote it: no version stamp, comments_loaded
 * instead of secondary_loaded, no subject_state or is_own
 */
function writeLegacyStore(dir: string): void {
  const db = new Database(join(dir, FILENAME));
  db.exec(`
    CREATE TABLE notifications (
      notification_id TEXT PRIMARY KEY,
      repo_owner TEXT NOT NULL,
      repo_name TEXT NOT NULL,
      subject_type TEXT NOT NULL,
      subject_title TEXT NOT NULL,
      subject_url TEXT,
      html_url TEXT,
      reason TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      unread INTEGER NOT NULL DEFAULT 1,
      priority_score INTEGER NOT NULL DEFAULT 0,
      priority_tier TEXT NOT NULL DEFAULT 'fyi',
      raw_json TEXT NOT NULL,
      comments_loaded INTEGER NOT NULL DEFAULT 0,
      last_viewed_at TEXT,
      ci_status TEXT
    );
    INSERT INTO notifications
      (notification_id, repo_owner, repo_name, subject_type, subject_title, reason, updated_at, raw_json, comments_loaded)
    VALUES ('legacy', 'acme', 'widgets', 'Issue', 'Old item', 'mention', '2023-01-01T00:00:00Z', '{}', 1);
  `);
  db.close();
}

describe('schema migrations', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'triage-migrations-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('upgrades an unversioned store and keeps its rows', () => {
    writeLegacyStore(dir);

    const db = new DatabaseManager({ dataDir: dir, filename: FILENAME });
    try {
      expect(db.getSchemaVersion()).toBe(LATEST_SCHEMA_VERSION);
      const raw = db.getDatabase();
      expect(columnExists(raw, 'notifications', 'secondary_loaded')).toBe(true);
      expect(columnExists(raw, 'notifications', 'comments_loaded')).toBe(false);
      expect(columnExists(raw, 'notifications', 'is_own')).toBe(true);

      const legacy = db.getNotification('legacy');
      expect(legacy?.subject_state).toBe('unknown');
      expect(legacy?.secondary_loaded).toBe(0);
      expect(legacy?.is_own).toBe(0);

      // Tables the legacy store never had are usable
      expect(db.upsertNotification(makeRow({ notification_id: 'fresh' }))).toBe('new');
      db.upsertSecondary('fresh', { kind: 'comments', comments: [] });
      expect(db.getPrFiles('fresh')).toEqual([]);
    } finally {
      db.close();
    }
  });

  it('is a no-op when reopened at the latest version', () => {
    new DatabaseManager({ dataDir: dir, filename: FILENAME }).close();
    const db = new DatabaseManager({ dataDir: dir, filename: FILENAME });
    expect(db.getSchemaVersion()).toBe(LATEST_SCHEMA_VERSION);
    db.close();
  });

  it('refuses a store written by a newer version', () => {
    const first = new DatabaseManager({ dataDir: dir, filename: FILENAME });
    first.setSyncMeta('schema_version', String(LATEST_SCHEMA_VERSION + 1));
    first.close();

    expect(() => new DatabaseManager({ dataDir: dir, filename: FILENAME })).toThrow(CacheError);
  });

  it('applies only the migrations above the stored version, in ascending order', () => {
    const first = new DatabaseManager({ dataDir: dir, filename: FILENAME });
    first.setSyncMeta('schema_version', '1');
    first.close();

    const applied: number[] = [];
    const recording: Migration[] = [...MIGRATIONS].reverse().map((m) => ({
      ...m,
      up: (raw) => {
        applied.push(m.version);
        m.up(raw);
      },
    }));

    const db = new DatabaseManager({ dataDir: dir, filename: FILENAME, migrations: recording });
    try {
      expect(applied).toEqual([2, 3]);
      expect(db.getSchemaVersion()).toBe(3);
    } finally {
      db.close();
    }
  });

  it('stops at a hole in the migration sequence', () => {
    writeLegacyStore(dir);
    const withHole = MIGRATIONS.filter((m) => m.version !== 2);

    expect(() => new DatabaseManager({ dataDir: dir, filename: FILENAME, migrations: withHole })).toThrow(CacheError);
    expect(() => new DatabaseManager({ dataDir: dir, filename: FILENAME, migrations: withHole })).toThrow(
      'Migration sequence has a gap'
    );
  });

  it('lets a reader open a current store while the writer holds it', () => {
    const writer = new DatabaseManager({ dataDir: dir, filename: FILENAME });
    writer.upsertNotification(makeRow());

    const reader = new DatabaseManager({ dataDir: dir, filename: FILENAME, readonly: true });
    try {
      expect(reader.listNotifications().map((n) => n.notification_id)).toEqual(['1']);
    } finally {
      reader.close();
      writer.close();
    }
  });

  it('refuses a reader on a store at another version', () => {
    const writer = new DatabaseManager({ dataDir: dir, filename: FILENAME });
    writer.setSyncMeta('schema_version', '1');
    writer.close();

    expect(() => new DatabaseManager({ dataDir: dir, filename: FILENAME, readonly: true })).toThrow(CacheError);
  });

  it('refuses a reader when no store exists', () => {
    expect(() => new DatabaseManager({ dataDir: dir, filename: 'missing.db', readonly: true })).toThrow(
      'Failed to open notification cache'
    );
  });
});
