/**
 * sleevescan SQLite schema
 * Resolution rows and run summaries only; catalog data is never stored here.
 */

import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

export function applySchema(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  db.pragma('synchronous = NORMAL');

  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL
    );

    -- One row per CLI invocation that touched the collection or the report
    CREATE TABLE IF NOT EXISTS runs (
      id            INTEGER PRIMARY KEY,
      command       TEXT NOT NULL,
      prefix        TEXT,
      started_at    TEXT NOT NULL DEFAULT (datetime('now')),
      finished_at   TEXT,
      images        INTEGER NOT NULL DEFAULT 0,
      matched       INTEGER NOT NULL DEFAULT 0,
      needs_review  INTEGER NOT NULL DEFAULT 0,
      added         INTEGER NOT NULL DEFAULT 0,
      filed         INTEGER NOT NULL DEFAULT 0,
      failures      INTEGER NOT NULL DEFAULT 0
    );

    -- Latest resolution per image; re-running intake overwrites
    CREATE TABLE IF NOT EXISTS matches (
      locator               TEXT PRIMARY KEY,          -- gs://bucket/path
      run_id                INTEGER NOT NULL REFERENCES runs(id),
      filename              TEXT NOT NULL,
      owner                 TEXT NOT NULL,
      status                TEXT NOT NULL,             -- matched | needs_review
      confidence            TEXT NOT NULL,
      method                TEXT NOT NULL,
      release_id            INTEGER,
      release_url           TEXT,
      is_target_format      INTEGER NOT NULL DEFAULT 0,
      is_preferred_region   INTEGER NOT NULL DEFAULT 0,
      candidate_source      TEXT NOT NULL,
      catalog_candidates    TEXT NOT NULL DEFAULT '[]', -- JSON array
      other_candidates      TEXT NOT NULL DEFAULT '[]', -- JSON array
      artist_hint           TEXT,
      album_hint            TEXT,
      best_guess_label      TEXT,
      reason                TEXT NOT NULL,
      error_message         TEXT,
      already_in_collection INTEGER NOT NULL DEFAULT 0,
      updated_at            TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_matches_run    ON matches(run_id);
    CREATE INDEX IF NOT EXISTS idx_matches_status ON matches(status);
  `);

  const row = db.prepare<[], { version: number }>('SELECT version FROM schema_version LIMIT 1').get();
  if (!row) {
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  }
}
