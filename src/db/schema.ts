/**
 * Schema — CREATE TABLE statements. Idempotent; run on every open.
 */

import type { Database } from 'better-sqlite3'

export function applySchema(db: Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS score_cache (
      mechanism_id INTEGER NOT NULL,
      entity_id    TEXT NOT NULL,
      score        INTEGER NOT NULL,
      raw_score    INTEGER NOT NULL,
      components   TEXT NOT NULL,
      updated_at   INTEGER NOT NULL,
      PRIMARY KEY (mechanism_id, entity_id)
    );

    CREATE INDEX IF NOT EXISTS idx_score_cache_updated ON score_cache(updated_at);

    CREATE TABLE IF NOT EXISTS weight_submissions (
      id           INTEGER PRIMARY KEY AUTOINCREMENT,
      mechanism_id INTEGER NOT NULL,
      uids         TEXT NOT NULL,
      weights      TEXT NOT NULL,
      fingerprint  TEXT NOT NULL,
      status       TEXT NOT NULL,
      message      TEXT,
      submitted_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE INDEX IF NOT EXISTS idx_weight_submissions_mech
      ON weight_submissions(mechanism_id, id DESC);
  `)
}
