/**
 * SQLite schema migrations for store-router.
 * Creates all required tables if they do not already exist (idempotent).
 */

import Database from 'better-sqlite3';

/** Current schema version */
const SCHEMA_VERSION = '1';

/**
 * Run all migrations against the provided database instance.
 * Safe to call multiple times: all DDL statements use IF NOT EXISTS.
 */
export function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS validation_runs (
      id               INTEGER PRIMARY KEY,
      phase            TEXT    NOT NULL,
      corpus           TEXT    NOT NULL,
      rule_set_name    TEXT,
      rule_set_version TEXT,
      extractor        TEXT,
      match_mode       TEXT    NOT NULL,
      started_at       TEXT    NOT NULL,
      duration_ms      REAL    NOT NULL,
      total            INTEGER NOT NULL,
      passed           INTEGER NOT NULL,
      accuracy         REAL    NOT NULL,
      threshold        REAL,
      gate_passed      INTEGER,
      report_json      TEXT    NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_validation_runs_started
      ON validation_runs(started_at DESC);

    CREATE TABLE IF NOT EXISTS schema_meta (
      key   TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);

  db.prepare<[string, string]>(
    `INSERT INTO schema_meta (key, value) VALUES (?, ?)
     ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
  ).run('schema_version', SCHEMA_VERSION);
}

export function getSchemaVersion(db: Database.Database): string | null {
  const row = db
    .prepare<[string], { value: string }>('SELECT value FROM schema_meta WHERE key = ?')
    .get('schema_version');
  return row ? row.value : null;
}
