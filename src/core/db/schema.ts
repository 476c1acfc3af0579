import type Database from 'better-sqlite3';

export const SCHEMA_VERSION = 1;

export function initializeSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS runs (
      id TEXT PRIMARY KEY,
      root TEXT NOT NULL,
      rules_path TEXT NOT NULL,
      rules_hash TEXT NOT NULL,
      created_at TEXT NOT NULL DEFAULT (datetime('now')),
      files INTEGER NOT NULL DEFAULT 0,
      words INTEGER NOT NULL DEFAULT 0,
      characters INTEGER NOT NULL DEFAULT 0,
      failures INTEGER NOT NULL DEFAULT 0,
      mixed_alphanumeric INTEGER NOT NULL DEFAULT 0,
      repeated_characters INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS pattern_counts (
      run_id TEXT NOT NULL,
      scope TEXT NOT NULL,
      pattern TEXT NOT NULL,
      replacement TEXT NOT NULL,
      occurrences INTEGER NOT NULL,
      files INTEGER NOT NULL,
      PRIMARY KEY (run_id, scope, pattern),
      FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS pattern_era_counts (
      run_id TEXT NOT NULL,
      scope TEXT NOT NULL,
      pattern TEXT NOT NULL,
      era TEXT NOT NULL,
      occurrences INTEGER NOT NULL,
      PRIMARY KEY (run_id, scope, pattern, era),
      FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS era_totals (
      run_id TEXT NOT NULL,
      era TEXT NOT NULL,
      files INTEGER NOT NULL,
      words INTEGER NOT NULL,
      characters INTEGER NOT NULL,
      PRIMARY KEY (run_id, era),
      FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_runs_created ON runs(created_at);
    CREATE INDEX IF NOT EXISTS idx_pattern_counts_run ON pattern_counts(run_id);
  `);

  const version = db.prepare('SELECT MAX(version) as v FROM schema_version').get() as { v: number | null } | undefined;
  if (!version || version.v === null) {
    db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
  }
}
