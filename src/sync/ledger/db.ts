import Database from "better-sqlite3";
import path from "path";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS sync_state (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  mode TEXT,
  watermark_changed_at TEXT,
  watermark_job_id INTEGER,
  full_scan_after_job_id INTEGER,
  full_scan_max_changed_at TEXT,
  full_scan_max_job_id INTEGER,
  last_run_at TEXT,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sync_lock (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  run_id TEXT NOT NULL,
  acquired_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sync_runs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL UNIQUE,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  mode TEXT NOT NULL,
  counts_json TEXT NOT NULL,
  failed_batches_json TEXT NOT NULL DEFAULT '[]',
  final_watermark_json TEXT,
  failure_json TEXT,
  status TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_runs_started ON sync_runs(started_at);
`;

/**
 * Open (or create) the state database. Pass ":memory:" for a throwaway store.
 */
export function openStateDatabase(location: string): Database.Database {
  const dbPath = location === ":memory:" ? location : path.resolve(location);
  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = FULL");
  db.exec(SCHEMA);
  return db;
}
