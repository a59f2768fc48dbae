import Database from 'better-sqlite3';
import path from 'node:path';

export type DB = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS jobs (
    id               TEXT PRIMARY KEY,
    task_name        TEXT NOT NULL,
    params           TEXT NOT NULL,
    priority         INTEGER NOT NULL DEFAULT 0,
    timeout_seconds  INTEGER NOT NULL,
    max_retries      INTEGER NOT NULL,
    retry_count      INTEGER NOT NULL DEFAULT 0,
    status           TEXT NOT NULL,
    created_at       TEXT NOT NULL,
    enqueued_at      TEXT NOT NULL,
    started_at       TEXT,
    finished_at      TEXT,
    last_heartbeat   TEXT,
    worker_id        TEXT,
    result           TEXT,
    error            TEXT,
    cancel_requested INTEGER NOT NULL DEFAULT 0,
    CHECK ((status = 'running') = (worker_id IS NOT NULL)),
    CHECK (retry_count BETWEEN 0 AND max_retries)
  );
  CREATE INDEX IF NOT EXISTS idx_jobs_queue ON jobs(status, priority, enqueued_at);
  CREATE TABLE IF NOT EXISTS config (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;

let _db: DB | null = null;

export function openDB(file: string): DB {
  const db = new Database(file);
  if (file !== ':memory:') db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.exec(SCHEMA);
  return db;
}

export function resolveDBPath(file = process.env.DB_PATH ?? 'harvestq.db'): string {
  return file === ':memory:' ? file : path.resolve(process.cwd(), file);
}

export function getDB(file?: string): DB {
  if (_db) return _db;
  _db = openDB(resolveDBPath(file));
  return _db;
}

export function closeDB(): void {
  if (!_db) return;
  _db.close();
  _db = null;
}
