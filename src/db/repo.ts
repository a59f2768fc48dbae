import type Database from 'better-sqlite3';
import type { DB } from './db.js';
import { HarvestError, StoreError, errorMessage } from '../core/errors.js';
import { assertJobShape, assertJobUpdate } from '../core/stateMachine.js';
import { isStale, type JobStore, type NewJob } from '../core/store.js';
import {
  JOB_STATUSES,
  isJsonObject,
  isJsonValue,
  type Job,
  type JobPatch,
  type JobStatus,
  type JsonValue,
} from '../core/types.js';

interface JobRow {
  id: string;
  task_name: string;
  params: string;
  priority: number;
  timeout_seconds: number;
  max_retries: number;
  retry_count: number;
  status: string;
  created_at: string;
  enqueued_at: string;
  started_at: string | null;
  finished_at: string | null;
  last_heartbeat: string | null;
  worker_id: string | null;
  result: string | null;
  error: string | null;
  cancel_requested: number;
}

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((s) => s === value);
}

function parseJson(text: string, what: string, id: string): JsonValue {
  const parsed: unknown = JSON.parse(text);
  if (!isJsonValue(parsed)) throw new StoreError(`Job ${id} has a corrupt ${what} column`);
  return parsed;
}

function rowToJob(row: JobRow): Job {
  if (!isJobStatus(row.status)) throw new StoreError(`Job ${row.id} has unknown status '${row.status}'`);
  const params = parseJson(row.params, 'params', row.id);
  if (!isJsonObject(params)) throw new StoreError(`Job ${row.id} params are not an object`);
  return {
    id: row.id,
    task_name: row.task_name,
    params,
    priority: row.priority,
    timeout_seconds: row.timeout_seconds,
    max_retries: row.max_retries,
    retry_count: row.retry_count,
    status: row.status,
    created_at: row.created_at,
    enqueued_at: row.enqueued_at,
    started_at: row.started_at,
    finished_at: row.finished_at,
    last_heartbeat: row.last_heartbeat,
    worker_id: row.worker_id,
    result: row.result === null ? null : parseJson(row.result, 'result', row.id),
    error: row.error,
    cancel_requested: row.cancel_requested !== 0,
  };
}

function jobToRow(job: Job): JobRow {
  return {
    ...job,
    params: JSON.stringify(job.params),
    result: job.result === null ? null : JSON.stringify(job.result),
    cancel_requested: job.cancel_requested ? 1 : 0,
  };
}

const COLUMNS = [
  'id',
  'task_name',
  'params',
  'priority',
  'timeout_seconds',
  'max_retries',
  'retry_count',
  'status',
  'created_at',
  'enqueued_at',
  'started_at',
  'finished_at',
  'last_heartbeat',
  'worker_id',
  'result',
  'error',
  'cancel_requested',
] as const;

/**
 * SQLite-backed JobStore. Every write that depends on a read runs inside an
 * IMMEDIATE transaction, so the conditional update is atomic across
 * connections and processes sharing the file.
 */
export class SqliteJobStore implements JobStore {
  private readonly insertStmt: Database.Statement;
  private readonly selectStmt: Database.Statement;
  private readonly updateStmt: Database.Statement;

  constructor(private readonly db: DB) {
    this.insertStmt = db.prepare(
      `INSERT INTO jobs(${COLUMNS.join(', ')}) VALUES (${COLUMNS.map((c) => '@' + c).join(', ')})`,
    );
    this.selectStmt = db.prepare('SELECT * FROM jobs WHERE id = ?');
    this.updateStmt = db.prepare(`
      UPDATE jobs SET
        ${COLUMNS.filter((c) => c !== 'id').map((c) => `${c} = @${c}`).join(',\n        ')}
      WHERE id = @id AND status = @expected
    `);
  }

  create(job: NewJob): string {
    const record: Job = {
      ...job,
      status: 'queued',
      retry_count: 0,
      started_at: null,
      finished_at: null,
      last_heartbeat: null,
      worker_id: null,
      result: null,
      error: null,
      cancel_requested: false,
    };
    assertJobShape(record);
    return this.guard('create', () => {
      this.insertStmt.run(jobToRow(record));
      return record.id;
    });
  }

  get(id: string): Job | undefined {
    return this.guard('get', () => {
      const row = this.selectStmt.get(id) as JobRow | undefined;
      return row ? rowToJob(row) : undefined;
    });
  }

  compareAndSwap(
    id: string,
    expected: JobStatus,
    next: JobStatus,
    mutate?: (job: Readonly<Job>) => JobPatch | null,
  ): boolean {
    return this.guard('compareAndSwap', () => {
      const tx = this.db.transaction(() => {
        const row = this.selectStmt.get(id) as JobRow | undefined;
        if (!row || row.status !== expected) return false;
        const current = rowToJob(row);
        const patch = mutate ? mutate(current) : {};
        if (patch === null) return false;
        const updated: Job = { ...current, ...patch, status: next };
        assertJobUpdate(current, updated);
        const res = this.updateStmt.run({ ...jobToRow(updated), expected });
        return res.changes === 1;
      });
      return tx.immediate();
    });
  }

  list(filter?: JobStatus | readonly JobStatus[], limit?: number): Job[] {
    const statuses = filter === undefined ? [] : typeof filter === 'string' ? [filter] : [...filter];
    const where = statuses.length ? `WHERE status IN (${statuses.map(() => '?').join(', ')})` : '';
    const cap = limit !== undefined && limit > 0 ? `LIMIT ${Math.floor(limit)}` : '';
    return this.guard('list', () => {
      const rows = this.db
        .prepare(`SELECT * FROM jobs ${where} ORDER BY created_at DESC, rowid DESC ${cap}`)
        .all(...statuses) as JobRow[];
      return rows.map(rowToJob);
    });
  }

  listQueued(): Job[] {
    return this.guard('listQueued', () => {
      const rows = this.db
        .prepare("SELECT * FROM jobs WHERE status = 'queued' ORDER BY priority ASC, enqueued_at ASC, rowid ASC")
        .all() as JobRow[];
      return rows.map(rowToJob);
    });
  }

  requestCancel(id: string): boolean {
    return this.guard('requestCancel', () => {
      const res = this.db
        .prepare("UPDATE jobs SET cancel_requested = 1 WHERE id = ? AND status IN ('queued', 'running')")
        .run(id);
      return res.changes > 0;
    });
  }

  touchHeartbeat(id: string, workerId: string, at: string): boolean {
    return this.guard('touchHeartbeat', () => {
      const res = this.db
        .prepare("UPDATE jobs SET last_heartbeat = ? WHERE id = ? AND status = 'running' AND worker_id = ?")
        .run(at, id, workerId);
      return res.changes > 0;
    });
  }

  countByStatus(): Record<JobStatus, number> {
    return this.guard('countByStatus', () => {
      const counts: Record<JobStatus, number> = {
        queued: 0,
        running: 0,
        completed: 0,
        failed: 0,
        cancelled: 0,
        timeout: 0,
      };
      const rows = this.db.prepare('SELECT status, COUNT(*) AS c FROM jobs GROUP BY status').all() as {
        status: string;
        c: number;
      }[];
      for (const row of rows) {
        if (isJobStatus(row.status)) counts[row.status] = row.c;
      }
      return counts;
    });
  }

  findStaleRunning(now: number, graceMs: number, heartbeatStaleMs: number): Job[] {
    return this.list('running').filter((job) => isStale(job, now, graceMs, heartbeatStaleMs));
  }

  ping(): void {
    this.guard('ping', () => this.db.prepare('SELECT 1').get());
  }

  private guard<T>(op: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof HarvestError) throw err;
      throw new StoreError(`Job store ${op} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
