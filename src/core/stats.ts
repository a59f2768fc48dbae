import { errorMessage } from './errors.js';
import type { PoolSnapshot } from './pool.js';
import type { JobStore } from './store.js';
import type { Job, JobStatus } from './types.js';
import type { WorkerStatus } from './worker.js';

export interface RunningJobInfo {
  job_id: string;
  task_name: string;
  worker_id: string | null;
  started_at: string | null;
  elapsed_seconds: number;
  status_with_elapsed: string;
}

export interface EngineStats {
  timestamp: string;
  jobs: {
    total_queued: number;
    running_jobs_count: number;
    by_status: Record<JobStatus, number>;
    running_jobs: RunningJobInfo[];
  };
  workers: {
    worker_count: number;
    max_workers: number;
    healthy_workers: number;
    workers: WorkerStatus[];
  };
  service: {
    version: string;
    uptime_seconds: number;
  };
}

export type ComponentStatus = 'ok' | 'fail';

export interface HealthReport {
  status: 'ok' | 'degraded';
  components: {
    store: ComponentStatus;
    workers: ComponentStatus;
  };
  /** Why a component failed, plus the worker counts. */
  details: {
    store: string | null;
    workers: { healthy: number; total: number; error: string | null };
  };
}

export function formatElapsed(seconds: number): string {
  const s = Math.max(0, Math.floor(seconds));
  if (s < 60) return `${s}s`;
  if (s < 3600) return `${Math.floor(s / 60)}m ${s % 60}s`;
  return `${Math.floor(s / 3600)}h ${Math.floor((s % 3600) / 60)}m`;
}

export function elapsedSeconds(job: Pick<Job, 'started_at' | 'finished_at'>, now: number): number {
  if (job.started_at === null) return 0;
  const end = job.finished_at === null ? now : Date.parse(job.finished_at);
  return Math.max(0, Math.floor((end - Date.parse(job.started_at)) / 1000));
}

/** `running 1m 5s` while running, the bare status otherwise. */
export function statusWithElapsed(job: Job, now: number): string {
  if (job.status !== 'running') return job.status;
  return `running ${formatElapsed(elapsedSeconds(job, now))}`;
}

export function collectStats(
  store: JobStore,
  pool: PoolSnapshot,
  service: { version: string; startedAt: number },
  now: number,
): EngineStats {
  const byStatus = store.countByStatus();
  const running = store.list('running').map((job) => ({
    job_id: job.id,
    task_name: job.task_name,
    worker_id: job.worker_id,
    started_at: job.started_at,
    elapsed_seconds: elapsedSeconds(job, now),
    status_with_elapsed: statusWithElapsed(job, now),
  }));

  return {
    timestamp: new Date(now).toISOString(),
    jobs: {
      total_queued: byStatus.queued,
      running_jobs_count: byStatus.running,
      by_status: byStatus,
      running_jobs: running,
    },
    workers: {
      worker_count: pool.workers.length,
      max_workers: pool.max_workers,
      healthy_workers: pool.workers.filter((w) => w.healthy).length,
      workers: pool.workers,
    },
    service: {
      version: service.version,
      uptime_seconds: Math.max(0, Math.floor((now - service.startedAt) / 1000)),
    },
  };
}

export function checkHealth(store: JobStore, pool: PoolSnapshot): HealthReport {
  let storeError: string | null = null;
  try {
    store.ping();
  } catch (err) {
    storeError = errorMessage(err);
  }

  const healthy = pool.workers.filter((w) => w.healthy).length;
  const total = pool.workers.length;
  let workersError: string | null = null;
  if (!pool.started) workersError = 'worker pool is not running';
  else if (healthy < total) workersError = `${total - healthy} worker(s) unhealthy`;

  return {
    status: storeError === null && workersError === null ? 'ok' : 'degraded',
    components: {
      store: storeError === null ? 'ok' : 'fail',
      workers: workersError === null ? 'ok' : 'fail',
    },
    details: {
      store: storeError,
      workers: { healthy, total, error: workersError },
    },
  };
}

export interface JobView {
  job_id: string;
  task_name: string;
  status: JobStatus;
  status_with_elapsed: string;
  params: Job['params'];
  priority: number;
  created_at: string;
  started_at: string | null;
  finished_at: string | null;
  result?: Job['result'];
  error?: string;
  reliability_info: {
    retry_count: number;
    max_retries: number;
    worker_id: string | null;
    timeout_seconds: number;
    priority: number;
    cancel_requested: boolean;
    can_retry: boolean;
    is_expired: boolean;
  };
}

export function jobView(job: Job, now: number): JobView {
  const view: JobView = {
    job_id: job.id,
    task_name: job.task_name,
    status: job.status,
    status_with_elapsed: statusWithElapsed(job, now),
    params: job.params,
    priority: job.priority,
    created_at: job.created_at,
    started_at: job.started_at,
    finished_at: job.finished_at,
    reliability_info: {
      retry_count: job.retry_count,
      max_retries: job.max_retries,
      worker_id: job.worker_id,
      timeout_seconds: job.timeout_seconds,
      priority: job.priority,
      cancel_requested: job.cancel_requested,
      can_retry: job.retry_count < job.max_retries && (job.status === 'failed' || job.status === 'timeout'),
      is_expired: job.status === 'running' && elapsedSeconds(job, now) > job.timeout_seconds,
    },
  };
  if (job.result !== null) view.result = job.result;
  if (job.error !== null) view.error = job.error;
  return view;
}
