import type { Job, JobPatch, JobStatus } from './types.js';

export type NewJob = Omit<
  Job,
  'status' | 'retry_count' | 'started_at' | 'finished_at' | 'last_heartbeat' | 'worker_id' | 'result' | 'error' | 'cancel_requested'
>;

/**
 * Durable job records. Implementations must make compareAndSwap atomic with
 * respect to every other caller, including other processes sharing the
 * backend, and must report backend failures as StoreError.
 */
export interface JobStore {
  create(job: NewJob): string;
  get(id: string): Job | undefined;
  /**
   * Moves a job from `expected` to `next`, applying the mutator's patch in
   * the same atomic step. Returns false when the job is missing, its status
   * is not `expected`, or the mutator vetoes the swap by returning null.
   */
  compareAndSwap(
    id: string,
    expected: JobStatus,
    next: JobStatus,
    mutate?: (job: Readonly<Job>) => JobPatch | null,
  ): boolean;
  list(filter?: JobStatus | readonly JobStatus[], limit?: number): Job[];
  /** Queued jobs in dispatch order. */
  listQueued(): Job[];
  /** Flags a non-terminal job for cancellation. False when missing or terminal. */
  requestCancel(id: string): boolean;
  touchHeartbeat(id: string, workerId: string, at: string): boolean;
  countByStatus(): Record<JobStatus, number>;
  findStaleRunning(now: number, graceMs: number, heartbeatStaleMs: number): Job[];
  ping(): void;
}

/** started_at + timeout + grace has passed, or the heartbeat went quiet. */
export function isStale(job: Job, now: number, graceMs: number, heartbeatStaleMs: number): boolean {
  if (job.status !== 'running' || job.started_at === null) return false;
  const deadline = Date.parse(job.started_at) + job.timeout_seconds * 1000 + graceMs;
  if (deadline < now) return true;
  if (heartbeatStaleMs > 0) {
    const beat = Date.parse(job.last_heartbeat ?? job.started_at);
    if (beat + heartbeatStaleMs < now) return true;
  }
  return false;
}
