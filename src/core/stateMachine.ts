import { InvalidTransitionError } from './errors.js';
import type { Job, JobStatus, TerminalStatus } from './types.js';

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ['running', 'cancelled'],
  running: ['completed', 'failed', 'cancelled', 'timeout', 'queued'],
  completed: [],
  failed: [],
  cancelled: [],
  timeout: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): status is TerminalStatus {
  return TRANSITIONS[status].length === 0;
}

/**
 * Checks a proposed write against the job invariants. Throws
 * InvalidTransitionError on the first violation.
 */
export function assertJobUpdate(before: Job, after: Job): void {
  const id = before.id;
  if (before.status !== after.status && !canTransition(before.status, after.status)) {
    throw new InvalidTransitionError(`Job ${id}: ${before.status} -> ${after.status} is not allowed`);
  }
  if (after.id !== id || after.task_name !== before.task_name || after.created_at !== before.created_at) {
    throw new InvalidTransitionError(`Job ${id}: identity fields are immutable`);
  }
  assertJobShape(after);
  if (after.retry_count < before.retry_count) {
    throw new InvalidTransitionError(`Job ${id}: retry_count cannot decrease`);
  }
  if (before.cancel_requested && !after.cancel_requested) {
    throw new InvalidTransitionError(`Job ${id}: cancel_requested cannot be cleared`);
  }
}

/** Invariants that hold for any single job record. */
export function assertJobShape(job: Job): void {
  const id = job.id;
  if ((job.status === 'running') !== (job.worker_id !== null)) {
    throw new InvalidTransitionError(`Job ${id}: worker_id must be set exactly while running`);
  }
  if (job.retry_count < 0 || job.retry_count > job.max_retries) {
    throw new InvalidTransitionError(`Job ${id}: retry_count ${job.retry_count} outside 0..${job.max_retries}`);
  }
  if (isTerminal(job.status) !== (job.finished_at !== null)) {
    throw new InvalidTransitionError(`Job ${id}: finished_at must be set exactly on terminal status`);
  }
  if (job.status !== 'completed' && job.result !== null) {
    throw new InvalidTransitionError(`Job ${id}: result is only kept for completed jobs`);
  }
}
