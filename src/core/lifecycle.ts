import { decideRetry, type RetrySettings } from './retryPolicy.js';
import type { JobScheduler } from './scheduler.js';
import type { JobStore } from './store.js';
import type { Job, JobPatch, JobStatus, JsonValue } from './types.js';

/** How a single attempt ended, before retry policy is applied. */
export type AttemptEnd =
  | { status: 'completed'; value: JsonValue }
  | { status: 'cancelled'; message: string }
  | { status: 'timeout'; message: string }
  | { status: 'failed'; message: string; retryable: boolean };

interface Plan {
  status: JobStatus;
  patch: JobPatch;
  /** set when the job goes back to the queue */
  readyAt?: number;
}

function iso(ms: number): string {
  return new Date(ms).toISOString();
}

function plan(current: Readonly<Job>, end: AttemptEnd, settings: RetrySettings, now: number): Plan {
  const done = { worker_id: null, finished_at: iso(now) };

  if (current.cancel_requested || end.status === 'cancelled') {
    const message = end.status === 'cancelled' ? end.message : 'Job cancelled';
    return { status: 'cancelled', patch: { ...done, cancel_requested: true, result: null, error: message } };
  }
  if (end.status === 'completed') {
    return { status: 'completed', patch: { ...done, result: end.value, error: null } };
  }

  const retryable = end.status === 'timeout' || end.retryable;
  const decision = retryable
    ? decideRetry(current, end.status === 'timeout' ? 'timeout' : 'execution', settings)
    : { action: 'give_up' as const };

  if (decision.action === 'retry') {
    const readyAt = now + decision.delayMs;
    return {
      status: 'queued',
      readyAt,
      patch: {
        worker_id: null,
        started_at: null,
        last_heartbeat: null,
        retry_count: decision.retryCount,
        enqueued_at: iso(readyAt),
        error: end.message,
      },
    };
  }
  return { status: end.status, patch: { ...done, error: end.message } };
}

/**
 * Applies exactly one transition out of `running` for the attempt described
 * by `attempt` (the record as it was claimed). The swap only goes through
 * while the same worker still owns the same attempt, and a cancellation flag
 * always wins. Returns the new status, or null when ownership was lost.
 */
export function finishAttempt(
  store: JobStore,
  scheduler: JobScheduler,
  attempt: Readonly<Job>,
  end: AttemptEnd,
  settings: RetrySettings,
  now: number,
): JobStatus | null {
  const owns = (job: Readonly<Job>) =>
    job.status === 'running' && job.worker_id === attempt.worker_id && job.started_at === attempt.started_at;

  // a concurrent cancel request changes the plan, so re-plan and try again
  for (let round = 0; round < 3; round++) {
    const current = store.get(attempt.id);
    if (!current || !owns(current)) return null;

    const next = plan(current, end, settings, now);
    const swapped = store.compareAndSwap(attempt.id, 'running', next.status, (job) =>
      owns(job) && job.cancel_requested === current.cancel_requested ? next.patch : null,
    );
    if (!swapped) continue;

    if (next.readyAt !== undefined) {
      scheduler.enqueue(attempt.id, current.priority, next.readyAt, next.readyAt);
    }
    return next.status;
  }
  return null;
}

/** queued -> cancelled, never passing through running. */
export function cancelQueued(store: JobStore, id: string, now: number, message = 'Job cancelled before it started'): boolean {
  return store.compareAndSwap(id, 'queued', 'cancelled', () => ({
    cancel_requested: true,
    finished_at: iso(now),
    error: message,
  }));
}
