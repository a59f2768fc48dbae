import type { Job } from './types.js';

export interface RetrySettings {
  /** When false a timed-out attempt is terminal. */
  retryTimeouts: boolean;
  /** Base delay for exponential backoff; 0 re-queues immediately. */
  retryBackoffMs: number;
  retryBackoffMaxMs: number;
}

export type RetryDecision =
  | { action: 'retry'; retryCount: number; delayMs: number }
  | { action: 'give_up' };

export function decideRetry(
  job: Pick<Job, 'retry_count' | 'max_retries' | 'cancel_requested'>,
  kind: 'execution' | 'timeout',
  settings: RetrySettings,
): RetryDecision {
  if (job.cancel_requested) return { action: 'give_up' };
  if (kind === 'timeout' && !settings.retryTimeouts) return { action: 'give_up' };
  if (job.retry_count >= job.max_retries) return { action: 'give_up' };

  const retryCount = job.retry_count + 1;
  return { action: 'retry', retryCount, delayMs: backoffDelay(retryCount, settings) };
}

export function backoffDelay(retryCount: number, settings: RetrySettings): number {
  if (settings.retryBackoffMs <= 0) return 0;
  const raw = settings.retryBackoffMs * Math.pow(2, retryCount - 1);
  return Math.min(raw, settings.retryBackoffMaxMs);
}
