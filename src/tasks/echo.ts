import { MAX_DELAY_MS, delay } from '../core/cancellation.js';
import { fail, ok, type TaskFunction } from '../core/executor.js';

/** Returns its params, optionally after `delay_ms`. Handy for smoke tests. */
export const echoTask: TaskFunction = async (params, token) => {
  const wait = params.delay_ms;
  if (wait !== undefined && (typeof wait !== 'number' || !Number.isFinite(wait) || wait < 0 || wait > MAX_DELAY_MS)) {
    return fail(`params.delay_ms must be a number between 0 and ${MAX_DELAY_MS}`);
  }
  if (typeof wait === 'number' && wait > 0) {
    if (!(await delay(wait, token))) token.throwIfCancellationRequested();
  }
  return ok(params);
};
