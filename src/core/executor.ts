import type { CancellationToken } from './cancellation.js';
import { CancellationError, JobTimeoutError, errorMessage } from './errors.js';
import type { Logger } from './logger.js';
import { isJsonValue, type JsonObject, type JsonValue } from './types.js';

export type FailureKind = 'execution' | 'timeout' | 'cancelled';

export type TaskOutcome =
  | { ok: true; value: JsonValue }
  | { ok: false; kind: FailureKind; message: string };

export function ok(value: JsonValue): TaskOutcome {
  return { ok: true, value };
}

export function fail(message: string, kind: FailureKind = 'execution'): TaskOutcome {
  return { ok: false, kind, message };
}

export interface TaskContext {
  jobId: string;
  workerId: string;
  /** 1-based attempt number */
  attempt: number;
  log: Logger;
  /** Per-job artifact directory, or null when no data root is configured. */
  outputDir: string | null;
}

export interface TaskExecutor {
  execute(params: JsonObject, token: CancellationToken, context: TaskContext): Promise<TaskOutcome>;
}

export type TaskFunction = TaskExecutor['execute'];

/**
 * Invokes an executor and folds whatever it does (resolve, reject, sync throw,
 * non-JSON result) into a TaskOutcome.
 */
export async function invokeExecutor(
  executor: TaskExecutor,
  params: JsonObject,
  token: CancellationToken,
  context: TaskContext,
): Promise<TaskOutcome> {
  try {
    const outcome = await executor.execute(params, token, context);
    if (outcome.ok && !isJsonValue(outcome.value)) {
      return fail('Task returned a result that is not JSON-serializable');
    }
    return outcome;
  } catch (err) {
    if (err instanceof JobTimeoutError) return fail(err.message, 'timeout');
    if (err instanceof CancellationError) return fail(err.message, 'cancelled');
    return fail(errorMessage(err));
  }
}
