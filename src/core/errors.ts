/**
 * Error hierarchy shared by the engine, the HTTP layer and the CLI.
 * Every error carries a stable `code` the API returns next to the message.
 */
export class HarvestError extends Error {
  constructor(message: string, readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type SubmissionReason = 'unknown_task' | 'invalid_request';

/** Rejected before a job record is created. */
export class SubmissionError extends HarvestError {
  constructor(message: string, readonly reason: SubmissionReason, readonly details: string[] = []) {
    super(message, reason === 'unknown_task' ? 'UNKNOWN_TASK' : 'INVALID_REQUEST');
  }
}

export class JobNotFoundError extends HarvestError {
  constructor(readonly jobId: string) {
    super(`Job ${jobId} not found`, 'JOB_NOT_FOUND');
  }
}

export class JobConflictError extends HarvestError {
  constructor(message: string, readonly jobId: string) {
    super(message, 'JOB_CONFLICT');
  }
}

export class ExecutionError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'EXECUTION_FAILED', options);
  }
}

export class JobTimeoutError extends HarvestError {
  constructor(readonly timeoutSeconds: number) {
    super(`Job timed out after ${timeoutSeconds} seconds`, 'JOB_TIMEOUT');
  }
}

export class CancellationError extends HarvestError {
  constructor(message = 'Job cancelled') {
    super(message, 'JOB_CANCELLED');
  }
}

/** The persistence backend failed; callers must not assume the write happened. */
export class StoreError extends HarvestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORE_UNAVAILABLE', options);
  }
}

export class InvalidTransitionError extends HarvestError {
  constructor(message: string) {
    super(message, 'INVALID_TRANSITION');
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
