import { isJsonObject, type JsonObject } from '../core/types.js';
import type { CliContext } from './context.js';
import { intOption } from './context.js';

export interface EnqueueOptions {
  priority?: string;
  timeout?: string;
  retries?: string;
}

/** Submits a job from the command line; returns its id. */
export function enqueue(ctx: CliContext, task: string, paramsJson: string | undefined, opts: EnqueueOptions): string {
  let params: JsonObject = {};
  if (paramsJson !== undefined) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(paramsJson);
    } catch {
      throw new Error('Invalid JSON for job params.');
    }
    if (!isJsonObject(parsed)) throw new Error('Job params must be a JSON object.');
    params = parsed;
  }

  const body: Record<string, unknown> = { params };
  const priority = intOption('priority', opts.priority);
  const timeout = intOption('timeout', opts.timeout);
  const retries = intOption('retries', opts.retries);
  if (priority !== undefined) body.priority = priority;
  if (timeout !== undefined) body.timeout_seconds = timeout;
  if (retries !== undefined) body.max_retries = retries;

  return ctx.engine.submit(task, body);
}
