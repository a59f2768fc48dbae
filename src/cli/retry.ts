import type { ReplayResult } from '../core/engine.js';
import type { CliContext } from './context.js';

/** Resubmits a failed or timed-out job; the new job starts with a fresh retry budget. */
export function retryJob(ctx: CliContext, id: string): ReplayResult {
  return ctx.engine.replay(id);
}
