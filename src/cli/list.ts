import { statusWithElapsed } from '../core/stats.js';
import { JOB_STATUSES, type JobStatus } from '../core/types.js';
import type { CliContext } from './context.js';
import { intOption } from './context.js';

function parseStatus(raw: string | undefined): JobStatus | undefined {
  if (raw === undefined) return undefined;
  const status = JOB_STATUSES.find((s) => s === raw);
  if (!status) throw new Error(`--status must be one of ${JOB_STATUSES.join('|')}`);
  return status;
}

export function printList(ctx: CliContext, opts: { status?: string; limit?: string }): void {
  const now = Date.now();
  const jobs = ctx.engine.listJobs({ status: parseStatus(opts.status), limit: intOption('limit', opts.limit) ?? 20 });
  if (jobs.length === 0) {
    console.log('No jobs');
    return;
  }
  console.table(
    jobs.map((job) => ({
      id: job.id,
      task: job.task_name,
      status: statusWithElapsed(job, now),
      priority: job.priority,
      retries: `${job.retry_count}/${job.max_retries}`,
      created_at: job.created_at,
      error: job.error ? job.error.slice(0, 60) : '',
    })),
  );
}
