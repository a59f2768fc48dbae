import { formatElapsed, jobView } from '../core/stats.js';
import type { CliContext } from './context.js';
import { printJson } from './context.js';

export function printStatus(ctx: CliContext, id: string): void {
  printJson(jobView(ctx.engine.getJob(id), Date.now()));
}

export function printStats(ctx: CliContext): void {
  const stats = ctx.engine.stats();
  const rows = Object.entries(stats.jobs.by_status).map(([status, count]) => ({ status, count }));
  console.table(rows);
  for (const job of stats.jobs.running_jobs) {
    console.log(`  ${job.job_id} ${job.task_name} on ${job.worker_id ?? '?'} for ${formatElapsed(job.elapsed_seconds)}`);
  }
}
