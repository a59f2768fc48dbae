#!/usr/bin/env node
import { Command } from 'commander';
import { SERVICE_VERSION } from '../core/engine.js';
import { errorMessage } from '../core/errors.js';
import { closeDB } from '../db/db.js';
import { getConfigView, setConfigKV, unsetConfigKey } from './config_cmd.js';
import { openContext, printJson, type CliContext } from './context.js';
import { enqueue } from './enqueue.js';
import { printList } from './list.js';
import { retryJob } from './retry.js';
import { serve } from './serve_cmd.js';
import { printStats, printStatus } from './status.js';

/** Runs a one-shot command against the database and closes it afterwards. */
function withContext(fn: (ctx: CliContext) => void): void {
  try {
    fn(openContext());
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    closeDB();
  }
}

const program = new Command();

program
  .name('harvestq')
  .description('Scraping job orchestrator with priorities, timeouts, retries and cancellation')
  .version(SERVICE_VERSION);

program
  .command('serve')
  .description('start the worker pool and the HTTP API')
  .option('--workers <n>', 'number of workers (default MAX_WORKERS)')
  .option('--port <port>', 'HTTP port (default PORT)')
  .option('--host <host>', 'interface to bind')
  .action(async (opts: { workers?: string; port?: string; host?: string }) => {
    await serve(opts);
  });

program
  .command('enqueue')
  .argument('<task>', 'registered task name')
  .argument('[params]', 'job params as a JSON object')
  .option('--priority <n>', 'lower runs first (default 0)')
  .option('--timeout <seconds>', 'per-attempt timeout (default 300)')
  .option('--retries <n>', 'max retries (default 2)')
  .action((task: string, params: string | undefined, opts: { priority?: string; timeout?: string; retries?: string }) =>
    withContext((ctx) => {
      const id = enqueue(ctx, task, params, opts);
      console.log(`✅ Enqueued job ${id} (${task})`);
    }),
  );

program
  .command('status')
  .argument('<id>')
  .action((id: string) => withContext((ctx) => printStatus(ctx, id)));

program
  .command('list')
  .option('--status <status>', 'queued|running|completed|failed|cancelled|timeout')
  .option('--limit <n>', 'maximum rows (default 20)')
  .action((opts: { status?: string; limit?: string }) => withContext((ctx) => printList(ctx, opts)));

program
  .command('cancel')
  .argument('<id>')
  .action((id: string) =>
    withContext((ctx) => {
      const res = ctx.engine.cancel(id);
      const job = ctx.engine.getJob(id);
      console.log(`✅ ${res.status} for job ${id} (now ${job.status})`);
    }),
  );

program
  .command('retry')
  .description('resubmit a failed or timed-out job as a new job')
  .argument('<id>')
  .action((id: string) =>
    withContext((ctx) => {
      const res = retryJob(ctx, id);
      console.log(`✅ Re-enqueued job ${id} as ${res.job_id}`);
    }),
  );

program
  .command('stats')
  .action(() => withContext((ctx) => printStats(ctx)));

program
  .command('sweep')
  .description('recover orphaned running jobs')
  .action(() =>
    withContext((ctx) => {
      const report = ctx.engine.sweeper.recoverOrphans();
      const ids = Object.keys(report);
      if (ids.length === 0) console.log('No orphaned jobs');
      for (const id of ids) console.log(`${id} -> ${report[id]}`);
    }),
  );

const config = program.command('config');
config.command('get').action(() => withContext((ctx) => printJson(getConfigView(ctx.db))));
config
  .command('set')
  .argument('<key>')
  .argument('<value>')
  .action((key: string, value: string) =>
    withContext((ctx) => {
      setConfigKV(ctx.db, key, value);
      console.log('OK');
    }),
  );
config
  .command('unset')
  .argument('<key>')
  .action((key: string) =>
    withContext((ctx) => {
      console.log(unsetConfigKey(ctx.db, key) ? 'OK' : `${key} was not set`);
    }),
  );

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`❌ ${errorMessage(err)}`);
  process.exit(1);
});
