import * as assert from 'assert';
import { retryJob } from '../../../cli/retry.js';
import type { CliContext } from '../../../cli/context.js';
import { parseConfig } from '../../../config.js';
import { JobConflictError } from '../../../core/errors.js';
import { ok } from '../../../core/executor.js';
import { silentLogger } from '../../../core/logger.js';
import { createTestEngine, newJob, type TestEngine } from '../../helpers.js';

suite('retry command', () => {
  let te: TestEngine;
  let ctx: CliContext;

  setup(() => {
    te = createTestEngine({ echo: async (p) => ok(p) });
    ctx = { config: parseConfig({}), db: te.db, engine: te.engine, logger: silentLogger };
  });

  teardown(() => {
    te.db.close();
  });

  function failedJob(id: string): void {
    te.store.create(newJob({ id, params: { page: 2 }, priority: 1 }));
    const started = '2024-05-01T10:00:01.000Z';
    te.store.compareAndSwap(id, 'queued', 'running', () => ({ worker_id: 'worker-1', started_at: started, last_heartbeat: started }));
    te.store.compareAndSwap(id, 'running', 'failed', () => ({
      worker_id: null,
      finished_at: '2024-05-01T10:00:02.000Z',
      error: 'page 2 returned 500',
    }));
  }

  test('queues a copy of a failed job', () => {
    failedJob('dead-1');
    const res = retryJob(ctx, 'dead-1');

    assert.strictEqual(res.replayed_from, 'dead-1');
    const copy = te.engine.getJob(res.job_id);
    assert.strictEqual(copy.status, 'queued');
    assert.strictEqual(copy.task_name, 'echo');
    assert.deepStrictEqual(copy.params, { page: 2 });
    assert.strictEqual(copy.priority, 1);
    assert.strictEqual(copy.retry_count, 0);
    assert.strictEqual(te.engine.scheduler.has(res.job_id), true);
    assert.strictEqual(te.engine.getJob('dead-1').status, 'failed');
  });

  test('refuses a job that is still queued', () => {
    te.store.create(newJob({ id: 'live-1' }));
    assert.throws(() => retryJob(ctx, 'live-1'), JobConflictError);
  });
});
