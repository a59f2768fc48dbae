import * as assert from 'assert';
import sinon from 'sinon';
import type { PoolSnapshot } from '../../../core/pool.js';
import { StoreError } from '../../../core/errors.js';
import { checkHealth, collectStats, formatElapsed, jobView, statusWithElapsed } from '../../../core/stats.js';
import type { Job } from '../../../core/types.js';
import type { WorkerStatus } from '../../../core/worker.js';
import { memoryStore, newJob } from '../../helpers.js';

const T0 = Date.parse('2024-05-01T10:00:00.000Z');

function worker(id: string, healthy: boolean): WorkerStatus {
  return {
    worker_id: id,
    state: 'idle',
    current_job: null,
    current_task: null,
    last_heartbeat: new Date(T0).toISOString(),
    jobs_processed: 0,
    healthy,
  };
}

function pool(workers: WorkerStatus[], started = true): PoolSnapshot {
  return { started, max_workers: 2, workers };
}

suite('stats', () => {
  test('formats elapsed time like the job status line', () => {
    assert.strictEqual(formatElapsed(42), '42s');
    assert.strictEqual(formatElapsed(65), '1m 5s');
    assert.strictEqual(formatElapsed(3725), '1h 2m');
    assert.strictEqual(formatElapsed(-3), '0s');
  });

  test('status_with_elapsed only decorates running jobs', () => {
    const { store } = memoryStore();
    store.create(newJob());
    const queued = store.get('job-1');
    assert.ok(queued);
    assert.strictEqual(statusWithElapsed(queued, T0), 'queued');

    const runningJob: Job = { ...queued, status: 'running', worker_id: 'worker-1', started_at: new Date(T0).toISOString() };
    assert.strictEqual(statusWithElapsed(runningJob, T0 + 90_000), 'running 1m 30s');
  });

  test('jobView reports reliability info', () => {
    const { store } = memoryStore();
    store.create(newJob({ timeout_seconds: 60, max_retries: 2 }));
    const base = store.get('job-1');
    assert.ok(base);

    const failed: Job = {
      ...base,
      status: 'failed',
      retry_count: 1,
      finished_at: new Date(T0 + 5000).toISOString(),
      started_at: new Date(T0).toISOString(),
      error: 'boom',
    };
    const view = jobView(failed, T0 + 10_000);
    assert.strictEqual(view.job_id, 'job-1');
    assert.strictEqual(view.error, 'boom');
    assert.strictEqual('result' in view, false);
    assert.deepStrictEqual(view.reliability_info, {
      retry_count: 1,
      max_retries: 2,
      worker_id: null,
      timeout_seconds: 60,
      priority: 0,
      cancel_requested: false,
      can_retry: true,
      is_expired: false,
    });

    const overdue: Job = { ...base, status: 'running', worker_id: 'worker-1', started_at: new Date(T0).toISOString() };
    assert.strictEqual(jobView(overdue, T0 + 61_000).reliability_info.is_expired, true);
    assert.strictEqual(jobView(overdue, T0 + 61_000).status_with_elapsed, 'running 1m 1s');
  });

  test('collectStats counts by status and attributes running jobs', () => {
    const { store } = memoryStore();
    store.create(newJob({ id: 'a' }));
    store.create(newJob({ id: 'b', task_name: 'crawl' }));
    const startedAt = new Date(T0).toISOString();
    assert.ok(store.compareAndSwap('b', 'queued', 'running', () => ({ worker_id: 'worker-2', started_at: startedAt })));

    const stats = collectStats(store, pool([worker('worker-1', true), worker('worker-2', false)]), { version: '9.9.9', startedAt: T0 - 30_000 }, T0 + 12_000);

    assert.strictEqual(stats.timestamp, new Date(T0 + 12_000).toISOString());
    assert.strictEqual(stats.jobs.total_queued, 1);
    assert.strictEqual(stats.jobs.running_jobs_count, 1);
    assert.deepStrictEqual(stats.jobs.by_status, { queued: 1, running: 1, completed: 0, failed: 0, cancelled: 0, timeout: 0 });
    assert.deepStrictEqual(stats.jobs.running_jobs, [
      {
        job_id: 'b',
        task_name: 'crawl',
        worker_id: 'worker-2',
        started_at: startedAt,
        elapsed_seconds: 12,
        status_with_elapsed: 'running 12s',
      },
    ]);
    assert.strictEqual(stats.workers.worker_count, 2);
    assert.strictEqual(stats.workers.max_workers, 2);
    assert.strictEqual(stats.workers.healthy_workers, 1);
    assert.deepStrictEqual(stats.service, { version: '9.9.9', uptime_seconds: 42 });
  });

  test('health is ok with a live store and healthy workers', () => {
    const { store } = memoryStore();
    assert.deepStrictEqual(checkHealth(store, pool([worker('worker-1', true)])), {
      status: 'ok',
      components: { store: 'ok', workers: 'ok' },
      details: { store: null, workers: { healthy: 1, total: 1, error: null } },
    });
  });

  test('health degrades when a worker is stale', () => {
    const { store } = memoryStore();
    const health = checkHealth(store, pool([worker('worker-1', true), worker('worker-2', false)]));
    assert.strictEqual(health.status, 'degraded');
    assert.deepStrictEqual(health.components, { store: 'ok', workers: 'fail' });
    assert.deepStrictEqual(health.details.workers, { healthy: 1, total: 2, error: '1 worker(s) unhealthy' });
  });

  test('health degrades when the pool is not running', () => {
    const { store } = memoryStore();
    const health = checkHealth(store, pool([], false));
    assert.strictEqual(health.status, 'degraded');
    assert.strictEqual(health.components.workers, 'fail');
    assert.strictEqual(health.details.workers.error, 'worker pool is not running');
  });

  test('health degrades when the store ping fails', () => {
    const { store } = memoryStore();
    sinon.stub(store, 'ping').throws(new StoreError('Job store ping failed: disk I/O error'));
    try {
      const health = checkHealth(store, pool([worker('worker-1', true)]));
      assert.strictEqual(health.status, 'degraded');
      assert.deepStrictEqual(health.components, { store: 'fail', workers: 'ok' });
      assert.strictEqual(health.details.store, 'Job store ping failed: disk I/O error');
    } finally {
      sinon.restore();
    }
  });
});
