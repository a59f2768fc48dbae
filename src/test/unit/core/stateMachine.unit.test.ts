import * as assert from 'assert';
import { InvalidTransitionError } from '../../../core/errors.js';
import { assertJobShape, assertJobUpdate, canTransition, isTerminal } from '../../../core/stateMachine.js';
import type { Job } from '../../../core/types.js';

function queuedJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 'j1',
    task_name: 'echo',
    params: {},
    priority: 0,
    timeout_seconds: 10,
    max_retries: 1,
    retry_count: 0,
    status: 'queued',
    created_at: '2024-05-01T10:00:00.000Z',
    enqueued_at: '2024-05-01T10:00:00.000Z',
    started_at: null,
    finished_at: null,
    last_heartbeat: null,
    worker_id: null,
    result: null,
    error: null,
    cancel_requested: false,
    ...overrides,
  };
}

const running = queuedJob({
  status: 'running',
  worker_id: 'worker-1',
  started_at: '2024-05-01T10:00:01.000Z',
  last_heartbeat: '2024-05-01T10:00:01.000Z',
});

function rejects(fn: () => void, fragment: string): void {
  assert.throws(fn, (err: unknown) => err instanceof InvalidTransitionError && err.message.includes(fragment));
}

suite('job state machine', () => {
  test('allows only the documented transitions', () => {
    assert.strictEqual(canTransition('queued', 'running'), true);
    assert.strictEqual(canTransition('queued', 'cancelled'), true);
    assert.strictEqual(canTransition('queued', 'completed'), false);
    assert.strictEqual(canTransition('running', 'queued'), true);
    assert.strictEqual(canTransition('running', 'timeout'), true);
    assert.strictEqual(canTransition('completed', 'queued'), false);
    assert.strictEqual(canTransition('cancelled', 'running'), false);
  });

  test('terminal statuses have no way out', () => {
    assert.deepStrictEqual(
      (['queued', 'running', 'completed', 'failed', 'cancelled', 'timeout'] as const).filter(isTerminal),
      ['completed', 'failed', 'cancelled', 'timeout'],
    );
  });

  test('accepts a claim and a completion', () => {
    assert.doesNotThrow(() => assertJobUpdate(queuedJob(), running));
    assert.doesNotThrow(() =>
      assertJobUpdate(running, {
        ...running,
        status: 'completed',
        worker_id: null,
        finished_at: '2024-05-01T10:00:02.000Z',
        result: { ok: 1 },
      }),
    );
  });

  test('rejects skipping running', () => {
    rejects(
      () => assertJobUpdate(queuedJob(), queuedJob({ status: 'completed', finished_at: '2024-05-01T10:00:02.000Z' })),
      'queued -> completed is not allowed',
    );
  });

  test('rejects a running job without a worker', () => {
    rejects(() => assertJobShape({ ...running, worker_id: null }), 'worker_id must be set exactly while running');
  });

  test('rejects retry_count above max_retries', () => {
    rejects(() => assertJobShape(queuedJob({ retry_count: 2 })), 'retry_count 2 outside 0..1');
  });

  test('rejects a terminal job without finished_at', () => {
    rejects(() => assertJobShape(queuedJob({ status: 'failed' })), 'finished_at must be set exactly on terminal status');
  });

  test('rejects clearing a cancellation request', () => {
    rejects(
      () => assertJobUpdate({ ...running, cancel_requested: true }, { ...running, cancel_requested: false }),
      'cancel_requested cannot be cleared',
    );
  });

  test('rejects a decreasing retry_count', () => {
    rejects(
      () => assertJobUpdate({ ...running, retry_count: 1 }, { ...running, retry_count: 0 }),
      'retry_count cannot decrease',
    );
  });
});
