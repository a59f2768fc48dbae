import * as assert from 'assert';
import { backoffDelay, decideRetry, type RetrySettings } from '../../../core/retryPolicy.js';

const settings: RetrySettings = { retryTimeouts: false, retryBackoffMs: 0, retryBackoffMaxMs: 600_000 };

suite('decideRetry', () => {
  test('retries an execution failure while retries remain', () => {
    const decision = decideRetry({ retry_count: 0, max_retries: 2, cancel_requested: false }, 'execution', settings);
    assert.deepStrictEqual(decision, { action: 'retry', retryCount: 1, delayMs: 0 });
  });

  test('gives up once retry_count reaches max_retries', () => {
    const decision = decideRetry({ retry_count: 2, max_retries: 2, cancel_requested: false }, 'execution', settings);
    assert.deepStrictEqual(decision, { action: 'give_up' });
  });

  test('never retries with max_retries 0', () => {
    const decision = decideRetry({ retry_count: 0, max_retries: 0, cancel_requested: false }, 'execution', settings);
    assert.deepStrictEqual(decision, { action: 'give_up' });
  });

  test('timeouts are terminal unless retryTimeouts is on', () => {
    const job = { retry_count: 0, max_retries: 2, cancel_requested: false };
    assert.deepStrictEqual(decideRetry(job, 'timeout', settings), { action: 'give_up' });
    assert.deepStrictEqual(decideRetry(job, 'timeout', { ...settings, retryTimeouts: true }), {
      action: 'retry',
      retryCount: 1,
      delayMs: 0,
    });
  });

  test('a cancellation request stops retries', () => {
    const decision = decideRetry({ retry_count: 0, max_retries: 5, cancel_requested: true }, 'execution', settings);
    assert.deepStrictEqual(decision, { action: 'give_up' });
  });
});

suite('backoffDelay', () => {
  test('is zero without a base delay', () => {
    assert.strictEqual(backoffDelay(3, settings), 0);
  });

  test('doubles per retry up to the cap', () => {
    const s = { ...settings, retryBackoffMs: 1000, retryBackoffMaxMs: 5000 };
    assert.deepStrictEqual([1, 2, 3, 4].map((n) => backoffDelay(n, s)), [1000, 2000, 4000, 5000]);
  });
});
