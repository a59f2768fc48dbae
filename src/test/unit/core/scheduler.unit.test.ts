import * as assert from 'assert';
import sinon from 'sinon';
import { JobScheduler } from '../../../core/scheduler.js';

suite('JobScheduler', () => {
  let clock: sinon.SinonFakeTimers | undefined;

  teardown(() => {
    clock?.restore();
    clock = undefined;
  });

  test('dequeues by priority, then enqueue time, then insertion order', () => {
    const scheduler = new JobScheduler();
    scheduler.enqueue('late-low', 5, 100);
    scheduler.enqueue('urgent', -1, 300);
    scheduler.enqueue('b', 0, 200);
    scheduler.enqueue('a', 0, 100);
    scheduler.enqueue('a2', 0, 100);

    const order: string[] = [];
    for (let id = scheduler.dequeue(); id !== undefined; id = scheduler.dequeue()) order.push(id);
    assert.deepStrictEqual(order, ['urgent', 'a', 'a2', 'b', 'late-low']);
  });

  test('ignores an id that is already queued', () => {
    const scheduler = new JobScheduler();
    scheduler.enqueue('x', 0, 1);
    scheduler.enqueue('x', -5, 0);
    assert.strictEqual(scheduler.size, 1);
    assert.strictEqual(scheduler.dequeue(), 'x');
    assert.strictEqual(scheduler.dequeue(), undefined);
  });

  test('remove drops an id without disturbing the rest', () => {
    const scheduler = new JobScheduler();
    scheduler.enqueue('a', 0, 1);
    scheduler.enqueue('b', 0, 2);
    assert.strictEqual(scheduler.remove('a'), true);
    assert.strictEqual(scheduler.remove('a'), false);
    assert.strictEqual(scheduler.has('a'), false);
    assert.strictEqual(scheduler.dequeue(), 'b');
    assert.strictEqual(scheduler.dequeue(), undefined);
  });

  test('an id removed and enqueued again takes its new position', () => {
    const scheduler = new JobScheduler();
    scheduler.enqueue('a', 0, 1);
    scheduler.enqueue('b', 0, 2);
    scheduler.remove('a');
    scheduler.enqueue('a', 0, 3);
    assert.strictEqual(scheduler.dequeue(), 'b');
    assert.strictEqual(scheduler.dequeue(), 'a');
    assert.strictEqual(scheduler.dequeue(), undefined);
  });

  test('compacts the heap when cancelled ids pile up', () => {
    const scheduler = new JobScheduler();
    scheduler.enqueue('keep', 0, 0);
    for (let i = 0; i < 100; i++) {
      scheduler.enqueue(`churn-${i}`, 0, i + 1);
      scheduler.remove(`churn-${i}`);
    }
    assert.strictEqual(scheduler.heapSize, 1);
    assert.strictEqual(scheduler.dequeue(), 'keep');
    assert.strictEqual(scheduler.dequeue(), undefined);
  });

  test('compaction keeps the queue order', () => {
    const scheduler = new JobScheduler();
    for (const [id, priority] of [['c', 3], ['a', 1], ['x', 0], ['y', 0], ['b', 2]] as const) {
      scheduler.enqueue(id, priority, 1);
    }
    scheduler.remove('x');
    scheduler.remove('y');
    scheduler.remove('c');
    assert.strictEqual(scheduler.heapSize, 2);
    assert.strictEqual(scheduler.dequeue(), 'a');
    assert.strictEqual(scheduler.dequeue(), 'b');
  });

  test('take resolves immediately when an id is ready', async () => {
    const scheduler = new JobScheduler();
    scheduler.enqueue('ready', 0, 1);
    assert.strictEqual(await scheduler.take(1000), 'ready');
  });

  test('take hands a later enqueue to the waiting caller', async () => {
    const scheduler = new JobScheduler();
    const pending = scheduler.take(1000);
    scheduler.enqueue('late', 0, 1);
    assert.strictEqual(await pending, 'late');
    assert.strictEqual(scheduler.size, 0);
  });

  test('waiters are served in arrival order', async () => {
    const scheduler = new JobScheduler();
    const first = scheduler.take(1000);
    const second = scheduler.take(1000);
    scheduler.enqueue('one', 0, 1);
    scheduler.enqueue('two', 0, 2);
    assert.deepStrictEqual(await Promise.all([first, second]), ['one', 'two']);
  });

  test('take resolves undefined after its idle timeout', async () => {
    clock = sinon.useFakeTimers();
    const scheduler = new JobScheduler();
    const pending = scheduler.take(500);
    await clock.tickAsync(500);
    assert.strictEqual(await pending, undefined);
  });

  test('take resolves undefined when its signal aborts', async () => {
    const scheduler = new JobScheduler();
    const controller = new AbortController();
    const pending = scheduler.take(10_000, controller.signal);
    controller.abort();
    assert.strictEqual(await pending, undefined);
    scheduler.enqueue('after', 0, 1);
    assert.strictEqual(scheduler.size, 1);
  });

  test('close releases waiters and rejects new ids', async () => {
    const scheduler = new JobScheduler();
    const pending = scheduler.take(10_000);
    scheduler.close();
    assert.strictEqual(await pending, undefined);
    scheduler.enqueue('x', 0, 1);
    assert.strictEqual(scheduler.has('x'), false);
  });

  test('holds a future readyAt back until it is due', async () => {
    clock = sinon.useFakeTimers({ now: 10_000 });
    const scheduler = new JobScheduler();
    scheduler.enqueue('retry', 0, 11_000, 11_000);
    scheduler.enqueue('fresh', 0, 10_500);

    assert.strictEqual(scheduler.delayedCount, 1);
    assert.strictEqual(scheduler.has('retry'), true);
    assert.strictEqual(scheduler.dequeue(), 'fresh');
    assert.strictEqual(scheduler.dequeue(), undefined);

    await clock.tickAsync(1000);
    assert.strictEqual(scheduler.delayedCount, 0);
    assert.strictEqual(scheduler.dequeue(), 'retry');
  });

  test('removing a delayed id cancels its promotion', async () => {
    clock = sinon.useFakeTimers({ now: 0 });
    const scheduler = new JobScheduler();
    scheduler.enqueue('retry', 0, 100, 100);
    assert.strictEqual(scheduler.remove('retry'), true);
    await clock.tickAsync(200);
    assert.strictEqual(scheduler.dequeue(), undefined);
  });
});
