import fs from 'node:fs';
import path from 'node:path';
import { CancellationSource, type CancelReason } from './cancellation.js';
import { StoreError, errorMessage } from './errors.js';
import { invokeExecutor, type TaskContext, type TaskOutcome } from './executor.js';
import { cancelQueued, finishAttempt, type AttemptEnd } from './lifecycle.js';
import { teeToFile, type Logger } from './logger.js';
import type { TaskRegistry } from './registry.js';
import type { JobScheduler } from './scheduler.js';
import type { EngineSettings } from './settings.js';
import type { JobStore } from './store.js';
import type { Job } from './types.js';

export type WorkerState = 'idle' | 'busy' | 'stopped' | 'crashed';

export interface WorkerStatus {
  worker_id: string;
  state: WorkerState;
  current_job: string | null;
  current_task: string | null;
  last_heartbeat: string;
  jobs_processed: number;
  healthy: boolean;
}

export interface WorkerDeps {
  store: JobStore;
  scheduler: JobScheduler;
  registry: TaskRegistry;
  settings: EngineSettings;
  logger: Logger;
  /** Root of per-job output directories; null keeps job logs on the console only. */
  dataRoot: string | null;
  clock?: () => number;
}

interface ActiveAttempt {
  job: Job;
  source: CancellationSource;
}

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });
}

/** Resolves true if `promise` settled within `ms`. */
async function settledWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  try {
    return await Promise.race([promise.then(() => true), expired]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * One sequential consumer: take an id, claim it, run it under a deadline and
 * write exactly one transition out of `running`.
 */
export class Worker {
  private state: WorkerState = 'idle';
  private active: ActiveAttempt | null = null;
  private lastBeat: number;
  private processed = 0;
  private loop: Promise<void> | null = null;
  private readonly stopController = new AbortController();
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(readonly id: string, private readonly deps: WorkerDeps) {
    this.now = deps.clock ?? (() => Date.now());
    this.lastBeat = this.now();
    this.log = deps.logger.child(id);
  }

  start(): void {
    if (this.loop) return;
    this.loop = this.run().then(
      () => {
        this.state = 'stopped';
      },
      (err: unknown) => {
        this.state = 'crashed';
        this.active = null;
        this.log.error(`loop crashed: ${errorMessage(err)}`);
      },
    );
  }

  /** Stops intake; the current attempt runs on. Resolves when the loop exits. */
  async stop(): Promise<void> {
    this.stopController.abort();
    await this.loop;
  }

  /** Signals the current attempt with reason `shutdown`. */
  abort(): void {
    this.active?.source.cancel('shutdown');
  }

  /** Pushes a cancellation to the attempt running `jobId`, if this worker has it. */
  notifyCancel(jobId: string): boolean {
    if (this.active?.job.id !== jobId) return false;
    return this.active.source.cancel('cancelled');
  }

  isRunning(jobId: string): boolean {
    return this.active?.job.id === jobId;
  }

  get crashed(): boolean {
    return this.state === 'crashed';
  }

  status(): WorkerStatus {
    const now = this.now();
    const alive = this.state === 'idle' || this.state === 'busy';
    return {
      worker_id: this.id,
      state: this.state,
      current_job: this.active?.job.id ?? null,
      current_task: this.active?.job.task_name ?? null,
      last_heartbeat: new Date(this.lastBeat).toISOString(),
      jobs_processed: this.processed,
      healthy: alive && now - this.lastBeat <= this.deps.settings.workerStaleMs,
    };
  }

  private beat(): void {
    this.lastBeat = this.now();
  }

  private async run(): Promise<void> {
    const { scheduler, settings } = this.deps;
    const signal = this.stopController.signal;

    while (!signal.aborted) {
      this.beat();
      const id = await scheduler.take(settings.pollIntervalMs, signal);
      if (id === undefined) continue;

      try {
        const job = this.claim(id);
        if (job) await this.process(job);
      } catch (err) {
        if (!(err instanceof StoreError)) {
          this.requeue(id);
          throw err;
        }
        this.log.error(`store unavailable while handling job ${id}: ${err.message}`);
        await pause(settings.errorBackoffMs, signal);
        this.requeue(id);
      }
    }
  }

  /** Puts an id the scheduler already handed out back in line if the job is still queued. */
  private requeue(id: string): void {
    try {
      const job = this.deps.store.get(id);
      if (job?.status === 'queued') this.deps.scheduler.enqueue(id, job.priority, Date.parse(job.enqueued_at));
    } catch (err) {
      this.log.warn(`could not requeue job ${id}, leaving it to reconciliation: ${errorMessage(err)}`);
    }
  }

  private claim(id: string): Job | null {
    const { store } = this.deps;
    const now = this.now();
    const startedAt = new Date(now).toISOString();
    const won = store.compareAndSwap(id, 'queued', 'running', (job) =>
      job.cancel_requested ? null : { worker_id: this.id, started_at: startedAt, last_heartbeat: startedAt },
    );
    if (won) return store.get(id) ?? null;

    const current = store.get(id);
    if (current?.status === 'queued' && current.cancel_requested && cancelQueued(store, id, now)) {
      this.log.info(`job ${id} cancelled before it started`);
    } else {
      this.log.debug(`lost claim on job ${id}`);
    }
    return null;
  }

  private async process(job: Job): Promise<void> {
    const source = new CancellationSource(job.timeout_seconds);
    this.state = 'busy';
    this.active = { job, source };
    try {
      const end = await this.execute(job, source);
      if (end === null) {
        this.log.warn(`job ${job.id} left running after shutdown`);
        return;
      }
      const status = finishAttempt(this.deps.store, this.deps.scheduler, job, end, this.deps.settings, this.now());
      if (status === null) this.log.warn(`lost ownership of job ${job.id} before it could be finalized`);
      else this.log.info(`job ${job.id} (${job.task_name}) -> ${status}`);
    } finally {
      this.active = null;
      this.state = 'idle';
      this.processed++;
      this.beat();
    }
  }

  /** Null when the attempt was abandoned by a shutdown. */
  private async execute(job: Job, source: CancellationSource): Promise<AttemptEnd | null> {
    const { registry, settings } = this.deps;
    const executor = registry.get(job.task_name);
    if (!executor) {
      return { status: 'failed', message: `Unknown task '${job.task_name}'`, retryable: false };
    }

    const context = this.contextFor(job);
    const deadline = setTimeout(() => source.cancel('timeout'), job.timeout_seconds * 1000);
    const heartbeat = setInterval(() => this.heartbeat(job), settings.heartbeatIntervalMs);
    const cancelPoll = setInterval(() => this.pollCancel(job, source), settings.cancelPollMs);

    context.log.info(`attempt ${context.attempt} started`);
    const running = invokeExecutor(executor, job.params, source.token, context);
    try {
      const first = await Promise.race([
        running.then((outcome) => ({ settled: true as const, outcome })),
        source.whenCancelled().then((reason) => ({ settled: false as const, reason })),
      ]);

      if (!first.settled) {
        if (!(await settledWithin(running, settings.graceMs))) {
          context.log.warn(`executor ignored ${first.reason} for ${settings.graceMs}ms; abandoning it`);
        }
        return this.endFor(first.reason, job);
      }
      if (source.reason !== null) return this.endFor(source.reason, job);
      return this.endFromOutcome(first.outcome, context);
    } finally {
      clearTimeout(deadline);
      clearInterval(heartbeat);
      clearInterval(cancelPoll);
    }
  }

  private endFor(reason: CancelReason, job: Job): AttemptEnd | null {
    switch (reason) {
      case 'shutdown':
        return null;
      case 'timeout':
        return { status: 'timeout', message: `Job timed out after ${job.timeout_seconds} seconds` };
      case 'cancelled':
        return { status: 'cancelled', message: 'Job cancelled' };
    }
  }

  private endFromOutcome(outcome: TaskOutcome, context: TaskContext): AttemptEnd {
    if (outcome.ok) {
      context.log.info('attempt completed');
      return { status: 'completed', value: outcome.value };
    }
    context.log.warn(`attempt ${outcome.kind === 'execution' ? 'failed' : outcome.kind}: ${outcome.message}`);
    switch (outcome.kind) {
      case 'timeout':
        return { status: 'timeout', message: outcome.message };
      case 'cancelled':
        return { status: 'cancelled', message: outcome.message };
      case 'execution':
        return { status: 'failed', message: outcome.message, retryable: true };
    }
  }

  private contextFor(job: Job): TaskContext {
    const base = this.log.child(job.id);
    let log = base;
    let outputDir: string | null = null;
    if (this.deps.dataRoot !== null) {
      const dir = path.join(this.deps.dataRoot, job.task_name, job.id);
      try {
        fs.mkdirSync(dir, { recursive: true });
        outputDir = dir;
        log = teeToFile(base, path.join(dir, 'job.log'));
      } catch (err) {
        base.warn(`cannot create output directory ${dir}: ${errorMessage(err)}`);
      }
    }
    return { jobId: job.id, workerId: this.id, attempt: job.retry_count + 1, log, outputDir };
  }

  private heartbeat(job: Job): void {
    this.beat();
    try {
      this.deps.store.touchHeartbeat(job.id, this.id, new Date(this.now()).toISOString());
    } catch (err) {
      this.log.warn(`heartbeat for job ${job.id} failed: ${errorMessage(err)}`);
    }
  }

  private pollCancel(job: Job, source: CancellationSource): void {
    try {
      if (this.deps.store.get(job.id)?.cancel_requested) source.cancel('cancelled');
    } catch (err) {
      this.log.warn(`cancel poll for job ${job.id} failed: ${errorMessage(err)}`);
    }
  }
}
