import { v4 as uuidv4 } from 'uuid';
import { JobConflictError, JobNotFoundError, SubmissionError } from './errors.js';
import { cancelQueued } from './lifecycle.js';
import { silentLogger, type Logger } from './logger.js';
import { WorkerPool } from './pool.js';
import type { TaskRegistry } from './registry.js';
import { JobScheduler } from './scheduler.js';
import { DEFAULT_SETTINGS, type EngineSettings } from './settings.js';
import { isTerminal } from './stateMachine.js';
import { checkHealth, collectStats, jobView, type EngineStats, type HealthReport, type JobView } from './stats.js';
import type { JobStore } from './store.js';
import { OrphanSweeper, type SweepReport } from './sweeper.js';
import type { Job, JobStatus, SubmitRequest } from './types.js';
import { parseSubmitRequest } from './validation.js';

export const SERVICE_VERSION = '0.3.0';

export interface JobEngineOptions {
  store: JobStore;
  registry: TaskRegistry;
  maxWorkers?: number;
  settings?: Partial<EngineSettings>;
  logger?: Logger;
  /** Root of per-job output directories; null disables job log files. */
  dataRoot?: string | null;
  clock?: () => number;
}

export interface CancelResult {
  job_id: string;
  status: 'cancel_requested';
}

export interface ReplayResult {
  job_id: string;
  replayed_from: string;
}

export interface ListOptions {
  status?: JobStatus;
  limit?: number;
}

/**
 * Public face of the orchestration engine: submission, lookup, cancellation,
 * stats and lifecycle. The HTTP layer and the CLI both go through it.
 */
export class JobEngine {
  readonly store: JobStore;
  readonly registry: TaskRegistry;
  readonly settings: EngineSettings;
  readonly scheduler: JobScheduler;
  readonly pool: WorkerPool;
  readonly sweeper: OrphanSweeper;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly createdAt: number;
  private running = false;
  private stopped = false;

  constructor(options: JobEngineOptions) {
    this.store = options.store;
    this.registry = options.registry;
    this.settings = { ...DEFAULT_SETTINGS, ...options.settings };
    this.log = (options.logger ?? silentLogger).child('engine');
    this.now = options.clock ?? (() => Date.now());
    this.createdAt = this.now();
    this.scheduler = new JobScheduler(this.now);

    const logger = options.logger ?? silentLogger;
    this.pool = new WorkerPool(options.maxWorkers ?? 2, {
      store: this.store,
      scheduler: this.scheduler,
      registry: this.registry,
      settings: this.settings,
      logger,
      dataRoot: options.dataRoot ?? null,
      clock: this.now,
    });
    this.sweeper = new OrphanSweeper({
      store: this.store,
      scheduler: this.scheduler,
      settings: this.settings,
      logger,
      isActive: (id) => this.pool.isActive(id),
      clock: this.now,
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Validates and records a job, then queues it. Throws SubmissionError
   * before anything is written when the task is unknown or the body invalid.
   */
  submit(taskName: string, body: unknown): string {
    const resolved = this.resolveTask(taskName);
    const request = parseSubmitRequest(body);
    const id = this.record(resolved, request);
    this.log.info(`enqueued job ${id} for task '${resolved}' (priority ${request.priority})`);
    return id;
  }

  /**
   * Resubmits a failed or timed-out job as a new job with the same task,
   * params, priority, timeout and retry budget. The original stays as it is.
   */
  replay(id: string): ReplayResult {
    const original = this.getJob(id);
    if (original.status !== 'failed' && original.status !== 'timeout') {
      throw new JobConflictError(`Job ${id} is ${original.status}; only failed or timed-out jobs can be replayed`, id);
    }
    const resolved = this.resolveTask(original.task_name);
    const jobId = this.record(resolved, {
      params: original.params,
      priority: original.priority,
      timeout_seconds: original.timeout_seconds,
      max_retries: original.max_retries,
    });
    this.log.info(`replayed ${original.status} job ${id} as ${jobId}`);
    return { job_id: jobId, replayed_from: id };
  }

  private resolveTask(taskName: string): string {
    const resolved = this.registry.resolveName(taskName);
    if (resolved === undefined) {
      throw new SubmissionError(`Unknown task '${taskName}'`, 'unknown_task');
    }
    return resolved;
  }

  private record(taskName: string, request: SubmitRequest): string {
    const now = this.now();
    const stamp = new Date(now).toISOString();
    const id = this.store.create({
      id: uuidv4(),
      task_name: taskName,
      params: request.params,
      priority: request.priority,
      timeout_seconds: request.timeout_seconds,
      max_retries: request.max_retries,
      created_at: stamp,
      enqueued_at: stamp,
    });
    this.scheduler.enqueue(id, request.priority, now);
    return id;
  }

  getJob(id: string): Job {
    const job = this.store.get(id);
    if (!job) throw new JobNotFoundError(id);
    return job;
  }

  describeJob(id: string): JobView {
    return jobView(this.getJob(id), this.now());
  }

  listJobs(options: ListOptions = {}): Job[] {
    return this.store.list(options.status, options.limit);
  }

  /**
   * Requests cancellation. Queued jobs end immediately; running jobs are
   * flagged and their worker is told. Repeating it on a cancelled job is a
   * no-op; any other terminal status is a conflict.
   */
  cancel(id: string): CancelResult {
    const result: CancelResult = { job_id: id, status: 'cancel_requested' };
    const job = this.getJob(id);
    if (job.status === 'cancelled') return result;
    if (isTerminal(job.status)) {
      throw new JobConflictError(`Job ${id} already finished with status ${job.status}`, id);
    }

    if (job.status === 'queued' && cancelQueued(this.store, id, this.now())) {
      this.scheduler.remove(id);
      this.log.info(`cancelled queued job ${id}`);
      return result;
    }

    if (!this.store.requestCancel(id)) {
      // it finished between the read and the flag
      const current = this.getJob(id);
      if (current.status === 'cancelled') return result;
      throw new JobConflictError(`Job ${id} already finished with status ${current.status}`, id);
    }
    const pushed = this.pool.notifyCancel(id);
    this.log.info(`cancellation requested for job ${id}${pushed ? '' : ' (owner will poll)'}`);
    return result;
  }

  stats(): EngineStats {
    return collectStats(
      this.store,
      this.pool.snapshot(),
      { version: SERVICE_VERSION, startedAt: this.createdAt },
      this.now(),
    );
  }

  health(): HealthReport {
    return checkHealth(this.store, this.pool.snapshot());
  }

  sweep(): SweepReport {
    return this.sweeper.sweep();
  }

  tasks(): string[] {
    return this.registry.names();
  }

  /** Recovers orphans, rebuilds the queue from the store and starts the workers. */
  start(): void {
    if (this.running) return;
    if (this.stopped) throw new Error('A stopped engine cannot be restarted');
    const report = this.sweeper.sweep();
    const recovered = Object.keys(report.recovered).length;
    if (recovered > 0) this.log.warn(`recovered ${recovered} orphaned job(s) at startup`);
    this.pool.start();
    this.sweeper.start();
    this.running = true;
    this.log.info(`engine started with ${this.pool.snapshot().max_workers} worker(s)`);
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.stopped = true;
    this.sweeper.stop();
    await this.pool.stop();
    this.scheduler.close();
    this.log.info('engine stopped');
  }
}
