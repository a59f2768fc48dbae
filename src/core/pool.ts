import type { Logger } from './logger.js';
import { Worker, type WorkerDeps, type WorkerStatus } from './worker.js';

export interface PoolSnapshot {
  started: boolean;
  max_workers: number;
  workers: WorkerStatus[];
}

/**
 * Fixed-size set of workers sharing one scheduler. A health monitor replaces
 * workers whose loop crashed.
 */
export class WorkerPool {
  private workers: Worker[] = [];
  private monitor: NodeJS.Timeout | null = null;
  private started = false;
  private readonly log: Logger;

  constructor(
    private readonly size: number,
    private readonly deps: WorkerDeps,
  ) {
    if (!Number.isInteger(size) || size < 1) throw new Error(`Worker pool size must be a positive integer, got ${size}`);
    this.log = deps.logger.child('pool');
  }

  get isStarted(): boolean {
    return this.started;
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    this.workers = Array.from({ length: this.size }, (_, i) => this.spawn(`worker-${i + 1}`));
    this.monitor = setInterval(() => this.checkHealth(), this.deps.settings.healthCheckIntervalMs);
    this.monitor.unref();
    this.log.info(`started ${this.size} worker(s)`);
  }

  /**
   * Stops intake, waits up to `shutdownTimeoutMs` for in-flight attempts and
   * then aborts whatever is still running with reason `shutdown`.
   */
  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    if (this.monitor) clearInterval(this.monitor);
    this.monitor = null;

    const stopping = Promise.all(this.workers.map((w) => w.stop()));
    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      stopping.then(() => false),
      new Promise<true>((resolve) => {
        timer = setTimeout(() => resolve(true), this.deps.settings.shutdownTimeoutMs);
      }),
    ]);
    clearTimeout(timer);

    if (timedOut) {
      const busy = this.workers.filter((w) => w.status().current_job !== null);
      this.log.warn(`shutdown timeout reached; aborting ${busy.length} running job(s)`);
      for (const worker of this.workers) worker.abort();
      await stopping;
    }
    this.log.info('all workers stopped');
  }

  notifyCancel(jobId: string): boolean {
    return this.workers.some((w) => w.notifyCancel(jobId));
  }

  /** True when a live worker in this process is running `jobId`. */
  isActive(jobId: string): boolean {
    return this.workers.some((w) => !w.crashed && w.isRunning(jobId));
  }

  snapshot(): PoolSnapshot {
    return { started: this.started, max_workers: this.size, workers: this.workers.map((w) => w.status()) };
  }

  /** Replaces crashed workers. Returns how many were restarted. */
  checkHealth(): number {
    if (!this.started) return 0;
    let restarted = 0;
    this.workers = this.workers.map((worker) => {
      if (!worker.crashed) return worker;
      this.log.warn(`${worker.id} crashed; restarting`);
      restarted++;
      return this.spawn(worker.id);
    });
    return restarted;
  }

  private spawn(id: string): Worker {
    const worker = new Worker(id, this.deps);
    worker.start();
    return worker;
  }
}
