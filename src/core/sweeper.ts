import { errorMessage } from './errors.js';
import { finishAttempt } from './lifecycle.js';
import type { Logger } from './logger.js';
import type { JobScheduler } from './scheduler.js';
import type { EngineSettings } from './settings.js';
import type { JobStore } from './store.js';
import type { JobStatus } from './types.js';

export interface SweepReport {
  /** job id -> status it was moved to */
  recovered: Record<string, JobStatus>;
  /** queued jobs found in the store but missing from the scheduler */
  requeued: string[];
}

export interface OrphanSweeperDeps {
  store: JobStore;
  scheduler: JobScheduler;
  settings: EngineSettings;
  logger: Logger;
  /** Jobs owned by a live worker in this process are never swept. */
  isActive: (jobId: string) => boolean;
  clock?: () => number;
}

/**
 * Recovers `running` records whose worker is gone (crash, kill, shutdown
 * abort) and feeds the scheduler with queued records it does not know about.
 */
export class OrphanSweeper {
  private timer: NodeJS.Timeout | null = null;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly deps: OrphanSweeperDeps) {
    this.log = deps.logger.child('sweeper');
    this.now = deps.clock ?? (() => Date.now());
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      try {
        this.sweep();
      } catch (err) {
        this.log.error(`sweep failed: ${errorMessage(err)}`);
      }
    }, this.deps.settings.sweepIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  sweep(): SweepReport {
    return { recovered: this.recoverOrphans(), requeued: this.reconcile() };
  }

  recoverOrphans(): Record<string, JobStatus> {
    const { store, scheduler, settings, isActive } = this.deps;
    const now = this.now();
    const recovered: Record<string, JobStatus> = {};

    for (const job of store.findStaleRunning(now, settings.graceMs, settings.orphanHeartbeatMs)) {
      if (isActive(job.id)) continue;
      const status = finishAttempt(
        store,
        scheduler,
        job,
        { status: 'timeout', message: `Job orphaned: worker ${job.worker_id ?? 'unknown'} stopped reporting` },
        settings,
        now,
      );
      if (status === null) continue;
      recovered[job.id] = status;
      this.log.warn(`recovered orphaned job ${job.id} from ${job.worker_id ?? 'unknown'} -> ${status}`);
    }
    return recovered;
  }

  reconcile(): string[] {
    const { store, scheduler } = this.deps;
    const added: string[] = [];
    for (const job of store.listQueued()) {
      if (scheduler.has(job.id) || this.deps.isActive(job.id)) continue;
      const enqueuedAt = Date.parse(job.enqueued_at);
      scheduler.enqueue(job.id, job.priority, enqueuedAt, enqueuedAt);
      added.push(job.id);
    }
    if (added.length > 0) this.log.info(`picked up ${added.length} queued job(s) from the store`);
    return added;
  }
}
