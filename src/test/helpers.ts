import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { JobEngine, type JobEngineOptions } from '../core/engine.js';
import type { TaskExecutor, TaskFunction } from '../core/executor.js';
import { TaskRegistry } from '../core/registry.js';
import type { EngineSettings } from '../core/settings.js';
import type { NewJob } from '../core/store.js';
import { openDB, type DB } from '../db/db.js';
import { SqliteJobStore } from '../db/repo.js';

/** Short intervals so lifecycle tests finish in well under a second each. */
export const FAST_SETTINGS: Partial<EngineSettings> = {
  graceMs: 100,
  pollIntervalMs: 20,
  cancelPollMs: 20,
  heartbeatIntervalMs: 50,
  sweepIntervalMs: 60_000,
  shutdownTimeoutMs: 200,
  errorBackoffMs: 20,
};

export function memoryStore(): { db: DB; store: SqliteJobStore } {
  const db = openDB(':memory:');
  return { db, store: new SqliteJobStore(db) };
}

export function newJob(overrides: Partial<NewJob> = {}): NewJob {
  const stamp = new Date('2024-05-01T10:00:00.000Z').toISOString();
  return {
    id: 'job-1',
    task_name: 'echo',
    params: {},
    priority: 0,
    timeout_seconds: 30,
    max_retries: 2,
    created_at: stamp,
    enqueued_at: stamp,
    ...overrides,
  };
}

export interface TestEngine {
  engine: JobEngine;
  store: SqliteJobStore;
  db: DB;
  registry: TaskRegistry;
}

export function createTestEngine(
  tasks: Record<string, TaskExecutor | TaskFunction>,
  options: Partial<Omit<JobEngineOptions, 'store' | 'registry'>> = {},
): TestEngine {
  const { db, store } = memoryStore();
  const registry = new TaskRegistry();
  for (const [name, task] of Object.entries(tasks)) registry.register(name, task);
  const engine = new JobEngine({
    store,
    registry,
    maxWorkers: 1,
    ...options,
    settings: { ...FAST_SETTINGS, ...options.settings },
  });
  return { engine, store, db, registry };
}

/** Polls until `predicate` holds; rejects after `timeoutMs`. */
export async function waitFor(predicate: () => boolean, timeoutMs = 3000, what = 'condition'): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`Timed out waiting for ${what}`);
    await new Promise((resolve) => setTimeout(resolve, 10));
  }
}

export function tempDir(prefix = 'harvestq-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
