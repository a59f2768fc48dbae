import { loadConfig, type AppConfig } from '../config.js';
import { JobEngine } from '../core/engine.js';
import { createLogger, type Logger } from '../core/logger.js';
import { settingsFromConfig } from '../core/settings.js';
import { getConfigAll } from '../db/config.js';
import { getDB, type DB } from '../db/db.js';
import { SqliteJobStore } from '../db/repo.js';
import { createDefaultRegistry } from '../tasks/index.js';

export interface CliContext {
  config: AppConfig;
  db: DB;
  engine: JobEngine;
  logger: Logger;
}

/** Everything a command needs, wired against the shared database. */
export function openContext(overrides: { maxWorkers?: number } = {}): CliContext {
  const config = loadConfig();
  const logger = createLogger('harvestq', { level: config.logLevel });
  const db = getDB(config.dbPath);
  const engine = new JobEngine({
    store: new SqliteJobStore(db),
    registry: createDefaultRegistry(),
    maxWorkers: overrides.maxWorkers ?? config.maxWorkers,
    settings: settingsFromConfig(getConfigAll(db)),
    logger,
    dataRoot: config.dataRoot,
  });
  return { config, db, engine, logger };
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

/** Parses an integer option, rejecting anything that is not a whole number. */
export function intOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new Error(`--${name} must be an integer, got '${raw}'`);
  return n;
}
