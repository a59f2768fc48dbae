import crypto from 'node:crypto';
import type { Server } from 'node:http';
import express, { type NextFunction, type Request, type Response } from 'express';
import type { JobEngine } from '../core/engine.js';
import { HarvestError, SubmissionError, errorMessage } from '../core/errors.js';
import { silentLogger, type Logger } from '../core/logger.js';
import { jobView } from '../core/stats.js';
import { JOB_STATUSES, type Job, type JobStatus } from '../core/types.js';
import { renderDashboard } from './dashboard.js';

export interface AppOptions {
  /** When set, /jobs, /stats and /tasks require a matching `x-api-key` header. */
  apiKey?: string | null;
  logger?: Logger;
}

const STATUS_BY_CODE: Record<string, number> = {
  UNKNOWN_TASK: 404,
  INVALID_REQUEST: 400,
  JOB_NOT_FOUND: 404,
  JOB_CONFLICT: 409,
  STORE_UNAVAILABLE: 503,
};

const DEFAULT_LIST_LIMIT = 100;
const MAX_LIST_LIMIT = 1000;

function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((s) => s === value);
}

function keyMatches(expected: string, given: string | undefined): boolean {
  if (given === undefined) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(given);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

function parseListQuery(query: Request['query']): { status?: JobStatus; limit: number } {
  const { status, limit } = query;
  let parsedStatus: JobStatus | undefined;
  if (status !== undefined) {
    if (typeof status !== 'string' || !isJobStatus(status)) {
      throw new SubmissionError(`Invalid status filter; expected one of ${JOB_STATUSES.join(', ')}`, 'invalid_request');
    }
    parsedStatus = status;
  }
  let parsedLimit = DEFAULT_LIST_LIMIT;
  if (limit !== undefined) {
    const n = typeof limit === 'string' ? Number(limit) : NaN;
    if (!Number.isInteger(n) || n < 1 || n > MAX_LIST_LIMIT) {
      throw new SubmissionError(`limit must be an integer between 1 and ${MAX_LIST_LIMIT}`, 'invalid_request');
    }
    parsedLimit = n;
  }
  return { status: parsedStatus, limit: parsedLimit };
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function createApp(engine: JobEngine, options: AppOptions = {}): express.Express {
  const log = (options.logger ?? silentLogger).child('http');
  const apiKey = options.apiKey || null;
  const app = express();

  app.use(express.json());

  const requireKey = (req: Request, res: Response, next: NextFunction) => {
    if (apiKey === null || keyMatches(apiKey, req.get('x-api-key'))) return next();
    res.status(401).json({ error: 'Missing or invalid API key', code: 'UNAUTHORIZED' });
  };
  app.use(['/jobs', '/stats', '/tasks'], requireKey);

  app.get('/', (_req: Request, res: Response) => res.redirect('/dashboard'));

  app.post('/jobs/:task_name', (req: Request, res: Response) => {
    const jobId = engine.submit(req.params.task_name, req.body);
    res.json({ job_id: jobId });
  });

  app.get('/jobs', (req: Request, res: Response) => {
    const { status, limit } = parseListQuery(req.query);
    const now = Date.now();
    res.json({ jobs: engine.listJobs({ status, limit }).map((job) => jobView(job, now)) });
  });

  app.get('/jobs/:job_id', (req: Request, res: Response) => {
    res.json(engine.describeJob(req.params.job_id));
  });

  app.post('/jobs/:job_id/replay', (req: Request, res: Response) => {
    res.json(engine.replay(req.params.job_id));
  });

  app.delete('/jobs/:job_id', (req: Request, res: Response) => {
    res.json(engine.cancel(req.params.job_id));
  });

  app.get('/stats', (_req: Request, res: Response) => {
    res.json(engine.stats());
  });

  app.get('/tasks', (_req: Request, res: Response) => {
    res.json({ tasks: engine.tasks() });
  });

  app.get('/healthz', (_req: Request, res: Response) => {
    const health = engine.health();
    res.status(health.status === 'ok' ? 200 : 503).json(health);
  });

  app.get('/dashboard', (_req: Request, res: Response) => {
    const jobs: Partial<Record<JobStatus, Job[]>> = {};
    for (const status of JOB_STATUSES) jobs[status] = engine.listJobs({ status, limit: 20 });
    res.send(renderDashboard({ stats: engine.stats(), jobs, allowCancel: apiKey === null, now: Date.now() }));
  });

  // express needs all four parameters to treat this as an error handler
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      res.status(400).json({ error: 'Request body is not valid JSON', code: 'INVALID_REQUEST' });
      return;
    }
    if (err instanceof HarvestError) {
      const status = STATUS_BY_CODE[err.code] ?? 500;
      if (status >= 500) log.error(`${req.method} ${req.path} -> ${status}: ${err.message}`);
      const body: Record<string, unknown> = { error: err.message, code: err.code };
      if (err instanceof SubmissionError && err.details.length > 0) body.details = err.details;
      res.status(status).json(body);
      return;
    }
    log.error(`${req.method} ${req.path} -> 500: ${errorMessage(err)}`);
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL' });
  });

  return app;
}

/** Starts listening; resolves once the port is bound. */
export function listen(app: express.Express, port: number, host?: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host ?? '0.0.0.0', () => resolve(server));
    server.once('error', reject);
  });
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}
