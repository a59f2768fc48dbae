import { closeDB } from '../db/db.js';
import { createApp, closeServer, listen } from '../web/server.js';
import { intOption, openContext } from './context.js';

export async function serve(opts: { workers?: string; port?: string; host?: string }): Promise<void> {
  const ctx = openContext({ maxWorkers: intOption('workers', opts.workers) });
  const { engine, logger, config } = ctx;
  const port = intOption('port', opts.port) ?? config.port;

  engine.start();
  const app = createApp(engine, { apiKey: config.apiKey, logger });
  const server = await listen(app, port, opts.host);
  logger.info(`listening on http://${opts.host ?? 'localhost'}:${port} (dashboard at /dashboard)`);

  let stopping = false;
  const shutdown = (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info(`${signal} received; shutting down`);
    Promise.all([closeServer(server), engine.stop()])
      .then(() => {
        closeDB();
        process.exit(0);
      })
      .catch((err: unknown) => {
        logger.error(`shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}
