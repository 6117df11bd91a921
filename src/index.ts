// src/index.ts
import 'dotenv/config';
import { createServer } from 'http';
import { db } from './db/knex';
import { ensureSchema } from './db/schema';
import { loadEngineConfig } from './config/engine';
import { createEngine } from './engine';
import { createApp } from './server';
import { errorMessage, logError, logInfo } from './utils/logger';

async function main() {
  const config = loadEngineConfig();

  if (config.autoMigrate) {
    const created = await ensureSchema(db);
    if (created.length) logInfo('server', 'Created tables', { tables: created });
  }

  const engine = createEngine({ db, config });
  const httpServer = createServer(createApp(engine));

  // Start Server
  httpServer.listen(config.port, () => {
    logInfo('server', 'Job engine API listening', { port: config.port, clientId: engine.http.clientId });
    engine.scheduler.start();
  });

  // Graceful Shutdown
  let shuttingDown = false;

  async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    logInfo('server', 'Shutting down', { signal });

    // 1. Stop HTTP
    httpServer.close(() => logInfo('server', 'HTTP server closed'));

    // 2. Stop scheduler, then let in-flight requests land so one more
    //    resolution sweep can record them
    try {
      await engine.scheduler.stop();
      await engine.http.drain();
      await engine.scheduler.runResolutionSweep();
    } catch (err) {
      logError('server', 'Error while stopping scheduler', { error: errorMessage(err) });
    }

    // 3. Close DB
    try {
      await db.destroy();
      logInfo('server', 'Database connection closed');
      process.exit(0);
    } catch (err) {
      logError('server', 'Error during shutdown', { error: errorMessage(err) });
      process.exit(1);
    }
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch(async (err) => {
  logError('server', 'Fatal startup error', { error: errorMessage(err) });
  await db.destroy();
  process.exit(1);
});
