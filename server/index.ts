// Load environment variables FIRST
import { env } from './env';

import { createServer } from 'http';

import { createApp } from './app';
import { shutdownObservability, startObservability } from './observability/sdk';
import { createPlatform } from './platform';
import type { WorkerPool } from './queue/index';
import { createJobHandlers } from './workers/handlers';
import { startMaintenanceScheduler, type MaintenanceScheduler } from './workers/maintenance';

async function main(): Promise<void> {
  startObservability();

  const platform = createPlatform();
  const app = createApp(platform);
  const server = createServer(app);

  // The in-memory queue only reaches workers in this process.
  let pool: WorkerPool | null = null;
  let scheduler: MaintenanceScheduler | null = null;
  if (platform.queue.driver === 'inmemory') {
    pool = platform.queue.process(createJobHandlers(platform), { concurrency: env.QUEUE_CONCURRENCY });
    scheduler = startMaintenanceScheduler(platform.queue);
    console.log('⚙️ In-memory queue: execution worker and scheduler running inline.');
  } else {
    console.log('🏭 Expecting external worker and scheduler processes (npm run worker / npm run scheduler).');
  }

  const parsedPort = Number.parseInt(env.PORT, 10);
  if (Number.isNaN(parsedPort) || parsedPort <= 0) {
    throw new Error(`Invalid PORT value provided: ${env.PORT}`);
  }
  const host = process.env.HOST ?? (env.NODE_ENV === 'production' ? '0.0.0.0' : 'localhost');

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      console.error(`❌ Port ${parsedPort} is already in use. Set PORT to a free port.`);
    } else {
      console.error('❌ Failed to start HTTP server:', error);
    }
    process.exit(1);
  });

  server.listen({ port: parsedPort, host }, () => {
    console.log(`✅ serving on ${host}:${parsedPort}`);
    console.log(`🔗 public url: ${env.PUBLIC_BASE_URL}`);
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    console.log(`⚙️ Received ${signal}. Shutting down...`);
    scheduler?.stop();
    server.close();
    try {
      await pool?.close();
      await platform.close();
      await shutdownObservability();
    } catch (error) {
      console.error('❌ Error during shutdown:', error);
    } finally {
      process.exit(0);
    }
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

void main().catch((error) => {
  console.error('❌ Failed to start server:', error);
  process.exit(1);
});
