import { env } from '../env';
import { createWorkQueue } from '../queue/index';
import { startMaintenanceScheduler } from './maintenance';

async function main(): Promise<void> {
  console.log('🕒 Starting maintenance scheduler');
  console.log('🌍 Worker environment:', env.NODE_ENV);

  const queue = createWorkQueue();
  if (queue.driver === 'inmemory') {
    console.warn('⚠️ QUEUE_DRIVER=inmemory: scheduled jobs stay in this process; run the API with the in-process worker instead.');
  }
  const scheduler = startMaintenanceScheduler(queue);

  let shuttingDown = false;
  let resolveShutdown: (() => void) | null = null;
  const waitForShutdown = new Promise<void>((resolve) => {
    resolveShutdown = resolve;
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    console.log(`⚙️ Received ${signal}. Shutting down scheduler worker...`);
    scheduler.stop();
    try {
      await queue.close();
    } catch (error) {
      console.error('❌ Error closing queue during scheduler shutdown:', error);
    } finally {
      resolveShutdown?.();
    }
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  console.log(`⏱️ Enqueuing polling every ${env.POLL_INTERVAL_MS}ms (grace ${env.POLL_GRACE_MS}ms).`);
  await waitForShutdown;
  console.log('👋 Scheduler worker has stopped.');
}

void main().catch((error) => {
  console.error('Failed to start scheduler worker:', error);
  process.exit(1);
});
