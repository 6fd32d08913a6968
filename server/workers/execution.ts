import { env } from '../env';
import { shutdownObservability, startObservability } from '../observability/sdk';
import { createPlatform } from '../platform';
import { createJobHandlers } from './handlers';

async function main(): Promise<void> {
  startObservability();
  console.log('🚀 Starting execution worker');
  console.log('🌍 Worker environment:', env.NODE_ENV);

  const platform = createPlatform();
  if (platform.queue.driver === 'inmemory') {
    console.warn('⚠️ QUEUE_DRIVER=inmemory: this worker only sees jobs enqueued in its own process.');
  }
  const pool = platform.queue.process(createJobHandlers(platform), { concurrency: env.QUEUE_CONCURRENCY });

  let shuttingDown = false;
  let resolveWait: (() => void) | null = null;
  const waitForExit = new Promise<void>((resolve) => {
    resolveWait = resolve;
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    console.log(`⚙️ Received ${signal}. Shutting down execution worker...`);
    try {
      await pool.close();
      await platform.close();
      await shutdownObservability();
      console.log('✅ Execution queue drained successfully.');
    } catch (error) {
      console.error('❌ Error during execution worker shutdown:', error);
    } finally {
      resolveWait?.();
    }
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  process.on('unhandledRejection', (reason) => {
    console.error('❌ Unhandled rejection in execution worker:', reason);
  });

  console.log(`🧵 Execution worker is running (driver=${platform.queue.driver}, concurrency=${env.QUEUE_CONCURRENCY}).`);
  await waitForExit;
  console.log('👋 Execution worker has stopped.');
}

void main().catch((error) => {
  console.error('Failed to start execution worker:', error);
  process.exit(1);
});
