import { env } from '../env';
import type { WorkQueue } from '../queue/index';
import { getErrorMessage } from '../types/common';

const PRUNE_INTERVAL_MS = 24 * 60 * 60 * 1000;

export interface MaintenanceSchedulerOptions {
  pollIntervalMs?: number;
  pruneIntervalMs?: number;
  now?: () => number;
}

export interface MaintenanceScheduler {
  stop(): void;
}

/**
 * Enqueues the polling fallback and the retention prune. Job ids are bucketed
 * by interval so several schedulers enqueue each cycle once.
 */
export async function enqueueMaintenanceJobs(
  queue: WorkQueue,
  now: number,
  options: { pollIntervalMs: number; pruneIntervalMs: number }
): Promise<void> {
  const pollBucket = Math.floor(now / options.pollIntervalMs);
  await queue.enqueue(
    'execution.poll',
    { graceMs: env.POLL_GRACE_MS, limit: env.POLL_BATCH_SIZE },
    { jobId: `execution-poll-${pollBucket}` }
  );

  const pruneBucket = Math.floor(now / options.pruneIntervalMs);
  await queue.enqueue(
    'execution.prune',
    { retentionDays: env.EXECUTION_RETENTION_DAYS },
    { jobId: `execution-prune-${pruneBucket}` }
  );
}

export function startMaintenanceScheduler(
  queue: WorkQueue,
  options: MaintenanceSchedulerOptions = {}
): MaintenanceScheduler {
  const pollIntervalMs = Math.max(1000, options.pollIntervalMs ?? env.POLL_INTERVAL_MS);
  const pruneIntervalMs = options.pruneIntervalMs ?? PRUNE_INTERVAL_MS;
  const now = options.now ?? Date.now;

  const tick = () => {
    enqueueMaintenanceJobs(queue, now(), { pollIntervalMs, pruneIntervalMs }).catch((error: unknown) => {
      console.error('❌ [Scheduler] Failed to enqueue maintenance jobs:', getErrorMessage(error));
    });
  };

  tick();
  const timer = setInterval(tick, pollIntervalMs);

  return {
    stop() {
      clearInterval(timer);
    },
  };
}
