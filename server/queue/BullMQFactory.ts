import { Queue, QueueEvents, UnrecoverableError, Worker, type Job } from 'bullmq';
import type { RedisOptions } from 'ioredis';

import { env } from '../env';
import { recordQueueJob } from '../observability/index';
import { runJob } from './runJob';
import {
  NonRetryableJobError,
  type EnqueueOptions,
  type JobHandlers,
  type JobKind,
  type JobPayloads,
  type WorkerPool,
  type WorkerPoolOptions,
  type WorkQueue,
} from './types';

export const WORK_QUEUE_NAME = 'conduit-jobs';

const defaultLogger: Pick<Console, 'info' | 'warn' | 'error'> = console;

export function getRedisConnectionOptions(): RedisOptions {
  const baseOptions: RedisOptions = {
    host: env.QUEUE_REDIS_HOST,
    port: Number.isFinite(env.QUEUE_REDIS_PORT) ? env.QUEUE_REDIS_PORT : 6379,
    db: Number.isFinite(env.QUEUE_REDIS_DB) ? env.QUEUE_REDIS_DB : 0,
  };

  if (env.QUEUE_REDIS_USERNAME) {
    baseOptions.username = env.QUEUE_REDIS_USERNAME;
  }
  if (env.QUEUE_REDIS_PASSWORD) {
    baseOptions.password = env.QUEUE_REDIS_PASSWORD;
  }
  if (env.QUEUE_REDIS_TLS) {
    baseOptions.tls = {};
  }

  return baseOptions;
}

export interface BullWorkQueueOptions {
  attempts?: number;
  backoffMs?: number;
  logger?: Pick<Console, 'info' | 'warn' | 'error'>;
}

/**
 * One BullMQ queue for every job kind; the job name carries the kind.
 * Failed jobs are kept (removeOnFail: false) and form the dead-letter set.
 */
export class BullWorkQueue implements WorkQueue {
  public readonly driver = 'bullmq' as const;

  private readonly queue: Queue;
  private readonly logger: Pick<Console, 'info' | 'warn' | 'error'>;
  private readonly pools = new Set<WorkerPool>();

  constructor(options: BullWorkQueueOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.queue = new Queue(WORK_QUEUE_NAME, {
      connection: getRedisConnectionOptions(),
      defaultJobOptions: {
        attempts: options.attempts ?? env.QUEUE_ATTEMPTS,
        backoff: { type: 'exponential', delay: options.backoffMs ?? env.QUEUE_BACKOFF_MS },
        removeOnComplete: true,
        removeOnFail: false,
      },
    });
    this.queue.on('error', (error) => {
      this.logger.error(`[queue:${WORK_QUEUE_NAME}] Queue error`, error);
    });
  }

  async enqueue<K extends JobKind>(kind: K, payload: JobPayloads[K], options: EnqueueOptions = {}): Promise<string> {
    const job = await this.queue.add(kind, payload, {
      ...(options.jobId ? { jobId: options.jobId } : {}),
      ...(options.delayMs ? { delay: options.delayMs } : {}),
      ...(options.attempts ? { attempts: options.attempts } : {}),
    });
    return job.id ?? options.jobId ?? '';
  }

  process(handlers: JobHandlers, options: WorkerPoolOptions = {}): WorkerPool {
    const worker = new Worker(
      WORK_QUEUE_NAME,
      async (job: Job) => {
        try {
          await runJob(handlers, {
            id: job.id ?? 'unknown',
            kind: job.name,
            data: job.data,
            attemptsMade: job.attemptsMade,
          });
        } catch (error) {
          if (error instanceof NonRetryableJobError) {
            throw new UnrecoverableError(error.message);
          }
          throw error;
        }
      },
      {
        connection: getRedisConnectionOptions(),
        concurrency: options.concurrency ?? env.QUEUE_CONCURRENCY,
        autorun: true,
      }
    );

    const events = new QueueEvents(WORK_QUEUE_NAME, { connection: getRedisConnectionOptions() });

    worker.on('completed', (job) => {
      recordQueueJob(job.name, 'completed');
    });
    worker.on('failed', (job, error) => {
      if (!job) {
        this.logger.error(`[queue:${WORK_QUEUE_NAME}] Job failed without context: ${error.message}`);
        return;
      }
      const maxAttempts = job.opts.attempts ?? 1;
      const exhausted = error instanceof UnrecoverableError || job.attemptsMade >= maxAttempts;
      recordQueueJob(job.name, exhausted ? 'dead_lettered' : 'retried');
      const message = `[queue:${WORK_QUEUE_NAME}] Job ${job.id} (${job.name}) failed attempt ${job.attemptsMade}/${maxAttempts}: ${error.message}`;
      if (exhausted) {
        this.logger.error(message);
      } else {
        this.logger.warn(message);
      }
    });
    worker.on('error', (error) => {
      this.logger.error(`[queue:${WORK_QUEUE_NAME}] Worker error`, error);
    });
    events.on('stalled', ({ jobId }) => {
      this.logger.warn(`[queue:${WORK_QUEUE_NAME}] Job ${jobId} stalled`);
    });

    const pool: WorkerPool = {
      close: async () => {
        this.pools.delete(pool);
        await Promise.all([worker.close(), events.close()]);
      },
    };
    this.pools.add(pool);
    return pool;
  }

  async close(): Promise<void> {
    await Promise.all(Array.from(this.pools, (pool) => pool.close()));
    await this.queue.close();
  }
}
