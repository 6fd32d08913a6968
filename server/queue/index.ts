import { env } from '../env';
import { PlatformError } from '../errors';
import { getErrorMessage } from '../types/common';
import { BullWorkQueue, getRedisConnectionOptions } from './BullMQFactory';
import { InMemoryWorkQueue } from './InMemoryQueue';
import type { QueueDriverName, WorkQueue } from './types';

export type {
  EnqueueOptions,
  JobHandler,
  JobHandlers,
  JobKind,
  JobPayloads,
  QueueDriverName,
  QueuedJob,
  WorkerPool,
  WorkQueue,
} from './types';
export { NonRetryableJobError } from './types';
export { InMemoryWorkQueue } from './InMemoryQueue';
export { getRedisConnectionOptions };

export class QueueDriverUnavailableError extends PlatformError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'QUEUE_DRIVER_UNAVAILABLE', 503, options);
    this.name = 'QueueDriverUnavailableError';
  }
}

export function resolveQueueDriver(override = process.env.QUEUE_DRIVER): QueueDriverName {
  if (override?.toLowerCase() === 'inmemory') {
    if (process.env.NODE_ENV !== 'test') {
      console.warn('[Queue] QUEUE_DRIVER=inmemory detected. Using in-memory queue driver.');
    }
    return 'inmemory';
  }
  return 'bullmq';
}

export function isRedisConnectionError(error: unknown): boolean {
  if (!error || typeof error !== 'object') {
    return false;
  }
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  const lowered = getErrorMessage(error).toLowerCase();

  const indicativeCodes = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EHOSTUNREACH', 'ENOTFOUND']);
  if (code && indicativeCodes.has(code)) {
    return true;
  }

  const indicativeMessages = [
    'connect econnrefused',
    'connect etimedout',
    'connection is closed',
    'ready check failed',
    'getaddrinfo enotfound',
    'getaddrinfo eai_again',
    'redis connection',
  ];

  return indicativeMessages.some((needle) => lowered.includes(needle));
}

export function createWorkQueue(driver: QueueDriverName = resolveQueueDriver()): WorkQueue {
  if (driver === 'inmemory') {
    return new InMemoryWorkQueue({ attempts: env.QUEUE_ATTEMPTS, backoffMs: env.QUEUE_BACKOFF_MS });
  }

  try {
    return new BullWorkQueue();
  } catch (error) {
    if (!isRedisConnectionError(error)) {
      throw error;
    }
    const message =
      `[Queue] Unable to connect to Redis: ${getErrorMessage(error)}. ` +
      'Configure QUEUE_REDIS_* or ensure Redis is reachable. Set QUEUE_DRIVER=inmemory only for isolated testing.';
    console.error(message);
    throw new QueueDriverUnavailableError(message, { cause: error });
  }
}
