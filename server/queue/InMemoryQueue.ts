import { randomUUID } from 'node:crypto';

import { recordQueueJob } from '../observability/index';
import { getErrorMessage } from '../types/common';
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

interface JobRecord {
  id: string;
  kind: JobKind;
  data: unknown;
  attemptsMade: number;
  maxAttempts: number;
}

export interface DeadLetter {
  id: string;
  kind: JobKind;
  data: unknown;
  attemptsMade: number;
  failedReason: string;
  failedAt: Date;
}

export interface InMemoryQueueOptions {
  attempts?: number;
  backoffMs?: number;
  logger?: Pick<Console, 'info' | 'warn' | 'error'>;
}

/**
 * Single-process work queue with retries, exponential backoff and a dead-letter list.
 * Selected with QUEUE_DRIVER=inmemory and used by the tests.
 */
export class InMemoryWorkQueue implements WorkQueue {
  public readonly driver = 'inmemory' as const;

  private readonly waiting: JobRecord[] = [];
  private readonly knownIds = new Set<string>();
  private readonly timers = new Set<NodeJS.Timeout>();
  private readonly deadLetters: DeadLetter[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly attempts: number;
  private readonly backoffMs: number;
  private readonly logger: Pick<Console, 'info' | 'warn' | 'error'>;

  private handlers: JobHandlers | null = null;
  private concurrency = 1;
  private active = 0;
  private closed = false;
  private completedCount = 0;

  constructor(options: InMemoryQueueOptions = {}) {
    this.attempts = Math.max(1, options.attempts ?? 3);
    this.backoffMs = Math.max(0, options.backoffMs ?? 0);
    this.logger = options.logger ?? console;
  }

  async enqueue<K extends JobKind>(kind: K, payload: JobPayloads[K], options: EnqueueOptions = {}): Promise<string> {
    if (this.closed) {
      throw new Error('[Queue] In-memory queue is closed');
    }

    const id = options.jobId ?? randomUUID();
    if (this.knownIds.has(id)) {
      return id;
    }
    this.knownIds.add(id);

    const record: JobRecord = {
      id,
      kind,
      data: payload,
      attemptsMade: 0,
      maxAttempts: Math.max(1, options.attempts ?? this.attempts),
    };

    if (options.delayMs && options.delayMs > 0) {
      this.schedule(record, options.delayMs);
    } else {
      this.waiting.push(record);
      this.pump();
    }
    return id;
  }

  process(handlers: JobHandlers, options: WorkerPoolOptions = {}): WorkerPool {
    this.handlers = handlers;
    this.concurrency = Math.max(1, options.concurrency ?? 1);
    this.pump();
    return {
      close: async () => {
        this.handlers = null;
        await this.onIdle();
      },
    };
  }

  /** Resolves once nothing is waiting, running or scheduled for retry. */
  onIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  getDeadLetters(): readonly DeadLetter[] {
    return this.deadLetters;
  }

  getCounts(): { waiting: number; active: number; delayed: number; completed: number; failed: number } {
    return {
      waiting: this.waiting.length,
      active: this.active,
      delayed: this.timers.size,
      completed: this.completedCount,
      failed: this.deadLetters.length,
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.waiting.length = 0;
    this.handlers = null;
    this.notifyIdle();
  }

  private isIdle(): boolean {
    // Without a worker pool, waiting jobs cannot make progress; treat as idle.
    const stuck = this.handlers === null;
    return this.active === 0 && this.timers.size === 0 && (this.waiting.length === 0 || stuck);
  }

  private notifyIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters.splice(0);
    for (const resolve of waiters) {
      resolve();
    }
  }

  private schedule(record: JobRecord, delayMs: number): void {
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      if (this.closed) {
        return;
      }
      this.waiting.push(record);
      this.pump();
      this.notifyIdle();
    }, delayMs);
    this.timers.add(timer);
  }

  private pump(): void {
    const handlers = this.handlers;
    if (!handlers) {
      return;
    }
    while (this.active < this.concurrency && this.waiting.length > 0) {
      const record = this.waiting.shift();
      if (!record) {
        break;
      }
      this.active += 1;
      void this.run(handlers, record).finally(() => {
        this.active -= 1;
        this.pump();
        this.notifyIdle();
      });
    }
  }

  private async run(handlers: JobHandlers, record: JobRecord): Promise<void> {
    try {
      await runJob(handlers, {
        id: record.id,
        kind: record.kind,
        data: record.data,
        attemptsMade: record.attemptsMade,
      });
      this.completedCount += 1;
      this.knownIds.delete(record.id);
      recordQueueJob(record.kind, 'completed');
    } catch (error) {
      record.attemptsMade += 1;
      const reason = getErrorMessage(error);
      const retryable = !(error instanceof NonRetryableJobError);

      if (retryable && record.attemptsMade < record.maxAttempts) {
        const delay = this.backoffMs * 2 ** (record.attemptsMade - 1);
        this.logger.warn(
          `[queue:inmemory] Job ${record.id} (${record.kind}) failed attempt ${record.attemptsMade}/${record.maxAttempts}: ${reason}`
        );
        recordQueueJob(record.kind, 'retried');
        this.schedule(record, delay);
        return;
      }

      this.logger.error(
        `[queue:inmemory] Job ${record.id} (${record.kind}) moved to dead letters after ${record.attemptsMade} attempts: ${reason}`
      );
      this.knownIds.delete(record.id);
      recordQueueJob(record.kind, 'dead_lettered');
      this.deadLetters.push({
        id: record.id,
        kind: record.kind,
        data: record.data,
        attemptsMade: record.attemptsMade,
        failedReason: reason,
        failedAt: new Date(),
      });
    }
  }
}
