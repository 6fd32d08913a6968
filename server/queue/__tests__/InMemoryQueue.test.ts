import { describe, expect, it } from 'vitest';

import { InMemoryWorkQueue } from '../InMemoryQueue';
import { runJob } from '../runJob';
import { NonRetryableJobError, type JobHandlers } from '../types';

const silentLogger = { info() {}, warn() {}, error() {} };

function createQueue(attempts = 3) {
  return new InMemoryWorkQueue({ attempts, backoffMs: 0, logger: silentLogger });
}

const prunePayload = { retentionDays: 30 };

describe('InMemoryWorkQueue', () => {
  it('runs enqueued jobs through the matching handler', async () => {
    const queue = createQueue();
    const seen: number[] = [];
    queue.process({
      'execution.prune': async (job) => {
        seen.push(job.payload.retentionDays);
      },
    });

    await queue.enqueue('execution.prune', prunePayload);
    await queue.enqueue('execution.prune', { retentionDays: 7 });
    await queue.onIdle();

    expect(seen).toEqual([30, 7]);
    expect(queue.getCounts().completed).toBe(2);
    await queue.close();
  });

  it('retries failures and dead-letters the job once attempts run out', async () => {
    const queue = createQueue(3);
    const attempts: number[] = [];
    queue.process({
      'execution.prune': async (job) => {
        attempts.push(job.attemptsMade);
        throw new Error('database unavailable');
      },
    });

    await queue.enqueue('execution.prune', prunePayload, { jobId: 'prune-1' });
    await queue.onIdle();

    expect(attempts).toEqual([0, 1, 2]);
    expect(queue.getDeadLetters()).toMatchObject([
      { id: 'prune-1', kind: 'execution.prune', attemptsMade: 3, failedReason: 'database unavailable' },
    ]);
    await queue.close();
  });

  it('succeeds on a later attempt without dead-lettering', async () => {
    const queue = createQueue(3);
    let calls = 0;
    queue.process({
      'execution.prune': async () => {
        calls += 1;
        if (calls === 1) {
          throw new Error('transient');
        }
      },
    });

    await queue.enqueue('execution.prune', prunePayload);
    await queue.onIdle();

    expect(calls).toBe(2);
    expect(queue.getDeadLetters()).toHaveLength(0);
    await queue.close();
  });

  it('does not retry non-retryable failures', async () => {
    const queue = createQueue(5);
    let calls = 0;
    queue.process({
      'execution.prune': async () => {
        calls += 1;
        throw new NonRetryableJobError('bad input');
      },
    });

    await queue.enqueue('execution.prune', prunePayload);
    await queue.onIdle();

    expect(calls).toBe(1);
    expect(queue.getDeadLetters()[0].attemptsMade).toBe(1);
    await queue.close();
  });

  it('ignores a job id that is already queued', async () => {
    const queue = createQueue();
    const first = await queue.enqueue('execution.prune', prunePayload, { jobId: 'same' });
    const second = await queue.enqueue('execution.prune', { retentionDays: 1 }, { jobId: 'same' });

    expect(first).toBe('same');
    expect(second).toBe('same');
    expect(queue.getCounts().waiting).toBe(1);
    await queue.close();
  });

  it('does not exceed the configured concurrency', async () => {
    const queue = createQueue();
    let active = 0;
    let peak = 0;
    queue.process(
      {
        'execution.prune': async () => {
          active += 1;
          peak = Math.max(peak, active);
          await new Promise((resolve) => setTimeout(resolve, 5));
          active -= 1;
        },
      },
      { concurrency: 2 }
    );

    for (let i = 0; i < 6; i += 1) {
      await queue.enqueue('execution.prune', prunePayload);
    }
    await queue.onIdle();

    expect(peak).toBe(2);
    await queue.close();
  });
});

describe('runJob', () => {
  const handlers: JobHandlers = { 'execution.poll': async () => {} };

  it('rejects unknown job kinds as non-retryable', async () => {
    await expect(runJob(handlers, { id: 'j1', kind: 'mystery', data: {}, attemptsMade: 0 })).rejects.toBeInstanceOf(
      NonRetryableJobError
    );
  });

  it('rejects payloads that fail validation', async () => {
    await expect(
      runJob(handlers, { id: 'j2', kind: 'execution.poll', data: { graceMs: -1, limit: 10 }, attemptsMade: 0 })
    ).rejects.toThrow('Invalid payload for job j2 (execution.poll): graceMs: Number must be greater than or equal to 0');
  });

  it('rejects kinds without a registered handler', async () => {
    await expect(
      runJob(handlers, { id: 'j3', kind: 'execution.prune', data: prunePayload, attemptsMade: 0 })
    ).rejects.toThrow('No handler registered for job kind "execution.prune"');
  });
});
