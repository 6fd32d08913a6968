import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ExecutionNotFoundError } from '../../errors';
import { createTestPlatform, seedActiveWorkflow, type TestPlatform } from '../../testing/testPlatform';

const MINUTE = 60_000;

describe('ExecutionPollingService', () => {
  let clock: number;
  let harness: TestPlatform;

  beforeEach(() => {
    clock = Date.now();
    harness = createTestPlatform({ now: () => clock });
  });

  afterEach(async () => {
    await harness.platform.close();
  });

  async function dispatchOne() {
    const workflow = await seedActiveWorkflow(harness.platform);
    return harness.platform.dispatcher.dispatch(workflow.id, {});
  }

  it('applies a terminal status the engine reports for a quiet execution', async () => {
    const handle = await dispatchOne();
    harness.engine.snapshots.set('engine-exec-1', {
      status: 'succeeded',
      steps: [{ stepId: 'step-1', name: 'Post update', status: 'success', output: { ok: true } }],
      errorMessage: null,
      finishedAt: null,
    });
    clock += 10 * MINUTE;

    const summary = await harness.platform.polling.pollOnce({ graceMs: MINUTE });

    expect(summary).toEqual({ examined: 1, updated: 1, unchanged: 0, skipped: 0, errors: 0 });
    const execution = await harness.platform.executions.getById(handle.executionId);
    expect(execution?.status).toBe('succeeded');
    expect(execution?.finishedAt?.getTime()).toBe(clock);
    expect(execution?.stepResults).toEqual([
      {
        stepId: 'step-1',
        name: 'Post update',
        status: 'success',
        output: { ok: true },
        error: null,
        source: 'poll',
        receivedAt: new Date(clock).toISOString(),
      },
    ]);
  });

  it('leaves executions that reported recently alone', async () => {
    await dispatchOne();

    const summary = await harness.platform.polling.pollOnce({ graceMs: MINUTE });

    expect(summary.examined).toBe(0);
  });

  it('skips executions the engine never accepted', async () => {
    const workflow = await seedActiveWorkflow(harness.platform);
    await harness.platform.executions.create({
      workflowId: workflow.id,
      ownerId: workflow.ownerId,
      externalRef: 'ref-unaccepted',
      triggerData: {},
    });
    clock += 10 * MINUTE;

    const summary = await harness.platform.polling.pollOnce({ graceMs: MINUTE });

    expect(summary).toEqual({ examined: 1, updated: 0, unchanged: 0, skipped: 1, errors: 0 });
  });

  it('counts engine lookups that fail without touching the execution', async () => {
    const handle = await dispatchOne();
    clock += 10 * MINUTE;

    const summary = await harness.platform.polling.pollOnce({ graceMs: MINUTE });

    expect(summary.errors).toBe(1);
    const execution = await harness.platform.executions.getById(handle.executionId);
    expect(execution?.status).toBe('running');
  });

  it('reports no change when the engine agrees with the recorded status', async () => {
    await dispatchOne();
    harness.engine.snapshots.set('engine-exec-1', {
      status: 'running',
      steps: [{ stepId: 'step-1', status: 'success' }],
      errorMessage: null,
      finishedAt: null,
    });
    clock += 10 * MINUTE;

    const summary = await harness.platform.polling.pollOnce({ graceMs: MINUTE });

    expect(summary).toEqual({ examined: 1, updated: 0, unchanged: 1, skipped: 0, errors: 0 });
  });

  it('refreshes a single execution on demand for its owner only', async () => {
    const handle = await dispatchOne();
    harness.engine.snapshots.set('engine-exec-1', {
      status: 'failed',
      steps: [],
      errorMessage: 'Node "Post update" returned 500',
      finishedAt: null,
    });

    await expect(
      harness.platform.polling.refreshExecution(handle.executionId, { ownerId: 'someone-else' })
    ).rejects.toBeInstanceOf(ExecutionNotFoundError);

    const refreshed = await harness.platform.polling.refreshExecution(handle.executionId, { ownerId: 'user-1' });

    expect(refreshed).toEqual({
      executionId: handle.executionId,
      workflowId: handle.workflowId,
      externalRef: handle.externalRef,
      status: 'failed',
      failureReason: 'engine_reported',
      errorMessage: 'Node "Post update" returned 500',
    });
  });

  it('prunes finished executions past the retention window', async () => {
    const finished = await dispatchOne();
    harness.engine.snapshots.set('engine-exec-1', { status: 'succeeded', steps: [], errorMessage: null, finishedAt: null });
    await harness.platform.polling.refreshExecution(finished.executionId);
    const stillRunning = await dispatchOne();

    clock += 8 * 24 * 60 * MINUTE;
    const removed = await harness.platform.polling.prune(7);

    expect(removed).toBe(1);
    expect(await harness.platform.executions.getById(finished.executionId)).toBeNull();
    expect(await harness.platform.executions.getById(stillRunning.executionId)).not.toBeNull();
  });
});
