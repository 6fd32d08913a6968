import { describe, expect, it } from 'vitest';

import {
  DispatchError,
  InvalidTransitionError,
  NotDeployedError,
  RateLimitExceededError,
  ReauthRequiredError,
  WorkflowNotFoundError,
} from '../../errors';
import { EncryptionService } from '../EncryptionService';
import { buildStep, createTestPlatform, seedActiveWorkflow, seedConnectedIntegration } from '../../testing/testPlatform';

describe('ExecutionDispatcher.dispatch', () => {
  it('records the pending execution before calling the engine and ends running', async () => {
    const { platform, engine } = createTestPlatform({ dispatcherOptions: { callbackBaseUrl: 'https://hooks.example.test/' } });
    const workflow = await seedActiveWorkflow(platform);
    const statusSeenByEngine: string[] = [];
    engine.onExecute = async (request) => {
      const row = await platform.executions.getByExternalRef(request.externalRef);
      statusSeenByEngine.push(row?.status ?? 'missing');
      return { engineExecutionId: 'engine-42' };
    };

    const handle = await platform.dispatcher.dispatch(workflow.id, { orderId: 'A-1' }, { requestedBy: 'user-1' });

    expect(statusSeenByEngine).toEqual(['pending']);
    expect(handle.status).toBe('running');
    const [request] = engine.executeRequests;
    expect(request.workflowRef).toBe('engine-wf-seeded');
    expect(request.triggerData).toEqual({ orderId: 'A-1' });
    expect(request.externalRef).toBe(handle.externalRef);
    expect(request.callbackUrl).toBe(`https://hooks.example.test/api/webhooks/n8n/${handle.externalRef}`);

    const stored = await platform.executions.getById(handle.executionId);
    expect(stored?.engineExecutionId).toBe('engine-42');
  });

  it('refuses workflows that are not deployed and creates no execution', async () => {
    const { platform, engine } = createTestPlatform();
    const draft = await platform.workflows.create({
      ownerId: 'user-1',
      name: 'Draft',
      triggerType: 'manual',
      steps: [buildStep()],
    });

    await expect(platform.dispatcher.dispatch(draft.id, {})).rejects.toBeInstanceOf(NotDeployedError);
    expect(await platform.executions.listByWorkflow(draft.id)).toEqual([]);
    expect(engine.executeRequests).toHaveLength(0);
  });

  it('hides workflows owned by someone else', async () => {
    const { platform } = createTestPlatform();
    const workflow = await seedActiveWorkflow(platform, { ownerId: 'user-1' });

    await expect(platform.dispatcher.dispatch(workflow.id, {}, { ownerId: 'user-2' })).rejects.toBeInstanceOf(
      WorkflowNotFoundError
    );
  });

  it('fails the eleventh dispatch inside the window as rate limited', async () => {
    const { platform, engine } = createTestPlatform({ limits: { engine: { maxCount: 10, windowMs: 60_000 } } });
    const workflow = await seedActiveWorkflow(platform);

    for (let i = 0; i < 10; i += 1) {
      const handle = await platform.dispatcher.dispatch(workflow.id, { i });
      expect(handle.status).toBe('running');
    }

    const rejection = platform.dispatcher.dispatch(workflow.id, { i: 10 });
    await expect(rejection).rejects.toBeInstanceOf(RateLimitExceededError);

    expect(engine.executeRequests).toHaveLength(10);
    const executions = await platform.executions.listByWorkflow(workflow.id);
    const limited = executions.filter((execution) => execution.failureReason === 'rate_limited');
    expect(limited).toHaveLength(1);
    expect(limited[0].status).toBe('failed');
  });

  it('passes integration credentials to the engine and limits per integration type', async () => {
    const { platform, engine } = createTestPlatform({ limits: { slack: { maxCount: 1, windowMs: 60_000 } } });
    const integration = await seedConnectedIntegration(platform, { accessToken: 'access-slack' });
    const workflow = await seedActiveWorkflow(platform, {
      steps: [buildStep({ actionType: 'integration_action', integrationId: integration.id })],
    });

    await platform.dispatcher.dispatch(workflow.id, {});

    expect(engine.executeRequests[0].credentials).toEqual([
      { integrationId: integration.id, type: 'slack', accessToken: 'access-slack' },
    ]);
    await expect(platform.dispatcher.dispatch(workflow.id, {})).rejects.toBeInstanceOf(RateLimitExceededError);
  });

  it('leaves the other integration types uncounted when one of them is over its limit', async () => {
    const { platform, engine } = createTestPlatform({
      limits: { slack: { maxCount: 5, windowMs: 60_000 }, github: { maxCount: 1, windowMs: 60_000 } },
    });
    const slack = await seedConnectedIntegration(platform, { type: 'slack' });
    const github = await seedConnectedIntegration(platform, { type: 'github' });
    const workflow = await seedActiveWorkflow(platform, {
      steps: [
        buildStep({ id: 'post', actionType: 'integration_action', integrationId: slack.id }),
        buildStep({ id: 'issue', actionType: 'integration_action', integrationId: github.id, order: 1 }),
      ],
    });

    await platform.dispatcher.dispatch(workflow.id, {});
    await expect(platform.dispatcher.dispatch(workflow.id, {})).rejects.toBeInstanceOf(RateLimitExceededError);
    await expect(platform.dispatcher.dispatch(workflow.id, {})).rejects.toBeInstanceOf(RateLimitExceededError);

    expect(engine.executeRequests).toHaveLength(1);
    const slackWindow = await platform.rateLimiter.evaluate({ userId: 'user-1', scope: 'slack' });
    expect(slackWindow).toEqual({ allowed: true, count: 2, limit: 5, retryAfterMs: 0 });
  });

  it('fails with reauth_required when a credential cannot be refreshed', async () => {
    const { platform, engine } = createTestPlatform();
    const integration = await seedConnectedIntegration(platform, {
      refreshToken: null,
      expiresAt: new Date(Date.now() - 1_000),
    });
    const workflow = await seedActiveWorkflow(platform, {
      steps: [buildStep({ actionType: 'integration_action', integrationId: integration.id })],
    });

    await expect(platform.dispatcher.dispatch(workflow.id, {})).rejects.toBeInstanceOf(ReauthRequiredError);

    const [execution] = await platform.executions.listByWorkflow(workflow.id);
    expect(execution.status).toBe('failed');
    expect(execution.failureReason).toBe('reauth_required');
    expect((await platform.integrations.getById(integration.id))?.status).toBe('error');
    expect(engine.executeRequests).toHaveLength(0);
  });

  it('fails the execution when a stored credential cannot be opened', async () => {
    const { platform, engine } = createTestPlatform();
    const integration = await seedConnectedIntegration(platform);
    await platform.integrations.saveToken(integration.id, {
      accessToken: new EncryptionService('other-secret').seal('access-1'),
      refreshToken: null,
      expiresAt: null,
    });
    const workflow = await seedActiveWorkflow(platform, {
      steps: [buildStep({ actionType: 'integration_action', integrationId: integration.id })],
    });

    await expect(platform.dispatcher.dispatch(workflow.id, {})).rejects.toThrow();

    const [execution] = await platform.executions.listByWorkflow(workflow.id);
    expect(execution.status).toBe('failed');
    expect(execution.failureReason).toBe('dispatch_error');
    expect(engine.executeRequests).toHaveLength(0);
  });

  it('marks the execution failed when the engine does not answer in time', async () => {
    const { platform, engine } = createTestPlatform({
      dispatcherOptions: { timeoutMs: 20, retryPolicy: { maxAttempts: 1 }, sleep: async () => {} },
    });
    const workflow = await seedActiveWorkflow(platform);
    engine.onExecute = (request) =>
      new Promise((_resolve, reject) => {
        request.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });

    const handle = await platform.dispatcher.dispatch(workflow.id, {});

    expect(handle).toMatchObject({
      status: 'failed',
      failureReason: 'dispatch_error',
      errorMessage: 'Engine did not accept the execution within 20ms',
    });
  });

  it('retries retryable engine errors with the same external reference', async () => {
    const { platform, engine } = createTestPlatform({
      dispatcherOptions: { retryPolicy: { maxAttempts: 3 }, sleep: async () => {} },
    });
    const workflow = await seedActiveWorkflow(platform);
    let calls = 0;
    engine.onExecute = async () => {
      calls += 1;
      if (calls < 3) {
        throw new DispatchError('engine unavailable', { retryable: true, remoteStatus: 503 });
      }
      return { engineExecutionId: 'engine-3' };
    };

    const handle = await platform.dispatcher.dispatch(workflow.id, {});

    expect(handle.status).toBe('running');
    expect(new Set(engine.executeRequests.map((request) => request.externalRef))).toEqual(new Set([handle.externalRef]));
    expect(engine.executeRequests).toHaveLength(3);
  });

  it('does not retry a rejected dispatch', async () => {
    const { platform, engine } = createTestPlatform({
      dispatcherOptions: { retryPolicy: { maxAttempts: 3 }, sleep: async () => {} },
    });
    const workflow = await seedActiveWorkflow(platform);
    engine.onExecute = async () => {
      throw new DispatchError('n8n rejected the request (400)', { retryable: false, remoteStatus: 400 });
    };

    const handle = await platform.dispatcher.dispatch(workflow.id, {});

    expect(engine.executeRequests).toHaveLength(1);
    expect(handle).toMatchObject({ status: 'failed', failureReason: 'dispatch_error' });
  });

  it('keeps a terminal status a callback recorded before the engine call returned', async () => {
    const { platform, engine } = createTestPlatform();
    const workflow = await seedActiveWorkflow(platform);
    engine.onExecute = async (request) => {
      await platform.reconciler.applyEvent('n8n', request.externalRef, 'succeeded');
      return { engineExecutionId: 'engine-fast' };
    };

    const handle = await platform.dispatcher.dispatch(workflow.id, {});

    expect(handle.status).toBe('succeeded');
  });

  it('records the engine execution id when a callback reported running first', async () => {
    const { platform, engine } = createTestPlatform();
    const workflow = await seedActiveWorkflow(platform);
    engine.onExecute = async (request) => {
      await platform.reconciler.applyEvent('generic', request.externalRef, 'running');
      return { engineExecutionId: 'engine-7' };
    };

    const handle = await platform.dispatcher.dispatch(workflow.id, {});

    expect(handle.status).toBe('running');
    expect((await platform.executions.getById(handle.executionId))?.engineExecutionId).toBe('engine-7');
    const cancelled = await platform.dispatcher.cancel(handle.executionId);
    expect(engine.stopped).toEqual(['engine-7']);
    expect(cancelled.status).toBe('cancelled');
  });
});

describe('ExecutionDispatcher.cancel', () => {
  it('cancels a running execution once the engine confirms', async () => {
    const { platform, engine } = createTestPlatform();
    const workflow = await seedActiveWorkflow(platform);
    engine.onExecute = async () => ({ engineExecutionId: 'engine-9' });
    const handle = await platform.dispatcher.dispatch(workflow.id, {});

    const cancelled = await platform.dispatcher.cancel(handle.executionId);

    expect(engine.stopped).toEqual(['engine-9']);
    expect(cancelled.status).toBe('cancelled');
  });

  it('records the engine status when the execution finished before the stop', async () => {
    const { platform, engine } = createTestPlatform();
    const workflow = await seedActiveWorkflow(platform);
    const handle = await platform.dispatcher.dispatch(workflow.id, {});
    engine.onStop = async () => ({ confirmed: false, status: 'succeeded' });

    const result = await platform.dispatcher.cancel(handle.executionId);

    expect(result.status).toBe('succeeded');
  });

  it('leaves a running execution untouched when the engine reports it still running', async () => {
    const { platform, engine } = createTestPlatform();
    const workflow = await seedActiveWorkflow(platform);
    const handle = await platform.dispatcher.dispatch(workflow.id, {});
    const before = await platform.executions.getById(handle.executionId);
    engine.onStop = async () => ({ confirmed: false, status: 'running' });

    const result = await platform.dispatcher.cancel(handle.executionId);

    expect(result.status).toBe('running');
    expect((await platform.executions.getById(handle.executionId))?.version).toBe(before?.version);
  });

  it('leaves the execution untouched when the engine neither confirms nor reports a status', async () => {
    const { platform, engine } = createTestPlatform();
    const workflow = await seedActiveWorkflow(platform);
    const handle = await platform.dispatcher.dispatch(workflow.id, {});
    const before = await platform.executions.getById(handle.executionId);
    engine.onStop = async () => ({ confirmed: false, status: null });

    const result = await platform.dispatcher.cancel(handle.executionId);

    expect(result.status).toBe('running');
    expect((await platform.executions.getById(handle.executionId))?.version).toBe(before?.version);
  });

  it('refuses to cancel a finished execution', async () => {
    const { platform } = createTestPlatform();
    const workflow = await seedActiveWorkflow(platform);
    const handle = await platform.dispatcher.dispatch(workflow.id, {});
    await platform.reconciler.applyEvent('n8n', handle.externalRef, 'failed');

    await expect(platform.dispatcher.cancel(handle.executionId)).rejects.toBeInstanceOf(InvalidTransitionError);
  });
});
