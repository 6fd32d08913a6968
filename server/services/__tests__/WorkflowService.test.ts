import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DispatchError, IntegrationNotFoundError, ValidationError, WorkflowNotFoundError } from '../../errors';
import { createTestPlatform, seedConnectedIntegration, type TestPlatform } from '../../testing/testPlatform';

describe('WorkflowService', () => {
  let harness: TestPlatform;

  beforeEach(() => {
    harness = createTestPlatform();
  });

  afterEach(async () => {
    await harness.platform.close();
  });

  function createDraft(ownerId = 'user-1') {
    return harness.platform.workflowService.create(ownerId, {
      name: 'Weekly digest',
      triggerType: 'schedule',
      triggerConfig: { cron: '0 8 * * 1' },
      steps: [{ name: 'Collect stats', actionType: 'api_call', config: { url: 'https://example.test/stats' } }],
    });
  }

  it('creates drafts with ordered steps', async () => {
    const workflow = await createDraft();

    expect(workflow.status).toBe('draft');
    expect(workflow.deployedRef).toBeNull();
    expect(workflow.steps.map((step) => [step.name, step.order])).toEqual([['Collect stats', 0]]);
  });

  it('refuses steps that reference an integration owned by someone else', async () => {
    const foreign = await seedConnectedIntegration(harness.platform, { ownerId: 'user-2' });

    await expect(
      harness.platform.workflowService.create('user-1', {
        name: 'Borrowed credentials',
        triggerType: 'manual',
        steps: [{ name: 'Post', actionType: 'integration_action', integrationId: foreign.id }],
      })
    ).rejects.toBeInstanceOf(IntegrationNotFoundError);
  });

  it('deploys, pauses and resumes on the engine', async () => {
    const draft = await createDraft();
    const { workflowService } = harness.platform;

    const deployed = await workflowService.deploy('user-1', draft.id);
    expect(deployed).toMatchObject({ status: 'active', deployedRef: 'engine-wf-1' });
    expect(harness.engine.activated).toEqual(['engine-wf-1']);

    const paused = await workflowService.pause('user-1', draft.id);
    expect(paused.status).toBe('paused');
    expect(harness.engine.deactivated).toEqual(['engine-wf-1']);

    const resumed = await workflowService.resume('user-1', draft.id);
    expect(resumed.status).toBe('active');
    expect(harness.engine.activated).toEqual(['engine-wf-1', 'engine-wf-1']);
  });

  it('replaces the engine workflow on redeploy', async () => {
    const draft = await createDraft();
    await harness.platform.workflowService.deploy('user-1', draft.id);

    const redeployed = await harness.platform.workflowService.deploy('user-1', draft.id);

    expect(harness.engine.deleted).toEqual(['engine-wf-1']);
    expect(redeployed.deployedRef).toBe('engine-wf-2');
  });

  it('marks the workflow as errored when the engine rejects it', async () => {
    const draft = await createDraft();
    harness.engine.onCreateWorkflow = async () => {
      throw new DispatchError('Engine rejected workflow', { retryable: false, remoteStatus: 400 });
    };

    await expect(harness.platform.workflowService.deploy('user-1', draft.id)).rejects.toThrow('Engine rejected workflow');

    const stored = await harness.platform.workflows.getById(draft.id);
    expect(stored).toMatchObject({ status: 'error', deployedRef: null });
  });

  it('will not deploy an empty workflow', async () => {
    const empty = await harness.platform.workflowService.create('user-1', { name: 'Empty', triggerType: 'manual' });

    await expect(harness.platform.workflowService.deploy('user-1', empty.id)).rejects.toBeInstanceOf(ValidationError);
    expect(harness.engine.createdWorkflows).toHaveLength(0);
  });

  it('appends and removes steps', async () => {
    const draft = await createDraft();
    const { workflowService } = harness.platform;

    const extended = await workflowService.addStep('user-1', draft.id, {
      name: 'Email summary',
      actionType: 'notification',
    });
    expect(extended.steps.map((step) => [step.name, step.order])).toEqual([
      ['Collect stats', 0],
      ['Email summary', 1],
    ]);

    const trimmed = await workflowService.removeStep('user-1', draft.id, extended.steps[0].id);
    expect(trimmed.steps.map((step) => step.name)).toEqual(['Email summary']);

    await expect(workflowService.removeStep('user-1', draft.id, 'missing-step')).rejects.toThrow(
      `Step missing-step is not part of workflow ${draft.id}`
    );
  });

  it('hides workflows from other owners', async () => {
    const draft = await createDraft();

    await expect(harness.platform.workflowService.get('user-2', draft.id)).rejects.toBeInstanceOf(WorkflowNotFoundError);
    await expect(harness.platform.workflowService.list('user-2')).resolves.toEqual([]);
  });

  it('removes the engine copy when a deployed workflow is deleted', async () => {
    const draft = await createDraft();
    await harness.platform.workflowService.deploy('user-1', draft.id);

    await harness.platform.workflowService.delete('user-1', draft.id);

    expect(harness.engine.deleted).toEqual(['engine-wf-1']);
    expect(await harness.platform.workflows.getById(draft.id)).toBeNull();
  });
});
