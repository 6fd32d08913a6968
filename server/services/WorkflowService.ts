import { randomUUID } from 'node:crypto';

import { IntegrationNotFoundError, ValidationError, WorkflowNotFoundError } from '../errors';
import type { ExternalEngineClient } from '../integrations/ExternalEngineClient';
import type { IntegrationRepository } from '../integrations/IntegrationRepository';
import { toEngineWorkflow } from '../integrations/n8nWorkflowFormat';
import { getErrorMessage } from '../types/common';
import { logAction } from '../utils/actionLog';
import type { ExecutionRepository } from '../workflow/ExecutionRepository';
import type { CreateWorkflowInput, WorkflowPatch, WorkflowQuery, WorkflowRepository } from '../workflow/WorkflowRepository';
import type { StepActionType, StepSpec, TriggerType, Workflow, WorkflowExecution } from '../workflow/types';

export interface StepInput {
  name: string;
  actionType: StepActionType;
  integrationId?: string | null;
  config?: Record<string, unknown>;
  order?: number;
}

export interface CreateWorkflowRequest {
  name: string;
  description?: string | null;
  triggerType: TriggerType;
  triggerConfig?: Record<string, unknown>;
  steps?: StepInput[];
  tags?: string[];
}

export interface UpdateWorkflowRequest {
  name?: string;
  description?: string | null;
  triggerType?: TriggerType;
  triggerConfig?: Record<string, unknown>;
  steps?: StepInput[];
  tags?: string[];
}

/**
 * Owns workflow definitions and their lifecycle on the external engine.
 */
export class WorkflowService {
  constructor(
    private readonly workflows: WorkflowRepository,
    private readonly executions: ExecutionRepository,
    private readonly integrations: IntegrationRepository,
    private readonly engine: ExternalEngineClient
  ) {}

  async create(ownerId: string, request: CreateWorkflowRequest): Promise<Workflow> {
    const steps = this.buildSteps(request.steps ?? []);
    await this.assertIntegrationsOwned(ownerId, steps);

    const input: CreateWorkflowInput = {
      ownerId,
      name: request.name,
      description: request.description ?? null,
      triggerType: request.triggerType,
      triggerConfig: request.triggerConfig ?? {},
      steps,
      tags: request.tags ?? [],
    };
    const workflow = await this.workflows.create(input);
    console.log(`✅ [WorkflowService] Created workflow ${workflow.id} (${workflow.name})`);
    return workflow;
  }

  async get(ownerId: string, workflowId: string): Promise<Workflow> {
    const workflow = await this.workflows.getById(workflowId);
    if (!workflow || workflow.ownerId !== ownerId) {
      throw new WorkflowNotFoundError(workflowId);
    }
    return workflow;
  }

  async list(ownerId: string, query: WorkflowQuery = {}): Promise<Workflow[]> {
    const workflows = await this.workflows.listByOwner(ownerId);
    return workflows.filter(
      (workflow) =>
        (!query.status || workflow.status === query.status) &&
        (!query.triggerType || workflow.triggerType === query.triggerType)
    );
  }

  async update(ownerId: string, workflowId: string, request: UpdateWorkflowRequest): Promise<Workflow> {
    await this.get(ownerId, workflowId);

    const patch: WorkflowPatch = {};
    if (request.name !== undefined) patch.name = request.name;
    if (request.description !== undefined) patch.description = request.description;
    if (request.triggerType !== undefined) patch.triggerType = request.triggerType;
    if (request.triggerConfig !== undefined) patch.triggerConfig = request.triggerConfig;
    if (request.tags !== undefined) patch.tags = request.tags;
    if (request.steps !== undefined) {
      patch.steps = this.buildSteps(request.steps);
      await this.assertIntegrationsOwned(ownerId, patch.steps);
    }

    return this.save(workflowId, patch);
  }

  async addStep(ownerId: string, workflowId: string, step: StepInput): Promise<Workflow> {
    const workflow = await this.get(ownerId, workflowId);
    const nextOrder = workflow.steps.reduce((max, existing) => Math.max(max, existing.order), -1) + 1;
    const [created] = this.buildSteps([{ ...step, order: step.order ?? nextOrder }]);
    await this.assertIntegrationsOwned(ownerId, [created]);

    const steps = [...workflow.steps, created].sort((a, b) => a.order - b.order);
    return this.save(workflowId, { steps });
  }

  async removeStep(ownerId: string, workflowId: string, stepId: string): Promise<Workflow> {
    const workflow = await this.get(ownerId, workflowId);
    const steps = workflow.steps.filter((step) => step.id !== stepId);
    if (steps.length === workflow.steps.length) {
      throw new ValidationError(`Step ${stepId} is not part of workflow ${workflowId}`);
    }
    return this.save(workflowId, { steps });
  }

  async delete(ownerId: string, workflowId: string): Promise<void> {
    const workflow = await this.get(ownerId, workflowId);
    if (workflow.deployedRef) {
      await this.engine.deleteWorkflow(workflow.deployedRef);
    }
    await this.workflows.delete(workflowId);
    logAction({ type: 'workflow.deleted', component: 'WorkflowService', workflowId, ownerId });
  }

  /**
   * Publishes the workflow to the engine and activates it. A failed deploy
   * leaves the workflow in `error` so it cannot be triggered.
   */
  async deploy(ownerId: string, workflowId: string): Promise<Workflow> {
    const workflow = await this.get(ownerId, workflowId);
    if (workflow.steps.length === 0) {
      throw new ValidationError('A workflow needs at least one step before it can be deployed');
    }

    try {
      if (workflow.deployedRef) {
        // Redeploys replace the previous engine workflow.
        await this.engine.deleteWorkflow(workflow.deployedRef);
      }
      const created = await this.engine.createWorkflow(toEngineWorkflow(workflow));
      await this.engine.activateWorkflow(created.id);

      const deployed = await this.save(workflowId, { status: 'active', deployedRef: created.id });
      logAction({
        type: 'workflow.deployed',
        component: 'WorkflowService',
        workflowId,
        ownerId,
        deployedRef: created.id,
      });
      console.log(`🚀 [WorkflowService] Deployed workflow ${workflowId} as ${created.id}`);
      return deployed;
    } catch (error) {
      console.error(`❌ [WorkflowService] Deploy of workflow ${workflowId} failed:`, getErrorMessage(error));
      await this.workflows.update(workflowId, { status: 'error', deployedRef: null });
      throw error;
    }
  }

  async pause(ownerId: string, workflowId: string): Promise<Workflow> {
    const workflow = await this.get(ownerId, workflowId);
    if (workflow.status !== 'active' || !workflow.deployedRef) {
      throw new ValidationError(`Workflow ${workflowId} is not active`);
    }
    await this.engine.deactivateWorkflow(workflow.deployedRef);
    return this.save(workflowId, { status: 'paused' });
  }

  async resume(ownerId: string, workflowId: string): Promise<Workflow> {
    const workflow = await this.get(ownerId, workflowId);
    if (workflow.status !== 'paused' || !workflow.deployedRef) {
      throw new ValidationError(`Workflow ${workflowId} is not paused`);
    }
    await this.engine.activateWorkflow(workflow.deployedRef);
    return this.save(workflowId, { status: 'active' });
  }

  async listExecutions(ownerId: string, workflowId: string, limit?: number): Promise<WorkflowExecution[]> {
    await this.get(ownerId, workflowId);
    return this.executions.listByWorkflow(workflowId, limit);
  }

  private async save(workflowId: string, patch: WorkflowPatch): Promise<Workflow> {
    const updated = await this.workflows.update(workflowId, patch);
    if (!updated) {
      throw new WorkflowNotFoundError(workflowId);
    }
    return updated;
  }

  private buildSteps(inputs: StepInput[]): StepSpec[] {
    return inputs
      .map((input, index) => ({
        id: randomUUID(),
        name: input.name,
        actionType: input.actionType,
        integrationId: input.integrationId ?? null,
        config: input.config ?? {},
        order: input.order ?? index,
      }))
      .sort((a, b) => a.order - b.order);
  }

  private async assertIntegrationsOwned(ownerId: string, steps: StepSpec[]): Promise<void> {
    for (const step of steps) {
      if (!step.integrationId) {
        continue;
      }
      const integration = await this.integrations.getById(step.integrationId);
      if (!integration || integration.ownerId !== ownerId) {
        throw new IntegrationNotFoundError(step.integrationId);
      }
    }
  }
}
