import { Router } from 'express';
import { z } from 'zod';

import { authenticateToken, requireUser } from '../middleware/auth';
import type { Platform } from '../platform';
import { STEP_ACTION_TYPES, TRIGGER_TYPES, WORKFLOW_STATUSES, type Workflow } from '../workflow/types';
import { sendServiceError, sendValidationError } from './errors';

const stepSchema = z.object({
  name: z.string().min(1, 'Step name is required'),
  actionType: z.enum(STEP_ACTION_TYPES),
  integrationId: z.string().min(1).nullable().optional(),
  config: z.record(z.unknown()).optional(),
  order: z.number().int().nonnegative().optional(),
});

const createWorkflowSchema = z.object({
  name: z.string().min(1, 'Workflow name is required'),
  description: z.string().nullable().optional(),
  triggerType: z.enum(TRIGGER_TYPES),
  triggerConfig: z.record(z.unknown()).optional(),
  steps: z.array(stepSchema).optional(),
  tags: z.array(z.string()).optional(),
});

const updateWorkflowSchema = createWorkflowSchema.partial();

const listQuerySchema = z.object({
  status: z.enum(WORKFLOW_STATUSES).optional(),
  triggerType: z.enum(TRIGGER_TYPES).optional(),
});

const executeSchema = z.object({
  triggerData: z.record(z.unknown()).optional(),
});

const executionListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

function serializeWorkflow(workflow: Workflow) {
  return {
    ...workflow,
    deployed: workflow.status === 'active' && workflow.deployedRef !== null,
    createdAt: workflow.createdAt.toISOString(),
    updatedAt: workflow.updatedAt.toISOString(),
  };
}

export function createWorkflowRouter(platform: Platform): Router {
  const router = Router();
  const service = platform.workflowService;
  router.use(authenticateToken);

  router.get('/', async (req, res) => {
    const parsed = listQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }
    try {
      const workflows = await service.list(requireUser(req).id, parsed.data);
      res.json({ success: true, workflows: workflows.map(serializeWorkflow) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to list workflows');
    }
  });

  router.post('/', async (req, res) => {
    const parsed = createWorkflowSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }
    try {
      const workflow = await service.create(requireUser(req).id, parsed.data);
      res.status(201).json({ success: true, workflow: serializeWorkflow(workflow) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to create workflow');
    }
  });

  router.get('/:workflowId', async (req, res) => {
    try {
      const workflow = await service.get(requireUser(req).id, req.params.workflowId);
      res.json({ success: true, workflow: serializeWorkflow(workflow) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to load workflow');
    }
  });

  router.patch('/:workflowId', async (req, res) => {
    const parsed = updateWorkflowSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }
    try {
      const workflow = await service.update(requireUser(req).id, req.params.workflowId, parsed.data);
      res.json({ success: true, workflow: serializeWorkflow(workflow) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to update workflow');
    }
  });

  router.delete('/:workflowId', async (req, res) => {
    try {
      await service.delete(requireUser(req).id, req.params.workflowId);
      res.json({ success: true });
    } catch (error) {
      sendServiceError(res, error, 'Failed to delete workflow');
    }
  });

  router.post('/:workflowId/steps', async (req, res) => {
    const parsed = stepSchema.safeParse(req.body);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }
    try {
      const workflow = await service.addStep(requireUser(req).id, req.params.workflowId, parsed.data);
      res.status(201).json({ success: true, workflow: serializeWorkflow(workflow) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to add step');
    }
  });

  router.delete('/:workflowId/steps/:stepId', async (req, res) => {
    try {
      const workflow = await service.removeStep(requireUser(req).id, req.params.workflowId, req.params.stepId);
      res.json({ success: true, workflow: serializeWorkflow(workflow) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to remove step');
    }
  });

  router.post('/:workflowId/deploy', async (req, res) => {
    try {
      const workflow = await service.deploy(requireUser(req).id, req.params.workflowId);
      res.json({ success: true, workflow: serializeWorkflow(workflow) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to deploy workflow');
    }
  });

  router.post('/:workflowId/pause', async (req, res) => {
    try {
      const workflow = await service.pause(requireUser(req).id, req.params.workflowId);
      res.json({ success: true, workflow: serializeWorkflow(workflow) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to pause workflow');
    }
  });

  router.post('/:workflowId/resume', async (req, res) => {
    try {
      const workflow = await service.resume(requireUser(req).id, req.params.workflowId);
      res.json({ success: true, workflow: serializeWorkflow(workflow) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to resume workflow');
    }
  });

  router.post('/:workflowId/execute', async (req, res) => {
    const parsed = executeSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }
    try {
      const user = requireUser(req);
      const handle = await platform.dispatcher.dispatch(req.params.workflowId, parsed.data.triggerData ?? {}, {
        requestedBy: user.id,
        ownerId: user.id,
      });
      res.status(201).json({ success: true, execution: handle });
    } catch (error) {
      sendServiceError(res, error, 'Failed to execute workflow');
    }
  });

  router.get('/:workflowId/executions', async (req, res) => {
    const parsed = executionListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }
    try {
      const executions = await service.listExecutions(requireUser(req).id, req.params.workflowId, parsed.data.limit);
      res.json({ success: true, executions });
    } catch (error) {
      sendServiceError(res, error, 'Failed to list executions');
    }
  });

  return router;
}
