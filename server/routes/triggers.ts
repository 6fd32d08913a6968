import crypto from 'crypto';
import express, { Router } from 'express';

import { NotDeployedError, ValidationError, WorkflowNotFoundError } from '../errors';
import { isIntegrationType } from '../integrations/types';
import type { Platform } from '../platform';
import { isRecord } from '../types/common';
import type { Workflow } from '../workflow/types';
import { sendServiceError } from './errors';

function readEventType(body: Record<string, unknown>): string | null {
  for (const key of ['type', 'action', 'event_type']) {
    const value = body[key];
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  return null;
}

function matchesIntegrationEvent(workflow: Workflow, integrationType: string, eventType: string | null): boolean {
  const config = workflow.triggerConfig;
  if (config.integrationType !== integrationType) {
    return false;
  }
  const expected = config.eventType;
  if (typeof expected !== 'string' || expected.length === 0) {
    return true;
  }
  return expected === eventType;
}

function secretMatches(expected: string, provided: string | undefined): boolean {
  if (!provided) {
    return false;
  }
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}

export function createTriggerRouter(platform: Platform): Router {
  const router = Router();
  router.use(express.json({ limit: '1mb' }));

  router.post('/workflows/:workflowId', async (req, res) => {
    try {
      const workflow = await platform.workflows.getById(req.params.workflowId);
      if (!workflow || workflow.triggerType !== 'webhook') {
        throw new WorkflowNotFoundError(req.params.workflowId);
      }
      if (workflow.status !== 'active' || !workflow.deployedRef) {
        throw new NotDeployedError(workflow.id, workflow.status);
      }

      const secret = workflow.triggerConfig.secret;
      if (typeof secret === 'string' && secret.length > 0 && !secretMatches(secret, req.get('x-trigger-secret'))) {
        return res.status(401).json({ success: false, error: 'Invalid trigger secret', code: 'INVALID_TRIGGER_SECRET' });
      }

      const triggerData = isRecord(req.body) ? req.body : {};
      const jobId = await platform.queue.enqueue('workflow.dispatch', {
        workflowId: workflow.id,
        triggerData,
        triggerSource: 'webhook',
        requestedBy: null,
      });
      res.status(202).json({ success: true, accepted: true, jobId });
    } catch (error) {
      sendServiceError(res, error, 'Failed to trigger workflow');
    }
  });

  router.post('/integrations/:type', async (req, res) => {
    try {
      const { type } = req.params;
      if (!isIntegrationType(type)) {
        throw new ValidationError(`Unknown integration type: ${type}`);
      }
      const body = isRecord(req.body) ? req.body : {};
      const eventType = readEventType(body);

      const candidates = await platform.workflows.list({ status: 'active', triggerType: 'webhook' });
      const matched = candidates.filter((workflow) => workflow.deployedRef && matchesIntegrationEvent(workflow, type, eventType));

      const jobIds: string[] = [];
      for (const workflow of matched) {
        jobIds.push(
          await platform.queue.enqueue('workflow.dispatch', {
            workflowId: workflow.id,
            triggerData: { integrationType: type, eventType, payload: body },
            triggerSource: 'webhook',
            requestedBy: null,
          })
        );
      }

      if (matched.length > 0) {
        console.log(`📥 [Triggers] ${type} event ${eventType ?? '(untyped)'} matched ${matched.length} workflow(s)`);
      }
      res.status(202).json({ success: true, matched: matched.length, jobIds });
    } catch (error) {
      sendServiceError(res, error, 'Failed to process integration event');
    }
  });

  return router;
}
