import { Router } from 'express';
import { z } from 'zod';

import { ValidationError } from '../errors';
import { isIntegrationType, type Integration } from '../integrations/types';
import { authenticateToken, requireUser } from '../middleware/auth';
import type { Platform } from '../platform';
import { sendServiceError, sendValidationError } from './errors';

const connectSchema = z.object({
  name: z.string().min(1).optional(),
  redirectUri: z.string().url().optional(),
});

const callbackQuerySchema = z.object({
  state: z.string().min(1, 'state is required'),
  code: z.string().min(1, 'code is required'),
});

const actionSchema = z.object({
  params: z.record(z.unknown()).optional(),
});

function serializeIntegration(integration: Integration) {
  return {
    ...integration,
    createdAt: integration.createdAt.toISOString(),
    updatedAt: integration.updatedAt.toISOString(),
  };
}

export function createIntegrationRouter(platform: Platform): Router {
  const router = Router();
  const service = platform.integrationService;

  // The provider redirects the browser here, without our bearer token.
  router.get('/oauth/callback', async (req, res) => {
    if (typeof req.query.error === 'string') {
      return res.status(400).json({ success: false, error: `Authorization denied: ${req.query.error}`, code: 'OAUTH_ERROR' });
    }
    const parsed = callbackQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }
    try {
      const integration = await service.completeConnect(parsed.data.state, parsed.data.code);
      res.json({ success: true, integration: serializeIntegration(integration) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to complete OAuth connection');
    }
  });

  router.use(authenticateToken);

  router.get('/', async (req, res) => {
    try {
      const integrations = await service.list(requireUser(req).id);
      res.json({ success: true, integrations: integrations.map(serializeIntegration) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to list integrations');
    }
  });

  router.get('/actions', (_req, res) => {
    res.json({ success: true, actions: platform.actionService.listActions() });
  });

  router.post('/:type/connect', (req, res) => {
    const parsed = connectSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }
    try {
      const { type } = req.params;
      if (!isIntegrationType(type)) {
        throw new ValidationError(`Unknown integration type: ${type}`);
      }
      const result = service.beginConnect(requireUser(req).id, type, parsed.data);
      res.json({ success: true, ...result });
    } catch (error) {
      sendServiceError(res, error, 'Failed to start OAuth connection');
    }
  });

  router.delete('/:integrationId', async (req, res) => {
    try {
      const integration = await service.disconnect(requireUser(req).id, req.params.integrationId);
      res.json({ success: true, integration: serializeIntegration(integration) });
    } catch (error) {
      sendServiceError(res, error, 'Failed to disconnect integration');
    }
  });

  router.post('/:integrationId/actions/:action', async (req, res) => {
    const parsed = actionSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }
    try {
      const data = await platform.actionService.execute(
        requireUser(req).id,
        req.params.integrationId,
        req.params.action,
        parsed.data.params ?? {}
      );
      res.json({ success: true, data });
    } catch (error) {
      sendServiceError(res, error, 'Failed to execute integration action');
    }
  });

  return router;
}
