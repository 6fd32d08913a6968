import { Router } from 'express';

import { ExecutionNotFoundError } from '../errors';
import { authenticateToken, requireUser } from '../middleware/auth';
import type { Platform } from '../platform';
import { sendServiceError } from './errors';

export function createExecutionRouter(platform: Platform): Router {
  const router = Router();
  router.use(authenticateToken);

  router.get('/:executionId', async (req, res) => {
    try {
      const execution = await platform.executions.getById(req.params.executionId);
      if (!execution || execution.ownerId !== requireUser(req).id) {
        throw new ExecutionNotFoundError(req.params.executionId);
      }
      res.json({ success: true, execution });
    } catch (error) {
      sendServiceError(res, error, 'Failed to load execution');
    }
  });

  router.post('/:executionId/cancel', async (req, res) => {
    try {
      const handle = await platform.dispatcher.cancel(req.params.executionId, { ownerId: requireUser(req).id });
      res.json({ success: true, execution: handle, cancelled: handle.status === 'cancelled' });
    } catch (error) {
      sendServiceError(res, error, 'Failed to cancel execution');
    }
  });

  router.post('/:executionId/refresh', async (req, res) => {
    try {
      const handle = await platform.polling.refreshExecution(req.params.executionId, { ownerId: requireUser(req).id });
      res.json({ success: true, execution: handle });
    } catch (error) {
      sendServiceError(res, error, 'Failed to refresh execution');
    }
  });

  return router;
}
