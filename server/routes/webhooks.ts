import express, { Router } from 'express';
import type { Request, Response } from 'express';

import { recordWebhookReceived } from '../observability/index';
import type { Platform } from '../platform';
import { getErrorMessage } from '../types/common';
import { PayloadMappingError, mapWebhook } from '../webhooks/payloadMappers';
import { isWebhookSource } from '../webhooks/types';
import { normalizeHeaders } from '../webhooks/WebhookVerifier';
import { sendServiceError } from './errors';

function reply(res: Response, source: string, status: number, body: Record<string, unknown>): void {
  recordWebhookReceived(source, status);
  res.status(status).json(body);
}

function dedupeJobId(source: string, externalRef: string, eventId: string | null | undefined): string | undefined {
  if (!eventId) {
    return undefined;
  }
  return `reconcile-${source}-${externalRef}-${eventId}`.replace(/[^A-Za-z0-9._-]/g, '_');
}

/**
 * Status callbacks from the engine and other external systems. Handlers only
 * verify, map and enqueue; reconciliation happens on the work queue.
 */
export function createWebhookRouter(platform: Platform): Router {
  const router = Router();

  router.post(
    '/:source/:externalRef',
    express.raw({ type: () => true, limit: '1mb' }),
    async (req: Request, res: Response) => {
      const { source, externalRef } = req.params;

      if (!isWebhookSource(source)) {
        return reply(res, source, 404, { success: false, error: `Unknown webhook source: ${source}`, code: 'UNKNOWN_SOURCE' });
      }

      const rawBody: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const headers = normalizeHeaders(req.headers);

      const verification = platform.webhookVerifier.verify(source, { headers, rawBody });
      if (!verification.isValid) {
        console.warn(`⚠️ [Webhooks] Rejected ${source} webhook for ${externalRef}: ${verification.message}`);
        return reply(res, source, 401, {
          success: false,
          error: verification.message ?? 'Invalid signature',
          code: verification.failureReason ?? 'INVALID_SIGNATURE',
        });
      }

      let body: unknown;
      try {
        body = JSON.parse(rawBody.toString('utf8'));
      } catch (error) {
        return reply(res, source, 400, {
          success: false,
          error: `Webhook body is not valid JSON: ${getErrorMessage(error)}`,
          code: 'INVALID_JSON',
        });
      }

      try {
        const event = mapWebhook(source, body, { externalRef, headers });
        const jobId = await platform.queue.enqueue(
          'execution.reconcile',
          {
            source,
            externalRef: event.externalRef,
            status: event.status,
            detail: event.detail,
            receivedAt: new Date().toISOString(),
          },
          { jobId: dedupeJobId(source, event.externalRef, event.detail.eventId) }
        );
        return reply(res, source, 202, { success: true, accepted: true, jobId, status: event.status });
      } catch (error) {
        if (error instanceof PayloadMappingError) {
          console.warn(`⚠️ [Webhooks] ${error.message}`);
          return reply(res, source, 422, { success: false, error: error.message, code: error.code });
        }
        recordWebhookReceived(source, 500);
        return sendServiceError(res, error, 'Failed to accept webhook');
      }
    }
  );

  return router;
}
