import { randomUUID } from 'crypto';

import { context as otelContext, propagation, SpanKind, SpanStatusCode, trace as otelTrace } from '@opentelemetry/api';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';

import { env } from './env';
import { recordHttpRequestDuration, tracer } from './observability/index';
import type { Platform } from './platform';
import { createExecutionRouter } from './routes/executions';
import { createHealthRouter } from './routes/health';
import { createIntegrationRouter } from './routes/integrations';
import { createTriggerRouter } from './routes/triggers';
import { createWebhookRouter } from './routes/webhooks';
import { createWorkflowRouter } from './routes/workflows';
import { getErrorMessage } from './types/common';

const shouldBypassStandardBodyParsers = (req: Request): boolean => req.path.startsWith('/api/webhooks');

export function createApp(platform: Platform): Express {
  const app = express();
  app.disable('x-powered-by');

  // Correlation ID
  app.use((req, res, next) => {
    const existing = req.get('x-request-id');
    res.setHeader('x-request-id', existing && existing.length > 0 ? existing : randomUUID());
    next();
  });

  if (env.CORS_ORIGIN) {
    app.use((req, res, next) => {
      res.setHeader('Access-Control-Allow-Origin', env.CORS_ORIGIN);
      res.setHeader('Access-Control-Allow-Headers', 'Authorization, Content-Type, X-Request-Id');
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PATCH, DELETE, OPTIONS');
      if (req.method === 'OPTIONS') {
        return res.sendStatus(204);
      }
      next();
    });
  }

  // Webhooks verify signatures over the raw body and parse it themselves.
  const jsonParser = express.json({ limit: '1mb' });
  app.use((req, res, next) => {
    if (shouldBypassStandardBodyParsers(req)) {
      return next();
    }
    return jsonParser(req, res, next);
  });

  app.use((req, res, next) => {
    const routeSnapshot = req.path;
    const parentContext = propagation.extract(otelContext.active(), req.headers);
    const span = tracer.startSpan(
      'http.server.request',
      {
        kind: SpanKind.SERVER,
        attributes: {
          'http.method': req.method,
          'http.target': req.originalUrl,
          'http.user_agent': req.get('user-agent') ?? undefined,
        },
      },
      parentContext
    );
    const startTime = process.hrtime.bigint();
    let spanEnded = false;

    const endSpan = (status: { code: SpanStatusCode; message?: string }) => {
      if (spanEnded) {
        return;
      }
      spanEnded = true;
      const durationMs = Number(process.hrtime.bigint() - startTime) / 1_000_000;
      const matchedRoute = typeof req.route?.path === 'string' ? `${req.baseUrl}${req.route.path}` : routeSnapshot;
      span.setAttributes({ 'http.route': matchedRoute, 'http.status_code': res.statusCode });
      span.setStatus(status);
      span.end();
      recordHttpRequestDuration(durationMs, {
        http_method: req.method,
        http_route: matchedRoute,
        http_status_code: res.statusCode,
      });
      if (env.NODE_ENV !== 'test' && routeSnapshot.startsWith('/api')) {
        console.log(`[${res.getHeader('x-request-id')}] ${req.method} ${routeSnapshot} ${res.statusCode} in ${Math.round(durationMs)}ms`);
      }
    };

    res.on('finish', () => {
      endSpan(
        res.statusCode >= 500 ? { code: SpanStatusCode.ERROR, message: `HTTP ${res.statusCode}` } : { code: SpanStatusCode.OK }
      );
    });
    res.on('close', () => {
      endSpan({ code: SpanStatusCode.ERROR, message: 'connection closed before response finished' });
    });

    otelContext.with(otelTrace.setSpan(parentContext, span), () => next());
  });

  app.use('/api', createHealthRouter(platform));
  app.use('/api/webhooks', createWebhookRouter(platform));
  app.use('/api/triggers', createTriggerRouter(platform));
  app.use('/api/workflows', createWorkflowRouter(platform));
  app.use('/api/executions', createExecutionRouter(platform));
  app.use('/api/integrations', createIntegrationRouter(platform));

  app.use('/api', (_req, res) => {
    res.status(404).json({ success: false, error: 'Not found', code: 'NOT_FOUND' });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // Body parser failures carry a status; everything else is a 500.
    const status =
      typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) {
      console.error('❌ Unhandled request error:', err);
    }
    res.status(status).json({ success: false, error: getErrorMessage(err), code: status >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST' });
  });

  return app;
}
