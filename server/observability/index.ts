import { metrics, trace } from '@opentelemetry/api';
import { logs } from '@opentelemetry/api-logs';

type MetricAttributes = Record<string, string | number | boolean>;

export const tracer = trace.getTracer('conduit.platform');
export const meter = metrics.getMeter('conduit.platform');

const httpRequestDurationHistogram = meter.createHistogram('http_request_duration_ms', {
  description: 'Duration of HTTP server requests',
  unit: 'ms',
});

const dispatchOutcomeCounter = meter.createCounter('execution_dispatch_total', {
  description: 'Dispatch attempts by outcome',
});

const dispatchLatencyHistogram = meter.createHistogram('execution_dispatch_latency_ms', {
  description: 'Latency of outbound engine dispatch calls, retries included',
  unit: 'ms',
});

const reconcileOutcomeCounter = meter.createCounter('execution_reconcile_total', {
  description: 'Status events applied to executions by source and outcome',
});

const rateLimitDecisionCounter = meter.createCounter('rate_limit_decisions_total', {
  description: 'Sliding-window rate limit decisions',
});

const tokenRefreshCounter = meter.createCounter('integration_token_refresh_total', {
  description: 'Integration token refresh attempts by result',
});

const webhookReceivedCounter = meter.createCounter('webhook_events_received_total', {
  description: 'Inbound status webhooks by source and HTTP status',
});

const queueJobCounter = meter.createCounter('work_queue_jobs_total', {
  description: 'Work queue job completions by kind and result',
});

function sanitizeAttributes(attributes: Record<string, unknown>): MetricAttributes {
  const sanitized: MetricAttributes = {};
  for (const [key, value] of Object.entries(attributes)) {
    if (value === undefined || value === null) {
      continue;
    }
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

export function recordHttpRequestDuration(durationMs: number, attributes: Record<string, unknown>): void {
  httpRequestDurationHistogram.record(durationMs, sanitizeAttributes(attributes));
}

export function recordDispatchOutcome(
  outcome: 'running' | 'rate_limited' | 'reauth_required' | 'dispatch_error',
  attributes: Record<string, unknown> = {}
): void {
  dispatchOutcomeCounter.add(1, sanitizeAttributes({ ...attributes, outcome }));
}

export function recordDispatchLatency(durationMs: number, attributes: Record<string, unknown>): void {
  dispatchLatencyHistogram.record(durationMs, sanitizeAttributes(attributes));
}

export function recordReconcileOutcome(outcome: string, source: string): void {
  reconcileOutcomeCounter.add(1, { outcome, source });
}

export function recordRateLimitDecision(scope: string, allowed: boolean): void {
  rateLimitDecisionCounter.add(1, { scope, allowed });
}

export function recordTokenRefresh(result: 'success' | 'failure' | 'superseded', integrationType: string): void {
  tokenRefreshCounter.add(1, { result, integration_type: integrationType });
}

export function recordWebhookReceived(source: string, status: number): void {
  webhookReceivedCounter.add(1, { source, status });
}

export function recordQueueJob(kind: string, result: 'completed' | 'retried' | 'dead_lettered'): void {
  queueJobCounter.add(1, { kind, result });
}

export function getLogger(name: string, version = '1.0.0') {
  return logs.getLogger(name, version);
}
