import { z } from 'zod';

import { PlatformError } from '../errors';
import { mapN8nStatus } from '../integrations/N8NClient';
import { EXECUTION_STATUSES, type ExecutionStatus, type StepDetail } from '../workflow/types';
import type { MappedStatusEvent, WebhookRequestContext, WebhookSource } from './types';

export class PayloadMappingError extends PlatformError {
  constructor(
    public readonly source: WebhookSource,
    message: string
  ) {
    super(`Cannot map ${source} webhook: ${message}`, 'UNMAPPABLE_PAYLOAD', 422);
    this.name = 'PayloadMappingError';
  }
}

const stepSchema = z.object({
  stepId: z.string().nullish(),
  node: z.string().nullish(),
  name: z.string().nullish(),
  status: z.string().default('unknown'),
  output: z.unknown().optional(),
  error: z
    .union([z.string(), z.object({ message: z.string() }).passthrough()])
    .nullish()
    .transform((value) => (typeof value === 'string' ? value : value?.message ?? null)),
});

const n8nCallbackSchema = z
  .object({
    status: z.string().min(1),
    executionId: z.union([z.string(), z.number()]).transform((value) => String(value)).optional(),
    eventId: z.string().min(1).optional(),
    externalRef: z.string().optional(),
    error: z
      .union([z.string(), z.object({ message: z.string() }).passthrough()])
      .optional()
      .transform((value) => (typeof value === 'string' ? value : value?.message)),
    steps: z.array(stepSchema).optional(),
  })
  .passthrough();

const githubWorkflowRunSchema = z
  .object({
    action: z.string().optional(),
    workflow_run: z
      .object({
        id: z.union([z.string(), z.number()]).transform((value) => String(value)),
        name: z.string().nullish(),
        status: z.string(),
        conclusion: z.string().nullish(),
        html_url: z.string().nullish(),
      })
      .passthrough(),
  })
  .passthrough();

const genericStatusSchema = z
  .object({
    status: z.enum(EXECUTION_STATUSES),
    eventId: z.string().min(1).optional(),
    errorMessage: z.string().optional(),
    steps: z.array(stepSchema).optional(),
  })
  .passthrough();

export type N8nCallback = z.infer<typeof n8nCallbackSchema>;
export type GithubWorkflowRunEvent = z.infer<typeof githubWorkflowRunSchema>;
export type GenericStatusEvent = z.infer<typeof genericStatusSchema>;

/** Source-specific webhook payloads, discriminated by `source`. */
export type WebhookPayload =
  | { source: 'n8n'; body: N8nCallback }
  | { source: 'github'; body: GithubWorkflowRunEvent; deliveryId: string | null }
  | { source: 'generic'; body: GenericStatusEvent; eventId: string | null };

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

export function parseWebhookPayload(
  source: WebhookSource,
  body: unknown,
  headers: Record<string, string>
): WebhookPayload {
  switch (source) {
    case 'n8n': {
      const parsed = n8nCallbackSchema.safeParse(body);
      if (!parsed.success) throw new PayloadMappingError(source, describeIssues(parsed.error));
      return { source, body: parsed.data };
    }
    case 'github': {
      const parsed = githubWorkflowRunSchema.safeParse(body);
      if (!parsed.success) throw new PayloadMappingError(source, describeIssues(parsed.error));
      return { source, body: parsed.data, deliveryId: headers['x-github-delivery'] ?? null };
    }
    case 'generic': {
      const parsed = genericStatusSchema.safeParse(body);
      if (!parsed.success) throw new PayloadMappingError(source, describeIssues(parsed.error));
      return { source, body: parsed.data, eventId: headers['x-event-id'] ?? null };
    }
  }
}

function toStepDetails(steps: z.infer<typeof stepSchema>[] | undefined): StepDetail[] | undefined {
  if (!steps || steps.length === 0) {
    return undefined;
  }
  return steps.map((step) => ({
    stepId: step.stepId ?? null,
    name: step.name ?? step.node ?? null,
    status: step.status,
    output: step.output,
    error: step.error,
  }));
}

function mapGithubRunStatus(status: string, conclusion: string | null | undefined): ExecutionStatus | null {
  switch (status) {
    case 'queued':
    case 'requested':
    case 'waiting':
    case 'pending':
      return 'pending';
    case 'in_progress':
      return 'running';
    case 'completed':
      switch (conclusion) {
        case 'success':
        case 'neutral':
          return 'succeeded';
        case 'cancelled':
        case 'skipped':
          return 'cancelled';
        case 'failure':
        case 'timed_out':
        case 'startup_failure':
        case 'action_required':
        case 'stale':
          return 'failed';
        default:
          return null;
      }
    default:
      return null;
  }
}

function mapN8n(body: N8nCallback, context: WebhookRequestContext): MappedStatusEvent {
  if (body.externalRef && body.externalRef !== context.externalRef) {
    throw new PayloadMappingError('n8n', 'externalRef in body does not match the callback path');
  }
  const status = mapN8nStatus(body.status);
  if (!status) {
    throw new PayloadMappingError('n8n', `unrecognised status "${body.status}"`);
  }
  return {
    externalRef: context.externalRef,
    status,
    detail: {
      eventId: body.eventId ?? null,
      engineExecutionId: body.executionId ?? null,
      errorMessage: body.error ?? null,
      steps: toStepDetails(body.steps),
    },
  };
}

function mapGithub(body: GithubWorkflowRunEvent, deliveryId: string | null, context: WebhookRequestContext): MappedStatusEvent {
  const run = body.workflow_run;
  const status = mapGithubRunStatus(run.status, run.conclusion);
  if (!status) {
    throw new PayloadMappingError('github', `unrecognised run status "${run.status}/${run.conclusion ?? ''}"`);
  }
  return {
    externalRef: context.externalRef,
    status,
    detail: {
      eventId: deliveryId,
      errorMessage: status === 'failed' ? `GitHub run ${run.id} concluded ${run.conclusion ?? 'unknown'}` : null,
    },
  };
}

function mapGeneric(body: GenericStatusEvent, eventId: string | null, context: WebhookRequestContext): MappedStatusEvent {
  return {
    externalRef: context.externalRef,
    status: body.status,
    detail: {
      eventId: body.eventId ?? eventId,
      errorMessage: body.errorMessage ?? null,
      steps: toStepDetails(body.steps),
    },
  };
}

/** Reduces a parsed payload to `(externalRef, status, detail)`. */
export function mapWebhookPayload(payload: WebhookPayload, context: WebhookRequestContext): MappedStatusEvent {
  switch (payload.source) {
    case 'n8n':
      return mapN8n(payload.body, context);
    case 'github':
      return mapGithub(payload.body, payload.deliveryId, context);
    case 'generic':
      return mapGeneric(payload.body, payload.eventId, context);
  }
}

export function mapWebhook(source: WebhookSource, body: unknown, context: WebhookRequestContext): MappedStatusEvent {
  return mapWebhookPayload(parseWebhookPayload(source, body, context.headers), context);
}
