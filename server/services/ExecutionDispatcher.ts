import { randomUUID } from 'node:crypto';

import { SpanStatusCode } from '@opentelemetry/api';

import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../core/retry';
import { env } from '../env';
import {
  DispatchError,
  ExecutionNotFoundError,
  IntegrationNotFoundError,
  InvalidTransitionError,
  NotDeployedError,
  RateLimitExceededError,
  ReauthRequiredError,
  ValidationError,
  WorkflowNotFoundError,
} from '../errors';
import type { EngineCredential, ExternalEngineClient } from '../integrations/ExternalEngineClient';
import type { IntegrationRepository } from '../integrations/IntegrationRepository';
import type { RateLimiter, RateLimitScope } from '../integrations/RateLimiter';
import type { Integration } from '../integrations/types';
import { recordDispatchLatency, recordDispatchOutcome, tracer } from '../observability/index';
import { getErrorMessage } from '../types/common';
import { logAction } from '../utils/actionLog';
import type { ExecutionRepository } from '../workflow/ExecutionRepository';
import type { WorkflowRepository } from '../workflow/WorkflowRepository';
import {
  toExecutionHandle,
  type EventDetail,
  type ExecutionFailureReason,
  type ExecutionHandle,
  type Workflow,
  type WorkflowExecution,
} from '../workflow/types';
import { canCancel } from './ExecutionStateMachine';
import type { StatusReconciler } from './StatusReconciler';
import type { TokenVault } from './TokenVault';

export interface DispatchOptions {
  requestedBy?: string | null;
  /** When set, the workflow must belong to this user. */
  ownerId?: string;
}

export interface ExecutionDispatcherDeps {
  workflows: WorkflowRepository;
  executions: ExecutionRepository;
  integrations: IntegrationRepository;
  tokenVault: TokenVault;
  rateLimiter: RateLimiter;
  engine: ExternalEngineClient;
  reconciler: StatusReconciler;
}

export interface ExecutionDispatcherOptions {
  timeoutMs?: number;
  retryPolicy?: Partial<RetryPolicy>;
  callbackBaseUrl?: string;
  sleep?: (ms: number) => Promise<void>;
}

const SOURCE = 'dispatcher';

function withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new DispatchError(`Engine did not accept the execution within ${timeoutMs}ms`, {
        retryable: true,
      });
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    operation(controller.signal).then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

function isRetryableDispatchError(error: unknown): boolean {
  return error instanceof DispatchError && error.retryable;
}

/**
 * Turns a workflow trigger into an execution on the external engine.
 *
 * The execution row, with its external reference, exists before any outbound
 * call so that callbacks always find it. A dispatch never leaves the execution
 * pending: it ends running or failed.
 */
export class ExecutionDispatcher {
  private readonly timeoutMs: number;
  private readonly retryPolicy: RetryPolicy;
  private readonly callbackBaseUrl: string;
  private readonly sleep?: (ms: number) => Promise<void>;

  constructor(
    private readonly deps: ExecutionDispatcherDeps,
    options: ExecutionDispatcherOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? env.DISPATCH_TIMEOUT_MS;
    this.retryPolicy = {
      ...DEFAULT_RETRY_POLICY,
      maxAttempts: env.DISPATCH_MAX_ATTEMPTS,
      initialDelayMs: env.DISPATCH_BACKOFF_MS,
      ...options.retryPolicy,
    };
    this.callbackBaseUrl = (options.callbackBaseUrl ?? env.PUBLIC_BASE_URL).replace(/\/+$/, '');
    this.sleep = options.sleep;
  }

  async dispatch(
    workflowId: string,
    triggerPayload: Record<string, unknown>,
    options: DispatchOptions = {}
  ): Promise<ExecutionHandle> {
    const workflow = await this.deps.workflows.getById(workflowId);
    if (!workflow || (options.ownerId && workflow.ownerId !== options.ownerId)) {
      throw new WorkflowNotFoundError(workflowId);
    }
    if (workflow.status !== 'active' || !workflow.deployedRef) {
      throw new NotDeployedError(workflowId, workflow.status);
    }
    const workflowRef = workflow.deployedRef;
    const integrations = await this.loadStepIntegrations(workflow);

    const execution = await this.deps.executions.create({
      workflowId: workflow.id,
      ownerId: workflow.ownerId,
      externalRef: randomUUID(),
      triggerData: triggerPayload,
    });

    console.log(
      `🚀 [ExecutionDispatcher] Execution ${execution.id} created for workflow ${workflow.id} (ref ${execution.externalRef})`
    );

    return tracer.startActiveSpan('execution.dispatch', async (span) => {
      span.setAttributes({
        'workflow.id': workflow.id,
        'execution.id': execution.id,
        'execution.external_ref': execution.externalRef,
      });
      try {
        const handle = await this.dispatchExecution(workflow, workflowRef, execution, integrations, options);
        span.setAttribute('execution.status', handle.status);
        return handle;
      } catch (error) {
        span.recordException(error instanceof Error ? error : new Error(getErrorMessage(error)));
        span.setStatus({ code: SpanStatusCode.ERROR, message: getErrorMessage(error) });
        throw error;
      } finally {
        span.end();
      }
    });
  }

  /**
   * Asks the engine to stop a pending or running execution. The local record
   * becomes cancelled only when the engine confirms.
   */
  async cancel(executionId: string, options: { ownerId?: string } = {}): Promise<ExecutionHandle> {
    const execution = await this.deps.executions.getById(executionId);
    if (!execution || (options.ownerId && execution.ownerId !== options.ownerId)) {
      throw new ExecutionNotFoundError(executionId);
    }
    if (!canCancel(execution.status)) {
      throw new InvalidTransitionError(execution.status, 'cancelled');
    }
    if (!execution.engineExecutionId) {
      throw new DispatchError(`Execution ${executionId} has no engine execution to cancel yet`, { retryable: true });
    }

    const result = await this.deps.engine.stopExecution(execution.engineExecutionId);
    if (result.confirmed) {
      return this.applyQuietly(execution, 'cancelled', {}, 'cancel');
    }
    if (result.status && result.status !== execution.status) {
      // The engine finished the work before the stop landed; record what it reports.
      return this.applyQuietly(execution, result.status, {}, 'cancel');
    }
    return toExecutionHandle(execution);
  }

  private async dispatchExecution(
    workflow: Workflow,
    workflowRef: string,
    execution: WorkflowExecution,
    integrations: Integration[],
    options: DispatchOptions
  ): Promise<ExecutionHandle> {
    let credentials: EngineCredential[];
    try {
      const denial = await this.deps.rateLimiter.admitAll(
        this.rateLimitScopes(integrations).map((scope) => ({ userId: workflow.ownerId, scope }))
      );
      if (denial) {
        throw new RateLimitExceededError(`${workflow.ownerId}:${denial.key.scope}`, denial.decision.retryAfterMs);
      }
      credentials = await this.collectCredentials(integrations);
    } catch (error) {
      await this.failBeforeEngine(execution, error);
      throw error;
    }

    const startedAt = Date.now();
    try {
      const accepted = await withRetry(
        () =>
          withTimeout(
            (signal) =>
              this.deps.engine.executeWorkflow({
                workflowRef,
                externalRef: execution.externalRef,
                triggerData: execution.triggerData,
                callbackUrl: `${this.callbackBaseUrl}/api/webhooks/n8n/${encodeURIComponent(execution.externalRef)}`,
                credentials,
                signal,
              }),
            this.timeoutMs
          ),
        this.retryPolicy,
        {
          shouldRetry: isRetryableDispatchError,
          onRetry: (error, attempt, delayMs) => {
            console.warn(
              `⚠️ [ExecutionDispatcher] Dispatch attempt ${attempt} for ${execution.id} failed, retrying in ${delayMs}ms:`,
              getErrorMessage(error)
            );
          },
          sleep: this.sleep,
        }
      );
      recordDispatchLatency(Date.now() - startedAt, { workflow_id: workflow.id, outcome: 'accepted' });

      const result = await this.applyQuietly(execution, 'running', {
        engineExecutionId: accepted.engineExecutionId,
      });
      recordDispatchOutcome('running');
      logAction({
        type: 'execution.dispatched',
        component: 'ExecutionDispatcher',
        executionId: execution.id,
        workflowId: workflow.id,
        externalRef: execution.externalRef,
        engineExecutionId: accepted.engineExecutionId,
        requestedBy: options.requestedBy ?? null,
      });
      return result;
    } catch (error) {
      recordDispatchLatency(Date.now() - startedAt, { workflow_id: workflow.id, outcome: 'error' });
      const message = getErrorMessage(error);
      console.error(`❌ [ExecutionDispatcher] Dispatch of execution ${execution.id} failed:`, message);
      recordDispatchOutcome('dispatch_error');
      return this.fail(execution, 'dispatch_error', message);
    }
  }

  /** Settles the execution when dispatch stops before the engine is called. */
  private async failBeforeEngine(execution: WorkflowExecution, error: unknown): Promise<void> {
    if (error instanceof RateLimitExceededError) {
      const scope = error.key.slice(error.key.lastIndexOf(':') + 1);
      await this.fail(execution, 'rate_limited', `Rate limit exceeded for ${scope}`);
      recordDispatchOutcome('rate_limited', { scope });
      return;
    }
    if (error instanceof ReauthRequiredError) {
      await this.fail(execution, 'reauth_required', error.message);
      recordDispatchOutcome('reauth_required');
      return;
    }
    const message = getErrorMessage(error);
    console.error(`❌ [ExecutionDispatcher] Execution ${execution.id} could not be prepared:`, message);
    await this.fail(execution, 'dispatch_error', message);
    recordDispatchOutcome('dispatch_error');
  }

  private async loadStepIntegrations(workflow: Workflow): Promise<Integration[]> {
    const ids = Array.from(
      new Set(workflow.steps.map((step) => step.integrationId).filter((id): id is string => Boolean(id)))
    );
    const integrations: Integration[] = [];
    for (const id of ids) {
      const integration = await this.deps.integrations.getById(id);
      if (!integration) {
        throw new IntegrationNotFoundError(id);
      }
      if (integration.ownerId !== workflow.ownerId) {
        throw new ValidationError(`Integration ${id} does not belong to the workflow owner`);
      }
      integrations.push(integration);
    }
    return integrations;
  }

  private rateLimitScopes(integrations: Integration[]): RateLimitScope[] {
    const types = Array.from(new Set(integrations.map((integration) => integration.type)));
    return types.length > 0 ? types : ['engine'];
  }

  private async collectCredentials(integrations: Integration[]): Promise<EngineCredential[]> {
    const credentials: EngineCredential[] = [];
    for (const integration of integrations) {
      const token = await this.deps.tokenVault.getValidToken(integration.id);
      credentials.push({ integrationId: integration.id, type: integration.type, accessToken: token.accessToken });
    }
    return credentials;
  }

  private async fail(
    execution: WorkflowExecution,
    failureReason: ExecutionFailureReason,
    errorMessage: string
  ): Promise<ExecutionHandle> {
    return this.applyQuietly(execution, 'failed', { failureReason, errorMessage });
  }

  /**
   * Applies a dispatcher-side transition. A callback may already have moved the
   * execution further; in that case the recorded state is returned unchanged.
   */
  private async applyQuietly(
    execution: WorkflowExecution,
    status: WorkflowExecution['status'],
    detail: EventDetail,
    source = SOURCE
  ): Promise<ExecutionHandle> {
    try {
      await this.deps.reconciler.applyEvent(source, execution.externalRef, status, detail);
    } catch (error) {
      if (!(error instanceof InvalidTransitionError)) {
        throw error;
      }
      console.warn(
        `⚠️ [ExecutionDispatcher] Execution ${execution.id} already moved past ${status}: ${error.message}`
      );
    }
    const latest = await this.deps.executions.getById(execution.id);
    return toExecutionHandle(latest ?? execution);
  }
}
