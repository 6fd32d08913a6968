import { z } from 'zod';

import { env } from '../env';
import { DispatchError } from '../errors';
import { getErrorMessage } from '../types/common';
import type { ExecutionStatus, StepDetail } from '../workflow/types';
import type {
  EngineExecutionAccepted,
  EngineExecutionRequest,
  EngineExecutionSnapshot,
  EngineStopResult,
  ExternalEngineClient,
} from './ExternalEngineClient';
import type { EngineWorkflowDefinition } from './n8nWorkflowFormat';

const N8N_STATUS_MAP: Record<string, ExecutionStatus> = {
  new: 'pending',
  waiting: 'pending',
  running: 'running',
  success: 'succeeded',
  succeeded: 'succeeded',
  error: 'failed',
  failed: 'failed',
  crashed: 'failed',
  canceled: 'cancelled',
  cancelled: 'cancelled',
};

export function mapN8nStatus(raw: string | null | undefined): ExecutionStatus | null {
  if (!raw) {
    return null;
  }
  return N8N_STATUS_MAP[raw.toLowerCase()] ?? null;
}

const idSchema = z.union([z.string(), z.number()]).transform((value) => String(value));

const createdWorkflowSchema = z.union([
  z.object({ data: z.object({ id: idSchema }) }),
  z.object({ id: idSchema }),
]);

const executeResponseSchema = z
  .object({
    data: z.object({ id: idSchema.optional(), executionId: idSchema.optional() }).partial().optional(),
    id: idSchema.optional(),
    executionId: idSchema.optional(),
  })
  .passthrough();

const runDataSchema = z.record(
  z.array(
    z
      .object({
        executionStatus: z.string().optional(),
        error: z.object({ message: z.string().optional() }).passthrough().nullable().optional(),
      })
      .passthrough()
  )
);

const executionSchema = z
  .object({
    id: idSchema.optional(),
    status: z.string().optional(),
    finished: z.boolean().optional(),
    stoppedAt: z.string().nullable().optional(),
    data: z
      .object({
        status: z.string().optional(),
        resultData: z
          .object({
            runData: runDataSchema.optional(),
            error: z.object({ message: z.string().optional() }).passthrough().nullable().optional(),
          })
          .passthrough()
          .optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
  })
  .passthrough();

type N8nExecution = z.infer<typeof executionSchema>;

function extractSteps(execution: N8nExecution): StepDetail[] {
  const runData = execution.data?.resultData?.runData ?? {};
  const steps: StepDetail[] = [];
  for (const [nodeName, runs] of Object.entries(runData)) {
    for (const run of runs) {
      steps.push({
        name: nodeName,
        status: run.executionStatus ?? (run.error ? 'error' : 'success'),
        error: run.error?.message ?? null,
      });
    }
  }
  return steps;
}

function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export interface N8NClientOptions {
  baseUrl?: string;
  apiKey?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

export class N8NClient implements ExternalEngineClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: N8NClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? env.N8N_BASE_URL).replace(/\/+$/, '');
    this.apiKey = options.apiKey ?? env.N8N_API_KEY;
    this.timeoutMs = options.timeoutMs ?? env.DISPATCH_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async createWorkflow(definition: EngineWorkflowDefinition): Promise<{ id: string }> {
    const body = await this.request('POST', '/api/v1/workflows', { body: definition });
    const parsed = createdWorkflowSchema.safeParse(body);
    if (!parsed.success) {
      throw new DispatchError('n8n did not return a workflow id', { retryable: false });
    }
    return { id: 'data' in parsed.data ? parsed.data.data.id : parsed.data.id };
  }

  async activateWorkflow(workflowRef: string): Promise<void> {
    await this.request('POST', `/api/v1/workflows/${encodeURIComponent(workflowRef)}/activate`);
  }

  async deactivateWorkflow(workflowRef: string): Promise<void> {
    await this.request('POST', `/api/v1/workflows/${encodeURIComponent(workflowRef)}/deactivate`);
  }

  async deleteWorkflow(workflowRef: string): Promise<void> {
    await this.request('DELETE', `/api/v1/workflows/${encodeURIComponent(workflowRef)}`, { allowNotFound: true });
  }

  async executeWorkflow(request: EngineExecutionRequest): Promise<EngineExecutionAccepted> {
    const body = await this.request('POST', `/api/v1/workflows/${encodeURIComponent(request.workflowRef)}/execute`, {
      body: {
        triggerData: request.triggerData,
        externalRef: request.externalRef,
        callbackUrl: request.callbackUrl,
        credentials: request.credentials,
      },
      headers: { 'Idempotency-Key': request.externalRef },
      signal: request.signal,
    });

    const parsed = executeResponseSchema.safeParse(body ?? {});
    if (!parsed.success) {
      return { engineExecutionId: null };
    }
    const data = parsed.data;
    return {
      engineExecutionId: data.data?.id ?? data.data?.executionId ?? data.id ?? data.executionId ?? null,
    };
  }

  async getExecution(engineExecutionId: string): Promise<EngineExecutionSnapshot> {
    const body = await this.request(
      'GET',
      `/api/v1/executions/${encodeURIComponent(engineExecutionId)}?includeData=true`
    );
    const parsed = executionSchema.safeParse(body);
    if (!parsed.success) {
      throw new DispatchError(`n8n returned an unreadable execution ${engineExecutionId}`, { retryable: false });
    }

    const execution = parsed.data;
    const status = mapN8nStatus(execution.status ?? execution.data?.status);
    const resolved: ExecutionStatus = status ?? (execution.finished ? 'succeeded' : 'running');

    return {
      status: resolved,
      steps: extractSteps(execution),
      errorMessage: execution.data?.resultData?.error?.message ?? null,
      finishedAt: execution.stoppedAt ? new Date(execution.stoppedAt) : null,
    };
  }

  async stopExecution(engineExecutionId: string): Promise<EngineStopResult> {
    const body = await this.request('POST', `/api/v1/executions/${encodeURIComponent(engineExecutionId)}/stop`, {
      allowNotFound: true,
    });

    const parsed = executionSchema.safeParse(body ?? {});
    const reported = parsed.success ? mapN8nStatus(parsed.data.status ?? parsed.data.data?.status) : null;
    if (reported === 'cancelled') {
      return { confirmed: true, status: 'cancelled' };
    }

    // Either the stop was not acknowledged or the execution had already ended.
    const snapshot = await this.getExecution(engineExecutionId);
    return { confirmed: snapshot.status === 'cancelled', status: snapshot.status };
  }

  private async request(
    method: 'GET' | 'POST' | 'DELETE',
    path: string,
    options: {
      body?: unknown;
      headers?: Record<string, string>;
      signal?: AbortSignal;
      allowNotFound?: boolean;
    } = {}
  ): Promise<unknown> {
    const headers: Record<string, string> = {
      Accept: 'application/json',
      ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      ...(this.apiKey ? { 'X-N8N-API-KEY': this.apiKey } : {}),
      ...options.headers,
    };

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error(`timed out after ${this.timeoutMs}ms`)), this.timeoutMs);
    const forwardAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      forwardAbort();
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
    } catch (error) {
      throw new DispatchError(`n8n ${method} ${path} failed: ${getErrorMessage(controller.signal.reason ?? error)}`, {
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', forwardAbort);
    }

    if (response.status === 404 && options.allowNotFound) {
      return null;
    }

    const text = await response.text();
    if (!response.ok) {
      throw new DispatchError(`n8n ${method} ${path} responded ${response.status}: ${text.slice(0, 200)}`, {
        retryable: isRetryableStatus(response.status),
        remoteStatus: response.status,
      });
    }

    if (!text) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch {
      return null;
    }
  }
}
