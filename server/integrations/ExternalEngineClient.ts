import type { ExecutionStatus, StepDetail } from '../workflow/types';
import type { IntegrationType } from './types';
import type { EngineWorkflowDefinition } from './n8nWorkflowFormat';

export interface EngineCredential {
  integrationId: string;
  type: IntegrationType;
  accessToken: string;
}

export interface EngineExecutionRequest {
  workflowRef: string;
  /** Client-supplied idempotency key; also the path segment of the callback URL. */
  externalRef: string;
  triggerData: Record<string, unknown>;
  callbackUrl: string;
  credentials: EngineCredential[];
  signal?: AbortSignal;
}

export interface EngineExecutionAccepted {
  engineExecutionId: string | null;
}

export interface EngineExecutionSnapshot {
  status: ExecutionStatus;
  steps: StepDetail[];
  errorMessage: string | null;
  finishedAt: Date | null;
}

export interface EngineStopResult {
  /** The engine confirmed the execution was cancelled. */
  confirmed: boolean;
  /** Status the engine reports after the stop request, when known. */
  status: ExecutionStatus | null;
}

/**
 * The external workflow engine as seen by the dispatcher, the workflow
 * service and the polling fallback.
 */
export interface ExternalEngineClient {
  createWorkflow(definition: EngineWorkflowDefinition): Promise<{ id: string }>;
  activateWorkflow(workflowRef: string): Promise<void>;
  deactivateWorkflow(workflowRef: string): Promise<void>;
  deleteWorkflow(workflowRef: string): Promise<void>;
  executeWorkflow(request: EngineExecutionRequest): Promise<EngineExecutionAccepted>;
  getExecution(engineExecutionId: string): Promise<EngineExecutionSnapshot>;
  stopExecution(engineExecutionId: string): Promise<EngineStopResult>;
}
