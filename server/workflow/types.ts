export const TRIGGER_TYPES = ['manual', 'webhook', 'schedule'] as const;
export type TriggerType = (typeof TRIGGER_TYPES)[number];

export const WORKFLOW_STATUSES = ['draft', 'active', 'paused', 'error'] as const;
export type WorkflowStatus = (typeof WORKFLOW_STATUSES)[number];

export const STEP_ACTION_TYPES = [
  'api_call',
  'ai_process',
  'data_transform',
  'notification',
  'integration_action',
] as const;
export type StepActionType = (typeof STEP_ACTION_TYPES)[number];

export interface StepSpec {
  id: string;
  name: string;
  actionType: StepActionType;
  integrationId: string | null;
  config: Record<string, unknown>;
  order: number;
}

export interface Workflow {
  id: string;
  ownerId: string;
  name: string;
  description: string | null;
  triggerType: TriggerType;
  triggerConfig: Record<string, unknown>;
  steps: StepSpec[];
  status: WorkflowStatus;
  deployedRef: string | null;
  tags: string[];
  createdAt: Date;
  updatedAt: Date;
}

export const EXECUTION_STATUSES = ['pending', 'running', 'succeeded', 'failed', 'cancelled'] as const;
export type ExecutionStatus = (typeof EXECUTION_STATUSES)[number];

export const TERMINAL_EXECUTION_STATUSES = ['succeeded', 'failed', 'cancelled'] as const;
export type TerminalExecutionStatus = (typeof TERMINAL_EXECUTION_STATUSES)[number];

export const EXECUTION_FAILURE_REASONS = [
  'rate_limited',
  'dispatch_error',
  'reauth_required',
  'engine_reported',
] as const;
export type ExecutionFailureReason = (typeof EXECUTION_FAILURE_REASONS)[number];

export function isTerminalStatus(status: ExecutionStatus): status is TerminalExecutionStatus {
  return status === 'succeeded' || status === 'failed' || status === 'cancelled';
}

/** Per-step detail carried by a status event. */
export interface StepDetail {
  stepId?: string | null;
  name?: string | null;
  status: string;
  output?: unknown;
  error?: string | null;
}

export interface StepResult {
  stepId: string | null;
  name: string | null;
  status: string;
  output: unknown;
  error: string | null;
  source: string;
  receivedAt: string;
}

export interface EventDetail {
  eventId?: string | null;
  engineExecutionId?: string | null;
  errorMessage?: string | null;
  failureReason?: ExecutionFailureReason | null;
  steps?: StepDetail[];
}

export interface WorkflowExecution {
  id: string;
  workflowId: string;
  ownerId: string;
  status: ExecutionStatus;
  failureReason: ExecutionFailureReason | null;
  errorMessage: string | null;
  externalRef: string;
  engineExecutionId: string | null;
  triggerData: Record<string, unknown>;
  stepResults: StepResult[];
  appliedEventIds: string[];
  version: number;
  startedAt: Date;
  finishedAt: Date | null;
  lastEventAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ExecutionHandle {
  executionId: string;
  workflowId: string;
  externalRef: string;
  status: ExecutionStatus;
  failureReason: ExecutionFailureReason | null;
  errorMessage: string | null;
}

export function toExecutionHandle(execution: WorkflowExecution): ExecutionHandle {
  return {
    executionId: execution.id,
    workflowId: execution.workflowId,
    externalRef: execution.externalRef,
    status: execution.status,
    failureReason: execution.failureReason,
    errorMessage: execution.errorMessage,
  };
}
