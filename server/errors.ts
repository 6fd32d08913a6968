import type { ExecutionStatus } from './workflow/types';

/**
 * Base class for failures that carry a stable code and the HTTP status the API answers with.
 */
export class PlatformError extends Error {
  public readonly code: string;
  public readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlatformError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class NotDeployedError extends PlatformError {
  constructor(
    public readonly workflowId: string,
    public readonly workflowStatus: string,
  ) {
    super(`Workflow ${workflowId} is not deployed (status: ${workflowStatus})`, 'NOT_DEPLOYED', 409);
    this.name = 'NotDeployedError';
  }
}

export class RateLimitExceededError extends PlatformError {
  constructor(
    public readonly key: string,
    public readonly retryAfterMs: number,
  ) {
    super(`Rate limit exceeded for ${key}`, 'RATE_LIMITED', 429);
    this.name = 'RateLimitExceededError';
  }
}

export class DispatchError extends PlatformError {
  public readonly retryable: boolean;
  public readonly remoteStatus: number | null;

  constructor(message: string, options: { retryable: boolean; remoteStatus?: number | null; cause?: unknown }) {
    super(message, 'DISPATCH_ERROR', 502, { cause: options.cause });
    this.name = 'DispatchError';
    this.retryable = options.retryable;
    this.remoteStatus = options.remoteStatus ?? null;
  }
}

export class UnknownExecutionError extends PlatformError {
  constructor(public readonly externalRef: string) {
    super(`No execution matches external reference ${externalRef}`, 'UNKNOWN_EXECUTION', 404);
    this.name = 'UnknownExecutionError';
  }
}

export class InvalidTransitionError extends PlatformError {
  constructor(
    public readonly from: ExecutionStatus,
    public readonly to: ExecutionStatus,
  ) {
    super(`Invalid execution transition ${from} -> ${to}`, 'INVALID_TRANSITION', 409);
    this.name = 'InvalidTransitionError';
  }
}

export class ReauthRequiredError extends PlatformError {
  constructor(
    public readonly integrationId: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Integration ${integrationId} must be reconnected: ${reason}`, 'REAUTH_REQUIRED', 401, options);
    this.name = 'ReauthRequiredError';
  }
}

export class WorkflowNotFoundError extends PlatformError {
  constructor(public readonly workflowId: string) {
    super(`Workflow ${workflowId} not found`, 'WORKFLOW_NOT_FOUND', 404);
    this.name = 'WorkflowNotFoundError';
  }
}

export class ExecutionNotFoundError extends PlatformError {
  constructor(public readonly executionId: string) {
    super(`Execution ${executionId} not found`, 'EXECUTION_NOT_FOUND', 404);
    this.name = 'ExecutionNotFoundError';
  }
}

export class IntegrationNotFoundError extends PlatformError {
  constructor(public readonly integrationId: string) {
    super(`Integration ${integrationId} not found`, 'INTEGRATION_NOT_FOUND', 404);
    this.name = 'IntegrationNotFoundError';
  }
}

export class ValidationError extends PlatformError {
  constructor(message: string, public readonly details: string[] = []) {
    super(message, 'VALIDATION_ERROR', 400);
    this.name = 'ValidationError';
  }
}

export class ConcurrentModificationError extends PlatformError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} was modified concurrently; retry the operation`, 'CONCURRENT_MODIFICATION', 409);
    this.name = 'ConcurrentModificationError';
  }
}

export class OAuthError extends PlatformError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'OAUTH_ERROR', 400, options);
    this.name = 'OAuthError';
  }
}
