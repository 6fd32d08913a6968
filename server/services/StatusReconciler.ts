import { ConcurrentModificationError, InvalidTransitionError, UnknownExecutionError } from '../errors';
import { recordReconcileOutcome } from '../observability/index';
import { logAction } from '../utils/actionLog';
import type { ExecutionPatch, ExecutionRepository } from '../workflow/ExecutionRepository';
import {
  isTerminalStatus,
  type EventDetail,
  type ExecutionFailureReason,
  type ExecutionStatus,
  type StepResult,
  type WorkflowExecution,
} from '../workflow/types';
import { evaluateTransition } from './ExecutionStateMachine';

export type ReconcileOutcome = 'applied' | 'steps_appended' | 'already_applied' | 'conflict';

export interface ReconcileResult {
  outcome: ReconcileOutcome;
  executionId: string;
  externalRef: string;
  previousStatus: ExecutionStatus;
  /** Status recorded after the event was handled. */
  status: ExecutionStatus;
  appendedSteps: number;
}

export interface StatusReconcilerOptions {
  maxAttempts?: number;
  maxTrackedEventIds?: number;
  now?: () => Date;
}

/**
 * Applies status events from webhooks, polling and the dispatcher to executions.
 * Each transition is a conditional write against the execution's version; a
 * lost race re-reads the row and evaluates the event again.
 */
export class StatusReconciler {
  private readonly maxAttempts: number;
  private readonly maxTrackedEventIds: number;
  private readonly now: () => Date;

  constructor(
    private readonly executions: ExecutionRepository,
    options: StatusReconcilerOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 8);
    this.maxTrackedEventIds = Math.max(1, options.maxTrackedEventIds ?? 50);
    this.now = options.now ?? (() => new Date());
  }

  async applyEvent(
    source: string,
    externalRef: string,
    newStatus: ExecutionStatus,
    detail: EventDetail = {}
  ): Promise<ReconcileResult> {
    for (let attempt = 0; attempt < this.maxAttempts; attempt += 1) {
      const execution = await this.executions.getByExternalRef(externalRef);
      if (!execution) {
        console.warn(`⚠️ [StatusReconciler] ${source} event for unknown external ref ${externalRef} dropped`);
        recordReconcileOutcome('unknown_execution', source);
        throw new UnknownExecutionError(externalRef);
      }

      const result = await this.tryApply(execution, source, newStatus, detail);
      if (result) {
        recordReconcileOutcome(result.outcome, source);
        return result;
      }
    }

    throw new ConcurrentModificationError('Execution', externalRef);
  }

  /** Returns null when the conditional write lost a race. */
  private async tryApply(
    execution: WorkflowExecution,
    source: string,
    newStatus: ExecutionStatus,
    detail: EventDetail
  ): Promise<ReconcileResult | null> {
    const base = {
      executionId: execution.id,
      externalRef: execution.externalRef,
      previousStatus: execution.status,
    };

    if (detail.eventId && execution.appliedEventIds.includes(detail.eventId)) {
      return { ...base, outcome: 'already_applied', status: execution.status, appendedSteps: 0 };
    }

    const decision = evaluateTransition(execution.status, newStatus);
    const steps = this.buildStepResults(detail, source);

    switch (decision.kind) {
      case 'invalid':
        console.warn(
          `⚠️ [StatusReconciler] Rejected ${source} event ${execution.status} -> ${newStatus} for execution ${execution.id}`
        );
        if (!(await this.adoptEngineExecutionId(execution, detail))) {
          return null;
        }
        recordReconcileOutcome('invalid_transition', source);
        throw new InvalidTransitionError(execution.status, newStatus);

      case 'conflict':
        if (!(await this.adoptEngineExecutionId(execution, detail))) {
          return null;
        }
        logAction(
          {
            type: 'execution.status.conflict',
            component: 'StatusReconciler',
            message: `Conflicting terminal status ${newStatus} ignored; execution stays ${execution.status}`,
            executionId: execution.id,
            externalRef: execution.externalRef,
            source,
            recordedStatus: execution.status,
            reportedStatus: newStatus,
          },
          { severity: 'warn' }
        );
        console.warn(
          `⚠️ [StatusReconciler] Conflict for execution ${execution.id}: recorded ${execution.status}, ${source} reported ${newStatus}`
        );
        return { ...base, outcome: 'conflict', status: execution.status, appendedSteps: 0 };

      case 'same': {
        // Terminal executions keep their status and steps; non-terminal ones still collect detail.
        if (isTerminalStatus(execution.status)) {
          return (await this.adoptEngineExecutionId(execution, detail))
            ? { ...base, outcome: 'already_applied', status: execution.status, appendedSteps: 0 }
            : null;
        }
        const fillsEngineId = Boolean(detail.engineExecutionId && !execution.engineExecutionId);
        if (steps.length === 0 && !detail.eventId && !fillsEngineId) {
          return { ...base, outcome: 'already_applied', status: execution.status, appendedSteps: 0 };
        }
        const updated = await this.executions.compareAndSet(execution.id, execution.version, {
          ...this.commonPatch(execution, detail, steps),
        });
        if (!updated) {
          return null;
        }
        return steps.length > 0
          ? { ...base, outcome: 'steps_appended', status: updated.status, appendedSteps: steps.length }
          : { ...base, outcome: 'already_applied', status: updated.status, appendedSteps: 0 };
      }

      case 'advance': {
        const patch: ExecutionPatch = {
          ...this.commonPatch(execution, detail, steps),
          status: newStatus,
        };
        if (isTerminalStatus(newStatus)) {
          patch.finishedAt = this.now();
          patch.failureReason = newStatus === 'failed' ? this.resolveFailureReason(detail) : null;
          patch.errorMessage = detail.errorMessage ?? null;
        }

        const updated = await this.executions.compareAndSet(execution.id, execution.version, patch);
        if (!updated) {
          return null;
        }

        logAction({
          type: 'execution.status.changed',
          component: 'StatusReconciler',
          executionId: execution.id,
          workflowId: execution.workflowId,
          externalRef: execution.externalRef,
          source,
          from: execution.status,
          to: newStatus,
          failureReason: updated.failureReason,
        });
        return { ...base, outcome: 'applied', status: updated.status, appendedSteps: steps.length };
      }
    }
  }

  private commonPatch(execution: WorkflowExecution, detail: EventDetail, steps: StepResult[]): ExecutionPatch {
    const patch: ExecutionPatch = {
      lastEventAt: this.now(),
    };
    if (steps.length > 0) {
      patch.stepResults = [...execution.stepResults, ...steps];
    }
    if (detail.eventId) {
      patch.appliedEventIds = [...execution.appliedEventIds, detail.eventId].slice(-this.maxTrackedEventIds);
    }
    if (detail.engineExecutionId && !execution.engineExecutionId) {
      patch.engineExecutionId = detail.engineExecutionId;
    }
    return patch;
  }

  /**
   * Records the engine's execution id on a row that does not have one yet,
   * whatever happens to the status. False when the write lost a race.
   */
  private async adoptEngineExecutionId(execution: WorkflowExecution, detail: EventDetail): Promise<boolean> {
    if (!detail.engineExecutionId || execution.engineExecutionId) {
      return true;
    }
    const updated = await this.executions.compareAndSet(execution.id, execution.version, {
      engineExecutionId: detail.engineExecutionId,
    });
    return updated !== null;
  }

  private resolveFailureReason(detail: EventDetail): ExecutionFailureReason {
    return detail.failureReason ?? 'engine_reported';
  }

  private buildStepResults(detail: EventDetail, source: string): StepResult[] {
    const receivedAt = this.now().toISOString();
    return (detail.steps ?? []).map((step) => ({
      stepId: step.stepId ?? null,
      name: step.name ?? null,
      status: step.status,
      output: step.output ?? null,
      error: step.error ?? null,
      source,
      receivedAt,
    }));
  }
}
