import { env } from '../env';
import { ExecutionNotFoundError, InvalidTransitionError, UnknownExecutionError } from '../errors';
import type { ExternalEngineClient } from '../integrations/ExternalEngineClient';
import { getErrorMessage } from '../types/common';
import { logAction } from '../utils/actionLog';
import type { ExecutionRepository } from '../workflow/ExecutionRepository';
import { toExecutionHandle, type ExecutionHandle, type WorkflowExecution } from '../workflow/types';
import type { ReconcileOutcome, StatusReconciler } from './StatusReconciler';

export interface PollOptions {
  graceMs?: number;
  limit?: number;
}

export interface PollSummary {
  examined: number;
  updated: number;
  unchanged: number;
  skipped: number;
  errors: number;
}

const POLL_SOURCE = 'poll';

/**
 * Fallback for executions whose status webhook never arrived: asks the engine
 * directly and feeds the answer through the reconciler like any other event.
 */
export class ExecutionPollingService {
  constructor(
    private readonly executions: ExecutionRepository,
    private readonly engine: ExternalEngineClient,
    private readonly reconciler: StatusReconciler,
    private readonly now: () => number = Date.now
  ) {}

  async pollOnce(options: PollOptions = {}): Promise<PollSummary> {
    const graceMs = options.graceMs ?? env.POLL_GRACE_MS;
    const limit = options.limit ?? env.POLL_BATCH_SIZE;
    const candidates = await this.executions.listAwaitingUpdate({
      statuses: ['pending', 'running'],
      quietSince: new Date(this.now() - graceMs),
      limit,
    });

    const summary: PollSummary = { examined: candidates.length, updated: 0, unchanged: 0, skipped: 0, errors: 0 };

    for (const execution of candidates) {
      if (!execution.engineExecutionId) {
        summary.skipped += 1;
        continue;
      }
      try {
        const outcome = await this.syncFromEngine(execution, execution.engineExecutionId);
        if (outcome === 'applied' || outcome === 'steps_appended') {
          summary.updated += 1;
        } else {
          summary.unchanged += 1;
        }
      } catch (error) {
        summary.errors += 1;
        console.warn(
          `⚠️ [ExecutionPolling] Could not refresh execution ${execution.id}:`,
          getErrorMessage(error)
        );
      }
    }

    if (summary.examined > 0) {
      console.log(
        `🔄 [ExecutionPolling] Examined ${summary.examined} executions: ${summary.updated} updated, ${summary.skipped} skipped, ${summary.errors} errors`
      );
    }
    return summary;
  }

  /** Refreshes a single execution from the engine on demand. */
  async refreshExecution(executionId: string, options: { ownerId?: string } = {}): Promise<ExecutionHandle> {
    const execution = await this.executions.getById(executionId);
    if (!execution || (options.ownerId && execution.ownerId !== options.ownerId)) {
      throw new ExecutionNotFoundError(executionId);
    }
    if (execution.engineExecutionId) {
      await this.syncFromEngine(execution, execution.engineExecutionId);
    }
    const latest = await this.executions.getById(executionId);
    return toExecutionHandle(latest ?? execution);
  }

  async prune(retentionDays: number = env.EXECUTION_RETENTION_DAYS): Promise<number> {
    const cutoff = new Date(this.now() - retentionDays * 24 * 60 * 60 * 1000);
    const removed = await this.executions.deleteFinishedBefore(cutoff);
    if (removed > 0) {
      logAction({
        type: 'execution.pruned',
        component: 'ExecutionPolling',
        removed,
        cutoff: cutoff.toISOString(),
      });
    }
    return removed;
  }

  private async syncFromEngine(
    execution: WorkflowExecution,
    engineExecutionId: string
  ): Promise<ReconcileOutcome | 'skipped'> {
    const snapshot = await this.engine.getExecution(engineExecutionId);
    // Steps already recorded for this status are not reported again.
    const steps = snapshot.status === execution.status ? [] : snapshot.steps;
    try {
      const result = await this.reconciler.applyEvent(POLL_SOURCE, execution.externalRef, snapshot.status, {
        engineExecutionId,
        errorMessage: snapshot.errorMessage,
        steps,
      });
      return result.outcome;
    } catch (error) {
      // The row moved on or disappeared between listing and polling.
      if (error instanceof InvalidTransitionError || error instanceof UnknownExecutionError) {
        return 'skipped';
      }
      throw error;
    }
  }
}
