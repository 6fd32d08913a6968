import {
  IntegrationNotFoundError,
  InvalidTransitionError,
  NotDeployedError,
  RateLimitExceededError,
  ReauthRequiredError,
  UnknownExecutionError,
  ValidationError,
  WorkflowNotFoundError,
} from '../errors';
import type { Platform } from '../platform';
import type { JobHandlers } from '../queue/index';
import { getErrorMessage } from '../types/common';
import { logAction } from '../utils/actionLog';

/** Dispatch failures the owning user has to act on; retrying cannot help. */
function isSurfacedDispatchError(error: unknown): boolean {
  return (
    error instanceof NotDeployedError ||
    error instanceof WorkflowNotFoundError ||
    error instanceof IntegrationNotFoundError ||
    error instanceof ValidationError ||
    error instanceof RateLimitExceededError ||
    error instanceof ReauthRequiredError
  );
}

export function createJobHandlers(platform: Pick<Platform, 'dispatcher' | 'reconciler' | 'polling'>): JobHandlers {
  return {
    'workflow.dispatch': async (job) => {
      const { workflowId, triggerData, triggerSource, requestedBy } = job.payload;
      try {
        const handle = await platform.dispatcher.dispatch(workflowId, triggerData, { requestedBy });
        console.log(
          `⚙️ [Worker] ${triggerSource} dispatch of workflow ${workflowId} -> execution ${handle.executionId} (${handle.status})`
        );
      } catch (error) {
        if (!isSurfacedDispatchError(error)) {
          throw error;
        }
        logAction(
          {
            type: 'workflow.dispatch.rejected',
            component: 'Worker',
            jobId: job.id,
            workflowId,
            triggerSource,
            reason: getErrorMessage(error),
            errorName: error instanceof Error ? error.name : 'Error',
          },
          { severity: 'warn' }
        );
      }
    },

    'execution.reconcile': async (job) => {
      const { source, externalRef, status, detail } = job.payload;
      try {
        await platform.reconciler.applyEvent(source, externalRef, status, detail);
      } catch (error) {
        // Events with no local execution or an impossible transition cannot succeed on retry.
        if (error instanceof UnknownExecutionError || error instanceof InvalidTransitionError) {
          logAction(
            {
              type: 'execution.event.dropped',
              component: 'Worker',
              jobId: job.id,
              source,
              externalRef,
              status,
              reason: error.message,
            },
            { severity: 'warn' }
          );
          return;
        }
        throw error;
      }
    },

    'execution.poll': async (job) => {
      await platform.polling.pollOnce({ graceMs: job.payload.graceMs, limit: job.payload.limit });
    },

    'execution.prune': async (job) => {
      const removed = await platform.polling.prune(job.payload.retentionDays);
      console.log(`🧹 [Worker] Pruned ${removed} finished execution(s)`);
    },
  };
}
