import { z } from 'zod';

import {
  EXECUTION_FAILURE_REASONS,
  EXECUTION_STATUSES,
  TRIGGER_TYPES,
  type EventDetail,
  type StepDetail,
} from '../workflow/types';

const stepDetailSchema: z.ZodType<StepDetail> = z.object({
  stepId: z.string().nullable().optional(),
  name: z.string().nullable().optional(),
  status: z.string(),
  output: z.unknown().optional(),
  error: z.string().nullable().optional(),
});

export const eventDetailSchema: z.ZodType<EventDetail> = z.object({
  eventId: z.string().nullable().optional(),
  engineExecutionId: z.string().nullable().optional(),
  errorMessage: z.string().nullable().optional(),
  failureReason: z.enum(EXECUTION_FAILURE_REASONS).nullable().optional(),
  steps: z.array(stepDetailSchema).optional(),
});

const workflowDispatchJobSchema = z.object({
  workflowId: z.string().min(1),
  triggerData: z.record(z.unknown()),
  triggerSource: z.enum(TRIGGER_TYPES),
  requestedBy: z.string().nullable(),
});

const executionReconcileJobSchema = z.object({
  source: z.string().min(1),
  externalRef: z.string().min(1),
  status: z.enum(EXECUTION_STATUSES),
  detail: eventDetailSchema,
  receivedAt: z.string(),
});

const executionPollJobSchema = z.object({
  graceMs: z.number().int().nonnegative(),
  limit: z.number().int().positive(),
});

const executionPruneJobSchema = z.object({
  retentionDays: z.number().int().positive(),
});

export type WorkflowDispatchJob = z.infer<typeof workflowDispatchJobSchema>;
export type ExecutionReconcileJob = z.infer<typeof executionReconcileJobSchema>;
export type ExecutionPollJob = z.infer<typeof executionPollJobSchema>;
export type ExecutionPruneJob = z.infer<typeof executionPruneJobSchema>;

export interface JobPayloads {
  'workflow.dispatch': WorkflowDispatchJob;
  'execution.reconcile': ExecutionReconcileJob;
  'execution.poll': ExecutionPollJob;
  'execution.prune': ExecutionPruneJob;
}

export type JobKind = keyof JobPayloads;

export const jobPayloadSchemas: { [K in JobKind]: z.ZodType<JobPayloads[K]> } = {
  'workflow.dispatch': workflowDispatchJobSchema,
  'execution.reconcile': executionReconcileJobSchema,
  'execution.poll': executionPollJobSchema,
  'execution.prune': executionPruneJobSchema,
};

export const JOB_KINDS = Object.keys(jobPayloadSchemas).filter(isJobKind);

export function isJobKind(value: string): value is JobKind {
  return Object.prototype.hasOwnProperty.call(jobPayloadSchemas, value);
}

export interface QueuedJob<K extends JobKind> {
  id: string;
  kind: K;
  payload: JobPayloads[K];
  /** Attempts already made before this one. */
  attemptsMade: number;
}

export type JobHandler<K extends JobKind> = (job: QueuedJob<K>) => Promise<void>;

export type JobHandlers = { [K in JobKind]?: JobHandler<K> };

export interface EnqueueOptions {
  /** Jobs with an id already queued are not added again. */
  jobId?: string;
  delayMs?: number;
  attempts?: number;
}

export interface WorkerPoolOptions {
  concurrency?: number;
}

export interface WorkerPool {
  close(): Promise<void>;
}

export type QueueDriverName = 'bullmq' | 'inmemory';

/**
 * Producers enqueue `{ kind, payload }`; a worker pool dequeues and runs the matching handler.
 * Retries and dead-lettering belong to the queue.
 */
export interface WorkQueue {
  readonly driver: QueueDriverName;
  enqueue<K extends JobKind>(kind: K, payload: JobPayloads[K], options?: EnqueueOptions): Promise<string>;
  process(handlers: JobHandlers, options?: WorkerPoolOptions): WorkerPool;
  close(): Promise<void>;
}

/** Thrown by handlers (or the dispatcher) for jobs that must not be retried. */
export class NonRetryableJobError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NonRetryableJobError';
  }
}
