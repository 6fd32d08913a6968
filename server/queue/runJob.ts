import {
  isJobKind,
  jobPayloadSchemas,
  NonRetryableJobError,
  type JobHandlers,
  type JobKind,
} from './types';

export interface JobEnvelope {
  id: string;
  kind: string;
  data: unknown;
  attemptsMade: number;
}

function runTypedJob<K extends JobKind>(handlers: JobHandlers, kind: K, envelope: JobEnvelope): Promise<void> {
  const handler = handlers[kind];
  if (!handler) {
    throw new NonRetryableJobError(`No handler registered for job kind "${kind}"`);
  }

  const parsed = jobPayloadSchemas[kind].safeParse(envelope.data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new NonRetryableJobError(`Invalid payload for job ${envelope.id} (${kind}): ${issues.join('; ')}`);
  }

  return handler({ id: envelope.id, kind, payload: parsed.data, attemptsMade: envelope.attemptsMade });
}

/**
 * Validates a dequeued job and invokes its handler. Unknown kinds and invalid
 * payloads raise {@link NonRetryableJobError}.
 */
export async function runJob(handlers: JobHandlers, envelope: JobEnvelope): Promise<void> {
  if (!isJobKind(envelope.kind)) {
    throw new NonRetryableJobError(`Unknown job kind "${envelope.kind}"`);
  }
  await runTypedJob(handlers, envelope.kind, envelope);
}
