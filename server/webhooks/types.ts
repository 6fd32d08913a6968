import type { EventDetail, ExecutionStatus } from '../workflow/types';

export const WEBHOOK_SOURCES = ['n8n', 'github', 'generic'] as const;
export type WebhookSource = (typeof WEBHOOK_SOURCES)[number];

export function isWebhookSource(value: string): value is WebhookSource {
  return WEBHOOK_SOURCES.some((source) => source === value);
}

/** What every source-specific payload is reduced to before reconciliation. */
export interface MappedStatusEvent {
  externalRef: string;
  status: ExecutionStatus;
  detail: EventDetail;
}

export interface WebhookRequestContext {
  /** External reference taken from the callback path. */
  externalRef: string;
  headers: Record<string, string>;
}
