import { SeverityNumber } from '@opentelemetry/api-logs';

import { getLogger } from '../observability/index';

export type SeverityLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

type AttributeValue = string | number | boolean;

export interface ActionEvent {
  type: string;
  message?: string;
  severity?: SeverityLevel;
  component?: string;
  timestamp?: Date | string | number;
  [key: string]: unknown;
}

export interface LogActionOptions {
  severity?: SeverityLevel;
  scope?: string;
}

const DEFAULT_SCOPE = 'conduit.action-log';
const RESERVED_KEYS = new Set(['type', 'message', 'severity', 'component', 'timestamp']);

const severityMap: Record<SeverityLevel, { number: SeverityNumber; text: string }> = {
  trace: { number: SeverityNumber.TRACE, text: 'TRACE' },
  debug: { number: SeverityNumber.DEBUG, text: 'DEBUG' },
  info: { number: SeverityNumber.INFO, text: 'INFO' },
  warn: { number: SeverityNumber.WARN, text: 'WARN' },
  error: { number: SeverityNumber.ERROR, text: 'ERROR' },
  fatal: { number: SeverityNumber.FATAL, text: 'FATAL' },
};

function normalizeTimestamp(input: Date | string | number | undefined): number {
  if (input instanceof Date) {
    return Number.isNaN(input.getTime()) ? Date.now() : input.getTime();
  }
  if (typeof input === 'number' && Number.isFinite(input)) {
    return input;
  }
  if (typeof input === 'string') {
    const parsed = Date.parse(input);
    return Number.isNaN(parsed) ? Date.now() : parsed;
  }
  return Date.now();
}

function toAttributeValue(value: unknown): AttributeValue | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function collectAttributes(event: ActionEvent): Record<string, AttributeValue> {
  const attributes: Record<string, AttributeValue> = { 'event.type': event.type };
  if (event.component) {
    attributes['event.component'] = event.component;
  }
  for (const [key, raw] of Object.entries(event)) {
    if (RESERVED_KEYS.has(key)) {
      continue;
    }
    const value = toAttributeValue(raw);
    if (value !== undefined) {
      attributes[`event.${key.replace(/[^a-zA-Z0-9_.:-]/g, '_')}`] = value;
    }
  }
  return attributes;
}

/**
 * Emits a structured action event as an OpenTelemetry log record.
 */
export function logAction(event: ActionEvent, options: LogActionOptions = {}): void {
  if (!event.type.trim()) {
    console.warn('⚠️ logAction called without a valid event.type');
    return;
  }

  const severity = severityMap[options.severity ?? event.severity ?? 'info'];
  const message = event.message ?? `Action recorded: ${event.type}`;
  const attributes = collectAttributes(event);

  try {
    getLogger(options.scope ?? DEFAULT_SCOPE).emit({
      severityNumber: severity.number,
      severityText: severity.text,
      body: message,
      attributes,
      timestamp: normalizeTimestamp(event.timestamp),
    });
  } catch (error) {
    const fallbackMessage = `⚠️ Failed to emit action log for ${event.type}: ${error instanceof Error ? error.message : String(error)}`;
    if (severity.number >= SeverityNumber.WARN) {
      console.warn(fallbackMessage, { message, attributes });
    } else {
      console.debug(fallbackMessage, { message, attributes });
    }
  }
}
