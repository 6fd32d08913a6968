/**
 * Validates inbound status webhook signatures. A source is verified only when
 * `WEBHOOK_SECRET_<SOURCE>` is configured.
 */

import crypto from 'crypto';

import { readScopedEnv } from '../env';
import type { WebhookSource } from './types';

export enum WebhookVerificationFailureReason {
  MISSING_SIGNATURE = 'MISSING_SIGNATURE',
  INVALID_SIGNATURE_FORMAT = 'INVALID_SIGNATURE_FORMAT',
  SIGNATURE_MISMATCH = 'SIGNATURE_MISMATCH',
}

export interface WebhookVerificationResult {
  isValid: boolean;
  provider: WebhookSource;
  /** False when no secret is configured and the request was accepted unverified. */
  verified: boolean;
  failureReason?: WebhookVerificationFailureReason;
  message?: string;
  signatureHeader?: string;
}

export interface WebhookVerificationRequest {
  headers: Record<string, string>;
  rawBody: string | Buffer;
}

interface ProviderConfig {
  signatureHeader: string;
  /** Required signature prefix; optional prefixes are accepted with `prefixOptional`. */
  prefix: string;
  prefixOptional: boolean;
}

const PROVIDERS: Record<WebhookSource, ProviderConfig> = {
  n8n: { signatureHeader: 'x-signature', prefix: 'sha256=', prefixOptional: true },
  github: { signatureHeader: 'x-hub-signature-256', prefix: 'sha256=', prefixOptional: false },
  generic: { signatureHeader: 'x-signature', prefix: 'sha256=', prefixOptional: true },
};

function constantTimeEquals(expected: string, provided: string): boolean {
  if (provided.length !== expected.length || provided.length % 2 !== 0) {
    return false;
  }
  const expectedBuffer = Buffer.from(expected, 'hex');
  const providedBuffer = Buffer.from(provided, 'hex');
  if (expectedBuffer.length !== providedBuffer.length) {
    return false;
  }
  return crypto.timingSafeEqual(expectedBuffer, providedBuffer);
}

function failure(
  provider: WebhookSource,
  reason: WebhookVerificationFailureReason,
  message: string,
  signatureHeader: string
): WebhookVerificationResult {
  return { isValid: false, verified: false, provider, failureReason: reason, message, signatureHeader };
}

export function normalizeHeaders(headers: Record<string, string | string[] | undefined>): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      normalized[key.toLowerCase()] = value;
    } else if (Array.isArray(value) && value.length > 0) {
      normalized[key.toLowerCase()] = value[0];
    }
  }
  return normalized;
}

export function signPayload(secret: string, body: string | Buffer): string {
  return crypto.createHmac('sha256', secret).update(body).digest('hex');
}

export class WebhookVerifier {
  constructor(private readonly secretFor: (source: WebhookSource) => string | undefined = defaultSecretFor) {}

  verify(source: WebhookSource, request: WebhookVerificationRequest): WebhookVerificationResult {
    const secret = this.secretFor(source);
    if (!secret) {
      return { isValid: true, verified: false, provider: source };
    }

    const config = PROVIDERS[source];
    const headerName = config.signatureHeader;
    const signature = request.headers[headerName];
    if (!signature) {
      return failure(source, WebhookVerificationFailureReason.MISSING_SIGNATURE, `Missing signature header: ${headerName}`, headerName);
    }

    let provided = signature.trim();
    if (provided.toLowerCase().startsWith(config.prefix)) {
      provided = provided.slice(config.prefix.length);
    } else if (!config.prefixOptional) {
      return failure(
        source,
        WebhookVerificationFailureReason.INVALID_SIGNATURE_FORMAT,
        `Signature must start with ${config.prefix}`,
        headerName
      );
    }

    const expected = signPayload(secret, request.rawBody);
    if (!constantTimeEquals(expected, provided.toLowerCase())) {
      return failure(source, WebhookVerificationFailureReason.SIGNATURE_MISMATCH, 'Signature mismatch', headerName);
    }

    return { isValid: true, verified: true, provider: source, signatureHeader: headerName };
  }
}

function defaultSecretFor(source: WebhookSource): string | undefined {
  return readScopedEnv('WEBHOOK_SECRET_', source);
}
