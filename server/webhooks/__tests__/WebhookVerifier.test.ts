import { describe, expect, it } from 'vitest';

import { normalizeHeaders, signPayload, WebhookVerificationFailureReason, WebhookVerifier } from '../WebhookVerifier';

const body = JSON.stringify({ status: 'success' });
const secrets: Record<string, string> = { n8n: 'test-secret', github: 'test-secret' };
const verifier = new WebhookVerifier((source) => secrets[source]);

describe('WebhookVerifier', () => {
  it('accepts a valid HMAC with or without the sha256= prefix for n8n', () => {
    const signature = signPayload('test-secret', body);

    expect(verifier.verify('n8n', { headers: { 'x-signature': signature }, rawBody: body })).toMatchObject({
      isValid: true,
      verified: true,
    });
    expect(
      verifier.verify('n8n', { headers: { 'x-signature': `sha256=${signature}` }, rawBody: Buffer.from(body) }).isValid
    ).toBe(true);
  });

  it('requires the sha256= prefix for github', () => {
    const signature = signPayload('test-secret', body);

    const result = verifier.verify('github', { headers: { 'x-hub-signature-256': signature }, rawBody: body });

    expect(result.isValid).toBe(false);
    expect(result.failureReason).toBe(WebhookVerificationFailureReason.INVALID_SIGNATURE_FORMAT);
  });

  it('reports a missing signature header', () => {
    const result = verifier.verify('github', { headers: {}, rawBody: body });
    expect(result).toMatchObject({
      isValid: false,
      failureReason: WebhookVerificationFailureReason.MISSING_SIGNATURE,
      message: 'Missing signature header: x-hub-signature-256',
    });
  });

  it('rejects signatures computed over a different body', () => {
    const signature = signPayload('test-secret', '{"status":"error"}');
    const result = verifier.verify('n8n', { headers: { 'x-signature': signature }, rawBody: body });
    expect(result.failureReason).toBe(WebhookVerificationFailureReason.SIGNATURE_MISMATCH);
  });

  it('accepts unsigned requests for sources without a secret', () => {
    expect(verifier.verify('generic', { headers: {}, rawBody: body })).toEqual({
      isValid: true,
      verified: false,
      provider: 'generic',
    });
  });
});

describe('normalizeHeaders', () => {
  it('lowercases names and keeps the first value of repeated headers', () => {
    expect(normalizeHeaders({ 'X-Signature': 'abc', 'X-Forwarded-For': ['1.1.1.1', '2.2.2.2'], empty: undefined })).toEqual({
      'x-signature': 'abc',
      'x-forwarded-for': '1.1.1.1',
    });
  });
});
