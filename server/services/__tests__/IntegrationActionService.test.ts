import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { RateLimitExceededError, ReauthRequiredError, ValidationError } from '../../errors';
import { ProviderRequestError } from '../../integrations/ProviderClient';
import { createTestPlatform, seedConnectedIntegration, type TestPlatform } from '../../testing/testPlatform';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

interface RecordedCall {
  url: string;
  method: string;
  authorization: string | null;
  body: unknown;
}

function parseBody(body: string): unknown {
  return JSON.parse(body);
}

describe('IntegrationActionService', () => {
  let calls: RecordedCall[];
  let reply: () => Response;
  let harness: TestPlatform;

  const fetchImpl: typeof fetch = async (input, init) => {
    const headers = new Headers(init?.headers);
    calls.push({
      url: input instanceof Request ? input.url : input.toString(),
      method: init?.method ?? 'GET',
      authorization: headers.get('authorization'),
      body: typeof init?.body === 'string' ? parseBody(init.body) : null,
    });
    return reply();
  };

  beforeEach(() => {
    calls = [];
    reply = () => jsonResponse({ ok: true, ts: '1700000000.000100' });
    harness = createTestPlatform({ fetchImpl, limits: { slack: { maxCount: 2, windowMs: 60_000 } } });
  });

  afterEach(async () => {
    await harness.platform.close();
  });

  it('lists the supported actions per provider', () => {
    const actions = harness.platform.actionService.listActions();

    expect(actions.map(({ type, action }) => `${type}.${action}`)).toEqual([
      'slack.send_message',
      'slack.list_channels',
      'github.list_repos',
      'github.create_issue',
      'google.list_emails',
      'notion.search',
    ]);
  });

  it('posts a Slack message with the vault token', async () => {
    const integration = await seedConnectedIntegration(harness.platform, { accessToken: 'access-slack' });

    const result = await harness.platform.actionService.execute('user-1', integration.id, 'send_message', {
      channel: 'C42',
      text: 'Deploy finished',
    });

    expect(result).toEqual({ ok: true, ts: '1700000000.000100' });
    expect(calls).toEqual([
      {
        url: 'https://slack.com/api/chat.postMessage',
        method: 'POST',
        authorization: 'Bearer access-slack',
        body: { channel: 'C42', text: 'Deploy finished' },
      },
    ]);
  });

  it('surfaces Slack application errors reported with a 200', async () => {
    const integration = await seedConnectedIntegration(harness.platform);
    reply = () => jsonResponse({ ok: false, error: 'channel_not_found' });

    const attempt = harness.platform.actionService.execute('user-1', integration.id, 'send_message', {
      channel: 'C404',
      text: 'hello',
    });

    await expect(attempt).rejects.toBeInstanceOf(ProviderRequestError);
    await expect(attempt).rejects.toThrow('slack.send_message failed: Slack API error: channel_not_found');
  });

  it('flags the integration when the provider rejects the token', async () => {
    const integration = await seedConnectedIntegration(harness.platform);
    reply = () => jsonResponse({ ok: false, error: 'invalid_auth' }, 401);

    await expect(
      harness.platform.actionService.execute('user-1', integration.id, 'list_channels', {})
    ).rejects.toBeInstanceOf(ReauthRequiredError);

    const stored = await harness.platform.integrations.getById(integration.id);
    expect(stored?.status).toBe('error');
  });

  it('validates parameters before calling the provider', async () => {
    const integration = await seedConnectedIntegration(harness.platform);

    const attempt = harness.platform.actionService.execute('user-1', integration.id, 'send_message', { channel: 'C42' });

    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await expect(attempt).rejects.toMatchObject({ details: ['text: Required'] });
    expect(calls).toHaveLength(0);
  });

  it('rejects actions the provider does not offer', async () => {
    const integration = await seedConnectedIntegration(harness.platform);

    await expect(
      harness.platform.actionService.execute('user-1', integration.id, 'create_issue', {})
    ).rejects.toThrow('Action create_issue is not available for slack');
  });

  it('applies the per-provider rate limit', async () => {
    const integration = await seedConnectedIntegration(harness.platform);
    const send = () =>
      harness.platform.actionService.execute('user-1', integration.id, 'send_message', { channel: 'C42', text: 'hi' });

    await send();
    await send();

    await expect(send()).rejects.toBeInstanceOf(RateLimitExceededError);
    expect(calls).toHaveLength(2);
  });
});
