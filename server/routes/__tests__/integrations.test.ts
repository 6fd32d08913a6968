import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createApp } from '../../app';
import { signAccessToken } from '../../middleware/auth';
import { listenOnEphemeralPort, type RunningServer } from '../../testing/httpServer';
import { createTestPlatform, type TestPlatform } from '../../testing/testPlatform';
import { isRecord } from '../../types/common';

const providerFetch: typeof fetch = async (input) => {
  const url = input instanceof Request ? input.url : input.toString();
  const body =
    url === 'https://github.com/login/oauth/access_token'
      ? { access_token: 'access-gh', scope: 'repo,user' }
      : { id: 4242, login: 'octo-ops' };
  return new Response(JSON.stringify(body), { status: 200, headers: { 'content-type': 'application/json' } });
};

describe('integration routes', () => {
  let harness: TestPlatform;
  let server: RunningServer;
  const token = signAccessToken({ sub: 'user-1' });

  beforeEach(async () => {
    harness = createTestPlatform({ fetchImpl: providerFetch });
    server = await listenOnEphemeralPort(createApp(harness.platform));
  });

  afterEach(async () => {
    await server.close();
    await harness.platform.close();
  });

  async function call(method: string, path: string, body?: unknown, authenticated = true) {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (authenticated) {
      headers.authorization = `Bearer ${token}`;
    }
    const response = await fetch(`${server.baseUrl}/api/integrations${path}`, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const parsed: unknown = await response.json();
    return { status: response.status, body: isRecord(parsed) ? parsed : {} };
  }

  it('connects a provider through the OAuth callback', async () => {
    const started = await call('POST', '/github/connect', {});
    expect(started.status).toBe(200);
    const state = started.body.state;
    if (typeof state !== 'string') {
      throw new Error('connect did not return a state');
    }

    const completed = await call('GET', `/oauth/callback?state=${state}&code=code-1`, undefined, false);

    expect(completed.status).toBe(200);
    expect(completed.body.integration).toMatchObject({
      type: 'github',
      name: 'octo-ops',
      status: 'connected',
      externalAccountId: '4242',
      scopes: ['repo', 'user'],
    });

    const listed = await call('GET', '');
    expect(listed.body.integrations).toHaveLength(1);
  });

  it('reports a denied authorization', async () => {
    const denied = await call('GET', '/oauth/callback?error=access_denied', undefined, false);

    expect(denied).toEqual({
      status: 400,
      body: { success: false, error: 'Authorization denied: access_denied', code: 'OAUTH_ERROR' },
    });
  });

  it('rejects an unknown state', async () => {
    const reply = await call('GET', '/oauth/callback?state=forged&code=code-1', undefined, false);

    expect(reply).toEqual({
      status: 400,
      body: { success: false, error: 'Unknown OAuth state', code: 'OAUTH_ERROR' },
    });
  });

  it('rejects unknown provider types', async () => {
    const reply = await call('POST', '/myspace/connect', {});

    expect(reply.status).toBe(400);
    expect(reply.body.code).toBe('VALIDATION_ERROR');
  });

  it('requires authentication outside the callback', async () => {
    const reply = await call('GET', '', undefined, false);

    expect(reply.status).toBe(401);
  });
});
