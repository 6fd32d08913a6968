import express from 'express';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { listenOnEphemeralPort, type RunningServer } from '../../testing/httpServer';
import { authenticateToken, requireUser, signAccessToken, verifyAccessToken } from '../auth';

describe('access tokens', () => {
  it('round-trips the claims', () => {
    const token = signAccessToken({ sub: 'user-1', email: 'ops@example.test' }, 'test-secret');

    expect(verifyAccessToken(token, 'test-secret')).toEqual({ id: 'user-1', email: 'ops@example.test', role: 'user' });
  });

  it('rejects tokens signed with another secret', () => {
    const token = signAccessToken({ sub: 'user-1' }, 'other-secret');

    expect(verifyAccessToken(token, 'test-secret')).toBeNull();
  });
});

describe('authenticateToken', () => {
  let server: RunningServer;

  beforeEach(async () => {
    const app = express();
    app.get('/me', authenticateToken, (req, res) => {
      res.json({ id: requireUser(req).id });
    });
    server = await listenOnEphemeralPort(app);
  });

  afterEach(async () => {
    await server.close();
  });

  async function getMe(authorization?: string) {
    const response = await fetch(`${server.baseUrl}/me`, {
      headers: authorization ? { authorization } : {},
    });
    const body: unknown = await response.json();
    return { status: response.status, body };
  }

  it('requires a bearer token', async () => {
    expect(await getMe()).toEqual({
      status: 401,
      body: { success: false, error: 'Access token required', code: 'UNAUTHENTICATED' },
    });
  });

  it('rejects a malformed token', async () => {
    expect(await getMe('Bearer not-a-jwt')).toEqual({
      status: 401,
      body: { success: false, error: 'Invalid or expired token', code: 'UNAUTHENTICATED' },
    });
  });

  it('attaches the user for a valid token', async () => {
    const token = signAccessToken({ sub: 'user-7' });

    expect(await getMe(`Bearer ${token}`)).toEqual({ status: 200, body: { id: 'user-7' } });
  });
});
