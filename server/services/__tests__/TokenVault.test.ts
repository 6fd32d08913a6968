import { beforeEach, describe, expect, it } from 'vitest';

import { IntegrationNotFoundError, ReauthRequiredError } from '../../errors';
import { MemoryIntegrationRepository } from '../../integrations/IntegrationRepository';
import type { IntegrationType } from '../../integrations/types';
import type { OAuthTokenRefresher, OAuthTokens } from '../../oauth/OAuthManager';
import { EncryptionService } from '../EncryptionService';
import { TokenVault } from '../TokenVault';

const NOW = Date.parse('2026-03-01T12:00:00.000Z');

class RecordingRefresher implements OAuthTokenRefresher {
  readonly calls: Array<{ type: IntegrationType; refreshToken: string }> = [];
  private release: (() => void) | null = null;
  private gate: Promise<void> = Promise.resolve();
  failWith: Error | null = null;

  hold(): void {
    this.gate = new Promise((resolve) => {
      this.release = resolve;
    });
  }

  resume(): void {
    this.release?.();
  }

  async refreshAccessToken(type: IntegrationType, refreshToken: string): Promise<OAuthTokens> {
    this.calls.push({ type, refreshToken });
    await this.gate;
    if (this.failWith) {
      throw this.failWith;
    }
    return {
      accessToken: `refreshed-${this.calls.length}`,
      refreshToken: null,
      expiresAt: new Date(NOW + 3_600_000),
      scopes: [],
    };
  }
}

describe('TokenVault', () => {
  let integrations: MemoryIntegrationRepository;
  let encryption: EncryptionService;
  let refresher: RecordingRefresher;
  let vault: TokenVault;

  beforeEach(() => {
    integrations = new MemoryIntegrationRepository();
    encryption = new EncryptionService('test-secret');
    refresher = new RecordingRefresher();
    vault = new TokenVault(integrations, encryption, refresher, { refreshMarginMs: 60_000, now: () => NOW });
  });

  async function connect(expiresAt: Date | null, refreshToken: string | null = 'refresh-1') {
    const integration = await integrations.create({ ownerId: 'user-1', type: 'google', name: 'Mail', status: 'connected' });
    await vault.storeTokens(integration.id, { accessToken: 'access-1', refreshToken, expiresAt, scopes: [] });
    return integration;
  }

  it('stores tokens sealed and returns the plaintext while fresh', async () => {
    const integration = await connect(new Date(NOW + 10 * 60_000));

    const stored = await integrations.getToken(integration.id);
    expect(stored?.accessToken.startsWith('v1:')).toBe(true);
    expect(stored?.accessToken).not.toContain('access-1');

    const token = await vault.getValidToken(integration.id);
    expect(token.accessToken).toBe('access-1');
    expect(refresher.calls).toHaveLength(0);
  });

  it('refreshes tokens that expire within the margin', async () => {
    const integration = await connect(new Date(NOW + 30_000));

    const token = await vault.getValidToken(integration.id);

    expect(token.accessToken).toBe('refreshed-1');
    expect(refresher.calls).toEqual([{ type: 'google', refreshToken: 'refresh-1' }]);
    const stored = await integrations.getToken(integration.id);
    expect(stored && encryption.open(stored.accessToken)).toBe('refreshed-1');
    // The provider did not rotate the refresh token, so the old one is kept.
    expect(stored?.refreshToken && encryption.open(stored.refreshToken)).toBe('refresh-1');
  });

  it('collapses concurrent refreshes into a single provider call', async () => {
    const integration = await connect(new Date(NOW - 1_000));
    refresher.hold();

    const pending = Promise.all([
      vault.getValidToken(integration.id),
      vault.getValidToken(integration.id),
      vault.getValidToken(integration.id),
    ]);
    await new Promise((resolve) => setTimeout(resolve, 10));
    refresher.resume();
    const tokens = await pending;

    expect(refresher.calls).toHaveLength(1);
    expect(tokens.map((token) => token.accessToken)).toEqual(['refreshed-1', 'refreshed-1', 'refreshed-1']);
  });

  it('requires reauthorization when the refresh is rejected', async () => {
    const integration = await connect(new Date(NOW - 1_000));
    refresher.failWith = new Error('invalid_grant');

    await expect(vault.getValidToken(integration.id)).rejects.toBeInstanceOf(ReauthRequiredError);

    const updated = await integrations.getById(integration.id);
    expect(updated?.status).toBe('error');
    expect(updated?.lastError).toBe('invalid_grant');
  });

  it('requires reauthorization when an expired token has no refresh token', async () => {
    const integration = await connect(new Date(NOW - 1_000), null);

    await expect(vault.getValidToken(integration.id)).rejects.toThrow(
      `Integration ${integration.id} must be reconnected: access token expired and no refresh token is stored`
    );
    expect(refresher.calls).toHaveLength(0);
  });

  it('refuses disconnected integrations and unknown ids', async () => {
    const integration = await connect(null);
    await integrations.updateStatus(integration.id, { status: 'disconnected' });

    await expect(vault.getValidToken(integration.id)).rejects.toBeInstanceOf(ReauthRequiredError);
    await expect(vault.getValidToken('missing')).rejects.toBeInstanceOf(IntegrationNotFoundError);
  });

  it('forgets tokens on destroy', async () => {
    const integration = await connect(null);

    await vault.destroyTokens(integration.id);

    expect(await integrations.getToken(integration.id)).toBeNull();
    await expect(vault.getValidToken(integration.id)).rejects.toBeInstanceOf(ReauthRequiredError);
  });
});
