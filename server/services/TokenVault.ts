import { env } from '../env';
import { IntegrationNotFoundError, ReauthRequiredError } from '../errors';
import type { IntegrationRepository } from '../integrations/IntegrationRepository';
import type { AccessToken, Integration, StoredIntegrationToken } from '../integrations/types';
import type { OAuthTokenRefresher, OAuthTokens } from '../oauth/OAuthManager';
import { recordTokenRefresh } from '../observability/index';
import { getErrorMessage } from '../types/common';
import { logAction } from '../utils/actionLog';
import type { EncryptionService } from './EncryptionService';

export interface TokenVaultOptions {
  refreshMarginMs?: number;
  now?: () => number;
}

/**
 * Holds sealed OAuth credentials per integration and hands out access tokens
 * that stay valid for at least the refresh margin. Refreshes for one
 * integration collapse into a single in-flight call.
 */
export class TokenVault {
  private readonly inflight = new Map<string, Promise<AccessToken>>();
  private readonly refreshMarginMs: number;
  private readonly now: () => number;

  constructor(
    private readonly integrations: IntegrationRepository,
    private readonly encryption: EncryptionService,
    private readonly refresher: OAuthTokenRefresher,
    options: TokenVaultOptions = {}
  ) {
    this.refreshMarginMs = options.refreshMarginMs ?? env.TOKEN_REFRESH_MARGIN_MS;
    this.now = options.now ?? Date.now;
  }

  async getValidToken(integrationId: string): Promise<AccessToken> {
    const integration = await this.integrations.getById(integrationId);
    if (!integration) {
      throw new IntegrationNotFoundError(integrationId);
    }
    if (integration.status !== 'connected') {
      throw new ReauthRequiredError(integrationId, `integration is ${integration.status}`);
    }

    const stored = await this.integrations.getToken(integrationId);
    if (!stored) {
      throw new ReauthRequiredError(integrationId, 'no stored credentials');
    }

    if (this.isFresh(stored)) {
      return this.toAccessToken(integration, stored);
    }

    return this.refreshCoalesced(integration);
  }

  /** Seals and stores freshly issued tokens, replacing whatever was there. */
  async storeTokens(integrationId: string, tokens: OAuthTokens): Promise<void> {
    await this.integrations.saveToken(integrationId, {
      accessToken: this.encryption.seal(tokens.accessToken),
      refreshToken: tokens.refreshToken ? this.encryption.seal(tokens.refreshToken) : null,
      expiresAt: tokens.expiresAt,
    });
  }

  async destroyTokens(integrationId: string): Promise<void> {
    this.inflight.delete(integrationId);
    await this.integrations.deleteToken(integrationId);
  }

  private refreshCoalesced(integration: Integration): Promise<AccessToken> {
    const existing = this.inflight.get(integration.id);
    if (existing) {
      return existing;
    }

    const refresh: Promise<AccessToken> = this.refresh(integration).finally(() => {
      if (this.inflight.get(integration.id) === refresh) {
        this.inflight.delete(integration.id);
      }
    });
    this.inflight.set(integration.id, refresh);
    return refresh;
  }

  private async refresh(integration: Integration): Promise<AccessToken> {
    // Another caller may have refreshed between our read and taking the slot.
    const latest = await this.integrations.getToken(integration.id);
    if (!latest) {
      throw new ReauthRequiredError(integration.id, 'no stored credentials');
    }
    if (this.isFresh(latest)) {
      return this.toAccessToken(integration, latest);
    }

    if (!latest.refreshToken) {
      await this.markError(integration, 'access token expired and no refresh token is stored');
      throw new ReauthRequiredError(integration.id, 'access token expired and no refresh token is stored');
    }

    let tokens: OAuthTokens;
    try {
      tokens = await this.refresher.refreshAccessToken(integration.type, this.encryption.open(latest.refreshToken));
    } catch (error) {
      const reason = getErrorMessage(error);
      recordTokenRefresh('failure', integration.type);
      await this.markError(integration, reason);
      throw new ReauthRequiredError(integration.id, `token refresh failed: ${reason}`, { cause: error });
    }

    const replaced = await this.integrations.replaceToken(integration.id, latest.version, {
      accessToken: this.encryption.seal(tokens.accessToken),
      refreshToken: tokens.refreshToken ? this.encryption.seal(tokens.refreshToken) : latest.refreshToken,
      expiresAt: tokens.expiresAt,
    });

    if (!replaced) {
      // A refresher in another process won the write; prefer its token if usable.
      recordTokenRefresh('superseded', integration.type);
      const current = await this.integrations.getToken(integration.id);
      if (current && this.isFresh(current)) {
        return this.toAccessToken(integration, current);
      }
    } else {
      recordTokenRefresh('success', integration.type);
      logAction({
        type: 'integration.token.refreshed',
        component: 'TokenVault',
        integrationId: integration.id,
        integrationType: integration.type,
        expiresAt: tokens.expiresAt,
      });
    }

    return {
      integrationId: integration.id,
      type: integration.type,
      accessToken: tokens.accessToken,
      expiresAt: tokens.expiresAt,
    };
  }

  private isFresh(token: StoredIntegrationToken): boolean {
    if (!token.expiresAt) {
      return true;
    }
    return token.expiresAt.getTime() - this.now() > this.refreshMarginMs;
  }

  private toAccessToken(integration: Integration, token: StoredIntegrationToken): AccessToken {
    return {
      integrationId: integration.id,
      type: integration.type,
      accessToken: this.encryption.open(token.accessToken),
      expiresAt: token.expiresAt,
    };
  }

  private async markError(integration: Integration, reason: string): Promise<void> {
    console.warn(`⚠️ [TokenVault] Integration ${integration.id} (${integration.type}) needs reauthorization: ${reason}`);
    await this.integrations.updateStatus(integration.id, { status: 'error', lastError: reason });
    logAction(
      {
        type: 'integration.reauth_required',
        component: 'TokenVault',
        integrationId: integration.id,
        integrationType: integration.type,
        ownerId: integration.ownerId,
        reason,
      },
      { severity: 'warn' }
    );
  }
}
