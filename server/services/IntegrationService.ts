import { randomBytes } from 'node:crypto';

import { env } from '../env';
import { IntegrationNotFoundError, OAuthError } from '../errors';
import type { IntegrationRepository } from '../integrations/IntegrationRepository';
import type { Integration, IntegrationType } from '../integrations/types';
import type { OAuthManager } from '../oauth/OAuthManager';
import { DEFAULT_OAUTH_STATE_TTL_SECONDS, type OAuthStateStore } from '../oauth/stateStore';
import { logAction } from '../utils/actionLog';
import type { TokenVault } from './TokenVault';

export interface BeginConnectOptions {
  name?: string | null;
  redirectUri?: string;
}

export interface BeginConnectResult {
  authorizationUrl: string;
  state: string;
  expiresInSeconds: number;
}

export class IntegrationService {
  constructor(
    private readonly integrations: IntegrationRepository,
    private readonly tokenVault: TokenVault,
    private readonly oauth: OAuthManager,
    private readonly states: OAuthStateStore,
    private readonly now: () => number = Date.now
  ) {}

  get defaultRedirectUri(): string {
    return `${env.PUBLIC_BASE_URL.replace(/\/+$/, '')}/api/integrations/oauth/callback`;
  }

  beginConnect(userId: string, type: IntegrationType, options: BeginConnectOptions = {}): BeginConnectResult {
    if (!this.oauth.supportsOAuth(type)) {
      throw new OAuthError(`OAuth is not supported for ${type}`);
    }

    this.states.clearExpired();
    const redirectUri = options.redirectUri ?? this.defaultRedirectUri;
    const state = randomBytes(24).toString('hex');
    const authorizationUrl = this.oauth.buildAuthorizationUrl(type, state, redirectUri);

    this.states.set(
      state,
      { userId, type, redirectUri, name: options.name ?? null, createdAt: this.now() },
      DEFAULT_OAUTH_STATE_TTL_SECONDS
    );

    return { authorizationUrl, state, expiresInSeconds: DEFAULT_OAUTH_STATE_TTL_SECONDS };
  }

  /**
   * Finishes the OAuth dance: exchanges the code, stores sealed tokens and
   * marks the integration connected. Reconnecting reuses the existing row.
   */
  async completeConnect(state: string, code: string): Promise<Integration> {
    const consumed = this.states.consume(state);
    if (!consumed.found) {
      throw new OAuthError('Unknown OAuth state');
    }
    if (consumed.expired || !consumed.state) {
      throw new OAuthError('OAuth state expired; start the connection again');
    }

    const { userId, type, redirectUri, name } = consumed.state;
    const tokens = await this.oauth.exchangeCode(type, code, redirectUri);
    const account = await this.oauth.fetchAccountInfo(type, tokens.accessToken);

    const existing = await this.integrations.findByOwnerAndType(userId, type);
    const integration =
      existing ??
      (await this.integrations.create({
        ownerId: userId,
        type,
        name: name ?? account.label ?? type,
        status: 'disconnected',
      }));

    await this.tokenVault.storeTokens(integration.id, tokens);
    const connected = await this.integrations.updateStatus(integration.id, {
      status: 'connected',
      lastError: null,
      scopes: tokens.scopes,
      externalAccountId: account.externalAccountId,
    });
    if (!connected) {
      throw new IntegrationNotFoundError(integration.id);
    }

    logAction({
      type: 'integration.connected',
      component: 'IntegrationService',
      integrationId: connected.id,
      integrationType: type,
      ownerId: userId,
      reconnected: Boolean(existing),
    });
    console.log(`🔗 [IntegrationService] ${type} connected for user ${userId}`);
    return connected;
  }

  async list(userId: string): Promise<Integration[]> {
    return this.integrations.listByOwner(userId);
  }

  async get(userId: string, integrationId: string): Promise<Integration> {
    const integration = await this.integrations.getById(integrationId);
    if (!integration || integration.ownerId !== userId) {
      throw new IntegrationNotFoundError(integrationId);
    }
    return integration;
  }

  async disconnect(userId: string, integrationId: string): Promise<Integration> {
    const integration = await this.get(userId, integrationId);
    await this.tokenVault.destroyTokens(integration.id);
    const updated = await this.integrations.updateStatus(integration.id, { status: 'disconnected', lastError: null });
    if (!updated) {
      throw new IntegrationNotFoundError(integrationId);
    }
    logAction({
      type: 'integration.disconnected',
      component: 'IntegrationService',
      integrationId,
      integrationType: integration.type,
      ownerId: userId,
    });
    return updated;
  }
}
