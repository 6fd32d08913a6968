import { z } from 'zod';

import { OAuthError } from '../errors';
import type { IntegrationType } from '../integrations/types';
import { getErrorMessage } from '../types/common';
import {
  getClientCredentials,
  getProviderConfig,
  type OAuthClientCredentials,
  type OAuthProviderConfig,
} from './providers';

export interface OAuthState {
  userId: string;
  type: IntegrationType;
  redirectUri: string;
  name: string | null;
  createdAt: number;
}

export interface OAuthTokens {
  accessToken: string;
  refreshToken: string | null;
  expiresAt: Date | null;
  scopes: string[];
}

export interface OAuthAccountInfo {
  externalAccountId: string | null;
  label: string | null;
}

/** The part of the OAuth client the Token Vault depends on. */
export interface OAuthTokenRefresher {
  refreshAccessToken(type: IntegrationType, refreshToken: string): Promise<OAuthTokens>;
}

export interface OAuthManagerOptions {
  fetchImpl?: typeof fetch;
  credentials?: (type: IntegrationType) => OAuthClientCredentials | null;
  now?: () => number;
}

const tokenResponseSchema = z
  .object({
    ok: z.boolean().optional(),
    error: z.string().optional(),
    error_description: z.string().optional(),
    access_token: z.string().optional(),
    refresh_token: z.string().optional(),
    expires_in: z.coerce.number().optional(),
    scope: z.string().optional(),
  })
  .passthrough();

const accountInfoSchema = z
  .object({
    ok: z.boolean().optional(),
    id: z.union([z.string(), z.number()]).optional(),
    user_id: z.string().optional(),
    login: z.string().optional(),
    email: z.string().optional(),
    user: z.string().optional(),
    team: z.string().optional(),
  })
  .passthrough();

export class OAuthManager implements OAuthTokenRefresher {
  private readonly fetchImpl: typeof fetch;
  private readonly credentials: (type: IntegrationType) => OAuthClientCredentials | null;
  private readonly now: () => number;

  constructor(options: OAuthManagerOptions = {}) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.credentials = options.credentials ?? getClientCredentials;
    this.now = options.now ?? Date.now;
  }

  supportsOAuth(type: IntegrationType): boolean {
    return getProviderConfig(type) !== null;
  }

  buildAuthorizationUrl(type: IntegrationType, state: string, redirectUri: string): string {
    const provider = this.requireProvider(type);
    const credentials = this.requireCredentials(type);

    const url = new URL(provider.authorizeUrl);
    url.searchParams.set('client_id', credentials.clientId);
    url.searchParams.set('redirect_uri', redirectUri);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('state', state);
    if (provider.scopes.length > 0) {
      url.searchParams.set('scope', provider.scopes.join(provider.scopeSeparator));
    }
    for (const [key, value] of Object.entries(provider.extraAuthorizeParams ?? {})) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  async exchangeCode(type: IntegrationType, code: string, redirectUri: string): Promise<OAuthTokens> {
    const provider = this.requireProvider(type);
    return this.requestTokens(provider, {
      grant_type: 'authorization_code',
      code,
      redirect_uri: redirectUri,
    });
  }

  async refreshAccessToken(type: IntegrationType, refreshToken: string): Promise<OAuthTokens> {
    const provider = this.requireProvider(type);
    if (!provider.supportsRefresh) {
      throw new OAuthError(`${provider.displayName} tokens cannot be refreshed`);
    }
    const tokens = await this.requestTokens(provider, {
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });
    // Providers that do not rotate refresh tokens omit them from the response.
    return { ...tokens, refreshToken: tokens.refreshToken ?? refreshToken };
  }

  async fetchAccountInfo(type: IntegrationType, accessToken: string): Promise<OAuthAccountInfo> {
    const provider = this.requireProvider(type);
    if (!provider.accountInfoUrl) {
      return { externalAccountId: null, label: null };
    }

    try {
      const response = await this.fetchImpl(provider.accountInfoUrl, {
        headers: { Authorization: `Bearer ${accessToken}`, Accept: 'application/json' },
      });
      if (!response.ok) {
        return { externalAccountId: null, label: null };
      }
      const info = accountInfoSchema.parse(await response.json());
      const id = info.user_id ?? (info.id !== undefined ? String(info.id) : null);
      return {
        externalAccountId: id,
        label: info.login ?? info.email ?? info.user ?? info.team ?? null,
      };
    } catch (error) {
      console.warn(`[OAuthManager] Failed to load ${provider.displayName} account info:`, getErrorMessage(error));
      return { externalAccountId: null, label: null };
    }
  }

  private async requestTokens(provider: OAuthProviderConfig, params: Record<string, string>): Promise<OAuthTokens> {
    const credentials = this.requireCredentials(provider.type);
    const body = new URLSearchParams(params);
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };

    if (provider.tokenAuth === 'basic') {
      const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`).toString('base64');
      headers.Authorization = `Basic ${basic}`;
    } else {
      body.set('client_id', credentials.clientId);
      body.set('client_secret', credentials.clientSecret);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(provider.tokenUrl, { method: 'POST', headers, body: body.toString() });
    } catch (error) {
      throw new OAuthError(`${provider.displayName} token endpoint unreachable: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = tokenResponseSchema.safeParse(await response.json().catch(() => ({})));
    if (!parsed.success) {
      throw new OAuthError(`${provider.displayName} returned an unreadable token response`);
    }

    const payload = parsed.data;
    if (!response.ok || payload.ok === false || payload.error || !payload.access_token) {
      const reason = payload.error_description ?? payload.error ?? `HTTP ${response.status}`;
      throw new OAuthError(`${provider.displayName} token request failed: ${reason}`);
    }

    return {
      accessToken: payload.access_token,
      refreshToken: payload.refresh_token ?? null,
      expiresAt:
        typeof payload.expires_in === 'number' && Number.isFinite(payload.expires_in)
          ? new Date(this.now() + payload.expires_in * 1000)
          : null,
      scopes: payload.scope ? payload.scope.split(/[,\s]+/).filter(Boolean) : [],
    };
  }

  private requireProvider(type: IntegrationType): OAuthProviderConfig {
    const provider = getProviderConfig(type);
    if (!provider) {
      throw new OAuthError(`OAuth is not supported for ${type}`);
    }
    return provider;
  }

  private requireCredentials(type: IntegrationType): OAuthClientCredentials {
    const credentials = this.credentials(type);
    if (!credentials) {
      throw new OAuthError(`OAuth client credentials for ${type} are not configured`);
    }
    return credentials;
  }
}
