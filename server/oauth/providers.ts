import { readScopedEnv } from '../env';
import type { IntegrationType } from '../integrations/types';

export interface OAuthProviderConfig {
  type: IntegrationType;
  displayName: string;
  authorizeUrl: string;
  tokenUrl: string;
  scopes: string[];
  scopeSeparator: ',' | ' ';
  /** Endpoint returning the connected account, used to label the integration. */
  accountInfoUrl: string | null;
  supportsRefresh: boolean;
  /** How client credentials are presented to the token endpoint. */
  tokenAuth: 'body' | 'basic';
  extraAuthorizeParams?: Record<string, string>;
}

export const OAUTH_PROVIDERS: Partial<Record<IntegrationType, OAuthProviderConfig>> = {
  slack: {
    type: 'slack',
    displayName: 'Slack',
    authorizeUrl: 'https://slack.com/oauth/v2/authorize',
    tokenUrl: 'https://slack.com/api/oauth.v2.access',
    scopes: ['channels:read', 'chat:write', 'users:read', 'im:read', 'im:write'],
    scopeSeparator: ',',
    accountInfoUrl: 'https://slack.com/api/auth.test',
    supportsRefresh: true,
    tokenAuth: 'body',
  },
  google: {
    type: 'google',
    displayName: 'Google',
    authorizeUrl: 'https://accounts.google.com/o/oauth2/v2/auth',
    tokenUrl: 'https://oauth2.googleapis.com/token',
    scopes: [
      'https://www.googleapis.com/auth/gmail.modify',
      'https://www.googleapis.com/auth/calendar',
      'https://www.googleapis.com/auth/drive',
    ],
    scopeSeparator: ' ',
    accountInfoUrl: 'https://www.googleapis.com/oauth2/v2/userinfo',
    supportsRefresh: true,
    tokenAuth: 'body',
    extraAuthorizeParams: { access_type: 'offline', prompt: 'consent' },
  },
  github: {
    type: 'github',
    displayName: 'GitHub',
    authorizeUrl: 'https://github.com/login/oauth/authorize',
    tokenUrl: 'https://github.com/login/oauth/access_token',
    scopes: ['repo', 'user', 'write:discussion'],
    scopeSeparator: ',',
    accountInfoUrl: 'https://api.github.com/user',
    supportsRefresh: true,
    tokenAuth: 'body',
  },
  notion: {
    type: 'notion',
    displayName: 'Notion',
    authorizeUrl: 'https://api.notion.com/v1/oauth/authorize',
    tokenUrl: 'https://api.notion.com/v1/oauth/token',
    scopes: [],
    scopeSeparator: ' ',
    accountInfoUrl: null,
    supportsRefresh: false,
    tokenAuth: 'basic',
    extraAuthorizeParams: { owner: 'user' },
  },
};

export interface OAuthClientCredentials {
  clientId: string;
  clientSecret: string;
}

export function getProviderConfig(type: IntegrationType): OAuthProviderConfig | null {
  return OAUTH_PROVIDERS[type] ?? null;
}

export function getClientCredentials(type: IntegrationType): OAuthClientCredentials | null {
  const clientId = readScopedEnv('', type, '_CLIENT_ID');
  const clientSecret = readScopedEnv('', type, '_CLIENT_SECRET');
  if (!clientId || !clientSecret) {
    return null;
  }
  return { clientId, clientSecret };
}
