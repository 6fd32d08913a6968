export const INTEGRATION_TYPES = [
  'slack',
  'google',
  'github',
  'notion',
  'figma',
  'jira',
  'confluence',
  'hubspot',
  'salesforce',
] as const;
export type IntegrationType = (typeof INTEGRATION_TYPES)[number];

export const INTEGRATION_STATUSES = ['connected', 'disconnected', 'error'] as const;
export type IntegrationStatus = (typeof INTEGRATION_STATUSES)[number];

export function isIntegrationType(value: string): value is IntegrationType {
  return INTEGRATION_TYPES.some((type) => type === value);
}

export interface Integration {
  id: string;
  ownerId: string;
  type: IntegrationType;
  name: string;
  status: IntegrationStatus;
  scopes: string[];
  externalAccountId: string | null;
  lastError: string | null;
  createdAt: Date;
  updatedAt: Date;
}

/** Token row as persisted; both token fields hold sealed ciphertext. */
export interface StoredIntegrationToken {
  integrationId: string;
  accessToken: string;
  refreshToken: string | null;
  expiresAt: Date | null;
  version: number;
  updatedAt: Date;
}

export interface SealedTokenInput {
  accessToken: string;
  refreshToken: string | null;
  expiresAt: Date | null;
}

export interface AccessToken {
  integrationId: string;
  type: IntegrationType;
  accessToken: string;
  expiresAt: Date | null;
}
