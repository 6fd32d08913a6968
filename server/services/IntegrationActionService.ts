import { z } from 'zod';

import { RateLimitExceededError, ReauthRequiredError, ValidationError } from '../errors';
import type { IntegrationRepository } from '../integrations/IntegrationRepository';
import { ProviderClient, ProviderRequestError, type APIResponse } from '../integrations/ProviderClient';
import type { RateLimiter } from '../integrations/RateLimiter';
import type { Integration, IntegrationType } from '../integrations/types';
import { isRecord } from '../types/common';
import { logAction } from '../utils/actionLog';
import type { IntegrationService } from './IntegrationService';
import type { TokenVault } from './TokenVault';

interface ActionContext {
  client: ProviderClient;
  integration: Integration;
}

interface ActionDefinition {
  description: string;
  run(context: ActionContext, params: unknown): Promise<APIResponse>;
}

function defineAction<P>(
  description: string,
  schema: z.ZodType<P, z.ZodTypeDef, unknown>,
  handler: (context: ActionContext, params: P) => Promise<APIResponse>
): ActionDefinition {
  return {
    description,
    async run(context, raw) {
      const parsed = schema.safeParse(raw ?? {});
      if (!parsed.success) {
        throw new ValidationError(
          'Invalid action parameters',
          parsed.error.issues.map((issue) => `${issue.path.join('.') || 'params'}: ${issue.message}`)
        );
      }
      return handler(context, parsed.data);
    },
  };
}

const PROVIDER_BASE_URLS: Partial<Record<IntegrationType, string>> = {
  slack: 'https://slack.com/api',
  github: 'https://api.github.com',
  google: 'https://gmail.googleapis.com/gmail/v1',
  notion: 'https://api.notion.com/v1',
};

const PROVIDER_TYPES: IntegrationType[] = ['slack', 'github', 'google', 'notion'];

const PROVIDER_HEADERS: Partial<Record<IntegrationType, Record<string, string>>> = {
  github: { Accept: 'application/vnd.github+json' },
  notion: { 'Notion-Version': '2022-06-28' },
};

/** Slack answers 200 with `ok: false` for application errors. */
function unwrapSlack(response: APIResponse): APIResponse {
  if (response.success && isRecord(response.data) && response.data.ok === false) {
    const reason = typeof response.data.error === 'string' ? response.data.error : 'unknown_error';
    return { success: false, error: `Slack API error: ${reason}`, statusCode: response.statusCode, data: response.data };
  }
  return response;
}

const ACTIONS: Partial<Record<IntegrationType, Record<string, ActionDefinition>>> = {
  slack: {
    send_message: defineAction(
      'Post a message to a channel',
      z.object({ channel: z.string().min(1), text: z.string().min(1), thread_ts: z.string().optional() }),
      async ({ client }, params) => unwrapSlack(await client.post('/chat.postMessage', params))
    ),
    list_channels: defineAction(
      'List conversations the token can see',
      z.object({ limit: z.number().int().min(1).max(1000).default(100), cursor: z.string().optional() }),
      async ({ client }, params) => {
        const query = new URLSearchParams({ limit: String(params.limit) });
        if (params.cursor) query.set('cursor', params.cursor);
        return unwrapSlack(await client.get(`/conversations.list?${query.toString()}`));
      }
    ),
  },
  github: {
    list_repos: defineAction(
      'List repositories of the authenticated user',
      z.object({ per_page: z.number().int().min(1).max(100).default(30), page: z.number().int().min(1).default(1) }),
      ({ client }, params) => client.get(`/user/repos?per_page=${params.per_page}&page=${params.page}`)
    ),
    create_issue: defineAction(
      'Open an issue in a repository',
      z.object({
        owner: z.string().min(1),
        repo: z.string().min(1),
        title: z.string().min(1),
        body: z.string().optional(),
        labels: z.array(z.string()).optional(),
      }),
      ({ client }, { owner, repo, ...issue }) =>
        client.post(`/repos/${encodeURIComponent(owner)}/${encodeURIComponent(repo)}/issues`, issue)
    ),
  },
  google: {
    list_emails: defineAction(
      'List Gmail messages matching a query',
      z.object({ query: z.string().optional(), maxResults: z.number().int().min(1).max(500).default(10) }),
      ({ client }, params) => {
        const query = new URLSearchParams({ maxResults: String(params.maxResults) });
        if (params.query) query.set('q', params.query);
        return client.get(`/users/me/messages?${query.toString()}`);
      }
    ),
  },
  notion: {
    search: defineAction(
      'Search pages and databases shared with the integration',
      z.object({ query: z.string().default(''), page_size: z.number().int().min(1).max(100).default(20) }),
      ({ client }, params) => client.post('/search', params)
    ),
  },
};

export interface ActionSummary {
  type: IntegrationType;
  action: string;
  description: string;
}

/**
 * Runs a single provider action on behalf of a user, gated by the rate
 * limiter and authenticated through the Token Vault.
 */
export class IntegrationActionService {
  constructor(
    private readonly integrations: IntegrationService,
    private readonly repository: IntegrationRepository,
    private readonly tokenVault: TokenVault,
    private readonly rateLimiter: RateLimiter,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  listActions(): ActionSummary[] {
    const summaries: ActionSummary[] = [];
    for (const type of PROVIDER_TYPES) {
      for (const [action, definition] of Object.entries(ACTIONS[type] ?? {})) {
        summaries.push({ type, action, description: definition.description });
      }
    }
    return summaries;
  }

  async execute(userId: string, integrationId: string, action: string, params: unknown): Promise<unknown> {
    const integration = await this.integrations.get(userId, integrationId);
    const definition = ACTIONS[integration.type]?.[action];
    const baseURL = PROVIDER_BASE_URLS[integration.type];
    if (!definition || !baseURL) {
      throw new ValidationError(`Action ${action} is not available for ${integration.type}`);
    }

    const decision = await this.rateLimiter.evaluate({ userId, scope: integration.type });
    if (!decision.allowed) {
      throw new RateLimitExceededError(`${userId}:${integration.type}`, decision.retryAfterMs);
    }

    const token = await this.tokenVault.getValidToken(integration.id);
    const client = new ProviderClient(baseURL, token.accessToken, this.fetchImpl, PROVIDER_HEADERS[integration.type]);
    const response = await definition.run({ client, integration }, params);

    if (!response.success) {
      const status = response.statusCode ?? 0;
      if (status === 401) {
        // The provider revoked the token; the user has to connect again.
        await this.repository.updateStatus(integration.id, { status: 'error', lastError: response.error ?? 'unauthorized' });
        throw new ReauthRequiredError(integration.id, 'provider rejected the access token');
      }
      throw new ProviderRequestError(
        `${integration.type}.${action} failed: ${response.error ?? 'unknown error'}`,
        status
      );
    }

    logAction({
      type: 'integration.action.executed',
      component: 'IntegrationActionService',
      integrationId: integration.id,
      integrationType: integration.type,
      action,
      userId,
    });
    return response.data ?? null;
  }
}
