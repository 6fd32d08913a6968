import { MemoryIntegrationRepository } from '../integrations/IntegrationRepository';
import { MemoryRateWindowStore, RateLimiter, type RateLimitScope, type RateWindowConfig } from '../integrations/RateLimiter';
import type { Integration, IntegrationType } from '../integrations/types';
import { OAuthManager } from '../oauth/OAuthManager';
import { createPlatform, type Platform, type PlatformOverrides } from '../platform';
import { InMemoryWorkQueue } from '../queue/index';
import { EncryptionService } from '../services/EncryptionService';
import { WebhookVerifier } from '../webhooks/WebhookVerifier';
import { MemoryExecutionRepository } from '../workflow/ExecutionRepository';
import { MemoryWorkflowRepository } from '../workflow/WorkflowRepository';
import type { StepSpec, Workflow } from '../workflow/types';
import { FakeEngineClient } from './FakeEngineClient';

export interface TestPlatformOptions extends PlatformOverrides {
  limits?: Partial<Record<RateLimitScope, RateWindowConfig>>;
  webhookSecrets?: Partial<Record<string, string>>;
}

export interface TestPlatform {
  platform: Platform;
  engine: FakeEngineClient;
  queue: InMemoryWorkQueue;
}

export function createTestPlatform(options: TestPlatformOptions = {}): TestPlatform {
  const { limits, webhookSecrets, ...overrides } = options;
  const now = overrides.now ?? Date.now;
  const engine = new FakeEngineClient();
  const queue = new InMemoryWorkQueue({ attempts: 3, backoffMs: 0, logger: { info() {}, warn() {}, error() {} } });

  const platform = createPlatform({
    workflows: new MemoryWorkflowRepository(),
    executions: new MemoryExecutionRepository(),
    integrations: new MemoryIntegrationRepository(),
    encryption: new EncryptionService('test-secret'),
    oauth: new OAuthManager({
      fetchImpl: overrides.fetchImpl,
      credentials: () => ({ clientId: 'test-client', clientSecret: 'test-secret' }),
      now,
    }),
    engine,
    queue,
    rateLimiter: new RateLimiter({ store: new MemoryRateWindowStore(), limits, now }),
    webhookVerifier: new WebhookVerifier((source) => webhookSecrets?.[source]),
    dispatcherOptions: { timeoutMs: 1_000, retryPolicy: { maxAttempts: 1 }, sleep: async () => {} },
    ...overrides,
  });

  return { platform, engine, queue };
}

export function buildStep(overrides: Partial<StepSpec> = {}): StepSpec {
  return {
    id: overrides.id ?? 'step-1',
    name: overrides.name ?? 'Post update',
    actionType: overrides.actionType ?? 'api_call',
    integrationId: overrides.integrationId ?? null,
    config: overrides.config ?? { url: 'https://example.test/hook', method: 'POST' },
    order: overrides.order ?? 0,
  };
}

/** Creates a workflow that is already deployed to the fake engine. */
export async function seedActiveWorkflow(
  platform: Platform,
  options: { ownerId?: string; steps?: StepSpec[]; triggerType?: Workflow['triggerType']; triggerConfig?: Record<string, unknown> } = {}
): Promise<Workflow> {
  const workflow = await platform.workflows.create({
    ownerId: options.ownerId ?? 'user-1',
    name: 'Notify on deploy',
    triggerType: options.triggerType ?? 'manual',
    triggerConfig: options.triggerConfig ?? {},
    steps: options.steps ?? [buildStep()],
  });
  const active = await platform.workflows.update(workflow.id, { status: 'active', deployedRef: 'engine-wf-seeded' });
  if (!active) {
    throw new Error(`Workflow ${workflow.id} vanished while seeding`);
  }
  return active;
}

/** Creates a connected integration with tokens sealed by the platform's vault. */
export async function seedConnectedIntegration(
  platform: Platform,
  options: {
    ownerId?: string;
    type?: IntegrationType;
    accessToken?: string;
    refreshToken?: string | null;
    expiresAt?: Date | null;
  } = {}
): Promise<Integration> {
  const integration = await platform.integrations.create({
    ownerId: options.ownerId ?? 'user-1',
    type: options.type ?? 'slack',
    name: 'Team workspace',
    status: 'connected',
  });
  await platform.tokenVault.storeTokens(integration.id, {
    accessToken: options.accessToken ?? 'access-1',
    refreshToken: options.refreshToken === undefined ? 'refresh-1' : options.refreshToken,
    expiresAt: options.expiresAt ?? null,
    scopes: [],
  });
  return integration;
}
