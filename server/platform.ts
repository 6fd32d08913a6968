import { createWorkQueue, type WorkQueue } from './queue/index';
import type { ExternalEngineClient } from './integrations/ExternalEngineClient';
import { createIntegrationRepository, type IntegrationRepository } from './integrations/IntegrationRepository';
import { N8NClient } from './integrations/N8NClient';
import { RateLimiter } from './integrations/RateLimiter';
import { OAuthManager } from './oauth/OAuthManager';
import { MemoryOAuthStateStore, type OAuthStateStore } from './oauth/stateStore';
import { EncryptionService } from './services/EncryptionService';
import { ExecutionDispatcher, type ExecutionDispatcherOptions } from './services/ExecutionDispatcher';
import { ExecutionPollingService } from './services/ExecutionPollingService';
import { IntegrationActionService } from './services/IntegrationActionService';
import { IntegrationService } from './services/IntegrationService';
import { StatusReconciler } from './services/StatusReconciler';
import { TokenVault } from './services/TokenVault';
import { WorkflowService } from './services/WorkflowService';
import { WebhookVerifier } from './webhooks/WebhookVerifier';
import { createExecutionRepository, type ExecutionRepository } from './workflow/ExecutionRepository';
import { createWorkflowRepository, type WorkflowRepository } from './workflow/WorkflowRepository';

/** Every collaborator the HTTP layer and the workers share. */
export interface Platform {
  workflows: WorkflowRepository;
  executions: ExecutionRepository;
  integrations: IntegrationRepository;
  encryption: EncryptionService;
  oauth: OAuthManager;
  oauthStates: OAuthStateStore;
  engine: ExternalEngineClient;
  rateLimiter: RateLimiter;
  queue: WorkQueue;
  tokenVault: TokenVault;
  reconciler: StatusReconciler;
  dispatcher: ExecutionDispatcher;
  polling: ExecutionPollingService;
  workflowService: WorkflowService;
  integrationService: IntegrationService;
  actionService: IntegrationActionService;
  webhookVerifier: WebhookVerifier;
  close(): Promise<void>;
}

export interface PlatformOverrides {
  workflows?: WorkflowRepository;
  executions?: ExecutionRepository;
  integrations?: IntegrationRepository;
  encryption?: EncryptionService;
  oauth?: OAuthManager;
  oauthStates?: OAuthStateStore;
  engine?: ExternalEngineClient;
  rateLimiter?: RateLimiter;
  queue?: WorkQueue;
  webhookVerifier?: WebhookVerifier;
  dispatcherOptions?: ExecutionDispatcherOptions;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

export function createPlatform(overrides: PlatformOverrides = {}): Platform {
  const now = overrides.now ?? Date.now;
  const workflows = overrides.workflows ?? createWorkflowRepository();
  const executions = overrides.executions ?? createExecutionRepository();
  const integrations = overrides.integrations ?? createIntegrationRepository();
  const encryption = overrides.encryption ?? new EncryptionService();
  const oauth = overrides.oauth ?? new OAuthManager({ fetchImpl: overrides.fetchImpl, now });
  const oauthStates = overrides.oauthStates ?? new MemoryOAuthStateStore(now);
  const engine = overrides.engine ?? new N8NClient({ fetchImpl: overrides.fetchImpl });
  const rateLimiter = overrides.rateLimiter ?? new RateLimiter({ now });
  const queue = overrides.queue ?? createWorkQueue();

  const tokenVault = new TokenVault(integrations, encryption, oauth, { now });
  const reconciler = new StatusReconciler(executions, { now: () => new Date(now()) });
  const dispatcher = new ExecutionDispatcher(
    { workflows, executions, integrations, tokenVault, rateLimiter, engine, reconciler },
    overrides.dispatcherOptions
  );
  const polling = new ExecutionPollingService(executions, engine, reconciler, now);
  const workflowService = new WorkflowService(workflows, executions, integrations, engine);
  const integrationService = new IntegrationService(integrations, tokenVault, oauth, oauthStates, now);
  const actionService = new IntegrationActionService(
    integrationService,
    integrations,
    tokenVault,
    rateLimiter,
    overrides.fetchImpl
  );

  return {
    workflows,
    executions,
    integrations,
    encryption,
    oauth,
    oauthStates,
    engine,
    rateLimiter,
    queue,
    tokenVault,
    reconciler,
    dispatcher,
    polling,
    workflowService,
    integrationService,
    actionService,
    webhookVerifier: overrides.webhookVerifier ?? new WebhookVerifier(),
    async close() {
      await queue.close();
      await rateLimiter.close();
    },
  };
}
