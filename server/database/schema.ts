import { drizzle, type NeonHttpDatabase } from 'drizzle-orm/neon-http';
import { neon } from '@neondatabase/serverless';
import { pgTable, text, timestamp, integer, jsonb, uuid, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { relations } from 'drizzle-orm';

import type {
  ExecutionFailureReason,
  ExecutionStatus,
  StepResult,
  StepSpec,
  TriggerType,
  WorkflowStatus,
} from '../workflow/types';
import type { IntegrationStatus, IntegrationType } from '../integrations/types';

export const workflows = pgTable(
  'workflows',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    ownerId: text('owner_id').notNull(),
    name: text('name').notNull(),
    description: text('description'),
    triggerType: text('trigger_type').$type<TriggerType>().notNull().default('manual'),
    triggerConfig: jsonb('trigger_config').$type<Record<string, unknown>>().notNull().default({}),
    steps: jsonb('steps').$type<StepSpec[]>().notNull().default([]),
    status: text('status').$type<WorkflowStatus>().notNull().default('draft'),
    deployedRef: text('deployed_ref'),
    tags: jsonb('tags').$type<string[]>().notNull().default([]),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    ownerIdx: index('workflows_owner_idx').on(table.ownerId),
    statusIdx: index('workflows_status_idx').on(table.status),
    triggerIdx: index('workflows_trigger_type_idx').on(table.triggerType),
  })
);

export const workflowExecutions = pgTable(
  'workflow_executions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    workflowId: uuid('workflow_id')
      .notNull()
      .references(() => workflows.id, { onDelete: 'cascade' }),
    ownerId: text('owner_id').notNull(),
    status: text('status').$type<ExecutionStatus>().notNull().default('pending'),
    failureReason: text('failure_reason').$type<ExecutionFailureReason>(),
    errorMessage: text('error_message'),
    externalRef: text('external_ref').notNull(),
    engineExecutionId: text('engine_execution_id'),
    triggerData: jsonb('trigger_data').$type<Record<string, unknown>>().notNull().default({}),
    stepResults: jsonb('step_results').$type<StepResult[]>().notNull().default([]),
    appliedEventIds: jsonb('applied_event_ids').$type<string[]>().notNull().default([]),
    version: integer('version').notNull().default(1),
    startedAt: timestamp('started_at').defaultNow().notNull(),
    finishedAt: timestamp('finished_at'),
    lastEventAt: timestamp('last_event_at'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    externalRefIdx: uniqueIndex('workflow_executions_external_ref_idx').on(table.externalRef),
    workflowIdx: index('workflow_executions_workflow_idx').on(table.workflowId),
    statusIdx: index('workflow_executions_status_idx').on(table.status),
    finishedIdx: index('workflow_executions_finished_idx').on(table.finishedAt),
  })
);

export const integrations = pgTable(
  'integrations',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    ownerId: text('owner_id').notNull(),
    type: text('type').$type<IntegrationType>().notNull(),
    name: text('name').notNull(),
    status: text('status').$type<IntegrationStatus>().notNull().default('disconnected'),
    scopes: jsonb('scopes').$type<string[]>().notNull().default([]),
    externalAccountId: text('external_account_id'),
    lastError: text('last_error'),
    createdAt: timestamp('created_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => ({
    ownerIdx: index('integrations_owner_idx').on(table.ownerId),
    ownerTypeIdx: index('integrations_owner_type_idx').on(table.ownerId, table.type),
  })
);

export const integrationTokens = pgTable('integration_tokens', {
  integrationId: uuid('integration_id')
    .primaryKey()
    .references(() => integrations.id, { onDelete: 'cascade' }),
  accessToken: text('access_token').notNull(),
  refreshToken: text('refresh_token'),
  expiresAt: timestamp('expires_at'),
  version: integer('version').notNull().default(1),
  updatedAt: timestamp('updated_at').defaultNow().notNull(),
});

export const workflowsRelations = relations(workflows, ({ many }) => ({
  executions: many(workflowExecutions),
}));

export const workflowExecutionsRelations = relations(workflowExecutions, ({ one }) => ({
  workflow: one(workflows, {
    fields: [workflowExecutions.workflowId],
    references: [workflows.id],
  }),
}));

export const integrationsRelations = relations(integrations, ({ one }) => ({
  token: one(integrationTokens, {
    fields: [integrations.id],
    references: [integrationTokens.integrationId],
  }),
}));

const schema = {
  workflows,
  workflowExecutions,
  integrations,
  integrationTokens,
  workflowsRelations,
  workflowExecutionsRelations,
  integrationsRelations,
};

export type Database = NeonHttpDatabase<typeof schema>;

// Database connection
const connectionString = process.env.DATABASE_URL;

let db: Database | null = null;

if (!connectionString) {
  const environment = process.env.NODE_ENV ?? 'development';
  // In development or test environments, log a warning but don't crash
  if (environment === 'development' || environment === 'test') {
    if (environment === 'development') {
      console.warn('⚠️ DATABASE_URL not set - using in-memory repositories');
    }
    db = null;
  } else {
    throw new Error('DATABASE_URL environment variable is required');
  }
} else {
  const sql = neon(connectionString);
  db = drizzle(sql, { schema });
}

export function getDatabase(): Database | null {
  return db;
}

export function setDatabaseClientForTests(databaseClient: Database | null): void {
  if (process.env.NODE_ENV !== 'test') {
    throw new Error('setDatabaseClientForTests should only be used in test environment');
  }

  db = databaseClient;
}
