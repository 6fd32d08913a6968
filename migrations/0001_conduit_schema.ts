import { sql } from 'drizzle-orm';

import type { Database } from '../server/database/schema';

export type MigrationClient = Pick<Database, 'execute'>;

export async function up(db: MigrationClient): Promise<void> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS "workflows" (
      "id" uuid PRIMARY KEY DEFAULT gen_random_uuid(),
      "owner_id" text NOT NULL,
      "name" text NOT NULL,
      "description" text,
      "trigger_type" text NOT NULL DEFAULT 'manual',
      "trigger_config" jsonb NOT NULL DEFAULT '{}'::jsonb,
      "steps" jsonb NOT NULL DEFAULT '[]'::jsonb,
      "status" text NOT NULL DEFAULT 'draft',
      "deployed_ref" text,
      "tags" jsonb NOT NULL DEFAULT '[]'::jsonb,
      "created_at" timestamp NOT NULL DEFAULT now(),
      "updated_at" timestamp NOT NULL DEFAULT now()
    )
  `);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS "workflows_owner_idx" ON "workflows" ("owner_id")`);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS "workflows_status_idx" ON "workflows" ("status")`);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS "workflows_trigger_type_idx" ON "workflows" ("trigger_type")`);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS "workflow_executions" (
      "id" uuid PRIMARY KEY DEFAULT gen_random_uuid(),
      "workflow_id" uuid NOT NULL REFERENCES "workflows" ("id") ON DELETE CASCADE,
      "owner_id" text NOT NULL,
      "status" text NOT NULL DEFAULT 'pending',
      "failure_reason" text,
      "error_message" text,
      "external_ref" text NOT NULL,
      "engine_execution_id" text,
      "trigger_data" jsonb NOT NULL DEFAULT '{}'::jsonb,
      "step_results" jsonb NOT NULL DEFAULT '[]'::jsonb,
      "applied_event_ids" jsonb NOT NULL DEFAULT '[]'::jsonb,
      "version" integer NOT NULL DEFAULT 1,
      "started_at" timestamp NOT NULL DEFAULT now(),
      "finished_at" timestamp,
      "last_event_at" timestamp,
      "created_at" timestamp NOT NULL DEFAULT now(),
      "updated_at" timestamp NOT NULL DEFAULT now()
    )
  `);
  await db.execute(sql`
    CREATE UNIQUE INDEX IF NOT EXISTS "workflow_executions_external_ref_idx" ON "workflow_executions" ("external_ref")
  `);
  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS "workflow_executions_workflow_idx" ON "workflow_executions" ("workflow_id")
  `);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS "workflow_executions_status_idx" ON "workflow_executions" ("status")`);
  await db.execute(sql`
    CREATE INDEX IF NOT EXISTS "workflow_executions_finished_idx" ON "workflow_executions" ("finished_at")
  `);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS "integrations" (
      "id" uuid PRIMARY KEY DEFAULT gen_random_uuid(),
      "owner_id" text NOT NULL,
      "type" text NOT NULL,
      "name" text NOT NULL,
      "status" text NOT NULL DEFAULT 'disconnected',
      "scopes" jsonb NOT NULL DEFAULT '[]'::jsonb,
      "external_account_id" text,
      "last_error" text,
      "created_at" timestamp NOT NULL DEFAULT now(),
      "updated_at" timestamp NOT NULL DEFAULT now()
    )
  `);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS "integrations_owner_idx" ON "integrations" ("owner_id")`);
  await db.execute(sql`CREATE INDEX IF NOT EXISTS "integrations_owner_type_idx" ON "integrations" ("owner_id", "type")`);

  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS "integration_tokens" (
      "integration_id" uuid PRIMARY KEY REFERENCES "integrations" ("id") ON DELETE CASCADE,
      "access_token" text NOT NULL,
      "refresh_token" text,
      "expires_at" timestamp,
      "version" integer NOT NULL DEFAULT 1,
      "updated_at" timestamp NOT NULL DEFAULT now()
    )
  `);
}

export async function down(db: MigrationClient): Promise<void> {
  await db.execute(sql`DROP TABLE IF EXISTS "integration_tokens"`);
  await db.execute(sql`DROP TABLE IF EXISTS "integrations"`);
  await db.execute(sql`DROP TABLE IF EXISTS "workflow_executions"`);
  await db.execute(sql`DROP TABLE IF EXISTS "workflows"`);
}
