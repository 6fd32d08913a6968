#!/usr/bin/env tsx
import { sql } from 'drizzle-orm';

import '../server/env';
import { getDatabase } from '../server/database/schema';
import { getErrorMessage } from '../server/types/common';
import * as conduitSchema from '../migrations/0001_conduit_schema';
import type { MigrationClient } from '../migrations/0001_conduit_schema';

interface Migration {
  name: string;
  up(db: MigrationClient): Promise<void>;
  down(db: MigrationClient): Promise<void>;
}

const MIGRATIONS: Migration[] = [{ name: '0001_conduit_schema', ...conduitSchema }];

async function appliedMigrations(db: MigrationClient): Promise<Set<string>> {
  await db.execute(sql`
    CREATE TABLE IF NOT EXISTS "schema_migrations" (
      "name" text PRIMARY KEY,
      "applied_at" timestamp NOT NULL DEFAULT now()
    )
  `);
  const result = await db.execute(sql`SELECT "name" FROM "schema_migrations"`);
  const names = new Set<string>();
  for (const row of result.rows) {
    if (typeof row.name === 'string') {
      names.add(row.name);
    }
  }
  return names;
}

async function main(): Promise<void> {
  const db = getDatabase();
  if (!db) {
    throw new Error('DATABASE_URL is required to run migrations');
  }

  const rollback = process.argv.includes('--down');
  const applied = await appliedMigrations(db);

  if (rollback) {
    const last = [...MIGRATIONS].reverse().find((migration) => applied.has(migration.name));
    if (!last) {
      console.log('ℹ️ No applied migrations to roll back.');
      return;
    }
    await last.down(db);
    await db.execute(sql`DELETE FROM "schema_migrations" WHERE "name" = ${last.name}`);
    console.log(`↩️ Rolled back ${last.name}`);
    return;
  }

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.name)) {
      continue;
    }
    await migration.up(db);
    await db.execute(sql`INSERT INTO "schema_migrations" ("name") VALUES (${migration.name})`);
    console.log(`✅ Applied ${migration.name}`);
  }
}

main().catch((error) => {
  console.error('❌ Migration failed:', getErrorMessage(error));
  process.exit(1);
});
