import { randomUUID } from 'node:crypto';

import { and, desc, eq } from 'drizzle-orm';

import { getDatabase, integrations, integrationTokens, type Database } from '../database/schema';
import type {
  Integration,
  IntegrationStatus,
  IntegrationType,
  SealedTokenInput,
  StoredIntegrationToken,
} from './types';

export interface CreateIntegrationInput {
  ownerId: string;
  type: IntegrationType;
  name: string;
  status?: IntegrationStatus;
  scopes?: string[];
  externalAccountId?: string | null;
}

export interface IntegrationStatusUpdate {
  status: IntegrationStatus;
  lastError?: string | null;
  scopes?: string[];
  externalAccountId?: string | null;
}

export interface IntegrationRepository {
  create(input: CreateIntegrationInput): Promise<Integration>;
  getById(id: string): Promise<Integration | null>;
  findByOwnerAndType(ownerId: string, type: IntegrationType): Promise<Integration | null>;
  listByOwner(ownerId: string): Promise<Integration[]>;
  updateStatus(id: string, update: IntegrationStatusUpdate): Promise<Integration | null>;
  getToken(integrationId: string): Promise<StoredIntegrationToken | null>;
  /** Writes the token unconditionally (connect / reconnect). */
  saveToken(integrationId: string, token: SealedTokenInput): Promise<StoredIntegrationToken>;
  /** Replaces the token only when the stored version still equals `expectedVersion`. */
  replaceToken(
    integrationId: string,
    expectedVersion: number,
    token: SealedTokenInput
  ): Promise<StoredIntegrationToken | null>;
  deleteToken(integrationId: string): Promise<void>;
}

type IntegrationRow = typeof integrations.$inferSelect;
type TokenRow = typeof integrationTokens.$inferSelect;

function mapIntegration(row: IntegrationRow): Integration {
  return {
    id: row.id,
    ownerId: row.ownerId,
    type: row.type,
    name: row.name,
    status: row.status,
    scopes: row.scopes ?? [],
    externalAccountId: row.externalAccountId ?? null,
    lastError: row.lastError ?? null,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function mapToken(row: TokenRow): StoredIntegrationToken {
  return {
    integrationId: row.integrationId,
    accessToken: row.accessToken,
    refreshToken: row.refreshToken ?? null,
    expiresAt: row.expiresAt ?? null,
    version: row.version,
    updatedAt: row.updatedAt,
  };
}

export class DrizzleIntegrationRepository implements IntegrationRepository {
  constructor(private readonly db: Database) {}

  async create(input: CreateIntegrationInput): Promise<Integration> {
    const [row] = await this.db
      .insert(integrations)
      .values({
        ownerId: input.ownerId,
        type: input.type,
        name: input.name,
        status: input.status ?? 'disconnected',
        scopes: input.scopes ?? [],
        externalAccountId: input.externalAccountId ?? null,
      })
      .returning();
    return mapIntegration(row);
  }

  async getById(id: string): Promise<Integration | null> {
    const [row] = await this.db.select().from(integrations).where(eq(integrations.id, id)).limit(1);
    return row ? mapIntegration(row) : null;
  }

  async findByOwnerAndType(ownerId: string, type: IntegrationType): Promise<Integration | null> {
    const [row] = await this.db
      .select()
      .from(integrations)
      .where(and(eq(integrations.ownerId, ownerId), eq(integrations.type, type)))
      .orderBy(desc(integrations.createdAt))
      .limit(1);
    return row ? mapIntegration(row) : null;
  }

  async listByOwner(ownerId: string): Promise<Integration[]> {
    const rows = await this.db
      .select()
      .from(integrations)
      .where(eq(integrations.ownerId, ownerId))
      .orderBy(desc(integrations.createdAt));
    return rows.map(mapIntegration);
  }

  async updateStatus(id: string, update: IntegrationStatusUpdate): Promise<Integration | null> {
    const [row] = await this.db
      .update(integrations)
      .set({
        status: update.status,
        ...(update.lastError !== undefined ? { lastError: update.lastError } : {}),
        ...(update.scopes !== undefined ? { scopes: update.scopes } : {}),
        ...(update.externalAccountId !== undefined ? { externalAccountId: update.externalAccountId } : {}),
        updatedAt: new Date(),
      })
      .where(eq(integrations.id, id))
      .returning();
    return row ? mapIntegration(row) : null;
  }

  async getToken(integrationId: string): Promise<StoredIntegrationToken | null> {
    const [row] = await this.db
      .select()
      .from(integrationTokens)
      .where(eq(integrationTokens.integrationId, integrationId))
      .limit(1);
    return row ? mapToken(row) : null;
  }

  async saveToken(integrationId: string, token: SealedTokenInput): Promise<StoredIntegrationToken> {
    const existing = await this.getToken(integrationId);
    const now = new Date();
    const [row] = await this.db
      .insert(integrationTokens)
      .values({ integrationId, ...token, version: 1, updatedAt: now })
      .onConflictDoUpdate({
        target: integrationTokens.integrationId,
        set: { ...token, version: (existing?.version ?? 0) + 1, updatedAt: now },
      })
      .returning();
    return mapToken(row);
  }

  async replaceToken(
    integrationId: string,
    expectedVersion: number,
    token: SealedTokenInput
  ): Promise<StoredIntegrationToken | null> {
    const [row] = await this.db
      .update(integrationTokens)
      .set({ ...token, version: expectedVersion + 1, updatedAt: new Date() })
      .where(and(eq(integrationTokens.integrationId, integrationId), eq(integrationTokens.version, expectedVersion)))
      .returning();
    return row ? mapToken(row) : null;
  }

  async deleteToken(integrationId: string): Promise<void> {
    await this.db.delete(integrationTokens).where(eq(integrationTokens.integrationId, integrationId));
  }
}

export class MemoryIntegrationRepository implements IntegrationRepository {
  private readonly integrations = new Map<string, Integration>();
  private readonly tokens = new Map<string, StoredIntegrationToken>();

  async create(input: CreateIntegrationInput): Promise<Integration> {
    const now = new Date();
    const integration: Integration = {
      id: randomUUID(),
      ownerId: input.ownerId,
      type: input.type,
      name: input.name,
      status: input.status ?? 'disconnected',
      scopes: [...(input.scopes ?? [])],
      externalAccountId: input.externalAccountId ?? null,
      lastError: null,
      createdAt: now,
      updatedAt: now,
    };
    this.integrations.set(integration.id, integration);
    return { ...integration };
  }

  async getById(id: string): Promise<Integration | null> {
    const integration = this.integrations.get(id);
    return integration ? { ...integration } : null;
  }

  async findByOwnerAndType(ownerId: string, type: IntegrationType): Promise<Integration | null> {
    const matches = (await this.listByOwner(ownerId)).filter((integration) => integration.type === type);
    return matches[0] ?? null;
  }

  async listByOwner(ownerId: string): Promise<Integration[]> {
    return Array.from(this.integrations.values())
      .filter((integration) => integration.ownerId === ownerId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .map((integration) => ({ ...integration }));
  }

  async updateStatus(id: string, update: IntegrationStatusUpdate): Promise<Integration | null> {
    const existing = this.integrations.get(id);
    if (!existing) {
      return null;
    }
    const next: Integration = {
      ...existing,
      status: update.status,
      lastError: update.lastError !== undefined ? update.lastError : existing.lastError,
      scopes: update.scopes !== undefined ? [...update.scopes] : existing.scopes,
      externalAccountId:
        update.externalAccountId !== undefined ? update.externalAccountId : existing.externalAccountId,
      updatedAt: new Date(),
    };
    this.integrations.set(id, next);
    return { ...next };
  }

  async getToken(integrationId: string): Promise<StoredIntegrationToken | null> {
    const token = this.tokens.get(integrationId);
    return token ? { ...token } : null;
  }

  async saveToken(integrationId: string, token: SealedTokenInput): Promise<StoredIntegrationToken> {
    const existing = this.tokens.get(integrationId);
    const stored: StoredIntegrationToken = {
      integrationId,
      ...token,
      version: (existing?.version ?? 0) + 1,
      updatedAt: new Date(),
    };
    this.tokens.set(integrationId, stored);
    return { ...stored };
  }

  async replaceToken(
    integrationId: string,
    expectedVersion: number,
    token: SealedTokenInput
  ): Promise<StoredIntegrationToken | null> {
    const existing = this.tokens.get(integrationId);
    if (!existing || existing.version !== expectedVersion) {
      return null;
    }
    const stored: StoredIntegrationToken = {
      integrationId,
      ...token,
      version: expectedVersion + 1,
      updatedAt: new Date(),
    };
    this.tokens.set(integrationId, stored);
    return { ...stored };
  }

  async deleteToken(integrationId: string): Promise<void> {
    this.tokens.delete(integrationId);
  }
}

export function createIntegrationRepository(database: Database | null = getDatabase()): IntegrationRepository {
  return database ? new DrizzleIntegrationRepository(database) : new MemoryIntegrationRepository();
}
