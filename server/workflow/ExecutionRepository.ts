import { randomUUID } from 'node:crypto';

import { and, asc, desc, eq, inArray, isNotNull, lt, or, isNull } from 'drizzle-orm';

import { getDatabase, workflowExecutions, type Database } from '../database/schema';
import type {
  ExecutionFailureReason,
  ExecutionStatus,
  StepResult,
  WorkflowExecution,
} from './types';

export interface CreateExecutionInput {
  workflowId: string;
  ownerId: string;
  externalRef: string;
  triggerData: Record<string, unknown>;
}

export interface ExecutionPatch {
  status?: ExecutionStatus;
  failureReason?: ExecutionFailureReason | null;
  errorMessage?: string | null;
  engineExecutionId?: string | null;
  stepResults?: StepResult[];
  appliedEventIds?: string[];
  finishedAt?: Date | null;
  lastEventAt?: Date | null;
}

export interface AwaitingUpdateQuery {
  statuses: ExecutionStatus[];
  /** Executions whose last event (or start, when none arrived) is older than this are returned. */
  quietSince: Date;
  limit: number;
}

export class DuplicateExternalRefError extends Error {
  constructor(public readonly externalRef: string) {
    super(`An execution with external reference ${externalRef} already exists`);
    this.name = 'DuplicateExternalRefError';
  }
}

export interface ExecutionRepository {
  create(input: CreateExecutionInput): Promise<WorkflowExecution>;
  getById(id: string): Promise<WorkflowExecution | null>;
  getByExternalRef(externalRef: string): Promise<WorkflowExecution | null>;
  /** Applies the patch only if the stored version equals `expectedVersion`; `null` when it moved on. */
  compareAndSet(id: string, expectedVersion: number, patch: ExecutionPatch): Promise<WorkflowExecution | null>;
  listByWorkflow(workflowId: string, limit?: number): Promise<WorkflowExecution[]>;
  listAwaitingUpdate(query: AwaitingUpdateQuery): Promise<WorkflowExecution[]>;
  deleteFinishedBefore(cutoff: Date): Promise<number>;
}

type ExecutionRow = typeof workflowExecutions.$inferSelect;

function mapExecution(row: ExecutionRow): WorkflowExecution {
  return {
    id: row.id,
    workflowId: row.workflowId,
    ownerId: row.ownerId,
    status: row.status,
    failureReason: row.failureReason ?? null,
    errorMessage: row.errorMessage ?? null,
    externalRef: row.externalRef,
    engineExecutionId: row.engineExecutionId ?? null,
    triggerData: row.triggerData ?? {},
    stepResults: row.stepResults ?? [],
    appliedEventIds: row.appliedEventIds ?? [],
    version: row.version,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt ?? null,
    lastEventAt: row.lastEventAt ?? null,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}

export class DrizzleExecutionRepository implements ExecutionRepository {
  constructor(private readonly db: Database) {}

  async create(input: CreateExecutionInput): Promise<WorkflowExecution> {
    try {
      const [row] = await this.db
        .insert(workflowExecutions)
        .values({
          workflowId: input.workflowId,
          ownerId: input.ownerId,
          externalRef: input.externalRef,
          triggerData: input.triggerData,
          status: 'pending',
        })
        .returning();
      return mapExecution(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateExternalRefError(input.externalRef);
      }
      throw error;
    }
  }

  async getById(id: string): Promise<WorkflowExecution | null> {
    const [row] = await this.db.select().from(workflowExecutions).where(eq(workflowExecutions.id, id)).limit(1);
    return row ? mapExecution(row) : null;
  }

  async getByExternalRef(externalRef: string): Promise<WorkflowExecution | null> {
    const [row] = await this.db
      .select()
      .from(workflowExecutions)
      .where(eq(workflowExecutions.externalRef, externalRef))
      .limit(1);
    return row ? mapExecution(row) : null;
  }

  async compareAndSet(
    id: string,
    expectedVersion: number,
    patch: ExecutionPatch
  ): Promise<WorkflowExecution | null> {
    const [row] = await this.db
      .update(workflowExecutions)
      .set({ ...patch, version: expectedVersion + 1, updatedAt: new Date() })
      .where(and(eq(workflowExecutions.id, id), eq(workflowExecutions.version, expectedVersion)))
      .returning();
    return row ? mapExecution(row) : null;
  }

  async listByWorkflow(workflowId: string, limit = 50): Promise<WorkflowExecution[]> {
    const rows = await this.db
      .select()
      .from(workflowExecutions)
      .where(eq(workflowExecutions.workflowId, workflowId))
      .orderBy(desc(workflowExecutions.startedAt))
      .limit(limit);
    return rows.map(mapExecution);
  }

  async listAwaitingUpdate(query: AwaitingUpdateQuery): Promise<WorkflowExecution[]> {
    if (query.statuses.length === 0) {
      return [];
    }
    const rows = await this.db
      .select()
      .from(workflowExecutions)
      .where(
        and(
          inArray(workflowExecutions.status, query.statuses),
          or(
            lt(workflowExecutions.lastEventAt, query.quietSince),
            and(isNull(workflowExecutions.lastEventAt), lt(workflowExecutions.startedAt, query.quietSince))
          )
        )
      )
      .orderBy(asc(workflowExecutions.startedAt))
      .limit(query.limit);
    return rows.map(mapExecution);
  }

  async deleteFinishedBefore(cutoff: Date): Promise<number> {
    const rows = await this.db
      .delete(workflowExecutions)
      .where(and(isNotNull(workflowExecutions.finishedAt), lt(workflowExecutions.finishedAt, cutoff)))
      .returning({ id: workflowExecutions.id });
    return rows.length;
  }
}

function cloneExecution(execution: WorkflowExecution): WorkflowExecution {
  return {
    ...execution,
    triggerData: { ...execution.triggerData },
    stepResults: execution.stepResults.map((step) => ({ ...step })),
    appliedEventIds: [...execution.appliedEventIds],
  };
}

export class MemoryExecutionRepository implements ExecutionRepository {
  private readonly executions = new Map<string, WorkflowExecution>();
  private readonly byExternalRef = new Map<string, string>();

  async create(input: CreateExecutionInput): Promise<WorkflowExecution> {
    if (this.byExternalRef.has(input.externalRef)) {
      throw new DuplicateExternalRefError(input.externalRef);
    }
    const now = new Date();
    const execution: WorkflowExecution = {
      id: randomUUID(),
      workflowId: input.workflowId,
      ownerId: input.ownerId,
      status: 'pending',
      failureReason: null,
      errorMessage: null,
      externalRef: input.externalRef,
      engineExecutionId: null,
      triggerData: { ...input.triggerData },
      stepResults: [],
      appliedEventIds: [],
      version: 1,
      startedAt: now,
      finishedAt: null,
      lastEventAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.executions.set(execution.id, execution);
    this.byExternalRef.set(execution.externalRef, execution.id);
    return cloneExecution(execution);
  }

  async getById(id: string): Promise<WorkflowExecution | null> {
    const execution = this.executions.get(id);
    return execution ? cloneExecution(execution) : null;
  }

  async getByExternalRef(externalRef: string): Promise<WorkflowExecution | null> {
    const id = this.byExternalRef.get(externalRef);
    return id ? this.getById(id) : null;
  }

  async compareAndSet(
    id: string,
    expectedVersion: number,
    patch: ExecutionPatch
  ): Promise<WorkflowExecution | null> {
    const existing = this.executions.get(id);
    if (!existing || existing.version !== expectedVersion) {
      return null;
    }
    const next = cloneExecution({
      ...existing,
      ...patch,
      version: expectedVersion + 1,
      updatedAt: new Date(),
    });
    this.executions.set(id, next);
    return cloneExecution(next);
  }

  async listByWorkflow(workflowId: string, limit = 50): Promise<WorkflowExecution[]> {
    return Array.from(this.executions.values())
      .filter((execution) => execution.workflowId === workflowId)
      .sort((a, b) => b.startedAt.getTime() - a.startedAt.getTime())
      .slice(0, limit)
      .map(cloneExecution);
  }

  async listAwaitingUpdate(query: AwaitingUpdateQuery): Promise<WorkflowExecution[]> {
    const cutoff = query.quietSince.getTime();
    return Array.from(this.executions.values())
      .filter((execution) => query.statuses.includes(execution.status))
      .filter((execution) => (execution.lastEventAt ?? execution.startedAt).getTime() < cutoff)
      .sort((a, b) => a.startedAt.getTime() - b.startedAt.getTime())
      .slice(0, query.limit)
      .map(cloneExecution);
  }

  async deleteFinishedBefore(cutoff: Date): Promise<number> {
    let removed = 0;
    for (const [id, execution] of this.executions) {
      if (execution.finishedAt && execution.finishedAt.getTime() < cutoff.getTime()) {
        this.executions.delete(id);
        this.byExternalRef.delete(execution.externalRef);
        removed += 1;
      }
    }
    return removed;
  }
}

export function createExecutionRepository(database: Database | null = getDatabase()): ExecutionRepository {
  return database ? new DrizzleExecutionRepository(database) : new MemoryExecutionRepository();
}
