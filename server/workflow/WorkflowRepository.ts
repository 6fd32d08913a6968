import { randomUUID } from 'node:crypto';

import { and, desc, eq } from 'drizzle-orm';

import { getDatabase, workflows, type Database } from '../database/schema';
import type { StepSpec, TriggerType, Workflow, WorkflowStatus } from './types';

export interface CreateWorkflowInput {
  ownerId: string;
  name: string;
  description?: string | null;
  triggerType: TriggerType;
  triggerConfig?: Record<string, unknown>;
  steps?: StepSpec[];
  tags?: string[];
}

export interface WorkflowPatch {
  name?: string;
  description?: string | null;
  triggerType?: TriggerType;
  triggerConfig?: Record<string, unknown>;
  steps?: StepSpec[];
  status?: WorkflowStatus;
  deployedRef?: string | null;
  tags?: string[];
}

export interface WorkflowQuery {
  status?: WorkflowStatus;
  triggerType?: TriggerType;
}

export interface WorkflowRepository {
  create(input: CreateWorkflowInput): Promise<Workflow>;
  getById(id: string): Promise<Workflow | null>;
  listByOwner(ownerId: string): Promise<Workflow[]>;
  list(query: WorkflowQuery): Promise<Workflow[]>;
  update(id: string, patch: WorkflowPatch): Promise<Workflow | null>;
  delete(id: string): Promise<boolean>;
}

type WorkflowRow = typeof workflows.$inferSelect;

function mapWorkflow(row: WorkflowRow): Workflow {
  return {
    id: row.id,
    ownerId: row.ownerId,
    name: row.name,
    description: row.description ?? null,
    triggerType: row.triggerType,
    triggerConfig: row.triggerConfig ?? {},
    steps: [...(row.steps ?? [])].sort((a, b) => a.order - b.order),
    status: row.status,
    deployedRef: row.deployedRef ?? null,
    tags: row.tags ?? [],
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function cloneWorkflow(workflow: Workflow): Workflow {
  return {
    ...workflow,
    triggerConfig: { ...workflow.triggerConfig },
    steps: workflow.steps.map((step) => ({ ...step, config: { ...step.config } })),
    tags: [...workflow.tags],
  };
}

export class DrizzleWorkflowRepository implements WorkflowRepository {
  constructor(private readonly db: Database) {}

  async create(input: CreateWorkflowInput): Promise<Workflow> {
    const [row] = await this.db
      .insert(workflows)
      .values({
        ownerId: input.ownerId,
        name: input.name,
        description: input.description ?? null,
        triggerType: input.triggerType,
        triggerConfig: input.triggerConfig ?? {},
        steps: input.steps ?? [],
        tags: input.tags ?? [],
      })
      .returning();
    return mapWorkflow(row);
  }

  async getById(id: string): Promise<Workflow | null> {
    const [row] = await this.db.select().from(workflows).where(eq(workflows.id, id)).limit(1);
    return row ? mapWorkflow(row) : null;
  }

  async listByOwner(ownerId: string): Promise<Workflow[]> {
    const rows = await this.db
      .select()
      .from(workflows)
      .where(eq(workflows.ownerId, ownerId))
      .orderBy(desc(workflows.updatedAt));
    return rows.map(mapWorkflow);
  }

  async list(query: WorkflowQuery): Promise<Workflow[]> {
    const conditions = [
      query.status ? eq(workflows.status, query.status) : undefined,
      query.triggerType ? eq(workflows.triggerType, query.triggerType) : undefined,
    ];
    const rows = await this.db
      .select()
      .from(workflows)
      .where(and(...conditions))
      .orderBy(desc(workflows.updatedAt));
    return rows.map(mapWorkflow);
  }

  async update(id: string, patch: WorkflowPatch): Promise<Workflow | null> {
    const [row] = await this.db
      .update(workflows)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(workflows.id, id))
      .returning();
    return row ? mapWorkflow(row) : null;
  }

  async delete(id: string): Promise<boolean> {
    const rows = await this.db.delete(workflows).where(eq(workflows.id, id)).returning({ id: workflows.id });
    return rows.length > 0;
  }
}

export class MemoryWorkflowRepository implements WorkflowRepository {
  private readonly workflows = new Map<string, Workflow>();

  async create(input: CreateWorkflowInput): Promise<Workflow> {
    const now = new Date();
    const workflow: Workflow = {
      id: randomUUID(),
      ownerId: input.ownerId,
      name: input.name,
      description: input.description ?? null,
      triggerType: input.triggerType,
      triggerConfig: input.triggerConfig ?? {},
      steps: [...(input.steps ?? [])].sort((a, b) => a.order - b.order),
      status: 'draft',
      deployedRef: null,
      tags: input.tags ?? [],
      createdAt: now,
      updatedAt: now,
    };
    this.workflows.set(workflow.id, cloneWorkflow(workflow));
    return cloneWorkflow(workflow);
  }

  async getById(id: string): Promise<Workflow | null> {
    const workflow = this.workflows.get(id);
    return workflow ? cloneWorkflow(workflow) : null;
  }

  async listByOwner(ownerId: string): Promise<Workflow[]> {
    return this.sorted().filter((workflow) => workflow.ownerId === ownerId);
  }

  async list(query: WorkflowQuery): Promise<Workflow[]> {
    return this.sorted().filter(
      (workflow) =>
        (!query.status || workflow.status === query.status) &&
        (!query.triggerType || workflow.triggerType === query.triggerType)
    );
  }

  async update(id: string, patch: WorkflowPatch): Promise<Workflow | null> {
    const existing = this.workflows.get(id);
    if (!existing) {
      return null;
    }
    const next = cloneWorkflow({ ...existing, ...patch, updatedAt: new Date() });
    next.steps.sort((a, b) => a.order - b.order);
    this.workflows.set(id, next);
    return cloneWorkflow(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.workflows.delete(id);
  }

  private sorted(): Workflow[] {
    return Array.from(this.workflows.values())
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .map(cloneWorkflow);
  }
}

export function createWorkflowRepository(database: Database | null = getDatabase()): WorkflowRepository {
  return database ? new DrizzleWorkflowRepository(database) : new MemoryWorkflowRepository();
}
