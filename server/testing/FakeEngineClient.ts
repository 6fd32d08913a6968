import { DispatchError } from '../errors';
import type {
  EngineExecutionAccepted,
  EngineExecutionRequest,
  EngineExecutionSnapshot,
  EngineStopResult,
  ExternalEngineClient,
} from '../integrations/ExternalEngineClient';
import type { EngineWorkflowDefinition } from '../integrations/n8nWorkflowFormat';

/**
 * In-process engine stand-in. Records every call; behaviour is swapped by
 * assigning the `on*` hooks.
 */
export class FakeEngineClient implements ExternalEngineClient {
  readonly createdWorkflows: EngineWorkflowDefinition[] = [];
  readonly activated: string[] = [];
  readonly deactivated: string[] = [];
  readonly deleted: string[] = [];
  readonly executeRequests: EngineExecutionRequest[] = [];
  readonly stopped: string[] = [];
  readonly snapshots = new Map<string, EngineExecutionSnapshot>();

  onExecute: (request: EngineExecutionRequest) => Promise<EngineExecutionAccepted> = async () => ({
    engineExecutionId: `engine-exec-${this.executeRequests.length}`,
  });
  onStop: (engineExecutionId: string) => Promise<EngineStopResult> = async () => ({
    confirmed: true,
    status: 'cancelled',
  });
  onCreateWorkflow: (definition: EngineWorkflowDefinition) => Promise<{ id: string }> = async () => ({
    id: `engine-wf-${this.createdWorkflows.length}`,
  });

  async createWorkflow(definition: EngineWorkflowDefinition): Promise<{ id: string }> {
    this.createdWorkflows.push(definition);
    return this.onCreateWorkflow(definition);
  }

  async activateWorkflow(workflowRef: string): Promise<void> {
    this.activated.push(workflowRef);
  }

  async deactivateWorkflow(workflowRef: string): Promise<void> {
    this.deactivated.push(workflowRef);
  }

  async deleteWorkflow(workflowRef: string): Promise<void> {
    this.deleted.push(workflowRef);
  }

  async executeWorkflow(request: EngineExecutionRequest): Promise<EngineExecutionAccepted> {
    this.executeRequests.push(request);
    return this.onExecute(request);
  }

  async getExecution(engineExecutionId: string): Promise<EngineExecutionSnapshot> {
    const snapshot = this.snapshots.get(engineExecutionId);
    if (!snapshot) {
      throw new DispatchError(`Unknown engine execution ${engineExecutionId}`, { retryable: false });
    }
    return snapshot;
  }

  async stopExecution(engineExecutionId: string): Promise<EngineStopResult> {
    this.stopped.push(engineExecutionId);
    return this.onStop(engineExecutionId);
  }
}
