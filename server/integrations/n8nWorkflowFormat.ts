import type { StepSpec, TriggerType, Workflow } from '../workflow/types';

export interface EngineNode {
  id: string;
  name: string;
  type: string;
  typeVersion: number;
  position: [number, number];
  parameters: Record<string, unknown>;
}

export interface EngineConnectionTarget {
  node: string;
  type: 'main';
  index: number;
}

export interface EngineWorkflowDefinition {
  name: string;
  nodes: EngineNode[];
  connections: Record<string, { main: EngineConnectionTarget[][] }>;
  settings: { executionOrder: 'v1' };
}

const TRIGGER_X = 250;
const STEP_X = 450;
const BASE_Y = 300;
const STEP_SPACING_Y = 180;

function readString(config: Record<string, unknown>, key: string, fallback: string): string {
  const value = config[key];
  return typeof value === 'string' ? value : fallback;
}

function readArray(config: Record<string, unknown>, key: string): unknown[] {
  const value = config[key];
  return Array.isArray(value) ? value : [];
}

export function createTriggerNode(triggerType: TriggerType, triggerConfig: Record<string, unknown>): EngineNode {
  switch (triggerType) {
    case 'webhook':
      return {
        id: 'trigger-webhook',
        name: 'Webhook Trigger',
        type: 'n8n-nodes-base.webhook',
        typeVersion: 1,
        position: [TRIGGER_X, BASE_Y],
        parameters: {
          httpMethod: readString(triggerConfig, 'method', 'POST'),
          path: readString(triggerConfig, 'path', 'webhook'),
          responseMode: 'onReceived',
          options: {},
        },
      };
    case 'schedule':
      return {
        id: 'trigger-schedule',
        name: 'Schedule Trigger',
        type: 'n8n-nodes-base.cron',
        typeVersion: 1,
        position: [TRIGGER_X, BASE_Y],
        parameters: {
          triggerTimes: {
            item: [{ mode: 'custom', cronExpression: readString(triggerConfig, 'cron', '0 9 * * *') }],
          },
        },
      };
    case 'manual':
      return {
        id: 'trigger-manual',
        name: 'Manual Trigger',
        type: 'n8n-nodes-base.manualTrigger',
        typeVersion: 1,
        position: [TRIGGER_X, BASE_Y],
        parameters: {},
      };
  }
}

function createIntegrationNode(step: StepSpec, base: Omit<EngineNode, 'type' | 'typeVersion' | 'parameters'>): EngineNode {
  const config = step.config;
  const integrationType = readString(config, 'integrationType', '');

  if (integrationType === 'slack') {
    return {
      ...base,
      type: 'n8n-nodes-base.slack',
      typeVersion: 2.1,
      parameters: {
        authentication: 'oAuth2',
        resource: 'message',
        operation: readString(config, 'operation', 'post'),
        channel: readString(config, 'channel', ''),
        text: readString(config, 'text', ''),
      },
    };
  }

  if (integrationType === 'github') {
    return {
      ...base,
      type: 'n8n-nodes-base.github',
      typeVersion: 1.2,
      parameters: {
        authentication: 'oAuth2',
        resource: 'issue',
        operation: readString(config, 'operation', 'create'),
        owner: readString(config, 'owner', ''),
        repository: readString(config, 'repository', ''),
        title: readString(config, 'title', ''),
        body: readString(config, 'body', ''),
      },
    };
  }

  return {
    ...base,
    type: 'n8n-nodes-base.httpRequest',
    typeVersion: 4.1,
    parameters: {
      url: readString(config, 'url', ''),
      method: readString(config, 'method', 'POST'),
    },
  };
}

export function createStepNode(step: StepSpec, index: number): EngineNode {
  const base = {
    id: `step-${index}-${step.id}`,
    name: step.name,
    position: [STEP_X, BASE_Y + (index + 1) * STEP_SPACING_Y] satisfies [number, number],
  };
  const config = step.config;

  switch (step.actionType) {
    case 'api_call': {
      const method = readString(config, 'method', 'GET').toUpperCase();
      return {
        ...base,
        type: 'n8n-nodes-base.httpRequest',
        typeVersion: 4.1,
        parameters: {
          url: readString(config, 'url', ''),
          method,
          sendHeaders: true,
          headerParameters: { parameters: readArray(config, 'headers') },
          sendBody: ['POST', 'PUT', 'PATCH'].includes(method),
          bodyParameters: { parameters: readArray(config, 'body') },
        },
      };
    }
    case 'integration_action':
      return createIntegrationNode(step, base);
    case 'ai_process':
      return {
        ...base,
        type: 'n8n-nodes-base.openAi',
        typeVersion: 1.3,
        parameters: {
          model: readString(config, 'model', 'gpt-4o-mini'),
          messages: { values: [{ role: 'user', content: readString(config, 'prompt', '') }] },
        },
      };
    case 'data_transform':
    case 'notification':
      return {
        ...base,
        type: 'n8n-nodes-base.function',
        typeVersion: 1,
        parameters: { functionCode: readString(config, 'code', 'return items;') },
      };
  }
}

/**
 * Converts a workflow into the engine's format: one trigger node followed by
 * the steps chained in order.
 */
export function toEngineWorkflow(workflow: Workflow): EngineWorkflowDefinition {
  const trigger = createTriggerNode(workflow.triggerType, workflow.triggerConfig);
  const nodes: EngineNode[] = [trigger];
  const connections: EngineWorkflowDefinition['connections'] = {};

  let previous = trigger.name;
  workflow.steps.forEach((step, index) => {
    const node = createStepNode(step, index);
    nodes.push(node);
    connections[previous] = { main: [[{ node: node.name, type: 'main', index: 0 }]] };
    previous = node.name;
  });

  return {
    name: workflow.name,
    nodes,
    connections,
    settings: { executionOrder: 'v1' },
  };
}
