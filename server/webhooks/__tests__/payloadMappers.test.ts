import { describe, expect, it } from 'vitest';

import { mapWebhook, PayloadMappingError } from '../payloadMappers';

const context = (headers: Record<string, string> = {}) => ({ externalRef: 'ref-1', headers });

describe('mapWebhook (n8n)', () => {
  it('maps a success callback with node results', () => {
    const event = mapWebhook(
      'n8n',
      {
        status: 'success',
        executionId: 981,
        eventId: 'evt-1',
        steps: [
          { node: 'Post update', status: 'success', output: { ts: '1' } },
          { stepId: 'step-2', name: 'Notify', status: 'error', error: { message: 'channel_not_found' } },
        ],
      },
      context()
    );

    expect(event).toEqual({
      externalRef: 'ref-1',
      status: 'succeeded',
      detail: {
        eventId: 'evt-1',
        engineExecutionId: '981',
        errorMessage: null,
        steps: [
          { stepId: null, name: 'Post update', status: 'success', output: { ts: '1' }, error: null },
          { stepId: 'step-2', name: 'Notify', status: 'error', output: undefined, error: 'channel_not_found' },
        ],
      },
    });
  });

  it('carries the engine error message on failures', () => {
    const event = mapWebhook('n8n', { status: 'crashed', error: 'Out of memory' }, context());
    expect(event.status).toBe('failed');
    expect(event.detail.errorMessage).toBe('Out of memory');
  });

  it('rejects unknown statuses', () => {
    expect(() => mapWebhook('n8n', { status: 'paused' }, context())).toThrow(
      'Cannot map n8n webhook: unrecognised status "paused"'
    );
  });

  it('rejects a body whose external reference disagrees with the path', () => {
    expect(() => mapWebhook('n8n', { status: 'running', externalRef: 'ref-2' }, context())).toThrow(
      PayloadMappingError
    );
  });

  it('rejects payloads without a status', () => {
    expect(() => mapWebhook('n8n', { executionId: '1' }, context())).toThrow(PayloadMappingError);
  });
});

describe('mapWebhook (github)', () => {
  const run = (status: string, conclusion: string | null) => ({
    action: 'completed',
    workflow_run: { id: 77, name: 'CI', status, conclusion },
  });

  it('maps run states onto execution statuses', () => {
    expect(mapWebhook('github', run('queued', null), context()).status).toBe('pending');
    expect(mapWebhook('github', run('in_progress', null), context()).status).toBe('running');
    expect(mapWebhook('github', run('completed', 'success'), context()).status).toBe('succeeded');
    expect(mapWebhook('github', run('completed', 'skipped'), context()).status).toBe('cancelled');
  });

  it('describes failed runs and uses the delivery id as event id', () => {
    const event = mapWebhook('github', run('completed', 'timed_out'), context({ 'x-github-delivery': 'delivery-5' }));

    expect(event).toEqual({
      externalRef: 'ref-1',
      status: 'failed',
      detail: { eventId: 'delivery-5', errorMessage: 'GitHub run 77 concluded timed_out' },
    });
  });

  it('rejects completed runs with an unknown conclusion', () => {
    expect(() => mapWebhook('github', run('completed', 'mystery'), context())).toThrow(
      'Cannot map github webhook: unrecognised run status "completed/mystery"'
    );
  });
});

describe('mapWebhook (generic)', () => {
  it('accepts execution statuses verbatim and falls back to the x-event-id header', () => {
    const event = mapWebhook('generic', { status: 'cancelled' }, context({ 'x-event-id': 'evt-h' }));
    expect(event).toEqual({
      externalRef: 'ref-1',
      status: 'cancelled',
      detail: { eventId: 'evt-h', errorMessage: null, steps: undefined },
    });
  });

  it('prefers the event id in the body', () => {
    const event = mapWebhook('generic', { status: 'running', eventId: 'evt-b' }, context({ 'x-event-id': 'evt-h' }));
    expect(event.detail.eventId).toBe('evt-b');
  });

  it('rejects statuses outside the execution vocabulary', () => {
    expect(() => mapWebhook('generic', { status: 'done' }, context())).toThrow(PayloadMappingError);
  });
});
