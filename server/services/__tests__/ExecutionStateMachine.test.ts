import { describe, expect, it } from 'vitest';

import { canCancel, evaluateTransition } from '../ExecutionStateMachine';

describe('evaluateTransition', () => {
  it('lets pending move to any other status', () => {
    expect(evaluateTransition('pending', 'running')).toEqual({ kind: 'advance' });
    expect(evaluateTransition('pending', 'succeeded')).toEqual({ kind: 'advance' });
    expect(evaluateTransition('pending', 'failed')).toEqual({ kind: 'advance' });
    expect(evaluateTransition('pending', 'cancelled')).toEqual({ kind: 'advance' });
  });

  it('lets running move only to a terminal status', () => {
    expect(evaluateTransition('running', 'succeeded')).toEqual({ kind: 'advance' });
    expect(evaluateTransition('running', 'cancelled')).toEqual({ kind: 'advance' });
    expect(evaluateTransition('running', 'pending')).toEqual({ kind: 'invalid' });
  });

  it('treats a repeated status as the same state', () => {
    expect(evaluateTransition('running', 'running')).toEqual({ kind: 'same' });
    expect(evaluateTransition('failed', 'failed')).toEqual({ kind: 'same' });
  });

  it('reports a different terminal status as a conflict', () => {
    expect(evaluateTransition('succeeded', 'failed')).toEqual({ kind: 'conflict' });
    expect(evaluateTransition('cancelled', 'succeeded')).toEqual({ kind: 'conflict' });
  });

  it('never leaves a terminal status for a non-terminal one', () => {
    expect(evaluateTransition('succeeded', 'running')).toEqual({ kind: 'invalid' });
    expect(evaluateTransition('failed', 'pending')).toEqual({ kind: 'invalid' });
  });
});

describe('canCancel', () => {
  it('only allows cancelling unfinished executions', () => {
    expect(canCancel('pending')).toBe(true);
    expect(canCancel('running')).toBe(true);
    expect(canCancel('succeeded')).toBe(false);
    expect(canCancel('cancelled')).toBe(false);
  });
});
