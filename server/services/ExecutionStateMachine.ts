import { isTerminalStatus, type ExecutionStatus } from '../workflow/types';

export type TransitionDecision =
  /** Status moves forward. */
  | { kind: 'advance' }
  /** Status already recorded; only step detail may be appended. */
  | { kind: 'same' }
  /** Execution is terminal and the event names another terminal status. The recorded one stands. */
  | { kind: 'conflict' }
  | { kind: 'invalid' };

/**
 * pending -> running -> {succeeded, failed, cancelled}.
 * pending may also jump straight to a terminal status (dispatch failures and
 * callbacks that overtake the running event).
 */
export function evaluateTransition(current: ExecutionStatus, next: ExecutionStatus): TransitionDecision {
  if (current === next) {
    return { kind: 'same' };
  }

  if (isTerminalStatus(current)) {
    return isTerminalStatus(next) ? { kind: 'conflict' } : { kind: 'invalid' };
  }

  if (current === 'running') {
    return isTerminalStatus(next) ? { kind: 'advance' } : { kind: 'invalid' };
  }

  // pending
  return { kind: 'advance' };
}

export function canCancel(status: ExecutionStatus): boolean {
  return status === 'pending' || status === 'running';
}
