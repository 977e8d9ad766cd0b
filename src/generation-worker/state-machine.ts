/**
 * Worker State Machine
 *
 * Lifecycle transitions of a single-use generation worker.
 */

import type { TerminalState, WorkerState } from './types';

// ============================================================================
// State Transitions
// ============================================================================

const VALID_TRANSITIONS: Record<WorkerState, WorkerState[]> = {
  idle: ['running'],
  running: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

const TERMINAL_STATES: ReadonlySet<WorkerState> = new Set<WorkerState>(['completed', 'failed', 'cancelled']);

// ============================================================================
// State Machine
// ============================================================================

export class WorkerStateMachine {
  canTransition(from: WorkerState, to: WorkerState): boolean {
    return VALID_TRANSITIONS[from].includes(to);
  }

  /**
   * Attempt state transition
   */
  transition(from: WorkerState, to: WorkerState): WorkerState {
    if (!this.canTransition(from, to)) {
      throw new Error(`Invalid state transition: ${from} -> ${to}`);
    }
    return to;
  }

  isTerminal(state: WorkerState): state is TerminalState {
    return TERMINAL_STATES.has(state);
  }

  getValidNextStates(state: WorkerState): WorkerState[] {
    return [...VALID_TRANSITIONS[state]];
  }
}

export const workerStateMachine = new WorkerStateMachine();
