/**
 * Run State Machine
 *
 * Strict state machine for one download run.
 *
 * State Flow:
 * RESOLVING → RESOLVED → SELECTING → RETRIEVING → MUXING → CLEANING → DONE
 *          ↘ FAILED / CANCELLED (from any non-terminal state)
 *
 * Rules:
 * - State transitions MUST be explicit
 * - Invalid transitions throw errors
 * - FAILED, CANCELLED and DONE are absorbing
 */

import { StateTransitionError } from './errors/index.js';

export const RUN_STATES = [
  'RESOLVING',
  'RESOLVED',
  'SELECTING',
  'RETRIEVING',
  'MUXING',
  'CLEANING',
  'DONE',
  'FAILED',
  'CANCELLED',
] as const;

export type RunState = (typeof RUN_STATES)[number];

/**
 * Represents a state transition with metadata
 */
export interface RunStateTransition {
  from: RunState;
  to: RunState;
  timestamp: Date;
  reason?: string;
  error?: Error;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<RunState, ReadonlySet<RunState>> = {
  RESOLVING: new Set<RunState>(['RESOLVED', 'FAILED', 'CANCELLED']),
  RESOLVED: new Set<RunState>(['SELECTING', 'FAILED', 'CANCELLED']),
  SELECTING: new Set<RunState>(['RETRIEVING', 'FAILED', 'CANCELLED']),
  RETRIEVING: new Set<RunState>(['MUXING', 'FAILED', 'CANCELLED']),
  MUXING: new Set<RunState>(['CLEANING', 'FAILED', 'CANCELLED']),
  CLEANING: new Set<RunState>(['DONE', 'FAILED', 'CANCELLED']),
  DONE: new Set<RunState>(), // Terminal state
  FAILED: new Set<RunState>(),
  CANCELLED: new Set<RunState>(),
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: RunState, to: RunState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: RunState): RunState[] {
  return Array.from(validTransitions[current]);
}

/**
 * Run State Machine class
 * Manages state transitions with validation and history
 */
export class RunStateMachine {
  private currentState: RunState;
  private history: RunStateTransition[];
  private failure?: Error;
  private readonly runId: string;

  constructor(runId: string, initialState: RunState = 'RESOLVING') {
    this.runId = runId;
    this.currentState = initialState;
    this.history = [];
  }

  getState(): RunState {
    return this.currentState;
  }

  /**
   * Get the full transition history
   */
  getHistory(): ReadonlyArray<RunStateTransition> {
    return [...this.history];
  }

  /**
   * The error carried into FAILED, if the run failed
   */
  getError(): Error | undefined {
    return this.failure;
  }

  canTransitionTo(targetState: RunState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: RunState, reason?: string, error?: Error): RunStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.runId, this.currentState, targetState);
    }

    const transition: RunStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
      error,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  isTerminal(): boolean {
    return getNextStates(this.currentState).length === 0;
  }

  hasFailed(): boolean {
    return this.currentState === 'FAILED';
  }

  isComplete(): boolean {
    return this.currentState === 'DONE';
  }

  /**
   * Fail the run, keeping the originating error
   */
  fail(error: Error): RunStateTransition {
    const transition = this.transitionTo('FAILED', error.message, error);
    this.failure = error;
    return transition;
  }

  cancel(): RunStateTransition {
    return this.transitionTo('CANCELLED', 'interrupted');
  }
}
