/**
 * State machine for article workflows.
 * Enforces the research -> writing -> saving order and the failure exits.
 */

import { WorkflowState } from '../types/index.js';
import { InvalidTransitionError } from './errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('state-machine');

/**
 * State transition table.
 * Maps current state -> states it may move to
 */
const transitions: Record<WorkflowState, readonly WorkflowState[]> = {
  [WorkflowState.INITIALIZED]: [WorkflowState.RESEARCHING, WorkflowState.FAILED],
  [WorkflowState.RESEARCHING]: [WorkflowState.RESEARCH_COMPLETE, WorkflowState.FAILED],
  [WorkflowState.RESEARCH_COMPLETE]: [WorkflowState.WRITING, WorkflowState.FAILED],
  [WorkflowState.WRITING]: [WorkflowState.WRITING_COMPLETE, WorkflowState.FAILED],
  [WorkflowState.WRITING_COMPLETE]: [WorkflowState.SAVING, WorkflowState.FAILED],
  [WorkflowState.SAVING]: [WorkflowState.COMPLETE, WorkflowState.FAILED],
  [WorkflowState.FAILED]: [WorkflowState.ROLLED_BACK],
  // Terminal states - no transitions out
  [WorkflowState.COMPLETE]: [],
  [WorkflowState.ROLLED_BACK]: [],
};

/**
 * Order of the happy path, used to compare progress.
 */
const PHASE_ORDER: readonly WorkflowState[] = [
  WorkflowState.INITIALIZED,
  WorkflowState.RESEARCHING,
  WorkflowState.RESEARCH_COMPLETE,
  WorkflowState.WRITING,
  WorkflowState.WRITING_COMPLETE,
  WorkflowState.SAVING,
  WorkflowState.COMPLETE,
];

export function isTerminalState(state: WorkflowState): boolean {
  return state === WorkflowState.COMPLETE || state === WorkflowState.ROLLED_BACK;
}

/**
 * Active states are those a run can still fail out of.
 */
export function isActiveState(state: WorkflowState): boolean {
  return !isTerminalState(state) && state !== WorkflowState.FAILED;
}

export function canTransition(from: WorkflowState, to: WorkflowState): boolean {
  return transitions[from].includes(to);
}

export function getAllowedTransitions(from: WorkflowState): readonly WorkflowState[] {
  return transitions[from];
}

/**
 * Validate a transition and log it. Throws InvalidTransitionError otherwise.
 */
export function assertTransition(
  sessionId: string,
  from: WorkflowState,
  to: WorkflowState
): void {
  if (!canTransition(from, to)) {
    const error = new InvalidTransitionError(from, to);
    log.error({ sessionId, from, to }, error.message);
    throw error;
  }

  log.info({ sessionId, from, to }, 'State transition');
}

/**
 * Position on the happy path; -1 for FAILED and ROLLED_BACK.
 */
export function getPhaseIndex(state: WorkflowState): number {
  return PHASE_ORDER.indexOf(state);
}

/**
 * Human-readable description of a state.
 */
export function describeState(state: WorkflowState): string {
  switch (state) {
    case WorkflowState.INITIALIZED:
      return 'Waiting to start';
    case WorkflowState.RESEARCHING:
      return 'Researching sources';
    case WorkflowState.RESEARCH_COMPLETE:
      return 'Research complete';
    case WorkflowState.WRITING:
      return 'Writing article';
    case WorkflowState.WRITING_COMPLETE:
      return 'Article written';
    case WorkflowState.SAVING:
      return 'Saving outputs';
    case WorkflowState.COMPLETE:
      return 'Completed successfully';
    case WorkflowState.FAILED:
      return 'Failed';
    case WorkflowState.ROLLED_BACK:
      return 'Rolled back';
  }
}
