import { describe, it, expect } from 'vitest';
import {
  assertTransition,
  canTransition,
  describeState,
  getAllowedTransitions,
  getPhaseIndex,
  isActiveState,
  isTerminalState,
} from '../src/orchestrator/state-machine.js';
import { InvalidTransitionError } from '../src/orchestrator/errors.js';
import { WORKFLOW_STATES, WorkflowState } from '../src/types/index.js';

describe('workflow state machine', () => {
  it('should allow the linear happy path', () => {
    const path = [
      WorkflowState.INITIALIZED,
      WorkflowState.RESEARCHING,
      WorkflowState.RESEARCH_COMPLETE,
      WorkflowState.WRITING,
      WorkflowState.WRITING_COMPLETE,
      WorkflowState.SAVING,
      WorkflowState.COMPLETE,
    ];

    for (let i = 0; i < path.length - 1; i++) {
      const from = path[i];
      const to = path[i + 1];
      if (from === undefined || to === undefined) throw new Error('path index out of range');
      expect(canTransition(from, to)).toBe(true);
    }
  });

  it('should not allow skipping a phase', () => {
    expect(canTransition(WorkflowState.INITIALIZED, WorkflowState.WRITING)).toBe(false);
    expect(canTransition(WorkflowState.RESEARCH_COMPLETE, WorkflowState.SAVING)).toBe(false);
  });

  it('should allow every active state to fail', () => {
    for (const state of WORKFLOW_STATES.filter(isActiveState)) {
      expect(canTransition(state, WorkflowState.FAILED)).toBe(true);
    }
  });

  it('should only roll back from FAILED', () => {
    expect(getAllowedTransitions(WorkflowState.FAILED)).toEqual([WorkflowState.ROLLED_BACK]);
    expect(canTransition(WorkflowState.SAVING, WorkflowState.ROLLED_BACK)).toBe(false);
  });

  it('should treat COMPLETE and ROLLED_BACK as terminal', () => {
    expect(isTerminalState(WorkflowState.COMPLETE)).toBe(true);
    expect(isTerminalState(WorkflowState.ROLLED_BACK)).toBe(true);
    expect(isTerminalState(WorkflowState.FAILED)).toBe(false);
    expect(getAllowedTransitions(WorkflowState.COMPLETE)).toEqual([]);
    expect(isActiveState(WorkflowState.FAILED)).toBe(false);
  });

  it('should throw InvalidTransitionError for a disallowed transition', () => {
    expect(() => assertTransition('s1', WorkflowState.INITIALIZED, WorkflowState.WRITING)).toThrow(
      InvalidTransitionError
    );
    expect(() => assertTransition('s1', WorkflowState.INITIALIZED, WorkflowState.WRITING)).toThrow(
      'Invalid transition: initialized -> writing'
    );
  });

  it('should order states along the happy path', () => {
    expect(getPhaseIndex(WorkflowState.INITIALIZED)).toBe(0);
    expect(getPhaseIndex(WorkflowState.COMPLETE)).toBe(6);
    expect(getPhaseIndex(WorkflowState.FAILED)).toBe(-1);
  });

  it('should describe every state', () => {
    expect(describeState(WorkflowState.WRITING)).toBe('Writing article');
    expect(describeState(WorkflowState.ROLLED_BACK)).toBe('Rolled back');
  });
});
