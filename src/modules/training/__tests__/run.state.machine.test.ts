import { describe, it, expect } from 'vitest';
import { InvalidStateTransitionError } from '../../../common/errors.js';
import type { RunState } from '../contracts/training.types.js';
import {
  ALLOWED_TRANSITIONS,
  PIPELINE_ORDER,
  assertTransition,
  canTransition,
  isCancellable,
  isTerminal,
  isValidPath,
} from '../runtime/run.state.machine.js';

describe('run state machine', () => {
  it('allows each pipeline step only to its successor', () => {
    for (let i = 0; i < PIPELINE_ORDER.length - 1; i++) {
      const from = PIPELINE_ORDER[i];
      expect(canTransition(from, PIPELINE_ORDER[i + 1])).toBe(true);
      for (const skipped of PIPELINE_ORDER.slice(i + 2)) {
        expect(canTransition(from, skipped)).toBe(false);
      }
    }
  });

  it('never moves backwards', () => {
    expect(canTransition('TRAINING', 'STAGING')).toBe(false);
    expect(canTransition('PREFLIGHT', 'QUEUED')).toBe(false);
  });

  it('reaches FAILED from every non-terminal state', () => {
    const nonTerminal: RunState[] = ['QUEUED', 'PREFLIGHT', 'STAGING', 'TRAINING', 'EVALUATING', 'PACKAGING'];
    for (const state of nonTerminal) {
      expect(canTransition(state, 'FAILED')).toBe(true);
    }
  });

  it('reaches CANCELLED only before PACKAGING', () => {
    expect(canTransition('EVALUATING', 'CANCELLED')).toBe(true);
    expect(canTransition('PACKAGING', 'CANCELLED')).toBe(false);
    expect(isCancellable('QUEUED')).toBe(true);
    expect(isCancellable('PACKAGING')).toBe(false);
    expect(isCancellable('READY')).toBe(false);
  });

  it('has no exits from terminal states', () => {
    for (const state of ['READY', 'FAILED', 'CANCELLED'] as const) {
      expect(isTerminal(state)).toBe(true);
      expect(ALLOWED_TRANSITIONS[state]).toEqual([]);
    }
  });

  it('throws InvalidStateTransitionError on an illegal edge', () => {
    expect(() => assertTransition('READY', 'CANCELLED')).toThrow(InvalidStateTransitionError);
    expect(() => assertTransition('QUEUED', 'PREFLIGHT')).not.toThrow();
  });

  it('validates whole paths', () => {
    expect(isValidPath([...PIPELINE_ORDER])).toBe(true);
    expect(isValidPath(['QUEUED', 'PREFLIGHT', 'FAILED'])).toBe(true);
    expect(isValidPath(['QUEUED', 'STAGING'])).toBe(false);
    expect(isValidPath(['PREFLIGHT', 'STAGING'])).toBe(false);
    expect(isValidPath([])).toBe(false);
  });
});
