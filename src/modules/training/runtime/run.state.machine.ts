/**
 * RUN STATE MACHINE
 *
 * Fixed order, no skipping. READY, FAILED and CANCELLED are terminal.
 */

import { InvalidStateTransitionError } from '../../../common/errors.js';
import type { RunState } from '../contracts/training.types.js';

export const PIPELINE_ORDER: readonly RunState[] = [
  'QUEUED',
  'PREFLIGHT',
  'STAGING',
  'TRAINING',
  'EVALUATING',
  'PACKAGING',
  'READY',
];

export const TERMINAL_STATES: readonly RunState[] = ['READY', 'FAILED', 'CANCELLED'];

export const CANCELLABLE_STATES: readonly RunState[] = [
  'QUEUED',
  'PREFLIGHT',
  'STAGING',
  'TRAINING',
  'EVALUATING',
];

export const ALLOWED_TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  QUEUED: ['PREFLIGHT', 'FAILED', 'CANCELLED'],
  PREFLIGHT: ['STAGING', 'FAILED', 'CANCELLED'],
  STAGING: ['TRAINING', 'FAILED', 'CANCELLED'],
  TRAINING: ['EVALUATING', 'FAILED', 'CANCELLED'],
  EVALUATING: ['PACKAGING', 'FAILED', 'CANCELLED'],
  PACKAGING: ['READY', 'FAILED'],
  READY: [],
  FAILED: [],
  CANCELLED: [],
};

export function isTerminal(state: RunState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function isCancellable(state: RunState): boolean {
  return CANCELLABLE_STATES.includes(state);
}

export function canTransition(from: RunState, to: RunState): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: RunState, to: RunState): void {
  if (!canTransition(from, to)) {
    throw new InvalidStateTransitionError(from, to);
  }
}

/**
 * True when the sequence starts at QUEUED (entry from nothing) and every
 * step is an allowed edge.
 */
export function isValidPath(states: readonly RunState[]): boolean {
  if (states.length === 0 || states[0] !== 'QUEUED') return false;
  for (let i = 1; i < states.length; i++) {
    if (!canTransition(states[i - 1], states[i])) return false;
  }
  return true;
}
