/**
 * Recovery State Machine
 *
 * Tracks a single recombination through its phases:
 * COLLECTING → GROUPS_QUALIFYING → OUTER_READY → VERIFIED
 * with FAILED reachable from every non-terminal phase.
 */

import { SskrError } from '../errors.js';
import {
  RecoveryPhase,
  type PhaseTransition,
  type RecoveryState,
  type RecoveryStateOptions,
} from './types.js';

/**
 * Valid phase transitions
 */
const VALID_TRANSITIONS: Record<RecoveryPhase, RecoveryPhase[]> = {
  [RecoveryPhase.COLLECTING]: [RecoveryPhase.GROUPS_QUALIFYING, RecoveryPhase.FAILED],
  [RecoveryPhase.GROUPS_QUALIFYING]: [RecoveryPhase.OUTER_READY, RecoveryPhase.FAILED],
  [RecoveryPhase.OUTER_READY]: [RecoveryPhase.VERIFIED, RecoveryPhase.FAILED],
  [RecoveryPhase.VERIFIED]: [], // Terminal state
  [RecoveryPhase.FAILED]: [], // Terminal state
};

const observers = new WeakMap<RecoveryState, RecoveryStateOptions['onTransition']>();

/**
 * Create a fresh state in COLLECTING
 */
export function createRecoveryState(options: RecoveryStateOptions = {}): RecoveryState {
  const state: RecoveryState = {
    phase: RecoveryPhase.COLLECTING,
    qualifyingGroups: [],
    recoveredGroups: 0,
    transitions: [],
  };
  if (options.onTransition) {
    observers.set(state, options.onTransition);
  }
  return state;
}

/**
 * Check if a phase transition is valid
 */
export function isValidTransition(from: RecoveryPhase, to: RecoveryPhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Check if a phase is terminal
 */
export function isTerminal(phase: RecoveryPhase): boolean {
  return VALID_TRANSITIONS[phase].length === 0;
}

/**
 * Guard: enough groups have enough members
 */
export function canQualifyGroups(state: RecoveryState): boolean {
  return (
    state.phase === RecoveryPhase.COLLECTING &&
    state.groupThreshold !== undefined &&
    state.qualifyingGroups.length >= state.groupThreshold
  );
}

/**
 * Guard: a group secret exists for every group the outer level needs
 */
export function canCombineOuter(state: RecoveryState): boolean {
  return (
    state.phase === RecoveryPhase.GROUPS_QUALIFYING &&
    state.groupThreshold !== undefined &&
    state.recoveredGroups >= state.groupThreshold
  );
}

/**
 * Guard: the outer level is ready to be verified
 */
export function canVerify(state: RecoveryState): boolean {
  return state.phase === RecoveryPhase.OUTER_READY;
}

/**
 * Get the guard function for a transition
 */
function getTransitionGuard(to: RecoveryPhase): ((state: RecoveryState) => boolean) | null {
  switch (to) {
    case RecoveryPhase.GROUPS_QUALIFYING:
      return canQualifyGroups;
    case RecoveryPhase.OUTER_READY:
      return canCombineOuter;
    case RecoveryPhase.VERIFIED:
      return canVerify;
    default:
      return null;
  }
}

function record(state: RecoveryState, from: RecoveryPhase, data: Record<string, unknown>): void {
  const transition: PhaseTransition = { from, to: state.phase, timestamp: new Date(), data };
  state.transitions.push(transition);
  observers.get(state)?.(transition);
}

/**
 * Move a recovery to a new phase
 *
 * @throws {SskrError} INVALID_TRANSITION or GUARD_FAILED
 */
export function transitionPhase(
  state: RecoveryState,
  newPhase: RecoveryPhase,
  data: Record<string, unknown> = {}
): void {
  const currentPhase = state.phase;

  if (!isValidTransition(currentPhase, newPhase)) {
    throw new SskrError(
      `Invalid recovery transition: ${currentPhase} → ${newPhase}`,
      'INVALID_TRANSITION',
      { from: currentPhase, to: newPhase }
    );
  }

  const guard = getTransitionGuard(newPhase);
  if (guard && !guard(state)) {
    throw new SskrError(
      `Cannot transition to ${newPhase}: guard conditions not met`,
      'GUARD_FAILED',
      {
        from: currentPhase,
        to: newPhase,
        qualifyingGroups: state.qualifyingGroups.length,
        recoveredGroups: state.recoveredGroups,
      }
    );
  }

  state.phase = newPhase;
  record(state, currentPhase, {
    qualifyingGroups: state.qualifyingGroups.length,
    recoveredGroups: state.recoveredGroups,
    ...data,
  });
}

/**
 * Move a recovery to FAILED. A terminal state is left untouched.
 */
export function failRecovery(state: RecoveryState, error: unknown): void {
  if (isTerminal(state.phase)) {
    return;
  }

  const currentPhase = state.phase;
  state.phase = RecoveryPhase.FAILED;
  if (error instanceof SskrError) {
    state.failure = error.code;
  }
  record(state, currentPhase, { failure: state.failure ?? 'UNEXPECTED' });
}
