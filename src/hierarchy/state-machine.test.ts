/**
 * Tests for the recovery state machine
 */

import { describe, it, expect } from 'vitest';
import {
  canCombineOuter,
  canQualifyGroups,
  createRecoveryState,
  failRecovery,
  isTerminal,
  isValidTransition,
  transitionPhase,
} from './state-machine.js';
import { RecoveryPhase, type PhaseTransition } from './types.js';
import { SskrError } from '../errors.js';

describe('Recovery state machine', () => {
  it('should start in COLLECTING', () => {
    const state = createRecoveryState();

    expect(state.phase).toBe(RecoveryPhase.COLLECTING);
    expect(state.transitions).toEqual([]);
  });

  it('should allow only forward transitions and failure', () => {
    expect(isValidTransition(RecoveryPhase.COLLECTING, RecoveryPhase.GROUPS_QUALIFYING)).toBe(true);
    expect(isValidTransition(RecoveryPhase.GROUPS_QUALIFYING, RecoveryPhase.OUTER_READY)).toBe(true);
    expect(isValidTransition(RecoveryPhase.OUTER_READY, RecoveryPhase.VERIFIED)).toBe(true);
    expect(isValidTransition(RecoveryPhase.OUTER_READY, RecoveryPhase.FAILED)).toBe(true);
    expect(isValidTransition(RecoveryPhase.COLLECTING, RecoveryPhase.VERIFIED)).toBe(false);
    expect(isValidTransition(RecoveryPhase.OUTER_READY, RecoveryPhase.COLLECTING)).toBe(false);
    expect(isValidTransition(RecoveryPhase.VERIFIED, RecoveryPhase.FAILED)).toBe(false);
  });

  it('should treat VERIFIED and FAILED as terminal', () => {
    expect(isTerminal(RecoveryPhase.VERIFIED)).toBe(true);
    expect(isTerminal(RecoveryPhase.FAILED)).toBe(true);
    expect(isTerminal(RecoveryPhase.COLLECTING)).toBe(false);
  });

  it('should walk the full path when the guards hold', () => {
    const seen: PhaseTransition[] = [];
    const state = createRecoveryState({ onTransition: transition => seen.push(transition) });
    state.groupThreshold = 2;
    state.qualifyingGroups = [0, 2];

    transitionPhase(state, RecoveryPhase.GROUPS_QUALIFYING);
    state.recoveredGroups = 2;
    transitionPhase(state, RecoveryPhase.OUTER_READY);
    transitionPhase(state, RecoveryPhase.VERIFIED);

    expect(state.phase).toBe(RecoveryPhase.VERIFIED);
    expect(seen.map(transition => transition.to)).toEqual([
      RecoveryPhase.GROUPS_QUALIFYING,
      RecoveryPhase.OUTER_READY,
      RecoveryPhase.VERIFIED,
    ]);
    expect(seen[0].data).toEqual({ qualifyingGroups: 2, recoveredGroups: 0 });
    expect(state.transitions).toHaveLength(3);
  });

  it('should block qualification until enough groups qualify', () => {
    const state = createRecoveryState();
    state.groupThreshold = 2;
    state.qualifyingGroups = [1];

    expect(canQualifyGroups(state)).toBe(false);
    expect(() => transitionPhase(state, RecoveryPhase.GROUPS_QUALIFYING)).toThrow(
      'Cannot transition to GROUPS_QUALIFYING: guard conditions not met'
    );
    expect(state.phase).toBe(RecoveryPhase.COLLECTING);
  });

  it('should block the outer level until enough group secrets exist', () => {
    const state = createRecoveryState();
    state.groupThreshold = 1;
    state.qualifyingGroups = [0];
    transitionPhase(state, RecoveryPhase.GROUPS_QUALIFYING);

    expect(canCombineOuter(state)).toBe(false);
    expect(() => transitionPhase(state, RecoveryPhase.OUTER_READY)).toThrow();
  });

  it('should raise typed errors for refused transitions', () => {
    const skipping = createRecoveryState();
    let invalid: unknown;
    try {
      transitionPhase(skipping, RecoveryPhase.OUTER_READY);
    } catch (err) {
      invalid = err;
    }

    expect(invalid).toBeInstanceOf(SskrError);
    if (invalid instanceof SskrError) {
      expect(invalid.code).toBe('INVALID_TRANSITION');
      expect(invalid.details).toEqual({ from: 'COLLECTING', to: 'OUTER_READY' });
    }

    const waiting = createRecoveryState();
    waiting.groupThreshold = 2;
    waiting.qualifyingGroups = [0];
    let guarded: unknown;
    try {
      transitionPhase(waiting, RecoveryPhase.GROUPS_QUALIFYING);
    } catch (err) {
      guarded = err;
    }

    expect(guarded).toBeInstanceOf(SskrError);
    if (guarded instanceof SskrError) {
      expect(guarded.code).toBe('GUARD_FAILED');
      expect(guarded.details).toEqual({
        from: 'COLLECTING',
        to: 'GROUPS_QUALIFYING',
        qualifyingGroups: 1,
        recoveredGroups: 0,
      });
    }
  });

  it('should reject skipping phases', () => {
    const state = createRecoveryState();

    expect(() => transitionPhase(state, RecoveryPhase.VERIFIED)).toThrow(
      'Invalid recovery transition: COLLECTING → VERIFIED'
    );
  });

  it('should record the failure code', () => {
    const state = createRecoveryState();
    failRecovery(state, new SskrError('mixed', 'MIXED_SHARE_SETS'));

    expect(state.phase).toBe(RecoveryPhase.FAILED);
    expect(state.failure).toBe('MIXED_SHARE_SETS');
    expect(state.transitions[0].data).toEqual({ failure: 'MIXED_SHARE_SETS' });
  });

  it('should mark foreign errors as unexpected', () => {
    const state = createRecoveryState();
    failRecovery(state, new Error('boom'));

    expect(state.failure).toBeUndefined();
    expect(state.transitions[0].data).toEqual({ failure: 'UNEXPECTED' });
  });

  it('should leave a terminal state untouched', () => {
    const state = createRecoveryState();
    failRecovery(state, new SskrError('short', 'INSUFFICIENT_SHARES'));
    failRecovery(state, new SskrError('bad', 'CHECKSUM_MISMATCH'));

    expect(state.failure).toBe('INSUFFICIENT_SHARES');
    expect(state.transitions).toHaveLength(1);
  });
});
