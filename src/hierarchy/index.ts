/**
 * Two-level share hierarchy
 *
 * A secret is first split across groups (outer level, group threshold),
 * then each group secret is split across that group's members (inner level,
 * member threshold). Recovery runs the same two levels in reverse and is
 * tracked by the recovery state machine.
 */

import type { Logger } from 'pino';
import { decodeShare, encodeShare } from '../codec/index.js';
import type { SskrShare } from '../codec/types.js';
import { SskrError, invalidParameters } from '../errors.js';
import { drawRandom, secureRandom } from '../random/index.js';
import { combine, split as shamirSplit } from '../shamir/index.js';
import type { ShareWithIndex } from '../shamir/types.js';
import { bytesEqual, isValidSecretLength, wipe } from '../utils/bytes.js';
import { validateSplitSpec } from './spec.js';
import { createRecoveryState, failRecovery, transitionPhase } from './state-machine.js';
import {
  RecoveryPhase,
  type CombineOptions,
  type GenerateOptions,
  type PhaseTransition,
  type RecombineOptions,
  type SplitSpec,
} from './types.js';

interface CollectedGroup {
  memberThreshold: number;
  members: Map<number, Uint8Array>;
}

/**
 * Split a secret into shares, grouped by group index.
 *
 * @param secret - 16..32 bytes, even length
 * @param spec - Group threshold and per-group member policies
 * @returns One array of member shares per group, in group order
 * @throws {SskrError} INVALID_PARAMETERS or RANDOMNESS_UNAVAILABLE
 */
export function generateShares(
  secret: Uint8Array,
  spec: SplitSpec,
  options: GenerateOptions = {}
): SskrShare[][] {
  const { groupThreshold, groups } = validateSplitSpec(spec);
  if (!isValidSecretLength(secret.length)) {
    throw invalidParameters('Secret length must be an even number of bytes between 16 and 32', {
      secretLength: secret.length,
    });
  }

  const random = options.random ?? secureRandom;
  const idBytes = drawRandom(random, 2);
  const identifier = (idBytes[0] << 8) | idBytes[1];

  const groupSecrets = shamirSplit(secret, groupThreshold, groups.length, random).shares;

  try {
    const result = groups.map((group, groupIndex) => {
      const members = shamirSplit(
        groupSecrets[groupIndex].y,
        group.memberThreshold,
        group.memberCount,
        random
      ).shares;

      return members.map((member): SskrShare => ({
        identifier,
        groupThreshold,
        groupCount: groups.length,
        groupIndex,
        memberThreshold: group.memberThreshold,
        memberIndex: member.x,
        value: member.y,
      }));
    });

    options.logger?.debug(
      { identifier, groupThreshold, groupCount: groups.length },
      'generated share set'
    );

    return result;
  } finally {
    wipe(...groupSecrets.map(share => share.y));
  }
}

/**
 * Split a secret and serialize every share.
 *
 * @returns Encoded shares, group by group, members in index order
 */
export function split(secret: Uint8Array, spec: SplitSpec, options: GenerateOptions = {}): Uint8Array[] {
  return generateShares(secret, spec, options).flat().map(encodeShare);
}

function logTransitions(logger: Logger | undefined): ((transition: PhaseTransition) => void) | undefined {
  if (!logger) {
    return undefined;
  }
  return ({ from, to, data }) => {
    logger.debug({ from, to, ...data }, 'recovery phase changed');
  };
}

/**
 * Check that every share belongs to one split and agrees on the outer level.
 */
function checkShareSet(shares: SskrShare[]): void {
  const identifiers = new Set(shares.map(share => share.identifier));
  if (identifiers.size > 1) {
    throw new SskrError('Shares come from more than one split', 'MIXED_SHARE_SETS', {
      identifiers: identifiers.size,
    });
  }

  const first = shares[0];
  for (const share of shares) {
    if (share.groupThreshold !== first.groupThreshold || share.groupCount !== first.groupCount) {
      throw new SskrError('Shares disagree on group threshold or group count', 'INCONSISTENT_PARAMETERS', {
        groupIndex: share.groupIndex,
        memberIndex: share.memberIndex,
      });
    }
    if (share.value.length !== first.value.length) {
      throw new SskrError('Shares have unequal lengths', 'INCONSISTENT_PARAMETERS', {
        groupIndex: share.groupIndex,
        memberIndex: share.memberIndex,
      });
    }
  }
}

/**
 * Partition shares by group and drop exact duplicates.
 */
function collectGroups(shares: SskrShare[]): Map<number, CollectedGroup> {
  const groups = new Map<number, CollectedGroup>();

  for (const share of shares) {
    let group = groups.get(share.groupIndex);
    if (group === undefined) {
      group = { memberThreshold: share.memberThreshold, members: new Map() };
      groups.set(share.groupIndex, group);
    } else if (group.memberThreshold !== share.memberThreshold) {
      throw new SskrError(
        `Shares in group ${share.groupIndex + 1} disagree on member threshold`,
        'INCONSISTENT_PARAMETERS',
        { groupIndex: share.groupIndex }
      );
    }

    const existing = group.members.get(share.memberIndex);
    if (existing === undefined) {
      group.members.set(share.memberIndex, share.value);
    } else if (!bytesEqual(existing, share.value)) {
      throw new SskrError(
        `Conflicting values for member ${share.memberIndex + 1} of group ${share.groupIndex + 1}`,
        'DUPLICATE_SHARE',
        { groupIndex: share.groupIndex, memberIndex: share.memberIndex }
      );
    }
  }

  return groups;
}

/**
 * Recover the secret from decoded shares.
 *
 * Any subset works as long as at least groupThreshold groups each have at
 * least their memberThreshold members. When more groups qualify than needed,
 * the lowest group indexes are used.
 *
 * Only levels with a threshold above 1 carry a digest. A split made of 1-of-1
 * groups with group threshold 1 has nothing to verify, so a corrupted share
 * there yields a wrong secret rather than CHECKSUM_MISMATCH.
 *
 * @throws {SskrError} INSUFFICIENT_SHARES, MIXED_SHARE_SETS, DUPLICATE_SHARE,
 *   INCONSISTENT_PARAMETERS or CHECKSUM_MISMATCH
 */
export function combineShares(shares: SskrShare[], options: CombineOptions = {}): Uint8Array {
  const state = createRecoveryState({ onTransition: logTransitions(options.logger) });
  const groupSecrets: ShareWithIndex[] = [];

  try {
    if (shares.length === 0) {
      throw new SskrError('No shares supplied', 'INSUFFICIENT_SHARES', { supplied: 0 });
    }

    checkShareSet(shares);
    const { groupThreshold } = shares[0];
    state.groupThreshold = groupThreshold;

    const groups = collectGroups(shares);
    const qualifying = [...groups.entries()]
      .filter(([, group]) => group.members.size >= group.memberThreshold)
      .sort(([a], [b]) => a - b);
    state.qualifyingGroups = qualifying.map(([groupIndex]) => groupIndex);

    if (state.qualifyingGroups.length < groupThreshold) {
      throw new SskrError(
        `Not enough groups: need at least ${groupThreshold} but only ${state.qualifyingGroups.length} are satisfied`,
        'INSUFFICIENT_SHARES',
        {
          groupThreshold,
          satisfiedGroups: state.qualifyingGroups.map(groupIndex => groupIndex + 1),
        }
      );
    }
    transitionPhase(state, RecoveryPhase.GROUPS_QUALIFYING);

    for (const [groupIndex, group] of qualifying.slice(0, groupThreshold)) {
      const members = [...group.members.entries()].map(([x, y]) => ({ x, y }));
      groupSecrets.push({ x: groupIndex, y: combine(members, group.memberThreshold) });
      state.recoveredGroups++;
    }
    transitionPhase(state, RecoveryPhase.OUTER_READY);

    const secret = combine(groupSecrets, groupThreshold);
    transitionPhase(state, RecoveryPhase.VERIFIED);

    return secret;
  } catch (err) {
    failRecovery(state, err);
    throw err;
  } finally {
    wipe(...groupSecrets.map(share => share.y));
  }
}

/**
 * Decode serialized shares and recover the secret.
 *
 * @throws {SskrError} TRUNCATED_SHARE or MALFORMED_SHARE from decoding, or
 *   any error from combineShares
 */
export function recombine(shares: Uint8Array[], options: RecombineOptions = {}): Uint8Array {
  const decoded = shares.map(bytes => decodeShare(bytes, { strict: options.strict }));
  return combineShares(decoded, { logger: options.logger });
}
