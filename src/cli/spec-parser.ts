/**
 * Group spec mini-language
 *
 * "2of3,4of9,3of5" describes three groups: 2 of 3, 4 of 9 and 3 of 5.
 */

import { invalidParameters } from '../errors.js';
import { createSplitSpec } from '../hierarchy/spec.js';
import type { SplitSpec } from '../hierarchy/types.js';

const SPEC_PATTERN = /^(\d+of\d+,)*\d+of\d+$/;
const GROUP_PATTERN = /^(\d+)of(\d+)$/;

/**
 * Parse a group spec string and combine it with a group threshold.
 *
 * A 1ofN group with N > 1 is refused: every member would hold the group
 * secret verbatim.
 *
 * @throws {SskrError} INVALID_PARAMETERS
 */
export function parseGroupSpec(spec: string, groupThreshold: number): SplitSpec {
  const trimmed = spec.trim();
  if (!SPEC_PATTERN.test(trimmed)) {
    throw invalidParameters(`Invalid group spec "${spec}"`);
  }

  const groups = trimmed.split(',').map((part): [number, number] => {
    const match = GROUP_PATTERN.exec(part);
    if (!match) {
      throw invalidParameters(`Invalid group "${part}" in spec`);
    }

    const m = Number.parseInt(match[1], 10);
    const n = Number.parseInt(match[2], 10);

    if (m > n) {
      throw invalidParameters(`Invalid group "${part}" in spec (${m} is greater than ${n})`, { group: part });
    }
    if (m === 1 && n > 1) {
      throw invalidParameters(`Invalid group "${part}" in spec: 1 of N groups (where N > 1) not supported`, {
        group: part,
      });
    }

    return [m, n];
  });

  return createSplitSpec(groupThreshold, groups);
}

/**
 * Parse a group threshold argument
 *
 * @throws {SskrError} INVALID_PARAMETERS
 */
export function parseGroupThreshold(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw invalidParameters(`Invalid group threshold "${value}"`);
  }
  return Number.parseInt(value, 10);
}
