/**
 * Split specification schemas
 *
 * A split is described by a group threshold and 1..16 groups, each with its
 * own member threshold and member count.
 */

import { z } from 'zod';
import { invalidParameters } from '../errors.js';
import { MAX_SHARE_COUNT } from '../shamir/index.js';

/**
 * Schema for one group's sharing policy
 */
export const GroupSpecSchema = z.object({
  memberThreshold: z.number().int().min(1).max(MAX_SHARE_COUNT),
  memberCount: z.number().int().min(1).max(MAX_SHARE_COUNT),
}).refine(
  (group) => group.memberThreshold <= group.memberCount,
  { message: 'Member threshold cannot exceed member count' }
);

export type GroupSpec = z.infer<typeof GroupSpecSchema>;

/**
 * Schema for a full two-level split
 */
export const SplitSpecSchema = z.object({
  groupThreshold: z.number().int().min(1).max(MAX_SHARE_COUNT),
  groups: z.array(GroupSpecSchema).min(1).max(MAX_SHARE_COUNT),
}).refine(
  (spec) => spec.groupThreshold <= spec.groups.length,
  { message: 'Group threshold cannot exceed number of groups' }
);

export type SplitSpec = z.infer<typeof SplitSpecSchema>;

/**
 * Validate an untrusted split specification.
 *
 * @throws {SskrError} INVALID_PARAMETERS listing every violated constraint
 */
export function validateSplitSpec(input: unknown): SplitSpec {
  const result = SplitSpecSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw invalidParameters(`Invalid split spec: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}

/**
 * Build a validated split spec from (threshold, count) pairs
 *
 * @example
 * ```typescript
 * // two groups: 2-of-3 and 3-of-5, both required
 * const spec = createSplitSpec(2, [[2, 3], [3, 5]]);
 * ```
 */
export function createSplitSpec(
  groupThreshold: number,
  groups: ReadonlyArray<readonly [memberThreshold: number, memberCount: number]>
): SplitSpec {
  return validateSplitSpec({
    groupThreshold,
    groups: groups.map(([memberThreshold, memberCount]) => ({ memberThreshold, memberCount })),
  });
}
