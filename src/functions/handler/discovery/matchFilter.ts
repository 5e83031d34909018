/**
 * Exact tag matching and lifecycle exclusion for described Auto Scaling groups.
 */

import type { AutoScalingGroup, TagDescription } from '@aws-sdk/client-auto-scaling';
import type { TagFilter } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('asg-spot-advisor:match-filter');

/**
 * Checks that every filter pair is present on the group with the exact value.
 *
 * A missing tag value compares as the empty string. An empty filter matches any group.
 */
export function matchesTags(tags: TagFilter, actual: readonly TagDescription[] = []): boolean {
  return Object.entries(tags).every(([key, value]) =>
    actual.some((tag) => tag.Key === key && (tag.Value ?? '') === value)
  );
}

/**
 * A group with any Status (e.g. "Delete in progress") is mid-transition.
 */
export function isStable(group: AutoScalingGroup): boolean {
  return !group.Status;
}

/**
 * Decides whether a described group belongs in the discovery result.
 *
 * Groups that match the tags but carry a status are skipped with an info log.
 */
export function selectGroup(tags: TagFilter, group: AutoScalingGroup): boolean {
  if (!matchesTags(tags, group.Tags)) {
    return false;
  }

  if (!isStable(group)) {
    logger.info(
      { asgArn: group.AutoScalingGroupARN, status: group.Status },
      `Skipping ASG ${String(group.AutoScalingGroupARN)} (which matches tags): ${String(group.Status)}`
    );
    return false;
  }

  return true;
}
