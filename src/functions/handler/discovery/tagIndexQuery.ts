/**
 * Candidate resolution from the Auto Scaling tag index.
 *
 * The tag index cannot join a key and a value into one predicate across several
 * pairs, so the query is deliberately inexact: it returns every group tagged with
 * any filtered key or any filtered value. matchFilter narrows the result later.
 */

import type { Filter } from '@aws-sdk/client-auto-scaling';
import type { TagFilter } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import type { AutoScalingPager } from './autoScalingPager';
import { DiscoveryCancelledError, TagIndexQueryError } from './errors';

const logger = setupLogger('asg-spot-advisor:tag-index');

/**
 * DescribeTags page size ceiling.
 */
export const TAG_INDEX_PAGE_SIZE = 100;

export const AUTO_SCALING_GROUP_RESOURCE_TYPE = 'auto-scaling-group';

/**
 * Builds one "key" filter and one "value" filter per tag pair.
 *
 * An empty tag filter yields no filters, i.e. an unfiltered query.
 */
export function buildTagIndexFilters(tags: TagFilter): Filter[] {
  const filters: Filter[] = [];
  for (const [key, value] of Object.entries(tags)) {
    filters.push({ Name: 'key', Values: [key] }, { Name: 'value', Values: [value] });
  }
  return filters;
}

/**
 * Collects the names of all Auto Scaling groups whose tags could satisfy the filter.
 *
 * Names keep the order of first appearance in the index; repeated entries for the
 * same group (one per matching tag) are collapsed.
 *
 * @throws {TagIndexQueryError} If any page fails
 * @throws {DiscoveryCancelledError} If the signal fires
 */
export async function queryCandidateNames(
  pager: AutoScalingPager,
  tags: TagFilter,
  signal?: AbortSignal
): Promise<string[]> {
  const names: string[] = [];
  const seen = new Set<string>();

  try {
    await pager.pagedTagQuery(
      buildTagIndexFilters(tags),
      TAG_INDEX_PAGE_SIZE,
      (page) => {
        for (const tag of page) {
          if (tag.ResourceType !== AUTO_SCALING_GROUP_RESOURCE_TYPE) {
            logger.warn(
              { resourceType: tag.ResourceType, resourceId: tag.ResourceId },
              `Unexpected resource type: ${String(tag.ResourceType)}`
            );
            continue;
          }
          if (!tag.ResourceId) {
            logger.warn({ key: tag.Key }, 'Tag index entry without resource id');
            continue;
          }
          if (!seen.has(tag.ResourceId)) {
            seen.add(tag.ResourceId);
            names.push(tag.ResourceId);
          }
        }
        return true;
      },
      { signal }
    );
  } catch (error) {
    if (signal?.aborted) {
      throw new DiscoveryCancelledError('tag-index query', error);
    }
    throw new TagIndexQueryError(error);
  }

  logger.debug({ candidates: names.length }, 'Resolved candidate autoscaling groups');
  return names;
}
