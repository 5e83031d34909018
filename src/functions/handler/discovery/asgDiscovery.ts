/**
 * Tag-based Auto Scaling group discovery.
 *
 * Resolves candidates from the tag index, describes them in batches, then keeps only
 * the groups that match every tag exactly and are not mid-transition.
 */

import type { AutoScalingClient, AutoScalingGroup } from '@aws-sdk/client-auto-scaling';
import type { AsgLister, DiscoverOptions, TagFilter } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';
import { SdkAutoScalingPager, type AutoScalingPager } from './autoScalingPager';
import { queryCandidateNames } from './tagIndexQuery';
import { describeInBatches } from './batchDescribe';
import { selectGroup } from './matchFilter';

const logger = setupLogger('asg-spot-advisor:discovery');

/**
 * Discovers Auto Scaling groups matching a tag filter.
 */
export class AsgDiscovery implements AsgLister {
  constructor(
    private readonly pager: AutoScalingPager,
    private readonly defaultConcurrency: number = 1
  ) {}

  static fromClient(client: AutoScalingClient, defaultConcurrency?: number): AsgDiscovery {
    return new AsgDiscovery(new SdkAutoScalingPager(client), defaultConcurrency);
  }

  /**
   * Lists groups carrying every tag in `tags` with the exact value and no lifecycle status.
   *
   * Resolves to an empty list when nothing matches. Rejects, without partial
   * results, if the tag index or any describe batch fails or the signal fires.
   *
   * @param tags - Tags to match; an empty filter selects every stable group
   * @param options - Abort signal and describe concurrency
   * @returns Matched groups in fetch order
   */
  async discover(tags: TagFilter, options: DiscoverOptions = {}): Promise<AutoScalingGroup[]> {
    const { signal } = options;
    const concurrency = options.concurrency ?? this.defaultConcurrency;

    logger.info({ tags }, 'Listing autoscaling groups matching tags');

    const candidates = await queryCandidateNames(this.pager, tags, signal);
    if (candidates.length === 0) {
      logger.info({ tags }, 'No candidate autoscaling groups found');
      return [];
    }

    const described = await describeInBatches(this.pager, candidates, { signal, concurrency });
    const groups = described.filter((group) => selectGroup(tags, group));

    logger.info(
      { candidates: candidates.length, described: described.length, matched: groups.length },
      `Discovered ${groups.length} autoscaling groups`
    );
    return groups;
  }
}
