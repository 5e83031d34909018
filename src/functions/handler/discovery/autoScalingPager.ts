/**
 * Paged access to the Auto Scaling tag index and group descriptions.
 *
 * Discovery only needs these two operations, so it depends on this narrow
 * interface instead of the whole Auto Scaling client.
 */

import {
  AutoScalingClient,
  DescribeTagsCommand,
  DescribeAutoScalingGroupsCommand,
  type AutoScalingGroup,
  type Filter,
  type TagDescription,
} from '@aws-sdk/client-auto-scaling';

/**
 * Receives one page of results. Returning false stops paging.
 */
export type PageCallback<T> = (page: T[]) => boolean | void;

export interface PagingOptions {
  signal?: AbortSignal;
}

export interface AutoScalingPager {
  /**
   * Walks the tag index page by page until the last page or until onPage returns false.
   *
   * @throws The first transport/API error encountered
   */
  pagedTagQuery(
    filters: Filter[],
    pageSize: number,
    onPage: PageCallback<TagDescription>,
    options?: PagingOptions
  ): Promise<void>;

  /**
   * Describes the named groups page by page until the last page or until onPage returns false.
   *
   * @throws The first transport/API error encountered
   */
  pagedDescribe(
    names: string[],
    pageSize: number,
    onPage: PageCallback<AutoScalingGroup>,
    options?: PagingOptions
  ): Promise<void>;
}

/**
 * AutoScalingPager backed by the AWS SDK v3 Auto Scaling client.
 */
export class SdkAutoScalingPager implements AutoScalingPager {
  constructor(private readonly client: AutoScalingClient) {}

  async pagedTagQuery(
    filters: Filter[],
    pageSize: number,
    onPage: PageCallback<TagDescription>,
    options: PagingOptions = {}
  ): Promise<void> {
    const { signal } = options;
    let nextToken: string | undefined;

    do {
      signal?.throwIfAborted();

      const response = await this.client.send(
        new DescribeTagsCommand({
          Filters: filters.length > 0 ? filters : undefined,
          MaxRecords: pageSize,
          NextToken: nextToken,
        }),
        { abortSignal: signal }
      );

      if (onPage(response.Tags ?? []) === false) {
        return;
      }

      nextToken = response.NextToken;
    } while (nextToken);
  }

  async pagedDescribe(
    names: string[],
    pageSize: number,
    onPage: PageCallback<AutoScalingGroup>,
    options: PagingOptions = {}
  ): Promise<void> {
    const { signal } = options;
    let nextToken: string | undefined;

    do {
      signal?.throwIfAborted();

      const response = await this.client.send(
        new DescribeAutoScalingGroupsCommand({
          AutoScalingGroupNames: names,
          MaxRecords: pageSize,
          NextToken: nextToken,
        }),
        { abortSignal: signal }
      );

      if (onPage(response.AutoScalingGroups ?? []) === false) {
        return;
      }

      nextToken = response.NextToken;
    } while (nextToken);
  }
}
