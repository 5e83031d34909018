/**
 * Batched DescribeAutoScalingGroups calls.
 *
 * DescribeAutoScalingGroups accepts at most 50 names per call, so candidates are
 * split into consecutive batches that are each paged to exhaustion.
 */

import type { AutoScalingGroup } from '@aws-sdk/client-auto-scaling';
import { setupLogger } from '@shared/utils/logger';
import type { AutoScalingPager } from './autoScalingPager';
import { BatchDescribeError, DiscoveryCancelledError } from './errors';

const logger = setupLogger('asg-spot-advisor:batch-describe');

/**
 * Maximum number of group names per DescribeAutoScalingGroups call.
 */
export const DESCRIBE_BATCH_SIZE = 50;

/**
 * DescribeAutoScalingGroups page size ceiling.
 */
export const DESCRIBE_PAGE_SIZE = 50;

export interface BatchDescribeOptions {
  signal?: AbortSignal;

  /**
   * Number of batches fetched at the same time (default: 1, sequential).
   */
  concurrency?: number;
}

/**
 * Splits items into consecutive chunks of at most `size` items.
 */
export function toBatches<T>(items: readonly T[], size: number): T[][] {
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    batches.push(items.slice(i, Math.min(i + size, items.length)));
  }
  return batches;
}

/**
 * Number of batches in flight. Anything that is not a number of at least 1
 * (including NaN) runs the batches one at a time.
 */
function poolWidth(concurrency: number | undefined): number {
  if (concurrency === undefined || Number.isNaN(concurrency) || concurrency < 1) {
    return 1;
  }
  return Math.floor(concurrency);
}

/**
 * Describes all named groups, batch by batch.
 *
 * Records come back in batch order and, within a batch, in API order, whatever the
 * concurrency. The first failing batch rejects the whole call and cancels the
 * batches still in flight; nothing gathered so far is returned.
 *
 * @throws {BatchDescribeError} If any page of any batch fails
 * @throws {DiscoveryCancelledError} If the signal fires
 */
export async function describeInBatches(
  pager: AutoScalingPager,
  names: readonly string[],
  options: BatchDescribeOptions = {}
): Promise<AutoScalingGroup[]> {
  if (names.length === 0) {
    return [];
  }

  const { signal } = options;
  const batches = toBatches(names, DESCRIBE_BATCH_SIZE);
  const width = Math.min(poolWidth(options.concurrency), batches.length);
  const results: AutoScalingGroup[][] = new Array<AutoScalingGroup[]>(batches.length);

  // Aborted by the caller's signal, or by the first failing batch to stop its siblings
  const controller = new AbortController();
  const forwardAbort = (): void => controller.abort(signal?.reason);
  if (signal?.aborted) {
    forwardAbort();
  } else {
    signal?.addEventListener('abort', forwardAbort, { once: true });
  }

  let next = 0;
  const worker = async (): Promise<void> => {
    while (next < batches.length && !controller.signal.aborted) {
      const index = next++;
      results[index] = await describeBatch(pager, batches[index], index, controller.signal, signal);
    }
  };

  logger.debug(
    { candidates: names.length, batches: batches.length, concurrency: width },
    'Describing autoscaling groups'
  );

  try {
    await Promise.all(Array.from({ length: width }, () => worker()));
  } catch (error) {
    controller.abort();
    throw error;
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
  }

  // Workers stop picking batches once the caller aborts, leaving gaps in results
  if (signal?.aborted) {
    throw new DiscoveryCancelledError('batch describe', signal.reason);
  }

  return results.flat();
}

async function describeBatch(
  pager: AutoScalingPager,
  batch: string[],
  index: number,
  pagingSignal: AbortSignal,
  callerSignal: AbortSignal | undefined
): Promise<AutoScalingGroup[]> {
  const records: AutoScalingGroup[] = [];

  try {
    await pager.pagedDescribe(
      batch,
      DESCRIBE_PAGE_SIZE,
      (page) => {
        records.push(...page);
        return true;
      },
      { signal: pagingSignal }
    );
  } catch (error) {
    if (callerSignal?.aborted) {
      throw new DiscoveryCancelledError('batch describe', error);
    }
    throw new BatchDescribeError(index, error);
  }

  logger.debug({ batch: index, size: batch.length, records: records.length }, 'Described batch');
  return records;
}
