/**
 * Unit tests for discovery/batchDescribe.ts
 */

import { describe, it, expect } from 'vitest';
import {
  describeInBatches,
  toBatches,
  DESCRIBE_BATCH_SIZE,
  DESCRIBE_PAGE_SIZE,
} from '@functions/handler/discovery/batchDescribe';
import { BatchDescribeError, DiscoveryCancelledError } from '@functions/handler/discovery/errors';
import { FakeAutoScalingPager } from '../../../../helpers/fakeAutoScalingPager';
import { groupNames, makeGroup } from '../../../../helpers/fixtures';

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe('toBatches', () => {
  it('should split into consecutive chunks of at most the given size', () => {
    const batches = toBatches(groupNames(120), 50);

    expect(batches.map((b) => b.length)).toEqual([50, 50, 20]);
    expect(batches[1][0]).toBe('asg-51');
    expect(batches[2][19]).toBe('asg-120');
  });

  it('should return no batches for no items', () => {
    expect(toBatches([], 50)).toEqual([]);
  });
});

describe('describeInBatches', () => {
  it('should use the describe API limits', () => {
    expect(DESCRIBE_BATCH_SIZE).toBe(50);
    expect(DESCRIBE_PAGE_SIZE).toBe(50);
  });

  it('should not call the API for an empty candidate list', async () => {
    const pager = new FakeAutoScalingPager();

    await expect(describeInBatches(pager, [])).resolves.toEqual([]);
    expect(pager.describeCalls).toHaveLength(0);
  });

  it.each([
    [1, 1],
    [50, 1],
    [51, 2],
    [100, 2],
    [120, 3],
  ])('should issue ceil(%i/50) describe calls', async (count, expectedCalls) => {
    const names = groupNames(count);
    const pager = new FakeAutoScalingPager([], names.map((name) => makeGroup(name)));

    const records = await describeInBatches(pager, names);

    expect(pager.describeCalls).toHaveLength(expectedCalls);
    expect(pager.describeCalls.every((call) => call.names.length <= 50)).toBe(true);
    expect(pager.describeCalls.every((call) => call.pageSize === 50)).toBe(true);
    expect(pager.describeCalls.flatMap((call) => call.names)).toEqual(names);
    expect(records.map((r) => r.AutoScalingGroupName)).toEqual(names);
  });

  it.each([NaN, 0, -3, 0.5, Infinity])(
    'should describe every batch with a concurrency of %s',
    async (concurrency) => {
      const names = groupNames(120);
      const pager = new FakeAutoScalingPager([], names.map((name) => makeGroup(name)));

      const records = await describeInBatches(pager, names, { concurrency });

      expect(pager.describeCalls.map((call) => call.names.length)).toEqual([50, 50, 20]);
      expect(records.map((r) => r.AutoScalingGroupName)).toEqual(names);
    }
  );

  it('should return only the groups the API knows about', async () => {
    const pager = new FakeAutoScalingPager([], [makeGroup('asg-1'), makeGroup('asg-3')]);

    const records = await describeInBatches(pager, ['asg-1', 'asg-2', 'asg-3']);

    expect(records.map((r) => r.AutoScalingGroupName)).toEqual(['asg-1', 'asg-3']);
  });

  it('should abort at the first failing batch without trying later ones', async () => {
    const names = groupNames(150);
    const pager = new FakeAutoScalingPager([], names.map((name) => makeGroup(name)));
    const cause = new Error('AccessDenied');
    pager.describeError = { call: 1, error: cause };

    const result = describeInBatches(pager, names);

    await expect(result).rejects.toBeInstanceOf(BatchDescribeError);
    await expect(result).rejects.toMatchObject({
      stage: 'batch describe',
      batchIndex: 1,
      message: 'Error describing autoscaling groups (batch 1): AccessDenied',
      cause,
    });
    expect(pager.describeCalls).toHaveLength(2);
  });

  it('should keep batch order when batches run concurrently', async () => {
    const names = groupNames(150);
    const pager = new FakeAutoScalingPager([], names.map((name) => makeGroup(name)));
    const completed: number[] = [];
    pager.beforeDescribePage = async (call) => {
      await delay(call === 0 ? 30 : 0);
      completed.push(call);
    };

    const records = await describeInBatches(pager, names, { concurrency: 3 });

    expect(completed[completed.length - 1]).toBe(0);
    expect(records.map((r) => r.AutoScalingGroupName)).toEqual(names);
  });

  it('should cancel sibling batches after the first concurrent failure', async () => {
    const names = groupNames(150);
    const pager = new FakeAutoScalingPager([], names.map((name) => makeGroup(name)));
    pager.beforeDescribePage = (call) => delay(call === 0 ? 20 : 0);
    pager.describeError = { call: 1, error: new Error('Throttling') };

    await expect(describeInBatches(pager, names, { concurrency: 2 })).rejects.toMatchObject({
      batchIndex: 1,
    });

    await delay(40);
    expect(pager.describeCalls).toHaveLength(2);
    expect(pager.describeCalls[0].pages).toBe(0);
  });

  it('should report cancellation when the signal fires between batches', async () => {
    const names = groupNames(120);
    const pager = new FakeAutoScalingPager([], names.map((name) => makeGroup(name)));
    const controller = new AbortController();
    pager.beforeDescribePage = async (call) => {
      if (call === 1) {
        controller.abort();
      }
    };

    const result = describeInBatches(pager, names, { signal: controller.signal });

    await expect(result).rejects.toBeInstanceOf(DiscoveryCancelledError);
    await expect(result).rejects.toMatchObject({ stage: 'batch describe' });
    expect(pager.describeCalls).toHaveLength(2);
  });

  it('should not call the API with an already aborted signal', async () => {
    const pager = new FakeAutoScalingPager([], [makeGroup('asg-1')]);
    const controller = new AbortController();
    controller.abort();

    await expect(
      describeInBatches(pager, ['asg-1'], { signal: controller.signal })
    ).rejects.toBeInstanceOf(DiscoveryCancelledError);
    expect(pager.describeCalls).toHaveLength(0);
  });
});
