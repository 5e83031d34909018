/**
 * Test fixtures and mock data factories.
 *
 * Provides reusable test data for unit tests.
 */

import type { Context } from 'aws-lambda';
import type { AutoScalingGroup, TagDescription } from '@aws-sdk/client-auto-scaling';
import type { Config } from '@shared/types';

export const ACCOUNT_ID = '123456789012';

/**
 * Creates a mock AWS Lambda Context.
 *
 * @param overrides - Optional overrides for specific context properties
 * @returns Mock Lambda Context
 */
export function createMockContext(overrides: Partial<Context> = {}): Context {
  const defaultContext: Context = {
    callbackWaitsForEmptyEventLoop: true,
    functionName: 'asg-spot-advisor-test',
    functionVersion: '1',
    invokedFunctionArn: `arn:aws:lambda:us-east-1:${ACCOUNT_ID}:function:asg-spot-advisor-test`,
    memoryLimitInMB: '512',
    awsRequestId: 'test-request-id-123',
    logGroupName: '/aws/lambda/asg-spot-advisor-test',
    logStreamName: '2026/10/19/[$LATEST]abc123',
    getRemainingTimeInMillis: () => 30000,
    done: () => {},
    fail: () => {},
    succeed: () => {},
  };

  return { ...defaultContext, ...overrides };
}

/**
 * Creates a Config with every default filled in.
 */
export function createMockConfig(overrides: Partial<Config> = {}): Config {
  return {
    discovery: {
      tags: { 'spot-advisor:managed': 'true' },
      describe_concurrency: 1,
    },
    update: {
      on_demand_base_capacity: 0,
      on_demand_percentage_above_base_capacity: 0,
      spot_allocation_strategy: 'capacity-optimized',
    },
    ...overrides,
  };
}

export function asgArn(name: string): string {
  return `arn:aws:autoscaling:us-east-1:${ACCOUNT_ID}:autoScalingGroup:00000000-0000-0000-0000-000000000000:autoScalingGroupName/${name}`;
}

/**
 * Creates a described Auto Scaling group with the given tags.
 */
export function makeGroup(
  name: string,
  tags: Record<string, string> = {},
  overrides: Partial<AutoScalingGroup> = {}
): AutoScalingGroup {
  return {
    AutoScalingGroupName: name,
    AutoScalingGroupARN: asgArn(name),
    MinSize: 1,
    MaxSize: 4,
    DesiredCapacity: 2,
    DefaultCooldown: 300,
    AvailabilityZones: ['us-east-1a'],
    HealthCheckType: 'EC2',
    CreatedTime: new Date('2026-01-01T00:00:00Z'),
    LaunchTemplate: { LaunchTemplateId: `lt-${name}`, Version: '$Latest' },
    Tags: Object.entries(tags).map(([key, value]) => ({
      ResourceId: name,
      ResourceType: 'auto-scaling-group',
      Key: key,
      Value: value,
      PropagateAtLaunch: true,
    })),
    ...overrides,
  };
}

/**
 * Creates tag index entries for the given group names.
 */
export function makeTagEntries(
  names: readonly string[],
  key = 'env',
  value = 'prod'
): TagDescription[] {
  return names.map((name) => ({
    ResourceId: name,
    ResourceType: 'auto-scaling-group',
    Key: key,
    Value: value,
    PropagateAtLaunch: true,
  }));
}

export function groupNames(count: number, prefix = 'asg'): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}-${i + 1}`);
}
