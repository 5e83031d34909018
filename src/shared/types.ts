/**
 * Core type definitions for ASG Spot Advisor.
 *
 * Centralizes shared types to avoid circular dependencies.
 */

import type { AutoScalingGroup, UpdateAutoScalingGroupCommandInput } from '@aws-sdk/client-auto-scaling';

/**
 * Tags to filter Auto Scaling groups by.
 *
 * Every key/value pair must match exactly for a group to be selected.
 */
export type TagFilter = Record<string, string>;

/**
 * Valid command names (shared by the CLI and the Lambda entry point).
 */
export type CommandName = 'list' | 'update' | 'recommend' | 'get-caller-identity';

/**
 * IAM role to assume in a given region.
 *
 * All fields are optional: without an ARN the default credential chain is used,
 * without a region the SDK default region is used.
 */
export interface AssumeRoleInRegion {
  arn?: string;
  externalId?: string;
  region?: string;
}

/**
 * Options accepted by a single discovery call.
 */
export interface DiscoverOptions {
  /**
   * Cancels the call. In-flight and subsequent page requests fail promptly.
   */
  signal?: AbortSignal;

  /**
   * Maximum number of describe batches fetched at the same time (default: 1).
   */
  concurrency?: number;
}

/**
 * Finds Auto Scaling groups matching a tag filter.
 */
export interface AsgLister {
  discover(tags: TagFilter, options?: DiscoverOptions): Promise<AutoScalingGroup[]>;
}

/**
 * Identity returned by STS GetCallerIdentity.
 */
export interface CallerIdentity {
  account: string;
  arn: string;
  userId: string;
}

/**
 * Spot distribution settings applied by the update engine.
 */
export interface SpotUpdateSettings {
  onDemandBaseCapacity: number;
  onDemandPercentageAboveBaseCapacity: number;
  spotAllocationStrategy: string;
}

/**
 * Configuration from SSM Parameter Store or CLI flags.
 */
export interface Config {
  role?: {
    arn?: string;
    external_id?: string;
    region?: string;
  };

  /**
   * When present, list/recommend results are also published to this EventBridge bus.
   */
  event_bus?: {
    arn: string;
    role?: {
      arn?: string;
      external_id?: string;
      region?: string;
    };
  };

  discovery: {
    tags: TagFilter;
    describe_concurrency: number;
  };

  update: {
    on_demand_base_capacity: number;
    on_demand_percentage_above_base_capacity: number;
    spot_allocation_strategy: string;
  };
}

/**
 * Result of the "list" command.
 */
export interface ListResult {
  command: 'list';
  matched_count: number;
  published: boolean;
  groups: AutoScalingGroup[];
}

/**
 * Result of the "update" command.
 */
export interface UpdateResult {
  command: 'update';
  matched_count: number;
  updated: string[];
}

/**
 * Result of the "recommend" command.
 */
export interface RecommendResult {
  command: 'recommend';
  matched_count: number;
  published: boolean;
  recommendations: UpdateAutoScalingGroupCommandInput[];
}

/**
 * Result of the "get-caller-identity" command.
 */
export interface IdentityResult {
  command: 'get-caller-identity';
  identity: CallerIdentity;
}

export type CommandResult = ListResult | UpdateResult | RecommendResult | IdentityResult;
