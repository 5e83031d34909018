/**
 * Command runner for ASG Spot Advisor.
 *
 * Every command starts from tag-based discovery and hands the matched groups to the
 * update engine or the event publisher. A failure on one group does not stop the
 * others; the last such failure is reported once every group was tried.
 */

import type { UpdateAutoScalingGroupCommandInput } from '@aws-sdk/client-auto-scaling';
import type {
  AsgLister,
  CallerIdentity,
  CommandName,
  CommandResult,
  Config,
  IdentityResult,
  ListResult,
  RecommendResult,
  TagFilter,
  UpdateResult,
} from '@shared/types';
import {
  createAutoScalingClient,
  createEventBridgeClient,
  createStsClient,
} from '@shared/utils/awsClients';
import { setupLogger } from '@shared/utils/logger';
import { AsgDiscovery } from '../discovery/asgDiscovery';
import { getCallerIdentity } from '../identity/callerIdentity';
import { AsgEventPublisher, type EventPublisher } from '../publisher/eventPublisher';
import { SpotAsgUpdater, type AsgUpdater } from '../updater/asgUpdater';
import { eventBusRole, scanRole, spotUpdateSettings } from './config';

const logger = setupLogger('asg-spot-advisor:commands');

const COMMANDS: Record<CommandName, true> = {
  list: true,
  update: true,
  recommend: true,
  'get-caller-identity': true,
};

export const COMMAND_NAMES = Object.keys(COMMANDS);

export function isCommandName(value: string): value is CommandName {
  return Object.hasOwn(COMMANDS, value);
}

export const GROUP_DETAIL_TYPE = 'Auto Scaling Group';
export const RECOMMENDATION_DETAIL_TYPE = 'Auto Scaling Group Recommendation';

export interface CommandDependencies {
  lister: AsgLister;
  updater: AsgUpdater;
  identity: (signal?: AbortSignal) => Promise<CallerIdentity>;

  /**
   * When set, list/recommend publish their results instead of only returning them.
   */
  publisher?: EventPublisher;

  /**
   * Describe batches fetched at the same time during discovery.
   */
  concurrency?: number;
}

export class CommandRunner {
  constructor(private readonly deps: CommandDependencies) {}

  /**
   * Wires the runner to real AWS clients.
   */
  static fromConfig(config: Config): CommandRunner {
    const role = scanRole(config);
    const autoScaling = createAutoScalingClient(role);
    const sts = createStsClient(role);

    return new CommandRunner({
      lister: AsgDiscovery.fromClient(autoScaling),
      updater: new SpotAsgUpdater(autoScaling, spotUpdateSettings(config)),
      identity: (signal) => getCallerIdentity(sts, signal),
      publisher: config.event_bus
        ? new AsgEventPublisher(createEventBridgeClient(eventBusRole(config)), config.event_bus.arn)
        : undefined,
      concurrency: config.discovery.describe_concurrency,
    });
  }

  async run(command: CommandName, tags: TagFilter, signal?: AbortSignal): Promise<CommandResult> {
    switch (command) {
      case 'list':
        return this.list(tags, signal);
      case 'update':
        return this.update(tags, signal);
      case 'recommend':
        return this.recommend(tags, signal);
      case 'get-caller-identity':
        return this.getCallerIdentity(signal);
    }
  }

  async list(tags: TagFilter, signal?: AbortSignal): Promise<ListResult> {
    const groups = await this.discover(tags, signal);

    if (this.deps.publisher) {
      await this.deps.publisher.publish(groups, GROUP_DETAIL_TYPE, signal);
    }

    return {
      command: 'list',
      matched_count: groups.length,
      published: this.deps.publisher !== undefined,
      groups,
    };
  }

  /**
   * Updates matched groups one by one.
   *
   * @throws The last update failure, after every group was tried
   */
  async update(tags: TagFilter, signal?: AbortSignal): Promise<UpdateResult> {
    const groups = await this.discover(tags, signal);
    const updated: string[] = [];
    let lastError: unknown;

    for (const group of groups) {
      const asgArn = group.AutoScalingGroupARN;
      logger.info({ asgArn }, `Update autoscaling group ${String(asgArn)}`);
      try {
        await this.deps.updater.update(group, signal);
        updated.push(group.AutoScalingGroupName ?? String(asgArn));
      } catch (error) {
        if (signal?.aborted) {
          throw error;
        }
        logger.error({ asgArn, error }, `Failed to update autoscaling group ${String(asgArn)}`);
        lastError = error;
      }
    }

    if (lastError !== undefined) {
      throw lastError;
    }

    return { command: 'update', matched_count: groups.length, updated };
  }

  /**
   * Builds an update request per matched group without applying it.
   *
   * Each recommendation is published as soon as it is built; a publication failure
   * stops the command immediately.
   *
   * @throws The last recommendation failure, after every group was tried
   */
  async recommend(tags: TagFilter, signal?: AbortSignal): Promise<RecommendResult> {
    const groups = await this.discover(tags, signal);
    const recommendations: UpdateAutoScalingGroupCommandInput[] = [];
    let lastError: unknown;

    for (const group of groups) {
      const asgArn = group.AutoScalingGroupARN;
      logger.info({ asgArn }, `Get recommendation for autoscaling group ${String(asgArn)}`);

      let input: UpdateAutoScalingGroupCommandInput;
      try {
        input = this.deps.updater.createUpdateInput(group);
      } catch (error) {
        logger.error(
          { asgArn, error },
          `Failed to recommend optimization for autoscaling group ${String(asgArn)}`
        );
        lastError = error;
        continue;
      }

      recommendations.push(input);
      if (this.deps.publisher) {
        await this.deps.publisher.publish([input], RECOMMENDATION_DETAIL_TYPE, signal);
      }
    }

    if (lastError !== undefined) {
      throw lastError;
    }

    return {
      command: 'recommend',
      matched_count: groups.length,
      published: this.deps.publisher !== undefined,
      recommendations,
    };
  }

  async getCallerIdentity(signal?: AbortSignal): Promise<IdentityResult> {
    const identity = await this.deps.identity(signal);
    logger.info(identity, 'Caller identity');
    return { command: 'get-caller-identity', identity };
  }

  private discover(tags: TagFilter, signal?: AbortSignal) {
    return this.deps.lister.discover(tags, { signal, concurrency: this.deps.concurrency });
  }
}
