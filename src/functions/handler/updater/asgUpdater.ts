/**
 * Spot update engine.
 *
 * Moves an Auto Scaling group onto a MixedInstancesPolicy whose instances
 * distribution favours Spot capacity.
 */

import {
  AutoScalingClient,
  UpdateAutoScalingGroupCommand,
  type AutoScalingGroup,
  type InstancesDistribution,
  type MixedInstancesPolicy,
  type UpdateAutoScalingGroupCommandInput,
} from '@aws-sdk/client-auto-scaling';
import type { SpotUpdateSettings } from '@shared/types';
import { setupLogger } from '@shared/utils/logger';

const logger = setupLogger('asg-spot-advisor:updater');

/**
 * Raised for groups that cannot be put on a mixed instances policy.
 */
export class UnsupportedGroupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedGroupError';
  }
}

export interface AsgUpdater {
  createUpdateInput(group: AutoScalingGroup): UpdateAutoScalingGroupCommandInput;
  update(group: AutoScalingGroup, signal?: AbortSignal): Promise<void>;
}

export class SpotAsgUpdater implements AsgUpdater {
  constructor(
    private readonly client: AutoScalingClient,
    private readonly settings: SpotUpdateSettings
  ) {}

  /**
   * Builds the update request for a group.
   *
   * Groups that already have a mixed policy keep their launch template and overrides;
   * groups on a plain launch template get it wrapped in a new mixed policy.
   *
   * @throws {UnsupportedGroupError} For unnamed groups and groups using a launch configuration
   */
  createUpdateInput(group: AutoScalingGroup): UpdateAutoScalingGroupCommandInput {
    const name = group.AutoScalingGroupName;
    if (!name) {
      throw new UnsupportedGroupError('Autoscaling group has no name');
    }

    const existing = group.MixedInstancesPolicy;
    let policy: MixedInstancesPolicy;

    if (existing?.LaunchTemplate) {
      policy = {
        ...existing,
        InstancesDistribution: this.distribution(existing.InstancesDistribution),
      };
    } else if (group.LaunchTemplate) {
      policy = {
        LaunchTemplate: {
          LaunchTemplateSpecification: {
            LaunchTemplateId: group.LaunchTemplate.LaunchTemplateId,
            LaunchTemplateName: group.LaunchTemplate.LaunchTemplateName,
            Version: group.LaunchTemplate.Version,
          },
        },
        InstancesDistribution: this.distribution(),
      };
    } else {
      throw new UnsupportedGroupError(
        `Autoscaling group ${name} uses launch configuration ${String(group.LaunchConfigurationName)}; ` +
          'only launch templates can be converted'
      );
    }

    return {
      AutoScalingGroupName: name,
      MixedInstancesPolicy: policy,
    };
  }

  async update(group: AutoScalingGroup, signal?: AbortSignal): Promise<void> {
    const input = this.createUpdateInput(group);

    await this.client.send(new UpdateAutoScalingGroupCommand(input), { abortSignal: signal });

    logger.info(
      {
        asgName: input.AutoScalingGroupName,
        distribution: input.MixedInstancesPolicy?.InstancesDistribution,
      },
      'Updated ASG mixed instances policy'
    );
  }

  private distribution(current?: InstancesDistribution): InstancesDistribution {
    return {
      ...current,
      OnDemandBaseCapacity: this.settings.onDemandBaseCapacity,
      OnDemandPercentageAboveBaseCapacity: this.settings.onDemandPercentageAboveBaseCapacity,
      SpotAllocationStrategy: this.settings.spotAllocationStrategy,
    };
  }
}
