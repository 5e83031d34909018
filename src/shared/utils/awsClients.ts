/**
 * AWS SDK client construction.
 *
 * Every client is scoped to an optional assumed role and region. Without a role ARN
 * the SDK default credential chain applies.
 */

import { AutoScalingClient } from '@aws-sdk/client-auto-scaling';
import { EventBridgeClient } from '@aws-sdk/client-eventbridge';
import { STSClient, AssumeRoleCommand } from '@aws-sdk/client-sts';
import type { AssumeRoleInRegion } from '@shared/types';
import { setupLogger } from './logger';

const logger = setupLogger('asg-spot-advisor:aws-clients');

const ROLE_SESSION_NAME = 'asg-spot-advisor';

/**
 * Temporary credentials returned by STS AssumeRole.
 */
export interface TemporaryCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
  expiration?: Date;
}

export type CredentialProvider = () => Promise<TemporaryCredentials>;

/**
 * Builds a credential provider that assumes the given role.
 *
 * The SDK calls the provider lazily and again once the returned credentials expire.
 *
 * @param role - Role to assume
 * @param stsClient - Optional STS client for testing
 * @returns Credential provider, or undefined when no role ARN is set
 */
export function createCredentials(
  role: AssumeRoleInRegion,
  stsClient?: STSClient
): CredentialProvider | undefined {
  const roleArn = role.arn;
  if (!roleArn) {
    return undefined;
  }

  const sts = stsClient ?? new STSClient({ region: role.region });

  return async () => {
    logger.debug({ roleArn, hasExternalId: Boolean(role.externalId) }, 'Assuming role');

    const response = await sts.send(
      new AssumeRoleCommand({
        RoleArn: roleArn,
        RoleSessionName: ROLE_SESSION_NAME,
        ExternalId: role.externalId || undefined,
      })
    );

    const credentials = response.Credentials;
    if (!credentials?.AccessKeyId || !credentials.SecretAccessKey) {
      throw new Error(`AssumeRole for ${roleArn} returned no credentials`);
    }

    return {
      accessKeyId: credentials.AccessKeyId,
      secretAccessKey: credentials.SecretAccessKey,
      sessionToken: credentials.SessionToken,
      expiration: credentials.Expiration,
    };
  };
}

export function createAutoScalingClient(role: AssumeRoleInRegion): AutoScalingClient {
  return new AutoScalingClient({
    region: role.region || undefined,
    credentials: createCredentials(role),
  });
}

export function createEventBridgeClient(role: AssumeRoleInRegion): EventBridgeClient {
  return new EventBridgeClient({
    region: role.region || undefined,
    credentials: createCredentials(role),
  });
}

export function createStsClient(role: AssumeRoleInRegion): STSClient {
  return new STSClient({
    region: role.region || undefined,
    credentials: createCredentials(role),
  });
}
