/**
 * Caller identity check.
 *
 * Verifies that the configured credentials (and assumed role) are valid by calling
 * STS GetCallerIdentity.
 */

import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import type { CallerIdentity } from '@shared/types';

export async function getCallerIdentity(
  client: STSClient,
  signal?: AbortSignal
): Promise<CallerIdentity> {
  const response = await client.send(new GetCallerIdentityCommand({}), { abortSignal: signal });

  if (!response.Account || !response.Arn || !response.UserId) {
    throw new Error('GetCallerIdentity returned incomplete response');
  }

  return {
    account: response.Account,
    arn: response.Arn,
    userId: response.UserId,
  };
}
