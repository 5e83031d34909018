import { describe, it, expect, beforeEach } from 'vitest';
import { mockClient } from 'aws-sdk-client-mock';
import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { getCallerIdentity } from '@functions/handler/identity/callerIdentity';

const stsMock = mockClient(STSClient);

describe('getCallerIdentity', () => {
  beforeEach(() => {
    stsMock.reset();
  });

  it('should return the caller identity', async () => {
    stsMock.on(GetCallerIdentityCommand).resolves({
      Account: '123456789012',
      Arn: 'arn:aws:sts::123456789012:assumed-role/asg-scanner/asg-spot-advisor',
      UserId: 'AROAEXAMPLE:asg-spot-advisor',
    });

    await expect(getCallerIdentity(new STSClient({}))).resolves.toEqual({
      account: '123456789012',
      arn: 'arn:aws:sts::123456789012:assumed-role/asg-scanner/asg-spot-advisor',
      userId: 'AROAEXAMPLE:asg-spot-advisor',
    });
  });

  it('should reject an incomplete response', async () => {
    stsMock.on(GetCallerIdentityCommand).resolves({ Account: '123456789012' });

    await expect(getCallerIdentity(new STSClient({}))).rejects.toThrow(
      'GetCallerIdentity returned incomplete response'
    );
  });
});
