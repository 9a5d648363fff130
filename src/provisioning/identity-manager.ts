import { STSClient, GetCallerIdentityCommand } from '@aws-sdk/client-sts';
import { AwsClientOptions, CallerIdentity, IdentityService } from './types.js';
import { callProvider } from './aws-errors.js';

export class IdentityManager implements IdentityService {
  private client: STSClient;

  constructor(options: AwsClientOptions) {
    this.client = new STSClient({ region: options.region, profile: options.profile });
  }

  async getCallerIdentity(): Promise<CallerIdentity> {
    return callProvider('get caller identity', async () => {
      const result = await this.client.send(new GetCallerIdentityCommand({}));

      if (!result.Account || !result.Arn) {
        throw new Error('GetCallerIdentity returned no account');
      }
      return { account: result.Account, arn: result.Arn, userId: result.UserId };
    });
  }
}
