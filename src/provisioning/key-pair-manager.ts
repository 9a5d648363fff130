import {
  EC2Client,
  CreateKeyPairCommand,
  DeleteKeyPairCommand,
  DescribeKeyPairsCommand
} from '@aws-sdk/client-ec2';
import { AwsClientOptions, KeyPairService, ResourceTags } from './types.js';
import { callProvider, probeExists } from './aws-errors.js';
import { tagSpecifications } from './network-manager.js';

export class KeyPairManager implements KeyPairService {
  private client: EC2Client;

  constructor(options: AwsClientOptions) {
    this.client = new EC2Client({ region: options.region, profile: options.profile });
  }

  async keyPairExists(keyName: string): Promise<boolean> {
    return probeExists(`describe key pair ${keyName}`, async () => {
      const result = await this.client.send(new DescribeKeyPairsCommand({ KeyNames: [keyName] }));
      return (result.KeyPairs ?? []).some(keyPair => keyPair.KeyName === keyName);
    });
  }

  async createKeyPair(keyName: string, tags: ResourceTags): Promise<string> {
    return callProvider(`create key pair ${keyName}`, async () => {
      const result = await this.client.send(new CreateKeyPairCommand({
        KeyName: keyName,
        TagSpecifications: tagSpecifications('key-pair', tags)
      }));

      if (!result.KeyMaterial) {
        throw new Error('CreateKeyPair returned no KeyMaterial');
      }
      return result.KeyMaterial;
    });
  }

  async deleteKeyPair(keyName: string): Promise<void> {
    await callProvider(`delete key pair ${keyName}`, () =>
      this.client.send(new DeleteKeyPairCommand({ KeyName: keyName }))
    );
  }
}
