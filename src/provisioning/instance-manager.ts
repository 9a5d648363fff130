import {
  EC2Client,
  DescribeImagesCommand,
  DescribeInstancesCommand,
  RunInstancesCommand,
  TerminateInstancesCommand,
  waitUntilInstanceRunning,
  waitUntilInstanceTerminated,
  _InstanceType,
  type Instance
} from '@aws-sdk/client-ec2';
import {
  AwsClientOptions,
  InstanceDetails,
  InstanceLaunchSpec,
  InstanceService,
  WaitOutcome
} from './types.js';
import { callProvider, isNotFoundError } from './aws-errors.js';
import { tagSpecifications } from './network-manager.js';
import { ConfigurationError, ProviderCallError, describeError } from '../errors/index.js';

const INSTANCE_TYPES: readonly string[] = Object.values(_InstanceType);

export function isInstanceType(value: string): value is _InstanceType {
  return INSTANCE_TYPES.includes(value);
}

export class InstanceManager implements InstanceService {
  private client: EC2Client;

  constructor(options: AwsClientOptions) {
    this.client = new EC2Client({ region: options.region, profile: options.profile });
  }

  async getInstanceState(instanceId: string): Promise<string | undefined> {
    try {
      const instance = await this.findInstance(instanceId);
      return instance?.State?.Name;
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw new ProviderCallError(`describe instance ${instanceId}`, error);
    }
  }

  /**
   * Newest available image whose name matches the filter, e.g. the latest
   * Amazon Linux 2 build for amzn2-ami-hvm-*-x86_64-gp2.
   */
  async findLatestImage(nameFilter: string): Promise<string> {
    return callProvider(`find latest image matching ${nameFilter}`, async () => {
      const result = await this.client.send(new DescribeImagesCommand({
        Owners: ['amazon'],
        Filters: [
          { Name: 'name', Values: [nameFilter] },
          { Name: 'state', Values: ['available'] }
        ]
      }));

      const latest = (result.Images ?? [])
        .filter(image => image.ImageId)
        .sort((a, b) => (b.CreationDate ?? '').localeCompare(a.CreationDate ?? ''))[0];

      if (!latest?.ImageId) {
        throw new Error(`No available image matches ${nameFilter}`);
      }
      return latest.ImageId;
    });
  }

  async runInstance(spec: InstanceLaunchSpec): Promise<string> {
    const instanceType = spec.instanceType;
    if (!isInstanceType(instanceType)) {
      throw new ConfigurationError(`Unknown EC2 instance type: ${instanceType}`);
    }

    return callProvider(`run ${instanceType} instance from ${spec.imageId}`, async () => {
      const result = await this.client.send(new RunInstancesCommand({
        ImageId: spec.imageId,
        InstanceType: instanceType,
        KeyName: spec.keyName,
        SecurityGroupIds: [spec.securityGroupId],
        SubnetId: spec.subnetId,
        UserData: spec.userData,
        MinCount: 1,
        MaxCount: 1,
        TagSpecifications: tagSpecifications('instance', spec.tags)
      }));

      const instanceId = result.Instances?.[0]?.InstanceId;
      if (!instanceId) {
        throw new Error('RunInstances returned no InstanceId');
      }
      return instanceId;
    });
  }

  async waitForRunning(instanceId: string, timeoutSeconds: number): Promise<WaitOutcome> {
    try {
      await waitUntilInstanceRunning(
        { client: this.client, maxWaitTime: timeoutSeconds },
        { InstanceIds: [instanceId] }
      );
      return { reached: true };
    } catch (error) {
      return { reached: false, reason: describeError(error) };
    }
  }

  async describeInstance(instanceId: string): Promise<InstanceDetails> {
    return callProvider(`describe instance ${instanceId}`, async () => {
      const instance = await this.findInstance(instanceId);
      if (!instance) {
        throw new Error(`Instance ${instanceId} not returned by DescribeInstances`);
      }

      return {
        instanceId,
        state: instance.State?.Name,
        publicIp: instance.PublicIpAddress,
        privateIp: instance.PrivateIpAddress,
        availabilityZone: instance.Placement?.AvailabilityZone
      };
    });
  }

  async terminateInstance(instanceId: string): Promise<void> {
    await callProvider(`terminate instance ${instanceId}`, () =>
      this.client.send(new TerminateInstancesCommand({ InstanceIds: [instanceId] }))
    );
  }

  async waitForTerminated(instanceId: string, timeoutSeconds: number): Promise<WaitOutcome> {
    try {
      await waitUntilInstanceTerminated(
        { client: this.client, maxWaitTime: timeoutSeconds },
        { InstanceIds: [instanceId] }
      );
      return { reached: true };
    } catch (error) {
      return { reached: false, reason: describeError(error) };
    }
  }

  private async findInstance(instanceId: string): Promise<Instance | undefined> {
    const result = await this.client.send(new DescribeInstancesCommand({ InstanceIds: [instanceId] }));
    return (result.Reservations ?? [])
      .flatMap(reservation => reservation.Instances ?? [])
      .find(instance => instance.InstanceId === instanceId);
  }
}
