import {
  EC2Client,
  AuthorizeSecurityGroupIngressCommand,
  CreateSecurityGroupCommand,
  DeleteSecurityGroupCommand,
  DescribeSecurityGroupsCommand
} from '@aws-sdk/client-ec2';
import { AwsClientOptions, IngressRule, SecurityGroupInput, SecurityGroupService } from './types.js';
import { callProvider, probeExists } from './aws-errors.js';
import { tagSpecifications } from './network-manager.js';

export class SecurityGroupManager implements SecurityGroupService {
  private client: EC2Client;

  constructor(options: AwsClientOptions) {
    this.client = new EC2Client({ region: options.region, profile: options.profile });
  }

  async securityGroupExists(groupId: string): Promise<boolean> {
    return probeExists(`describe security group ${groupId}`, async () => {
      const result = await this.client.send(new DescribeSecurityGroupsCommand({ GroupIds: [groupId] }));
      return (result.SecurityGroups ?? []).some(group => group.GroupId === groupId);
    });
  }

  async createSecurityGroup(input: SecurityGroupInput): Promise<string> {
    return callProvider(`create security group ${input.name} in ${input.vpcId}`, async () => {
      const result = await this.client.send(new CreateSecurityGroupCommand({
        GroupName: input.name,
        Description: input.description,
        VpcId: input.vpcId,
        TagSpecifications: tagSpecifications('security-group', input.tags)
      }));

      if (!result.GroupId) {
        throw new Error('CreateSecurityGroup returned no GroupId');
      }
      return result.GroupId;
    });
  }

  async authorizeIngress(groupId: string, rule: IngressRule): Promise<void> {
    const protocol = rule.protocol ?? 'tcp';
    await callProvider(`authorize ${protocol}/${rule.port} from ${rule.cidr} on ${groupId}`, () =>
      this.client.send(new AuthorizeSecurityGroupIngressCommand({
        GroupId: groupId,
        IpPermissions: [{
          IpProtocol: protocol,
          FromPort: rule.port,
          ToPort: rule.port,
          IpRanges: [{ CidrIp: rule.cidr, Description: rule.description }]
        }]
      }))
    );
  }

  async deleteSecurityGroup(groupId: string): Promise<void> {
    await callProvider(`delete security group ${groupId}`, () =>
      this.client.send(new DeleteSecurityGroupCommand({ GroupId: groupId }))
    );
  }
}
