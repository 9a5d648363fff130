import {
  EC2Client,
  AssociateRouteTableCommand,
  AttachInternetGatewayCommand,
  CreateInternetGatewayCommand,
  CreateRouteCommand,
  CreateRouteTableCommand,
  CreateSubnetCommand,
  CreateVpcCommand,
  DeleteInternetGatewayCommand,
  DeleteRouteTableCommand,
  DeleteSubnetCommand,
  DeleteVpcCommand,
  DescribeAvailabilityZonesCommand,
  DescribeInternetGatewaysCommand,
  DescribeRouteTablesCommand,
  DescribeSubnetsCommand,
  DescribeVpcsCommand,
  DetachInternetGatewayCommand,
  DisassociateRouteTableCommand,
  ModifySubnetAttributeCommand,
  ModifyVpcAttributeCommand,
  type ResourceType,
  type TagSpecification
} from '@aws-sdk/client-ec2';
import { AwsClientOptions, NetworkService, ResourceTags, SubnetInput } from './types.js';
import { callProvider, probeExists } from './aws-errors.js';
import { toTagList } from './tags.js';

export const DEFAULT_ROUTE_CIDR = '0.0.0.0/0';

export function tagSpecifications(resourceType: ResourceType, tags: ResourceTags): TagSpecification[] {
  return [{ ResourceType: resourceType, Tags: toTagList(tags) }];
}

/**
 * VPC, internet gateway, subnet and route table calls against EC2.
 */
export class NetworkManager implements NetworkService {
  private client: EC2Client;

  constructor(options: AwsClientOptions) {
    this.client = new EC2Client({ region: options.region, profile: options.profile });
  }

  async listAvailabilityZones(): Promise<string[]> {
    return callProvider('describe availability zones', async () => {
      const result = await this.client.send(new DescribeAvailabilityZonesCommand({
        Filters: [{ Name: 'state', Values: ['available'] }]
      }));

      return (result.AvailabilityZones ?? [])
        .map(zone => zone.ZoneName)
        .filter((name): name is string => Boolean(name));
    });
  }

  // VPC

  async vpcExists(vpcId: string): Promise<boolean> {
    return probeExists(`describe VPC ${vpcId}`, async () => {
      const result = await this.client.send(new DescribeVpcsCommand({ VpcIds: [vpcId] }));
      return (result.Vpcs ?? []).some(vpc => vpc.VpcId === vpcId);
    });
  }

  async createVpc(cidr: string, tags: ResourceTags): Promise<string> {
    return callProvider(`create VPC ${cidr}`, async () => {
      const result = await this.client.send(new CreateVpcCommand({
        CidrBlock: cidr,
        TagSpecifications: tagSpecifications('vpc', tags)
      }));

      if (!result.Vpc?.VpcId) {
        throw new Error('CreateVpc returned no VpcId');
      }
      return result.Vpc.VpcId;
    });
  }

  async enableVpcDns(vpcId: string): Promise<void> {
    // EC2 accepts a single attribute per ModifyVpcAttribute call
    await callProvider(`enable DNS hostnames for ${vpcId}`, () =>
      this.client.send(new ModifyVpcAttributeCommand({ VpcId: vpcId, EnableDnsHostnames: { Value: true } }))
    );
    await callProvider(`enable DNS support for ${vpcId}`, () =>
      this.client.send(new ModifyVpcAttributeCommand({ VpcId: vpcId, EnableDnsSupport: { Value: true } }))
    );
  }

  async deleteVpc(vpcId: string): Promise<void> {
    await callProvider(`delete VPC ${vpcId}`, () =>
      this.client.send(new DeleteVpcCommand({ VpcId: vpcId }))
    );
  }

  // Internet gateway

  async internetGatewayExists(gatewayId: string): Promise<boolean> {
    return probeExists(`describe internet gateway ${gatewayId}`, async () => {
      const result = await this.client.send(new DescribeInternetGatewaysCommand({ InternetGatewayIds: [gatewayId] }));
      return (result.InternetGateways ?? []).some(gateway => gateway.InternetGatewayId === gatewayId);
    });
  }

  async gatewayAttachments(gatewayId: string): Promise<string[]> {
    return callProvider(`describe internet gateway ${gatewayId}`, async () => {
      const result = await this.client.send(new DescribeInternetGatewaysCommand({ InternetGatewayIds: [gatewayId] }));
      return (result.InternetGateways ?? [])
        .flatMap(gateway => gateway.Attachments ?? [])
        .filter(attachment => attachment.State !== 'detached' && attachment.State !== 'detaching')
        .flatMap(attachment => attachment.VpcId ? [attachment.VpcId] : []);
    });
  }

  async createInternetGateway(tags: ResourceTags): Promise<string> {
    return callProvider('create internet gateway', async () => {
      const result = await this.client.send(new CreateInternetGatewayCommand({
        TagSpecifications: tagSpecifications('internet-gateway', tags)
      }));

      if (!result.InternetGateway?.InternetGatewayId) {
        throw new Error('CreateInternetGateway returned no InternetGatewayId');
      }
      return result.InternetGateway.InternetGatewayId;
    });
  }

  async attachInternetGateway(gatewayId: string, vpcId: string): Promise<void> {
    await callProvider(`attach internet gateway ${gatewayId} to ${vpcId}`, () =>
      this.client.send(new AttachInternetGatewayCommand({ InternetGatewayId: gatewayId, VpcId: vpcId }))
    );
  }

  async detachInternetGateway(gatewayId: string, vpcId: string): Promise<void> {
    await callProvider(`detach internet gateway ${gatewayId} from ${vpcId}`, () =>
      this.client.send(new DetachInternetGatewayCommand({ InternetGatewayId: gatewayId, VpcId: vpcId }))
    );
  }

  async deleteInternetGateway(gatewayId: string): Promise<void> {
    await callProvider(`delete internet gateway ${gatewayId}`, () =>
      this.client.send(new DeleteInternetGatewayCommand({ InternetGatewayId: gatewayId }))
    );
  }

  // Subnets

  async subnetExists(subnetId: string): Promise<boolean> {
    return probeExists(`describe subnet ${subnetId}`, async () => {
      const result = await this.client.send(new DescribeSubnetsCommand({ SubnetIds: [subnetId] }));
      return (result.Subnets ?? []).some(subnet => subnet.SubnetId === subnetId);
    });
  }

  async createSubnet(input: SubnetInput): Promise<string> {
    return callProvider(`create subnet ${input.cidr} in ${input.availabilityZone}`, async () => {
      const result = await this.client.send(new CreateSubnetCommand({
        VpcId: input.vpcId,
        CidrBlock: input.cidr,
        AvailabilityZone: input.availabilityZone,
        TagSpecifications: tagSpecifications('subnet', input.tags)
      }));

      if (!result.Subnet?.SubnetId) {
        throw new Error('CreateSubnet returned no SubnetId');
      }
      return result.Subnet.SubnetId;
    });
  }

  async enablePublicIpOnLaunch(subnetId: string): Promise<void> {
    await callProvider(`enable public IP on launch for ${subnetId}`, () =>
      this.client.send(new ModifySubnetAttributeCommand({ SubnetId: subnetId, MapPublicIpOnLaunch: { Value: true } }))
    );
  }

  async deleteSubnet(subnetId: string): Promise<void> {
    await callProvider(`delete subnet ${subnetId}`, () =>
      this.client.send(new DeleteSubnetCommand({ SubnetId: subnetId }))
    );
  }

  // Route tables

  async routeTableExists(routeTableId: string): Promise<boolean> {
    return probeExists(`describe route table ${routeTableId}`, async () => {
      const result = await this.client.send(new DescribeRouteTablesCommand({ RouteTableIds: [routeTableId] }));
      return (result.RouteTables ?? []).some(table => table.RouteTableId === routeTableId);
    });
  }

  async createRouteTable(vpcId: string, tags: ResourceTags): Promise<string> {
    return callProvider(`create route table in ${vpcId}`, async () => {
      const result = await this.client.send(new CreateRouteTableCommand({
        VpcId: vpcId,
        TagSpecifications: tagSpecifications('route-table', tags)
      }));

      if (!result.RouteTable?.RouteTableId) {
        throw new Error('CreateRouteTable returned no RouteTableId');
      }
      return result.RouteTable.RouteTableId;
    });
  }

  async createDefaultRoute(routeTableId: string, gatewayId: string): Promise<void> {
    await callProvider(`add route ${DEFAULT_ROUTE_CIDR} via ${gatewayId} to ${routeTableId}`, () =>
      this.client.send(new CreateRouteCommand({
        RouteTableId: routeTableId,
        DestinationCidrBlock: DEFAULT_ROUTE_CIDR,
        GatewayId: gatewayId
      }))
    );
  }

  async associateRouteTable(routeTableId: string, subnetId: string): Promise<string> {
    return callProvider(`associate route table ${routeTableId} with ${subnetId}`, async () => {
      const result = await this.client.send(new AssociateRouteTableCommand({
        RouteTableId: routeTableId,
        SubnetId: subnetId
      }));

      if (!result.AssociationId) {
        throw new Error('AssociateRouteTable returned no AssociationId');
      }
      return result.AssociationId;
    });
  }

  async disassociateRouteTable(associationId: string): Promise<void> {
    await callProvider(`disassociate route table association ${associationId}`, () =>
      this.client.send(new DisassociateRouteTableCommand({ AssociationId: associationId }))
    );
  }

  async deleteRouteTable(routeTableId: string): Promise<void> {
    await callProvider(`delete route table ${routeTableId}`, () =>
      this.client.send(new DeleteRouteTableCommand({ RouteTableId: routeTableId }))
    );
  }
}
