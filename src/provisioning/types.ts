// Provisioning-specific types: the boundary between the orchestrator and AWS

export type ResourceTags = Record<string, string>;

export type Presence = 'present' | 'absent';

export interface ExistenceCheck {
  presence: Presence;
  /** Live provider state, reported for instances */
  status?: string;
}

export interface AwsClientOptions {
  region: string;
  profile?: string;
}

export interface CallerIdentity {
  account: string;
  arn: string;
  userId?: string;
}

export interface SubnetInput {
  vpcId: string;
  cidr: string;
  availabilityZone: string;
  tags: ResourceTags;
}

export interface SecurityGroupInput {
  name: string;
  description: string;
  vpcId: string;
  tags: ResourceTags;
}

export interface IngressRule {
  port: number;
  cidr: string;
  protocol?: string;
  description?: string;
}

export interface InstanceLaunchSpec {
  imageId: string;
  instanceType: string;
  keyName: string;
  securityGroupId: string;
  subnetId: string;
  /** Base64-encoded bootstrap script */
  userData: string;
  tags: ResourceTags;
}

export interface InstanceDetails {
  instanceId: string;
  state?: string;
  publicIp?: string;
  privateIp?: string;
  availabilityZone?: string;
}

export interface WaitOutcome {
  reached: boolean;
  reason?: string;
}

export interface UploadResult {
  key: string;
  etag: string;
  url: string;
}

export interface IdentityService {
  getCallerIdentity(): Promise<CallerIdentity>;
}

export interface NetworkService {
  listAvailabilityZones(): Promise<string[]>;

  vpcExists(vpcId: string): Promise<boolean>;
  createVpc(cidr: string, tags: ResourceTags): Promise<string>;
  enableVpcDns(vpcId: string): Promise<void>;
  deleteVpc(vpcId: string): Promise<void>;

  internetGatewayExists(gatewayId: string): Promise<boolean>;
  /** VPCs the gateway is attached or attaching to */
  gatewayAttachments(gatewayId: string): Promise<string[]>;
  createInternetGateway(tags: ResourceTags): Promise<string>;
  attachInternetGateway(gatewayId: string, vpcId: string): Promise<void>;
  detachInternetGateway(gatewayId: string, vpcId: string): Promise<void>;
  deleteInternetGateway(gatewayId: string): Promise<void>;

  subnetExists(subnetId: string): Promise<boolean>;
  createSubnet(input: SubnetInput): Promise<string>;
  enablePublicIpOnLaunch(subnetId: string): Promise<void>;
  deleteSubnet(subnetId: string): Promise<void>;

  routeTableExists(routeTableId: string): Promise<boolean>;
  createRouteTable(vpcId: string, tags: ResourceTags): Promise<string>;
  createDefaultRoute(routeTableId: string, gatewayId: string): Promise<void>;
  associateRouteTable(routeTableId: string, subnetId: string): Promise<string>;
  disassociateRouteTable(associationId: string): Promise<void>;
  deleteRouteTable(routeTableId: string): Promise<void>;
}

export interface SecurityGroupService {
  securityGroupExists(groupId: string): Promise<boolean>;
  createSecurityGroup(input: SecurityGroupInput): Promise<string>;
  authorizeIngress(groupId: string, rule: IngressRule): Promise<void>;
  deleteSecurityGroup(groupId: string): Promise<void>;
}

export interface KeyPairService {
  keyPairExists(keyName: string): Promise<boolean>;
  /** Returns the private key material, only available at creation */
  createKeyPair(keyName: string, tags: ResourceTags): Promise<string>;
  deleteKeyPair(keyName: string): Promise<void>;
}

export interface InstanceService {
  /** Live state name, or undefined when the provider does not know the id */
  getInstanceState(instanceId: string): Promise<string | undefined>;
  findLatestImage(nameFilter: string): Promise<string>;
  runInstance(spec: InstanceLaunchSpec): Promise<string>;
  waitForRunning(instanceId: string, timeoutSeconds: number): Promise<WaitOutcome>;
  describeInstance(instanceId: string): Promise<InstanceDetails>;
  terminateInstance(instanceId: string): Promise<void>;
  waitForTerminated(instanceId: string, timeoutSeconds: number): Promise<WaitOutcome>;
}

export interface StorageService {
  readonly region: string;
  bucketExists(bucketName: string): Promise<boolean>;
  createBucket(bucketName: string): Promise<void>;
  tagBucket(bucketName: string, tags: ResourceTags): Promise<void>;
  enableVersioning(bucketName: string): Promise<void>;
  allowPublicAccess(bucketName: string): Promise<void>;
  uploadFile(bucketName: string, key: string, filePath: string): Promise<UploadResult>;
  countObjects(bucketName: string): Promise<number>;
  /** Deletes every object version and delete marker; returns how many were removed */
  emptyBucket(bucketName: string): Promise<number>;
  deleteBucket(bucketName: string): Promise<void>;
}

export interface CloudProvider {
  identity: IdentityService;
  network: NetworkService;
  securityGroups: SecurityGroupService;
  keyPairs: KeyPairService;
  instances: InstanceService;
  storage: StorageService;
}
