import {
  CallerIdentity,
  CloudProvider,
  IdentityService,
  IngressRule,
  InstanceDetails,
  InstanceLaunchSpec,
  InstanceService,
  KeyPairService,
  NetworkService,
  SecurityGroupService,
  StorageService,
  SubnetInput,
  UploadResult,
  WaitOutcome
} from '../../provisioning/types.js';

/**
 * In-memory cloud for orchestration tests. Every call is counted by method
 * name; any method can be made to fail once or always.
 */
export class FakeCloud {
  readonly calls = new Map<string, number>();
  readonly vpcs = new Set<string>();
  readonly gateways = new Map<string, string | undefined>();
  readonly subnets = new Map<string, SubnetInput>();
  readonly routeTables = new Map<string, { vpcId: string; routes: string[] }>();
  readonly associations = new Map<string, string>();
  readonly securityGroups = new Map<string, IngressRule[]>();
  readonly keyPairs = new Set<string>();
  readonly instances = new Map<string, { state: string; spec: InstanceLaunchSpec }>();
  readonly buckets = new Map<string, string[]>();
  readonly dnsEnabled = new Set<string>();

  zones = ['eu-west-1a', 'eu-west-1b'];
  launchState = 'running';
  publicIp: string | undefined = '203.0.113.10';
  identityError?: Error;
  private readonly failures = new Map<string, Error>();
  private sequence = 0;

  failOn(method: string, error: Error = new Error(`${method} failed`)): void {
    this.failures.set(method, error);
  }

  clearFailures(): void {
    this.failures.clear();
  }

  count(method: string): number {
    return this.calls.get(method) ?? 0;
  }

  totalCreates(): number {
    return [...this.calls.entries()]
      .filter(([method]) => method.startsWith('create') || method === 'runInstance')
      .reduce((sum, [, calls]) => sum + calls, 0);
  }

  nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}-${this.sequence.toString().padStart(4, '0')}`;
  }

  track(method: string): void {
    this.calls.set(method, this.count(method) + 1);
    const failure = this.failures.get(method);
    if (failure) {
      throw failure;
    }
  }

  provider(): CloudProvider {
    return {
      identity: this.identity(),
      network: this.network(),
      securityGroups: this.securityGroupService(),
      keyPairs: this.keyPairService(),
      instances: this.instanceService(),
      storage: this.storage()
    };
  }

  private identity(): IdentityService {
    return {
      getCallerIdentity: async (): Promise<CallerIdentity> => {
        this.track('getCallerIdentity');
        if (this.identityError) {
          throw this.identityError;
        }
        return { account: '123456789012', arn: 'arn:aws:iam::123456789012:user/lab' };
      }
    };
  }

  private network(): NetworkService {
    return {
      listAvailabilityZones: async () => {
        this.track('listAvailabilityZones');
        return [...this.zones];
      },
      vpcExists: async id => {
        this.track('vpcExists');
        return this.vpcs.has(id);
      },
      createVpc: async () => {
        this.track('createVpc');
        const id = this.nextId('vpc');
        this.vpcs.add(id);
        return id;
      },
      enableVpcDns: async id => {
        this.track('enableVpcDns');
        this.dnsEnabled.add(id);
      },
      deleteVpc: async id => {
        this.track('deleteVpc');
        this.vpcs.delete(id);
      },
      internetGatewayExists: async id => {
        this.track('internetGatewayExists');
        return this.gateways.has(id);
      },
      gatewayAttachments: async id => {
        this.track('gatewayAttachments');
        const vpcId = this.gateways.get(id);
        return vpcId ? [vpcId] : [];
      },
      createInternetGateway: async () => {
        this.track('createInternetGateway');
        const id = this.nextId('igw');
        this.gateways.set(id, undefined);
        return id;
      },
      attachInternetGateway: async (gatewayId, vpcId) => {
        this.track('attachInternetGateway');
        this.gateways.set(gatewayId, vpcId);
      },
      detachInternetGateway: async gatewayId => {
        this.track('detachInternetGateway');
        this.gateways.set(gatewayId, undefined);
      },
      deleteInternetGateway: async id => {
        this.track('deleteInternetGateway');
        this.gateways.delete(id);
      },
      subnetExists: async id => {
        this.track('subnetExists');
        return this.subnets.has(id);
      },
      createSubnet: async input => {
        this.track('createSubnet');
        const id = this.nextId('subnet');
        this.subnets.set(id, input);
        return id;
      },
      enablePublicIpOnLaunch: async () => {
        this.track('enablePublicIpOnLaunch');
      },
      deleteSubnet: async id => {
        this.track('deleteSubnet');
        this.subnets.delete(id);
      },
      routeTableExists: async id => {
        this.track('routeTableExists');
        return this.routeTables.has(id);
      },
      createRouteTable: async vpcId => {
        this.track('createRouteTable');
        const id = this.nextId('rtb');
        this.routeTables.set(id, { vpcId, routes: [] });
        return id;
      },
      createDefaultRoute: async (routeTableId, gatewayId) => {
        this.track('createDefaultRoute');
        this.routeTables.get(routeTableId)?.routes.push(gatewayId);
      },
      associateRouteTable: async (routeTableId, subnetId) => {
        this.track('associateRouteTable');
        const id = this.nextId('rtbassoc');
        this.associations.set(id, `${routeTableId}:${subnetId}`);
        return id;
      },
      disassociateRouteTable: async associationId => {
        this.track('disassociateRouteTable');
        this.associations.delete(associationId);
      },
      deleteRouteTable: async id => {
        this.track('deleteRouteTable');
        this.routeTables.delete(id);
      }
    };
  }

  private securityGroupService(): SecurityGroupService {
    return {
      securityGroupExists: async id => {
        this.track('securityGroupExists');
        return this.securityGroups.has(id);
      },
      createSecurityGroup: async () => {
        this.track('createSecurityGroup');
        const id = this.nextId('sg');
        this.securityGroups.set(id, []);
        return id;
      },
      authorizeIngress: async (groupId, rule) => {
        this.track('authorizeIngress');
        this.securityGroups.get(groupId)?.push(rule);
      },
      deleteSecurityGroup: async id => {
        this.track('deleteSecurityGroup');
        this.securityGroups.delete(id);
      }
    };
  }

  private keyPairService(): KeyPairService {
    return {
      keyPairExists: async name => {
        this.track('keyPairExists');
        return this.keyPairs.has(name);
      },
      createKeyPair: async name => {
        this.track('createKeyPair');
        this.keyPairs.add(name);
        return `test-private-key-for-${name}`;
      },
      deleteKeyPair: async name => {
        this.track('deleteKeyPair');
        this.keyPairs.delete(name);
      }
    };
  }

  private instanceService(): InstanceService {
    return {
      getInstanceState: async id => {
        this.track('getInstanceState');
        return this.instances.get(id)?.state;
      },
      findLatestImage: async () => {
        this.track('findLatestImage');
        return 'ami-0001';
      },
      runInstance: async spec => {
        this.track('runInstance');
        const id = this.nextId('i');
        this.instances.set(id, { state: this.launchState, spec });
        return id;
      },
      waitForRunning: async (id): Promise<WaitOutcome> => {
        this.track('waitForRunning');
        return this.instances.get(id)?.state === 'running'
          ? { reached: true }
          : { reached: false, reason: 'still pending' };
      },
      describeInstance: async (id): Promise<InstanceDetails> => {
        this.track('describeInstance');
        return {
          instanceId: id,
          state: this.instances.get(id)?.state,
          publicIp: this.publicIp,
          privateIp: '10.0.1.10',
          availabilityZone: 'eu-west-1a'
        };
      },
      terminateInstance: async id => {
        this.track('terminateInstance');
        const instance = this.instances.get(id);
        if (instance) {
          instance.state = 'terminated';
        }
      },
      waitForTerminated: async (): Promise<WaitOutcome> => {
        this.track('waitForTerminated');
        return { reached: true };
      }
    };
  }

  private storage(): StorageService {
    return {
      region: 'eu-west-1',
      bucketExists: async name => {
        this.track('bucketExists');
        return this.buckets.has(name);
      },
      createBucket: async name => {
        this.track('createBucket');
        this.buckets.set(name, []);
      },
      tagBucket: async () => {
        this.track('tagBucket');
      },
      enableVersioning: async () => {
        this.track('enableVersioning');
      },
      allowPublicAccess: async () => {
        this.track('allowPublicAccess');
      },
      uploadFile: async (bucketName, key): Promise<UploadResult> => {
        this.track('uploadFile');
        this.buckets.get(bucketName)?.push(key);
        return { key, etag: '"etag"', url: `https://${bucketName}.s3.eu-west-1.amazonaws.com/${key}` };
      },
      countObjects: async name => {
        this.track('countObjects');
        return this.buckets.get(name)?.length ?? 0;
      },
      emptyBucket: async name => {
        this.track('emptyBucket');
        const removed = this.buckets.get(name)?.length ?? 0;
        this.buckets.set(name, []);
        return removed;
      },
      deleteBucket: async name => {
        this.track('deleteBucket');
        this.buckets.delete(name);
      }
    };
  }
}
