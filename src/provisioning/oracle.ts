import { ResourceKind } from '../types/index.js';
import { CloudProvider, ExistenceCheck } from './types.js';

const GONE_INSTANCE_STATES: ReadonlySet<string> = new Set(['terminated', 'shutting-down']);

type Probe = (id: string) => Promise<ExistenceCheck>;

function fromBoolean(found: boolean): ExistenceCheck {
  return { presence: found ? 'present' : 'absent' };
}

/**
 * Answers "does this identifier still exist?" against the provider only.
 * Never reads recorded state; callers pass the identifier they hold.
 */
export class ResourceOracle {
  private probes: Record<ResourceKind, Probe>;

  constructor(provider: CloudProvider) {
    const { network, securityGroups, keyPairs, instances, storage } = provider;

    this.probes = {
      KeyPair: async id => fromBoolean(await keyPairs.keyPairExists(id)),
      Network: async id => fromBoolean(await network.vpcExists(id)),
      Gateway: async id => fromBoolean(await network.internetGatewayExists(id)),
      PublicSubnet: async id => fromBoolean(await network.subnetExists(id)),
      PrivateSubnet: async id => fromBoolean(await network.subnetExists(id)),
      RouteTable: async id => fromBoolean(await network.routeTableExists(id)),
      SecurityGroup: async id => fromBoolean(await securityGroups.securityGroupExists(id)),
      Instance: async id => {
        const status = await instances.getInstanceState(id);
        if (status === undefined) {
          return { presence: 'absent' };
        }
        return { presence: GONE_INSTANCE_STATES.has(status) ? 'absent' : 'present', status };
      },
      Bucket: async id => fromBoolean(await storage.bucketExists(id))
    };
  }

  async exists(kind: ResourceKind, id: string): Promise<ExistenceCheck> {
    return this.probes[kind](id);
  }
}

export function isAcceptedInstanceState(check: ExistenceCheck, acceptedStates: readonly string[]): boolean {
  return check.presence === 'present' && check.status !== undefined && acceptedStates.includes(check.status);
}
