import { AwsClientOptions, CloudProvider } from './types.js';
import { IdentityManager } from './identity-manager.js';
import { NetworkManager } from './network-manager.js';
import { SecurityGroupManager } from './security-group-manager.js';
import { KeyPairManager } from './key-pair-manager.js';
import { InstanceManager } from './instance-manager.js';
import { S3Manager } from './s3-manager.js';

/**
 * AWS SDK v3 implementation of the provider boundary, one manager per service.
 */
export function createAwsProvider(options: AwsClientOptions): CloudProvider {
  return {
    identity: new IdentityManager(options),
    network: new NetworkManager(options),
    securityGroups: new SecurityGroupManager(options),
    keyPairs: new KeyPairManager(options),
    instances: new InstanceManager(options),
    storage: new S3Manager(options)
  };
}
