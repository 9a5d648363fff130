// Configuration-specific types
import { InfraConfig } from '../types/index.js';

export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
}

export interface ConfigLoader {
  load(path: string): Promise<InfraConfig>;
  validate(config: unknown): ConfigValidationResult;
}

/** Provider-facing names derived from one configuration */
export interface ResourceNames {
  vpcName: string;
  gatewayName: string;
  publicSubnetName: string;
  privateSubnetName: string;
  routeTableName: string;
  securityGroupName: string;
  instanceName: string;
  keyName: string;
  /** Local path of the private key written when the key pair is created */
  keyFilePath: string;
}
