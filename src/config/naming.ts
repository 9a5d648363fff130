import { join } from 'path';
import { InfraConfig } from '../types/index.js';
import { ResourceTags } from '../provisioning/types.js';
import { ResourceNames } from './types.js';

/**
 * Derives provider-facing names and tags from one configuration
 */
export class ResourceNamingService {
  private readonly maxS3BucketNameLength = 63;

  generateResourceNames(config: InfraConfig): ResourceNames {
    const { network, security_group, instance, paths } = config;

    return {
      vpcName: network.vpc_name,
      gatewayName: `${network.vpc_name}-IGW`,
      publicSubnetName: network.public_subnet_name,
      privateSubnetName: network.private_subnet_name,
      routeTableName: `${network.vpc_name}-Public-RT`,
      securityGroupName: security_group.name,
      instanceName: instance.name,
      keyName: instance.key_name,
      keyFilePath: join(paths.key_dir, `${instance.key_name}.pem`)
    };
  }

  /**
   * Globally unique bucket name: the configured prefix plus the creation
   * time in epoch seconds, kept within the S3 length limit.
   */
  generateBucketName(prefix: string, now: Date = new Date()): string {
    const epochSeconds = Math.floor(now.getTime() / 1000);
    const name = this.sanitizeName(`${prefix}-${epochSeconds}`).toLowerCase();
    return this.validateAndTruncate(name, this.maxS3BucketNameLength);
  }

  /**
   * Name tag plus the project tag, applied to every resource
   */
  tagsFor(config: InfraConfig, name: string): ResourceTags {
    return {
      Name: name,
      [config.project.tag_key]: config.project.tag_value
    };
  }

  /**
   * Sanitize name to be AWS-compliant
   * - Replace invalid characters with hyphens
   * - Collapse consecutive hyphens
   * - Ensure it starts with a letter or digit
   */
  private sanitizeName(name: string): string {
    let sanitized = name.replace(/[^a-zA-Z0-9-]/g, '-');
    sanitized = sanitized.replace(/-+/g, '-');
    sanitized = sanitized.replace(/^-+|-+$/g, '');

    if (!sanitized) {
      sanitized = 'bucket';
    }

    return sanitized;
  }

  private validateAndTruncate(name: string, maxLength: number): string {
    if (name.length <= maxLength) {
      return name;
    }

    // Truncate and add hash to maintain uniqueness
    const hash = this.generateShortHash(name);
    const truncatedLength = maxLength - hash.length - 1;
    return name.substring(0, truncatedLength).replace(/-+$/, '') + '-' + hash;
  }

  private generateShortHash(input: string): string {
    let hash = 0;
    for (let i = 0; i < input.length; i++) {
      const char = input.charCodeAt(i);
      hash = ((hash << 5) - hash) + char;
      hash = hash & hash; // Convert to 32-bit integer
    }
    return Math.abs(hash).toString(36).substring(0, 6);
  }
}

export function createNamingService(): ResourceNamingService {
  return new ResourceNamingService();
}
