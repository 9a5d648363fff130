import { describe, it, expect, beforeEach } from 'vitest';
import { join } from 'path';
import { ResourceNamingService, createNamingService } from '../naming.js';
import { defaultConfig } from '../defaults.js';

const NOW = new Date('2024-01-01T00:00:00Z');

describe('Resource Naming Service', () => {
  let namingService: ResourceNamingService;

  beforeEach(() => {
    namingService = createNamingService();
  });

  describe('generateResourceNames', () => {
    it('should derive every name from the configuration', () => {
      const config = defaultConfig();
      config.paths.key_dir = 'keys';

      expect(namingService.generateResourceNames(config)).toEqual({
        vpcName: 'AutomationVPC',
        gatewayName: 'AutomationVPC-IGW',
        publicSubnetName: 'AutomationPublicSubnet',
        privateSubnetName: 'AutomationPrivateSubnet',
        routeTableName: 'AutomationVPC-Public-RT',
        securityGroupName: 'AutomationSecurityGroup',
        instanceName: 'AutomationWebServer',
        keyName: 'AutoKeyPair',
        keyFilePath: join('keys', 'AutoKeyPair.pem')
      });
    });
  });

  describe('generateBucketName', () => {
    it('should append the creation time in epoch seconds', () => {
      expect(namingService.generateBucketName('automation-lab-bucket', NOW)).toBe('automation-lab-bucket-1704067200');
    });

    it('should sanitize and lowercase the prefix', () => {
      expect(namingService.generateBucketName('My_Lab..Bucket', NOW)).toBe('my-lab-bucket-1704067200');
    });

    it('should stay within the S3 length limit', () => {
      const name = namingService.generateBucketName('a'.repeat(70), NOW);

      expect(name.length).toBeLessThanOrEqual(63);
      expect(name).toMatch(/^a+-[a-z0-9]+$/);
    });

    it('should differ for different creation times', () => {
      const later = new Date(NOW.getTime() + 1000);
      expect(namingService.generateBucketName('lab', NOW)).not.toBe(namingService.generateBucketName('lab', later));
    });
  });

  describe('tagsFor', () => {
    it('should add the project tag to the name tag', () => {
      expect(namingService.tagsFor(defaultConfig(), 'AutomationVPC')).toEqual({
        Name: 'AutomationVPC',
        Project: 'AutomationLab'
      });
    });
  });
});
