import { chmodSync, existsSync, mkdirSync, renameSync, writeFileSync } from 'fs';
import { basename, dirname } from 'path';
import { ResourceKind, StateKey } from '../types/index.js';
import { isAcceptedInstanceState } from '../provisioning/oracle.js';
import { ResourceStep, StepContext } from './types.js';
import { RESOURCE_DEPENDENCIES } from './resource-graph.js';

const PRIVATE_KEY_MODE = 0o400;

async function availabilityZone(ctx: StepContext, index: number): Promise<string> {
  const zones = await ctx.provider.network.listAvailabilityZones();
  const zone = zones[index] ?? zones[0];
  if (zone === undefined) {
    throw new Error(`No availability zones available in ${ctx.config.aws.region}`);
  }
  return zone;
}

const keyPairStep: ResourceStep = {
  kind: 'KeyPair',
  title: 'Key Pair',
  primaryKey: 'KEY_NAME',
  ownedKeys: ['KEY_NAME'],

  async create(ctx) {
    const { keyName, keyFilePath } = ctx.names;
    const { keyPairs } = ctx.provider;

    if (await keyPairs.keyPairExists(keyName)) {
      ctx.logger.warn(`Key pair ${keyName} already exists in AWS; reusing it`);
      if (!existsSync(keyFilePath)) {
        ctx.logger.warn(`Private key file not found: ${keyFilePath}. SSH access needs the original key`);
      }
      ctx.state.record('KEY_NAME', keyName);
      return { identifier: keyName, adopted: true };
    }

    if (existsSync(keyFilePath)) {
      const backupPath = `${keyFilePath}.backup.${Math.floor(ctx.now().getTime() / 1000)}`;
      ctx.logger.warn(`Key file ${keyFilePath} has no matching key pair in AWS; moving it to ${backupPath}`);
      renameSync(keyFilePath, backupPath);
    }

    const material = await keyPairs.createKeyPair(keyName, ctx.naming.tagsFor(ctx.config, keyName));
    ctx.state.record('KEY_NAME', keyName);

    await ctx.followUps.required('write private key file', async () => {
      mkdirSync(dirname(keyFilePath), { recursive: true });
      writeFileSync(keyFilePath, material, { mode: PRIVATE_KEY_MODE });
      // mode is ignored when the file already existed
      chmodSync(keyFilePath, PRIVATE_KEY_MODE);
    });
    ctx.logger.info(`Private key saved to ${keyFilePath}`);

    return { identifier: keyName };
  },

  async destroy(ctx, keyName) {
    await ctx.provider.keyPairs.deleteKeyPair(keyName);
    ctx.logger.info(`Local key file left in place: ${ctx.names.keyFilePath}`);
  }
};

const networkStep: ResourceStep = {
  kind: 'Network',
  title: 'VPC',
  primaryKey: 'VPC_ID',
  ownedKeys: ['VPC_ID'],

  async create(ctx) {
    const { network } = ctx.provider;
    const vpcId = await network.createVpc(
      ctx.config.network.vpc_cidr,
      ctx.naming.tagsFor(ctx.config, ctx.names.vpcName)
    );
    ctx.state.record('VPC_ID', vpcId);

    await ctx.followUps.required('enable DNS hostnames and support', () => network.enableVpcDns(vpcId));
    return { identifier: vpcId };
  },

  async destroy(ctx, vpcId) {
    await ctx.provider.network.deleteVpc(vpcId);
  }
};

const gatewayStep: ResourceStep = {
  kind: 'Gateway',
  title: 'Internet Gateway',
  primaryKey: 'IGW_ID',
  ownedKeys: ['IGW_ID'],

  async create(ctx) {
    const { network } = ctx.provider;
    const vpcId = ctx.state.require('VPC_ID', 'Gateway');

    const gatewayId = await network.createInternetGateway(ctx.naming.tagsFor(ctx.config, ctx.names.gatewayName));
    ctx.state.record('IGW_ID', gatewayId);

    await ctx.followUps.required(`attach to ${vpcId}`, () => network.attachInternetGateway(gatewayId, vpcId));
    return { identifier: gatewayId };
  },

  async reconcile(ctx, gatewayId) {
    const { network } = ctx.provider;
    const vpcId = ctx.state.require('VPC_ID', 'Gateway');

    const attached = await network.gatewayAttachments(gatewayId);
    if (attached.includes(vpcId)) {
      return;
    }
    if (ctx.state.dryRun) {
      ctx.logger.info(`[DRY RUN] Would attach ${gatewayId} to ${vpcId}`);
      return;
    }

    ctx.logger.warn(`Internet Gateway ${gatewayId} is not attached to ${vpcId}; attaching it`);
    for (const previous of attached) {
      await ctx.followUps.required(`detach from ${previous}`, () => network.detachInternetGateway(gatewayId, previous));
    }
    await ctx.followUps.required(`attach to ${vpcId}`, () => network.attachInternetGateway(gatewayId, vpcId));
  },

  async destroy(ctx, gatewayId) {
    const { network } = ctx.provider;
    const vpcId = ctx.state.find('VPC_ID');
    if (vpcId) {
      await ctx.followUps.optional(`detach from ${vpcId}`, () => network.detachInternetGateway(gatewayId, vpcId));
    }
    await network.deleteInternetGateway(gatewayId);
  }
};

const publicSubnetStep: ResourceStep = {
  kind: 'PublicSubnet',
  title: 'Public Subnet',
  primaryKey: 'PUBLIC_SUBNET_ID',
  ownedKeys: ['PUBLIC_SUBNET_ID', 'PUBLIC_SUBNET_AZ'],

  async create(ctx) {
    const { network } = ctx.provider;
    const vpcId = ctx.state.require('VPC_ID', 'PublicSubnet');
    const zone = await availabilityZone(ctx, 0);

    const subnetId = await network.createSubnet({
      vpcId,
      cidr: ctx.config.network.public_subnet_cidr,
      availabilityZone: zone,
      tags: ctx.naming.tagsFor(ctx.config, ctx.names.publicSubnetName)
    });
    ctx.state.record('PUBLIC_SUBNET_ID', subnetId);
    ctx.state.record('PUBLIC_SUBNET_AZ', zone);

    await ctx.followUps.optional('enable public IP on launch', () => network.enablePublicIpOnLaunch(subnetId));
    return { identifier: subnetId };
  },

  async destroy(ctx, subnetId) {
    await ctx.provider.network.deleteSubnet(subnetId);
  }
};

const privateSubnetStep: ResourceStep = {
  kind: 'PrivateSubnet',
  title: 'Private Subnet',
  primaryKey: 'PRIVATE_SUBNET_ID',
  ownedKeys: ['PRIVATE_SUBNET_ID', 'PRIVATE_SUBNET_AZ'],

  async create(ctx) {
    const vpcId = ctx.state.require('VPC_ID', 'PrivateSubnet');
    // second zone when the region has one
    const zone = await availabilityZone(ctx, 1);

    const subnetId = await ctx.provider.network.createSubnet({
      vpcId,
      cidr: ctx.config.network.private_subnet_cidr,
      availabilityZone: zone,
      tags: ctx.naming.tagsFor(ctx.config, ctx.names.privateSubnetName)
    });
    ctx.state.record('PRIVATE_SUBNET_ID', subnetId);
    ctx.state.record('PRIVATE_SUBNET_AZ', zone);

    return { identifier: subnetId };
  },

  async destroy(ctx, subnetId) {
    await ctx.provider.network.deleteSubnet(subnetId);
  }
};

const routeTableStep: ResourceStep = {
  kind: 'RouteTable',
  title: 'Public Route Table',
  primaryKey: 'PUBLIC_RT_ID',
  ownedKeys: ['PUBLIC_RT_ID', 'PUBLIC_RT_ASSOC_ID'],

  async create(ctx) {
    const { network } = ctx.provider;
    const vpcId = ctx.state.require('VPC_ID', 'RouteTable');
    const gatewayId = ctx.state.require('IGW_ID', 'RouteTable');
    const subnetId = ctx.state.require('PUBLIC_SUBNET_ID', 'RouteTable');

    const routeTableId = await network.createRouteTable(vpcId, ctx.naming.tagsFor(ctx.config, ctx.names.routeTableName));
    ctx.state.record('PUBLIC_RT_ID', routeTableId);

    await ctx.followUps.required(`add default route via ${gatewayId}`, () =>
      network.createDefaultRoute(routeTableId, gatewayId)
    );
    const associationId = await ctx.followUps.required(`associate with ${subnetId}`, () =>
      network.associateRouteTable(routeTableId, subnetId)
    );
    ctx.state.record('PUBLIC_RT_ASSOC_ID', associationId);

    return { identifier: routeTableId };
  },

  async destroy(ctx, routeTableId) {
    const { network } = ctx.provider;
    const associationId = ctx.state.find('PUBLIC_RT_ASSOC_ID');
    if (associationId) {
      await ctx.followUps.optional(`disassociate ${associationId}`, () => network.disassociateRouteTable(associationId));
    }
    await network.deleteRouteTable(routeTableId);
  }
};

const securityGroupStep: ResourceStep = {
  kind: 'SecurityGroup',
  title: 'Security Group',
  primaryKey: 'SECURITY_GROUP_ID',
  ownedKeys: ['SECURITY_GROUP_ID'],

  async create(ctx) {
    const { securityGroups } = ctx.provider;
    const vpcId = ctx.state.require('VPC_ID', 'SecurityGroup');
    const { description, ingress } = ctx.config.security_group;

    const groupId = await securityGroups.createSecurityGroup({
      name: ctx.names.securityGroupName,
      description,
      vpcId,
      tags: ctx.naming.tagsFor(ctx.config, ctx.names.securityGroupName)
    });
    ctx.state.record('SECURITY_GROUP_ID', groupId);

    for (const rule of ingress) {
      await ctx.followUps.required(`allow port ${rule.port} from ${rule.cidr}`, () =>
        securityGroups.authorizeIngress(groupId, {
          port: rule.port,
          cidr: rule.cidr,
          description: rule.description
        })
      );
    }

    return { identifier: groupId };
  },

  async destroy(ctx, groupId) {
    await ctx.provider.securityGroups.deleteSecurityGroup(groupId);
  }
};

const instanceStep: ResourceStep = {
  kind: 'Instance',
  title: 'EC2 Instance',
  primaryKey: 'INSTANCE_ID',
  ownedKeys: ['INSTANCE_ID', 'AMI_ID', 'PUBLIC_IP', 'PRIVATE_IP', 'INSTANCE_AZ'],

  isReusable(check, config) {
    return isAcceptedInstanceState(check, config.instance.accepted_states);
  },

  async create(ctx) {
    const { instances } = ctx.provider;
    const { instance } = ctx.config;
    const keyName = ctx.state.require('KEY_NAME', 'Instance');
    const securityGroupId = ctx.state.require('SECURITY_GROUP_ID', 'Instance');
    const subnetId = ctx.state.require('PUBLIC_SUBNET_ID', 'Instance');

    const userData = ctx.templates.renderUserData({
      templatePath: instance.user_data_template,
      webPagePath: instance.web_page,
      instanceName: ctx.names.instanceName
    });

    const imageId = await instances.findLatestImage(instance.ami_name_filter);
    ctx.logger.info(`Latest AMI: ${imageId}`);
    ctx.state.record('AMI_ID', imageId);

    const instanceId = await instances.runInstance({
      imageId,
      instanceType: instance.type,
      keyName,
      securityGroupId,
      subnetId,
      userData: userData.base64,
      tags: ctx.naming.tagsFor(ctx.config, ctx.names.instanceName)
    });
    ctx.state.record('INSTANCE_ID', instanceId);

    ctx.logger.info(`Waiting for ${instanceId} to reach running (up to ${instance.wait_timeout_seconds}s)`);
    const wait = await instances.waitForRunning(instanceId, instance.wait_timeout_seconds);
    if (!wait.reached) {
      ctx.logger.warn(`Instance ${instanceId} not running yet: ${wait.reason ?? 'timed out'}`);
    }

    const details = await ctx.followUps.required('describe instance', () => instances.describeInstance(instanceId));
    if (details.publicIp) {
      ctx.state.record('PUBLIC_IP', details.publicIp);
    }
    if (details.privateIp) {
      ctx.state.record('PRIVATE_IP', details.privateIp);
    }
    if (details.availabilityZone) {
      ctx.state.record('INSTANCE_AZ', details.availabilityZone);
    }

    return { identifier: instanceId };
  },

  async destroy(ctx, instanceId) {
    const { instances } = ctx.provider;
    await instances.terminateInstance(instanceId);

    const timeout = ctx.config.instance.wait_timeout_seconds;
    ctx.logger.info(`Waiting for ${instanceId} to terminate (up to ${timeout}s)`);
    const wait = await instances.waitForTerminated(instanceId, timeout);
    if (!wait.reached) {
      ctx.logger.warn(`Instance ${instanceId} not terminated yet: ${wait.reason ?? 'timed out'}`);
    }
  }
};

const bucketStep: ResourceStep = {
  kind: 'Bucket',
  title: 'S3 Bucket',
  primaryKey: 'S3_BUCKET_NAME',
  ownedKeys: ['S3_BUCKET_NAME', 'WELCOME_FILE_URL'],

  async create(ctx) {
    const { storage } = ctx.provider;
    const { bucket } = ctx.config;
    const bucketName = ctx.naming.generateBucketName(bucket.name_prefix, ctx.now());

    await storage.createBucket(bucketName);
    ctx.state.record('S3_BUCKET_NAME', bucketName);

    await ctx.followUps.optional('tag bucket', () =>
      storage.tagBucket(bucketName, ctx.naming.tagsFor(ctx.config, bucketName))
    );
    if (bucket.versioning) {
      await ctx.followUps.optional('enable versioning', () => storage.enableVersioning(bucketName));
    }
    if (bucket.public_access) {
      await ctx.followUps.optional('configure public access', () => storage.allowPublicAccess(bucketName));
    }

    const welcomeFile = bucket.welcome_file;
    if (welcomeFile) {
      const upload = await ctx.followUps.required('upload welcome file', async () => {
        if (!existsSync(welcomeFile)) {
          throw new Error(`Welcome file not found: ${welcomeFile}`);
        }
        return storage.uploadFile(bucketName, basename(welcomeFile), welcomeFile);
      });
      ctx.logger.info(`File URL: ${upload.url}`);
      ctx.state.record('WELCOME_FILE_URL', upload.url);
    }

    return { identifier: bucketName };
  },

  async destroy(ctx, bucketName) {
    const { storage } = ctx.provider;
    const removed = await ctx.followUps.optional('empty bucket', () => storage.emptyBucket(bucketName));
    if (removed !== undefined) {
      ctx.logger.info(`Removed ${removed} object version(s) from ${bucketName}`);
    }
    await storage.deleteBucket(bucketName);
  }
};

export const RESOURCE_STEPS: Readonly<Record<ResourceKind, ResourceStep>> = {
  KeyPair: keyPairStep,
  Network: networkStep,
  Gateway: gatewayStep,
  PublicSubnet: publicSubnetStep,
  PrivateSubnet: privateSubnetStep,
  RouteTable: routeTableStep,
  SecurityGroup: securityGroupStep,
  Instance: instanceStep,
  Bucket: bucketStep
};

/**
 * State keys a kind reads before creating: the primary key of each dependency
 */
export function requiredKeys(kind: ResourceKind): StateKey[] {
  return RESOURCE_DEPENDENCIES[kind].map(dependency => RESOURCE_STEPS[dependency].primaryKey);
}
