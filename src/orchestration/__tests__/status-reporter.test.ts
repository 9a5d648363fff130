import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StateStore } from '../../state/state-store.js';
import { Logger } from '../../logging/logger.js';
import { StatusReporter, formatResourceStatus } from '../status-reporter.js';
import { FakeCloud } from './fake-provider.js';

describe('StatusReporter', () => {
  let dir: string;
  let cloud: FakeCloud;
  let logger: Logger;
  let store: StateStore;
  let reporter: StatusReporter;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'status-'));
    cloud = new FakeCloud();
    logger = Logger.create({ logFile: join(dir, 'setup.log'), terminal: false });
    store = new StateStore({ filePath: join(dir, '.env'), logger });
    reporter = new StatusReporter({ provider: cloud.provider(), store, logger, region: 'eu-west-1' });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should report every kind as not recorded for an empty state file', async () => {
    const report = await reporter.report();

    expect(report.resources).toHaveLength(9);
    expect(report.resources.every(resource => resource.presence === 'not-recorded')).toBe(true);
    expect(report.stateFile).toBe(join(dir, '.env'));
    expect(cloud.calls.size).toBe(0);
  });

  it('should check recorded identifiers against the provider', async () => {
    cloud.vpcs.add('vpc-1');
    cloud.instances.set('i-1', {
      state: 'running',
      spec: {
        imageId: 'ami-1',
        instanceType: 't3.micro',
        keyName: 'lab',
        securityGroupId: 'sg-1',
        subnetId: 'subnet-1',
        userData: '',
        tags: {}
      }
    });
    cloud.buckets.set('lab-bucket', ['welcome.txt', 'notes.txt']);
    store.put('VPC_ID', 'vpc-1');
    store.put('IGW_ID', 'igw-gone');
    store.put('INSTANCE_ID', 'i-1');
    store.put('PUBLIC_IP', '203.0.113.7');
    store.put('S3_BUCKET_NAME', 'lab-bucket');

    const report = await reporter.report();
    const byKind = new Map(report.resources.map(resource => [resource.kind, resource]));

    expect(byKind.get('Network')).toMatchObject({ presence: 'present', identifier: 'vpc-1' });
    expect(byKind.get('Gateway')).toMatchObject({ presence: 'absent', identifier: 'igw-gone' });
    expect(byKind.get('Instance')).toMatchObject({
      presence: 'present',
      status: 'running',
      publicIp: '203.0.113.7'
    });
    expect(byKind.get('Bucket')).toMatchObject({ presence: 'present', objectCount: 2 });
    expect(byKind.get('KeyPair')?.presence).toBe('not-recorded');
  });

  it('should mark a resource unknown when the check itself fails', async () => {
    store.put('VPC_ID', 'vpc-1');
    cloud.failOn('vpcExists', new Error('Throttling'));

    const report = await reporter.report();

    expect(report.resources.find(resource => resource.kind === 'Network')).toMatchObject({
      presence: 'unknown',
      identifier: 'vpc-1',
      error: 'Throttling'
    });
  });

  it('should log one block per resource', async () => {
    store.put('VPC_ID', 'vpc-1');
    cloud.vpcs.add('vpc-1');

    reporter.log(await reporter.report());

    const log = readFileSync(join(dir, 'setup.log'), 'utf-8');
    expect(log).toContain('[INFO] [main] 2. VPC:\n');
    expect(log).toContain('[INFO] [main]   Status: ✓ EXISTS\n');
    expect(log).toContain('[INFO] [main]   ID: vpc-1\n');
  });
});

describe('formatResourceStatus', () => {
  const base = { kind: 'Instance', title: 'EC2 Instance', key: 'INSTANCE_ID' } as const;

  it('should format each presence', () => {
    expect(formatResourceStatus({ ...base, presence: 'not-recorded' })).toEqual([
      'Status: Not found in state file'
    ]);
    expect(formatResourceStatus({ ...base, presence: 'absent', identifier: 'i-1' })).toEqual([
      'Status: ✗ NOT FOUND (in state file but not in AWS)',
      'ID: i-1'
    ]);
    expect(formatResourceStatus({ ...base, presence: 'absent', identifier: 'i-1', status: 'terminated' })).toEqual([
      'Status: ✗ NOT FOUND (State: terminated)',
      'ID: i-1'
    ]);
    expect(formatResourceStatus({ ...base, presence: 'unknown', identifier: 'i-1', error: 'Throttling' })).toEqual([
      'Status: ? UNKNOWN (Throttling)',
      'ID: i-1'
    ]);
    expect(formatResourceStatus({
      ...base,
      presence: 'present',
      identifier: 'i-1',
      status: 'running',
      publicIp: '203.0.113.7'
    })).toEqual([
      'Status: ✓ EXISTS (State: running)',
      'ID: i-1',
      'Public IP: 203.0.113.7'
    ]);
  });

  it('should label buckets by name', () => {
    expect(formatResourceStatus({
      kind: 'Bucket',
      title: 'S3 Bucket',
      key: 'S3_BUCKET_NAME',
      presence: 'present',
      identifier: 'lab-bucket',
      objectCount: 0
    })).toEqual(['Status: ✓ EXISTS', 'Name: lab-bucket', 'Objects: 0']);
  });
});
