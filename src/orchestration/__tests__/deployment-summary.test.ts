import { describe, it, expect } from 'vitest';
import { DeploymentResult, StepResult, TeardownResult } from '../../types/index.js';
import { formatStepResult, nextSteps, summarizeDeployment, summarizeTeardown } from '../deployment-summary.js';

const metadata = { runId: 'run-1', timestamp: new Date(0), region: 'eu-west-1', dryRun: false };

function step(overrides: Partial<StepResult>): StepResult {
  return { kind: 'Network', step: 'network', title: 'VPC', outcome: 'created', duration: 1, ...overrides };
}

describe('deployment summary', () => {
  it('should format a step with its identifier', () => {
    expect(formatStepResult(step({ identifier: 'vpc-1' }))).toBe('VPC: CREATED (vpc-1)');
    expect(formatStepResult(step({ outcome: 'already-absent' }))).toBe('VPC: ALREADY GONE');
  });

  it('should list steps and recorded state', () => {
    const result: DeploymentResult = {
      success: false,
      steps: [step({ identifier: 'vpc-1' }), step({ kind: 'Gateway', title: 'Internet Gateway', outcome: 'failed' })],
      metadata: { ...metadata, dryRun: true }
    };

    expect(summarizeDeployment(result, [{ key: 'VPC_ID', value: 'vpc-1' }])).toEqual([
      'Run: run-1 (dry run)',
      'Region: eu-west-1',
      'Result: FAILED',
      '',
      'Steps:',
      '  VPC: CREATED (vpc-1)',
      '  Internet Gateway: FAILED',
      '',
      'Recorded state:',
      '  VPC_ID=vpc-1'
    ]);
  });

  it('should mark an empty state', () => {
    const result: DeploymentResult = { success: true, steps: [], metadata };
    expect(summarizeDeployment(result, []).slice(-2)).toEqual(['Recorded state:', '  (empty)']);
  });

  it('should offer connection hints once the instance has an address', () => {
    expect(nextSteps([], 'keys/lab.pem')).toEqual([]);
    expect(nextSteps([
      { key: 'PUBLIC_IP', value: '203.0.113.7' },
      { key: 'WELCOME_FILE_URL', value: 'https://lab.s3.eu-west-1.amazonaws.com/welcome.txt' }
    ], 'keys/lab.pem')).toEqual([
      'Web server: http://203.0.113.7',
      'SSH: ssh -i keys/lab.pem ec2-user@203.0.113.7',
      'Welcome file: https://lab.s3.eu-west-1.amazonaws.com/welcome.txt'
    ]);
  });

  it('should count failed deletions', () => {
    const result: TeardownResult = {
      success: false,
      steps: [step({ outcome: 'failed', identifier: 'vpc-1' }), step({ kind: 'KeyPair', title: 'Key Pair', outcome: 'deleted' })],
      backupFile: '.env.backup.20240101_000000',
      metadata
    };

    expect(summarizeTeardown(result)).toEqual([
      'Run: run-1',
      'Result: FAILED (1 resource(s) not deleted)',
      '',
      '  VPC: FAILED (vpc-1)',
      '  Key Pair: DELETED',
      '',
      'State backup: .env.backup.20240101_000000'
    ]);
  });
});
