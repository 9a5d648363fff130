import { DeploymentResult, StateEntry, StateKey, StepOutcome, StepResult, TeardownResult } from '../types/index.js';

const OUTCOME_LABELS: Record<StepOutcome, string> = {
  created: 'CREATED',
  reused: 'EXISTS',
  planned: 'PLANNED',
  skipped: 'SKIPPED',
  deleted: 'DELETED',
  'already-absent': 'ALREADY GONE',
  failed: 'FAILED'
};

export function formatStepResult(step: StepResult): string {
  const identifier = step.identifier ? ` (${step.identifier})` : '';
  return `${step.title}: ${OUTCOME_LABELS[step.outcome]}${identifier}`;
}

function valueOf(snapshot: StateEntry[], key: StateKey): string | undefined {
  return snapshot.find(entry => entry.key === key)?.value;
}

export function summarizeDeployment(result: DeploymentResult, snapshot: StateEntry[]): string[] {
  const { metadata } = result;
  const lines = [
    `Run: ${metadata.runId}${metadata.dryRun ? ' (dry run)' : ''}`,
    `Region: ${metadata.region}`,
    `Result: ${result.success ? 'SUCCESS' : 'FAILED'}`,
    '',
    'Steps:',
    ...result.steps.map(step => `  ${formatStepResult(step)}`),
    '',
    'Recorded state:'
  ];

  if (snapshot.length === 0) {
    lines.push('  (empty)');
  } else {
    lines.push(...snapshot.map(entry => `  ${entry.key}=${entry.value}`));
  }

  return lines;
}

/**
 * How to reach the instance, once it has a public address
 */
export function nextSteps(snapshot: StateEntry[], keyFilePath: string): string[] {
  const publicIp = valueOf(snapshot, 'PUBLIC_IP');
  if (!publicIp) {
    return [];
  }

  const lines = [
    `Web server: http://${publicIp}`,
    `SSH: ssh -i ${keyFilePath} ec2-user@${publicIp}`
  ];
  const welcomeUrl = valueOf(snapshot, 'WELCOME_FILE_URL');
  if (welcomeUrl) {
    lines.push(`Welcome file: ${welcomeUrl}`);
  }
  return lines;
}

export function summarizeTeardown(result: TeardownResult): string[] {
  const failed = result.steps.filter(step => step.outcome === 'failed').length;
  const lines = [
    `Run: ${result.metadata.runId}${result.metadata.dryRun ? ' (dry run)' : ''}`,
    `Result: ${result.success ? 'SUCCESS' : `FAILED (${failed} resource(s) not deleted)`}`,
    '',
    ...result.steps.map(step => `  ${formatStepResult(step)}`)
  ];

  if (result.backupFile) {
    lines.push('', `State backup: ${result.backupFile}`);
  }

  return lines;
}
