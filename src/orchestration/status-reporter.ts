import { v4 as uuidv4 } from 'uuid';
import { ResourceStatus, StatusReport } from '../types/index.js';
import { CloudProvider } from '../provisioning/types.js';
import { ResourceOracle } from '../provisioning/oracle.js';
import { StateStore } from '../state/state-store.js';
import { Logger } from '../logging/logger.js';
import { describeError } from '../errors/index.js';
import { creationOrder } from './resource-graph.js';
import { RESOURCE_STEPS } from './steps.js';

export interface StatusReporterOptions {
  provider: CloudProvider;
  store: StateStore;
  logger: Logger;
  region: string;
  oracle?: ResourceOracle;
  now?: () => Date;
}

/**
 * Read-only view of every recorded resource, re-checked against the provider
 */
export class StatusReporter {
  private readonly oracle: ResourceOracle;

  constructor(private readonly options: StatusReporterOptions) {
    this.oracle = options.oracle ?? new ResourceOracle(options.provider);
  }

  async report(): Promise<StatusReport> {
    const startTime = Date.now();
    const { store, region } = this.options;
    const resources: ResourceStatus[] = [];

    for (const kind of creationOrder()) {
      resources.push(await this.check(kind));
    }

    return {
      resources,
      stateFile: store.filePath,
      metadata: {
        runId: uuidv4(),
        timestamp: this.options.now?.() ?? new Date(),
        duration: Date.now() - startTime,
        region,
        dryRun: false
      }
    };
  }

  /** Writes the report through the logger, one block per resource */
  log(report: StatusReport): void {
    const { logger } = this.options;
    report.resources.forEach((resource, index) => {
      logger.blank();
      logger.info(`${index + 1}. ${resource.title}:`);
      for (const line of formatResourceStatus(resource)) {
        logger.info(`  ${line}`);
      }
    });
  }

  private async check(kind: ResourceStatus['kind']): Promise<ResourceStatus> {
    const step = RESOURCE_STEPS[kind];
    const { store, provider } = this.options;
    const identifier = store.find(step.primaryKey);
    const base = { kind, title: step.title, key: step.primaryKey };

    if (identifier === undefined || identifier === '') {
      return { ...base, presence: 'not-recorded' };
    }

    try {
      const check = await this.oracle.exists(kind, identifier);
      const status: ResourceStatus = { ...base, presence: check.presence, identifier, status: check.status };

      if (kind === 'Instance' && check.status === 'running') {
        status.publicIp = store.find('PUBLIC_IP');
      }

      if (kind === 'Bucket' && check.presence === 'present') {
        try {
          status.objectCount = await provider.storage.countObjects(identifier);
        } catch (error) {
          this.options.logger.warn(`Could not count objects in ${identifier}: ${describeError(error)}`);
        }
      }

      return status;
    } catch (error) {
      return { ...base, presence: 'unknown', identifier, error: describeError(error) };
    }
  }
}

export function formatResourceStatus(resource: ResourceStatus): string[] {
  const label = resource.kind === 'Bucket' ? 'Name' : 'ID';

  switch (resource.presence) {
    case 'not-recorded':
      return ['Status: Not found in state file'];
    case 'unknown':
      return [`Status: ? UNKNOWN (${resource.error ?? 'check failed'})`, `${label}: ${resource.identifier ?? ''}`];
    case 'absent': {
      const detail = resource.status ? ` (State: ${resource.status})` : ' (in state file but not in AWS)';
      return [`Status: ✗ NOT FOUND${detail}`, `${label}: ${resource.identifier ?? ''}`];
    }
    case 'present': {
      const lines = [
        `Status: ✓ EXISTS${resource.status ? ` (State: ${resource.status})` : ''}`,
        `${label}: ${resource.identifier ?? ''}`
      ];
      if (resource.publicIp !== undefined) {
        lines.push(`Public IP: ${resource.publicIp}`);
      }
      if (resource.objectCount !== undefined) {
        lines.push(`Objects: ${resource.objectCount}`);
      }
      return lines;
    }
  }
}
