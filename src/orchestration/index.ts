import { InfraConfig } from '../types/index.js';
import { CloudProvider } from '../provisioning/types.js';
import { createAwsProvider } from '../provisioning/aws-provider.js';
import { StateStore } from '../state/state-store.js';
import { Logger } from '../logging/logger.js';
import { DeploymentOrchestrator } from './deployment-orchestrator.js';
import { StatusReporter } from './status-reporter.js';

export { DeploymentOrchestrator, DRY_RUN_PREFIX, buildExecutionPlan } from './deployment-orchestrator.js';
export { summarizeDeployment, summarizeTeardown, nextSteps } from './deployment-summary.js';
export { StatusReporter, formatResourceStatus } from './status-reporter.js';
export { PipelineState } from './pipeline-state.js';
export { RESOURCE_STEPS, requiredKeys } from './steps.js';
export {
  RESOURCE_DEPENDENCIES,
  STEP_NAMES,
  creationOrder,
  teardownOrder,
  topologicalOrder,
  parseStepName,
  selectKinds
} from './resource-graph.js';
export type { StepSelection, DependencyGraph } from './resource-graph.js';
export type * from './types.js';

export interface RuntimeOptions {
  config: InfraConfig;
  logger: Logger;
  dryRun?: boolean;
  provider?: CloudProvider;
  runId?: string;
}

export interface Runtime {
  provider: CloudProvider;
  store: StateStore;
  orchestrator: DeploymentOrchestrator;
  statusReporter: StatusReporter;
}

/**
 * Wires the AWS provider, state store, orchestrator and reporter for one command
 */
export function createRuntime(options: RuntimeOptions): Runtime {
  const { config, logger } = options;
  const provider = options.provider ?? createAwsProvider({ region: config.aws.region, profile: config.aws.profile });
  const store = new StateStore({
    filePath: config.paths.state_file,
    logger: logger.child('state'),
    dryRun: options.dryRun
  });

  return {
    provider,
    store,
    orchestrator: new DeploymentOrchestrator({ config, provider, store, logger, runId: options.runId }),
    statusReporter: new StatusReporter({ provider, store, logger, region: config.aws.region })
  };
}
