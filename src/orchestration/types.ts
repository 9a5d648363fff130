// Orchestration-specific types
import { InfraConfig, ResourceKind, StateKey } from '../types/index.js';
import { CloudProvider, ExistenceCheck } from '../provisioning/types.js';
import { ResourceOracle } from '../provisioning/oracle.js';
import { ResourceNames } from '../config/types.js';
import { ResourceNamingService } from '../config/naming.js';
import { TemplateEngine } from '../templates/template-engine.js';
import { Logger } from '../logging/logger.js';
import { StateStore } from '../state/state-store.js';
import { PipelineState } from './pipeline-state.js';

/**
 * Wraps a sub-call made after the primary identifier is recorded.
 * `required` failures fail the step with a PartialSuccessError;
 * `optional` failures are logged as warnings and yield undefined.
 */
export interface FollowUps {
  required<T>(subCall: string, action: () => Promise<T>): Promise<T>;
  optional<T>(subCall: string, action: () => Promise<T>): Promise<T | undefined>;
}

export interface StepContext {
  kind: ResourceKind;
  config: InfraConfig;
  names: ResourceNames;
  provider: CloudProvider;
  naming: ResourceNamingService;
  templates: TemplateEngine;
  state: PipelineState;
  logger: Logger;
  followUps: FollowUps;
  now: () => Date;
}

export interface StepCreation {
  identifier: string;
  /** An existing provider resource was taken over instead of created */
  adopted?: boolean;
}

export interface ResourceStep {
  kind: ResourceKind;
  title: string;
  primaryKey: StateKey;
  /** Every key this step writes, primary first; removed after deletion */
  ownedKeys: readonly StateKey[];
  /** Whether a present resource may be reused; presence alone when omitted */
  isReusable?(check: ExistenceCheck, config: InfraConfig): boolean;
  /** Brings a reused resource back in line with the resources it depends on */
  reconcile?(ctx: StepContext, identifier: string): Promise<void>;
  create(ctx: StepContext): Promise<StepCreation>;
  destroy(ctx: StepContext, identifier: string): Promise<void>;
}

export interface PlannedStep {
  kind: ResourceKind;
  step: string;
  title: string;
  selected: boolean;
  requires: ResourceKind[];
}

export interface ExecutionPlan {
  creation: PlannedStep[];
  teardown: PlannedStep[];
}

export interface PreflightReport {
  account: string;
  arn: string;
  region: string;
  availabilityZones: string[];
}

export interface OrchestratorOptions {
  config: InfraConfig;
  provider: CloudProvider;
  store: StateStore;
  logger: Logger;
  naming?: ResourceNamingService;
  templates?: TemplateEngine;
  oracle?: ResourceOracle;
  now?: () => Date;
  runId?: string;
}
