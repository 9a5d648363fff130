import { v4 as uuidv4 } from 'uuid';
import {
  DeploymentResult,
  InfraConfig,
  ResourceKind,
  RunMetadata,
  StepOutcome,
  StepResult,
  TeardownResult
} from '../types/index.js';
import { CloudProvider, ExistenceCheck } from '../provisioning/types.js';
import { ResourceOracle } from '../provisioning/oracle.js';
import { StateStore } from '../state/state-store.js';
import { Logger } from '../logging/logger.js';
import { ResourceNames } from '../config/types.js';
import { ResourceNamingService } from '../config/naming.js';
import { TemplateEngine } from '../templates/template-engine.js';
import {
  PartialSuccessError,
  PreflightError,
  StateFileMissingError,
  describeError,
  isInfraError,
  toDeploymentError
} from '../errors/index.js';
import { PipelineState } from './pipeline-state.js';
import { RESOURCE_STEPS, requiredKeys } from './steps.js';
import {
  RESOURCE_DEPENDENCIES,
  STEP_NAMES,
  StepSelection,
  creationOrder,
  selectKinds,
  teardownOrder
} from './resource-graph.js';
import {
  ExecutionPlan,
  FollowUps,
  OrchestratorOptions,
  PlannedStep,
  PreflightReport,
  ResourceStep,
  StepContext
} from './types.js';

export const DRY_RUN_PREFIX = 'dry-run-';

/**
 * Creation and teardown order for a selection, without touching AWS
 */
export function buildExecutionPlan(selection: StepSelection = {}): ExecutionPlan {
  const selected = selectKinds(selection);
  const describe = (kind: ResourceKind): PlannedStep => ({
    kind,
    step: STEP_NAMES[kind],
    title: RESOURCE_STEPS[kind].title,
    selected: selected.has(kind),
    requires: [...RESOURCE_DEPENDENCIES[kind]]
  });

  return {
    creation: creationOrder().map(describe),
    teardown: teardownOrder().map(kind => ({ ...describe(kind), selected: true }))
  };
}

export class DeploymentOrchestrator {
  private readonly config: InfraConfig;
  private readonly provider: CloudProvider;
  private readonly store: StateStore;
  private readonly logger: Logger;
  private readonly oracle: ResourceOracle;
  private readonly naming: ResourceNamingService;
  private readonly templates: TemplateEngine;
  private readonly names: ResourceNames;
  private readonly now: () => Date;
  readonly dryRun: boolean;
  readonly runId: string;

  constructor(options: OrchestratorOptions) {
    this.config = options.config;
    this.provider = options.provider;
    this.store = options.store;
    this.logger = options.logger;
    this.dryRun = options.store.dryRun;
    this.oracle = options.oracle ?? new ResourceOracle(options.provider);
    this.naming = options.naming ?? new ResourceNamingService();
    this.templates = options.templates ?? new TemplateEngine();
    this.now = options.now ?? (() => new Date());
    this.runId = options.runId ?? uuidv4();
    this.names = this.naming.generateResourceNames(options.config);
  }

  /**
   * Credentials and region reachability, checked before any resource work
   */
  async preflight(): Promise<PreflightReport> {
    const region = this.config.aws.region;
    this.logger.section('Preflight Checks');

    try {
      const identity = await this.provider.identity.getCallerIdentity().catch((error: unknown) => {
        throw new PreflightError(`AWS credentials are not configured or invalid: ${describeError(error)}`, {
          cause: error,
          remediation: 'Run "aws configure" or set AWS_PROFILE / AWS_ACCESS_KEY_ID'
        });
      });
      this.logger.info(`AWS Account: ${identity.account}`);
      this.logger.info(`Caller: ${identity.arn}`);

      const availabilityZones = await this.provider.network.listAvailabilityZones().catch((error: unknown) => {
        throw new PreflightError(`Region ${region} is not reachable: ${describeError(error)}`, {
          cause: error,
          remediation: 'Check aws.region in the configuration file'
        });
      });
      if (availabilityZones.length === 0) {
        throw new PreflightError(`Region ${region} reports no available availability zones`);
      }
      this.logger.info(`Region ${region}: ${availabilityZones.join(', ')}`);

      this.logger.sectionEnd('Preflight Checks', true);
      return { account: identity.account, arn: identity.arn, region, availabilityZones };
    } catch (error) {
      this.logger.sectionEnd('Preflight Checks', false);
      throw error;
    }
  }

  plan(selection: StepSelection = {}): ExecutionPlan {
    return buildExecutionPlan(selection);
  }

  /**
   * Creation pipeline in dependency order. The first failing step stops the
   * run; resources created before it stay recorded.
   */
  async deploy(selection: StepSelection = {}): Promise<DeploymentResult> {
    const startTime = Date.now();
    const metadata = this.metadata();
    const selected = selectKinds(selection);
    const state = new PipelineState(this.store, this.dryRun);
    const steps: StepResult[] = [];

    if (this.store.initialize()) {
      this.logger.info(`Created state file: ${this.store.filePath}`);
    }

    for (const kind of creationOrder()) {
      if (!selected.has(kind)) {
        this.logger.info(`Skipping ${RESOURCE_STEPS[kind].title}`);
        steps.push(this.result(RESOURCE_STEPS[kind], 'skipped', 0));
        continue;
      }

      const result = await this.create(RESOURCE_STEPS[kind], state);
      steps.push(result);
      if (result.outcome === 'failed') {
        this.logger.error(`Deployment stopped at ${result.title}`);
        break;
      }
    }

    metadata.duration = Date.now() - startTime;
    const errors = steps.flatMap(step => step.error ? [step.error] : []);

    return {
      success: errors.length === 0,
      steps,
      errors: errors.length > 0 ? errors : undefined,
      metadata
    };
  }

  /**
   * Teardown in reverse dependency order. Every step is attempted; the state
   * file is cleared only when all of them succeed.
   */
  async destroy(): Promise<TeardownResult> {
    const startTime = Date.now();
    const metadata = this.metadata();

    if (!this.store.exists()) {
      throw new StateFileMissingError(this.store.filePath);
    }

    const backupFile = this.store.backup(this.now());
    const state = new PipelineState(this.store, this.dryRun);
    const steps: StepResult[] = [];

    for (const kind of teardownOrder()) {
      steps.push(await this.teardown(RESOURCE_STEPS[kind], state));
    }

    const errors = steps.flatMap(step => step.error ? [step.error] : []);
    const success = errors.length === 0;

    if (success && !this.dryRun) {
      this.store.clear();
    } else if (!success) {
      this.logger.warn(`${errors.length} resource(s) could not be deleted; state file kept`);
    }

    metadata.duration = Date.now() - startTime;
    return {
      success,
      steps,
      errors: success ? undefined : errors,
      backupFile,
      metadata
    };
  }

  private async create(step: ResourceStep, state: PipelineState): Promise<StepResult> {
    const startTime = Date.now();
    const logger = this.logger.child(STEP_NAMES[step.kind]);
    logger.section(step.title);

    try {
      for (const key of requiredKeys(step.kind)) {
        state.require(key, step.kind);
      }

      const recorded = state.find(step.primaryKey);
      const hasRecord = recorded !== undefined && recorded !== '';
      if (hasRecord) {
        const check = await this.oracle.exists(step.kind, recorded);
        if (this.isReusable(step, check)) {
          logger.info(`${step.title} already exists: ${recorded}`);
          if (step.reconcile) {
            state.beginStep();
            await step.reconcile(this.context(step, state, logger), recorded);
          }
          logger.sectionEnd(step.title, true);
          return this.result(step, 'reused', Date.now() - startTime, recorded);
        }
        logger.warn(`${step.title} ${recorded} is recorded but ${describeCheck(check)}; creating a new one`);
      }

      if (this.dryRun) {
        const placeholder = `${DRY_RUN_PREFIX}${STEP_NAMES[step.kind]}`;
        logger.info(`[DRY RUN] Would create ${step.title}`);
        state.record(step.primaryKey, placeholder);
        logger.sectionEnd(step.title, true);
        return this.result(step, 'planned', Date.now() - startTime, placeholder);
      }

      if (hasRecord) {
        state.remove(...step.ownedKeys.filter(key => key !== step.primaryKey));
      }

      logger.info(`Creating ${step.title}...`);
      state.beginStep();
      const creation = await step.create(this.context(step, state, logger));

      logger.info(`${step.title} ${creation.adopted ? 'reused' : 'created'}: ${creation.identifier}`);
      logger.sectionEnd(step.title, true);
      return this.result(step, creation.adopted ? 'reused' : 'created', Date.now() - startTime, creation.identifier);
    } catch (error) {
      this.logFailure(logger, error);
      logger.sectionEnd(step.title, false);
      return {
        ...this.result(step, 'failed', Date.now() - startTime, state.find(step.primaryKey)),
        error: toDeploymentError(error)
      };
    }
  }

  private async teardown(step: ResourceStep, state: PipelineState): Promise<StepResult> {
    const startTime = Date.now();
    const logger = this.logger.child(STEP_NAMES[step.kind]);
    const section = `Delete ${step.title}`;
    logger.section(section);

    const identifier = state.find(step.primaryKey);
    if (identifier === undefined || identifier === '') {
      logger.info(`No ${step.title} recorded; nothing to delete`);
      logger.sectionEnd(section, true);
      return this.result(step, 'already-absent', Date.now() - startTime);
    }

    try {
      const check = await this.oracle.exists(step.kind, identifier);
      if (check.presence === 'absent') {
        logger.info(`${step.title} ${identifier} ${describeCheck(check)}; already deleted`);
        state.remove(...step.ownedKeys);
        logger.sectionEnd(section, true);
        return this.result(step, 'already-absent', Date.now() - startTime, identifier);
      }

      if (this.dryRun) {
        logger.info(`[DRY RUN] Would delete ${step.title}: ${identifier}`);
        logger.sectionEnd(section, true);
        return this.result(step, 'planned', Date.now() - startTime, identifier);
      }

      logger.info(`Deleting ${step.title}: ${identifier}`);
      await step.destroy(this.context(step, state, logger), identifier);
      state.remove(...step.ownedKeys);

      logger.info(`${step.title} deleted: ${identifier}`);
      logger.sectionEnd(section, true);
      return this.result(step, 'deleted', Date.now() - startTime, identifier);
    } catch (error) {
      this.logFailure(logger, error);
      logger.sectionEnd(section, false);
      return {
        ...this.result(step, 'failed', Date.now() - startTime, identifier),
        error: toDeploymentError(error)
      };
    }
  }

  private isReusable(step: ResourceStep, check: ExistenceCheck): boolean {
    return step.isReusable ? step.isReusable(check, this.config) : check.presence === 'present';
  }

  private context(step: ResourceStep, state: PipelineState, logger: Logger): StepContext {
    return {
      kind: step.kind,
      config: this.config,
      names: this.names,
      provider: this.provider,
      naming: this.naming,
      templates: this.templates,
      state,
      logger,
      followUps: this.followUps(step, state, logger),
      now: this.now
    };
  }

  private followUps(step: ResourceStep, state: PipelineState, logger: Logger): FollowUps {
    return {
      async required<T>(subCall: string, action: () => Promise<T>): Promise<T> {
        try {
          return await action();
        } catch (error) {
          throw new PartialSuccessError(step.kind, state.recordedKeys(), subCall, error);
        }
      },
      async optional<T>(subCall: string, action: () => Promise<T>): Promise<T | undefined> {
        try {
          return await action();
        } catch (error) {
          logger.warn(`Could not ${subCall}, continuing: ${describeError(error)}`);
          return undefined;
        }
      }
    };
  }

  private logFailure(logger: Logger, error: unknown): void {
    logger.error(describeError(error));
    if (isInfraError(error) && error.remediation) {
      logger.info(`Remediation: ${error.remediation}`);
    }
  }

  private result(step: ResourceStep, outcome: StepOutcome, duration: number, identifier?: string): StepResult {
    return {
      kind: step.kind,
      step: STEP_NAMES[step.kind],
      title: step.title,
      outcome,
      identifier,
      duration
    };
  }

  private metadata(): RunMetadata {
    return {
      runId: this.runId,
      timestamp: this.now(),
      region: this.config.aws.region,
      dryRun: this.dryRun
    };
  }
}

function describeCheck(check: ExistenceCheck): string {
  if (check.presence === 'absent') {
    return check.status ? `is ${check.status}` : 'no longer exists';
  }
  return check.status ? `is in state ${check.status}` : 'is not reusable';
}
