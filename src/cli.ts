#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { confirm } from '@inquirer/prompts';
import { existsSync, writeFileSync } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import { InfraConfig } from './types/index.js';
import { createConfigLoader, createNamingService, renderInitConfig, DEFAULT_CONFIG_FILE } from './config/index.js';
import { Logger } from './logging/logger.js';
import { createRuntime, Runtime } from './orchestration/index.js';
import { buildExecutionPlan } from './orchestration/deployment-orchestrator.js';
import { nextSteps, summarizeDeployment, summarizeTeardown } from './orchestration/deployment-summary.js';
import { StepSelection } from './orchestration/resource-graph.js';
import { ExecutionPlan } from './orchestration/types.js';
import { describeError, isInfraError } from './errors/index.js';
import { readPackageVersion } from './version.js';

interface CommonOptions {
  config: string;
  verbose?: boolean;
}

interface DeployOptions extends CommonOptions {
  dryRun?: boolean;
  skip: string[];
  only?: string;
  yes?: boolean;
}

interface DestroyOptions extends CommonOptions {
  dryRun?: boolean;
  force?: boolean;
}

interface PlanOptions {
  skip: string[];
  only?: string;
}

interface InitOptions {
  output: string;
  force?: boolean;
}

interface CommandSession {
  config: InfraConfig;
  logger: Logger;
  runtime: Runtime;
}

let activeSpinner: Ora | undefined;

function terminal(line: string): void {
  if (activeSpinner) {
    activeSpinner.clear();
    console.log(line);
    activeSpinner.render();
    return;
  }
  console.log(line);
}

async function withSpinner<T>(text: string, task: () => Promise<T>): Promise<T> {
  const spinner = ora(text).start();
  activeSpinner = spinner;
  try {
    const result = await task();
    spinner.succeed();
    return result;
  } catch (error) {
    spinner.fail();
    throw error;
  } finally {
    activeSpinner = undefined;
  }
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function selectionOf(options: { skip: string[]; only?: string }): StepSelection {
  return { only: options.only, skip: options.skip };
}

async function openSession(command: string, options: CommonOptions & { dryRun?: boolean }): Promise<CommandSession> {
  const config = await createConfigLoader().loadOrDefault(options.config);
  const runId = uuidv4();
  const logger = Logger.create({
    logFile: config.paths.log_file,
    level: options.verbose ? 'DEBUG' : 'INFO',
    terminal
  });

  logger.startSession({ command, region: config.aws.region, runId });
  if (!existsSync(options.config)) {
    logger.info(`No configuration file at ${options.config}; using defaults`);
  } else {
    logger.debug(`Configuration loaded from ${options.config}`);
  }
  if (options.dryRun) {
    logger.warn('DRY RUN MODE: no resources will be created, changed or deleted');
  }

  return { config, logger, runtime: createRuntime({ config, logger, dryRun: options.dryRun, runId }) };
}

function fail(error: unknown, logger?: Logger): never {
  const message = describeError(error);
  if (logger) {
    logger.fatal(message);
  } else {
    console.error(chalk.red('❌ Error:'), message);
  }
  if (isInfraError(error) && error.remediation) {
    console.error(chalk.yellow(`💡 ${error.remediation}`));
  }
  process.exit(1);
}

function printPlan(plan: ExecutionPlan): void {
  console.log(chalk.blue('\n📋 Creation order:'));
  plan.creation.forEach((step, index) => {
    const requires = step.requires.length > 0 ? chalk.gray(` <- ${step.requires.join(', ')}`) : '';
    const marker = step.selected ? '' : chalk.yellow(' (skipped)');
    console.log(`  ${index + 1}. ${step.step} ${chalk.gray(`[${step.title}]`)}${requires}${marker}`);
  });

  console.log(chalk.blue('\n🗑️  Teardown order:'));
  plan.teardown.forEach((step, index) => {
    console.log(`  ${index + 1}. ${step.step} ${chalk.gray(`[${step.title}]`)}`);
  });
}

const program = new Command();

program
  .name('aws-lab')
  .description('Idempotent provisioner for a small AWS lab environment (VPC, EC2, S3)')
  .version(readPackageVersion());

program
  .command('deploy')
  .description('Create every missing resource in dependency order')
  .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_FILE)
  .option('-d, --dry-run', 'Show what would be created without making changes')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-s, --skip <step>', 'Skip a step (repeatable)', collect, [])
  .option('-o, --only <step>', 'Run a single step')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (options: DeployOptions) => {
    let session: CommandSession | undefined;
    try {
      const selection = selectionOf(options);
      const plan = buildExecutionPlan(selection);
      session = await openSession('deploy', options);
      const { config, logger, runtime } = session;

      await withSpinner('Running preflight checks...', () => runtime.orchestrator.preflight());

      const selected = plan.creation.filter(step => step.selected);
      logger.info(`Steps to run: ${selected.map(step => step.step).join(', ')}`);

      if (!options.yes && !options.dryRun) {
        const proceed = await confirm({
          message: `Provision ${selected.length} resource step(s) in ${config.aws.region}?`,
          default: false
        });
        if (!proceed) {
          logger.warn('Deployment cancelled by user');
          process.exit(1);
        }
      }

      const result = await runtime.orchestrator.deploy(selection);
      logger.summary('Deployment Summary', summarizeDeployment(result, runtime.store.snapshot()));

      const names = createNamingService().generateResourceNames(config);
      const steps = nextSteps(runtime.store.snapshot(), names.keyFilePath);
      if (result.success && steps.length > 0) {
        logger.summary('Next Steps', steps);
      }

      if (!result.success) {
        logger.error('Deployment failed; resources created so far remain recorded in the state file');
        process.exit(1);
      }
      logger.info(result.metadata.dryRun ? 'Dry run completed' : 'Deployment completed successfully');
    } catch (error) {
      fail(error, session?.logger);
    }
  });

program
  .command('destroy')
  .description('Delete every recorded resource in reverse dependency order')
  .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_FILE)
  .option('-d, --dry-run', 'Show what would be deleted without making changes')
  .option('-v, --verbose', 'Enable verbose logging')
  .option('-f, --force', 'Skip the confirmation prompt')
  .action(async (options: DestroyOptions) => {
    let session: CommandSession | undefined;
    try {
      session = await openSession('destroy', options);
      const { config, logger, runtime } = session;

      if (!runtime.store.exists()) {
        logger.error(`State file not found: ${config.paths.state_file}. Nothing to clean up`);
        process.exit(1);
      }

      await withSpinner('Running preflight checks...', () => runtime.orchestrator.preflight());

      const recorded = runtime.store.snapshot();
      logger.summary('Recorded Resources', recorded.length > 0
        ? recorded.map(entry => `${entry.key}=${entry.value}`)
        : ['(none)']);

      if (!options.force && !options.dryRun) {
        const proceed = await confirm({
          message: chalk.red(`Delete every recorded resource in ${config.aws.region}? This cannot be undone`),
          default: false
        });
        if (!proceed) {
          logger.warn('Cleanup cancelled by user');
          process.exit(1);
        }
      }

      const result = await runtime.orchestrator.destroy();
      logger.summary('Cleanup Summary', summarizeTeardown(result));

      if (!result.success) {
        logger.error('Some resources could not be deleted; re-run destroy or remove them in the AWS console');
        process.exit(1);
      }
      logger.info(result.metadata.dryRun ? 'Dry run completed' : 'All resources deleted');
    } catch (error) {
      fail(error, session?.logger);
    }
  });

program
  .command('status')
  .description('Check every recorded resource against AWS')
  .option('-c, --config <path>', 'Path to configuration file', DEFAULT_CONFIG_FILE)
  .option('-v, --verbose', 'Enable verbose logging')
  .action(async (options: CommonOptions) => {
    let session: CommandSession | undefined;
    try {
      session = await openSession('status', options);
      const { config, logger, runtime } = session;

      if (!runtime.store.exists()) {
        logger.error(`State file not found: ${config.paths.state_file}`);
        process.exit(1);
      }

      await withSpinner('Running preflight checks...', () => runtime.orchestrator.preflight());

      const report = await runtime.statusReporter.report();
      runtime.statusReporter.log(report);

      const present = report.resources.filter(resource => resource.presence === 'present').length;
      logger.summary('Status check complete', [
        `${present} of ${report.resources.length} resources exist`,
        `State file: ${report.stateFile}`
      ]);
    } catch (error) {
      fail(error, session?.logger);
    }
  });

program
  .command('plan')
  .description('Print the creation and teardown order without calling AWS')
  .option('-s, --skip <step>', 'Skip a step (repeatable)', collect, [])
  .option('-o, --only <step>', 'Run a single step')
  .action((options: PlanOptions) => {
    try {
      printPlan(buildExecutionPlan(selectionOf(options)));
    } catch (error) {
      fail(error);
    }
  });

program
  .command('init')
  .description('Write a commented default configuration file')
  .option('-o, --output <path>', 'Output configuration file path', DEFAULT_CONFIG_FILE)
  .option('-f, --force', 'Overwrite an existing file')
  .action((options: InitOptions) => {
    const spinner = ora('Initializing configuration...').start();

    try {
      if (existsSync(options.output) && !options.force) {
        throw new Error(`${options.output} already exists; pass --force to overwrite it`);
      }

      writeFileSync(options.output, renderInitConfig());

      spinner.succeed(`Configuration file created: ${options.output}`);
      console.log(chalk.green('\n✅ Next steps:'));
      console.log('1. Review and customize the configuration file');
      console.log('2. Ensure your AWS credentials are configured');
      console.log(`3. Run: ${chalk.cyan('aws-lab plan')} then ${chalk.cyan('aws-lab deploy')}`);
    } catch (error) {
      spinner.fail('Initialization failed');
      fail(error);
    }
  });

// Error handling for unknown commands
program.on('command:*', () => {
  console.error(chalk.red('❌ Invalid command. See --help for available commands.'));
  process.exit(1);
});

await program.parseAsync();
