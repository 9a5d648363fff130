import { DeploymentError, ResourceKind, StateKey } from '../types/index.js';

export interface InfraErrorOptions {
  cause?: unknown;
  details?: unknown;
  remediation?: string;
}

/**
 * Base class for every failure the provisioner reports. Carries a stable code
 * so results and logs can be matched without parsing messages.
 */
export abstract class InfraError extends Error {
  abstract readonly code: string;
  readonly details?: unknown;
  readonly remediation?: string;

  constructor(message: string, options: InfraErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.details = options.details;
    this.remediation = options.remediation;
  }

  toDeploymentError(): DeploymentError {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      remediation: this.remediation
    };
  }
}

export class PreflightError extends InfraError {
  readonly code = 'PREFLIGHT_FAILED';
}

export class ConfigurationError extends InfraError {
  readonly code = 'CONFIGURATION_INVALID';
}

export class GraphError extends InfraError {
  readonly code = 'GRAPH_INVALID';
}

export class StateKeyNotFoundError extends InfraError {
  readonly code = 'STATE_KEY_NOT_FOUND';

  constructor(readonly key: StateKey, stateFile: string) {
    super(`Key not found in state file ${stateFile}: ${key}`);
  }
}

export class StateFileMissingError extends InfraError {
  readonly code = 'STATE_FILE_MISSING';

  constructor(readonly stateFile: string) {
    super(`State file not found: ${stateFile}`, {
      remediation: 'Nothing has been recorded; run deploy first or pass the right --config'
    });
  }
}

export class DependencyMissingError extends InfraError {
  readonly code = 'DEPENDENCY_MISSING';

  constructor(readonly key: StateKey, readonly kind: ResourceKind) {
    super(`${key} not found in state file; required by ${kind}`, {
      remediation: `Create the resource that records ${key} first, or drop it from --skip`
    });
  }
}

export class ProviderCallError extends InfraError {
  readonly code = 'PROVIDER_CALL_FAILED';

  constructor(readonly operation: string, cause: unknown) {
    super(`Failed to ${operation}: ${describeError(cause)}`, { cause });
  }
}

export class PartialSuccessError extends InfraError {
  readonly code = 'PARTIAL_SUCCESS';

  constructor(readonly kind: ResourceKind, readonly recorded: StateKey[], subCall: string, cause: unknown) {
    super(`${kind} created but ${subCall} failed: ${describeError(cause)}`, {
      cause,
      details: { recorded },
      remediation: 'The resource was left in place and recorded; re-run deploy after fixing the cause, or run destroy'
    });
  }
}

export function isInfraError(error: unknown): error is InfraError {
  return error instanceof InfraError;
}

/**
 * Raw text of a provider or runtime error, without the SDK's stack noise.
 */
export function describeError(error: unknown): string {
  if (error instanceof InfraError) {
    return error.message;
  }
  if (error instanceof Error) {
    return error.name && error.name !== 'Error' && !error.message.startsWith(error.name)
      ? `${error.name}: ${error.message}`
      : error.message;
  }
  return String(error);
}

export function toDeploymentError(error: unknown): DeploymentError {
  if (isInfraError(error)) {
    return error.toDeploymentError();
  }
  return {
    code: 'UNEXPECTED_ERROR',
    message: describeError(error),
    details: error
  };
}
