export * from './types.js';
export { createAwsProvider } from './aws-provider.js';
export { ResourceOracle, isAcceptedInstanceState } from './oracle.js';
export { isNotFoundError } from './aws-errors.js';
export { objectUrl } from './s3-manager.js';
