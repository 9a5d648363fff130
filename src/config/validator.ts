import Joi from 'joi';
import { InfraConfig } from '../types/index.js';
import { ConfigValidationResult } from './types.js';
import { ConfigurationError } from '../errors/index.js';

const CIDR_PATTERN = /^([0-9]{1,3}\.){3}[0-9]{1,3}\/[0-9]{1,2}$/;

const cidr = (label: string) => Joi.string()
  .pattern(CIDR_PATTERN)
  .required()
  .messages({
    'string.pattern.base': `${label} must be an IPv4 CIDR block (e.g., 10.0.0.0/16)`
  });

// Joi schema for ProjectConfig
const projectConfigSchema = Joi.object({
  name: Joi.string()
    .pattern(/^[a-zA-Z0-9-_]+$/)
    .min(1)
    .max(50)
    .required()
    .messages({
      'string.pattern.base': 'Project name must contain only alphanumeric characters, hyphens, and underscores'
    }),
  tag_key: Joi.string().min(1).max(128).required(),
  tag_value: Joi.string().min(1).max(256).required()
});

// Joi schema for AWSConfig
const awsConfigSchema = Joi.object({
  region: Joi.string()
    .pattern(/^[a-z0-9-]+$/)
    .required()
    .messages({
      'string.pattern.base': 'AWS region must be a valid region identifier'
    }),
  profile: Joi.string()
    .optional()
    .messages({
      'string.base': 'AWS profile must be a string'
    })
});

const networkConfigSchema = Joi.object({
  vpc_cidr: cidr('VPC CIDR'),
  public_subnet_cidr: cidr('Public subnet CIDR'),
  private_subnet_cidr: cidr('Private subnet CIDR'),
  vpc_name: Joi.string().min(1).max(255).required(),
  public_subnet_name: Joi.string().min(1).max(255).required(),
  private_subnet_name: Joi.string().min(1).max(255).required()
});

const ingressRuleSchema = Joi.object({
  port: Joi.number()
    .integer()
    .min(0)
    .max(65535)
    .required()
    .messages({
      'number.min': 'Ingress port must be between 0 and 65535',
      'number.max': 'Ingress port must be between 0 and 65535'
    }),
  cidr: cidr('Ingress CIDR'),
  description: Joi.string().optional()
});

const securityGroupConfigSchema = Joi.object({
  name: Joi.string().min(1).max(255).required(),
  description: Joi.string().min(1).max(255).required(),
  ingress: Joi.array().items(ingressRuleSchema).required()
});

const instanceConfigSchema = Joi.object({
  type: Joi.string()
    .pattern(/^[a-z0-9-]+\.[a-z0-9]+$/)
    .required()
    .messages({
      'string.pattern.base': 'Instance type must look like family.size (e.g., t3.micro)'
    }),
  name: Joi.string().min(1).max(255).required(),
  key_name: Joi.string().min(1).max(255).required(),
  ami_name_filter: Joi.string().min(1).required(),
  user_data_template: Joi.string().min(1).required(),
  web_page: Joi.string().min(1).required(),
  accepted_states: Joi.array()
    .items(Joi.string().valid('pending', 'running', 'stopping', 'stopped'))
    .min(1)
    .required()
    .messages({
      'any.only': 'Accepted instance states must be pending, running, stopping or stopped'
    }),
  wait_timeout_seconds: Joi.number()
    .integer()
    .min(30)
    .max(3600)
    .required()
    .messages({
      'number.min': 'Wait timeout must be at least 30 seconds',
      'number.max': 'Wait timeout must be no more than 3600 seconds (1 hour)'
    })
});

const bucketConfigSchema = Joi.object({
  name_prefix: Joi.string()
    .pattern(/^[a-z0-9-]+$/)
    .min(3)
    .max(40)
    .required()
    .messages({
      'string.pattern.base': 'Bucket name prefix must contain only lowercase letters, digits, and hyphens',
      'string.min': 'Bucket name prefix must be at least 3 characters long',
      'string.max': 'Bucket name prefix must be no more than 40 characters long'
    }),
  // empty string disables the welcome file upload
  welcome_file: Joi.string().allow('').optional(),
  versioning: Joi.boolean().required(),
  public_access: Joi.boolean().required()
});

const pathsConfigSchema = Joi.object({
  state_file: Joi.string().min(1).required(),
  log_file: Joi.string().min(1).required(),
  key_dir: Joi.string().min(1).required()
});

// Main InfraConfig schema
const infraConfigSchema = Joi.object<InfraConfig>({
  project: projectConfigSchema.required(),
  aws: awsConfigSchema.required(),
  network: networkConfigSchema.required(),
  security_group: securityGroupConfigSchema.required(),
  instance: instanceConfigSchema.required(),
  bucket: bucketConfigSchema.required(),
  paths: pathsConfigSchema.required()
}).unknown(false);

function runSchema(config: unknown): Joi.ValidationResult<InfraConfig> {
  return infraConfigSchema.validate(config, {
    abortEarly: false,
    allowUnknown: false,
    stripUnknown: false
  });
}

/**
 * Validates a fully merged configuration object against the schema
 */
export function validateConfig(config: unknown): ConfigValidationResult {
  const { error } = runSchema(config);

  if (error) {
    return {
      valid: false,
      errors: error.details.map(detail => detail.message)
    };
  }

  return {
    valid: true,
    errors: []
  };
}

/**
 * Validates a configuration and returns the typed record
 * @throws ConfigurationError listing every violation
 */
export function validateAndNormalizeConfig(config: unknown): InfraConfig {
  const { error, value } = runSchema(config);

  if (error) {
    const errors = error.details.map(detail => detail.message);
    throw new ConfigurationError(`Configuration validation failed:\n${errors.join('\n')}`, {
      details: errors
    });
  }

  return value;
}

export function getConfigSchema(): Joi.ObjectSchema<InfraConfig> {
  return infraConfigSchema;
}
