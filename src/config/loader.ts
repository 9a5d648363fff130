// Configuration loading logic
import { readFile } from 'fs/promises';
import { parse as parseYaml } from 'yaml';
import { existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { InfraConfig } from '../types/index.js';
import { ConfigLoader, ConfigValidationResult } from './types.js';
import { validateAndNormalizeConfig, validateConfig } from './validator.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError, describeError } from '../errors/index.js';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration loader that supports YAML and JSON files with environment variable substitution
 */
export class InfraConfigLoader implements ConfigLoader {

  /**
   * Load, merge over the defaults, and validate a configuration file.
   * Template, web page and welcome file paths are resolved against the
   * directory holding the file.
   */
  async load(path: string): Promise<InfraConfig> {
    try {
      if (!existsSync(path)) {
        throw new Error(`Configuration file not found: ${path}`);
      }

      const content = await readFile(path, 'utf-8');

      let rawConfig: unknown;
      if (path.endsWith('.json')) {
        rawConfig = JSON.parse(content);
      } else if (path.endsWith('.yml') || path.endsWith('.yaml')) {
        rawConfig = parseYaml(content);
      } else {
        throw new Error(`Unsupported file format. Only .json, .yml, and .yaml files are supported.`);
      }

      const configWithEnvVars = this.resolveEnvironmentVariables(rawConfig);
      const mergedConfig = this.applyDefaults(configWithEnvVars);
      const config = validateAndNormalizeConfig(mergedConfig);

      return this.resolveFilePaths(config, dirname(resolve(path)));
    } catch (error) {
      throw new ConfigurationError(`Failed to load configuration from ${path}: ${describeError(error)}`, {
        cause: error,
        details: error instanceof ConfigurationError ? error.details : undefined
      });
    }
  }

  /**
   * Load the file when it exists, otherwise fall back to the built-in defaults
   */
  async loadOrDefault(path: string): Promise<InfraConfig> {
    if (!existsSync(path)) {
      return validateAndNormalizeConfig(defaultConfig());
    }
    return this.load(path);
  }

  validate(config: unknown): ConfigValidationResult {
    return validateConfig(config);
  }

  /**
   * Recursively resolve environment variables in configuration object
   * Supports ${VAR_NAME} and ${VAR_NAME:-default_value} syntax
   */
  private resolveEnvironmentVariables(value: unknown): unknown {
    if (typeof value === 'string') {
      return this.substituteEnvironmentVariables(value);
    }

    if (Array.isArray(value)) {
      return value.map(item => this.resolveEnvironmentVariables(item));
    }

    if (isPlainObject(value)) {
      const result: PlainObject = {};
      for (const [key, entry] of Object.entries(value)) {
        result[key] = this.resolveEnvironmentVariables(entry);
      }
      return result;
    }

    return value;
  }

  private substituteEnvironmentVariables(str: string): string {
    return str.replace(/\$\{([^}]+)\}/g, (match, varExpression: string) => {
      const [varName, defaultValue] = varExpression.split(':-');
      const envValue = process.env[varName];

      if (envValue !== undefined) {
        return envValue;
      }

      if (defaultValue !== undefined) {
        return defaultValue;
      }

      // Unset and no default: keep the placeholder so validation reports it
      return match;
    });
  }

  private applyDefaults(config: unknown): unknown {
    return this.deepMerge(defaultConfig(), config);
  }

  /**
   * Deep merge with the source taking precedence; arrays replace wholesale
   */
  private deepMerge(target: unknown, source: unknown): unknown {
    if (source === undefined || source === null) {
      return target;
    }
    if (!isPlainObject(target) || !isPlainObject(source)) {
      return source;
    }

    const result: PlainObject = { ...target };
    for (const [key, value] of Object.entries(source)) {
      result[key] = this.deepMerge(result[key], value);
    }
    return result;
  }

  private resolveFilePaths(config: InfraConfig, baseDir: string): InfraConfig {
    const welcomeFile = config.bucket.welcome_file;
    return {
      ...config,
      instance: {
        ...config.instance,
        user_data_template: resolve(baseDir, config.instance.user_data_template),
        web_page: resolve(baseDir, config.instance.web_page)
      },
      bucket: {
        ...config.bucket,
        welcome_file: welcomeFile ? resolve(baseDir, welcomeFile) : undefined
      }
    };
  }
}

export function createConfigLoader(): InfraConfigLoader {
  return new InfraConfigLoader();
}
