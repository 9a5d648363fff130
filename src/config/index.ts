export { InfraConfigLoader, createConfigLoader } from './loader.js';
export { validateConfig, validateAndNormalizeConfig, getConfigSchema } from './validator.js';
export { ResourceNamingService, createNamingService } from './naming.js';
export { defaultConfig, bundledAsset, DEFAULT_CONFIG_FILE } from './defaults.js';
export type { ConfigLoader, ConfigValidationResult, ResourceNames } from './types.js';
export { renderInitConfig } from './init-template.js';
