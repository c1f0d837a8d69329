/**
 * Config Module
 *
 * Exports for programmatic config access.
 */

// Schema and types
export {
  AppConfigSchema,
  SearchConfigSchema,
  OpenAIConfigSchema,
} from './schema.js';
export type { AppConfig, SearchConfig, OpenAIConfig } from './schema.js';

// Defaults
export { DEFAULT_API_VERSION, DEFAULT_MAX_RETRIES, ENV_TEMPLATE } from './defaults.js';

// Loader
export { loadConfig } from './loader.js';

// Environment variables
export {
  loadEnv,
  getEnv,
  hasEnv,
  getMissingEnvVars,
  REQUIRED_ENV_VARS,
  SETUP_INSTRUCTIONS,
  EnvSchema,
  _clearEnvCache,
} from './env.js';
export type { EnvVars, RequiredEnvVar } from './env.js';

// Startup validation
export {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
  COMMANDS_REQUIRING_AZURE,
} from './startup-validation.js';
export type {
  StartupValidationResult,
  StartupValidationOptions,
} from './startup-validation.js';
