/**
 * Querywise - Configuration Module
 *
 * Barrel export file for configuration management
 */

// Export schema types and validators
export {
  ServerConfigSchema,
  PostgresConfigSchema,
  TargetDatabaseConfigSchema,
  LlmConfigSchema,
  AuthConfigSchema,
  LoggingConfigSchema,
  ConfigFileSchema,
  safeValidateConfigFile,
  formatValidationErrors,
} from './schema.js';

export type { ConfigFileInput, ConfigFileOutput } from './schema.js';

// Export loader functionality
export { ConfigLoader, loadConfig } from './loader.js';
