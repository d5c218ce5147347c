/**
 * Querywise - Configuration Schema
 * Zod-based validation schemas for the configuration file
 */

import { z } from 'zod';

// =============================================================================
// Server Configuration Schema
// =============================================================================

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).optional(),
  host: z.string().optional(),
  apiPrefix: z
    .string()
    .regex(/^\/[\w\-/]*$/, 'apiPrefix must start with "/"')
    .optional(),
});

// =============================================================================
// Database Configuration Schemas
// =============================================================================

export const PostgresConfigSchema = z.object({
  host: z.string().optional(),
  port: z.number().int().min(1).max(65535).optional(),
  database: z.string().min(1).optional(),
  user: z.string().min(1).optional(),
  password: z.string().optional(),
  ssl: z.boolean().optional(),
  poolMax: z.number().int().min(1).optional(),
});

export const TargetDatabaseConfigSchema = PostgresConfigSchema.extend({
  schemaName: z.string().min(1).optional(),
  statementTimeoutMs: z.number().int().min(100).optional(),
  sampleRows: z.number().int().min(0).max(100).optional(),
});

// =============================================================================
// LLM Configuration Schema
// =============================================================================

export const LlmConfigSchema = z.object({
  apiKey: z.string().optional(),
  model: z.string().min(1).optional(),
  generationFallbackModel: z.string().min(1).optional(),
  debugFallbackModel: z.string().min(1).optional(),
  timeoutMs: z.number().int().min(1000).optional(),
  summaryMaxRows: z.number().int().min(1).max(1000).optional(),
});

// =============================================================================
// Auth Configuration Schema
// =============================================================================

export const AuthConfigSchema = z.object({
  secretKey: z.string().min(1).optional(),
  accessTokenExpireMinutes: z.number().int().min(1).optional(),
});

// =============================================================================
// Logging Configuration Schema
// =============================================================================

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'debug']);
export const LogFormatSchema = z.enum(['json', 'pretty']);

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.optional(),
  format: LogFormatSchema.optional(),
  fileEnabled: z.boolean().optional(),
  filePath: z.string().optional(),
});

// =============================================================================
// Complete Configuration File Schema
// =============================================================================

export const ConfigFileSchema = z.object({
  server: ServerConfigSchema.optional(),
  database: TargetDatabaseConfigSchema.optional(),
  store: PostgresConfigSchema.optional(),
  llm: LlmConfigSchema.optional(),
  auth: AuthConfigSchema.optional(),
  logging: LoggingConfigSchema.optional(),
});

// =============================================================================
// Type Exports
// =============================================================================

export type ConfigFileInput = z.input<typeof ConfigFileSchema>;
export type ConfigFileOutput = z.output<typeof ConfigFileSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

/**
 * Safely validate configuration file content (returns result object)
 */
export function safeValidateConfigFile(
  config: unknown
): z.SafeParseReturnType<ConfigFileInput, ConfigFileOutput> {
  return ConfigFileSchema.safeParse(config);
}

/**
 * Format Zod validation errors into readable messages
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
