/**
 * Querywise - Core Type Definitions
 */

// =============================================================================
// Server Configuration Types
// =============================================================================

export interface ServerConfig {
  port: number;
  host: string;
  nodeEnv: 'development' | 'production' | 'test';
  apiPrefix: string;
}

// =============================================================================
// Database Configuration Types
// =============================================================================

export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl: boolean;
  poolMax: number;
}

/**
 * The database questions are answered against. Queries issued here are
 * generated, so every statement carries a server-side timeout.
 */
export interface TargetDatabaseConfig extends PostgresConfig {
  schemaName: string;
  statementTimeoutMs: number;
  sampleRows: number;
}

// =============================================================================
// LLM Configuration Types
// =============================================================================

export interface LlmConfig {
  apiKey?: string;
  model: string;
  generationFallbackModel: string;
  debugFallbackModel: string;
  timeoutMs: number;
  summaryMaxRows: number;
}

// =============================================================================
// Logging Types
// =============================================================================

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'http' | 'debug';
  format: 'json' | 'pretty';
  fileEnabled: boolean;
  filePath: string;
}

// =============================================================================
// Authentication Types
// =============================================================================

export interface AuthConfig {
  secretKey: string;
  accessTokenExpireMinutes: number;
}

// =============================================================================
// Main Configuration Type
// =============================================================================

export interface QuerywiseConfig {
  server: ServerConfig;
  database: TargetDatabaseConfig;
  store: PostgresConfig;
  llm: LlmConfig;
  auth: AuthConfig;
  logging: LoggingConfig;
  configFilePath: string;
}

// =============================================================================
// Request Augmentation
// =============================================================================

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      startTime?: number;
    }
  }
}

// =============================================================================
// Error Types
// =============================================================================

export class QuerywiseError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = 'QuerywiseError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends QuerywiseError {
  constructor(message: string) {
    super(message, 500, 'CONFIGURATION_ERROR', true);
    this.name = 'ConfigurationError';
  }
}

export class DatabaseError extends QuerywiseError {
  constructor(message: string) {
    super(message, 500, 'DATABASE_ERROR', true);
    this.name = 'DatabaseError';
  }
}

export class ValidationError extends QuerywiseError {
  public readonly validationErrors: string[];

  constructor(message: string, validationErrors: string[] = []) {
    super(message, 400, 'VALIDATION_ERROR', true);
    this.name = 'ValidationError';
    this.validationErrors = validationErrors;
  }
}

export class AuthenticationError extends QuerywiseError {
  constructor(message = 'Could not validate credentials') {
    super(message, 401, 'UNAUTHORIZED', true);
    this.name = 'AuthenticationError';
  }
}

/**
 * Raised when introspecting the target database fails. The previous schema
 * snapshot stays in place.
 */
export class SchemaLoadError extends QuerywiseError {
  constructor(message: string) {
    super(message, 503, 'SCHEMA_LOAD_ERROR', true);
    this.name = 'SchemaLoadError';
  }
}

/**
 * A validated statement the database rejected. The message is the driver's
 * own text, which is what the repair step needs.
 */
export class ExecutionError extends QuerywiseError {
  public readonly sqlState?: string;

  constructor(message: string, sqlState?: string) {
    super(message, 422, 'EXECUTION_ERROR', true);
    this.name = 'ExecutionError';
    this.sqlState = sqlState;
  }
}
