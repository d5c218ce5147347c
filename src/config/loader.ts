/**
 * Querywise - Configuration Loader
 * Handles loading and validation of configuration
 */

import fs from 'fs';
import path from 'path';

import { parse as parseYaml } from 'yaml';

import logger, { logConfig } from '../utils/logger.js';
import { ConfigurationError } from '../utils/types.js';
import type { PostgresConfig, QuerywiseConfig } from '../utils/types.js';

import {
  type ConfigFileOutput,
  LogFormatSchema,
  LogLevelSchema,
  formatValidationErrors,
  safeValidateConfigFile,
} from './schema.js';

const DEFAULT_CONFIG_PATH = './config/querywise.config.yaml';

const NODE_ENVS = ['development', 'production', 'test'] as const;

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Variable Helpers
// =============================================================================

function getEnvString(env: Env, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvInt(env: Env, key: string): number | undefined {
  const value = env[key];
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

function getEnvBool(env: Env, key: string): boolean | undefined {
  const value = env[key];
  if (value === undefined) {
    return undefined;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvEnum<T extends string>(env: Env, key: string, values: readonly T[]): T | undefined {
  const value = getEnvString(env, key)?.toLowerCase();
  return values.find((candidate) => candidate === value);
}

// =============================================================================
// Configuration Loader Class
// =============================================================================

export class ConfigLoader {
  private configPath: string;
  private env: Env;

  constructor(configPath?: string, env: Env = process.env) {
    this.env = env;
    this.configPath =
      configPath ?? getEnvString(env, 'CONFIG_FILE_PATH') ?? DEFAULT_CONFIG_PATH;
  }

  /**
   * Load configuration from file and environment variables
   */
  public async load(): Promise<QuerywiseConfig> {
    const fileConfig = await this.readConfigFile();
    const config = this.buildConfig(fileConfig);

    if (!config.auth.secretKey) {
      throw new ConfigurationError('SECRET_KEY must be set (auth.secretKey or SECRET_KEY env)');
    }

    return config;
  }

  /**
   * Read and validate the config file. Anything unreadable or invalid is
   * logged and replaced by an empty file config.
   */
  private async readConfigFile(): Promise<ConfigFileOutput> {
    if (!fs.existsSync(this.configPath)) {
      logConfig('No config file found, using defaults and environment variables', {
        path: this.configPath,
      });
      return {};
    }

    let raw: unknown;
    try {
      const fileContent = await fs.promises.readFile(this.configPath, 'utf-8');
      const extension = path.extname(this.configPath).toLowerCase();

      if (extension === '.yaml' || extension === '.yml') {
        raw = parseYaml(fileContent);
      } else if (extension === '.json') {
        raw = JSON.parse(fileContent);
      } else {
        throw new Error(`Unsupported config file format: ${extension}`);
      }
    } catch (error) {
      logger.warn('Failed to load config file, using defaults', {
        path: this.configPath,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }

    const result = safeValidateConfigFile(raw ?? {});
    if (!result.success) {
      logger.warn('Invalid config file, using defaults', {
        path: this.configPath,
        errors: formatValidationErrors(result.error),
      });
      return {};
    }

    logConfig('Configuration file loaded', { path: this.configPath });
    return result.data;
  }

  /**
   * Build configuration with environment variable overrides
   */
  private buildConfig(fileConfig: ConfigFileOutput): QuerywiseConfig {
    const env = this.env;
    const nodeEnv = getEnvEnum(env, 'NODE_ENV', NODE_ENVS) ?? 'development';
    const database = fileConfig.database;

    return {
      server: {
        port: getEnvInt(env, 'PORT') ?? fileConfig.server?.port ?? 8000,
        host: getEnvString(env, 'HOST') ?? fileConfig.server?.host ?? '0.0.0.0',
        nodeEnv,
        apiPrefix: getEnvString(env, 'API_PREFIX') ?? fileConfig.server?.apiPrefix ?? '/api/v1',
      },

      database: {
        ...this.buildPostgresConfig('POSTGRES', database),
        schemaName: getEnvString(env, 'POSTGRES_SCHEMA') ?? database?.schemaName ?? 'public',
        statementTimeoutMs:
          getEnvInt(env, 'POSTGRES_STATEMENT_TIMEOUT_MS') ?? database?.statementTimeoutMs ?? 30000,
        sampleRows: getEnvInt(env, 'SCHEMA_SAMPLE_ROWS') ?? database?.sampleRows ?? 3,
      },

      store: this.buildPostgresConfig('STORE_POSTGRES', fileConfig.store),

      llm: {
        apiKey: getEnvString(env, 'OPENAI_API_KEY') ?? fileConfig.llm?.apiKey,
        model: getEnvString(env, 'LLM_MODEL') ?? fileConfig.llm?.model ?? 'gpt-4o',
        generationFallbackModel:
          getEnvString(env, 'LLM_GENERATION_FALLBACK_MODEL') ??
          fileConfig.llm?.generationFallbackModel ??
          'gpt-4',
        debugFallbackModel:
          getEnvString(env, 'LLM_DEBUG_FALLBACK_MODEL') ??
          fileConfig.llm?.debugFallbackModel ??
          'gpt-3.5-turbo',
        timeoutMs: getEnvInt(env, 'LLM_TIMEOUT_MS') ?? fileConfig.llm?.timeoutMs ?? 60000,
        summaryMaxRows:
          getEnvInt(env, 'SUMMARY_MAX_ROWS') ?? fileConfig.llm?.summaryMaxRows ?? 10,
      },

      auth: {
        secretKey: getEnvString(env, 'SECRET_KEY') ?? fileConfig.auth?.secretKey ?? '',
        accessTokenExpireMinutes:
          getEnvInt(env, 'ACCESS_TOKEN_EXPIRE_MINUTES') ??
          fileConfig.auth?.accessTokenExpireMinutes ??
          30,
      },

      logging: {
        level:
          getEnvEnum(env, 'LOG_LEVEL', LogLevelSchema.options) ?? fileConfig.logging?.level ?? 'info',
        format:
          getEnvEnum(env, 'LOG_FORMAT', LogFormatSchema.options) ?? fileConfig.logging?.format ?? 'json',
        fileEnabled:
          getEnvBool(env, 'LOG_FILE_ENABLED') ?? fileConfig.logging?.fileEnabled ?? false,
        filePath:
          getEnvString(env, 'LOG_FILE_PATH') ??
          fileConfig.logging?.filePath ??
          './logs/querywise.log',
      },

      configFilePath: this.configPath,
    };
  }

  /**
   * Both databases share a shape; the env prefix tells them apart.
   */
  private buildPostgresConfig(
    prefix: string,
    section: Partial<PostgresConfig> | undefined
  ): PostgresConfig {
    const env = this.env;
    return {
      host: getEnvString(env, `${prefix}_HOST`) ?? section?.host ?? 'localhost',
      port: getEnvInt(env, `${prefix}_PORT`) ?? section?.port ?? 5432,
      database: getEnvString(env, `${prefix}_DB`) ?? section?.database ?? 'querywise',
      user: getEnvString(env, `${prefix}_USER`) ?? section?.user ?? 'querywise',
      password: getEnvString(env, `${prefix}_PASSWORD`) ?? section?.password ?? '',
      ssl: getEnvBool(env, `${prefix}_SSL`) ?? section?.ssl ?? false,
      poolMax: getEnvInt(env, `${prefix}_POOL_MAX`) ?? section?.poolMax ?? 10,
    };
  }
}

export async function loadConfig(configPath?: string): Promise<QuerywiseConfig> {
  return new ConfigLoader(configPath).load();
}

export default ConfigLoader;
