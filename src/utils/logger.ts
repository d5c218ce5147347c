import winston from 'winston';

import type { LoggingConfig } from './types.js';

const { combine, timestamp, printf, colorize, json, errors } = winston.format;

// Custom log format for development (human-readable)
const devFormat = printf(({ level, message, timestamp, ...metadata }) => {
  let msg = `${String(timestamp)} [${level}]: ${String(message)}`;

  if (Object.keys(metadata).length > 0) {
    // Filter out Symbol properties that Winston adds
    const cleanMetadata: Record<string, unknown> = {};
    for (const key of Object.keys(metadata)) {
      if (!key.startsWith('Symbol')) {
        cleanMetadata[key] = metadata[key];
      }
    }
    if (Object.keys(cleanMetadata).length > 0) {
      msg += ` ${JSON.stringify(cleanMetadata)}`;
    }
  }

  return msg;
});

// Determine log level from environment
const getLogLevel = (): string => {
  const envLevel = process.env['LOG_LEVEL'];
  if (envLevel) {
    return envLevel.toLowerCase();
  }
  if (process.env['NODE_ENV'] === 'test') {
    return 'error';
  }
  return process.env['NODE_ENV'] === 'production' ? 'info' : 'debug';
};

const buildFormat = (format: string | undefined): winston.Logform.Format => {
  const isDev = process.env['NODE_ENV'] !== 'production';

  if (format === 'json' || !isDev) {
    return combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }), errors({ stack: true }), json());
  }

  return combine(
    colorize({ all: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    errors({ stack: true }),
    devFormat
  );
};

const buildFileTransports = (logFilePath: string): winston.transport[] => [
  new winston.transports.File({
    filename: logFilePath,
    maxsize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
    tailable: true,
  }),
  // Separate error log file
  new winston.transports.File({
    filename: logFilePath.replace('.log', '.error.log'),
    level: 'error',
    maxsize: 10 * 1024 * 1024,
    maxFiles: 5,
    tailable: true,
  }),
];

const getTransports = (): winston.transport[] => {
  const transports: winston.transport[] = [new winston.transports.Console()];

  if (process.env['LOG_FILE_ENABLED'] === 'true') {
    transports.push(...buildFileTransports(process.env['LOG_FILE_PATH'] ?? './logs/querywise.log'));
  }

  return transports;
};

// Create the main logger instance
const logger = winston.createLogger({
  level: getLogLevel(),
  format: buildFormat(process.env['LOG_FORMAT']),
  transports: getTransports(),
  exitOnError: false,
});

/**
 * Apply the loaded logging section. Environment variables were already
 * folded into the config by the loader, so this only narrows or widens
 * what the environment-based defaults set up.
 */
export const configureLogger = (config: LoggingConfig): void => {
  logger.level = config.level;
  logger.format = buildFormat(config.format);

  const hasFileTransport = logger.transports.some(
    (transport) => transport instanceof winston.transports.File
  );
  if (config.fileEnabled && !hasFileTransport) {
    for (const transport of buildFileTransports(config.filePath)) {
      logger.add(transport);
    }
  }
};

// Request logger for HTTP requests
export interface RequestLogData {
  requestId: string;
  method: string;
  path: string;
  statusCode?: number;
  responseTimeMs?: number;
  customerId?: string;
  ipAddress?: string;
  userAgent?: string;
  error?: string;
}

export const logRequest = (data: RequestLogData): void => {
  const level = data.statusCode
    ? data.statusCode >= 500
      ? 'error'
      : data.statusCode >= 400
        ? 'warn'
        : 'info'
    : 'info';

  logger.log(level, `${data.method} ${data.path}`, {
    type: 'request',
    ...data,
  });
};

// Pipeline stage logger
export interface PipelineLogData {
  requestId: string;
  stage:
    | 'generated'
    | 'heuristic_fixed'
    | 'validated'
    | 'invalid'
    | 'debug_attempted'
    | 'executed'
    | 'execution_failed'
    | 'summarized'
    | 'failed';
  customerId?: string;
  query?: string;
  durationMs?: number;
  error?: string;
}

export const logPipeline = (data: PipelineLogData): void => {
  const level =
    data.stage === 'failed'
      ? 'warn'
      : data.stage === 'invalid' || data.stage === 'execution_failed'
        ? 'info'
        : 'debug';

  logger.log(level, `Pipeline ${data.stage}`, {
    type: 'pipeline',
    ...data,
    query: data.query?.substring(0, 200),
  });
};

// Config logger
export const logConfig = (message: string, data?: Record<string, unknown>): void => {
  logger.info(message, {
    type: 'config',
    ...data,
  });
};

// Startup/shutdown logger
export const logLifecycle = (
  event: 'startup' | 'shutdown' | 'ready' | 'error',
  message: string,
  data?: Record<string, unknown>
): void => {
  const level = event === 'error' ? 'error' : 'info';

  logger.log(level, `[${event.toUpperCase()}] ${message}`, {
    type: 'lifecycle',
    event,
    ...data,
  });
};

// Export the base logger for direct use
export default logger;
