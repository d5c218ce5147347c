/**
 * Querywise - Error Handler Middleware
 *
 * Turns thrown errors into `{error, code, statusCode, requestId}` bodies.
 * Pipeline failures never get here: `POST /query` answers those with an
 * envelope of its own.
 */

import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';

import { isProduction } from '../../utils/helpers.js';
import logger from '../../utils/logger.js';
import {
  AuthenticationError,
  DatabaseError,
  QuerywiseError,
  SchemaLoadError,
  ValidationError,
} from '../../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface ErrorResponse {
  error: string;
  code: string;
  statusCode: number;
  requestId?: string;
  details?: string[];
}

// body-parser failures carry a `type` next to their status
const BODY_PARSER_ERRORS: Record<string, { code: string; message: string }> = {
  'entity.parse.failed': { code: 'INVALID_JSON', message: 'Request body is not valid JSON' },
  'entity.too.large': { code: 'PAYLOAD_TOO_LARGE', message: 'Request body is too large' },
};

function bodyParserError(err: Error): { code: string; message: string; statusCode: number } | null {
  if (!('type' in err) || typeof err.type !== 'string' || !('status' in err)) {
    return null;
  }
  const known = BODY_PARSER_ERRORS[err.type];
  if (!known || typeof err.status !== 'number') {
    return null;
  }
  return { ...known, statusCode: err.status };
}

// =============================================================================
// Response Mapping
// =============================================================================

export function toErrorResponse(err: Error, requestId?: string): ErrorResponse {
  const base = requestId ? { requestId } : {};

  if (err instanceof ValidationError) {
    return {
      error: err.message,
      code: err.code,
      statusCode: err.statusCode,
      ...base,
      ...(err.validationErrors.length > 0 ? { details: err.validationErrors } : {}),
    };
  }

  // Driver text can name hosts and tables of the store database
  if (err instanceof DatabaseError && isProduction()) {
    return { error: 'Database unavailable', code: err.code, statusCode: 503, ...base };
  }

  if (err instanceof QuerywiseError) {
    return { error: err.message, code: err.code, statusCode: err.statusCode, ...base };
  }

  const parserError = bodyParserError(err);
  if (parserError) {
    return {
      error: parserError.message,
      code: parserError.code,
      statusCode: parserError.statusCode,
      ...base,
    };
  }

  return {
    error: isProduction() ? 'Internal server error' : err.message,
    code: 'INTERNAL_ERROR',
    statusCode: 500,
    ...base,
  };
}

// =============================================================================
// Middleware
// =============================================================================

export const errorHandler: ErrorRequestHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const response = toErrorResponse(err, req.requestId);

  if (err instanceof AuthenticationError) {
    res.setHeader('WWW-Authenticate', 'Bearer');
  }
  if (err instanceof SchemaLoadError) {
    res.setHeader('Retry-After', '30');
  }

  const logContext = {
    requestId: req.requestId,
    method: req.method,
    path: req.path,
    statusCode: response.statusCode,
    errorCode: response.code,
  };
  if (response.statusCode >= 500) {
    logger.error(err.message, { ...logContext, stack: err.stack });
  } else {
    logger.warn(err.message, logContext);
  }

  res.status(response.statusCode).json(response);
};

export const notFoundHandler = (req: Request, res: Response, _next: NextFunction): void => {
  logger.warn('Route not found', { requestId: req.requestId, method: req.method, path: req.path });

  const response: ErrorResponse = {
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND',
    statusCode: 404,
    requestId: req.requestId,
  };
  res.status(404).json(response);
};

/**
 * Forward a rejected handler promise to the error middleware
 */
export function asyncHandler<T>(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

export default errorHandler;
