/**
 * Querywise - Request Logging Middleware
 * Logs incoming requests and their responses
 */

import type { Request, Response, NextFunction } from 'express';

import '../../auth/types.js';
import { getClientIp } from '../../utils/helpers.js';
import { logRequest, type RequestLogData } from '../../utils/logger.js';

export interface RequestLoggerOptions {
  /** Skip logging for certain paths (e.g., health checks) */
  skipPaths?: string[];
}

/**
 * Creates a request logging middleware
 */
export function requestLogger(
  options: RequestLoggerOptions = {}
): (req: Request, res: Response, next: NextFunction) => void {
  const { skipPaths = ['/health'] } = options;

  return (req: Request, res: Response, next: NextFunction): void => {
    if (skipPaths.some((path) => req.path.endsWith(path))) {
      next();
      return;
    }

    const startTime = req.startTime ?? Date.now();
    req.startTime = startTime;

    res.on('finish', () => {
      const logData: RequestLogData = {
        requestId: req.requestId ?? 'unknown',
        method: req.method,
        path: req.originalUrl,
        statusCode: res.statusCode,
        responseTimeMs: Date.now() - startTime,
        ipAddress: getClientIp(req.headers),
        userAgent: req.headers['user-agent'],
      };

      // Set by the auth middleware on protected routes
      if (req.customer) {
        logData.customerId = req.customer.customerId;
      }

      logRequest(logData);
    });

    next();
  };
}

export default requestLogger;
