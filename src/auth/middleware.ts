/**
 * Querywise - Authentication Middleware
 *
 * Express middleware for bearer-token authentication
 */

import type { Request, Response, NextFunction } from 'express';

import type { RequestContext } from '../pipeline/types.js';
import { generateRequestId } from '../utils/helpers.js';
import logger from '../utils/logger.js';
import { AuthenticationError } from '../utils/types.js';
import type { AuthService } from './auth-service.js';
import type { AuthenticatedCustomer } from './types.js';

// =============================================================================
// Middleware Factory
// =============================================================================

export interface AuthMiddlewareOptions {
  authService: AuthService;
}

function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const [scheme, token] = header.split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token : null;
}

/**
 * Require a valid bearer token; the customer is attached as `req.customer`.
 * Failures go to the error handler, which answers 401 with a Bearer challenge.
 */
export function createAuthMiddleware(options: AuthMiddlewareOptions) {
  const { authService } = options;

  return async function authMiddleware(
    req: Request,
    _res: Response,
    next: NextFunction
  ): Promise<void> {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      next(new AuthenticationError('Not authenticated'));
      return;
    }

    try {
      req.customer = await authService.verifyAccessToken(token);
      next();
    } catch (error) {
      if (!(error instanceof AuthenticationError)) {
        logger.error('Authentication middleware error', {
          error: error instanceof Error ? error.message : String(error),
          path: req.path,
        });
      }
      next(error);
    }
  };
}

/**
 * Request-scoped context for the pipeline, built from the authenticated
 * customer.
 */
export function buildRequestContext(
  req: Request,
  customer: AuthenticatedCustomer | undefined = req.customer
): RequestContext {
  return {
    requestId: req.requestId ?? generateRequestId(),
    customerId: customer?.customerId,
    apiKey: customer?.openaiApiKey ?? undefined,
    promptOverrides: customer?.promptSettings,
  };
}

/**
 * The authenticated customer, for handlers mounted behind the auth middleware
 */
export function requireCustomer(req: Request): AuthenticatedCustomer {
  if (!req.customer) {
    throw new AuthenticationError('Not authenticated');
  }
  return req.customer;
}
