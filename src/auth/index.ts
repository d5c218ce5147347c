/**
 * Querywise - Authentication Module
 *
 * Barrel export file for the auth module
 */

// Types
export * from './types.js';

// Services
export { AuthService, hashPassword, verifyPassword } from './auth-service.js';

// Middleware
export {
  createAuthMiddleware,
  buildRequestContext,
  requireCustomer,
  type AuthMiddlewareOptions,
} from './middleware.js';
