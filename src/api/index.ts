/**
 * Querywise - API Module
 *
 * HTTP surface of the query service.
 */

import { Router, type RequestHandler } from 'express';

import type { AuthService } from '../auth/auth-service.js';
import { createAuthMiddleware } from '../auth/middleware.js';
import type { SchemaProvider } from '../pipeline/schema-provider.js';
import type { QueryService } from '../pipeline/service.js';
import type { PromptAdminStore } from '../storage/prompt-repository.js';
import { createAuthRouter } from './routes/auth.js';
import { createHealthRouter } from './routes/health.js';
import { createPromptsRouter } from './routes/prompts.js';
import { createQueryRouter } from './routes/query.js';

export { createAuthRouter } from './routes/auth.js';
export { createHealthRouter } from './routes/health.js';
export { createPromptsRouter } from './routes/prompts.js';
export { createQueryRouter } from './routes/query.js';
export { parseBody } from './validation.js';

export interface ApiDependencies {
  serviceName: string;
  authService: AuthService;
  queryService: QueryService;
  schemaProvider: SchemaProvider;
  promptStore: PromptAdminStore;
}

/**
 * All API routes on one router, mounted under the configured prefix
 */
export function createApiRouter(deps: ApiDependencies): Router {
  const authenticate: RequestHandler = createAuthMiddleware({ authService: deps.authService });
  const router = Router();

  router.use(createHealthRouter({ serviceName: deps.serviceName, schema: deps.schemaProvider }));
  router.use(createAuthRouter({ authService: deps.authService }));
  router.use(
    createQueryRouter({
      queryService: deps.queryService,
      schemaProvider: deps.schemaProvider,
      authenticate,
    })
  );
  router.use(createPromptsRouter({ promptStore: deps.promptStore, authenticate }));

  return router;
}

export default createApiRouter;
