/**
 * Querywise - Query API Routes
 *
 * Natural-language questions in, pipeline envelopes out. Every envelope,
 * failures included, is sent with HTTP 200.
 */

import { Router, type RequestHandler, type Request, type Response } from 'express';
import { z } from 'zod';

import { buildRequestContext, requireCustomer } from '../../auth/middleware.js';
import type { SchemaProvider } from '../../pipeline/schema-provider.js';
import type { QueryService } from '../../pipeline/service.js';
import { asyncHandler } from '../../server/middleware/errorHandler.js';
import { truncate } from '../../utils/helpers.js';
import logger from '../../utils/logger.js';
import { parseBody } from '../validation.js';

const QueryRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
});

export interface QueryRouterOptions {
  queryService: QueryService;
  schemaProvider: SchemaProvider;
  authenticate: RequestHandler;
}

export function createQueryRouter(options: QueryRouterOptions): Router {
  const { queryService, schemaProvider, authenticate } = options;
  const router = Router();

  /**
   * POST /query
   */
  router.post(
    '/query',
    authenticate,
    asyncHandler(async (req: Request, res: Response) => {
      const customer = requireCustomer(req);
      const body = parseBody(QueryRequestSchema, req.body);

      logger.info('Query request', {
        requestId: req.requestId,
        customerId: customer.customerId,
        question: truncate(body.query, 200),
      });

      const result = await queryService.process(body.query, buildRequestContext(req, customer));
      res.json(result);
    })
  );

  /**
   * POST /schema/refresh
   *
   * Reload the target database schema. A failed reload keeps the current
   * snapshot and answers 503.
   */
  router.post(
    '/schema/refresh',
    authenticate,
    asyncHandler(async (_req: Request, res: Response) => {
      const snapshot = await schemaProvider.refresh();
      res.json({
        success: true,
        tables: Object.keys(snapshot.tables).length,
        loadedAt: snapshot.loadedAt?.toISOString() ?? null,
      });
    })
  );

  return router;
}

export default createQueryRouter;
