/**
 * Querywise - Health API Route
 */

import { Router, type Request, type Response } from 'express';

import type { SchemaSnapshotSource } from '../../pipeline/types.js';

export interface HealthRouterOptions {
  serviceName: string;
  schema: SchemaSnapshotSource;
}

export function createHealthRouter(options: HealthRouterOptions): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get('/health', (_req: Request, res: Response) => {
    const snapshot = options.schema.current();
    res.json({
      status: 'healthy',
      service: options.serviceName,
      schemaTables: Object.keys(snapshot.tables).length,
      loadedAt: snapshot.loadedAt?.toISOString() ?? null,
    });
  });

  return router;
}

export default createHealthRouter;
