/**
 * Querywise - Request ID Middleware
 * Assigns a unique identifier to each incoming request for tracing
 */

import type { Request, Response, NextFunction } from 'express';

import { generateRequestId } from '../../utils/helpers.js';
import '../../utils/types.js';

const REQUEST_ID_HEADER = 'x-request-id';
const REQUEST_ID_RESPONSE_HEADER = 'X-Request-ID';

/**
 * Reuse the caller's X-Request-ID when present, otherwise mint one. The id
 * is set on `req.requestId` and echoed in the response headers; it also
 * becomes the pipeline's request context id.
 */
export function requestIdMiddleware() {
  return (req: Request, res: Response, next: NextFunction): void => {
    const existingId = req.headers[REQUEST_ID_HEADER];
    const requestId =
      typeof existingId === 'string' && existingId.length > 0
        ? existingId
        : Array.isArray(existingId) && existingId[0]
          ? existingId[0]
          : generateRequestId();

    req.requestId = requestId;
    res.setHeader(REQUEST_ID_RESPONSE_HEADER, requestId);

    next();
  };
}

export default requestIdMiddleware;
