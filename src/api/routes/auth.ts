/**
 * Querywise - Authentication API Routes
 *
 * Token issuance and customer registration. Both are public.
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';

import type { AuthService } from '../../auth/auth-service.js';
import { asyncHandler } from '../../server/middleware/errorHandler.js';
import { AuthenticationError } from '../../utils/types.js';
import { parseBody } from '../validation.js';

// =============================================================================
// Request Schemas
// =============================================================================

/**
 * OAuth2 password form (`username`) or JSON (`customer_id`)
 */
const TokenRequestSchema = z
  .object({
    username: z.string().min(1).optional(),
    customer_id: z.string().min(1).optional(),
    password: z.string().min(1),
  })
  .refine((body) => body.username !== undefined || body.customer_id !== undefined, {
    message: 'username or customer_id is required',
    path: ['username'],
  });

const CreateCustomerSchema = z.object({
  customer_id: z.string().trim().min(1).max(255),
  password: z.string().min(1),
  openai_api_key: z.string().min(1).optional(),
});

// =============================================================================
// Router
// =============================================================================

export interface AuthRouterOptions {
  authService: AuthService;
}

export function createAuthRouter(options: AuthRouterOptions): Router {
  const { authService } = options;
  const router = Router();

  /**
   * POST /auth/token
   */
  router.post(
    '/auth/token',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseBody(TokenRequestSchema, req.body);
      const customerId = body.customer_id ?? body.username ?? '';

      const customer = await authService.authenticateCustomer(customerId, body.password);
      if (!customer) {
        throw new AuthenticationError('Incorrect customer ID or password');
      }

      res.json(await authService.createAccessToken(customer.customerId));
    })
  );

  /**
   * POST /customers
   */
  router.post(
    '/customers',
    asyncHandler(async (req: Request, res: Response) => {
      const body = parseBody(CreateCustomerSchema, req.body);

      await authService.registerCustomer({
        customerId: body.customer_id,
        password: body.password,
        openaiApiKey: body.openai_api_key,
      });

      res.json({ success: true, message: 'Customer credentials created successfully' });
    })
  );

  return router;
}

export default createAuthRouter;
