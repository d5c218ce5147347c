/**
 * Querywise - Prompt Management API Routes
 */

import { Router, type RequestHandler, type Request, type Response } from 'express';
import { z } from 'zod';

import { requireCustomer } from '../../auth/middleware.js';
import { PROMPT_IDS } from '../../pipeline/prompts.js';
import type { PromptAdminStore } from '../../storage/prompt-repository.js';
import { asyncHandler } from '../../server/middleware/errorHandler.js';
import { parseBody } from '../validation.js';

const PromptRequestSchema = z.object({
  prompt_id: z.enum(PROMPT_IDS),
  prompt_text: z.string().min(1),
  description: z.string().optional(),
});

export interface PromptsRouterOptions {
  promptStore: PromptAdminStore;
  authenticate: RequestHandler;
}

export function createPromptsRouter(options: PromptsRouterOptions): Router {
  const { promptStore, authenticate } = options;
  const router = Router();

  router.use('/prompts', authenticate);

  /**
   * POST /prompts
   *
   * Create or replace one of the caller's own prompts. Defaults are only
   * written by the startup seed.
   */
  router.post(
    '/prompts',
    asyncHandler(async (req: Request, res: Response) => {
      const customer = requireCustomer(req);
      const body = parseBody(PromptRequestSchema, req.body);

      await promptStore.upsert({
        promptId: body.prompt_id,
        promptText: body.prompt_text,
        description: body.description,
        customerId: customer.customerId,
        isDefault: false,
      });

      res.json({
        success: true,
        message: `Prompt '${body.prompt_id}' created or updated successfully`,
      });
    })
  );

  /**
   * GET /prompts
   */
  router.get(
    '/prompts',
    asyncHandler(async (req: Request, res: Response) => {
      const customer = requireCustomer(req);
      const prompts = await promptStore.listForCustomer(customer.customerId);
      res.json({ success: true, prompts });
    })
  );

  /**
   * GET /prompts/info
   */
  router.get(
    '/prompts/info',
    asyncHandler(async (_req: Request, res: Response) => {
      const info = await promptStore.getInfo();
      res.json({
        success: true,
        info: {
          default_prompts: info.defaultPrompts.map((prompt) => ({
            prompt_id: prompt.promptId,
            description: prompt.description,
          })),
          customer_prompts: info.customerPrompts.map((entry) => ({
            customer_id: entry.customerId,
            count: entry.count,
          })),
        },
      });
    })
  );

  return router;
}

export default createPromptsRouter;
