/**
 * Querywise - Request Body Validation
 */

import type { z } from 'zod';

import { formatValidationErrors } from '../config/schema.js';
import { ValidationError } from '../utils/types.js';

/**
 * Parse a request body or throw a 400 listing every problem
 */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown, message = 'Invalid request body'): z.output<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(message, formatValidationErrors(result.error));
  }
  return result.data;
}
