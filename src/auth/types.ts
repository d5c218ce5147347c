/**
 * Querywise - Authentication Types
 */

import type { CustomerRecord } from '../storage/customer-repository.js';

// =============================================================================
// Authentication Types
// =============================================================================

/**
 * The customer a request runs as. Carries no password material.
 */
export interface AuthenticatedCustomer {
  customerId: string;
  openaiApiKey: string | null;
  promptSettings: Readonly<Record<string, string>>;
  tokenExp?: Date;
}

export interface AccessToken {
  access_token: string;
  token_type: 'bearer';
}

export interface CustomerRegistration {
  customerId: string;
  password: string;
  openaiApiKey?: string;
}

export function toAuthenticatedCustomer(record: CustomerRecord, tokenExp?: Date): AuthenticatedCustomer {
  return {
    customerId: record.customerId,
    openaiApiKey: record.openaiApiKey,
    promptSettings: record.promptSettings,
    tokenExp,
  };
}

// =============================================================================
// Express Extensions
// =============================================================================

declare global {
  namespace Express {
    interface Request {
      customer?: AuthenticatedCustomer;
    }
  }
}
