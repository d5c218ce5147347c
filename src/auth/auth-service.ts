/**
 * Querywise - Authentication Service
 *
 * Customer credentials and HS256 bearer tokens.
 */

import bcrypt from 'bcryptjs';
import * as jose from 'jose';

import type { CustomerRecord, CustomerStore } from '../storage/customer-repository.js';
import logger from '../utils/logger.js';
import { AuthenticationError, ValidationError } from '../utils/types.js';
import type { AuthConfig } from '../utils/types.js';
import {
  toAuthenticatedCustomer,
  type AccessToken,
  type AuthenticatedCustomer,
  type CustomerRegistration,
} from './types.js';

// =============================================================================
// Password Hashing
// =============================================================================

const BCRYPT_ROUNDS = 12;

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, BCRYPT_ROUNDS);
}

/**
 * False for a wrong password and for anything that is not a bcrypt hash.
 */
export async function verifyPassword(password: string, storedHash: string): Promise<boolean> {
  if (!storedHash.startsWith('$2')) {
    return false;
  }
  return bcrypt.compare(password, storedHash);
}

// =============================================================================
// Authentication Service
// =============================================================================

export class AuthService {
  private config: AuthConfig;
  private customers: CustomerStore;
  private secretKey: Uint8Array;

  constructor(config: AuthConfig, customers: CustomerStore) {
    this.config = config;
    this.customers = customers;
    this.secretKey = new TextEncoder().encode(config.secretKey);
  }

  /**
   * Check a customer's password. Null for an unknown customer or a wrong
   * password alike.
   */
  async authenticateCustomer(customerId: string, password: string): Promise<CustomerRecord | null> {
    const customer = await this.customers.findById(customerId);
    if (!customer) {
      return null;
    }
    return (await verifyPassword(password, customer.passwordHash)) ? customer : null;
  }

  async createAccessToken(customerId: string): Promise<AccessToken> {
    const token = await new jose.SignJWT({})
      .setProtectedHeader({ alg: 'HS256' })
      .setSubject(customerId)
      .setIssuedAt()
      .setExpirationTime(`${this.config.accessTokenExpireMinutes}m`)
      .sign(this.secretKey);

    return { access_token: token, token_type: 'bearer' };
  }

  /**
   * Verify a bearer token and load the customer it names
   */
  async verifyAccessToken(token: string): Promise<AuthenticatedCustomer> {
    let subject: string | undefined;
    let expiresAt: Date | undefined;
    try {
      const { payload } = await jose.jwtVerify(token, this.secretKey, { algorithms: ['HS256'] });
      subject = payload.sub;
      expiresAt = payload.exp !== undefined ? new Date(payload.exp * 1000) : undefined;
    } catch (error) {
      logger.debug('JWT verification failed', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new AuthenticationError();
    }

    if (!subject) {
      throw new AuthenticationError();
    }

    const customer = await this.customers.findById(subject);
    if (!customer) {
      throw new AuthenticationError();
    }
    return toAuthenticatedCustomer(customer, expiresAt);
  }

  async registerCustomer(registration: CustomerRegistration): Promise<AuthenticatedCustomer> {
    const created = await this.customers.create({
      customerId: registration.customerId,
      passwordHash: await hashPassword(registration.password),
      openaiApiKey: registration.openaiApiKey,
    });

    if (!created) {
      throw new ValidationError('Customer ID already exists');
    }

    logger.info('Customer created', { customerId: created.customerId });
    return toAuthenticatedCustomer(created);
  }
}
