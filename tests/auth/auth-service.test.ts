/**
 * Querywise - Authentication Service Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import * as jose from 'jose';

import { AuthService, hashPassword, verifyPassword } from '../../src/auth/auth-service.js';
import { AuthenticationError, ValidationError } from '../../src/utils/types.js';
import { InMemoryCustomerStore } from '../helpers/fakes.js';

const AUTH_CONFIG = { secretKey: 'test-secret', accessTokenExpireMinutes: 30 };

describe('password hashing', () => {
  it('should verify the password it hashed', async () => {
    const hash = await hashPassword('test-password');

    expect(hash).toMatch(/^\$2[ab]\$12\$/);
    expect(hash).toHaveLength(60);
    await expect(verifyPassword('test-password', hash)).resolves.toBe(true);
    await expect(verifyPassword('wrong-password', hash)).resolves.toBe(false);
  });

  it('should salt every hash', async () => {
    const first = await hashPassword('same');
    const second = await hashPassword('same');
    expect(first).not.toBe(second);
  });

  it('should reject malformed hashes', async () => {
    await expect(verifyPassword('x', 'plain-text')).resolves.toBe(false);
    await expect(verifyPassword('x', 'scrypt:aa:bb')).resolves.toBe(false);
    await expect(verifyPassword('x', '$2a$12$short')).resolves.toBe(false);
  });
});

describe('AuthService', () => {
  let customers: InMemoryCustomerStore;
  let service: AuthService;

  beforeEach(async () => {
    customers = new InMemoryCustomerStore();
    service = new AuthService(AUTH_CONFIG, customers);
    await service.registerCustomer({ customerId: 'acme', password: 'test-password', openaiApiKey: 'sk-acme' });
  });

  it('should store a hash instead of the password', () => {
    const record = customers.customers.get('acme');
    expect(record?.passwordHash).not.toBe('test-password');
    expect(record?.openaiApiKey).toBe('sk-acme');
  });

  it('should refuse a duplicate customer id', async () => {
    await expect(
      service.registerCustomer({ customerId: 'acme', password: 'other' })
    ).rejects.toThrow(new ValidationError('Customer ID already exists'));
  });

  it('should authenticate with the right password only', async () => {
    await expect(service.authenticateCustomer('acme', 'test-password')).resolves.toMatchObject({
      customerId: 'acme',
    });
    await expect(service.authenticateCustomer('acme', 'nope')).resolves.toBeNull();
    await expect(service.authenticateCustomer('ghost', 'test-password')).resolves.toBeNull();
  });

  it('should issue an HS256 bearer token for the customer', async () => {
    const token = await service.createAccessToken('acme');

    expect(token.token_type).toBe('bearer');
    const { payload, protectedHeader } = await jose.jwtVerify(
      token.access_token,
      new TextEncoder().encode('test-secret')
    );
    expect(protectedHeader.alg).toBe('HS256');
    expect(payload.sub).toBe('acme');
    expect((payload.exp ?? 0) - (payload.iat ?? 0)).toBe(30 * 60);
  });

  it('should resolve a token to the customer it names', async () => {
    const { access_token } = await service.createAccessToken('acme');
    const customer = await service.verifyAccessToken(access_token);

    expect(customer.customerId).toBe('acme');
    expect(customer.openaiApiKey).toBe('sk-acme');
    expect(customer.tokenExp).toBeInstanceOf(Date);
  });

  it('should reject tokens signed with another key', async () => {
    const other = new AuthService({ ...AUTH_CONFIG, secretKey: 'another-secret' }, customers);
    const { access_token } = await other.createAccessToken('acme');

    await expect(service.verifyAccessToken(access_token)).rejects.toThrow(AuthenticationError);
  });

  it('should reject tokens for customers that no longer exist', async () => {
    const { access_token } = await service.createAccessToken('ghost');
    await expect(service.verifyAccessToken(access_token)).rejects.toThrow(
      'Could not validate credentials'
    );
  });

  it('should reject garbage', async () => {
    await expect(service.verifyAccessToken('not-a-jwt')).rejects.toThrow(AuthenticationError);
  });
});
