/**
 * Querywise - Query Executor Tests
 */

import { jest, describe, it, expect } from '@jest/globals';

import { QueryExecutor, toExecutionError, type QueryRunner } from '../../src/pipeline/executor.js';
import type { Row } from '../../src/pipeline/types.js';
import { ExecutionError } from '../../src/utils/types.js';

class PgLikeError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
  }
}

describe('QueryExecutor', () => {
  it('should return rows with driver values made JSON-safe', async () => {
    const runner: QueryRunner = {
      runIsolated: jest.fn(async (): Promise<Row[]> => [
        { id: BigInt(7), created: new Date('2026-03-01T12:00:00.000Z'), name: 'Ada' },
      ]),
    };

    const outcome = await new QueryExecutor(runner).execute('SELECT * FROM users');

    expect(outcome).toEqual({
      ok: true,
      rows: [{ id: 7, created: '2026-03-01T12:00:00.000Z', name: 'Ada' }],
    });
  });

  it('should run the statement exactly once and return the driver error', async () => {
    const runIsolated = jest.fn(async (_sql: string): Promise<Row[]> => {
      throw new PgLikeError('relation "userz" does not exist', '42P01');
    });

    const outcome = await new QueryExecutor({ runIsolated }).execute('SELECT * FROM userz');

    expect(runIsolated).toHaveBeenCalledTimes(1);
    expect(runIsolated).toHaveBeenCalledWith('SELECT * FROM userz');
    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ExecutionError);
      expect(outcome.error.message).toBe('relation "userz" does not exist');
      expect(outcome.error.sqlState).toBe('42P01');
    }
  });
});

describe('toExecutionError', () => {
  it('should keep an existing ExecutionError', () => {
    const error = new ExecutionError('timeout', '57014');
    expect(toExecutionError(error)).toBe(error);
  });

  it('should wrap non-Error values', () => {
    const error = toExecutionError('socket hang up');
    expect(error.message).toBe('socket hang up');
    expect(error.sqlState).toBeUndefined();
  });
});
