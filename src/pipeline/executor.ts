/**
 * Querywise - Query Executor
 */

import { toJsonSafe } from '../utils/helpers.js';
import { ExecutionError } from '../utils/types.js';
import type { ExecutionOutcome, QueryExecutorLike, Row } from './types.js';

/**
 * Runs one statement on a connection of its own and releases it afterwards.
 */
export interface QueryRunner {
  runIsolated(sql: string): Promise<Row[]>;
}

function normalizeRow(row: Row): Row {
  return Object.fromEntries(Object.entries(row).map(([column, value]) => [column, toJsonSafe(value)]));
}

export function toExecutionError(error: unknown): ExecutionError {
  if (error instanceof ExecutionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const sqlState =
    error !== null && typeof error === 'object' && 'code' in error && typeof error.code === 'string'
      ? error.code
      : undefined;
  return new ExecutionError(message, sqlState);
}

export class QueryExecutor implements QueryExecutorLike {
  private runner: QueryRunner;

  constructor(runner: QueryRunner) {
    this.runner = runner;
  }

  /**
   * Never retries. A failure is returned for the caller to repair.
   */
  async execute(query: string): Promise<ExecutionOutcome> {
    try {
      const rows = await this.runner.runIsolated(query);
      return { ok: true, rows: rows.map(normalizeRow) };
    } catch (error) {
      return { ok: false, error: toExecutionError(error) };
    }
  }
}
