/**
 * Querywise - PostgreSQL Client
 *
 * One pool per database: the store (customers, prompts) and the target that
 * generated queries run against.
 */

import pgPromise, { type IDatabase, type IMain, type ITask } from 'pg-promise';

import type { QueryRunner } from '../pipeline/executor.js';
import type { Row } from '../pipeline/types.js';
import logger from '../utils/logger.js';
import type { PostgresConfig } from '../utils/types.js';
import { DatabaseError } from '../utils/types.js';

// =============================================================================
// Types
// =============================================================================

export interface DatabaseClient {
  query<T>(sql: string, params?: unknown[]): Promise<T[]>;
  queryOne<T>(sql: string, params?: unknown[]): Promise<T | null>;
  execute(sql: string, params?: unknown[]): Promise<number>;
  transaction<T>(callback: (t: ITask<object>) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface PostgresClientOptions {
  /** Name used in log lines to tell pools apart */
  name?: string;
  /** Server-side statement_timeout and client-side query_timeout */
  statementTimeoutMs?: number;
}

const PG_TYPE_NUMERIC = 1700;
const PG_TYPE_INT8 = 20;

// =============================================================================
// PostgreSQL Client Class
// =============================================================================

export class PostgresClient implements DatabaseClient, QueryRunner {
  private pgp: IMain;
  private db: IDatabase<object>;
  private config: PostgresConfig;
  private name: string;

  constructor(config: PostgresConfig, options: PostgresClientOptions = {}) {
    this.config = config;
    this.name = options.name ?? 'postgres';
    const name = this.name;

    // Initialize pg-promise
    this.pgp = pgPromise({
      capSQL: true,

      // Query events for logging
      query(e) {
        logger.debug('PostgreSQL query', {
          pool: name,
          query: e.query.substring(0, 200),
        });
      },

      error(err, e) {
        logger.error('PostgreSQL error', {
          pool: name,
          error: err instanceof Error ? err.message : String(err),
          query: e.query?.substring(0, 200),
        });
      },

      // Connection events
      connect(e) {
        logger.debug('PostgreSQL connection established', {
          pool: name,
          useCount: e.useCount,
        });
      },

      disconnect() {
        logger.debug('PostgreSQL connection closed', { pool: name });
      },
    });

    // numeric and bigint arrive as strings by default
    this.pgp.pg.types.setTypeParser(PG_TYPE_NUMERIC, (value: string) => parseFloat(value));
    this.pgp.pg.types.setTypeParser(PG_TYPE_INT8, (value: string) => parseInt(value, 10));

    const connectionConfig = {
      host: config.host,
      port: config.port,
      database: config.database,
      user: config.user,
      password: config.password,
      ssl: config.ssl ? { rejectUnauthorized: false } : false,
      max: config.poolMax,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
      ...(options.statementTimeoutMs !== undefined
        ? {
            statement_timeout: options.statementTimeoutMs,
            query_timeout: options.statementTimeoutMs,
          }
        : {}),
    };

    this.db = this.pgp(connectionConfig);
  }

  /**
   * Test database connection
   */
  public async connect(): Promise<void> {
    try {
      const connection = await this.db.connect();
      await connection.done(); // Release connection back to pool
      logger.info('PostgreSQL connection pool initialized', {
        pool: this.name,
        host: this.config.host,
        port: this.config.port,
        database: this.config.database,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Failed to connect to PostgreSQL', {
        pool: this.name,
        host: this.config.host,
        port: this.config.port,
        error: message,
      });
      throw new DatabaseError(`Failed to connect to PostgreSQL: ${message}`);
    }
  }

  public query<T>(sql: string, params?: unknown[]): Promise<T[]> {
    return this.wrap('Query', () => this.db.any<T>(sql, params));
  }

  public queryOne<T>(sql: string, params?: unknown[]): Promise<T | null> {
    return this.wrap('Query', () => this.db.oneOrNone<T>(sql, params));
  }

  /**
   * Statements without a result set; resolves to the affected row count
   */
  public execute(sql: string, params?: unknown[]): Promise<number> {
    return this.wrap('Execute', async () => (await this.db.result(sql, params)).rowCount);
  }

  public transaction<T>(callback: (t: ITask<object>) => Promise<T>): Promise<T> {
    return this.wrap('Transaction', () => this.db.tx(callback));
  }

  /**
   * Store queries surface as DatabaseError; generated SQL goes through
   * runIsolated instead so the repair step sees the driver's own message.
   */
  private async wrap<T>(label: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DatabaseError(`${label} failed on ${this.name}: ${message}`);
    }
  }

  /**
   * Run generated SQL on a dedicated connection outside the pool. The text is
   * sent unformatted and driver errors propagate untouched.
   */
  public async runIsolated(sql: string): Promise<Row[]> {
    const connection = await this.db.connect({ direct: true });
    try {
      return await connection.any<Row>(sql);
    } finally {
      await connection.done();
    }
  }

  /**
   * Close all connections
   */
  public async close(): Promise<void> {
    await this.db.$pool.end();
    logger.info('PostgreSQL connection pool closed', { pool: this.name });
  }
}

export default PostgresClient;
