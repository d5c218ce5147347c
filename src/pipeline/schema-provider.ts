/**
 * Querywise - Schema Snapshot Provider
 *
 * Holds the one piece of state shared by concurrent requests. Readers get a
 * frozen snapshot; a refresh builds a new one off to the side and swaps the
 * reference only when it is complete.
 */

import logger from '../utils/logger.js';
import { SchemaLoadError } from '../utils/types.js';
import type { Row, SchemaInfo, SchemaSnapshot, SchemaSnapshotSource, TableSampleSet } from './types.js';

export interface SchemaSource {
  loadSchema(): Promise<SchemaInfo>;
  sampleTable(table: string, limit: number): Promise<Row[]>;
}

export const EMPTY_SNAPSHOT: SchemaSnapshot = Object.freeze({
  tables: Object.freeze({}),
  samples: Object.freeze({}),
  loadedAt: null,
});

export interface SchemaProviderOptions {
  sampleRows: number;
}

export class SchemaProvider implements SchemaSnapshotSource {
  private source: SchemaSource;
  private sampleRows: number;
  private snapshot: SchemaSnapshot = EMPTY_SNAPSHOT;

  constructor(source: SchemaSource, options: SchemaProviderOptions) {
    this.source = source;
    this.sampleRows = options.sampleRows;
  }

  current(): SchemaSnapshot {
    return this.snapshot;
  }

  /**
   * Reload tables and samples. On failure the previous snapshot stays and a
   * SchemaLoadError is thrown.
   */
  async refresh(): Promise<SchemaSnapshot> {
    let tables: SchemaInfo;
    try {
      tables = await this.source.loadSchema();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('Schema load failed', { error: message });
      throw new SchemaLoadError(`Failed to load database schema: ${message}`);
    }

    const samples = await this.collectSamples(Object.keys(tables));

    const next: SchemaSnapshot = Object.freeze({
      tables: Object.freeze({ ...tables }),
      samples,
      loadedAt: new Date(),
    });
    this.snapshot = next;

    logger.info('Schema snapshot loaded', {
      tables: Object.keys(next.tables).length,
      sampledTables: Object.keys(next.samples).length,
    });
    return next;
  }

  /**
   * Startup variant of refresh: a failure leaves the service on whatever
   * snapshot it had, empty at first.
   */
  async initialize(): Promise<SchemaSnapshot> {
    try {
      return await this.refresh();
    } catch (error) {
      logger.warn('Starting without a database schema', {
        error: error instanceof Error ? error.message : String(error),
      });
      return this.snapshot;
    }
  }

  /**
   * Best effort per table. Tables that fail or have no rows are left out.
   */
  async sample(table: string, limit: number): Promise<Row[]> {
    try {
      return await this.source.sampleTable(table, limit);
    } catch (error) {
      logger.warn('Failed to sample table', {
        table,
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }

  private async collectSamples(tables: string[]): Promise<TableSampleSet> {
    const samples: Record<string, readonly Row[]> = {};
    if (this.sampleRows <= 0) {
      return Object.freeze(samples);
    }

    for (const table of tables) {
      const rows = await this.sample(table, this.sampleRows);
      if (rows.length > 0) {
        samples[table] = Object.freeze(rows);
      }
    }
    return Object.freeze(samples);
  }
}
