/**
 * Querywise - Pipeline Type Definitions
 *
 * Shapes passed between the stages of the question-to-rows pipeline. The JSON
 * envelope keeps snake_case field names because it is the wire format.
 */

import type { ExecutionError } from '../utils/types.js';

// =============================================================================
// Schema Types
// =============================================================================

export interface ColumnInfo {
  name: string;
  type: string;
  nullable: boolean;
}

export interface ForeignKeyInfo {
  constrainedColumns: string[];
  referredTable: string;
  referredColumns: string[];
}

export interface TableInfo {
  columns: ColumnInfo[];
  primaryKeys: string[];
  foreignKeys: ForeignKeyInfo[];
}

export type SchemaInfo = Readonly<Record<string, TableInfo>>;

/**
 * A single result row as the driver returns it, keyed by column name.
 */
export type Row = Record<string, unknown>;

export type TableSampleSet = Readonly<Record<string, readonly Row[]>>;

/**
 * Frozen view of the target database. Replaced wholesale on refresh, never
 * edited in place.
 */
export interface SchemaSnapshot {
  readonly tables: SchemaInfo;
  readonly samples: TableSampleSet;
  readonly loadedAt: Date | null;
}

// =============================================================================
// Request Context
// =============================================================================

/**
 * Everything that varies per customer travels with the request instead of
 * living on the services.
 */
export interface RequestContext {
  readonly requestId: string;
  readonly customerId?: string;
  readonly apiKey?: string;
  readonly promptOverrides?: Readonly<Record<string, string>>;
}

// =============================================================================
// Stage Outcomes
// =============================================================================

export type GenerationOutcome = { ok: true; query: string } | { ok: false; error: string };

export type ValidationOutcome =
  | { valid: true; statement: string }
  | { valid: false; reason: string };

export type DebugOutcome =
  | { ok: true; fixedQuery: string; explanation: string }
  | { ok: false; error: string };

export type ExecutionOutcome = { ok: true; rows: Row[] } | { ok: false; error: ExecutionError };

export interface FixResult {
  query: string;
  changed: boolean;
}

// =============================================================================
// Stage Contracts
// =============================================================================

export interface SchemaSnapshotSource {
  current(): SchemaSnapshot;
}

export interface CandidateGenerator {
  generate(
    question: string,
    snapshot: SchemaSnapshot,
    context: RequestContext
  ): Promise<GenerationOutcome>;
}

export interface QueryRepairer {
  repair(
    query: string,
    snapshot: SchemaSnapshot,
    errorMessage: string,
    context: RequestContext
  ): Promise<DebugOutcome>;
}

export interface QueryExecutorLike {
  execute(query: string): Promise<ExecutionOutcome>;
}

export interface ResultSummarizerLike {
  summarize(question: string, query: string, rows: Row[], context: RequestContext): Promise<string>;
}

// =============================================================================
// Result Envelope
// =============================================================================

export type ErrorType =
  | 'sql_generation_failed'
  | 'sql_validation_failed'
  | 'database_connection_error'
  | 'execution_error'
  | 'insufficient_permissions'
  | 'empty_results'
  | 'summarization_failed'
  | 'configuration_error'
  | 'general_error';

export interface PipelineSuccess {
  success: true;
  query: string;
  original_query?: string;
  was_debugged?: true;
  data: Row[];
  summary: string;
  record_count: number;
}

export interface PipelineFailure {
  success: false;
  error: { type: ErrorType; message: string };
  mock: true;
  data: null;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;
