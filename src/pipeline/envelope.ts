/**
 * Querywise - Result Envelopes
 *
 * The only place PipelineResult values are built, so every stage fails with
 * the same shape.
 */

import type { ErrorType, PipelineFailure, PipelineSuccess, Row } from './types.js';

export const ERROR_MESSAGES: Readonly<Record<ErrorType, string>> = {
  sql_generation_failed:
    "I couldn't generate a valid SQL query for your question. Please try rephrasing or providing more context.",
  sql_validation_failed:
    "The generated SQL query doesn't meet security requirements. Only read-only queries are allowed.",
  database_connection_error: 'There was an issue connecting to the database. Please try again later.',
  execution_error:
    'An error occurred while executing the query. Please check your question for clarity.',
  insufficient_permissions: "You don't have permission to access this information.",
  empty_results: 'The query executed successfully but returned no results.',
  summarization_failed: "I couldn't generate a summary for the query results.",
  configuration_error: 'The service is not configured to answer questions right now.',
  general_error: 'An unexpected error occurred. Please try again later.',
};

export const EMPTY_RESULTS_SUMMARY = 'No data was found for your query.';

export function errorEnvelope(type: ErrorType, message?: string): PipelineFailure {
  return {
    success: false,
    error: { type, message: message || ERROR_MESSAGES[type] },
    mock: true,
    data: null,
  };
}

export interface SuccessEnvelopeInput {
  query: string;
  rows: Row[];
  summary: string;
  /** Set when the returned query is a repair of this one. */
  originalQuery?: string;
}

export function successEnvelope(input: SuccessEnvelopeInput): PipelineSuccess {
  const envelope: PipelineSuccess = {
    success: true,
    query: input.query,
    data: input.rows,
    summary: input.summary,
    record_count: input.rows.length,
  };
  if (input.originalQuery !== undefined) {
    envelope.original_query = input.originalQuery;
    envelope.was_debugged = true;
  }
  return envelope;
}

export function emptyResultsEnvelope(query: string, originalQuery?: string): PipelineSuccess {
  return successEnvelope({ query, rows: [], summary: EMPTY_RESULTS_SUMMARY, originalQuery });
}
