/**
 * Querywise - Result Envelope Tests
 */

import { describe, it, expect } from '@jest/globals';

import {
  EMPTY_RESULTS_SUMMARY,
  ERROR_MESSAGES,
  emptyResultsEnvelope,
  errorEnvelope,
  successEnvelope,
} from '../../src/pipeline/envelope.js';

describe('errorEnvelope', () => {
  it('should use the default message for the type', () => {
    expect(errorEnvelope('general_error')).toEqual({
      success: false,
      error: { type: 'general_error', message: 'An unexpected error occurred. Please try again later.' },
      mock: true,
      data: null,
    });
  });

  it('should prefer a specific message and ignore an empty one', () => {
    expect(errorEnvelope('execution_error', 'division by zero').error.message).toBe('division by zero');
    expect(errorEnvelope('execution_error', '').error.message).toBe(ERROR_MESSAGES.execution_error);
  });
});

describe('successEnvelope', () => {
  it('should count records and omit repair fields for an unrepaired query', () => {
    expect(successEnvelope({ query: 'SELECT 1', rows: [{ one: 1 }], summary: 's' })).toEqual({
      success: true,
      query: 'SELECT 1',
      data: [{ one: 1 }],
      summary: 's',
      record_count: 1,
    });
  });

  it('should carry the original query of a repaired statement', () => {
    const envelope = successEnvelope({
      query: 'SELECT name FROM users',
      rows: [],
      summary: 's',
      originalQuery: 'SELECT nme FROM users',
    });
    expect(envelope.original_query).toBe('SELECT nme FROM users');
    expect(envelope.was_debugged).toBe(true);
  });
});

describe('emptyResultsEnvelope', () => {
  it('should succeed with no data', () => {
    expect(emptyResultsEnvelope('SELECT 1')).toEqual({
      success: true,
      query: 'SELECT 1',
      data: [],
      summary: EMPTY_RESULTS_SUMMARY,
      record_count: 0,
    });
  });
});
