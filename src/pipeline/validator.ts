/**
 * Querywise - SQL Safety Validator
 *
 * The read-only gate every statement passes before it reaches the database,
 * including statements that come back from a repair.
 */

import { Parser } from 'node-sql-parser';

import logger from '../utils/logger.js';
import type { ValidationOutcome } from './types.js';

// =============================================================================
// Rules
// =============================================================================

export const BLOCKED_KEYWORDS = [
  'INSERT',
  'UPDATE',
  'DELETE',
  'DROP',
  'CREATE',
  'ALTER',
  'TRUNCATE',
  'GRANT',
  'REVOKE',
  'COMMIT',
  'ROLLBACK',
] as const;

const BLOCKED_KEYWORD_PATTERNS = BLOCKED_KEYWORDS.map((keyword) => ({
  keyword,
  pattern: new RegExp(`\\b${keyword}\\b`, 'i'),
}));

export const VALIDATION_REASONS = {
  empty: 'Empty query',
  unparseable: 'Empty or invalid SQL query',
  notSelect: 'Only SELECT queries are allowed',
} as const;

const parser = new Parser();
const PG_OPT = { database: 'PostgresQL' } as const;

// =============================================================================
// Parsing
// =============================================================================

interface ParsedStatements {
  count: number;
  firstType: string;
}

function parseStatements(query: string): ParsedStatements | null {
  const normalized = query.trim().replace(/;+\s*$/, '');
  if (!normalized) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = parser.astify(normalized, PG_OPT);
  } catch (error) {
    logger.debug('SQL parse failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }

  const statements: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
  const first = statements[0];
  if (first === null || typeof first !== 'object' || !('type' in first)) {
    return null;
  }
  return {
    count: statements.length,
    firstType: typeof first.type === 'string' ? first.type.toLowerCase() : 'unknown',
  };
}

/**
 * Type of the first statement in the input, lowercased, or null when nothing
 * parses. Statements after the first are never looked at.
 */
export function firstStatementType(query: string): string | null {
  return parseStatements(query)?.firstType ?? null;
}

const DOLLAR_QUOTE = /^\$[A-Za-z_]*\$/;

/**
 * Text before the first `;` that sits outside string literals, quoted
 * identifiers, comments and dollar-quoted bodies.
 */
export function firstStatementText(query: string): string {
  let i = 0;
  while (i < query.length) {
    const char = query[i];
    const next = query[i + 1];
    let skipTo = -1;

    if (char === "'" || char === '"') {
      const close = query.indexOf(char, i + 1);
      skipTo = close === -1 ? query.length : close + 1;
    } else if (char === '-' && next === '-') {
      const lineEnd = query.indexOf('\n', i);
      skipTo = lineEnd === -1 ? query.length : lineEnd + 1;
    } else if (char === '/' && next === '*') {
      const close = query.indexOf('*/', i + 2);
      skipTo = close === -1 ? query.length : close + 2;
    } else if (char === '$') {
      const tag = DOLLAR_QUOTE.exec(query.slice(i))?.[0];
      if (tag) {
        const close = query.indexOf(tag, i + tag.length);
        skipTo = close === -1 ? query.length : close + tag.length;
      }
    } else if (char === ';') {
      return query.slice(0, i).trim();
    }

    i = skipTo === -1 ? i + 1 : skipTo;
  }
  return query.trim();
}

// =============================================================================
// Validation
// =============================================================================

/**
 * On success `statement` is the only text that may be executed: the input
 * itself when it holds one statement, otherwise the first statement alone.
 */
export function validateQuery(query: string): ValidationOutcome {
  if (!query.trim()) {
    return { valid: false, reason: VALIDATION_REASONS.empty };
  }

  const parsed = parseStatements(query);
  if (parsed === null) {
    return { valid: false, reason: VALIDATION_REASONS.unparseable };
  }

  if (parsed.firstType !== 'select') {
    return { valid: false, reason: VALIDATION_REASONS.notSelect };
  }

  // Whole input, not just the first statement
  for (const { keyword, pattern } of BLOCKED_KEYWORD_PATTERNS) {
    if (pattern.test(query)) {
      return { valid: false, reason: `Disallowed SQL keyword found: ${keyword}` };
    }
  }

  if (parsed.count === 1) {
    return { valid: true, statement: query };
  }

  // The cut must parse back to the same single SELECT the parser saw first
  const statement = firstStatementText(query);
  const cut = parseStatements(statement);
  if (cut === null || cut.count !== 1 || cut.firstType !== 'select') {
    return { valid: false, reason: VALIDATION_REASONS.unparseable };
  }
  return { valid: true, statement };
}
