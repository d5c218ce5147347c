/**
 * Querywise - Heuristic SQL Fixer
 *
 * LLM-free rewrites for the surface mistakes generated SQL tends to make.
 * Each pass is a pure string -> string function; `fixQuery` runs them in
 * order and reports whether anything moved.
 *
 * The literal-quoting pass is syntactic only. It will quote the right-hand
 * side of a column comparison such as `a.id = b.id` into `a.id = 'b'.id`.
 */

import { escapeRegExp } from '../utils/helpers.js';
import type { FixResult, SchemaInfo } from './types.js';

type FixPass = (query: string, schema: SchemaInfo) => string;

// =============================================================================
// Literal Quoting
// =============================================================================

const BAREWORD_COMPARISON = /(=\s*)([A-Za-z_][A-Za-z0-9_]*)\b(?!\s*\(|\s*'|\s*\d|\s*::)/g;

// Barewords that are valid right-hand sides on their own
const SQL_VALUE_KEYWORDS = new Set([
  'TRUE',
  'FALSE',
  'NULL',
  'ANY',
  'ALL',
  'SOME',
  'CURRENT_DATE',
  'CURRENT_TIME',
  'CURRENT_TIMESTAMP',
  'LOCALTIME',
  'LOCALTIMESTAMP',
  'CURRENT_USER',
]);

export const quoteBarewordLiterals: FixPass = (query) =>
  query.replace(BAREWORD_COMPARISON, (match: string, operator: string, word: string) =>
    SQL_VALUE_KEYWORDS.has(word.toUpperCase()) ? match : `${operator}'${word}'`
  );

// =============================================================================
// Table Names
// =============================================================================

const QUOTED_LITERAL = /('(?:[^']|'')*')/;

/**
 * Apply `rewrite` to the parts of the query outside single-quoted literals.
 */
function mapUnquoted(query: string, rewrite: (segment: string) => string): string {
  return query
    .split(QUOTED_LITERAL)
    .map((segment, index) => (index % 2 === 0 ? rewrite(segment) : segment))
    .join('');
}

export const normalizeTableNames: FixPass = (query, schema) => {
  const tables = Object.keys(schema);
  const exact = new Set(tables);

  return mapUnquoted(query, (segment) => {
    let result = segment;
    for (const table of tables) {
      const pattern = new RegExp(`\\b${escapeRegExp(table)}s?\\b`, 'gi');
      result = result.replace(pattern, (match) =>
        match === table || exact.has(match) ? match : table
      );
    }
    return result;
  });
};

const TABLE_REFERENCE = /\b(FROM|JOIN)(\s+)([A-Za-z_][A-Za-z0-9_]*)\b/gi;

export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(
        Math.min((previous[j] ?? 0) + 1, (current[j - 1] ?? 0) + 1, substitution)
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

// Literal bodies blanked out, offsets unchanged
function maskLiterals(query: string): string {
  return query.replace(/'(?:[^']|'')*'/g, (literal) => `'${' '.repeat(literal.length - 2)}'`);
}

/**
 * Text between the innermost unclosed `(` before `offset` and `offset`, or
 * null at top level.
 */
function enclosingGroup(text: string, offset: number): string | null {
  let depth = 0;
  for (let i = offset - 1; i >= 0; i--) {
    if (text[i] === ')') {
      depth++;
    } else if (text[i] === '(') {
      if (depth === 0) {
        return text.slice(i + 1, offset);
      }
      depth--;
    }
  }
  return null;
}

/**
 * A misspelt table after FROM/JOIN is swapped for the only schema table one
 * edit away. Ambiguous or distant names are left for the validator and the
 * repair step, and so is the FROM of `EXTRACT(YEAR FROM col)` and other
 * parenthesised groups that are not subqueries.
 */
export const correctNearMissTables: FixPass = (query, schema) => {
  const tables = Object.keys(schema);
  const lowered = new Set(tables.map((table) => table.toLowerCase()));
  const masked = maskLiterals(query);

  let result = query;
  // Back to front so earlier offsets stay valid
  for (const match of [...masked.matchAll(TABLE_REFERENCE)].reverse()) {
    const [whole, keyword, gap, name] = match;
    const index = match.index;
    if (index === undefined || keyword === undefined || gap === undefined || name === undefined) {
      continue;
    }

    const candidate = name.toLowerCase();
    if (lowered.has(candidate) || candidate.length < 3) {
      continue;
    }
    if (keyword.toUpperCase() === 'FROM') {
      const group = enclosingGroup(masked, index);
      if (group !== null && !/\bSELECT\b/i.test(group)) {
        continue;
      }
    }

    const nearby = tables.filter((table) => editDistance(candidate, table.toLowerCase()) === 1);
    const [only] = nearby;
    if (nearby.length !== 1 || only === undefined) {
      continue;
    }
    result = `${result.slice(0, index)}${keyword}${gap}${only}${result.slice(index + whole.length)}`;
  }
  return result;
};

// =============================================================================
// Composition
// =============================================================================

const PASSES: readonly FixPass[] = [
  quoteBarewordLiterals,
  normalizeTableNames,
  correctNearMissTables,
];

export function fixQuery(query: string, schema: SchemaInfo): FixResult {
  const fixed = PASSES.reduce((current, pass) => pass(current, schema), query);
  return { query: fixed, changed: fixed !== query };
}
