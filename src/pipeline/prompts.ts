/**
 * Querywise - Prompt Resolution
 *
 * System prompts for the three LLM roles. A customer's own prompt settings
 * win, then the prompt store (customer record, then default record), then
 * the built-in text below.
 */

import logger from '../utils/logger.js';
import type { RequestContext } from './types.js';

// =============================================================================
// Prompt Identifiers
// =============================================================================

export const PROMPT_IDS = [
  'sql_system_message',
  'sql_debug_system_message',
  'result_summary_system_message',
] as const;

export type PromptId = (typeof PROMPT_IDS)[number];

export type PromptRole = 'generation' | 'debugging' | 'summarization';

export const PROMPT_ROLE_IDS: Readonly<Record<PromptRole, PromptId>> = {
  generation: 'sql_system_message',
  debugging: 'sql_debug_system_message',
  summarization: 'result_summary_system_message',
};

export function isPromptId(value: string): value is PromptId {
  return PROMPT_IDS.some((id) => id === value);
}

// =============================================================================
// Built-in Prompts
// =============================================================================

export interface DefaultPrompt {
  id: PromptId;
  description: string;
  text: string;
}

const SQL_SYSTEM_MESSAGE = `You are an expert SQL assistant that converts natural language queries into PostgreSQL queries.
Given the database schema and examples of data, generate a valid PostgreSQL SELECT query.
Follow these rules strictly:
1. ONLY generate SELECT queries - never write, update or delete operations
2. Use proper PostgreSQL syntax and table/column names exactly as shown in the schema
3. Include appropriate JOINs when needed based on the schema relationships
4. If you cannot generate a valid query, provide a clear error message
5. Never make assumptions about the schema, only use what is provided

The database schema is as follows:
{schema}

{samples}`;

const SQL_DEBUG_SYSTEM_MESSAGE = `You are an expert SQL debugging agent. Your task is to analyze a broken SQL query
and fix any issues while ensuring it remains a read-only SELECT query.

The database schema is:
{schema}

When fixing queries, follow these rules:
1. Only fix the query if you're confident in the solution
2. ONLY generate SELECT queries - never modify to include writes/updates/deletes
3. Maintain the original intent of the query
4. Fix syntax errors, type casting issues, and schema compliance problems
5. Use proper PostgreSQL syntax
6. If you can't fix the query, provide a clear error message explaining why

The original query failed with this error: {error}`;

const RESULT_SUMMARY_SYSTEM_MESSAGE = `You are an expert data analyst that summarizes SQL query results.
Your task is to provide a clear, concise summary of the query results in natural language.
Focus on key findings, patterns, and the most relevant information that answers the user's original question.
Keep the summary simple, direct, and to the point.`;

export const DEFAULT_PROMPTS: Readonly<Record<PromptId, DefaultPrompt>> = {
  sql_system_message: {
    id: 'sql_system_message',
    description: 'System message for SQL generation from natural language',
    text: SQL_SYSTEM_MESSAGE,
  },
  sql_debug_system_message: {
    id: 'sql_debug_system_message',
    description: 'System message for SQL debugging and fixing',
    text: SQL_DEBUG_SYSTEM_MESSAGE,
  },
  result_summary_system_message: {
    id: 'result_summary_system_message',
    description: 'System message for summarizing SQL query results',
    text: RESULT_SUMMARY_SYSTEM_MESSAGE,
  },
};

// =============================================================================
// Store Contract
// =============================================================================

export interface PromptStore {
  /**
   * Customer record when one exists, otherwise the default record, otherwise null.
   */
  getPromptText(promptId: PromptId, customerId?: string): Promise<string | null>;
}

// =============================================================================
// Resolver
// =============================================================================

export class PromptResolver {
  private store: PromptStore | null;

  constructor(store: PromptStore | null = null) {
    this.store = store;
  }

  async resolve(role: PromptRole, context: RequestContext): Promise<string> {
    const promptId = PROMPT_ROLE_IDS[role];

    const override = context.promptOverrides?.[promptId];
    if (override) {
      return override;
    }

    if (this.store) {
      try {
        const stored = await this.store.getPromptText(promptId, context.customerId);
        if (stored) {
          return stored;
        }
      } catch (error) {
        logger.warn('Prompt store lookup failed, using built-in prompt', {
          requestId: context.requestId,
          promptId,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return DEFAULT_PROMPTS[promptId].text;
  }
}

/**
 * Fill `{name}` placeholders. Unknown placeholders are left as they are, so
 * customer prompts may contain literal braces.
 */
export function interpolatePrompt(template: string, values: Readonly<Record<string, string>>): string {
  let result = template;
  for (const [name, value] of Object.entries(values)) {
    result = result.replaceAll(`{${name}}`, () => value);
  }
  return result;
}
