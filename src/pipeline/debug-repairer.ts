/**
 * Querywise - Debug Repairer
 *
 * One LLM attempt at fixing a statement that failed validation or execution.
 * Whatever comes back goes through the safety validator again before anyone
 * may run it.
 */

import { z } from 'zod';

import { stringifyJson } from '../utils/helpers.js';
import logger from '../utils/logger.js';
import { tryModels } from './completion.js';
import type { CompletionClientFactory, ToolSpec } from './completion.js';
import { interpolatePrompt, type PromptResolver } from './prompts.js';
import type { DebugOutcome, QueryRepairer, RequestContext, SchemaSnapshot } from './types.js';
import { validateQuery } from './validator.js';

export const FIX_SQL_TOOL: ToolSpec = {
  name: 'fix_sql_query',
  description: 'Fix a broken SQL query',
  parameters: {
    type: 'object',
    properties: {
      fixed_query: {
        type: 'string',
        description: 'The corrected PostgreSQL SELECT query',
      },
      explanation: {
        type: 'string',
        description: 'What was wrong and how it was fixed',
      },
      error: {
        type: 'string',
        description: 'Error message if the query cannot be fixed',
      },
    },
    required: ['fixed_query', 'explanation'],
  },
};

const FixSqlArgsSchema = z.object({
  fixed_query: z.string().optional(),
  explanation: z.string().optional(),
  error: z.string().optional(),
});

export interface DebugRepairerOptions {
  completions: CompletionClientFactory;
  prompts: PromptResolver;
  models: readonly string[];
}

export class DebugRepairer implements QueryRepairer {
  private completions: CompletionClientFactory;
  private prompts: PromptResolver;
  private models: readonly string[];

  constructor(options: DebugRepairerOptions) {
    this.completions = options.completions;
    this.prompts = options.prompts;
    this.models = options.models;
  }

  async repair(
    query: string,
    snapshot: SchemaSnapshot,
    errorMessage: string,
    context: RequestContext
  ): Promise<DebugOutcome> {
    const client = this.completions.forContext(context);

    const template = await this.prompts.resolve('debugging', context);
    const systemMessage = interpolatePrompt(template, {
      schema: stringifyJson(snapshot.tables, 2),
      error: errorMessage,
    });

    try {
      const rawArguments = await tryModels(
        this.models,
        (model) =>
          client.callTool({
            model,
            messages: [
              { role: 'system', content: systemMessage },
              { role: 'user', content: `Fix this SQL query: ${query}` },
            ],
            tool: FIX_SQL_TOOL,
          }),
        'SQL debugging'
      );

      if (rawArguments === null) {
        return { ok: false, error: 'Failed to debug query' };
      }

      const parsed = FixSqlArgsSchema.safeParse(JSON.parse(rawArguments));
      if (!parsed.success) {
        return { ok: false, error: 'Failed to debug query' };
      }

      if (parsed.data.error) {
        return { ok: false, error: parsed.data.error };
      }

      const fixedQuery = parsed.data.fixed_query?.trim();
      if (!fixedQuery) {
        return { ok: false, error: 'Failed to generate a fixed query' };
      }

      const validation = validateQuery(fixedQuery);
      if (!validation.valid) {
        logger.warn('Repaired query rejected by validator', {
          requestId: context.requestId,
          reason: validation.reason,
        });
        return { ok: false, error: validation.reason };
      }

      return {
        ok: true,
        fixedQuery: validation.statement,
        explanation: parsed.data.explanation ?? '',
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('SQL debugging failed', { requestId: context.requestId, error: message });
      return { ok: false, error: `Debugging error: ${message}` };
    }
  }
}
