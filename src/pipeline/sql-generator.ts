/**
 * Querywise - SQL Generator
 *
 * Turns a question into one candidate SELECT through a forced
 * `generate_sql_query` tool call.
 */

import { z } from 'zod';

import { stringifyJson } from '../utils/helpers.js';
import logger from '../utils/logger.js';
import { tryModels } from './completion.js';
import type { CompletionClientFactory, ToolSpec } from './completion.js';
import { interpolatePrompt, type PromptResolver } from './prompts.js';
import type {
  CandidateGenerator,
  GenerationOutcome,
  RequestContext,
  SchemaSnapshot,
  TableSampleSet,
} from './types.js';

// =============================================================================
// Tool Definition
// =============================================================================

export const GENERATE_SQL_TOOL: ToolSpec = {
  name: 'generate_sql_query',
  description: 'Generate a SQL query based on the user request',
  parameters: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'The PostgreSQL SELECT query that answers the question',
      },
      error: {
        type: 'string',
        description: 'Error message if a query cannot be generated',
      },
    },
    required: ['query'],
  },
};

const GenerateSqlArgsSchema = z.object({
  query: z.string().optional(),
  error: z.string().optional(),
});

const SAMPLE_PREVIEW_CHARS = 500;

// =============================================================================
// Prompt Context
// =============================================================================

export function formatSamples(samples: TableSampleSet): string {
  const tables = Object.entries(samples);
  if (tables.length === 0) {
    return '';
  }

  let text = 'Here are some examples of the data:\n';
  for (const [table, rows] of tables) {
    text += `\nTable: ${table}\n`;
    text += stringifyJson(rows, 2).slice(0, SAMPLE_PREVIEW_CHARS) + '...\n';
  }
  return text;
}

// =============================================================================
// Generator
// =============================================================================

export interface SqlGeneratorOptions {
  completions: CompletionClientFactory;
  prompts: PromptResolver;
  /** Tried in order; the first call that resolves wins. */
  models: readonly string[];
}

export class SqlGenerator implements CandidateGenerator {
  private completions: CompletionClientFactory;
  private prompts: PromptResolver;
  private models: readonly string[];

  constructor(options: SqlGeneratorOptions) {
    this.completions = options.completions;
    this.prompts = options.prompts;
    this.models = options.models;
  }

  async generate(
    question: string,
    snapshot: SchemaSnapshot,
    context: RequestContext
  ): Promise<GenerationOutcome> {
    // A missing credential is not a generation failure; let it through.
    const client = this.completions.forContext(context);

    const template = await this.prompts.resolve('generation', context);
    const systemMessage = interpolatePrompt(template, {
      schema: stringifyJson(snapshot.tables, 2),
      samples: formatSamples(snapshot.samples),
    });

    try {
      const rawArguments = await tryModels(
        this.models,
        (model) =>
          client.callTool({
            model,
            messages: [
              { role: 'system', content: systemMessage },
              { role: 'user', content: question },
            ],
            tool: GENERATE_SQL_TOOL,
          }),
        'SQL generation'
      );

      if (rawArguments === null) {
        return { ok: false, error: 'Failed to generate SQL query' };
      }

      const parsed = GenerateSqlArgsSchema.safeParse(JSON.parse(rawArguments));
      if (!parsed.success) {
        return { ok: false, error: 'Failed to generate SQL query' };
      }

      if (parsed.data.error) {
        return { ok: false, error: parsed.data.error };
      }

      const query = parsed.data.query?.trim();
      if (!query) {
        return { ok: false, error: 'Generated SQL query is empty' };
      }

      return { ok: true, query };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error('SQL generation failed', { requestId: context.requestId, error: message });
      return { ok: false, error: `SQL generation failed: ${message}` };
    }
  }
}
