/**
 * Querywise - Result Summarizer
 *
 * Natural-language summary of a result set followed by a markdown preview of
 * its first rows. Best effort: any failure yields the fallback sentence.
 */

import { stringifyJson, unique } from '../utils/helpers.js';
import logger from '../utils/logger.js';
import type { CompletionClientFactory } from './completion.js';
import type { PromptResolver } from './prompts.js';
import type { RequestContext, ResultSummarizerLike, Row } from './types.js';

export const NO_RESULTS_SUMMARY = 'The query returned no results.';
export const SUMMARY_FALLBACK = "I couldn't generate a summary for the query results.";

const CONTEXT_ROWS = 10;

// =============================================================================
// Markdown Preview
// =============================================================================

function formatCell(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'string') {
    return value.includes('|') || value.includes('\n') ? `\`${value}\`` : value;
  }
  if (typeof value === 'object') {
    return JSON.stringify(value);
  }
  return String(value);
}

export function toMarkdownTable(rows: readonly Row[]): string {
  if (rows.length === 0) {
    return '';
  }

  const columns = unique(rows.flatMap((row) => Object.keys(row)));

  let markdown = `| ${columns.join(' | ')} |\n`;
  markdown += `| ${columns.map(() => '---').join(' | ')} |\n`;
  for (const row of rows) {
    markdown += `| ${columns.map((column) => formatCell(row[column])).join(' | ')} |\n`;
  }
  return markdown;
}

export function describeRowCount(shown: number, total: number): string {
  return total > shown
    ? `Here are the top ${shown} results out of ${total} total rows:`
    : `Here are all ${total} results:`;
}

// =============================================================================
// Summarizer
// =============================================================================

export interface ResultSummarizerOptions {
  completions: CompletionClientFactory;
  prompts: PromptResolver;
  model: string;
  maxPreviewRows: number;
}

export class ResultSummarizer implements ResultSummarizerLike {
  private completions: CompletionClientFactory;
  private prompts: PromptResolver;
  private model: string;
  private maxPreviewRows: number;

  constructor(options: ResultSummarizerOptions) {
    this.completions = options.completions;
    this.prompts = options.prompts;
    this.model = options.model;
    this.maxPreviewRows = options.maxPreviewRows;
  }

  async summarize(question: string, query: string, rows: Row[], context: RequestContext): Promise<string> {
    if (rows.length === 0) {
      return NO_RESULTS_SUMMARY;
    }

    try {
      const client = this.completions.forContext(context);
      const systemMessage = await this.prompts.resolve('summarization', context);

      let results = stringifyJson(rows.slice(0, CONTEXT_ROWS), 2);
      if (rows.length > CONTEXT_ROWS) {
        results += `\n... and ${rows.length - CONTEXT_ROWS} more rows`;
      }

      const content = await client.complete({
        model: this.model,
        messages: [
          { role: 'system', content: systemMessage },
          {
            role: 'user',
            content:
              `Original question: ${question}\n` +
              `SQL query executed: ${query}\n` +
              `Query results: ${results}\n\n` +
              'Please summarize these results to answer the original question.',
          },
        ],
      });

      const preview = rows.slice(0, this.maxPreviewRows);
      return (
        `${content.trim()}\n\n` +
        `${describeRowCount(preview.length, rows.length)}\n\n` +
        toMarkdownTable(preview)
      );
    } catch (error) {
      logger.error('Result summarization failed', {
        requestId: context.requestId,
        error: error instanceof Error ? error.message : String(error),
      });
      return SUMMARY_FALLBACK;
    }
  }
}
