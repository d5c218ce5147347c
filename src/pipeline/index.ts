/**
 * Querywise - Query Pipeline Module
 *
 * Question in, validated and executed SQL plus a summary out.
 */

import type { LlmConfig } from '../utils/types.js';
import type { CompletionClientFactory } from './completion.js';
import { DebugRepairer } from './debug-repairer.js';
import { QueryExecutor, type QueryRunner } from './executor.js';
import { PromptResolver, type PromptStore } from './prompts.js';
import { QueryService } from './service.js';
import { SqlGenerator } from './sql-generator.js';
import { ResultSummarizer } from './summarizer.js';
import type { SchemaSnapshotSource } from './types.js';

export * from './types.js';
export { validateQuery, BLOCKED_KEYWORDS, VALIDATION_REASONS } from './validator.js';
export { fixQuery } from './heuristic-fixer.js';
export {
  PROMPT_IDS,
  PROMPT_ROLE_IDS,
  DEFAULT_PROMPTS,
  PromptResolver,
  interpolatePrompt,
  isPromptId,
} from './prompts.js';
export type { PromptId, PromptRole, PromptStore, DefaultPrompt } from './prompts.js';
export { OpenAICompletionFactory, resolveApiKey, tryModels } from './completion.js';
export type { CompletionClient, CompletionClientFactory } from './completion.js';
export { SqlGenerator } from './sql-generator.js';
export { DebugRepairer } from './debug-repairer.js';
export { QueryExecutor } from './executor.js';
export type { QueryRunner } from './executor.js';
export { ResultSummarizer, toMarkdownTable } from './summarizer.js';
export { SchemaProvider, EMPTY_SNAPSHOT } from './schema-provider.js';
export type { SchemaSource } from './schema-provider.js';
export { ERROR_MESSAGES, errorEnvelope } from './envelope.js';
export { QueryService } from './service.js';

export interface QueryPipelineDeps {
  llm: LlmConfig;
  completions: CompletionClientFactory;
  promptStore: PromptStore | null;
  schema: SchemaSnapshotSource;
  runner: QueryRunner;
}

/**
 * Wire the stages together with the configured model lists.
 */
export function createQueryService(deps: QueryPipelineDeps): QueryService {
  const prompts = new PromptResolver(deps.promptStore);
  const { llm, completions } = deps;

  return new QueryService({
    schema: deps.schema,
    generator: new SqlGenerator({
      completions,
      prompts,
      models: [llm.model, llm.generationFallbackModel],
    }),
    repairer: new DebugRepairer({
      completions,
      prompts,
      models: [llm.model, llm.debugFallbackModel],
    }),
    executor: new QueryExecutor(deps.runner),
    summarizer: new ResultSummarizer({
      completions,
      prompts,
      model: llm.model,
      maxPreviewRows: llm.summaryMaxRows,
    }),
  });
}
