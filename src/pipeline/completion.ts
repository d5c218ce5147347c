/**
 * Querywise - Completion Client
 *
 * Thin seam over the OpenAI chat API. The pipeline only needs two calls: a
 * forced tool call that returns the tool's raw JSON arguments, and a plain
 * chat completion.
 */

import OpenAI from 'openai';

import { unique } from '../utils/helpers.js';
import logger from '../utils/logger.js';
import { ConfigurationError } from '../utils/types.js';
import type { LlmConfig } from '../utils/types.js';
import type { RequestContext } from './types.js';

// =============================================================================
// Types
// =============================================================================

export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ToolSpec {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ToolCallRequest {
  model: string;
  messages: ChatMessage[];
  tool: ToolSpec;
}

export interface CompletionRequest {
  model: string;
  messages: ChatMessage[];
}

export interface CompletionClient {
  /**
   * Raw JSON arguments of the forced tool call, or null when the model
   * answered without calling it.
   */
  callTool(request: ToolCallRequest): Promise<string | null>;
  complete(request: CompletionRequest): Promise<string>;
}

export interface CompletionClientFactory {
  /**
   * Client bound to the credential that applies to this request. Throws
   * ConfigurationError when there is none.
   */
  forContext(context: RequestContext): CompletionClient;
}

// =============================================================================
// Model Fallback
// =============================================================================

/**
 * Try each model in order until one call resolves. Only thrown errors move
 * on to the next model; the last error is rethrown when all fail.
 */
export async function tryModels<T>(
  models: readonly string[],
  attempt: (model: string) => Promise<T>,
  label: string
): Promise<T> {
  let lastError: unknown = new Error('No models configured');

  for (const model of unique(models)) {
    try {
      return await attempt(model);
    } catch (error) {
      lastError = error;
      logger.warn(`${label} call failed`, {
        model,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  throw lastError;
}

// =============================================================================
// Credential Resolution
// =============================================================================

export function resolveApiKey(context: RequestContext, config: LlmConfig): string {
  const apiKey = context.apiKey?.trim() || config.apiKey?.trim();
  if (!apiKey) {
    throw new ConfigurationError('OpenAI API key is required');
  }
  return apiKey;
}

// =============================================================================
// OpenAI Implementation
// =============================================================================

function toOpenAIMessages(messages: ChatMessage[]): OpenAI.ChatCompletionMessageParam[] {
  return messages.map((message): OpenAI.ChatCompletionMessageParam =>
    message.role === 'system'
      ? { role: 'system', content: message.content }
      : { role: 'user', content: message.content }
  );
}

export class OpenAICompletionClient implements CompletionClient {
  private client: OpenAI;

  constructor(client: OpenAI) {
    this.client = client;
  }

  async callTool(request: ToolCallRequest): Promise<string | null> {
    const response = await this.client.chat.completions.create({
      model: request.model,
      messages: toOpenAIMessages(request.messages),
      tools: [
        {
          type: 'function',
          function: {
            name: request.tool.name,
            description: request.tool.description,
            parameters: request.tool.parameters,
          },
        },
      ],
      tool_choice: { type: 'function', function: { name: request.tool.name } },
    });

    const toolCall = response.choices[0]?.message.tool_calls?.[0];
    if (!toolCall || toolCall.function.name !== request.tool.name) {
      return null;
    }
    return toolCall.function.arguments;
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: request.model,
      messages: toOpenAIMessages(request.messages),
    });
    return response.choices[0]?.message.content ?? '';
  }
}

/**
 * One SDK client per distinct key, created on first use. Keys rotate, so
 * only the `maxClients` most recently used are kept.
 */
export class OpenAICompletionFactory implements CompletionClientFactory {
  private config: LlmConfig;
  private maxClients: number;
  private clients: Map<string, OpenAICompletionClient> = new Map();

  constructor(config: LlmConfig, maxClients = 100) {
    this.config = config;
    this.maxClients = maxClients;
  }

  forContext(context: RequestContext): CompletionClient {
    const apiKey = resolveApiKey(context, this.config);

    const existing = this.clients.get(apiKey);
    if (existing) {
      // Re-insert to mark as most recently used
      this.clients.delete(apiKey);
      this.clients.set(apiKey, existing);
      return existing;
    }

    if (!apiKey.startsWith('sk-')) {
      logger.warn('OpenAI API key does not look like a secret key', {
        requestId: context.requestId,
        customerId: context.customerId,
      });
    }

    const client = new OpenAICompletionClient(
      new OpenAI({ apiKey, timeout: this.config.timeoutMs, maxRetries: 0 })
    );
    this.clients.set(apiKey, client);

    for (const key of this.clients.keys()) {
      if (this.clients.size <= this.maxClients) {
        break;
      }
      this.clients.delete(key);
    }
    return client;
  }

  get size(): number {
    return this.clients.size;
  }
}
