/**
 * Querywise - Prompt Repository
 *
 * Prompt records live in the store with a NULL customer for the defaults.
 */

import { DEFAULT_PROMPTS, PROMPT_IDS, type PromptId, type PromptStore } from '../pipeline/prompts.js';
import logger from '../utils/logger.js';
import type { DatabaseClient } from './postgres.js';

export interface PromptRecord {
  promptId: string;
  customerId: string | null;
  promptText: string;
  description: string;
  isDefault: boolean;
  updatedAt: Date;
}

export interface PromptUpsert {
  promptId: PromptId;
  promptText: string;
  description?: string;
  customerId: string | null;
  isDefault?: boolean;
}

export interface PromptInfo {
  defaultPrompts: { promptId: string; description: string }[];
  customerPrompts: { customerId: string; count: number }[];
}

export interface PromptAdminStore extends PromptStore {
  /** Every prompt id resolved for the customer: their own record, else the default */
  listForCustomer(customerId: string): Promise<Record<string, string>>;
  upsert(prompt: PromptUpsert): Promise<void>;
  getInfo(): Promise<PromptInfo>;
}

const PROMPT_COLUMNS = `
  prompt_id as "promptId", customer_id as "customerId", prompt_text as "promptText",
  description, is_default as "isDefault", updated_at as "updatedAt"
`;

export class PromptRepository implements PromptAdminStore {
  private db: DatabaseClient;

  constructor(db: DatabaseClient) {
    this.db = db;
  }

  async getPromptText(promptId: PromptId, customerId?: string): Promise<string | null> {
    // Customer record sorts ahead of the default
    const row = await this.db.queryOne<{ promptText: string }>(
      `SELECT prompt_text as "promptText" FROM prompts
       WHERE prompt_id = $1 AND (customer_id = $2 OR customer_id IS NULL)
       ORDER BY customer_id NULLS LAST
       LIMIT 1`,
      [promptId, customerId ?? null]
    );
    return row?.promptText ?? null;
  }

  async listForCustomer(customerId: string): Promise<Record<string, string>> {
    const rows = await this.db.query<PromptRecord>(
      `SELECT ${PROMPT_COLUMNS} FROM prompts
       WHERE customer_id = $1 OR customer_id IS NULL
       ORDER BY customer_id NULLS FIRST`,
      [customerId]
    );

    const prompts: Record<string, string> = {};
    for (const id of PROMPT_IDS) {
      prompts[id] = DEFAULT_PROMPTS[id].text;
    }
    // Defaults first, so customer rows overwrite them
    for (const row of rows) {
      prompts[row.promptId] = row.promptText;
    }
    return prompts;
  }

  async upsert(prompt: PromptUpsert): Promise<void> {
    await this.db.execute(
      `INSERT INTO prompts (prompt_id, customer_id, prompt_text, description, is_default)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (prompt_id, (COALESCE(customer_id, '')))
       DO UPDATE SET prompt_text = EXCLUDED.prompt_text,
                     description = EXCLUDED.description,
                     is_default = EXCLUDED.is_default`,
      [
        prompt.promptId,
        prompt.customerId,
        prompt.promptText,
        prompt.description ?? DEFAULT_PROMPTS[prompt.promptId].description,
        prompt.isDefault ?? false,
      ]
    );
  }

  async getInfo(): Promise<PromptInfo> {
    const defaults = await this.db.query<{ promptId: string; description: string }>(
      `SELECT prompt_id as "promptId", description FROM prompts
       WHERE customer_id IS NULL ORDER BY prompt_id`
    );
    const customers = await this.db.query<{ customerId: string; count: number }>(
      `SELECT customer_id as "customerId", COUNT(*)::int as count FROM prompts
       WHERE customer_id IS NOT NULL GROUP BY customer_id ORDER BY customer_id`
    );
    return { defaultPrompts: defaults, customerPrompts: customers };
  }
}

/**
 * Write the built-in prompts as the default records. Existing defaults are
 * overwritten so a release can change them.
 */
export async function seedDefaultPrompts(store: Pick<PromptAdminStore, 'upsert'>): Promise<number> {
  let seeded = 0;
  for (const id of PROMPT_IDS) {
    const prompt = DEFAULT_PROMPTS[id];
    await store.upsert({
      promptId: id,
      promptText: prompt.text,
      description: prompt.description,
      customerId: null,
      isDefault: true,
    });
    seeded++;
  }
  logger.info('Default prompts seeded', { count: seeded });
  return seeded;
}
