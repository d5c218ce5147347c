/**
 * Querywise - Customer Repository
 */

import type { DatabaseClient } from './postgres.js';

export interface CustomerRecord {
  customerId: string;
  passwordHash: string;
  openaiApiKey: string | null;
  promptSettings: Record<string, string>;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewCustomer {
  customerId: string;
  passwordHash: string;
  openaiApiKey?: string;
}

export interface CustomerStore {
  findById(customerId: string): Promise<CustomerRecord | null>;
  /** Null when the id is already taken */
  create(customer: NewCustomer): Promise<CustomerRecord | null>;
}

interface CustomerRow {
  customerId: string;
  passwordHash: string;
  openaiApiKey: string | null;
  promptSettings: unknown;
  createdAt: Date;
  updatedAt: Date;
}

const CUSTOMER_COLUMNS = `
  customer_id as "customerId", password_hash as "passwordHash",
  openai_api_key as "openaiApiKey", prompt_settings as "promptSettings",
  created_at as "createdAt", updated_at as "updatedAt"
`;

/**
 * prompt_settings is free-form JSONB; only string values are prompt texts.
 */
function toPromptSettings(value: unknown): Record<string, string> {
  const settings: Record<string, string> = {};
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, text] of Object.entries(value)) {
      if (typeof text === 'string') {
        settings[key] = text;
      }
    }
  }
  return settings;
}

function toRecord(row: CustomerRow): CustomerRecord {
  return { ...row, promptSettings: toPromptSettings(row.promptSettings) };
}

export class CustomerRepository implements CustomerStore {
  private db: DatabaseClient;

  constructor(db: DatabaseClient) {
    this.db = db;
  }

  async findById(customerId: string): Promise<CustomerRecord | null> {
    const row = await this.db.queryOne<CustomerRow>(
      `SELECT ${CUSTOMER_COLUMNS} FROM customers WHERE customer_id = $1`,
      [customerId]
    );
    return row ? toRecord(row) : null;
  }

  async create(customer: NewCustomer): Promise<CustomerRecord | null> {
    const row = await this.db.queryOne<CustomerRow>(
      `INSERT INTO customers (customer_id, password_hash, openai_api_key)
       VALUES ($1, $2, $3)
       ON CONFLICT (customer_id) DO NOTHING
       RETURNING ${CUSTOMER_COLUMNS}`,
      [customer.customerId, customer.passwordHash, customer.openaiApiKey ?? null]
    );
    return row ? toRecord(row) : null;
  }
}
