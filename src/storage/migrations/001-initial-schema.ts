/**
 * Querywise - Initial Database Migration
 * Creates the customer and prompt store
 */

export const migrationName = '001-initial-schema';
export const migrationDate = '2025-01-01';

export const up = `
-- =============================================================================
-- Customers Table
-- Credentials and per-customer LLM settings
-- =============================================================================
CREATE TABLE IF NOT EXISTS customers (
  customer_id VARCHAR(255) PRIMARY KEY,
  password_hash TEXT NOT NULL,
  openai_api_key TEXT,
  prompt_settings JSONB NOT NULL DEFAULT '{}'::jsonb,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

-- =============================================================================
-- Prompts Table
-- Default prompts have customer_id NULL; customer records override them
-- =============================================================================
CREATE TABLE IF NOT EXISTS prompts (
  id SERIAL PRIMARY KEY,
  prompt_id VARCHAR(100) NOT NULL,
  customer_id VARCHAR(255) REFERENCES customers (customer_id) ON DELETE CASCADE,
  prompt_text TEXT NOT NULL,
  description TEXT NOT NULL DEFAULT '',
  is_default BOOLEAN NOT NULL DEFAULT false,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

-- One record per prompt and scope; NULL scope is folded to '' for the default
CREATE UNIQUE INDEX IF NOT EXISTS idx_prompts_scope
  ON prompts (prompt_id, COALESCE(customer_id, ''));
CREATE INDEX IF NOT EXISTS idx_prompts_customer ON prompts (customer_id) WHERE customer_id IS NOT NULL;

-- =============================================================================
-- Function to update updated_at timestamp
-- =============================================================================
CREATE OR REPLACE FUNCTION update_updated_at_column()
RETURNS TRIGGER AS $$
BEGIN
  NEW.updated_at = NOW();
  RETURN NEW;
END;
$$ language 'plpgsql';

DROP TRIGGER IF EXISTS update_customers_updated_at ON customers;
CREATE TRIGGER update_customers_updated_at
  BEFORE UPDATE ON customers
  FOR EACH ROW EXECUTE FUNCTION update_updated_at_column();

DROP TRIGGER IF EXISTS update_prompts_updated_at ON prompts;
CREATE TRIGGER update_prompts_updated_at
  BEFORE UPDATE ON prompts
  FOR EACH ROW EXECUTE FUNCTION update_updated_at_column();
`;
