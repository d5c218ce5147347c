/**
 * Querywise - Store Repository Tests
 */

import { describe, it, expect } from '@jest/globals';

import { DEFAULT_PROMPTS } from '../../src/pipeline/prompts.js';
import { CustomerRepository } from '../../src/storage/customer-repository.js';
import { MIGRATIONS, runMigrations } from '../../src/storage/migrations/run.js';
import { PromptRepository, seedDefaultPrompts } from '../../src/storage/prompt-repository.js';
import { InMemoryPromptStore, RecordingDatabase } from '../helpers/fakes.js';

const CREATED = new Date('2026-02-01T00:00:00Z');

describe('CustomerRepository', () => {
  it('should keep only string prompt settings', async () => {
    const db = new RecordingDatabase(() => [
      {
        customerId: 'acme',
        passwordHash: 'hashed-test-password',
        openaiApiKey: null,
        promptSettings: { sql_system_message: 'custom', retries: 3 },
        createdAt: CREATED,
        updatedAt: CREATED,
      },
    ]);

    const customer = await new CustomerRepository(db).findById('acme');

    expect(customer?.promptSettings).toEqual({ sql_system_message: 'custom' });
    expect(db.calls[0]?.params).toEqual(['acme']);
  });

  it('should return null for an unknown customer', async () => {
    const db = new RecordingDatabase(() => []);
    await expect(new CustomerRepository(db).findById('nobody')).resolves.toBeNull();
  });

  it('should return null when the id is taken', async () => {
    const db = new RecordingDatabase(() => []);
    const created = await new CustomerRepository(db).create({
      customerId: 'acme',
      passwordHash: 'hashed-test-password',
    });

    expect(created).toBeNull();
    expect(db.calls[0]?.sql).toContain('ON CONFLICT (customer_id) DO NOTHING');
    expect(db.calls[0]?.params).toEqual(['acme', 'hashed-test-password', null]);
  });
});

describe('PromptRepository', () => {
  it('should overlay customer prompts on the defaults', async () => {
    const db = new RecordingDatabase(() => [
      { promptId: 'sql_system_message', customerId: null, promptText: 'stored default' },
      { promptId: 'sql_system_message', customerId: 'acme', promptText: 'acme generation' },
    ]);

    const prompts = await new PromptRepository(db).listForCustomer('acme');

    expect(prompts).toEqual({
      sql_system_message: 'acme generation',
      sql_debug_system_message: DEFAULT_PROMPTS.sql_debug_system_message.text,
      result_summary_system_message: DEFAULT_PROMPTS.result_summary_system_message.text,
    });
  });

  it('should upsert with the built-in description when none is given', async () => {
    const db = new RecordingDatabase();

    await new PromptRepository(db).upsert({
      promptId: 'result_summary_system_message',
      promptText: 'Be brief.',
      customerId: 'acme',
    });

    expect(db.calls[0]?.params).toEqual([
      'result_summary_system_message',
      'acme',
      'Be brief.',
      'System message for summarizing SQL query results',
      false,
    ]);
  });

  it('should look up the customer record before the default', async () => {
    const db = new RecordingDatabase(() => [{ promptText: 'acme text' }]);

    await expect(new PromptRepository(db).getPromptText('sql_system_message', 'acme')).resolves.toBe(
      'acme text'
    );
    expect(db.calls[0]?.sql).toContain('ORDER BY customer_id NULLS LAST');
    expect(db.calls[0]?.params).toEqual(['sql_system_message', 'acme']);
  });
});

describe('seedDefaultPrompts', () => {
  it('should write the three built-in prompts as defaults', async () => {
    const store = new InMemoryPromptStore();

    await expect(seedDefaultPrompts(store)).resolves.toBe(3);

    const info = await store.getInfo();
    expect(info.defaultPrompts.map((prompt) => prompt.promptId).sort()).toEqual([
      'result_summary_system_message',
      'sql_debug_system_message',
      'sql_system_message',
    ]);
    expect(info.customerPrompts).toEqual([]);
  });
});

describe('runMigrations', () => {
  it('should apply pending migrations and record them', async () => {
    const db = new RecordingDatabase(() => []);

    const applied = await runMigrations(db);

    expect(applied).toEqual(['001-initial-schema']);
    expect(db.taskStatements).toHaveLength(2);
    expect(db.taskStatements[0]?.sql).toBe(MIGRATIONS[0]?.up);
    expect(db.taskStatements[1]?.params).toEqual(['001-initial-schema']);
  });

  it('should skip migrations already applied', async () => {
    const db = new RecordingDatabase(() => [{ name: '001-initial-schema' }]);

    await expect(runMigrations(db)).resolves.toEqual([]);
    expect(db.taskStatements).toHaveLength(0);
  });
});
