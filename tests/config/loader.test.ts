/**
 * Querywise - Configuration Loader Tests
 */

import fs from 'fs';
import os from 'os';
import path from 'path';

import { describe, it, expect, beforeAll, afterAll } from '@jest/globals';

import { ConfigLoader } from '../../src/config/loader.js';
import { ConfigurationError } from '../../src/utils/types.js';

const MISSING_FILE = path.join(os.tmpdir(), 'querywise-missing.config.yaml');

describe('ConfigLoader', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'querywise-config-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(name: string, content: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, content);
    return file;
  }

  it('should apply defaults when no file exists', async () => {
    const config = await new ConfigLoader(MISSING_FILE, { SECRET_KEY: 'test-secret' }).load();

    expect(config.server).toEqual({ port: 8000, host: '0.0.0.0', nodeEnv: 'development', apiPrefix: '/api/v1' });
    expect(config.database.schemaName).toBe('public');
    expect(config.database.statementTimeoutMs).toBe(30000);
    expect(config.database.sampleRows).toBe(3);
    expect(config.llm).toEqual({
      apiKey: undefined,
      model: 'gpt-4o',
      generationFallbackModel: 'gpt-4',
      debugFallbackModel: 'gpt-3.5-turbo',
      timeoutMs: 60000,
      summaryMaxRows: 10,
    });
    expect(config.auth).toEqual({ secretKey: 'test-secret', accessTokenExpireMinutes: 30 });
  });

  it('should fail without a secret key', async () => {
    await expect(new ConfigLoader(MISSING_FILE, {}).load()).rejects.toThrow(ConfigurationError);
  });

  it('should read YAML and let the environment win', async () => {
    const file = writeConfig(
      'querywise.config.yaml',
      [
        'server:',
        '  port: 9000',
        'database:',
        '  host: db.internal',
        '  schemaName: sales',
        '  sampleRows: 0',
        'store:',
        '  database: querywise_store',
        'llm:',
        '  model: gpt-4o-mini',
        'auth:',
        '  secretKey: file-secret',
        '',
      ].join('\n')
    );

    const config = await new ConfigLoader(file, {
      PORT: '8100',
      POSTGRES_STATEMENT_TIMEOUT_MS: '5000',
      OPENAI_API_KEY: 'sk-env',
    }).load();

    expect(config.server.port).toBe(8100);
    expect(config.database.host).toBe('db.internal');
    expect(config.database.schemaName).toBe('sales');
    expect(config.database.sampleRows).toBe(0);
    expect(config.database.statementTimeoutMs).toBe(5000);
    expect(config.store.database).toBe('querywise_store');
    expect(config.store.host).toBe('localhost');
    expect(config.llm.model).toBe('gpt-4o-mini');
    expect(config.llm.apiKey).toBe('sk-env');
    expect(config.auth.secretKey).toBe('file-secret');
    expect(config.configFilePath).toBe(file);
  });

  it('should read store settings from their own environment prefix', async () => {
    const config = await new ConfigLoader(MISSING_FILE, {
      SECRET_KEY: 'test-secret',
      POSTGRES_HOST: 'target-db',
      STORE_POSTGRES_HOST: 'store-db',
      STORE_POSTGRES_SSL: 'true',
    }).load();

    expect(config.database.host).toBe('target-db');
    expect(config.store.host).toBe('store-db');
    expect(config.store.ssl).toBe(true);
    expect(config.database.ssl).toBe(false);
  });

  it('should fall back to defaults for an invalid file', async () => {
    const file = writeConfig('invalid.config.yaml', 'server:\n  port: "not a number"\n');

    const config = await new ConfigLoader(file, { SECRET_KEY: 'test-secret' }).load();

    expect(config.server.port).toBe(8000);
  });

  it('should accept JSON files', async () => {
    const file = writeConfig(
      'querywise.config.json',
      JSON.stringify({ llm: { summaryMaxRows: 25 }, auth: { secretKey: 'json-secret' } })
    );

    const config = await new ConfigLoader(file, {}).load();

    expect(config.llm.summaryMaxRows).toBe(25);
    expect(config.auth.secretKey).toBe('json-secret');
  });

  it('should ignore unknown log levels from the environment', async () => {
    const config = await new ConfigLoader(MISSING_FILE, {
      SECRET_KEY: 'test-secret',
      LOG_LEVEL: 'verbose',
      LOG_FORMAT: 'JSON',
    }).load();

    expect(config.logging.level).toBe('info');
    expect(config.logging.format).toBe('json');
  });
});
