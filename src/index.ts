/**
 * Querywise - Natural-Language Query Service
 *
 * Main Application Entry Point
 */

import 'dotenv/config';

import { AuthService } from './auth/index.js';
import { loadConfig } from './config/index.js';
import { OpenAICompletionFactory, SchemaProvider, createQueryService } from './pipeline/index.js';
import { QuerywiseServer, createQuerywiseServer } from './server/server.js';
import {
  CustomerRepository,
  PostgresClient,
  PostgresSchemaIntrospector,
  PromptRepository,
  runMigrations,
  seedDefaultPrompts,
} from './storage/index.js';
import { configureLogger, logger, logLifecycle, type QuerywiseConfig } from './utils/index.js';

// =============================================================================
// Global State
// =============================================================================

let server: QuerywiseServer | null = null;
const pools: PostgresClient[] = [];
let isShuttingDown = false;

// =============================================================================
// Application Startup
// =============================================================================

/**
 * Connect a pool, logging instead of failing so the API still comes up
 */
async function connectPool(client: PostgresClient, label: string): Promise<boolean> {
  try {
    await client.connect();
    logLifecycle('startup', `${label} connected`);
    return true;
  } catch (error) {
    logger.error(`Could not connect to ${label}`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}

async function prepareStore(store: PostgresClient, prompts: PromptRepository): Promise<void> {
  try {
    await runMigrations(store);
    await seedDefaultPrompts(prompts);
  } catch (error) {
    logger.error('Store preparation failed, continuing with built-in prompts', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

async function bootstrap(): Promise<void> {
  const config: QuerywiseConfig = await loadConfig();
  configureLogger(config.logging);

  logLifecycle('startup', 'Querywise starting up...', {
    port: config.server.port,
    host: config.server.host,
    environment: config.server.nodeEnv,
  });

  const store = new PostgresClient(config.store, { name: 'store' });
  const target = new PostgresClient(config.database, {
    name: 'target',
    statementTimeoutMs: config.database.statementTimeoutMs,
  });
  pools.push(store, target);

  const customers = new CustomerRepository(store);
  const promptStore = new PromptRepository(store);

  if (await connectPool(store, 'Store database')) {
    await prepareStore(store, promptStore);
  }

  const schemaProvider = new SchemaProvider(
    new PostgresSchemaIntrospector(target, config.database.schemaName),
    { sampleRows: config.database.sampleRows }
  );
  if (await connectPool(target, 'Target database')) {
    await schemaProvider.initialize();
  }

  const queryService = createQueryService({
    llm: config.llm,
    completions: new OpenAICompletionFactory(config.llm),
    promptStore,
    schema: schemaProvider,
    runner: target,
  });

  server = createQuerywiseServer({
    config: config.server,
    api: {
      authService: new AuthService(config.auth, customers),
      queryService,
      schemaProvider,
      promptStore,
    },
  });
  await server.start();
}

// =============================================================================
// Graceful Shutdown
// =============================================================================

async function gracefulShutdown(signal: string): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal', { signal });
    return;
  }

  isShuttingDown = true;
  logLifecycle('shutdown', `Received ${signal}, starting graceful shutdown...`);

  const shutdownTimeout = setTimeout(() => {
    logger.error('Graceful shutdown timed out, forcing exit');
    process.exit(1);
  }, 30000);

  try {
    if (server !== null) {
      await server.shutdown(signal);
    }

    for (const pool of pools) {
      await pool.close();
    }

    clearTimeout(shutdownTimeout);
    logLifecycle('shutdown', 'Querywise shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(shutdownTimeout);
    logLifecycle('error', 'Error during shutdown', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  }
}

process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled promise rejection', {
    reason: reason instanceof Error ? reason.message : String(reason),
  });
});

// =============================================================================
// Start Application
// =============================================================================

bootstrap().catch((error: unknown) => {
  logLifecycle('error', 'Failed to start Querywise', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
