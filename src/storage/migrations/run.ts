/**
 * Querywise - Database Migration Runner
 * Applies pending store migrations. Runs at startup and as `npm run db:migrate`.
 */

import dotenv from 'dotenv';

import { ConfigLoader } from '../../config/loader.js';
import logger from '../../utils/logger.js';
import { PostgresClient, type DatabaseClient } from '../postgres.js';

import * as initialSchema from './001-initial-schema.js';

// =============================================================================
// Migration Registry
// =============================================================================

export interface Migration {
  migrationName: string;
  migrationDate: string;
  up: string;
}

export const MIGRATIONS: readonly Migration[] = [initialSchema];

interface AppliedMigration {
  name: string;
}

// =============================================================================
// Migration Runner
// =============================================================================

/**
 * Apply every migration not yet recorded in schema_migrations, each in its
 * own transaction. Returns the names applied.
 */
export async function runMigrations(
  db: DatabaseClient,
  migrations: readonly Migration[] = MIGRATIONS
): Promise<string[]> {
  await db.execute(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);

  const applied = await db.query<AppliedMigration>('SELECT name FROM schema_migrations ORDER BY id');
  const appliedNames = new Set(applied.map((migration) => migration.name));

  const pending = migrations.filter((migration) => !appliedNames.has(migration.migrationName));
  for (const migration of pending) {
    logger.info('Applying migration', { migration: migration.migrationName });

    await db.transaction(async (t) => {
      await t.none(migration.up);
      await t.none('INSERT INTO schema_migrations (name) VALUES ($1)', [migration.migrationName]);
    });
  }

  if (pending.length === 0) {
    logger.info('Store schema is up to date', { applied: appliedNames.size });
  } else {
    logger.info('Migrations applied', { count: pending.length });
  }

  return pending.map((migration) => migration.migrationName);
}

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  dotenv.config();
  const config = await new ConfigLoader().load();
  const store = new PostgresClient(config.store, { name: 'store' });

  try {
    await store.connect();
    await runMigrations(store);
  } finally {
    await store.close();
  }
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Migration failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    process.exit(1);
  });
}
