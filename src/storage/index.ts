/**
 * Querywise - Storage Module
 *
 * Barrel export file for the database client, repositories and migrations
 */

export { PostgresClient } from './postgres.js';
export type { DatabaseClient, PostgresClientOptions } from './postgres.js';

export { CustomerRepository } from './customer-repository.js';
export type { CustomerRecord, CustomerStore, NewCustomer } from './customer-repository.js';

export { PromptRepository, seedDefaultPrompts } from './prompt-repository.js';
export type { PromptAdminStore, PromptInfo, PromptRecord, PromptUpsert } from './prompt-repository.js';

export { PostgresSchemaIntrospector, buildSchemaInfo } from './schema-introspector.js';

export { MIGRATIONS, runMigrations } from './migrations/run.js';
export type { Migration } from './migrations/run.js';
