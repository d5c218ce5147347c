/**
 * Querywise - PostgreSQL Schema Introspector
 *
 * Reads tables, columns and keys of one schema from information_schema.
 */

import type { SchemaSource } from '../pipeline/schema-provider.js';
import type { Row, SchemaInfo, TableInfo } from '../pipeline/types.js';
import type { DatabaseClient } from './postgres.js';

export interface ColumnRow {
  tableName: string;
  columnName: string;
  dataType: string;
  isNullable: string;
}

export interface PrimaryKeyRow {
  tableName: string;
  columnName: string;
}

export interface ForeignKeyRow {
  constraintName: string;
  tableName: string;
  columnName: string;
  referredTable: string;
  referredColumn: string;
}

const TABLES_SQL = `
  SELECT table_name as "tableName"
  FROM information_schema.tables
  WHERE table_schema = $1 AND table_type = 'BASE TABLE'
  ORDER BY table_name
`;

const COLUMNS_SQL = `
  SELECT table_name as "tableName", column_name as "columnName",
         data_type as "dataType", is_nullable as "isNullable"
  FROM information_schema.columns
  WHERE table_schema = $1
  ORDER BY table_name, ordinal_position
`;

const PRIMARY_KEYS_SQL = `
  SELECT tc.table_name as "tableName", kcu.column_name as "columnName"
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
  WHERE tc.constraint_type = 'PRIMARY KEY' AND tc.table_schema = $1
  ORDER BY tc.table_name, kcu.ordinal_position
`;

const FOREIGN_KEYS_SQL = `
  SELECT tc.constraint_name as "constraintName", tc.table_name as "tableName",
         kcu.column_name as "columnName", ccu.table_name as "referredTable",
         ccu.column_name as "referredColumn"
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON tc.constraint_name = kcu.constraint_name AND tc.table_schema = kcu.table_schema
  JOIN information_schema.constraint_column_usage ccu
    ON tc.constraint_name = ccu.constraint_name AND tc.table_schema = ccu.table_schema
  WHERE tc.constraint_type = 'FOREIGN KEY' AND tc.table_schema = $1
  ORDER BY tc.table_name, tc.constraint_name, kcu.ordinal_position
`;

export class PostgresSchemaIntrospector implements SchemaSource {
  private db: DatabaseClient;
  private schemaName: string;

  constructor(db: DatabaseClient, schemaName = 'public') {
    this.db = db;
    this.schemaName = schemaName;
  }

  async loadSchema(): Promise<SchemaInfo> {
    const tables = await this.db.query<{ tableName: string }>(TABLES_SQL, [this.schemaName]);
    const columns = await this.db.query<ColumnRow>(COLUMNS_SQL, [this.schemaName]);
    const primaryKeys = await this.db.query<PrimaryKeyRow>(PRIMARY_KEYS_SQL, [this.schemaName]);
    const foreignKeys = await this.db.query<ForeignKeyRow>(FOREIGN_KEYS_SQL, [this.schemaName]);

    return buildSchemaInfo(
      tables.map((table) => table.tableName),
      columns,
      primaryKeys,
      foreignKeys
    );
  }

  async sampleTable(table: string, limit: number): Promise<Row[]> {
    return this.db.query<Row>('SELECT * FROM $1:name.$2:name LIMIT $3', [
      this.schemaName,
      table,
      limit,
    ]);
  }
}

/**
 * Group the flat information_schema rows per table. Rows for tables outside
 * `tableNames` (views) are ignored.
 */
export function buildSchemaInfo(
  tableNames: string[],
  columns: ColumnRow[],
  primaryKeys: PrimaryKeyRow[],
  foreignKeys: ForeignKeyRow[]
): SchemaInfo {
  const schema: Record<string, TableInfo> = {};
  for (const name of tableNames) {
    schema[name] = { columns: [], primaryKeys: [], foreignKeys: [] };
  }

  for (const column of columns) {
    schema[column.tableName]?.columns.push({
      name: column.columnName,
      type: column.dataType,
      nullable: column.isNullable === 'YES',
    });
  }

  for (const key of primaryKeys) {
    schema[key.tableName]?.primaryKeys.push(key.columnName);
  }

  const byConstraint = new Map<string, ForeignKeyRow[]>();
  for (const row of foreignKeys) {
    const key = `${row.tableName}.${row.constraintName}`;
    byConstraint.set(key, [...(byConstraint.get(key) ?? []), row]);
  }
  for (const rows of byConstraint.values()) {
    const [first] = rows;
    const table = first ? schema[first.tableName] : undefined;
    if (!first || !table) {
      continue;
    }
    table.foreignKeys.push({
      constrainedColumns: [...new Set(rows.map((row) => row.columnName))],
      referredTable: first.referredTable,
      referredColumns: [...new Set(rows.map((row) => row.referredColumn))],
    });
  }

  return schema;
}
