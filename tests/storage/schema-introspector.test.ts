/**
 * Querywise - Schema Introspector Tests
 */

import { describe, it, expect } from '@jest/globals';

import { PostgresSchemaIntrospector, buildSchemaInfo } from '../../src/storage/schema-introspector.js';
import { RecordingDatabase } from '../helpers/fakes.js';

describe('buildSchemaInfo', () => {
  it('should group columns, keys and composite foreign keys per table', () => {
    const schema = buildSchemaInfo(
      ['order_items', 'orders'],
      [
        { tableName: 'orders', columnName: 'id', dataType: 'integer', isNullable: 'NO' },
        { tableName: 'order_items', columnName: 'order_id', dataType: 'integer', isNullable: 'NO' },
        { tableName: 'order_items', columnName: 'line', dataType: 'integer', isNullable: 'NO' },
        { tableName: 'order_items', columnName: 'note', dataType: 'text', isNullable: 'YES' },
        { tableName: 'active_orders', columnName: 'id', dataType: 'integer', isNullable: 'YES' },
      ],
      [
        { tableName: 'orders', columnName: 'id' },
        { tableName: 'order_items', columnName: 'order_id' },
        { tableName: 'order_items', columnName: 'line' },
      ],
      [
        {
          constraintName: 'order_items_order_fk',
          tableName: 'order_items',
          columnName: 'order_id',
          referredTable: 'orders',
          referredColumn: 'id',
        },
      ]
    );

    expect(schema).toEqual({
      order_items: {
        columns: [
          { name: 'order_id', type: 'integer', nullable: false },
          { name: 'line', type: 'integer', nullable: false },
          { name: 'note', type: 'text', nullable: true },
        ],
        primaryKeys: ['order_id', 'line'],
        foreignKeys: [{ constrainedColumns: ['order_id'], referredTable: 'orders', referredColumns: ['id'] }],
      },
      orders: {
        columns: [{ name: 'id', type: 'integer', nullable: false }],
        primaryKeys: ['id'],
        foreignKeys: [],
      },
    });
  });

  it('should keep tables without columns', () => {
    expect(buildSchemaInfo(['empty'], [], [], [])).toEqual({
      empty: { columns: [], primaryKeys: [], foreignKeys: [] },
    });
  });
});

describe('PostgresSchemaIntrospector', () => {
  it('should query information_schema for the configured schema', async () => {
    const db = new RecordingDatabase(() => []);
    await new PostgresSchemaIntrospector(db, 'analytics').loadSchema();

    expect(db.calls).toHaveLength(4);
    expect(db.calls.every((call) => call.params?.[0] === 'analytics')).toBe(true);
  });

  it('should sample through escaped identifiers', async () => {
    const db = new RecordingDatabase(() => [{ id: 1 }]);
    const rows = await new PostgresSchemaIntrospector(db).sampleTable('users', 3);

    expect(rows).toEqual([{ id: 1 }]);
    expect(db.calls[0]).toEqual({
      sql: 'SELECT * FROM $1:name.$2:name LIMIT $3',
      params: ['public', 'users', 3],
    });
  });
});
