/**
 * Querywise - Heuristic SQL Fixer Tests
 */

import { describe, it, expect } from '@jest/globals';

import {
  correctNearMissTables,
  editDistance,
  fixQuery,
  normalizeTableNames,
  quoteBarewordLiterals,
} from '../../src/pipeline/heuristic-fixer.js';
import type { TableInfo } from '../../src/pipeline/types.js';
import { SHOP_SCHEMA } from '../helpers/fakes.js';

describe('quoteBarewordLiterals', () => {
  it('should quote a bare word on the right of a comparison', () => {
    expect(quoteBarewordLiterals("SELECT * FROM users WHERE status = active", SHOP_SCHEMA)).toBe(
      "SELECT * FROM users WHERE status = 'active'"
    );
  });

  it('should leave quoted literals, numbers, calls and casts alone', () => {
    const query =
      "SELECT * FROM users WHERE status = 'active' AND id = 42 AND name = lower('X') AND id = id::int";
    expect(quoteBarewordLiterals(query, SHOP_SCHEMA)).toBe(query);
  });

  it('should not quote SQL value keywords', () => {
    const query = 'SELECT * FROM users WHERE status = NULL OR status = true';
    expect(quoteBarewordLiterals(query, SHOP_SCHEMA)).toBe(query);
  });

  it('should quote the table part of a qualified column reference', () => {
    expect(
      quoteBarewordLiterals('SELECT * FROM users u JOIN orders o ON o.user_id = u.id', SHOP_SCHEMA)
    ).toBe("SELECT * FROM users u JOIN orders o ON o.user_id = 'u'.id");
  });
});

describe('normalizeTableNames', () => {
  it('should map singular and miscased names onto the schema table', () => {
    expect(normalizeTableNames('SELECT * FROM user JOIN Orders ON true', SHOP_SCHEMA)).toBe(
      'SELECT * FROM users JOIN orders ON true'
    );
  });

  it('should not touch identifiers that merely start with a table name', () => {
    const query = 'SELECT user_id FROM orders';
    expect(normalizeTableNames(query, SHOP_SCHEMA)).toBe(query);
  });

  it('should not rewrite inside string literals', () => {
    const query = "SELECT * FROM users WHERE name = 'User'";
    expect(normalizeTableNames(query, SHOP_SCHEMA)).toBe(query);
  });
});

describe('correctNearMissTables', () => {
  it('should replace a table one edit away after FROM or JOIN', () => {
    expect(correctNearMissTables('SELECT * FROM usrs', SHOP_SCHEMA)).toBe('SELECT * FROM users');
    expect(correctNearMissTables('SELECT * FROM users JOIN ordrs ON true', SHOP_SCHEMA)).toBe(
      'SELECT * FROM users JOIN orders ON true'
    );
  });

  it('should leave distant or short names alone', () => {
    expect(correctNearMissTables('SELECT * FROM customers', SHOP_SCHEMA)).toBe(
      'SELECT * FROM customers'
    );
    expect(correctNearMissTables('SELECT * FROM us', SHOP_SCHEMA)).toBe('SELECT * FROM us');
  });

  it('should fix tables inside subqueries', () => {
    expect(correctNearMissTables('SELECT * FROM (SELECT id FROM usrs) AS u', SHOP_SCHEMA)).toBe(
      'SELECT * FROM (SELECT id FROM users) AS u'
    );
  });

  it('should leave the FROM of EXTRACT and SUBSTRING alone', () => {
    expect(correctNearMissTables('SELECT EXTRACT(YEAR FROM usrs) FROM users', SHOP_SCHEMA)).toBe(
      'SELECT EXTRACT(YEAR FROM usrs) FROM users'
    );
    expect(
      correctNearMissTables("SELECT SUBSTRING(name FROM ordrs) FROM users WHERE name = 'x)'", SHOP_SCHEMA)
    ).toBe("SELECT SUBSTRING(name FROM ordrs) FROM users WHERE name = 'x)'");
  });

  it('should leave names with more than one candidate alone', () => {
    const table: TableInfo = { columns: [], primaryKeys: [], foreignKeys: [] };
    expect(correctNearMissTables('SELECT * FROM carx', { cart: table, card: table })).toBe(
      'SELECT * FROM carx'
    );
  });
});

describe('editDistance', () => {
  it('should count insertions, deletions and substitutions', () => {
    expect(editDistance('usrs', 'users')).toBe(1);
    expect(editDistance('orders', 'ordrs')).toBe(1);
    expect(editDistance('kitten', 'sitting')).toBe(3);
    expect(editDistance('same', 'same')).toBe(0);
  });
});

describe('fixQuery', () => {
  it('should report whether anything changed', () => {
    expect(fixQuery("SELECT * FROM users WHERE status = 'active'", SHOP_SCHEMA)).toEqual({
      query: "SELECT * FROM users WHERE status = 'active'",
      changed: false,
    });
    expect(fixQuery('SELECT * FROM usrs WHERE status = active', SHOP_SCHEMA)).toEqual({
      query: "SELECT * FROM users WHERE status = 'active'",
      changed: true,
    });
  });

  it('should be idempotent', () => {
    const once = fixQuery('SELECT name FROM user WHERE status = inactive', SHOP_SCHEMA);
    const twice = fixQuery(once.query, SHOP_SCHEMA);
    expect(once.query).toBe("SELECT name FROM users WHERE status = 'inactive'");
    expect(twice).toEqual({ query: once.query, changed: false });
  });
});
