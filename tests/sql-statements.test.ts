/**
 * Tests for SQL statement splitting and classification
 */

import { describe, it, expect } from 'vitest';
import {
  classifyStatement,
  parseSqlStatements,
  quoteIdentifier,
  splitSqlStatements,
  unquoteIdentifier,
} from '../src/services/sql-statements';

describe('splitSqlStatements', () => {
  it('should not split on semicolons inside string literals', () => {
    const statements = splitSqlStatements(
      "INSERT INTO leds (part_id) VALUES ('x;y');\nINSERT INTO leds (part_id) VALUES ('it''s;');"
    );
    expect(statements.map((s) => s.sql)).toEqual([
      "INSERT INTO leds (part_id) VALUES ('x;y')",
      "INSERT INTO leds (part_id) VALUES ('it''s;')",
    ]);
  });

  it('should drop comments and report the first line of each statement', () => {
    const statements = splitSqlStatements('-- header\n-- more\n\nDROP TABLE IF EXISTS leds;\n/* a\nb */ COMMIT;');
    expect(statements).toEqual([
      { sql: 'DROP TABLE IF EXISTS leds', line: 4 },
      { sql: 'COMMIT', line: 6 },
    ]);
  });

  it('should keep comment markers that appear inside literals', () => {
    const [stmt] = splitSqlStatements("INSERT INTO leds (description) VALUES ('-- not a comment');");
    expect(stmt.sql).toBe("INSERT INTO leds (description) VALUES ('-- not a comment')");
  });

  it('should ignore a trailing fragment made only of whitespace', () => {
    expect(splitSqlStatements('COMMIT;\n\n  ')).toHaveLength(1);
  });
});

describe('classifyStatement', () => {
  it('should find the target table of DDL and inserts', () => {
    expect(classifyStatement('CREATE TABLE IF NOT EXISTS "leds" (part_id TEXT)')).toMatchObject({
      kind: 'create',
      table: 'leds',
    });
    expect(classifyStatement('DROP TABLE IF EXISTS bjt')).toMatchObject({ kind: 'drop', table: 'bjt' });
    expect(classifyStatement('INSERT OR REPLACE INTO main.leds (part_id) VALUES (1)')).toMatchObject({
      kind: 'insert',
      table: 'leds',
    });
    expect(classifyStatement('insert into [switches] values (1)')).toMatchObject({
      kind: 'insert',
      table: 'switches',
    });
  });

  it('should classify transaction control and everything else', () => {
    expect(classifyStatement('BEGIN TRANSACTION').kind).toBe('transaction');
    expect(classifyStatement('COMMIT').kind).toBe('transaction');
    expect(classifyStatement('PRAGMA foreign_keys = ON').kind).toBe('other');
  });
});

describe('parseSqlStatements', () => {
  it('should classify every statement of a category file', () => {
    const kinds = parseSqlStatements(
      'DROP TABLE IF EXISTS leds;\nCREATE TABLE leds (part_id TEXT PRIMARY KEY);\nBEGIN TRANSACTION;\nINSERT INTO leds (part_id) VALUES (\'A\');\nCOMMIT;\n'
    ).map((s) => `${s.kind}:${s.table ?? ''}:${s.line}`);
    expect(kinds).toEqual(['drop:leds:1', 'create:leds:2', 'transaction::3', 'insert:leds:4', 'transaction::5']);
  });
});

describe('identifier quoting', () => {
  it('should round-trip embedded double quotes', () => {
    expect(quoteIdentifier('odd"name')).toBe('"odd""name"');
    expect(unquoteIdentifier('"odd""name"')).toBe('odd"name');
    expect(unquoteIdentifier('`leds`')).toBe('leds');
    expect(unquoteIdentifier('plain')).toBe('plain');
  });
});
