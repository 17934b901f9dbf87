/**
 * Shared fixtures for catalog tests: in-memory databases, row inserts and
 * temporary directories.
 */

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { openCatalogDatabase, SqliteAdapter } from '../src/adapters/sqlite';
import type { SqlSource } from '../src/services/builder';
import { renderTableDump } from '../src/services/dumper';
import { buildDefinitions, getDefaultRegistry, SchemaRegistry } from '../src/services/schema-registry';
import { quoteIdentifier } from '../src/services/sql-statements';
import type { SqlRow } from '../src/services/sql-values';
import { setLogLevel } from '../src/utils/structured-logger';

// Structured logs would drown the reporter output
setLogLevel('CRITICAL');

export const registry = getDefaultRegistry();

export const FIXED_TIME = '2024-01-01 00:00:00';

export function memoryAdapter(): SqliteAdapter {
  return new SqliteAdapter(openCatalogDatabase(':memory:'));
}

export function createTable(adapter: SqliteAdapter, category: string, reg: SchemaRegistry = registry): void {
  adapter.db.exec(reg.createTableSql(category));
}

export function insertRow(adapter: SqliteAdapter, table: string, row: SqlRow): void {
  const columns = Object.keys(row);
  const values = columns.map((c) => {
    const v = row[c];
    if (typeof v === 'boolean') return v ? 1n : 0n;
    return v;
  });
  adapter.db
    .prepare(
      `INSERT INTO ${quoteIdentifier(table)} (${columns.map(quoteIdentifier).join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`
    )
    .run(...values);
}

/**
 * A row with fixed audit timestamps so dumps are reproducible.
 */
export function partRow(partId: string | null, extra: SqlRow = {}): SqlRow {
  return {
    part_id: partId,
    mpn: `MPN-${partId ?? 'none'}`,
    manufacturer: 'Acme',
    created_at: FIXED_TIME,
    updated_at: FIXED_TIME,
    ...extra,
  };
}

/**
 * Empty tables for every registered category plus the given rows.
 */
export function catalogSources(rows: Record<string, SqlRow[]> = {}, reg: SchemaRegistry = registry): SqlSource[] {
  return reg.categories().map((category) => ({
    label: `${category}.sql`,
    sql: renderTableDump(reg, category, rows[category] ?? []),
  }));
}

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'eda-catalog-'));
}

/**
 * A one-category registry with a case-insensitive key.
 */
export function nocaseRegistry(): SchemaRegistry {
  return new SchemaRegistry(
    buildDefinitions({
      categories: [
        {
          name: 'widgets',
          partIdPrefix: 'WID',
          keyCollation: 'nocase',
          columns: ['color', { name: 'qty', type: 'INTEGER' }],
        },
      ],
    })
  );
}
