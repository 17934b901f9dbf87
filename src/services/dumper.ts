import type { SqliteAdapter } from "../adapters/sqlite";
import { SETTINGS_TABLE } from "../config/columns";
import { CatalogError, DuplicateKeyError, SchemaDriftError, UnknownCategoryError, isTableScoped } from "../utils/errors";
import { errorContext, structuredLog } from "../utils/structured-logger";
import { getDefaultRegistry, type KeyCollation, type SchemaRegistry } from "./schema-registry";
import { quoteIdentifier } from "./sql-statements";
import { compareSqlValues, keyIdentity, renderSqlLiteral, type SqlRow, type SqlValue } from "./sql-values";

/**
 * Deterministic Dumper
 *
 * Renders a category table as canonical SQL text: registry column order,
 * rows sorted by primary key, one explicit-column INSERT per row. Two
 * databases with the same row content produce byte-identical dumps.
 */

export interface TableDump {
  category: string;
  sql: string;
  rowCount: number;
}

export interface DumpFailure {
  category: string;
  error: CatalogError;
}

export interface DumpAllResult {
  dumps: TableDump[];
  failures: DumpFailure[];
  /** Registered categories with no table in the database. */
  missing: string[];
}

// =============================================================================
// Table discovery
// =============================================================================

/**
 * Split the database's tables into registered-and-present and
 * registered-but-missing. A table the registry does not know is fatal.
 */
export function catalogTables(
  adapter: SqliteAdapter,
  registry: SchemaRegistry
): { present: string[]; missing: string[] } {
  const live = adapter.listTables().filter((t) => t !== SETTINGS_TABLE);
  for (const table of live) {
    if (!registry.has(table)) throw new UnknownCategoryError(table);
  }
  const liveSet = new Set(live);
  const categories = registry.categories();
  return {
    present: categories.filter((c) => liveSet.has(c)),
    missing: categories.filter((c) => !liveSet.has(c)),
  };
}

/**
 * Compare live column names and declared types against the registry.
 */
export function assertNoDrift(adapter: SqliteAdapter, registry: SchemaRegistry, category: string): void {
  const expected = registry.columnsFor(category).map((c) => `${c.name} ${c.sqlType.toUpperCase()}`);
  const actual = adapter.tableColumns(category).map((c) => `${c.name} ${c.type.toUpperCase()}`);

  const same = expected.length === actual.length && expected.every((col, i) => col === actual[i]);
  if (!same) throw new SchemaDriftError(category, expected, actual);
}

// =============================================================================
// Rendering
// =============================================================================

function foldKey(value: SqlValue, collation: KeyCollation): SqlValue {
  if (collation === "nocase" && typeof value === "string") {
    return value.replace(/[A-Z]/g, (c) => c.toLowerCase());
  }
  return value;
}

/**
 * Sort rows by primary key and reject keys that collide after
 * normalization. Returns a new array.
 */
export function sortByKey(
  category: string,
  rows: SqlRow[],
  key: string[],
  collation: KeyCollation = "binary"
): SqlRow[] {
  const seen = new Set<string>();
  for (const row of rows) {
    const values = key.map((k) => row[k] ?? null);
    const identity = keyIdentity(values, collation);
    if (seen.has(identity)) throw new DuplicateKeyError(category, key, values);
    seen.add(identity);
  }

  return [...rows].sort((a, b) => {
    for (const k of key) {
      const cmp = compareSqlValues(foldKey(a[k] ?? null, collation), foldKey(b[k] ?? null, collation));
      if (cmp !== 0) return cmp;
    }
    for (const k of key) {
      const cmp = compareSqlValues(a[k] ?? null, b[k] ?? null);
      if (cmp !== 0) return cmp;
    }
    return 0;
  });
}

export function renderInsert(table: string, columns: string[], row: SqlRow): string {
  const names = columns.map(quoteIdentifier).join(", ");
  const values = columns.map((c) => renderSqlLiteral(row[c])).join(", ");
  return `INSERT INTO ${table} (${names}) VALUES (${values});`;
}

/**
 * Canonical dump text for a set of rows. Pure: used for live tables as well
 * as for rows produced by migration and generators.
 */
export function renderTableDump(registry: SchemaRegistry, category: string, rows: SqlRow[]): string {
  const columns = registry.columnNamesFor(category);
  const key = registry.primaryKeyFor(category);
  const sorted = sortByKey(category, rows, key, registry.keyCollationFor(category));

  const lines = [
    `-- EDA Component Catalog - ${category} Table`,
    `-- Number of components: ${sorted.length}`,
    `-- Sorted by: ${key.join(", ")}`,
    "--",
    "-- This file is auto-generated and suitable for git tracking.",
    "-- Rows are sorted deterministically to ensure consistent diffs.",
    "--",
    "",
    `DROP TABLE IF EXISTS ${category};`,
    "",
    `${registry.createTableSql(category)};`,
    "",
    "BEGIN TRANSACTION;",
    "",
  ];

  if (sorted.length > 0) {
    for (const row of sorted) lines.push(renderInsert(category, columns, row));
    lines.push("");
  }
  lines.push("COMMIT;");

  return `${lines.join("\n")}\n`;
}

// =============================================================================
// Live database
// =============================================================================

/**
 * Rows of a live table in registry column order, after the drift check.
 */
export function readTableRows(adapter: SqliteAdapter, registry: SchemaRegistry, category: string): SqlRow[] {
  registry.get(category);
  if (!adapter.tableExists(category)) {
    throw new SchemaDriftError(category, registry.columnNamesFor(category), []);
  }
  assertNoDrift(adapter, registry, category);
  return adapter.selectRows(category, registry.columnNamesFor(category));
}

export function dumpTable(
  adapter: SqliteAdapter,
  category: string,
  registry: SchemaRegistry = getDefaultRegistry()
): TableDump {
  const rows = readTableRows(adapter, registry, category);
  return { category, sql: renderTableDump(registry, category, rows), rowCount: rows.length };
}

export function dump(adapter: SqliteAdapter, category: string, registry: SchemaRegistry = getDefaultRegistry()): string {
  return dumpTable(adapter, category, registry).sql;
}

/**
 * Dump every registered table present in the database. Per-table errors are
 * collected; drift and unknown tables abort the run.
 */
export function dumpAll(adapter: SqliteAdapter, registry: SchemaRegistry = getDefaultRegistry()): DumpAllResult {
  const { present, missing } = catalogTables(adapter, registry);
  const result: DumpAllResult = { dumps: [], failures: [], missing };

  for (const category of present) {
    try {
      const table = dumpTable(adapter, category, registry);
      result.dumps.push(table);
      structuredLog("INFO", "Table dumped", { category, step: "dump", rows: table.rowCount });
    } catch (err) {
      if (!isTableScoped(err)) throw err;
      structuredLog("ERROR", "Table dump failed", { category, step: "dump", ...errorContext(err) });
      result.failures.push({ category, error: err });
    }
  }

  if (missing.length > 0) {
    structuredLog("WARN", "Registered tables missing from database", { step: "dump", missing });
  }
  return result;
}
