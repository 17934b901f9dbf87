import { existsSync, mkdirSync, readdirSync, readFileSync, statSync, unlinkSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { SqliteAdapter } from "../adapters/sqlite";
import { structuredLog } from "../utils/structured-logger";
import type { SqlSource } from "./builder";
import { catalogTables, renderTableDump, type TableDump } from "./dumper";
import type { SchemaRegistry } from "./schema-registry";
import { parseSqlStatements } from "./sql-statements";
import { syncState, type SyncState } from "./sync-state";

/**
 * On-disk catalog layout: `<tablesDir>/<category>/*.sql`.
 *
 * All .sql files of a category directory are concatenated in file-name
 * order into one source. A dump leaves exactly `<category>/<category>.sql`.
 */

function sqlFilesIn(dir: string): string[] {
  return readdirSync(dir)
    .filter((f) => f.endsWith(".sql"))
    .sort();
}

function categoryDirs(tablesDir: string): string[] {
  if (!existsSync(tablesDir)) return [];
  return readdirSync(tablesDir)
    .filter((name) => statSync(join(tablesDir, name)).isDirectory())
    .sort();
}

export function readCategorySources(tablesDir: string): SqlSource[] {
  const sources: SqlSource[] = [];
  for (const name of categoryDirs(tablesDir)) {
    const dir = join(tablesDir, name);
    const files = sqlFilesIn(dir);
    if (files.length === 0) continue;
    sources.push({
      label: dir,
      sql: files.map((f) => readFileSync(join(dir, f), "utf-8")).join("\n"),
    });
  }
  return sources;
}

/**
 * Write one table's dump and remove any other .sql file in its directory.
 */
export function writeDump(tablesDir: string, dump: TableDump): string {
  const dir = join(tablesDir, dump.category);
  mkdirSync(dir, { recursive: true });

  const target = `${dump.category}.sql`;
  for (const file of sqlFilesIn(dir)) {
    if (file !== target) {
      unlinkSync(join(dir, file));
      structuredLog("INFO", "Removed superseded SQL file", { category: dump.category, step: "dump", file });
    }
  }

  const path = join(dir, target);
  writeFileSync(path, dump.sql, "utf-8");
  return path;
}

/**
 * Schema-only dumps for every registered category that has no SQL yet.
 * Returns the categories written.
 */
export function initTables(tablesDir: string, registry: SchemaRegistry, overwrite = false): string[] {
  const written: string[] = [];
  for (const category of registry.categories()) {
    const dir = join(tablesDir, category);
    if (!overwrite && existsSync(dir) && sqlFilesIn(dir).length > 0) continue;
    writeDump(tablesDir, { category, sql: renderTableDump(registry, category, []), rowCount: 0 });
    written.push(category);
  }
  return written;
}

// =============================================================================
// Status
// =============================================================================

export interface TableStatus {
  category: string;
  /** INSERT statements in the SQL text, null when the category has no text. */
  textRows: number | null;
  /** Rows in the database, null when the table does not exist. */
  dbRows: number | null;
}

export interface CatalogStatus {
  tables: TableStatus[];
  /** Null when there is no database. */
  syncState: SyncState | null;
}

export function textRowCounts(sources: SqlSource[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const source of sources) {
    const statements = parseSqlStatements(source.sql);
    const created = statements.find((s) => s.kind === "create");
    if (!created?.table) continue;
    counts.set(created.table, statements.filter((s) => s.kind === "insert").length);
  }
  return counts;
}

export function catalogStatus(
  tablesDir: string,
  adapter: SqliteAdapter | null,
  registry: SchemaRegistry
): CatalogStatus {
  const text = textRowCounts(readCategorySources(tablesDir));
  const present = new Set(adapter ? catalogTables(adapter, registry).present : []);

  const tables = registry.categories().map((category) => ({
    category,
    textRows: text.get(category) ?? null,
    dbRows: adapter && present.has(category) ? adapter.countRows(category) : null,
  }));

  return { tables, syncState: adapter ? syncState(adapter, registry) : null };
}
