import Database from "better-sqlite3";
import { existsSync, mkdirSync, unlinkSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import { SETTINGS_TABLE } from "../config/columns";
import { quoteIdentifier } from "../services/sql-statements";
import type { SqlRow, SqlValue } from "../services/sql-values";

export type CatalogDatabase = Database.Database;

export interface ColumnInfo {
  name: string;
  type: string;
}

export interface OpenOptions {
  /** Delete any existing file first. */
  fresh?: boolean;
  readonly?: boolean;
}

const TableInfoRow = z.object({
  name: z.string(),
  type: z.string(),
});

const NameRow = z.object({ name: z.string() });
const CountRow = z.object({ n: z.number() });
const SettingRow = z.object({ value: z.string() });

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

/**
 * Open a catalog database. Integers are read back as bigint so that
 * INTEGER and REAL storage classes stay distinguishable.
 */
export function openCatalogDatabase(path: string, options: OpenOptions = {}): CatalogDatabase {
  if (path !== ":memory:") {
    if (options.fresh) {
      for (const suffix of ["", "-journal", "-wal", "-shm"]) {
        if (existsSync(path + suffix)) unlinkSync(path + suffix);
      }
    }
    if (!options.readonly) ensureDir(dirname(path));
  }

  const db = new Database(path, { readonly: options.readonly ?? false, fileMustExist: options.readonly ?? false });
  db.defaultSafeIntegers(true);
  db.pragma("busy_timeout = 5000");
  return db;
}

function toSqlValue(value: unknown, column: string): SqlValue {
  if (
    value === null ||
    typeof value === "bigint" ||
    typeof value === "number" ||
    typeof value === "string" ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }
  throw new TypeError(`Unexpected value of type ${typeof value} in column '${column}'`);
}

function toSqlRow(raw: unknown): SqlRow {
  if (typeof raw !== "object" || raw === null) {
    throw new TypeError("Expected a row object");
  }
  const row: SqlRow = {};
  for (const [key, value] of Object.entries(raw)) {
    row[key] = toSqlValue(value, key);
  }
  return row;
}

/**
 * Thin typed layer over a better-sqlite3 connection.
 */
export class SqliteAdapter {
  constructor(public readonly db: CatalogDatabase) {}

  /**
   * User tables, lexicographically sorted.
   */
  listTables(): string[] {
    const rows = this.db
      .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name")
      .all();
    return rows.map((r) => NameRow.parse(r).name);
  }

  tableExists(table: string): boolean {
    const row = this.db.prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?").get(table);
    return row !== undefined;
  }

  tableColumns(table: string): ColumnInfo[] {
    const rows = this.db.prepare(`PRAGMA table_info(${quoteIdentifier(table)})`).safeIntegers(false).all();
    return rows.map((r) => {
      const info = TableInfoRow.parse(r);
      return { name: info.name, type: info.type };
    });
  }

  countRows(table: string): number {
    const row = this.db.prepare(`SELECT COUNT(*) AS n FROM ${quoteIdentifier(table)}`).safeIntegers(false).get();
    return CountRow.parse(row).n;
  }

  /**
   * All rows of a table with the given columns, in storage order.
   */
  selectRows(table: string, columns: string[]): SqlRow[] {
    const list = columns.map(quoteIdentifier).join(", ");
    return this.db.prepare(`SELECT ${list} FROM ${quoteIdentifier(table)}`).all().map(toSqlRow);
  }

  getSetting(key: string): string | null {
    if (!this.tableExists(SETTINGS_TABLE)) return null;
    const row = this.db.prepare(`SELECT value FROM ${SETTINGS_TABLE} WHERE key = ?`).get(key);
    return row === undefined ? null : SettingRow.parse(row).value;
  }

  setSetting(key: string, value: string): void {
    this.db.exec(`CREATE TABLE IF NOT EXISTS ${SETTINGS_TABLE} (key TEXT PRIMARY KEY, value TEXT)`);
    this.db
      .prepare(`INSERT INTO ${SETTINGS_TABLE} (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value`)
      .run(key, value);
  }

  close(): void {
    this.db.close();
  }
}
