import { createHash } from "node:crypto";
import type { SqliteAdapter } from "../adapters/sqlite";
import { encodeTyped, type SqlRow } from "./sql-values";

/**
 * Order-independent content checksum of a table: SHA-256 over the sorted
 * typed encodings of its rows. Column names are part of each encoding.
 */

export function encodeRow(row: SqlRow, columns: string[]): string {
  return JSON.stringify(columns.map((c) => [c, encodeTyped(row[c] ?? null)]));
}

export function checksumRows(rows: SqlRow[], columns: string[]): string {
  const encoded = rows.map((r) => encodeRow(r, columns)).sort();
  const hash = createHash("sha256");
  hash.update(`${columns.length}:${rows.length}\n`);
  for (const line of encoded) {
    hash.update(line);
    hash.update("\n");
  }
  return hash.digest("hex");
}

export function tableChecksum(adapter: SqliteAdapter, table: string): string {
  const columns = adapter.tableColumns(table).map((c) => c.name);
  return checksumRows(adapter.selectRows(table, columns), columns);
}
