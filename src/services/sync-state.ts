import { createHash } from "node:crypto";
import { existsSync } from "node:fs";
import { openCatalogDatabase, SqliteAdapter } from "../adapters/sqlite";
import { UnsyncedChangesError } from "../utils/errors";
import { structuredLog } from "../utils/structured-logger";
import { tableChecksum } from "./checksum";
import { catalogTables } from "./dumper";
import type { SchemaRegistry } from "./schema-registry";

/**
 * Text/database sync state.
 *
 * After a build or a dump the database content is exactly what the SQL text
 * describes: the fingerprint of all tables is stored in `settings`. Any later
 * edit changes the recomputed fingerprint.
 */

export type SyncState = "text-authoritative" | "db-ahead-of-text";

export const SYNC_FINGERPRINT_KEY = "sync.fingerprint";
export const SYNC_UPDATED_AT_KEY = "sync.updated_at";

export function computeFingerprint(adapter: SqliteAdapter, registry: SchemaRegistry): string {
  const { present } = catalogTables(adapter, registry);
  const hash = createHash("sha256");
  for (const table of present) {
    hash.update(`${table}:${tableChecksum(adapter, table)}\n`);
  }
  return hash.digest("hex");
}

export function recordSync(adapter: SqliteAdapter, registry: SchemaRegistry, now: Date = new Date()): string {
  const fingerprint = computeFingerprint(adapter, registry);
  adapter.setSetting(SYNC_FINGERPRINT_KEY, fingerprint);
  adapter.setSetting(SYNC_UPDATED_AT_KEY, now.toISOString());
  return fingerprint;
}

/**
 * A database without a recorded fingerprint was not produced from text and
 * counts as ahead of it.
 */
export function syncState(adapter: SqliteAdapter, registry: SchemaRegistry): SyncState {
  const stored = adapter.getSetting(SYNC_FINGERPRINT_KEY);
  if (stored === null) return "db-ahead-of-text";
  return stored === computeFingerprint(adapter, registry) ? "text-authoritative" : "db-ahead-of-text";
}

/**
 * Refuse to replace a database holding edits that were never dumped.
 */
export function assertSafeToRebuild(databasePath: string, registry: SchemaRegistry, force = false): void {
  if (databasePath === ":memory:" || !existsSync(databasePath)) return;
  if (force) {
    structuredLog("WARN", "Rebuilding without sync check", { step: "build", database: databasePath });
    return;
  }

  const adapter = new SqliteAdapter(openCatalogDatabase(databasePath, { readonly: true }));
  try {
    if (adapter.listTables().length === 0) return;
    if (syncState(adapter, registry) === "db-ahead-of-text") {
      throw new UnsyncedChangesError(databasePath);
    }
  } finally {
    adapter.close();
  }
}
