import { existsSync } from "node:fs";
import { openCatalogDatabase, SqliteAdapter } from "../adapters/sqlite";
import type { CatalogContext } from "../types";
import { CatalogError } from "../utils/errors";
import type { SchemaRegistry } from "./schema-registry";

/**
 * Context backed by a database file, opened read-only per request.
 */
export function fileCatalogContext(databasePath: string, tablesDir: string, registry: SchemaRegistry): CatalogContext {
  return {
    registry,
    tablesDir,
    openDatabase: () =>
      existsSync(databasePath) ? new SqliteAdapter(openCatalogDatabase(databasePath, { readonly: true })) : null,
    releaseDatabase: (adapter) => adapter.close(),
  };
}

/**
 * Run `fn` against the catalog database, releasing it afterwards.
 */
export function withCatalogDatabase<T>(catalog: CatalogContext, fn: (adapter: SqliteAdapter) => T): T {
  const adapter = catalog.openDatabase();
  if (!adapter) {
    throw new CatalogError("DATABASE_UNAVAILABLE", "The catalog database has not been built", "run", 503);
  }
  try {
    return fn(adapter);
  } finally {
    catalog.releaseDatabase(adapter);
  }
}
