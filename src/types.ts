import type { Context } from "hono";
import type { SqliteAdapter } from "./adapters/sqlite";
import type { SchemaRegistry } from "./services/schema-registry";

/**
 * What request handlers need from the running catalog.
 */
export interface CatalogContext {
  registry: SchemaRegistry;
  tablesDir: string;
  /** Null when the catalog database does not exist yet. */
  openDatabase(): SqliteAdapter | null;
  /** Called once a handler is done with an adapter from openDatabase. */
  releaseDatabase(adapter: SqliteAdapter): void;
}

// Define context variables that can be set/get
export type Variables = {
  catalog: CatalogContext;
};

export type AppEnv = { Variables: Variables };

export type AppContext = Context<AppEnv>;
