import { serve } from "@hono/node-server";
import { resolve } from "node:path";
import type { CatalogConfig } from "./config/catalog";
import { createApp } from "./index";
import { fileCatalogContext } from "./services/catalog-context";
import type { SchemaRegistry } from "./services/schema-registry";
import { structuredLog } from "./utils/structured-logger";

/**
 * Serve the catalog API on Node, bound to loopback.
 */
export function startServer(config: CatalogConfig, registry: SchemaRegistry) {
  const catalog = fileCatalogContext(resolve(config.databasePath), resolve(config.tablesDir), registry);
  const app = createApp(catalog);

  return serve({ fetch: app.fetch, port: config.port, hostname: "127.0.0.1" }, (info) => {
    structuredLog("INFO", "Catalog API listening", {
      step: "serve",
      url: `http://127.0.0.1:${info.port}`,
      docs: `http://127.0.0.1:${info.port}/docs`,
    });
  });
}
