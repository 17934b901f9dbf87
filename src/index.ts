import { fromHono } from "chanfana";
import { Hono } from "hono";

// Middleware
import { corsMiddleware } from "./middleware/cors";
import { errorHandler } from "./middleware/errorHandler";

// V1 Endpoints
import { HealthEndpoint } from "./endpoints/v1/health";
import { GetTableDump, GetTableSchema, ListTables } from "./endpoints/v1/tables";
import { PostVerify } from "./endpoints/v1/verify";

import type { AppEnv, CatalogContext } from "./types";

/**
 * Build the catalog API around a catalog context.
 */
export function createApp(catalog: CatalogContext) {
  const app = new Hono<AppEnv>();

  // Global error handler
  app.onError(errorHandler);

  // Apply CORS to all routes
  app.use("*", corsMiddleware);

  app.use("*", async (c, next) => {
    c.set("catalog", catalog);
    await next();
  });

  // Setup OpenAPI registry
  const openapi = fromHono(app, {
    docs_url: "/docs",
    schema: {
      info: {
        title: "EDA Component Catalog API",
        version: "1.0.0",
        description: "Local inspection API for the component catalog database",
      },
    },
  });

  // Health check
  openapi.get("/v1/health", HealthEndpoint);

  // Tables
  openapi.get("/v1/tables", ListTables);
  openapi.get("/v1/tables/:category/schema", GetTableSchema);
  openapi.get("/v1/tables/:category/dump", GetTableDump);

  // Round-trip verification
  openapi.post("/v1/verify", PostVerify);

  return app;
}
