import { OpenAPIRoute } from "chanfana";
import { z } from "zod";
import type { AppContext } from "../../types";
import { success } from "../../utils/response";
import { errorContext, structuredLog } from "../../utils/structured-logger";

export class HealthEndpoint extends OpenAPIRoute {
  public schema = {
    tags: ["System"],
    summary: "Health check endpoint",
    operationId: "health-check",
    responses: {
      "200": {
        description: "Service is healthy",
        content: {
          "application/json": {
            schema: z.object({
              success: z.boolean(),
              data: z.object({
                status: z.string(),
                service: z.string(),
                timestamp: z.string(),
                checks: z.object({
                  database: z.object({
                    connected: z.boolean(),
                    latency_ms: z.number().optional(),
                  }),
                  registry: z.object({
                    categories: z.number(),
                  }),
                }),
              }),
            }),
          },
        },
      },
    },
  };

  public async handle(c: AppContext) {
    const catalog = c.get("catalog");
    const checks = {
      database: { connected: false, latency_ms: 0 },
      registry: { categories: catalog.registry.categories().length },
    };

    try {
      const start = Date.now();
      const adapter = catalog.openDatabase();
      if (adapter) {
        try {
          adapter.listTables();
          checks.database.connected = true;
        } finally {
          catalog.releaseDatabase(adapter);
        }
      }
      checks.database.latency_ms = Date.now() - start;
    } catch (error) {
      structuredLog("WARN", "Database health check failed", { step: "health", ...errorContext(error) });
      checks.database.connected = false;
    }

    return success(c, {
      status: "healthy",
      service: "eda-catalog",
      timestamp: new Date().toISOString(),
      checks,
    });
  }
}
