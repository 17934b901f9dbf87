import type { Context } from "hono";
import { randomUUID } from "node:crypto";
import { ZodError } from "zod";
import { CatalogError } from "../utils/errors";
import type { ApiResponse } from "../utils/response";
import { toStatusCode } from "../utils/response";
import { errorContext, structuredLog } from "../utils/structured-logger";

/**
 * Standard error response format
 */
export interface ErrorResponse extends ApiResponse<never> {
  success: false;
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp: string;
    request_id: string;
  };
}

function respond(
  c: Context,
  status: number,
  code: string,
  message: string,
  details?: Record<string, unknown>
): Response {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
      details,
      timestamp: new Date().toISOString(),
      request_id: c.req.header("X-Request-Id") || randomUUID(),
    },
  };
  return c.json(response, toStatusCode(status));
}

/**
 * Global error handler
 */
export function errorHandler(error: Error, c: Context): Response {
  // Handle catalog errors
  if (error instanceof CatalogError) {
    structuredLog(error.statusCode >= 500 ? "ERROR" : "WARN", "Request failed", {
      step: "api",
      path: c.req.path,
      code: error.code,
      ...errorContext(error),
    });
    return respond(c, error.statusCode, error.code, error.message, error.details);
  }

  // Handle validation errors from Zod
  if (error instanceof ZodError) {
    return respond(c, 400, "VALIDATION_ERROR", "Invalid request data", {
      issues: error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }

  structuredLog("ERROR", "Unhandled request error", { step: "api", path: c.req.path, ...errorContext(error) });

  // Handle database errors
  if (error.name === "SqliteError" || error.message.includes("SQLITE")) {
    return respond(c, 500, "DATABASE_ERROR", "Database operation failed");
  }

  return respond(c, 500, "INTERNAL_ERROR", "An unexpected error occurred");
}
