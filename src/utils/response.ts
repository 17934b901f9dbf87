import type { Context } from "hono";
import type { ContentfulStatusCode } from "hono/utils/http-status";

/**
 * Standard API response utilities
 */

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
    timestamp?: string;
    request_id?: string;
  };
  meta?: {
    timestamp: string;
    count?: number;
    [key: string]: unknown;
  };
}

/**
 * Map an error's numeric status onto the codes the API answers with.
 */
export function toStatusCode(code: number): ContentfulStatusCode {
  switch (code) {
    case 400:
      return 400;
    case 404:
      return 404;
    case 409:
      return 409;
    case 422:
      return 422;
    case 503:
      return 503;
    default:
      return 500;
  }
}

/**
 * Send success response
 */
export function success<T>(c: Context, data: T, meta?: Record<string, unknown>, statusCode: ContentfulStatusCode = 200) {
  return c.json<ApiResponse<T>>(
    {
      success: true,
      data,
      meta: {
        timestamp: new Date().toISOString(),
        ...meta,
      },
    },
    statusCode
  );
}
