import { cors as honoCors } from "hono/cors";

/**
 * CORS configuration for the catalog API
 * The API is a local inspection surface: only loopback origins are allowed.
 */
const LOOPBACK_ORIGIN = /^https?:\/\/(localhost|127\.0\.0\.1|\[::1\])(:\d+)?$/;

export const corsMiddleware = honoCors({
  origin: (origin) => (!origin || LOOPBACK_ORIGIN.test(origin) ? origin || "*" : null),
  allowHeaders: ["Content-Type", "Accept", "Origin", "X-Request-Id"],
  allowMethods: ["GET", "POST", "OPTIONS"],
  exposeHeaders: ["Content-Length", "Content-Disposition", "X-Request-Id"],
  maxAge: 86400, // 24 hours
});
