import { z } from "zod";

/**
 * Runtime configuration
 *
 * Read once from the environment; CLI flags override individual values.
 * Paths are resolved against the working directory by the caller.
 */

export const LOG_LEVELS = ["INFO", "WARN", "ERROR", "CRITICAL"] as const;

export const CatalogConfigSchema = z.object({
  CATALOG_DB_PATH: z.string().min(1).default("db/catalog.db"),
  CATALOG_TABLES_DIR: z.string().min(1).default("db/tables"),
  CATALOG_LEGACY_TABLE: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be a plain SQL identifier")
    .default("symbols"),
  LOG_LEVEL: z
    .string()
    .transform((v) => v.toUpperCase())
    .pipe(z.enum(LOG_LEVELS))
    .default("INFO"),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
});

export interface CatalogConfig {
  databasePath: string;
  tablesDir: string;
  legacyTable: string;
  logLevel: (typeof LOG_LEVELS)[number];
  port: number;
}

export function loadCatalogConfig(env: Record<string, string | undefined> = process.env): CatalogConfig {
  const parsed = CatalogConfigSchema.parse({
    CATALOG_DB_PATH: env.CATALOG_DB_PATH || undefined,
    CATALOG_TABLES_DIR: env.CATALOG_TABLES_DIR || undefined,
    CATALOG_LEGACY_TABLE: env.CATALOG_LEGACY_TABLE || undefined,
    LOG_LEVEL: env.LOG_LEVEL || undefined,
    PORT: env.PORT || undefined,
  });

  return {
    databasePath: parsed.CATALOG_DB_PATH,
    tablesDir: parsed.CATALOG_TABLES_DIR,
    legacyTable: parsed.CATALOG_LEGACY_TABLE,
    logLevel: parsed.LOG_LEVEL,
    port: parsed.PORT,
  };
}
