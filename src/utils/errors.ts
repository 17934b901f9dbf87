/**
 * Catalog error taxonomy.
 *
 * Per-table errors (DuplicateKeyError, BuildError) are isolated to the table
 * they occur in. Cross-table errors (UnknownCategoryError, SchemaDriftError,
 * IntegrityError, RegistryConfigError) stop the whole run.
 */

import type { TableBuildResult } from "../services/builder";

type StatusCode = number;

export type CatalogErrorScope = "table" | "run";

export class CatalogError extends Error {
  constructor(
    public code: string,
    message: string,
    public scope: CatalogErrorScope = "run",
    public statusCode: StatusCode = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "CatalogError";
  }
}

export class UnknownCategoryError extends CatalogError {
  constructor(public category: string) {
    super("UNKNOWN_CATEGORY", `Category '${category}' is not registered`, "run", 404, { category });
    this.name = "UnknownCategoryError";
  }
}

export class RegistryConfigError extends CatalogError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("REGISTRY_CONFIG", message, "run", 500, details);
    this.name = "RegistryConfigError";
  }
}

/**
 * Live table columns disagree with the registry. A dump cannot proceed until
 * the schema is brought back in line explicitly.
 */
export class SchemaDriftError extends CatalogError {
  constructor(
    public category: string,
    public expected: string[],
    public actual: string[]
  ) {
    super(
      "SCHEMA_DRIFT",
      actual.length === 0
        ? `Table '${category}' does not exist in the database`
        : `Table '${category}' columns do not match the registry`,
      "run",
      409,
      { category, expected, actual }
    );
    this.name = "SchemaDriftError";
  }
}

export class DuplicateKeyError extends CatalogError {
  constructor(
    public category: string,
    public key: string[],
    public values: unknown[]
  ) {
    super(
      "DUPLICATE_KEY",
      `Duplicate primary key in '${category}' (${key.join(", ")}) = ${JSON.stringify(values, (_k, v) => (typeof v === "bigint" ? v.toString() : v))}`,
      "table",
      409,
      { category, key }
    );
    this.name = "DuplicateKeyError";
  }
}

export class BuildError extends CatalogError {
  constructor(
    public category: string,
    public cause: unknown
  ) {
    super(
      "BUILD_FAILED",
      `Failed to build '${category}': ${cause instanceof Error ? cause.message : String(cause)}`,
      "table",
      422,
      { category }
    );
    this.name = "BuildError";
  }
}

export interface RowCountMismatch {
  category: string;
  expected: number;
  actual: number;
}

export class IntegrityError extends CatalogError {
  /**
   * @param tables - Per-table outcome of the build that was checked,
   *   failed tables included.
   */
  constructor(
    public mismatches: RowCountMismatch[],
    public tables: TableBuildResult[] = []
  ) {
    super(
      "INTEGRITY",
      `Row count mismatch after build: ${mismatches
        .map((m) => `${m.category} expected ${m.expected}, found ${m.actual}`)
        .join("; ")}`,
      "run",
      500,
      { mismatches }
    );
    this.name = "IntegrityError";
  }
}

export class UnsyncedChangesError extends CatalogError {
  constructor(public databasePath: string) {
    super(
      "UNSYNCED_CHANGES",
      `Database '${databasePath}' has edits that were never dumped; run dump first or rebuild with --force`,
      "run",
      409,
      { databasePath }
    );
    this.name = "UnsyncedChangesError";
  }
}

export class SqlSourceError extends CatalogError {
  constructor(message: string, public label: string) {
    super("SQL_SOURCE", message, "table", 422, { label });
    this.name = "SqlSourceError";
  }
}

export function isTableScoped(error: unknown): error is CatalogError & { scope: "table" } {
  return error instanceof CatalogError && error.scope === "table";
}
