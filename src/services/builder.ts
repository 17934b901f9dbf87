import { openCatalogDatabase, SqliteAdapter } from "../adapters/sqlite";
import { BuildError, IntegrityError, SqlSourceError, UnknownCategoryError, type RowCountMismatch } from "../utils/errors";
import { errorContext, isRetryableError, structuredLog } from "../utils/structured-logger";
import { getDefaultRegistry, type SchemaRegistry } from "./schema-registry";
import { parseSqlStatements, type SqlStatement } from "./sql-statements";
import { recordSync } from "./sync-state";

/**
 * Builder
 *
 * Replays category SQL texts into a fresh database. Tables are built in
 * lexicographic order, each in its own transaction: a failing table is
 * rolled back and reported while the remaining tables still build.
 */

export interface SqlSource {
  /** File path or other origin, used in messages. */
  label: string;
  sql: string;
}

export type TableBuildStatus = "built" | "failed";

export interface TableBuildResult {
  category: string;
  label: string;
  status: TableBuildStatus;
  /** INSERT statements in the source. */
  inserts: number;
  /** Rows in the table after the build, for built tables. */
  rowCount?: number;
  error?: BuildError;
}

export interface BuildResult {
  tables: TableBuildResult[];
  ok: boolean;
  fingerprint?: string;
}

export interface BuildOptions {
  registry?: SchemaRegistry;
  /** Store the sync fingerprint after the build. Defaults to true. */
  recordSync?: boolean;
}

interface PreparedSource {
  category: string;
  label: string;
  statements: SqlStatement[];
  inserts: number;
}

function prepareSource(source: SqlSource, registry: SchemaRegistry): PreparedSource {
  let statements: SqlStatement[];
  try {
    statements = parseSqlStatements(source.sql);
  } catch (err) {
    throw new BuildError(source.label, err);
  }

  const created = new Set(statements.filter((s) => s.kind === "create").map((s) => s.table));
  if (created.size !== 1) {
    throw new BuildError(
      source.label,
      new SqlSourceError(`Expected exactly one CREATE TABLE, found ${created.size}`, source.label)
    );
  }
  const [category] = Array.from(created);
  if (category === undefined) {
    throw new BuildError(source.label, new SqlSourceError("CREATE TABLE without a table name", source.label));
  }
  if (!registry.has(category)) {
    throw new BuildError(category, new UnknownCategoryError(category));
  }

  for (const stmt of statements) {
    if (stmt.table !== undefined && stmt.table !== category) {
      throw new BuildError(
        category,
        new SqlSourceError(`Line ${stmt.line}: statement targets '${stmt.table}' inside the '${category}' source`, source.label)
      );
    }
  }

  return {
    category,
    label: source.label,
    statements: statements.filter((s) => s.kind !== "transaction"),
    inserts: statements.filter((s) => s.kind === "insert").length,
  };
}

function failed(category: string, label: string, error: BuildError): TableBuildResult {
  structuredLog("ERROR", "Table build failed", {
    category,
    step: "build",
    source: label,
    retryable: isRetryableError(error.cause),
    ...errorContext(error.cause),
  });
  return { category, label, status: "failed", inserts: 0, error };
}

/**
 * Build sources into an already open (empty) database.
 *
 * @throws IntegrityError when a built table's row count differs from the
 *   number of INSERT statements in its source. The error carries every
 *   table's result; the fingerprint is recorded before it is thrown.
 */
export function buildInto(adapter: SqliteAdapter, sources: SqlSource[], options: BuildOptions = {}): BuildResult {
  const registry = options.registry ?? getDefaultRegistry();
  const results: TableBuildResult[] = [];
  const prepared: PreparedSource[] = [];

  for (const source of sources) {
    try {
      prepared.push(prepareSource(source, registry));
    } catch (err) {
      const error = err instanceof BuildError ? err : new BuildError(source.label, err);
      results.push(failed(error.category, source.label, error));
    }
  }

  prepared.sort((a, b) =>
    a.category < b.category ? -1 : a.category > b.category ? 1 : a.label < b.label ? -1 : a.label > b.label ? 1 : 0
  );

  const claimed = new Set<string>();
  for (const source of prepared) {
    if (claimed.has(source.category)) {
      const error = new BuildError(
        source.category,
        new SqlSourceError(`Table '${source.category}' is created by more than one source`, source.label)
      );
      results.push(failed(source.category, source.label, error));
      continue;
    }
    claimed.add(source.category);

    const run = adapter.db.transaction((statements: SqlStatement[]) => {
      for (const stmt of statements) adapter.db.exec(stmt.sql);
    });

    try {
      run(source.statements);
      const rowCount = adapter.countRows(source.category);
      results.push({
        category: source.category,
        label: source.label,
        status: "built",
        inserts: source.inserts,
        rowCount,
      });
      structuredLog("INFO", "Table built", { category: source.category, step: "build", rows: rowCount });
    } catch (err) {
      results.push(failed(source.category, source.label, new BuildError(source.category, err)));
    }
  }

  results.sort((a, b) => (a.category < b.category ? -1 : a.category > b.category ? 1 : 0));

  const mismatches: RowCountMismatch[] = [];
  for (const r of results) {
    if (r.status === "built" && r.rowCount !== r.inserts) {
      mismatches.push({ category: r.category, expected: r.inserts, actual: r.rowCount ?? 0 });
    }
  }
  // The database reflects the text either way; failed tables are simply absent.
  const fingerprint = (options.recordSync ?? true) ? recordSync(adapter, registry) : undefined;

  if (mismatches.length > 0) {
    structuredLog("CRITICAL", "Row count mismatch after build", { step: "integrity", mismatches });
    throw new IntegrityError(mismatches, results);
  }

  return { tables: results, ok: results.every((r) => r.status === "built"), fingerprint };
}

/**
 * Build sources into a fresh database file (any existing file is removed).
 */
export function build(databasePath: string, sources: SqlSource[], options: BuildOptions = {}): BuildResult {
  const adapter = new SqliteAdapter(openCatalogDatabase(databasePath, { fresh: true }));
  try {
    return buildInto(adapter, sources, options);
  } finally {
    adapter.close();
  }
}
