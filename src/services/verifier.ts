import { openCatalogDatabase, SqliteAdapter } from "../adapters/sqlite";
import { CatalogError, IntegrityError, isTableScoped } from "../utils/errors";
import { errorContext, structuredLog } from "../utils/structured-logger";
import { buildInto } from "./builder";
import { tableChecksum } from "./checksum";
import { catalogTables, dump } from "./dumper";
import { getDefaultRegistry, type SchemaRegistry } from "./schema-registry";

/**
 * Round-Trip Verifier
 *
 * For each registered table: checksum, dump, rebuild the dump into a
 * scratch in-memory database, checksum again and dump again. A table passes
 * when both checksums and both dump texts agree. Every table is reported.
 */

export type VerifyStatus = "PASS" | "FAIL";

export interface VerifyEntry {
  category: string;
  checksumBefore: string | null;
  checksumAfter: string | null;
  dumpIdentical: boolean;
  status: VerifyStatus;
  error?: string;
}

export interface VerifyReport {
  ok: boolean;
  tables: VerifyEntry[];
}

function verifyTable(adapter: SqliteAdapter, registry: SchemaRegistry, category: string): VerifyEntry {
  const entry: VerifyEntry = {
    category,
    checksumBefore: tableChecksum(adapter, category),
    checksumAfter: null,
    dumpIdentical: false,
    status: "FAIL",
  };

  const first = dump(adapter, category, registry);

  const scratch = new SqliteAdapter(openCatalogDatabase(":memory:"));
  try {
    const result = buildInto(scratch, [{ label: `${category} (dump)`, sql: first }], {
      registry,
      recordSync: false,
    });
    const built = result.tables.find((t) => t.category === category);
    if (!built || built.status !== "built") {
      entry.error = built?.error?.message ?? "rebuild produced no table";
      return entry;
    }

    entry.checksumAfter = tableChecksum(scratch, category);
    entry.dumpIdentical = dump(scratch, category, registry) === first;
  } finally {
    scratch.close();
  }

  if (entry.checksumBefore !== entry.checksumAfter) {
    entry.error = "checksum changed across rebuild";
  } else if (!entry.dumpIdentical) {
    entry.error = "dump text differs after rebuild";
  } else {
    entry.status = "PASS";
  }
  return entry;
}

/**
 * @throws UnknownCategoryError for a table the registry does not know
 * @throws SchemaDriftError when a live table disagrees with the registry
 */
export function verify(adapter: SqliteAdapter, registry: SchemaRegistry = getDefaultRegistry()): VerifyReport {
  const { present, missing } = catalogTables(adapter, registry);
  const tables: VerifyEntry[] = [];

  for (const category of present) {
    try {
      tables.push(verifyTable(adapter, registry, category));
    } catch (err) {
      if (err instanceof CatalogError && !isTableScoped(err) && !(err instanceof IntegrityError)) throw err;
      structuredLog("ERROR", "Table verification failed", { category, step: "verify", ...errorContext(err) });
      tables.push({
        category,
        checksumBefore: null,
        checksumAfter: null,
        dumpIdentical: false,
        status: "FAIL",
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  for (const category of missing) {
    tables.push({
      category,
      checksumBefore: null,
      checksumAfter: null,
      dumpIdentical: false,
      status: "FAIL",
      error: "table missing from database",
    });
  }
  tables.sort((a, b) => (a.category < b.category ? -1 : a.category > b.category ? 1 : 0));

  const report: VerifyReport = { ok: tables.every((t) => t.status === "PASS"), tables };
  structuredLog(report.ok ? "INFO" : "WARN", "Verification finished", {
    step: "verify",
    passed: tables.filter((t) => t.status === "PASS").length,
    failed: tables.filter((t) => t.status === "FAIL").length,
  });
  return report;
}
