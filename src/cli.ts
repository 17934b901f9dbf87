import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { openCatalogDatabase, SqliteAdapter } from "./adapters/sqlite";
import { loadCatalogConfig, type CatalogConfig } from "./config/catalog";
import { build, type BuildResult } from "./services/builder";
import { catalogStatus, initTables, readCategorySources, writeDump } from "./services/catalog-files";
import { loadClassificationRules, type LegacyRow } from "./services/categorizer";
import { dumpAll, dumpTable, renderTableDump } from "./services/dumper";
import { DEFAULT_DECADES, generateResistorRows, RC_PACKAGES } from "./services/generators/resistors";
import { loadFieldMappings, migrateLegacyRows, readLegacyRows } from "./services/legacy-migration";
import { getDefaultRegistry, type SchemaRegistry } from "./services/schema-registry";
import { assertSafeToRebuild, recordSync } from "./services/sync-state";
import { verify, type VerifyReport } from "./services/verifier";
import { startServer } from "./server";
import { CatalogError, IntegrityError } from "./utils/errors";
import { errorContext, setLogLevel, structuredLog } from "./utils/structured-logger";

/**
 * eda-catalog command line
 *
 * Exit codes: 0 success, 1 failure, 2 migration left rows unclassified.
 */

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
  env: Record<string, string | undefined>;
}

const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  env: process.env,
};

export const USAGE = [
  "Usage: eda-catalog <command> [options]",
  "",
  "Commands:",
  "  build [--force]                      Rebuild the database from db/tables",
  "  dump [--category <name>]             Write canonical SQL for every table",
  "  verify [--json]                      Round-trip every table through dump and rebuild",
  "  status                               Row counts in text and database, sync state",
  "  init [--force]                       Write schema-only SQL for registered categories",
  "  migrate --legacy <db> [--table t]    Split a legacy flat table into category SQL",
  "  generate-resistors [--packages a,b] [--decades 0-6] [--symbol R|R_US] [--output file]",
  "  schema <category>                    Print a category's CREATE TABLE",
  "  serve [--port n]                     Start the local catalog API",
  "",
  "Common options: --db <path> --tables <dir>",
];

class Args {
  constructor(private readonly argv: string[]) {}

  has(flag: string): boolean {
    return this.argv.includes(flag);
  }

  argVal(flag: string, fallback: string): string {
    const i = this.argv.indexOf(flag);
    return i >= 0 && i + 1 < this.argv.length ? this.argv[i + 1] : fallback;
  }

  /** Arguments that are neither flags nor flag values. */
  positionals(): string[] {
    const out: string[] = [];
    for (let i = 0; i < this.argv.length; i++) {
      const arg = this.argv[i];
      if (arg.startsWith("--")) {
        if (!SWITCHES.has(arg)) i++;
        continue;
      }
      out.push(arg);
    }
    return out;
  }
}

const SWITCHES = new Set(["--force", "--json"]);

function pad(text: string, width: number): string {
  return text.length >= width ? text : text + " ".repeat(width - text.length);
}

// ============================================================================
// Commands
// ============================================================================

function printBuild(io: CliIo, result: BuildResult): void {
  for (const t of result.tables) {
    if (t.status === "built") {
      io.out(`  ${pad(t.category, 22)} built   ${t.rowCount ?? 0} rows`);
    } else {
      io.out(`  ${pad(t.category, 22)} FAILED  ${t.error?.message ?? "unknown error"}`);
    }
  }
  const built = result.tables.filter((t) => t.status === "built").length;
  io.out(`Built ${built} of ${result.tables.length} tables`);
}

function cmdBuild(args: Args, config: CatalogConfig, registry: SchemaRegistry, io: CliIo): number {
  assertSafeToRebuild(config.databasePath, registry, args.has("--force"));

  const sources = readCategorySources(config.tablesDir);
  if (sources.length === 0) {
    io.err(`No category SQL found under ${config.tablesDir}`);
    return 1;
  }

  let result: BuildResult;
  try {
    result = build(config.databasePath, sources, { registry });
  } catch (err) {
    if (!(err instanceof IntegrityError)) throw err;
    printBuild(io, { tables: err.tables, ok: false });
    io.err(`ERROR [${err.code}] ${err.message}`);
    return 1;
  }
  printBuild(io, result);
  return result.ok ? 0 : 1;
}

function openExisting(config: CatalogConfig, io: CliIo, readonly: boolean): SqliteAdapter | null {
  if (!existsSync(config.databasePath)) {
    io.err(`Database ${config.databasePath} does not exist; run build first`);
    return null;
  }
  return new SqliteAdapter(openCatalogDatabase(config.databasePath, { readonly }));
}

function cmdDump(args: Args, config: CatalogConfig, registry: SchemaRegistry, io: CliIo): number {
  const adapter = openExisting(config, io, false);
  if (!adapter) return 1;

  try {
    const only = args.argVal("--category", "");
    if (only) {
      const table = dumpTable(adapter, registry.get(only).name, registry);
      io.out(`  ${pad(table.category, 22)} ${table.rowCount} rows -> ${writeDump(config.tablesDir, table)}`);
      return 0;
    }

    const result = dumpAll(adapter, registry);
    for (const table of result.dumps) {
      io.out(`  ${pad(table.category, 22)} ${table.rowCount} rows -> ${writeDump(config.tablesDir, table)}`);
    }
    for (const failure of result.failures) {
      io.out(`  ${pad(failure.category, 22)} FAILED  ${failure.error.message}`);
    }
    for (const category of result.missing) {
      io.out(`  ${pad(category, 22)} not in database`);
    }

    if (result.failures.length > 0) return 1;
    recordSync(adapter, registry);
    io.out(`Dumped ${result.dumps.length} tables`);
    return 0;
  } finally {
    adapter.close();
  }
}

function printVerify(io: CliIo, report: VerifyReport): void {
  for (const t of report.tables) {
    const detail = t.status === "PASS" ? (t.checksumAfter ?? "").slice(0, 12) : (t.error ?? "");
    io.out(`  ${pad(t.category, 22)} ${t.status}  ${detail}`);
  }
  const passed = report.tables.filter((t) => t.status === "PASS").length;
  io.out(`${passed}/${report.tables.length} tables passed`);
}

function cmdVerify(args: Args, config: CatalogConfig, registry: SchemaRegistry, io: CliIo): number {
  const adapter = openExisting(config, io, true);
  if (!adapter) return 1;

  try {
    const report = verify(adapter, registry);
    if (args.has("--json")) {
      io.out(JSON.stringify(report, null, 2));
    } else {
      printVerify(io, report);
    }
    return report.ok ? 0 : 1;
  } finally {
    adapter.close();
  }
}

function cmdStatus(config: CatalogConfig, registry: SchemaRegistry, io: CliIo): number {
  const adapter = existsSync(config.databasePath)
    ? new SqliteAdapter(openCatalogDatabase(config.databasePath, { readonly: true }))
    : null;
  try {
    const status = catalogStatus(config.tablesDir, adapter, registry);
    io.out(`  ${pad("table", 22)} ${pad("text", 8)} db`);
    for (const t of status.tables) {
      io.out(`  ${pad(t.category, 22)} ${pad(t.textRows === null ? "-" : String(t.textRows), 8)} ${t.dbRows === null ? "-" : t.dbRows}`);
    }
    io.out(`Sync state: ${status.syncState ?? "no database"}`);
    return 0;
  } finally {
    adapter?.close();
  }
}

function cmdInit(args: Args, config: CatalogConfig, registry: SchemaRegistry, io: CliIo): number {
  const written = initTables(config.tablesDir, registry, args.has("--force"));
  for (const category of written) io.out(`  ${category}`);
  io.out(`Initialized ${written.length} tables`);
  return 0;
}

function cmdMigrate(args: Args, config: CatalogConfig, registry: SchemaRegistry, io: CliIo): number {
  const legacyPath = args.argVal("--legacy", "");
  if (!legacyPath) {
    io.err("Usage: eda-catalog migrate --legacy <db> [--table symbols]");
    return 1;
  }
  const table = z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/)
    .parse(args.argVal("--table", config.legacyTable));

  const legacy = new SqliteAdapter(openCatalogDatabase(legacyPath, { readonly: true }));
  let rows: LegacyRow[];
  try {
    rows = readLegacyRows(legacy, table);
  } finally {
    legacy.close();
  }

  const result = migrateLegacyRows(rows, {
    registry,
    rules: loadClassificationRules(),
    mappings: loadFieldMappings(),
  });

  for (const table of result.tables) {
    writeDump(config.tablesDir, table);
    io.out(`  ${pad(table.category, 22)} ${table.rowCount}`);
  }
  for (const failure of result.report.failures) {
    io.out(`  ${pad(failure.category, 22)} FAILED  ${failure.error.message}`);
  }

  const unclassified = result.report.unclassified;
  io.out(`  ${pad("unclassified", 22)} ${unclassified.length}`);
  for (const issue of unclassified) {
    const name = issue.identity ?? `row ${issue.index}`;
    const where = issue.reason === "duplicate" ? ` (duplicate in ${issue.category ?? "?"})` : "";
    io.out(`    - ${name} [${issue.discriminant || "no reference"}]${where}`);
  }
  io.out(`Migrated ${result.report.total} legacy rows`);

  if (result.report.failures.length > 0) return 1;
  return unclassified.length > 0 ? 2 : 0;
}

const DecadeRange = z
  .string()
  .regex(/^\d-\d$/, "expected <start>-<end>, e.g. 0-6")
  .transform((v) => v.split("-").map(Number))
  .refine(([start, end]) => start <= end && end <= 6, "decades run from 0 to 6");

function cmdGenerateResistors(args: Args, config: CatalogConfig, registry: SchemaRegistry, io: CliIo): number {
  const packages = args.argVal("--packages", Array.from(RC_PACKAGES.keys()).join(",")).split(",").filter(Boolean);
  const decadeArg = args.argVal("--decades", "");
  let decades = DEFAULT_DECADES;
  if (decadeArg) {
    const [start, end] = DecadeRange.parse(decadeArg);
    decades = DEFAULT_DECADES.filter((d) => d >= start && d <= end);
  }
  const symbol = z.enum(["R", "R_US"]).parse(args.argVal("--symbol", "R_US"));

  const rows = generateResistorRows({ packages, decades, symbol });
  const sql = renderTableDump(registry, "resistors", rows);

  const output = args.argVal("--output", "");
  let path: string;
  if (output) {
    mkdirSync(dirname(resolve(output)), { recursive: true });
    writeFileSync(output, sql, "utf-8");
    path = output;
  } else {
    path = writeDump(config.tablesDir, { category: "resistors", sql, rowCount: rows.length });
  }
  io.out(`Generated ${rows.length} resistors (${symbol}, ${packages.join(", ")}) -> ${path}`);
  return 0;
}

function cmdSchema(args: Args, registry: SchemaRegistry, io: CliIo): number {
  const category = args.positionals()[1];
  if (!category) {
    io.err("Usage: eda-catalog schema <category>");
    io.err(`Categories: ${registry.categories().join(", ")}`);
    return 1;
  }
  io.out(`${registry.createTableSql(category)};`);
  return 0;
}

// ============================================================================
// Entry
// ============================================================================

function resolveConfig(args: Args, env: Record<string, string | undefined>): CatalogConfig {
  const config = loadCatalogConfig(env);
  return {
    ...config,
    databasePath: args.argVal("--db", config.databasePath),
    tablesDir: args.argVal("--tables", config.tablesDir),
    port: z.coerce.number().int().min(1).max(65535).parse(args.argVal("--port", String(config.port))),
  };
}

export function runCli(argv: string[], io: CliIo = defaultIo, registry: SchemaRegistry = getDefaultRegistry()): number {
  const args = new Args(argv);
  const command = argv[0];

  if (!command || command === "--help" || command === "help") {
    for (const line of USAGE) io.out(line);
    return command ? 0 : 1;
  }

  try {
    const config = resolveConfig(args, io.env);
    setLogLevel(config.logLevel);

    switch (command) {
      case "build":
        return cmdBuild(args, config, registry, io);
      case "dump":
        return cmdDump(args, config, registry, io);
      case "verify":
        return cmdVerify(args, config, registry, io);
      case "status":
        return cmdStatus(config, registry, io);
      case "init":
        return cmdInit(args, config, registry, io);
      case "migrate":
        return cmdMigrate(args, config, registry, io);
      case "generate-resistors":
        return cmdGenerateResistors(args, config, registry, io);
      case "schema":
        return cmdSchema(args, registry, io);
      case "serve":
        startServer(config, registry);
        return 0;
      default:
        io.err(`Unknown command '${command}'`);
        for (const line of USAGE) io.err(line);
        return 1;
    }
  } catch (err) {
    if (err instanceof CatalogError) {
      io.err(`ERROR [${err.code}] ${err.message}`);
    } else if (err instanceof z.ZodError) {
      io.err(`ERROR invalid option: ${err.issues.map((i) => i.message).join("; ")}`);
    } else {
      io.err(`ERROR ${err instanceof Error ? err.message : String(err)}`);
    }
    structuredLog("CRITICAL", "Command failed", { step: command, ...errorContext(err) });
    return 1;
  }
}
