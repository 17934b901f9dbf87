import { readFileSync } from "node:fs";
import { z } from "zod";
import type { SqliteAdapter } from "../adapters/sqlite";
import { CatalogError, RegistryConfigError, isTableScoped } from "../utils/errors";
import { errorContext, structuredLog } from "../utils/structured-logger";
import type { SqlSource } from "./builder";
import {
  assertRulesMatchRegistry,
  categorize,
  fieldText,
  type CategorizeIssue,
  type ClassificationRules,
  type LegacyRow,
} from "./categorizer";
import { renderTableDump, type TableDump } from "./dumper";
import type { SchemaRegistry } from "./schema-registry";
import type { SqlRow, SqlValue } from "./sql-values";

/**
 * Legacy migration: one flat symbols table → per-category SQL sources.
 *
 * Rows are categorized, mapped column by column through the declarative
 * field-mapping rules, given part ids, and rendered through the Dumper so
 * the produced text is already canonical.
 */

// =============================================================================
// Field mappings
// =============================================================================

const MappingRuleSchema = z.object({
  target: z.string(),
  from: z.array(z.string()).default([]),
  transform: z.enum(["text", "boolean", "integer", "constant", "present", "timestamp"]),
  default: z.string().optional(),
  value: z.string().optional(),
  categories: z.array(z.string()).optional(),
});

export const FieldMappingsSchema = z.object({
  rules: z.array(MappingRuleSchema),
});

export type FieldMappingRule = z.infer<typeof MappingRuleSchema>;
export type FieldMappings = z.infer<typeof FieldMappingsSchema>;

const DEFAULT_MAPPINGS_PATH = new URL("../config/field-mappings.json", import.meta.url);

export function parseFieldMappings(raw: unknown): FieldMappings {
  const parsed = FieldMappingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RegistryConfigError("Invalid field mappings", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  for (const rule of parsed.data.rules) {
    if ((rule.transform === "constant" || rule.transform === "present") && rule.value === undefined) {
      throw new RegistryConfigError(`Mapping for '${rule.target}' needs a value`);
    }
  }
  return parsed.data;
}

export function loadFieldMappings(path: string | URL = DEFAULT_MAPPINGS_PATH): FieldMappings {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new RegistryConfigError(`Cannot read field mappings from ${String(path)}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return parseFieldMappings(raw);
}

/**
 * A mapping scoped to categories must target a column each of them has.
 */
export function assertMappingsMatchRegistry(mappings: FieldMappings, registry: SchemaRegistry): void {
  for (const rule of mappings.rules) {
    for (const category of rule.categories ?? []) {
      if (!registry.columnNamesFor(category).includes(rule.target)) {
        throw new RegistryConfigError(`Mapping target '${rule.target}' is not a column of '${category}'`);
      }
    }
  }
}

// =============================================================================
// Value transforms
// =============================================================================

const TRUE_WORDS = new Set(["YES", "Y", "TRUE", "1"]);
const FALSE_WORDS = new Set(["NO", "N", "FALSE", "0"]);

export function normalizeBoolean(value: SqlValue | undefined): bigint | null {
  if (value === null || value === undefined) return null;
  const text = (Buffer.isBuffer(value) ? value.toString("utf8") : String(value)).trim().toUpperCase();
  if (TRUE_WORDS.has(text)) return 1n;
  if (FALSE_WORDS.has(text)) return 0n;
  return null;
}

export function normalizeInteger(value: SqlValue | undefined): bigint | null {
  if (typeof value === "bigint") return value;
  if (typeof value === "number") return Number.isInteger(value) ? BigInt(value) : null;
  if (typeof value !== "string") return null;
  const text = value.trim();
  return /^\d+$/.test(text) ? BigInt(text) : null;
}

function firstPresent(row: LegacyRow, fields: string[]): SqlValue {
  for (const field of fields) {
    const value = row[field];
    if (value !== null && value !== undefined) return value;
  }
  return null;
}

function asText(value: SqlValue): string | null {
  if (value === null) return null;
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  if (typeof value === "boolean") return value ? "1" : "0";
  return String(value);
}

export function applyMapping(rule: FieldMappingRule, row: LegacyRow, timestamp: string): SqlValue {
  const source = firstPresent(row, rule.from);
  switch (rule.transform) {
    case "text": {
      const text = asText(source);
      if ((text === null || text === "") && rule.default !== undefined) return rule.default;
      return text;
    }
    case "boolean":
      return normalizeBoolean(source);
    case "integer":
      return normalizeInteger(source);
    case "constant":
      return rule.value ?? null;
    case "present":
      return asText(source) ? (rule.value ?? null) : null;
    case "timestamp":
      return timestamp;
  }
}

// =============================================================================
// Migration
// =============================================================================

export interface MigrationOptions {
  registry: SchemaRegistry;
  rules: ClassificationRules;
  mappings: FieldMappings;
  /** Clock for created_at / updated_at. */
  now?: () => Date;
}

export interface MigrationFailure {
  category: string;
  error: CatalogError;
}

export interface MigrationReport {
  total: number;
  counts: Record<string, number>;
  unclassified: CategorizeIssue[];
  failures: MigrationFailure[];
}

export interface MigrationResult {
  /** One canonical dump per registered category, empty tables included. */
  tables: TableDump[];
  /** The same dumps as Builder input. */
  sources: SqlSource[];
  rows: Record<string, SqlRow[]>;
  report: MigrationReport;
}

export function formatPartId(prefix: string, sequence: number): string {
  return `${prefix}-${String(sequence).padStart(4, "0")}`;
}

/**
 * Map the rows of one bucket to category rows, in input order.
 */
export function mapCategoryRows(
  category: string,
  legacy: LegacyRow[],
  options: MigrationOptions,
  timestamp: string
): SqlRow[] {
  const columns = options.registry.columnNamesFor(category);
  const columnSet = new Set(columns);
  const prefix = options.registry.partIdPrefixFor(category);
  const applicable = options.mappings.rules.filter(
    (r) => columnSet.has(r.target) && (!r.categories || r.categories.includes(category))
  );

  let sequence = 0;
  return legacy.map((old) => {
    const row: SqlRow = Object.fromEntries(columns.map((c) => [c, null]));
    for (const rule of applicable) {
      row[rule.target] = applyMapping(rule, old, timestamp);
    }

    let partId = fieldText(old, "Part_ID") || fieldText(old, "Symbol_Name");
    if (!partId) {
      sequence += 1;
      partId = formatPartId(prefix, sequence);
    }
    row.part_id = partId;
    return row;
  });
}

export function migrateLegacyRows(legacy: LegacyRow[], options: MigrationOptions): MigrationResult {
  const { registry } = options;
  assertRulesMatchRegistry(options.rules, registry);
  assertMappingsMatchRegistry(options.mappings, registry);

  const timestamp = (options.now ?? (() => new Date()))().toISOString();
  const categorized = categorize(legacy, options.rules);

  const result: MigrationResult = {
    tables: [],
    sources: [],
    rows: {},
    report: {
      total: legacy.length,
      counts: {},
      unclassified: categorized.issues,
      failures: [],
    },
  };

  for (const category of registry.categories()) {
    const rows = mapCategoryRows(category, categorized.buckets[category] ?? [], options, timestamp);
    try {
      const sql = renderTableDump(registry, category, rows);
      result.tables.push({ category, sql, rowCount: rows.length });
      result.sources.push({ label: `${category}.sql`, sql });
      result.rows[category] = rows;
      result.report.counts[category] = rows.length;
    } catch (err) {
      if (!isTableScoped(err)) throw err;
      structuredLog("ERROR", "Category migration failed", { category, step: "migrate", ...errorContext(err) });
      result.report.failures.push({ category, error: err });
    }
  }

  structuredLog(categorized.unclassified.length > 0 ? "WARN" : "INFO", "Legacy rows categorized", {
    step: "migrate",
    total: legacy.length,
    unclassified: categorized.unclassified.length,
  });
  return result;
}

/**
 * All rows of the legacy flat table.
 */
export function readLegacyRows(adapter: SqliteAdapter, table: string): LegacyRow[] {
  if (!adapter.tableExists(table)) {
    throw new CatalogError("LEGACY_TABLE_MISSING", `Legacy table '${table}' does not exist`, "run", 404, { table });
  }
  const columns = adapter.tableColumns(table).map((c) => c.name);
  return adapter.selectRows(table, columns);
}
