import { readFileSync } from "node:fs";
import { z } from "zod";
import { CORE_COLUMNS, SIMULATION_COLUMNS, type ColumnDefinition } from "../config/columns";
import { RegistryConfigError, UnknownCategoryError } from "../utils/errors";

/**
 * Schema Registry
 *
 * Single source of truth for every category table: column order, SQL types,
 * defaults and primary key. Both the Builder (through the CREATE TABLE text
 * it replays) and the Dumper consult it, so hand-written SQL and generated
 * dumps always agree on column order. Pure lookups, no database access.
 */

export type KeyCollation = "binary" | "nocase";

export interface CategoryDefinition {
  name: string;
  displayName: string;
  partIdPrefix: string;
  /** Full ordered column list: core, simulation, then category-specific. */
  columns: ColumnDefinition[];
  primaryKey: string[];
  keyCollation: KeyCollation;
}

// =============================================================================
// categories.json schema
// =============================================================================

const IDENTIFIER = /^[a-z][a-z0-9_]*$/;

const ColumnEntrySchema = z.union([
  z.string().regex(IDENTIFIER),
  z.object({
    name: z.string().regex(IDENTIFIER),
    type: z.string().min(1).default("TEXT"),
    default: z.string().optional(),
    notNull: z.boolean().optional(),
  }),
]);

const CategoryEntrySchema = z.object({
  name: z.string().regex(IDENTIFIER),
  displayName: z.string().optional(),
  partIdPrefix: z.string().regex(/^[A-Z]{2,5}$/),
  primaryKey: z.array(z.string()).min(1).optional(),
  keyCollation: z.enum(["binary", "nocase"]).default("binary"),
  columns: z.array(ColumnEntrySchema),
});

export const CategoriesFileSchema = z.object({
  categories: z.array(CategoryEntrySchema).min(1),
});

const DEFAULT_CATEGORIES_PATH = new URL("../config/categories.json", import.meta.url);

// =============================================================================
// Registry
// =============================================================================

export class SchemaRegistry {
  private readonly byName: Map<string, CategoryDefinition>;

  constructor(definitions: CategoryDefinition[]) {
    this.byName = new Map();
    for (const def of definitions) {
      if (this.byName.has(def.name)) {
        throw new RegistryConfigError(`Category '${def.name}' is registered twice`);
      }
      this.byName.set(def.name, def);
    }
  }

  /**
   * Registered category names, lexicographically sorted.
   */
  categories(): string[] {
    return Array.from(this.byName.keys()).sort();
  }

  has(category: string): boolean {
    return this.byName.has(category);
  }

  get(category: string): CategoryDefinition {
    const def = this.byName.get(category);
    if (!def) throw new UnknownCategoryError(category);
    return def;
  }

  columnsFor(category: string): ColumnDefinition[] {
    return this.get(category).columns;
  }

  columnNamesFor(category: string): string[] {
    return this.get(category).columns.map((c) => c.name);
  }

  primaryKeyFor(category: string): string[] {
    return this.get(category).primaryKey;
  }

  keyCollationFor(category: string): KeyCollation {
    return this.get(category).keyCollation;
  }

  partIdPrefixFor(category: string): string {
    return this.get(category).partIdPrefix;
  }

  /**
   * Canonical CREATE TABLE statement (without trailing semicolon).
   * A single-column key is declared inline; a composite key as a table
   * constraint after the last column.
   */
  createTableSql(category: string): string {
    const def = this.get(category);
    const inlineKey = def.primaryKey.length === 1 ? def.primaryKey[0] : null;

    const lines = def.columns.map((col) => {
      const parts = [col.name, col.sqlType];
      if (col.name === inlineKey) parts.push("PRIMARY KEY");
      if (col.notNull) parts.push("NOT NULL");
      if (col.default !== undefined) parts.push(`DEFAULT ${col.default}`);
      return `    ${parts.join(" ")}`;
    });
    if (!inlineKey) {
      lines.push(`    PRIMARY KEY (${def.primaryKey.join(", ")})`);
    }

    return `CREATE TABLE ${def.name} (\n${lines.join(",\n")}\n)`;
  }
}

/**
 * Expand validated categories.json entries into full definitions.
 */
export function buildDefinitions(file: unknown): CategoryDefinition[] {
  const parsed = CategoriesFileSchema.safeParse(file);
  if (!parsed.success) {
    throw new RegistryConfigError("Invalid category definitions", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }

  return parsed.data.categories.map((entry) => {
    const specific: ColumnDefinition[] = entry.columns.map((c) =>
      typeof c === "string"
        ? { name: c, sqlType: "TEXT" }
        : { name: c.name, sqlType: c.type, default: c.default, notNull: c.notNull }
    );
    const columns = [...CORE_COLUMNS, ...SIMULATION_COLUMNS, ...specific].map((c) => ({ ...c }));

    const seen = new Set<string>();
    for (const col of columns) {
      if (seen.has(col.name)) {
        throw new RegistryConfigError(`Column '${col.name}' appears twice in '${entry.name}'`);
      }
      seen.add(col.name);
    }

    const primaryKey = entry.primaryKey ?? ["part_id"];
    for (const key of primaryKey) {
      if (!seen.has(key)) {
        throw new RegistryConfigError(`Primary key column '${key}' is not a column of '${entry.name}'`);
      }
    }

    return {
      name: entry.name,
      displayName: entry.displayName ?? entry.name,
      partIdPrefix: entry.partIdPrefix,
      columns,
      primaryKey,
      keyCollation: entry.keyCollation,
    };
  });
}

export function loadSchemaRegistry(path: string | URL = DEFAULT_CATEGORIES_PATH): SchemaRegistry {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new RegistryConfigError(`Cannot read category definitions from ${String(path)}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return new SchemaRegistry(buildDefinitions(raw));
}

let defaultRegistry: SchemaRegistry | null = null;

/**
 * Registry loaded from the bundled categories.json, cached per process.
 */
export function getDefaultRegistry(): SchemaRegistry {
  if (!defaultRegistry) {
    defaultRegistry = loadSchemaRegistry();
  }
  return defaultRegistry;
}
