import { readFileSync } from "node:fs";
import { z } from "zod";
import { RegistryConfigError } from "../utils/errors";
import type { SchemaRegistry } from "./schema-registry";
import type { SqlValue } from "./sql-values";

/**
 * Categorizer
 *
 * Routes legacy flat rows to category buckets. A row's discriminant either
 * names a category directly or a class (`ic`, `transistor`) that the ordered
 * pattern rules refine; rows with an unknown discriminant reach the rules as
 * class `unknown`. Nothing is ever routed by default: rows no rule claims go
 * to the unclassified bucket.
 */

export type LegacyRow = Record<string, SqlValue>;

export const UNKNOWN_CLASS = "unknown";

// =============================================================================
// Rules file
// =============================================================================

const MatcherSchema = z
  .object({
    fields: z.array(z.string()).min(1),
    contains: z.array(z.string().min(1)).optional(),
    prefix: z.array(z.string().min(1)).optional(),
    regex: z.string().optional(),
  })
  .refine((m) => [m.contains, m.prefix, m.regex].filter((x) => x !== undefined).length === 1, {
    message: "a matcher needs exactly one of contains, prefix or regex",
  });

const RuleSchema = z.object({
  category: z.string(),
  when: z.array(z.string()).optional(),
  any: z.array(MatcherSchema).optional(),
});

export const ClassificationRulesSchema = z.object({
  discriminantField: z.string().default("Reference"),
  identityField: z.string().default("Symbol_Name"),
  discriminants: z.record(z.string()),
  classes: z.record(z.string()).default({}),
  rules: z.array(RuleSchema).default([]),
});

export type ClassificationRules = z.infer<typeof ClassificationRulesSchema>;
export type ClassificationRule = z.infer<typeof RuleSchema>;
type Matcher = z.infer<typeof MatcherSchema>;

const DEFAULT_RULES_PATH = new URL("../config/classification-rules.json", import.meta.url);

export function parseClassificationRules(raw: unknown): ClassificationRules {
  const parsed = ClassificationRulesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new RegistryConfigError("Invalid classification rules", {
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }

  const rules = parsed.data;
  // Lookups are case-insensitive on the discriminant
  rules.discriminants = Object.fromEntries(
    Object.entries(rules.discriminants).map(([k, v]) => [k.trim().toUpperCase(), v])
  );
  rules.classes = Object.fromEntries(Object.entries(rules.classes).map(([k, v]) => [k.trim().toUpperCase(), v]));

  for (const rule of rules.rules) {
    for (const matcher of rule.any ?? []) {
      if (matcher.regex === undefined) continue;
      try {
        new RegExp(matcher.regex, "i");
      } catch (err) {
        throw new RegistryConfigError(`Invalid regex in rule for '${rule.category}'`, {
          regex: matcher.regex,
          cause: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }
  return rules;
}

export function loadClassificationRules(path: string | URL = DEFAULT_RULES_PATH): ClassificationRules {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new RegistryConfigError(`Cannot read classification rules from ${String(path)}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  return parseClassificationRules(raw);
}

/**
 * Every category the rules can produce must be registered.
 */
export function assertRulesMatchRegistry(rules: ClassificationRules, registry: SchemaRegistry): void {
  const targets = [...Object.values(rules.discriminants), ...rules.rules.map((r) => r.category)];
  const unknown = Array.from(new Set(targets.filter((t) => !registry.has(t)))).sort();
  if (unknown.length > 0) {
    throw new RegistryConfigError("Classification rules name unregistered categories", { categories: unknown });
  }
}

// =============================================================================
// Classification
// =============================================================================

export type IssueReason = "unclassified" | "duplicate";

export interface CategorizeIssue {
  /** Position of the row in the input. */
  index: number;
  reason: IssueReason;
  discriminant: string;
  identity: string | null;
  /** Category the row would have gone to, for duplicates. */
  category?: string;
}

export interface CategorizeResult<T extends LegacyRow = LegacyRow> {
  buckets: Record<string, T[]>;
  unclassified: T[];
  issues: CategorizeIssue[];
}

export function fieldText(row: LegacyRow, field: string): string {
  const value = row[field];
  if (value === null || value === undefined) return "";
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  return String(value);
}

function matches(matcher: Matcher, row: LegacyRow): boolean {
  return matcher.fields.some((field) => {
    const text = fieldText(row, field).toLowerCase();
    if (text === "") return false;
    if (matcher.contains) return matcher.contains.some((needle) => text.includes(needle.toLowerCase()));
    if (matcher.prefix) return matcher.prefix.some((p) => text.startsWith(p.toLowerCase()));
    if (matcher.regex !== undefined) return new RegExp(matcher.regex, "i").test(text);
    return false;
  });
}

function ruleApplies(rule: ClassificationRule, cls: string, row: LegacyRow): boolean {
  if (rule.when && !rule.when.includes(cls)) return false;
  if (!rule.any || rule.any.length === 0) return true;
  return rule.any.some((m) => matches(m, row));
}

/**
 * Target category for a single row, or null when no rule claims it.
 */
export function classifyRow(row: LegacyRow, rules: ClassificationRules): string | null {
  const discriminant = fieldText(row, rules.discriminantField).trim().toUpperCase();
  const direct = rules.discriminants[discriminant];
  if (direct !== undefined) return direct;

  const cls = rules.classes[discriminant] ?? UNKNOWN_CLASS;
  const rule = rules.rules.find((r) => ruleApplies(r, cls, row));
  return rule ? rule.category : null;
}

/**
 * Partition rows into buckets. Every input row lands in exactly one bucket;
 * a repeated identity within a category sends the repeat to unclassified.
 */
export function categorize<T extends LegacyRow>(rows: T[], rules: ClassificationRules): CategorizeResult<T> {
  const result: CategorizeResult<T> = { buckets: {}, unclassified: [], issues: [] };
  const seen = new Map<string, Set<string>>();

  rows.forEach((row, index) => {
    const discriminant = fieldText(row, rules.discriminantField).trim();
    const identityText = fieldText(row, rules.identityField).trim();
    const identity = identityText === "" ? null : identityText;
    const category = classifyRow(row, rules);

    if (category === null) {
      result.unclassified.push(row);
      result.issues.push({ index, reason: "unclassified", discriminant, identity });
      return;
    }

    let identities = seen.get(category);
    if (!identities) {
      identities = new Set();
      seen.set(category, identities);
    }
    if (identity !== null && identities.has(identity)) {
      result.unclassified.push(row);
      result.issues.push({ index, reason: "duplicate", discriminant, identity, category });
      return;
    }
    if (identity !== null) identities.add(identity);

    const bucket = result.buckets[category] ?? [];
    bucket.push(row);
    result.buckets[category] = bucket;
  });

  return result;
}
