import type { KeyCollation } from "./schema-registry";

/**
 * Canonical rendering and ordering of SQLite values.
 *
 * Rows are read with 64-bit integers as `bigint`, so a JS `number` always
 * denotes a REAL. Producers of rows outside the database (migration,
 * generators) follow the same rule: integer columns carry `bigint`.
 */

export type SqlValue = null | bigint | number | string | boolean | Buffer;

export type SqlRow = Record<string, SqlValue>;

// =============================================================================
// Literal rendering
// =============================================================================

/**
 * Render a REAL so that SQLite parses it back to the same double and the
 * same storage class: always carries a decimal point or an exponent.
 */
export function renderReal(value: number): string {
  if (Number.isNaN(value)) return "NULL";
  if (value === Infinity) return "9e999";
  if (value === -Infinity) return "-9e999";
  if (Object.is(value, -0)) return "-0.0";

  const text = String(value);
  return /[.e]/.test(text) ? text : `${text}.0`;
}

function quoteText(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * SQLite ends a statement at a NUL byte, so NUL characters are spliced in
 * with `char(0)` and the result stays TEXT.
 */
export function renderText(value: string): string {
  if (!value.includes("\u0000")) return quoteText(value);
  return value.split("\u0000").map(quoteText).join(" || char(0) || ");
}

export function renderSqlLiteral(value: SqlValue | undefined): string {
  if (value === null || value === undefined) return "NULL";
  if (typeof value === "boolean") return value ? "1" : "0";
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number") return renderReal(value);
  if (typeof value === "string") return renderText(value);
  return `X'${value.toString("hex")}'`;
}

// =============================================================================
// Ordering (SQLite BINARY collation semantics)
// =============================================================================

function storageRank(value: SqlValue): number {
  if (value === null) return 0;
  if (typeof value === "bigint" || typeof value === "number" || typeof value === "boolean") return 1;
  if (typeof value === "string") return 2;
  return 3;
}

function compareNumeric(a: bigint | number | boolean, b: bigint | number | boolean): number {
  const x = typeof a === "boolean" ? BigInt(a ? 1 : 0) : a;
  const y = typeof b === "boolean" ? BigInt(b ? 1 : 0) : b;
  if (typeof x === "bigint" && typeof y === "bigint") return x < y ? -1 : x > y ? 1 : 0;
  const nx = Number(x);
  const ny = Number(y);
  if (nx < ny) return -1;
  if (nx > ny) return 1;
  return 0;
}

/**
 * Total order: NULL < numeric < text < blob; text compared as UTF-8 bytes.
 */
export function compareSqlValues(a: SqlValue, b: SqlValue): number {
  const ra = storageRank(a);
  const rb = storageRank(b);
  if (ra !== rb) return ra - rb;

  if (a === null || b === null) return 0;
  if (typeof a === "string" && typeof b === "string") {
    return Buffer.compare(Buffer.from(a, "utf8"), Buffer.from(b, "utf8"));
  }
  if (Buffer.isBuffer(a) && Buffer.isBuffer(b)) return Buffer.compare(a, b);
  if (!Buffer.isBuffer(a) && !Buffer.isBuffer(b) && typeof a !== "string" && typeof b !== "string") {
    return compareNumeric(a, b);
  }
  return 0;
}

// =============================================================================
// Identity encodings
// =============================================================================

/**
 * Type-tagged encoding of one value. Distinguishes NULL, '' and 0, and
 * INTEGER 1 from REAL 1.0.
 */
export function encodeTyped(value: SqlValue): string | null {
  if (value === null) return null;
  if (typeof value === "boolean") return value ? "i:1" : "i:0";
  if (typeof value === "bigint") return `i:${value.toString()}`;
  if (typeof value === "number") return `r:${renderReal(value)}`;
  if (typeof value === "string") return `t:${value}`;
  return `b:${value.toString("hex")}`;
}

/**
 * Primary-key identity after normalization. Numerically equal INTEGER and
 * REAL keys collide, as do texts equal under the key collation.
 */
export function keyIdentity(values: SqlValue[], collation: KeyCollation): string {
  return JSON.stringify(
    values.map((v) => {
      if (typeof v === "number" && Number.isInteger(v)) return `i:${BigInt(v).toString()}`;
      if (typeof v === "string" && collation === "nocase") {
        return `t:${v.replace(/[A-Z]/g, (c) => c.toLowerCase())}`;
      }
      return encodeTyped(v);
    })
  );
}
