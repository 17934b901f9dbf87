/**
 * SQL statement splitting and classification for category SQL files.
 *
 * Splits on top-level semicolons while respecting string literals, quoted
 * identifiers and comments, then classifies each statement so the Builder
 * can own transaction boundaries and count INSERTs per table.
 *
 * Trigger bodies (BEGIN ... END with inner semicolons) are not part of the
 * catalog format and are not supported.
 */

export type StatementKind = "drop" | "create" | "insert" | "transaction" | "other";

export interface SqlStatement {
  kind: StatementKind;
  /** Statement text without comments or trailing semicolon. */
  sql: string;
  /** Target table for drop/create/insert statements. */
  table?: string;
  /** 1-based line of the statement's first character in the source. */
  line: number;
}

export function splitSqlStatements(text: string): { sql: string; line: number }[] {
  const statements: { sql: string; line: number }[] = [];
  let current = "";
  let startLine = 1;
  let line = 1;
  let i = 0;

  const flush = () => {
    const trimmed = current.trim();
    if (trimmed) statements.push({ sql: trimmed, line: startLine });
    current = "";
  };

  while (i < text.length) {
    const ch = text[i];
    const next = text[i + 1];

    if (current.trim() === "" && !/\s/.test(ch) && !(ch === "-" && next === "-") && !(ch === "/" && next === "*")) {
      startLine = line;
    }

    // Line comment
    if (ch === "-" && next === "-") {
      const end = text.indexOf("\n", i);
      i = end === -1 ? text.length : end;
      current += " ";
      continue;
    }

    // Block comment
    if (ch === "/" && next === "*") {
      const end = text.indexOf("*/", i + 2);
      const stop = end === -1 ? text.length : end + 2;
      line += countNewlines(text, i, stop);
      i = stop;
      current += " ";
      continue;
    }

    // Quoted literal or identifier: copy through the closing quote, doubled quotes included
    if (ch === "'" || ch === '"' || ch === "`" || ch === "[") {
      const close = ch === "[" ? "]" : ch;
      let j = i + 1;
      while (j < text.length) {
        if (text[j] === close) {
          if (close !== "]" && text[j + 1] === close) {
            j += 2;
            continue;
          }
          break;
        }
        j++;
      }
      const stop = Math.min(j + 1, text.length);
      line += countNewlines(text, i, stop);
      current += text.slice(i, stop);
      i = stop;
      continue;
    }

    if (ch === ";") {
      flush();
      i++;
      continue;
    }

    if (ch === "\n") line++;
    current += ch;
    i++;
  }
  flush();

  return statements;
}

function countNewlines(text: string, from: number, to: number): number {
  let n = 0;
  for (let k = from; k < to; k++) {
    if (text[k] === "\n") n++;
  }
  return n;
}

const IDENT = String.raw`("(?:[^"]|"")+"|\x60[^\x60]+\x60|\[[^\]]+\]|[A-Za-z_][\w$]*)`;
const QUALIFIED = String.raw`(?:${IDENT}\s*\.\s*)?${IDENT}`;

const CREATE_RE = new RegExp(
  String.raw`^CREATE\s+(?:TEMP(?:ORARY)?\s+)?TABLE\s+(?:IF\s+NOT\s+EXISTS\s+)?${QUALIFIED}`,
  "i"
);
const DROP_RE = new RegExp(String.raw`^DROP\s+TABLE\s+(?:IF\s+EXISTS\s+)?${QUALIFIED}`, "i");
const INSERT_RE = new RegExp(
  String.raw`^(?:INSERT|REPLACE)\s+(?:OR\s+\w+\s+)?INTO\s+${QUALIFIED}`,
  "i"
);
const TRANSACTION_RE = /^(BEGIN|COMMIT|END|ROLLBACK)\b/i;

export function unquoteIdentifier(raw: string): string {
  if (raw.startsWith('"') && raw.endsWith('"')) return raw.slice(1, -1).replace(/""/g, '"');
  if ((raw.startsWith("`") && raw.endsWith("`")) || (raw.startsWith("[") && raw.endsWith("]"))) {
    return raw.slice(1, -1);
  }
  return raw;
}

function tableFrom(match: RegExpMatchArray): string {
  // Group 1 is the optional schema qualifier, group 2 the table
  return unquoteIdentifier(match[2]);
}

export function classifyStatement(sql: string, line = 1): SqlStatement {
  let m = sql.match(CREATE_RE);
  if (m) return { kind: "create", sql, table: tableFrom(m), line };

  m = sql.match(DROP_RE);
  if (m) return { kind: "drop", sql, table: tableFrom(m), line };

  m = sql.match(INSERT_RE);
  if (m) return { kind: "insert", sql, table: tableFrom(m), line };

  if (TRANSACTION_RE.test(sql)) return { kind: "transaction", sql, line };

  return { kind: "other", sql, line };
}

export function parseSqlStatements(text: string): SqlStatement[] {
  return splitSqlStatements(text).map((s) => classifyStatement(s.sql, s.line));
}

/**
 * Quote an identifier for use in generated SQL.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}
