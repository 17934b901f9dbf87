/**
 * Structured Logger
 *
 * Outputs one JSON object per line for diagnostics. Human-readable run
 * summaries are printed separately by the CLI; this logger carries the
 * machine-readable trail (table, step, counts, error classification).
 *
 * Usage:
 *   import { structuredLog, errorContext } from '../utils/structured-logger';
 *
 *   structuredLog('INFO', 'Table built', { category: 'leds', rows: 7 });
 *
 *   try { ... } catch (err) {
 *     structuredLog('ERROR', 'Dump failed', { category, ...errorContext(err) });
 *   }
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export interface LogContext {
  category?: string;
  step?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  service: 'eda-catalog';
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  INFO: 0,
  WARN: 1,
  ERROR: 2,
  CRITICAL: 3,
};

let minimumLevel: LogLevel = 'INFO';

/**
 * Drop entries below the given level. The CLI sets this from LOG_LEVEL.
 */
export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

// =============================================================================
// Core Logger
// =============================================================================

/**
 * JSON.stringify with circular reference protection.
 * Context may carry BigInt row values or Buffers from SQLite.
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet();
  return JSON.stringify(obj, (_key, value) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
    }
    if (typeof value === 'bigint') return value.toString();
    if (typeof value === 'function') return '[Function]';
    return value;
  });
}

/**
 * Emit a structured JSON log entry.
 *
 * Routes to the appropriate console method based on severity:
 *   - CRITICAL / ERROR  -> console.error  (stderr)
 *   - WARN              -> console.warn   (stderr)
 *   - INFO              -> console.log    (stdout)
 */
export function structuredLog(level: LogLevel, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    service: 'eda-catalog',
    ...context,
  };

  const json = safeStringify(entry);

  switch (level) {
    case 'CRITICAL':
    case 'ERROR':
      console.error(json);
      break;
    case 'WARN':
      console.warn(json);
      break;
    default:
      console.log(json);
  }
}

/**
 * Extract error details including stack trace for structured logging.
 */
export function errorContext(error: unknown): { error: string; error_type: string; stack?: string } {
  if (error instanceof Error) {
    return {
      error: error.message,
      error_type: error.constructor.name,
      ...(error.stack ? { stack: error.stack.split('\n').slice(1, 4).join(' | ') } : {}),
    };
  }
  return { error: String(error), error_type: typeof error };
}

// =============================================================================
// Error Classification
// =============================================================================

const RETRYABLE_PATTERN = /SQLITE_BUSY|SQLITE_LOCKED|database is locked/i;

/**
 * Whether a SQLite failure is a transient lock rather than bad SQL or data.
 */
export function isRetryableError(error: unknown): boolean {
  const msg = error instanceof Error ? error.message : String(error);
  return RETRYABLE_PATTERN.test(msg);
}
