/**
 * Structured JSON logging for Phaseline.
 *
 * Provides component-scoped loggers with level filtering and injectable
 * sinks for testing. All output is JSON with level, ts, component and
 * msg fields; call-scoped fields are promoted to the top level.
 *
 * @example
 * ```ts
 * const logger = createLogger('engine');
 * logger.info('call handled', { call: 'c-1', status: 200 });
 * // → {"level":"info","ts":"...","component":"engine","msg":"call handled","call":"c-1","status":200}
 * ```
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Log severity levels in ascending order. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** A structured log entry. */
export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  call?: string;
  plugin?: string;
  status?: number;
  duration_ms?: number;
  error_kind?: string;
  meta?: Record<string, unknown>;
}

/** A function that consumes a log entry (output destination). */
export type LogSink = (entry: LogEntry) => void;

/** Context fields that are automatically promoted to every log entry. */
export interface LogContext {
  call?: string;
  plugin?: string;
}

/** A structured logger scoped to a component. */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Level ordering
// ---------------------------------------------------------------------------

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Global state
// ---------------------------------------------------------------------------

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = defaultSink;

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

/** Configure the global logging level and/or sink. */
export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  if (options.level !== undefined) {
    globalLevel = options.level;
  }
  if (options.sink !== undefined) {
    globalSink = options.sink;
  }
}

/** Reset logging to defaults (level: info, sink: stdout JSON). */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = defaultSink;
}

// ---------------------------------------------------------------------------
// Default sink (stdout JSON)
// ---------------------------------------------------------------------------

function defaultSink(entry: LogEntry): void {
  process.stdout.write(JSON.stringify(entry) + '\n');
}

// ---------------------------------------------------------------------------
// NEVER_LOG_FIELDS: deny-listed metadata keys
// ---------------------------------------------------------------------------

/** Metadata keys that must never appear in log output. */
export const NEVER_LOG_FIELDS = new Set([
  'body',
  'password',
  'secret',
  'token',
  'cookie',
  'authorization',
]);

/** Maximum length for string values in metadata before truncation. */
export const META_STRING_MAX_LENGTH = 1024;

// ---------------------------------------------------------------------------
// Metadata sanitization
// ---------------------------------------------------------------------------

/**
 * Strip denied keys, truncate long strings, and serialize Errors in metadata.
 */
function sanitizeMeta(meta: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(meta)) {
    if (NEVER_LOG_FIELDS.has(key.toLowerCase())) continue;

    if (value instanceof Error) {
      result[key] = {
        name: value.name,
        message: value.message,
        stack: value.stack,
      };
    } else if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
      result[key] = value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
    } else {
      result[key] = value;
    }
  }
  return result;
}

// ---------------------------------------------------------------------------
// Field promotion
// ---------------------------------------------------------------------------

/** Copy well-known meta fields onto the entry; returns the keys consumed. */
function promoteFields(entry: LogEntry, meta: Record<string, unknown>): Set<string> {
  const promoted = new Set<string>();

  const { call, plugin, status, duration_ms, error_kind } = meta;
  if (typeof call === 'string') {
    entry.call = call;
    promoted.add('call');
  }
  if (typeof plugin === 'string') {
    entry.plugin = plugin;
    promoted.add('plugin');
  }
  if (typeof status === 'number') {
    entry.status = status;
    promoted.add('status');
  }
  if (typeof duration_ms === 'number') {
    entry.duration_ms = duration_ms;
    promoted.add('duration_ms');
  }
  if (typeof error_kind === 'string') {
    entry.error_kind = error_kind;
    promoted.add('error_kind');
  }

  return promoted;
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * Create a structured logger scoped to a component.
 *
 * @param component - Component name (e.g. `'engine'`, `'plugin:status-pages'`).
 * @param boundContext - Optional context fields promoted to every entry.
 */
export function createLogger(component: string, boundContext?: LogContext): Logger {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[globalLevel]) return;

    const entry: LogEntry = {
      level,
      ts: new Date().toISOString(),
      component,
      msg: message,
    };

    if (boundContext?.call) entry.call = boundContext.call;
    if (boundContext?.plugin) entry.plugin = boundContext.plugin;

    if (meta) {
      const promoted = promoteFields(entry, meta);
      const remaining: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(sanitizeMeta(meta))) {
        if (!promoted.has(key)) {
          remaining[key] = value;
        }
      }
      if (Object.keys(remaining).length > 0) {
        entry.meta = remaining;
      }
    }

    globalSink(entry);
  }

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    child: (subComponent) => createLogger(`${component}:${subComponent}`, boundContext),
    withContext: (ctx) => createLogger(component, { ...boundContext, ...ctx }),
  };
}
