/**
 * Structured JSON logging for the plugin SDK.
 *
 * One global sink and level; each component gets its own scoped logger.
 * Entries carry level, ts, component and msg, and the connection context
 * (plugin id, message kind, error code) sits at the top level instead of
 * under `meta` so a log reader can filter on it directly.
 *
 * @example
 * ```ts
 * const logger = createLogger('connection').withContext({ plugin: 'com.example.demo' });
 * logger.warn('connection failed', { error_code: 'TRANSPORT_ERROR' });
 * // → {"level":"warn","ts":"...","component":"connection","msg":"connection failed",
 * //    "plugin":"com.example.demo","error_code":"TRANSPORT_ERROR"}
 * ```
 */

import { mkdirSync, appendFileSync } from 'node:fs';
import { dirname } from 'node:path';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  ts: string;
  component: string;
  msg: string;
  plugin?: string;
  message_type?: string;
  error_code?: string;
  duration_ms?: number;
  meta?: Record<string, unknown>;
}

export type LogSink = (entry: LogEntry) => void;

/** Fields a logger can carry on every entry it writes. */
export interface LogContext {
  plugin?: string;
  message_type?: string;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  /** Logger for `<component>:<subComponent>` with the same context. */
  child(subComponent: string): Logger;
  withContext(ctx: LogContext): Logger;
}

// ---------------------------------------------------------------------------
// Levels
// ---------------------------------------------------------------------------

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

// ---------------------------------------------------------------------------
// Sinks
// ---------------------------------------------------------------------------

/** Sink writing one JSON line per entry through `write`. */
export function createStreamSink(write: (line: string) => unknown): LogSink {
  return (entry) => {
    write(JSON.stringify(entry) + '\n');
  };
}

const stdoutSink = createStreamSink((line) => process.stdout.write(line));

let globalLevel: LogLevel = 'info';
let globalSink: LogSink = stdoutSink;

export function configureLogging(options: { level?: LogLevel; sink?: LogSink }): void {
  globalLevel = options.level ?? globalLevel;
  globalSink = options.sink ?? globalSink;
}

/** Back to level `info`, JSON lines on stdout. */
export function resetLogging(): void {
  globalLevel = 'info';
  globalSink = stdoutSink;
}

// ---------------------------------------------------------------------------
// Metadata
// ---------------------------------------------------------------------------

/**
 * Metadata keys that never reach a sink. Setting values can be passwords
 * (`isPassword` settings), so `settingValue` is on the list.
 */
export const NEVER_LOG_FIELDS = new Set([
  'password',
  'secret',
  'token',
  'credential',
  'authorization',
  'settingValue',
]);

export const META_STRING_MAX_LENGTH = 1024;

const PROMOTED_STRING_KEYS = ['plugin', 'message_type', 'error_code'] as const;

function promote(entry: LogEntry, meta: Record<string, unknown>): void {
  for (const key of PROMOTED_STRING_KEYS) {
    const value = meta[key];
    if (typeof value === 'string') entry[key] = value;
  }
  const duration = meta['duration_ms'];
  if (typeof duration === 'number') entry.duration_ms = duration;
}

function cleanMetaValue(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (typeof value === 'string' && value.length > META_STRING_MAX_LENGTH) {
    return value.slice(0, META_STRING_MAX_LENGTH) + '...[truncated]';
  }
  return value;
}

const NOT_IN_META = new Set<string>([...NEVER_LOG_FIELDS, ...PROMOTED_STRING_KEYS, 'duration_ms']);

/** Metadata minus denied and promoted keys; undefined when nothing is left. */
function cleanMeta(meta: Record<string, unknown>): Record<string, unknown> | undefined {
  const kept = Object.entries(meta).filter(
    ([key]) => !NOT_IN_META.has(key),
  );
  if (kept.length === 0) return undefined;
  return Object.fromEntries(kept.map(([key, value]) => [key, cleanMetaValue(value)]));
}

// ---------------------------------------------------------------------------
// createLogger
// ---------------------------------------------------------------------------

/**
 * @param component - e.g. `'connection'` or `'client:dispatcher'`.
 * @param context - Fields written on every entry; per-call metadata wins.
 */
export function createLogger(component: string, context: LogContext = {}): Logger {
  const write = (level: LogLevel, msg: string, meta?: Record<string, unknown>): void => {
    if (severity(level) < severity(globalLevel)) return;

    const entry: LogEntry = { level, ts: new Date().toISOString(), component, msg };
    if (context.plugin) entry.plugin = context.plugin;
    if (context.message_type) entry.message_type = context.message_type;

    if (meta) {
      promote(entry, meta);
      const cleaned = cleanMeta(meta);
      if (cleaned) entry.meta = cleaned;
    }
    globalSink(entry);
  };

  return {
    debug: (msg, meta) => write('debug', msg, meta),
    info: (msg, meta) => write('info', msg, meta),
    warn: (msg, meta) => write('warn', msg, meta),
    error: (msg, meta) => write('error', msg, meta),
    child: (sub) => createLogger(`${component}:${sub}`, context),
    withContext: (ctx) => createLogger(component, { ...context, ...ctx }),
  };
}

// ---------------------------------------------------------------------------
// FileLogSink
// ---------------------------------------------------------------------------

export interface FileLogSink extends LogSink {
  close(): void;
}

/**
 * Append entries as JSON lines to `filePath`, creating its directory.
 * Entries arriving after `close()` are dropped.
 *
 * @param fs - Filesystem calls, replaceable in tests.
 */
export function createFileLogSink(
  filePath: string,
  fs: {
    mkdirSync: (path: string, options: { recursive: boolean }) => void;
    appendFileSync: (path: string, data: string) => void;
  } = { mkdirSync, appendFileSync },
): FileLogSink {
  fs.mkdirSync(dirname(filePath), { recursive: true });

  let open = true;
  const sink = createStreamSink((line) => {
    if (open) fs.appendFileSync(filePath, line);
  });

  return Object.assign(sink, {
    close: () => {
      open = false;
    },
  });
}
