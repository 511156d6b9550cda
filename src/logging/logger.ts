/**
 * Diagnostic Logger
 *
 * JSON-structured logger the aggregator uses to report on its own work
 * (flush outcomes, configuration fallbacks). Kept apart from the
 * transaction entries it aggregates: diagnostics go to stderr by default,
 * while the console exporter owns stdout.
 *
 * @module logging/logger
 */

// ─── Types ───────────────────────────────────────────────────────────────────

export type DiagnosticLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  [key: string]: unknown;
}

export interface LogContext {
  service?: string;
  component?: string;
  traceId?: string;
}

export interface ErrorInfo {
  name: string;
  message: string;
  code?: string;
  stack?: string;
}

export interface DiagnosticEntry {
  timestamp: string;
  level: DiagnosticLevel;
  message: string;
  service: string;
  component?: string;
  traceId?: string;
  metadata?: LogMetadata;
  error?: ErrorInfo;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, error?: Error, metadata?: LogMetadata): void;
  error(message: string, error?: Error, metadata?: LogMetadata): void;
  child(context: LogContext): Logger;
}

// ─── Level Ordering ──────────────────────────────────────────────────────────

const LEVEL_PRIORITY: Record<DiagnosticLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Output sink for diagnostic entries. */
export type LogOutput = (entry: DiagnosticEntry) => void;

const defaultLogOutput: LogOutput = (entry: DiagnosticEntry) => {
  process.stderr.write(JSON.stringify(entry) + '\n');
};

// ─── Logger Options ──────────────────────────────────────────────────────────

export interface LoggerOptions {
  /** Service name included in every entry. Defaults to 'txlog'. */
  service?: string;
  /** Minimum level to emit. Defaults to 'warn'. */
  level?: DiagnosticLevel;
  context?: LogContext;
  /** Custom output sink. Defaults to JSON lines on stderr. */
  output?: LogOutput;
}

// ─── Implementation ──────────────────────────────────────────────────────────

function toErrorInfo(error: Error): ErrorInfo {
  const info: ErrorInfo = { name: error.name, message: error.message };
  if ('code' in error && typeof error.code === 'string') {
    info.code = error.code;
  }
  if (error.stack) info.stack = error.stack;
  return info;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'warn';
  const context: LogContext = { ...options.context };
  const service = context.service ?? options.service ?? 'txlog';
  const output = options.output ?? defaultLogOutput;

  function log(
    level: DiagnosticLevel,
    message: string,
    error?: Error,
    metadata?: LogMetadata,
  ): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) return;

    const entry: DiagnosticEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service,
    };
    if (context.component) entry.component = context.component;
    if (context.traceId) entry.traceId = context.traceId;
    if (metadata && Object.keys(metadata).length > 0) entry.metadata = metadata;
    if (error) entry.error = toErrorInfo(error);

    output(entry);
  }

  return {
    debug(message: string, metadata?: LogMetadata): void {
      log('debug', message, undefined, metadata);
    },
    info(message: string, metadata?: LogMetadata): void {
      log('info', message, undefined, metadata);
    },
    warn(message: string, error?: Error, metadata?: LogMetadata): void {
      log('warn', message, error, metadata);
    },
    error(message: string, error?: Error, metadata?: LogMetadata): void {
      log('error', message, error, metadata);
    },
    child(childContext: LogContext): Logger {
      return createLogger({
        level: minLevel,
        context: { ...context, service, ...childContext },
        output,
      });
    },
  };
}

/** Logger that discards everything. */
export function createSilentLogger(): Logger {
  return createLogger({ level: 'error', output: () => undefined });
}
