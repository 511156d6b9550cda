/**
 * Logging Module
 *
 * Structured diagnostics for the aggregator itself.
 */

export {
  type DiagnosticLevel,
  type DiagnosticEntry,
  type LogMetadata,
  type LogContext,
  type ErrorInfo,
  type Logger,
  type LogOutput,
  type LoggerOptions,
  createLogger,
  createSilentLogger,
} from './logger.js';
