/**
 * Error types raised by the registry, the export coordinator and the
 * exporter backends. Every error carries a stable `code`.
 *
 * @module errors
 */

export type TxLogErrorCode =
  | 'UNKNOWN_TRANSACTION'
  | 'UNKNOWN_LEVEL'
  | 'EXPORTER_FAILURE'
  | 'EXPORT_TIMEOUT'
  | 'CONFIGURATION_ERROR';

export class TxLogError extends Error {
  constructor(
    message: string,
    public readonly code: TxLogErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TxLogError';
  }
}

/** The trace ID is not (or no longer) registered. */
export class UnknownTransactionError extends TxLogError {
  constructor(public readonly traceId: string) {
    super(`invalid trace ID: ${traceId}`, 'UNKNOWN_TRANSACTION');
    this.name = 'UnknownTransactionError';
  }
}

export class UnknownLevelError extends TxLogError {
  constructor(public readonly level: unknown) {
    super(`unknown log level: ${String(level)}`, 'UNKNOWN_LEVEL');
    this.name = 'UnknownLevelError';
  }
}

/** Wraps whatever an exporter backend rejected with. */
export class ExporterFailureError extends TxLogError {
  constructor(
    public readonly traceId: string,
    cause: unknown,
    message = `export failed for trace ID ${traceId}: ${describeCause(cause)}`,
    code: TxLogErrorCode = 'EXPORTER_FAILURE',
  ) {
    super(message, code, { cause });
    this.name = 'ExporterFailureError';
  }
}

export class ExportTimeoutError extends ExporterFailureError {
  constructor(
    traceId: string,
    public readonly timeoutMs: number,
  ) {
    super(
      traceId,
      undefined,
      `export for trace ID ${traceId} timed out after ${timeoutMs}ms`,
      'EXPORT_TIMEOUT',
    );
    this.name = 'ExportTimeoutError';
  }
}

/** Missing or malformed configuration. */
export class ConfigurationError extends TxLogError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIGURATION_ERROR', options);
    this.name = 'ConfigurationError';
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
