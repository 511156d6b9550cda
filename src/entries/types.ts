/**
 * Type definitions for log entries and transaction logs.
 */

import type { LogLevel } from './levels.js';

export type Attributes = Record<string, string>;

/** One structured record attached to a transaction. Frozen once created. */
export interface LogEntry {
  readonly timestamp: string;
  readonly severity: LogLevel;
  readonly message: string;
  readonly loggerName: string;
  readonly serviceName: string;
  readonly traceId: string;
  readonly spanId: string;
  readonly attributes: Readonly<Attributes>;
}

/** Read-only view of a transaction held by the registry. */
export interface TransactionLog {
  readonly traceId: string;
  readonly attributes: Readonly<Attributes>;
  readonly spans: readonly LogEntry[];
}

/** Wire format of a log entry. Key order is part of the format. */
export interface SerializedLogEntry {
  Timestamp: string;
  Severity: LogLevel;
  Message: string;
  LoggerName: string;
  ServiceName: string;
  TraceID: string;
  SpanID: string;
  Attributes: Attributes;
}
