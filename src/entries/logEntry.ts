/**
 * Log Entry
 *
 * Construction and serialization of individual log entries. The serialized
 * form and the `[SEVERITY] [TIMESTAMP] <json>` line are shared by every
 * exporter backend, so their shape is fixed.
 *
 * @module entries/logEntry
 */

import type { LogLevel } from './levels.js';
import type { Attributes, LogEntry, SerializedLogEntry } from './types.js';

export interface LogEntryInit {
  timestamp: string;
  severity: LogLevel;
  message: string;
  loggerName: string;
  serviceName: string;
  traceId: string;
  spanId: string;
  attributes?: Attributes;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Formats a date as `DD.MM.YYYY HH:mm:ss` in local time. */
export function formatTimestamp(date: Date): string {
  const day = pad2(date.getDate());
  const month = pad2(date.getMonth() + 1);
  const year = String(date.getFullYear()).padStart(4, '0');
  const time = [date.getHours(), date.getMinutes(), date.getSeconds()].map(pad2).join(':');
  return `${day}.${month}.${year} ${time}`;
}

/** Builds a frozen entry. The attribute map is copied. */
export function createLogEntry(init: LogEntryInit): LogEntry {
  return Object.freeze({
    timestamp: init.timestamp,
    severity: init.severity,
    message: init.message,
    loggerName: init.loggerName,
    serviceName: init.serviceName,
    traceId: init.traceId,
    spanId: init.spanId,
    attributes: Object.freeze({ ...init.attributes }),
  });
}

export function serializeLogEntry(entry: LogEntry): SerializedLogEntry {
  return {
    Timestamp: entry.timestamp,
    Severity: entry.severity,
    Message: entry.message,
    LoggerName: entry.loggerName,
    ServiceName: entry.serviceName,
    TraceID: entry.traceId,
    SpanID: entry.spanId,
    Attributes: { ...entry.attributes },
  };
}

/** One output line, newline included. */
export function formatLogLine(entry: LogEntry): string {
  return `[${entry.severity}] [${entry.timestamp}] ${JSON.stringify(serializeLogEntry(entry))}\n`;
}
