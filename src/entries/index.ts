/**
 * Entries Module
 *
 * Severity levels, entry construction and the shared wire format.
 */

export {
  type LogLevel,
  LOG_LEVELS,
  DEFAULT_LOG_LEVEL,
  isLogLevel,
  compareLevels,
  meetsThreshold,
  parseLogLevel,
} from './levels.js';

export {
  type IdGenerator,
  generateTraceId,
  generateSpanId,
  createRandomIdGenerator,
  createSequentialIdGenerator,
} from './ids.js';

export {
  type LogEntryInit,
  formatTimestamp,
  createLogEntry,
  serializeLogEntry,
  formatLogLine,
} from './logEntry.js';

export type { Attributes, LogEntry, TransactionLog, SerializedLogEntry } from './types.js';
