/**
 * Transaction Registry
 *
 * Owns every open transaction and the entries recorded against it, and
 * applies the severity threshold when entries are recorded.
 *
 * Map operations are synchronous, so each one runs to completion on the
 * event loop before any other caller observes the map: that is the
 * registry's critical section. The only waiting happens in `record` when
 * the target transaction is being flushed; the call resumes once the flush
 * settles and then sees either the removed transaction or the intact one.
 *
 * @module registry/transactionRegistry
 */

import { createRandomIdGenerator, type IdGenerator } from '../entries/ids.js';
import { DEFAULT_LOG_LEVEL, isLogLevel, meetsThreshold, type LogLevel } from '../entries/levels.js';
import { createLogEntry, formatTimestamp } from '../entries/logEntry.js';
import type { Attributes, LogEntry, TransactionLog } from '../entries/types.js';
import { UnknownLevelError, UnknownTransactionError } from '../errors.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export const DEFAULT_LOGGER_NAME = 'txlog';
export const DEFAULT_SERVICE_NAME = 'default';

export interface TransactionRegistryOptions {
  /** Minimum severity recorded. Defaults to INFO. */
  level?: LogLevel;
  loggerName?: string;
  serviceName?: string;
  idGenerator?: IdGenerator;
  /** Clock used for entry timestamps. Defaults to the system clock. */
  clock?: () => Date;
}

export interface TransactionRegistry {
  /** Opens a transaction and returns its trace ID. */
  open(attributes?: Attributes): string;
  /**
   * Records an entry. Resolves with the entry, or with `undefined` when the
   * level is below the threshold.
   *
   * @throws {UnknownLevelError} when `level` is not a known severity
   * @throws {UnknownTransactionError} when `traceId` is not registered
   */
  record(
    level: LogLevel,
    traceId: string,
    message: string,
    attributes?: Attributes,
  ): Promise<LogEntry | undefined>;
  lookup(traceId: string): TransactionLog | undefined;
  /** Returns false when nothing was registered under `traceId`. */
  remove(traceId: string): boolean;
  /**
   * Holds back `record` calls on `traceId` until `work` settles. Used by the
   * export coordinator for the duration of a flush.
   */
  guard(traceId: string, work: Promise<unknown>): void;
  size(): number;
  traceIds(): string[];

  readonly level: LogLevel;
  readonly loggerName: string;
  readonly serviceName: string;
  setLevel(level: LogLevel): void;
  setLoggerName(name: string): void;
  setServiceName(name: string): void;
}

interface OpenTransaction {
  traceId: string;
  attributes: Readonly<Attributes>;
  spans: LogEntry[];
  barrier?: Promise<void>;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createTransactionRegistry(
  options: TransactionRegistryOptions = {},
): TransactionRegistry {
  const ids = options.idGenerator ?? createRandomIdGenerator();
  const clock = options.clock ?? (() => new Date());
  const transactions = new Map<string, OpenTransaction>();

  let threshold = options.level ?? DEFAULT_LOG_LEVEL;
  let loggerName = options.loggerName ?? DEFAULT_LOGGER_NAME;
  let serviceName = options.serviceName ?? DEFAULT_SERVICE_NAME;

  function nextTraceId(): string {
    let traceId = ids.traceId();
    while (transactions.has(traceId)) {
      traceId = ids.traceId();
    }
    return traceId;
  }

  function view(tx: OpenTransaction): TransactionLog {
    return {
      traceId: tx.traceId,
      attributes: tx.attributes,
      spans: Object.freeze([...tx.spans]),
    };
  }

  return {
    open(attributes?: Attributes): string {
      const traceId = nextTraceId();
      transactions.set(traceId, {
        traceId,
        attributes: Object.freeze({ ...attributes }),
        spans: [],
      });
      return traceId;
    },

    async record(
      level: LogLevel,
      traceId: string,
      message: string,
      attributes?: Attributes,
    ): Promise<LogEntry | undefined> {
      if (!isLogLevel(level)) throw new UnknownLevelError(level);

      // Settings in effect when the call was issued apply, even if it has to
      // wait for a flush.
      const issued = { threshold, loggerName, serviceName, timestamp: clock() };

      let tx = transactions.get(traceId);
      while (tx?.barrier) {
        await tx.barrier;
        tx = transactions.get(traceId);
      }
      if (!tx) throw new UnknownTransactionError(traceId);

      if (!meetsThreshold(level, issued.threshold)) return undefined;

      const entry = createLogEntry({
        timestamp: formatTimestamp(issued.timestamp),
        severity: level,
        message,
        loggerName: issued.loggerName,
        serviceName: issued.serviceName,
        traceId,
        spanId: ids.spanId(),
        attributes,
      });
      tx.spans.push(entry);
      return entry;
    },

    lookup(traceId: string): TransactionLog | undefined {
      const tx = transactions.get(traceId);
      return tx ? view(tx) : undefined;
    },

    remove(traceId: string): boolean {
      return transactions.delete(traceId);
    },

    guard(traceId: string, work: Promise<unknown>): void {
      const tx = transactions.get(traceId);
      if (!tx) return;
      const barrier: Promise<void> = Promise.allSettled([work]).then(() => {
        if (tx.barrier === barrier) tx.barrier = undefined;
      });
      tx.barrier = barrier;
    },

    size(): number {
      return transactions.size;
    },

    traceIds(): string[] {
      return [...transactions.keys()];
    },

    get level(): LogLevel {
      return threshold;
    },
    get loggerName(): string {
      return loggerName;
    },
    get serviceName(): string {
      return serviceName;
    },

    setLevel(level: LogLevel): void {
      if (!isLogLevel(level)) throw new UnknownLevelError(level);
      threshold = level;
    },
    setLoggerName(name: string): void {
      loggerName = name;
    },
    setServiceName(name: string): void {
      serviceName = name;
    },
  };
}
