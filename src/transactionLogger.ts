/**
 * Transaction Logger
 *
 * Entry point for callers: opens transactions, records entries at the four
 * severities and flushes them through the configured exporter.
 *
 * @example
 * ```typescript
 * const logger = createTransactionLogger({ level: 'WARNING' });
 * const traceId = logger.startTransaction({ route: '/orders' });
 * await logger.warning('slow query', traceId, { table: 'orders' });
 * await logger.exportLogs(traceId);
 * ```
 *
 * @module transactionLogger
 */

import { isRecognizedLevel, loadConfigFile, resolveSettings } from './config/loggerConfig.js';
import type { IdGenerator } from './entries/ids.js';
import type { LogLevel } from './entries/levels.js';
import type { Attributes, LogEntry, TransactionLog } from './entries/types.js';
import { createExporter } from './exporters/index.js';
import type { ExporterConfig, LogExporter } from './exporters/types.js';
import { createLogger, type Logger } from './logging/logger.js';
import { createExportCoordinator, type ExportCoordinator } from './registry/exportCoordinator.js';
import {
  createTransactionRegistry,
  type TransactionRegistry,
} from './registry/transactionRegistry.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface TransactionLoggerOptions {
  /** Minimum severity recorded. Defaults to INFO. */
  level?: LogLevel;
  loggerName?: string;
  serviceName?: string;
  /** Defaults to the console exporter. */
  exporter?: LogExporter;
  /** Configuration handed to the exporter. */
  config?: ExporterConfig;
  /** Diagnostic logger for the aggregator's own messages. */
  logger?: Logger;
  exportTimeoutMs?: number;
  idGenerator?: IdGenerator;
  clock?: () => Date;
}

export interface TransactionLogger {
  readonly registry: TransactionRegistry;
  readonly coordinator: ExportCoordinator;

  /**
   * Applies a JSON config file: `loggerName`, `serviceName`, `level` and
   * `exporter` adjust the logger; the whole mapping becomes the exporter
   * configuration.
   *
   * @throws {ConfigurationError} when the file cannot be read or parsed
   */
  withConfig(filePath: string): Promise<TransactionLogger>;
  /** Applies an already-loaded configuration mapping. */
  applyConfig(config: ExporterConfig): TransactionLogger;
  withExporter(exporter: LogExporter): TransactionLogger;

  startTransaction(attributes?: Attributes): string;
  getTransaction(traceId: string): TransactionLog | undefined;

  debug(message: string, traceId: string, attributes?: Attributes): Promise<LogEntry | undefined>;
  info(message: string, traceId: string, attributes?: Attributes): Promise<LogEntry | undefined>;
  warning(message: string, traceId: string, attributes?: Attributes): Promise<LogEntry | undefined>;
  error(message: string, traceId: string, attributes?: Attributes): Promise<LogEntry | undefined>;

  exportLogs(traceId: string): Promise<void>;
  exportAllLogs(): Promise<void>;

  setLevel(level: LogLevel): void;
  setLoggerName(name: string): void;
  setServiceName(name: string): void;
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createTransactionLogger(
  options: TransactionLoggerOptions = {},
): TransactionLogger {
  const baseLogger = options.logger ?? createLogger();
  const diagnostics = baseLogger.child({ component: 'transactionLogger' });

  const registry = createTransactionRegistry({
    level: options.level,
    loggerName: options.loggerName,
    serviceName: options.serviceName,
    idGenerator: options.idGenerator,
    clock: options.clock,
  });

  const coordinator = createExportCoordinator({
    registry,
    exporter: options.exporter ?? createExporter('console'),
    config: options.config,
    logger: baseLogger,
    exportTimeoutMs: options.exportTimeoutMs,
  });

  function record(level: LogLevel) {
    return (message: string, traceId: string, attributes?: Attributes) =>
      registry.record(level, traceId, message, attributes);
  }

  const txLogger: TransactionLogger = {
    registry,
    coordinator,

    async withConfig(filePath: string): Promise<TransactionLogger> {
      const config = await loadConfigFile(filePath);
      return txLogger.applyConfig(config);
    },

    applyConfig(config: ExporterConfig): TransactionLogger {
      const settings = resolveSettings(config);
      if (settings.loggerName !== undefined) registry.setLoggerName(settings.loggerName);
      if (settings.serviceName !== undefined) registry.setServiceName(settings.serviceName);
      if (settings.level !== undefined) {
        if (!isRecognizedLevel(config['level'])) {
          diagnostics.warn('unrecognized level in config, falling back to INFO', undefined, {
            level: config['level'],
          });
        }
        registry.setLevel(settings.level);
      }
      if (settings.exporter !== undefined) {
        coordinator.setExporter(createExporter(settings.exporter));
      }
      coordinator.setConfig(config);
      return txLogger;
    },

    withExporter(exporter: LogExporter): TransactionLogger {
      coordinator.setExporter(exporter);
      return txLogger;
    },

    startTransaction(attributes?: Attributes): string {
      return registry.open(attributes);
    },

    getTransaction(traceId: string): TransactionLog | undefined {
      return registry.lookup(traceId);
    },

    debug: record('DEBUG'),
    info: record('INFO'),
    warning: record('WARNING'),
    error: record('ERROR'),

    exportLogs(traceId: string): Promise<void> {
      return coordinator.flush(traceId);
    },

    exportAllLogs(): Promise<void> {
      return coordinator.flushAll();
    },

    setLevel(level: LogLevel): void {
      registry.setLevel(level);
    },
    setLoggerName(name: string): void {
      registry.setLoggerName(name);
    },
    setServiceName(name: string): void {
      registry.setServiceName(name);
    },
  };

  return txLogger;
}
