/**
 * txlog – transaction-scoped log aggregation
 *
 * @module txlog
 */

export {
  type TransactionLogger,
  type TransactionLoggerOptions,
  createTransactionLogger,
} from './transactionLogger.js';

export * from './entries/index.js';
export * from './registry/index.js';
export * from './exporters/index.js';
export * from './config/index.js';
export * from './logging/index.js';

export {
  type TxLogErrorCode,
  TxLogError,
  UnknownTransactionError,
  UnknownLevelError,
  ExporterFailureError,
  ExportTimeoutError,
  ConfigurationError,
} from './errors.js';
