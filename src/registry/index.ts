/**
 * Registry Module
 *
 * The transaction registry and the coordinator that exports from it.
 */

export {
  type TransactionRegistry,
  type TransactionRegistryOptions,
  DEFAULT_LOGGER_NAME,
  DEFAULT_SERVICE_NAME,
  createTransactionRegistry,
} from './transactionRegistry.js';

export {
  type ExportCoordinator,
  type ExportCoordinatorOptions,
  createExportCoordinator,
} from './exportCoordinator.js';
