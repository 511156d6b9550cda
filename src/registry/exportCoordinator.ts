/**
 * Export Coordinator
 *
 * Hands a transaction's entries to the configured exporter and retires the
 * transaction from the registry once the export succeeds. A failed export
 * leaves the transaction registered, entries intact, so the caller can
 * retry it.
 *
 * Flushes of different transactions run independently; a second flush of a
 * transaction whose export is still in flight joins that export instead of
 * starting another one. That holds past a timeout too: the exporter is
 * signalled to abort, and the transaction stays locked until its call
 * actually returns.
 *
 * @module registry/exportCoordinator
 */

import type { LogEntry } from '../entries/types.js';
import {
  ConfigurationError,
  ExporterFailureError,
  ExportTimeoutError,
  UnknownTransactionError,
} from '../errors.js';
import type { ExporterConfig, LogExporter } from '../exporters/types.js';
import { createSilentLogger, type Logger } from '../logging/logger.js';
import type { TransactionRegistry } from './transactionRegistry.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface ExportCoordinatorOptions {
  registry: TransactionRegistry;
  exporter: LogExporter;
  /** Configuration passed to the exporter on every call. */
  config?: ExporterConfig;
  /** Diagnostic logger. Defaults to a silent one. */
  logger?: Logger;
  /** Deadline for a single exporter call. No deadline when omitted. */
  exportTimeoutMs?: number;
}

export interface ExportCoordinator {
  /**
   * Exports one transaction and removes it from the registry on success.
   *
   * @throws {UnknownTransactionError} when `traceId` is not registered
   * @throws {ExporterFailureError} when the exporter rejects or times out
   * @throws {ConfigurationError} when the exporter reports missing configuration
   */
  flush(traceId: string): Promise<void>;
  /**
   * Flushes every transaction registered at call time, concurrently, and
   * waits for all of them. When several fail, only the failure of the
   * earliest-registered transaction is reported; the others are logged.
   */
  flushAll(): Promise<void>;
  /** True while an exporter call for `traceId` is running, timed out or not. */
  isFlushing(traceId: string): boolean;

  readonly exporter: LogExporter;
  readonly config: ExporterConfig | undefined;
  setExporter(exporter: LogExporter): void;
  setConfig(config: ExporterConfig | undefined): void;
}

/**
 * One export per transaction. `result` is what callers see and may reject on
 * the deadline; `settled` resolves once the exporter call itself finishes,
 * with whether it succeeded.
 */
interface InFlightExport {
  readonly result: Promise<void>;
  readonly settled: Promise<boolean>;
  readonly timedOut: boolean;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number | undefined,
  onTimeout: () => Error,
): Promise<T> {
  if (timeoutMs === undefined) return work;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

function toFailure(traceId: string, error: unknown): Error {
  if (error instanceof ConfigurationError || error instanceof ExporterFailureError) {
    return error;
  }
  return new ExporterFailureError(traceId, error);
}

// ─── Implementation ──────────────────────────────────────────────────────────

export function createExportCoordinator(options: ExportCoordinatorOptions): ExportCoordinator {
  const { registry, exportTimeoutMs } = options;
  const logger = (options.logger ?? createSilentLogger()).child({ component: 'exportCoordinator' });
  const inFlight = new Map<string, InFlightExport>();

  let exporter = options.exporter;
  let config = options.config;

  async function callExporter(
    traceId: string,
    entries: readonly LogEntry[],
    signal: AbortSignal,
  ): Promise<void> {
    await exporter.exportLogs(traceId, entries, config, signal);
  }

  function startExport(traceId: string, entries: readonly LogEntry[]): InFlightExport {
    const controller = new AbortController();
    let timedOut = false;

    // Settles once the exporter call returns, after the registry and the
    // in-flight map reflect the outcome.
    const done = callExporter(traceId, entries, controller.signal)
      .then(() => {
        registry.remove(traceId);
        const message = timedOut
          ? 'transaction exported after its deadline'
          : 'transaction exported';
        logger.debug(message, { traceId, entryCount: entries.length });
      })
      .finally(() => {
        if (inFlight.get(traceId) === state) inFlight.delete(traceId);
      });

    const result = withTimeout(done, exportTimeoutMs, () => {
      timedOut = true;
      controller.abort();
      return new ExportTimeoutError(traceId, exportTimeoutMs ?? 0);
    }).catch((error: unknown) => {
      const failure = toFailure(traceId, error);
      logger.warn('transaction export failed', failure, { traceId, entryCount: entries.length });
      throw failure;
    });

    const state: InFlightExport = {
      result,
      settled: done.then(
        () => true,
        () => false,
      ),
      get timedOut() {
        return timedOut;
      },
    };
    return state;
  }

  function flush(traceId: string): Promise<void> {
    const pending = inFlight.get(traceId);
    if (pending) {
      if (!pending.timedOut) return pending.result;
      // The caller already gave up on this export, but the exporter is still
      // running: wait for it rather than start a second one.
      return pending.settled.then((exported) => (exported ? undefined : flush(traceId)));
    }

    const log = registry.lookup(traceId);
    if (!log) return Promise.reject(new UnknownTransactionError(traceId));

    const state = startExport(traceId, log.spans);
    inFlight.set(traceId, state);
    registry.guard(traceId, state.settled);
    return state.result;
  }

  return {
    flush,

    async flushAll(): Promise<void> {
      const traceIds = registry.traceIds();
      const results = await Promise.allSettled(traceIds.map((traceId) => flush(traceId)));

      const failures: unknown[] = [];
      for (const result of results) {
        if (result.status === 'rejected') failures.push(result.reason);
      }
      if (failures.length === 0) return;

      if (failures.length > 1) {
        logger.warn('multiple transaction exports failed; reporting the first', undefined, {
          failed: failures.length,
          total: traceIds.length,
        });
      }
      throw failures[0];
    },

    isFlushing(traceId: string): boolean {
      return inFlight.has(traceId);
    },

    get exporter(): LogExporter {
      return exporter;
    },
    get config(): ExporterConfig | undefined {
      return config;
    },
    setExporter(next: LogExporter): void {
      exporter = next;
    },
    setConfig(next: ExporterConfig | undefined): void {
      config = next;
    },
  };
}
