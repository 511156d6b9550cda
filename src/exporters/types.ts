/**
 * Exporter contract shared by every backend.
 */

import type { LogEntry } from '../entries/types.js';

/** Free-form string configuration handed to exporters on every call. */
export type ExporterConfig = Record<string, string>;

export type ExporterKind = 'console' | 'json' | 'text';

/**
 * Turns one transaction's entries into an external effect.
 *
 * Implementations must resolve without side effects when `entries` is
 * empty, and reject with a `ConfigurationError` when configuration they
 * need is missing. `signal` is aborted when the caller stops waiting for
 * the export; a backend should stop as soon as it can and reject.
 */
export interface LogExporter {
  exportLogs(
    traceId: string,
    entries: readonly LogEntry[],
    config?: ExporterConfig,
    signal?: AbortSignal,
  ): Promise<void>;
}
