/**
 * Console Exporter
 *
 * Default backend: prints one `[SEVERITY] [TIMESTAMP] <json>` line per
 * entry. Takes no configuration.
 *
 * @module exporters/consoleExporter
 */

import { formatLogLine } from '../entries/logEntry.js';
import type { LogEntry } from '../entries/types.js';
import type { ExporterConfig, LogExporter } from './types.js';

/** Minimal writable sink; `process.stdout` satisfies it. */
export interface LineSink {
  write(chunk: string): unknown;
}

export interface ConsoleExporterOptions {
  /** Defaults to `process.stdout`. */
  sink?: LineSink;
}

export function createConsoleExporter(options: ConsoleExporterOptions = {}): LogExporter {
  return {
    async exportLogs(
      _traceId: string,
      entries: readonly LogEntry[],
      _config?: ExporterConfig,
      signal?: AbortSignal,
    ): Promise<void> {
      signal?.throwIfAborted();
      const sink = options.sink ?? process.stdout;
      for (const entry of entries) {
        sink.write(formatLogLine(entry));
      }
    },
  };
}
