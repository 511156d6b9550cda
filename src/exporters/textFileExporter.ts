/**
 * Text File Exporter
 *
 * Appends one `[SEVERITY] [TIMESTAMP] <json>` line per entry to
 * `<filepath>/<filename>_<traceId>.txt`, creating the file if needed.
 *
 * @module exporters/textFileExporter
 */

import { appendFile } from 'node:fs/promises';

import { formatLogLine } from '../entries/logEntry.js';
import type { LogEntry } from '../entries/types.js';
import { resolveTargetFile } from './fileTarget.js';
import type { ExporterConfig, LogExporter } from './types.js';

export function createTextFileExporter(): LogExporter {
  return {
    async exportLogs(
      traceId: string,
      entries: readonly LogEntry[],
      config?: ExporterConfig,
      signal?: AbortSignal,
    ): Promise<void> {
      if (entries.length === 0) return;

      const file = resolveTargetFile(traceId, '.txt', config);
      // appendFile takes no signal; an abort can only stop the write before it starts.
      signal?.throwIfAborted();
      await appendFile(file, entries.map(formatLogLine).join(''), 'utf8');
    },
  };
}
