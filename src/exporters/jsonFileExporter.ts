/**
 * JSON File Exporter
 *
 * Writes a transaction's entries as one pretty-printed JSON array to
 * `<filepath>/<filename>_<traceId>.json`, replacing any previous file.
 *
 * @module exporters/jsonFileExporter
 */

import { writeFile } from 'node:fs/promises';

import { serializeLogEntry } from '../entries/logEntry.js';
import type { LogEntry } from '../entries/types.js';
import { resolveTargetFile } from './fileTarget.js';
import type { ExporterConfig, LogExporter } from './types.js';

export function createJsonFileExporter(): LogExporter {
  return {
    async exportLogs(
      traceId: string,
      entries: readonly LogEntry[],
      config?: ExporterConfig,
      signal?: AbortSignal,
    ): Promise<void> {
      if (entries.length === 0) return;

      const file = resolveTargetFile(traceId, '.json', config);
      const body = JSON.stringify(entries.map(serializeLogEntry), null, 2) + '\n';
      await writeFile(file, body, { encoding: 'utf8', signal });
    },
  };
}
