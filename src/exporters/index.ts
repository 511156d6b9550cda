/**
 * Exporters Module
 *
 * Backends that turn a transaction's entries into console output or files.
 */

import { createConsoleExporter } from './consoleExporter.js';
import { createJsonFileExporter } from './jsonFileExporter.js';
import { createTextFileExporter } from './textFileExporter.js';
import type { ExporterKind, LogExporter } from './types.js';

export { type ExporterConfig, type ExporterKind, type LogExporter } from './types.js';
export {
  type ConsoleExporterOptions,
  type LineSink,
  createConsoleExporter,
} from './consoleExporter.js';
export { createJsonFileExporter } from './jsonFileExporter.js';
export { createTextFileExporter } from './textFileExporter.js';
export { resolveTargetFile } from './fileTarget.js';

export function createExporter(kind: ExporterKind): LogExporter {
  switch (kind) {
    case 'json':
      return createJsonFileExporter();
    case 'text':
      return createTextFileExporter();
    case 'console':
    default:
      return createConsoleExporter();
  }
}
