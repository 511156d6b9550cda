/**
 * Resolves the output file for file-based exporters from the `filepath`
 * and `filename` configuration keys.
 *
 * @module exporters/fileTarget
 */

import path from 'node:path';

import { ConfigurationError } from '../errors.js';
import type { ExporterConfig } from './types.js';

/**
 * Returns `<filepath>/<filename>_<traceId><extension>`.
 *
 * @throws {ConfigurationError} when the config or either key is missing
 */
export function resolveTargetFile(
  traceId: string,
  extension: string,
  config: ExporterConfig | undefined,
): string {
  if (!config) throw new ConfigurationError('no config provided');

  const filepath = config['filepath'];
  if (filepath === undefined) throw new ConfigurationError('no filepath in config');

  const filename = config['filename'];
  if (filename === undefined) throw new ConfigurationError('no filename in config');

  return path.join(filepath, `${filename}_${traceId}${extension}`);
}
