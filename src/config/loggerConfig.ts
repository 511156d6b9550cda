/**
 * Logger Configuration
 *
 * Loads the string-valued configuration mapping from a JSON file or from
 * environment variables, and derives logger settings from it. The same
 * mapping is handed to exporters, so backend keys (`filepath`,
 * `filename`) live alongside the logger keys.
 *
 * @module config/loggerConfig
 */

import { readFile } from 'node:fs/promises';

import { isLogLevel, parseLogLevel, type LogLevel } from '../entries/levels.js';
import { ConfigurationError } from '../errors.js';
import type { ExporterConfig, ExporterKind } from '../exporters/types.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export interface LoggerSettings {
  loggerName?: string;
  serviceName?: string;
  level?: LogLevel;
  exporter?: ExporterKind;
}

/** Environment variable for each recognized configuration key. */
export const CONFIG_ENV_VARS = {
  loggerName: 'TXLOG_LOGGER_NAME',
  serviceName: 'TXLOG_SERVICE_NAME',
  level: 'TXLOG_LEVEL',
  filepath: 'TXLOG_FILEPATH',
  filename: 'TXLOG_FILENAME',
  exporter: 'TXLOG_EXPORTER',
} as const;

const EXPORTER_KINDS: readonly ExporterKind[] = ['console', 'json', 'text'];

function isExporterKind(value: string): value is ExporterKind {
  return (EXPORTER_KINDS as readonly string[]).includes(value);
}

// ─── Parsing ─────────────────────────────────────────────────────────────────

/**
 * Validates a decoded JSON value as a configuration mapping: an object
 * whose values are all strings.
 */
export function parseConfig(value: unknown): ExporterConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigurationError('config must be a JSON object');
  }

  const entries: Array<[string, string]> = [];
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw !== 'string') {
      throw new ConfigurationError(`config value for "${key}" must be a string, got ${typeof raw}`);
    }
    entries.push([key, raw]);
  }
  // fromEntries defines own properties, so a "__proto__" key is kept as data.
  return Object.fromEntries(entries);
}

export async function loadConfigFile(filePath: string): Promise<ExporterConfig> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`cannot read config file ${filePath}`, { cause: error });
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`config file ${filePath} is not valid JSON`, { cause: error });
  }
  return parseConfig(decoded);
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ExporterConfig {
  const config: ExporterConfig = {};
  for (const [key, variable] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[variable];
    if (value !== undefined) config[key] = value;
  }
  return config;
}

/**
 * Derives logger settings. Keys that are absent leave the corresponding
 * setting untouched; a present but unrecognized `level` becomes INFO and an
 * unrecognized `exporter` is ignored.
 */
export function resolveSettings(config: ExporterConfig): LoggerSettings {
  const settings: LoggerSettings = {};

  const loggerName = config['loggerName'];
  if (loggerName !== undefined) settings.loggerName = loggerName;

  const serviceName = config['serviceName'];
  if (serviceName !== undefined) settings.serviceName = serviceName;

  if ('level' in config) settings.level = parseLogLevel(config['level']);

  const exporter = config['exporter'];
  if (exporter !== undefined && isExporterKind(exporter)) settings.exporter = exporter;

  return settings;
}

/** True when `level` names a severity exactly (no fallback applied). */
export function isRecognizedLevel(level: string | undefined): boolean {
  return isLogLevel(level);
}
