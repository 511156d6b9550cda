/**
 * Severity levels.
 *
 * Totally ordered: DEBUG < INFO < WARNING < ERROR. Names are case-sensitive.
 *
 * @module entries/levels
 */

export const LOG_LEVELS = ['DEBUG', 'INFO', 'WARNING', 'ERROR'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogLevel = 'INFO';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 1,
  INFO: 2,
  WARNING: 3,
  ERROR: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/** Negative when `a` is less severe than `b`, zero when equal. */
export function compareLevels(a: LogLevel, b: LogLevel): number {
  return LEVEL_PRIORITY[a] - LEVEL_PRIORITY[b];
}

/** Inclusive threshold check: a WARNING threshold admits WARNING and ERROR. */
export function meetsThreshold(level: LogLevel, threshold: LogLevel): boolean {
  return compareLevels(level, threshold) >= 0;
}

/**
 * Parse a configured level name. Unrecognized or missing values fall back
 * to INFO rather than failing.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  return isLogLevel(value) ? value : DEFAULT_LOG_LEVEL;
}
