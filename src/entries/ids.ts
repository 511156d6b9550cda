/**
 * Trace and span ID generation.
 *
 * @module entries/ids
 */

import { randomBytes } from 'node:crypto';

export interface IdGenerator {
  /** ID for a new transaction. */
  traceId(): string;
  /** ID for a new entry. */
  spanId(): string;
}

function generateHexId(byteLength: number): string {
  return randomBytes(byteLength).toString('hex');
}

/** 32-character hex trace ID (16 bytes). */
export function generateTraceId(): string {
  return generateHexId(16);
}

/** 16-character hex span ID (8 bytes). */
export function generateSpanId(): string {
  return generateHexId(8);
}

export function createRandomIdGenerator(): IdGenerator {
  return {
    traceId: generateTraceId,
    spanId: generateSpanId,
  };
}

/**
 * Deterministic generator producing zero-padded decimal counters.
 * Span IDs are unique for the lifetime of the generator.
 */
export function createSequentialIdGenerator(
  options: { traceStart?: number; spanStart?: number } = {},
): IdGenerator {
  let nextTrace = options.traceStart ?? 1;
  let nextSpan = options.spanStart ?? 0;
  return {
    traceId(): string {
      return String(nextTrace++).padStart(10, '0');
    },
    spanId(): string {
      return String(nextSpan++).padStart(11, '0');
    },
  };
}
