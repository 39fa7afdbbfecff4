/**
 * Canonical text forms written to call history.
 *
 * Arguments are a JSON array. Byte arguments become `{"$bytes":"<base64>"}` and
 * bigints their decimal string, so the output is stable for any payload type.
 */

import { assertWellFormed } from '../store/codec';

function toJsonSafe(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return { $bytes: Buffer.from(value).toString('base64') };
  if (Array.isArray(value)) return value.map(toJsonSafe);
  return value;
}

function stringify(value: unknown): string {
  // JSON.stringify yields undefined for undefined and functions
  return JSON.stringify(toJsonSafe(value)) ?? 'null';
}

export function serializeArgs(args: readonly unknown[]): string {
  return stringify(args);
}

/** String results are stored verbatim and must be well-formed UTF-16; everything else as JSON. */
export function serializeResult(result: unknown): string {
  return typeof result === 'string' ? assertWellFormed(result) : stringify(result);
}
