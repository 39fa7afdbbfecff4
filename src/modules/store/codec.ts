import { ConversionError } from '../../errors';
import type { Payload, StoredValue } from '../../types';

const INTEGER_RE = /^[+-]?\d+$/;
const FLOAT_RE = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INF_RE = /^[+-]?inf(inity)?$/i;
const NAN_RE = /^[+-]?nan$/i;
const LONE_SURROGATE_RE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Throws when `text` holds an unpaired surrogate, which has no UTF-8 encoding
 * and would otherwise be written as U+FFFD.
 */
export function assertWellFormed(text: string): string {
  const match = LONE_SURROGATE_RE.exec(text);
  if (match) {
    const unit = match[0].charCodeAt(0).toString(16).toUpperCase();
    throw new ConversionError(`Text has an unpaired surrogate U+${unit} at index ${match.index}`);
  }
  return text;
}

/**
 * Classifies a raw payload into its stored variant.
 * Whole numbers are integers; every other number, -0 and the non-finite ones included, is a float.
 */
export function classifyPayload(payload: Payload): StoredValue {
  if (typeof payload === 'string') return { kind: 'text', value: payload };
  if (typeof payload === 'bigint') return { kind: 'integer', value: payload };
  if (typeof payload === 'number') {
    if (Number.isInteger(payload) && !Object.is(payload, -0)) return { kind: 'integer', value: BigInt(payload) };
    return { kind: 'float', value: payload };
  }
  return { kind: 'bytes', value: payload };
}

function formatFloat(value: number): string {
  if (Number.isNaN(value)) return 'nan';
  if (value === Number.POSITIVE_INFINITY) return 'inf';
  if (value === Number.NEGATIVE_INFINITY) return '-inf';
  if (Object.is(value, -0)) return '-0';
  return String(value);
}

/**
 * Byte representation written to the backend. Numbers are stored as decimal text,
 * with `nan`, `inf` and `-inf` for the non-finite floats.
 */
export function encodeStoredValue(stored: StoredValue): Buffer {
  switch (stored.kind) {
    case 'text':
      return Buffer.from(assertWellFormed(stored.value), 'utf8');
    case 'bytes':
      return Buffer.from(stored.value);
    case 'integer':
      return Buffer.from(stored.value.toString(), 'ascii');
    case 'float':
      return Buffer.from(formatFloat(stored.value), 'ascii');
  }
}

// ─── Coercions ────────────────────────────────────────────────────────────

export function asBytes(raw: Buffer): Buffer {
  return raw;
}

export function asText(raw: Buffer): string {
  try {
    return utf8.decode(raw);
  } catch (error) {
    throw new ConversionError(
      `Stored value is not valid UTF-8: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

export function asBigInt(raw: Buffer): bigint {
  const text = asText(raw).trim();
  if (!INTEGER_RE.test(text)) {
    throw new ConversionError(`Invalid integer literal: "${text}"`, text);
  }
  return BigInt(text);
}

/** Decimal text to a JS number. Values outside the safe integer range are rejected; use asBigInt for those. */
export function asInteger(raw: Buffer): number {
  const value = asBigInt(raw);
  if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
    throw new ConversionError(`Integer ${value} is outside the safe number range`, value.toString());
  }
  return Number(value);
}

/** Decimal or exponent text, or `nan` / `inf` / `infinity` in any case and with an optional sign. */
export function asFloat(raw: Buffer): number {
  const text = asText(raw).trim();
  if (NAN_RE.test(text)) return Number.NaN;
  if (INF_RE.test(text)) return text.startsWith('-') ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  if (!FLOAT_RE.test(text)) {
    throw new ConversionError(`Invalid float literal: "${text}"`, text);
  }
  return Number(text);
}
