/**
 * Core types shared by the store, instrumentation and fetch cache modules.
 */

export type MaybePromise<T> = T | Promise<T>;

/** What callers hand to `store()`. */
export type Payload = string | Uint8Array | number | bigint;

/**
 * Closed variant a payload is classified into before it is encoded for the backend.
 * Integers carry a bigint so values past `Number.MAX_SAFE_INTEGER` survive.
 */
export type StoredValue =
  | { kind: 'text'; value: string }
  | { kind: 'bytes'; value: Uint8Array }
  | { kind: 'integer'; value: bigint }
  | { kind: 'float'; value: number };

export type StoredKind = StoredValue['kind'];

/** Converts raw backend bytes into a caller-facing value. */
export type Coercion<T> = (raw: Buffer) => T;

/** Any sync or async function that can sit behind an instrumentation wrapper. */
export type Operation<A extends unknown[], R> = (...args: A) => MaybePromise<R>;

/** The shape every instrumentation wrapper returns. */
export type InstrumentedOperation<A extends unknown[], R> = (...args: A) => Promise<R>;

/**
 * Explicit identifiers for instrumented operations.
 * Counter and history keys in the backend are derived from these strings, so they must stay stable.
 */
export const CacheOperation = {
  Store: 'Cache.store',
} as const;

export type CacheOperationName = (typeof CacheOperation)[keyof typeof CacheOperation];

export type CacheLogEvent =
  | { type: 'store'; key: string; kind: StoredKind }
  | { type: 'flush' }
  | { type: 'fetch.hit'; resource: string; accessCount: number }
  | { type: 'fetch.miss'; resource: string; accessCount: number | null; expireSeconds: number }
  | { type: 'fetch.error'; resource: string; error: unknown };

export type CacheLogger = (event: CacheLogEvent) => void;
