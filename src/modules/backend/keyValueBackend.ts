import type { MaybePromise } from '../../types';

export type BackendValue = string | Uint8Array;

/**
 * Key-value backend the cache sits in front of.
 *
 * Supports both synchronous and asynchronous implementations. Use
 * InMemoryBackend for ephemeral/test scenarios, or supply your own
 * implementation backed by Redis, Valkey, a managed KV service, etc.
 *
 * Implementations must provide `incr` and `rpush` as single atomic commands:
 * call counters and call history rely on them never losing an update.
 */
export interface KeyValueBackend {
  get(key: string): MaybePromise<Buffer | null>;
  set(key: string, value: BackendValue): MaybePromise<void>;
  /** Sets `key` and expires it after `seconds`. */
  setex(key: string, seconds: number, value: BackendValue): MaybePromise<void>;
  /** Increments the integer at `key`; an absent key counts as 0, so the first call returns 1. */
  incr(key: string): MaybePromise<number>;
  /** Appends to the tail of the list at `key` and returns the new length. */
  rpush(key: string, value: BackendValue): MaybePromise<number>;
  /** Inclusive range; negative indices count from the tail (`-1` is the last element). */
  lrange(key: string, start: number, stop: number): MaybePromise<Buffer[]>;
  exists(key: string): MaybePromise<boolean>;
  /** Remaining whole seconds, `-1` when the key has no expiry, `-2` when it does not exist. */
  ttl(key: string): MaybePromise<number>;
  delete(...keys: string[]): MaybePromise<number>;
  /** Glob match on `*` and `?`. Meant for management helpers, not the hot path. */
  keys(pattern: string): MaybePromise<string[]>;
  flushdb(): MaybePromise<void>;
  /** Optional: open the connection before first use. */
  connect?(): MaybePromise<void>;
  /** Optional: release the connection. */
  disconnect?(): MaybePromise<void>;
}

export type BackendCommand = Exclude<keyof KeyValueBackend, 'connect' | 'disconnect'>;
