import type { BackendValue, KeyValueBackend } from './keyValueBackend';

type Entry =
  | { type: 'string'; value: Buffer; expiresAt: number | null }
  | { type: 'list'; items: Buffer[]; expiresAt: number | null };

export interface InMemoryBackendOptions {
  /** Millisecond clock used for expiry. Defaults to `Date.now`. */
  now?: () => number;
}

const INTEGER_RE = /^-?\d+$/;

function toBuffer(value: BackendValue): Buffer {
  return typeof value === 'string' ? Buffer.from(value, 'utf8') : Buffer.from(value);
}

function globToRegExp(pattern: string): RegExp {
  const source = pattern.replace(/[.+^${}()|[\]\\]/g, '\\$&').replace(/\*/g, '.*').replace(/\?/g, '.');
  return new RegExp(`^${source}$`, 's');
}

/**
 * In-process backend backed by a plain Map, following Redis command semantics.
 *
 * Data lives only for the lifetime of the process. Expired keys are dropped
 * lazily on access, so an expired entry is indistinguishable from one that was
 * never written. Every command runs synchronously, which makes `incr` and
 * `rpush` atomic with respect to other callers in the same process.
 */
export class InMemoryBackend implements KeyValueBackend {
  private store = new Map<string, Entry>();
  private closed = false;
  private readonly now: () => number;

  constructor(options: InMemoryBackendOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  get(key: string): Buffer | null {
    const entry = this._read(key);
    if (!entry) return null;
    if (entry.type !== 'string') throw this._wrongType(key);
    return Buffer.from(entry.value);
  }

  set(key: string, value: BackendValue): void {
    this._ensureOpen();
    this.store.set(key, { type: 'string', value: toBuffer(value), expiresAt: null });
  }

  setex(key: string, seconds: number, value: BackendValue): void {
    this._ensureOpen();
    if (!Number.isInteger(seconds) || seconds <= 0) {
      throw new Error(`InMemoryBackend: invalid expire time ${seconds} in setex`);
    }
    this.store.set(key, {
      type: 'string',
      value: toBuffer(value),
      expiresAt: this.now() + seconds * 1000,
    });
  }

  incr(key: string): number {
    const entry = this._read(key);
    if (!entry) {
      this.store.set(key, { type: 'string', value: Buffer.from('1'), expiresAt: null });
      return 1;
    }
    if (entry.type !== 'string') throw this._wrongType(key);

    const text = entry.value.toString('utf8');
    const current = INTEGER_RE.test(text) ? Number(text) : Number.NaN;
    if (!Number.isSafeInteger(current) || !Number.isSafeInteger(current + 1)) {
      throw new Error(`InMemoryBackend: value at "${key}" is not an integer or out of range`);
    }
    const next = current + 1;
    // Incrementing keeps whatever expiry the key already had
    entry.value = Buffer.from(String(next));
    return next;
  }

  rpush(key: string, value: BackendValue): number {
    const entry = this._read(key);
    if (!entry) {
      this.store.set(key, { type: 'list', items: [toBuffer(value)], expiresAt: null });
      return 1;
    }
    if (entry.type !== 'list') throw this._wrongType(key);
    entry.items.push(toBuffer(value));
    return entry.items.length;
  }

  lrange(key: string, start: number, stop: number): Buffer[] {
    const entry = this._read(key);
    if (!entry) return [];
    if (entry.type !== 'list') throw this._wrongType(key);

    const length = entry.items.length;
    const from = Math.max(start < 0 ? length + start : start, 0);
    const to = Math.min(stop < 0 ? length + stop : stop, length - 1);
    if (from > to) return [];
    return entry.items.slice(from, to + 1).map((item) => Buffer.from(item));
  }

  exists(key: string): boolean {
    return this._read(key) !== null;
  }

  ttl(key: string): number {
    const entry = this._read(key);
    if (!entry) return -2;
    if (entry.expiresAt === null) return -1;
    return Math.round((entry.expiresAt - this.now()) / 1000);
  }

  delete(...keys: string[]): number {
    let removed = 0;
    for (const key of keys) {
      if (this._read(key) && this.store.delete(key)) removed++;
    }
    return removed;
  }

  keys(pattern: string): string[] {
    this._ensureOpen();
    const matcher = globToRegExp(pattern);
    return Array.from(this.store.keys()).filter((key) => this._read(key) !== null && matcher.test(key));
  }

  flushdb(): void {
    this._ensureOpen();
    this.store.clear();
  }

  connect(): void {
    this.closed = false;
  }

  disconnect(): void {
    this.closed = true;
  }

  // ─── Private helpers ────────────────────────────────────────────────────

  private _read(key: string): Entry | null {
    this._ensureOpen();
    const entry = this.store.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.store.delete(key);
      return null;
    }
    return entry;
  }

  private _ensureOpen(): void {
    if (this.closed) {
      throw new Error('InMemoryBackend: connection is closed');
    }
  }

  private _wrongType(key: string): Error {
    return new Error(`InMemoryBackend: WRONGTYPE operation against key "${key}" holding the wrong kind of value`);
  }
}
