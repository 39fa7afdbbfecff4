/**
 * End-to-end scenarios for the Cache facade over an InMemoryBackend.
 *
 * Covers:
 * - store/get round trips and coercions
 * - call counting and call history on store()
 * - replay output and its idempotence
 * - webCache() expiry behaviour on the shared backend
 * - lifecycle: open/flush/close
 */

import { describe, expect, it, vi } from 'vitest';
import {
  asInteger,
  asText,
  BackendUnavailableError,
  Cache,
  CacheOperation,
  cacheOptionsSchema,
  ConfigError,
  ConversionError,
  InMemoryBackend,
  parseOptions,
} from '../src/index';

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

function lines(backend: InMemoryBackend, key: string): string[] {
  return backend.lrange(key, 0, -1).map((item) => item.toString('utf8'));
}

// ─── Store / retrieve ──────────────────────────────────────────────────────

describe('Cache store/get', () => {
  it('stores bytes under a UUID key and returns them unchanged', async () => {
    const cache = await Cache.open();
    const key = await cache.store(Buffer.from('hello'));

    expect(key).toHaveLength(36);
    expect(key).toMatch(UUID_RE);
    expect(await cache.get(key)).toEqual(Buffer.from('hello'));
  });

  it('round-trips each payload type through its coercion', async () => {
    const cache = await Cache.open();

    const bytesKey = await cache.store(Buffer.from('foo'));
    const intKey = await cache.store(123);
    const strKey = await cache.store('bar');
    const floatKey = await cache.store(0.25);

    expect(await cache.get(bytesKey)).toEqual(Buffer.from('foo'));
    expect(await cache.get(intKey, asInteger)).toBe(123);
    expect(await cache.get(strKey, asText)).toBe('bar');
    expect(await cache.getStr(strKey)).toBe('bar');
    expect(await cache.getInt(intKey)).toBe(123);
    expect(await cache.getFloat(floatKey)).toBe(0.25);
  });

  it('resolves to null for unknown keys', async () => {
    const cache = await Cache.open();
    expect(await cache.get('non-existent-key')).toBeNull();
    expect(await cache.getStr('non-existent-key')).toBeNull();
    expect(await cache.getInt('non-existent-key')).toBeNull();
  });

  it('surfaces conversion errors', async () => {
    const cache = await Cache.open();
    const key = await cache.store('hello world');
    await expect(cache.getInt(key)).rejects.toThrow(ConversionError);
  });
});

// ─── Instrumentation ───────────────────────────────────────────────────────

describe('Cache instrumentation', () => {
  it('counts store() calls under Cache.store', async () => {
    const backend = new InMemoryBackend();
    const cache = await Cache.open({ backend });

    await cache.store(Buffer.from('first'));
    expect(await cache.callCount()).toBe(1);
    expect(await cache.get(CacheOperation.Store, asInteger)).toBe(1);

    await cache.store(Buffer.from('second'));
    await cache.store(Buffer.from('third'));
    expect(await cache.callCount()).toBe(3);
    expect(await cache.callCount('Unknown.op')).toBe(0);
  });

  it('records inputs and outputs of store() in call order', async () => {
    const backend = new InMemoryBackend();
    const cache = await Cache.open({ backend });

    const s1 = await cache.store('first');
    const s2 = await cache.store('second');
    const s3 = await cache.store('third');

    expect(lines(backend, 'Cache.store:inputs')).toEqual(['["first"]', '["second"]', '["third"]']);
    const outputs = lines(backend, 'Cache.store:outputs');
    expect(outputs).toEqual([s1, s2, s3]);
    expect(new Set(outputs).size).toBe(3);
    for (const key of outputs) expect(key).toHaveLength(36);
  });

  it('keeps history paired when store() is called concurrently', async () => {
    const backend = new InMemoryBackend();
    const cache = await Cache.open({ backend });

    const keys = await Promise.all(['a', 'b', 'c', 'd'].map((v) => cache.store(v)));

    const history = await cache.history();
    expect(history.count).toBe(4);
    expect(history.entries).toEqual([
      { input: '["a"]', output: keys[0] },
      { input: '["b"]', output: keys[1] },
      { input: '["c"]', output: keys[2] },
      { input: '["d"]', output: keys[3] },
    ]);
  });

  it('counts a failed store() and leaves an input without an output', async () => {
    class ReadOnlyBackend extends InMemoryBackend {
      override set(): void {
        throw new Error('READONLY You can\'t write against a read only replica.');
      }
    }
    const backend = new ReadOnlyBackend();
    const cache = await Cache.open({ backend });

    await expect(cache.store('x')).rejects.toThrow(BackendUnavailableError);

    expect(await cache.callCount()).toBe(1);
    expect(lines(backend, 'Cache.store:inputs')).toEqual(['["x"]']);
    expect(lines(backend, 'Cache.store:outputs')).toEqual([]);
  });

  it('stores non-finite floats and negative zero', async () => {
    const cache = await Cache.open();

    expect(await cache.getFloat(await cache.store(Number.NaN))).toBeNaN();
    expect(await cache.getFloat(await cache.store(Number.NEGATIVE_INFINITY))).toBe(Number.NEGATIVE_INFINITY);
    expect(await cache.getStr(await cache.store(Number.POSITIVE_INFINITY))).toBe('inf');
    expect(await cache.getStr(await cache.store(-0))).toBe('-0');
    expect(await cache.callCount()).toBe(4);
  });

  it('rejects text it cannot encode as UTF-8 without writing it', async () => {
    const backend = new InMemoryBackend();
    const cache = await Cache.open({ backend, generateKey: () => 'k' });

    await expect(cache.store('a\uD800b')).rejects.toThrow(ConversionError);
    expect(backend.exists('k')).toBe(false);
    expect(lines(backend, 'Cache.store:outputs')).toEqual([]);
  });
});

// ─── Replay ────────────────────────────────────────────────────────────────

describe('Cache replay', () => {
  it('prints the trace of store() calls', async () => {
    let n = 0;
    const cache = await Cache.open({ generateKey: () => `key-${++n}` });
    await cache.store('foo');
    await cache.store('bar');
    await cache.store(42);

    const write = vi.fn();
    const trace = await cache.replay(CacheOperation.Store, { write });

    expect(trace).toEqual([
      'Cache.store was called 3 times:',
      'Cache.store(*["foo"]) -> key-1',
      'Cache.store(*["bar"]) -> key-2',
      'Cache.store(*[42]) -> key-3',
    ]);
    expect(write).toHaveBeenCalledTimes(4);
  });

  it('is idempotent', async () => {
    const cache = await Cache.open();
    await cache.store('x');

    const first = await cache.replay(undefined, { write: () => {} });
    const second = await cache.replay(undefined, { write: () => {} });
    expect(second).toEqual(first);
    expect(await cache.callCount()).toBe(1);
  });
});

// ─── Web cache ─────────────────────────────────────────────────────────────

describe('Cache.webCache', () => {
  it('memoizes a slow fetch on the shared backend until the entry expires', async () => {
    let now = 0;
    const backend = new InMemoryBackend({ now: () => now });
    const cache = await Cache.open({ backend });
    const fetcher = vi.fn(async (url: string) => `<html>${url}</html>`);
    const web = cache.webCache({ fetcher, keyScheme: 'prefixed' });
    const url = 'http://slow.test/delay/3000';

    expect(await web.fetch(url)).toBe(`<html>${url}</html>`);
    expect(await cache.get(`count:${url}`, asInteger)).toBe(1);

    now += 9_000;
    expect(await web.fetch(url)).toBe(`<html>${url}</html>`);
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(await web.accessCount(url)).toBe(2);

    now += 1_000;
    await web.fetch(url);
    expect(fetcher).toHaveBeenCalledTimes(2);
    expect(await web.accessCount(url)).toBe(3);
  });

  it('passes the cache logger to the fetch cache unless overridden', async () => {
    const logger = vi.fn();
    const cache = await Cache.open({ logger });
    const web = cache.webCache({ fetcher: async () => 'body' });

    await web.fetch('r');
    expect(logger).toHaveBeenCalledWith({ type: 'fetch.miss', resource: 'r', accessCount: 1, expireSeconds: 10 });
  });
});

// ─── Lifecycle and configuration ───────────────────────────────────────────

describe('Cache lifecycle', () => {
  it('flushOnInit empties the backend when opened', async () => {
    const backend = new InMemoryBackend();
    backend.set('stale', 'x');
    const logger = vi.fn();

    await Cache.open({ backend, flushOnInit: true, logger });
    expect(backend.keys('*')).toEqual([]);
    expect(logger).toHaveBeenCalledWith({ type: 'flush' });
  });

  it('keeps existing data without flushOnInit', async () => {
    const backend = new InMemoryBackend();
    backend.set('kept', 'x');
    await Cache.open({ backend });
    expect(backend.keys('*')).toEqual(['kept']);
  });

  it('reconnects the backend on open and fails with BackendUnavailableError after close', async () => {
    const backend = new InMemoryBackend();
    backend.disconnect();

    const cache = await Cache.open({ backend });
    const key = await cache.store('x');

    await cache.close();
    await expect(cache.get(key)).rejects.toBeInstanceOf(BackendUnavailableError);
  });

  it('rejects invalid options', () => {
    const parse = () => parseOptions(cacheOptionsSchema, { flushOnInit: 'yes' }, 'cache');
    expect(parse).toThrow(ConfigError);
    expect(parse).toThrow('Invalid cache options: flushOnInit: Expected boolean, received string');
  });

  it('store() without serialization still records every call', async () => {
    const backend = new InMemoryBackend();
    const cache = new Cache({ backend, serializeCalls: false });
    await cache.store('a');
    await cache.store('b');
    expect(lines(backend, 'Cache.store:inputs')).toEqual(['["a"]', '["b"]']);
  });
});
