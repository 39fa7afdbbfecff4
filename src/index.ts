import { type CacheOptions, cacheOptionsSchema, parseOptions, type ResolvedCacheOptions } from './config';
import { GuardedBackend } from './modules/backend/guardedBackend';
import { InMemoryBackend } from './modules/backend/inMemoryBackend';
import type { KeyValueBackend } from './modules/backend/keyValueBackend';
import { ExpiringFetchCache, type ExpiringFetchCacheConfig } from './modules/fetchCache';
import { instrument } from './modules/instrumentation';
import { readHistory, type ReplayOptions, type ReplayReport, replay } from './modules/replay';
import { ObjectStore } from './modules/store';
import { asInteger } from './modules/store/codec';
import {
  CacheOperation,
  type CacheLogger,
  type Coercion,
  type InstrumentedOperation,
  type Payload,
} from './types';

export * from './config';
export * from './errors';
export { GuardedBackend, InMemoryBackend, type InMemoryBackendOptions } from './modules/backend';
export type { BackendCommand, BackendValue, KeyValueBackend } from './modules/backend';
export {
  createHttpFetcher,
  ExpiringFetchCache,
  type ExpiringFetchCacheConfig,
  type Fetcher,
  type HttpFetcherOptions,
  type ResourceKeys,
  resourceKeys,
  sha256Hex,
} from './modules/fetchCache';
export {
  callHistory,
  countCalls,
  type HistoryKeys,
  historyKeys,
  instrument,
  type InstrumentOptions,
  OperationLock,
  serializeCalls,
} from './modules/instrumentation';
export { formatReplay, readHistory, replay, type ReplayEntry, type ReplayOptions, type ReplayReport } from './modules/replay';
export { ObjectStore, type ObjectStoreConfig } from './modules/store';
export { asBigInt, asBytes, asFloat, asInteger, asText } from './modules/store/codec';
export * from './types';

export interface CacheConfig extends CacheOptions {
  /** Defaults to a fresh InMemoryBackend. */
  backend?: KeyValueBackend;
  /** Key generator for store(). Defaults to a random UUID. */
  generateKey?: () => string;
  /**
   * Receives structured events for stores, flushes and fetch cache hits/misses.
   *
   * @example
   * const cache = await Cache.open({ logger: (event) => console.debug(event) });
   */
  logger?: CacheLogger;
}

/**
 * Object cache over a key-value backend.
 *
 * `store()` is instrumented: each call bumps the `Cache.store` counter and
 * appends its arguments and result to the `Cache.store:inputs` /
 * `Cache.store:outputs` history lists, which `replay()` reads back.
 */
export class Cache {
  readonly backend: GuardedBackend;
  readonly options: Readonly<ResolvedCacheOptions>;
  private objects: ObjectStore;
  private logger?: CacheLogger;
  private instrumentedStore: InstrumentedOperation<[Payload], string>;

  constructor(config: CacheConfig = {}) {
    this.options = parseOptions(
      cacheOptionsSchema,
      { flushOnInit: config.flushOnInit, serializeCalls: config.serializeCalls },
      'cache',
    );
    this.backend = GuardedBackend.wrap(config.backend ?? new InMemoryBackend());
    this.logger = config.logger;
    this.objects = new ObjectStore({
      backend: this.backend,
      generateKey: config.generateKey,
      logger: config.logger,
    });
    this.instrumentedStore = instrument<[Payload], string>(
      this.backend,
      CacheOperation.Store,
      (payload: Payload) => this.objects.store(payload),
      { serialize: this.options.serializeCalls },
    );
  }

  /**
   * Constructs a Cache, connects its backend and, with `flushOnInit`, empties it.
   */
  public static async open(config: CacheConfig = {}): Promise<Cache> {
    const cache = new Cache(config);
    await cache.backend.connect();
    if (cache.options.flushOnInit) {
      await cache.flush();
    }
    return cache;
  }

  /**
   * Stores `payload` under a fresh UUID key and returns the key.
   */
  public store(payload: Payload): Promise<string> {
    return this.instrumentedStore(payload);
  }

  /**
   * Reads the value at `key`, optionally through `coerce`.
   * Resolves to null when the key does not exist.
   *
   * @example
   * const key = await cache.store(123);
   * await cache.get(key, asInteger); // 123
   */
  public get(key: string): Promise<Buffer | null>;
  public get<T>(key: string, coerce: Coercion<T>): Promise<T | null>;
  public get<T>(key: string, coerce?: Coercion<T>): Promise<T | Buffer | null> {
    return coerce ? this.objects.retrieve(key, coerce) : this.objects.retrieve(key);
  }

  public getStr(key: string): Promise<string | null> {
    return this.objects.retrieveAsText(key);
  }

  public getInt(key: string): Promise<number | null> {
    return this.objects.retrieveAsInteger(key);
  }

  public getFloat(key: string): Promise<number | null> {
    return this.objects.retrieveAsFloat(key);
  }

  /** Times `operation` has been invoked; 0 when it never ran. */
  public async callCount(operation: string = CacheOperation.Store): Promise<number> {
    const raw = await this.backend.get(operation);
    return raw === null ? 0 : asInteger(raw);
  }

  public history(operation: string = CacheOperation.Store): Promise<ReplayReport> {
    return readHistory(this.backend, operation);
  }

  /**
   * Writes the call trace of `operation` (default `Cache.store`) and returns its lines.
   */
  public replay(operation: string = CacheOperation.Store, options?: ReplayOptions): Promise<string[]> {
    return replay(this.backend, operation, options);
  }

  /**
   * Creates an ExpiringFetchCache sharing this cache's backend and logger.
   */
  public webCache(config: Omit<ExpiringFetchCacheConfig, 'backend'> = {}): ExpiringFetchCache {
    return new ExpiringFetchCache({ logger: this.logger, ...config, backend: this.backend });
  }

  /** Removes every key from the backend, history and counters included. */
  public async flush(): Promise<void> {
    await this.backend.flushdb();
    this.logger?.({ type: 'flush' });
  }

  public async close(): Promise<void> {
    await this.backend.disconnect();
  }
}
