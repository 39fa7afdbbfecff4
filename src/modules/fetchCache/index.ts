import {
  type FetchCacheOptions,
  fetchCacheOptionsSchema,
  parseExpireSeconds,
  parseOptions,
  type ResolvedFetchCacheOptions,
} from '../../config';
import { ConfigError } from '../../errors';
import type { CacheLogger } from '../../types';
import { GuardedBackend } from '../backend/guardedBackend';
import type { KeyValueBackend } from '../backend/keyValueBackend';
import { asInteger, asText } from '../store/codec';
import { createHttpFetcher, type Fetcher } from './httpFetcher';
import { CACHE_PREFIX, type ResourceKeys, resourceKeys } from './keys';

export { createHttpFetcher, type Fetcher, type HttpFetcherOptions } from './httpFetcher';
export { type ResourceKeys, resourceKeys, sha256Hex } from './keys';

export interface ExpiringFetchCacheConfig extends FetchCacheOptions {
  backend: KeyValueBackend;
  /** The slow operation behind the cache. Defaults to an HTTP GET via global fetch. */
  fetcher?: Fetcher;
  logger?: CacheLogger;
}

/**
 * Memoizes a slow fetch in the backend with a time-bounded entry per resource,
 * and counts how often each resource is requested.
 *
 * Expiry is left entirely to the backend TTL: an expired entry simply reads as
 * a miss. Two concurrent misses for one resource both fetch and both write;
 * the last write wins.
 */
export class ExpiringFetchCache {
  private backend: GuardedBackend;
  private fetcher: Fetcher;
  private logger?: CacheLogger;
  readonly options: Readonly<ResolvedFetchCacheOptions>;

  constructor(config: ExpiringFetchCacheConfig) {
    this.backend = GuardedBackend.wrap(config.backend);
    this.fetcher = config.fetcher ?? createHttpFetcher();
    this.logger = config.logger;
    this.options = parseOptions(
      fetchCacheOptionsSchema,
      { expireSeconds: config.expireSeconds, keyScheme: config.keyScheme, countOn: config.countOn },
      'fetch cache',
    );
  }

  public keysFor(resource: string): ResourceKeys {
    return resourceKeys(resource, this.options.keyScheme);
  }

  /**
   * Returns the payload for `resource`, from the cache while the entry lives,
   * otherwise from the fetcher (then cached for `expireSeconds`).
   *
   * The access counter is incremented before the lookup and is not rolled back
   * when the fetcher fails; a failed fetch writes no cache entry.
   */
  public async fetch(resource: string, expireSeconds: number = this.options.expireSeconds): Promise<string> {
    const ttl = parseExpireSeconds(expireSeconds);
    const keys = this.keysFor(resource);
    const countEveryRequest = this.options.countOn === 'every-request';

    const accessCount = countEveryRequest ? await this.backend.incr(keys.count) : null;

    const cached = await this.backend.get(keys.cache);
    if (cached !== null) {
      this.logger?.({ type: 'fetch.hit', resource, accessCount: accessCount ?? (await this.accessCount(resource)) });
      return asText(cached);
    }

    const missCount = countEveryRequest ? accessCount : await this.backend.incr(keys.count);
    this.logger?.({ type: 'fetch.miss', resource, accessCount: missCount, expireSeconds: ttl });

    let fresh: string;
    try {
      fresh = await this.fetcher(resource);
    } catch (error) {
      this.logger?.({ type: 'fetch.error', resource, error });
      throw error;
    }

    await this.backend.setex(keys.cache, ttl, fresh);
    return fresh;
  }

  /** Times `resource` was requested (or fetched, under `countOn: 'miss'`). */
  public async accessCount(resource: string): Promise<number> {
    const raw = await this.backend.get(this.keysFor(resource).count);
    return raw === null ? 0 : asInteger(raw);
  }

  public async isCached(resource: string): Promise<boolean> {
    return await this.backend.exists(this.keysFor(resource).cache);
  }

  /** Remaining lifetime of the cached entry in seconds, -2 when nothing is cached. */
  public async timeToLive(resource: string): Promise<number> {
    return await this.backend.ttl(this.keysFor(resource).cache);
  }

  /**
   * Backend keys of all live `cached:` entries, sorted. Raw-scheme entries carry
   * no prefix and cannot be listed. Uses a pattern scan, so keep it off request paths.
   */
  public async cachedEntryKeys(): Promise<string[]> {
    if (this.options.keyScheme === 'raw') {
      throw new ConfigError('cachedEntryKeys() needs the hashed or prefixed key scheme');
    }
    return (await this.backend.keys(`${CACHE_PREFIX}:*`)).sort();
  }
}
