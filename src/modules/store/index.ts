import { randomUUID } from 'node:crypto';
import type { CacheLogger, Coercion, Payload } from '../../types';
import { GuardedBackend } from '../backend/guardedBackend';
import type { KeyValueBackend } from '../backend/keyValueBackend';
import { asFloat, asInteger, asText, classifyPayload, encodeStoredValue } from './codec';

export interface ObjectStoreConfig {
  backend: KeyValueBackend;
  /** Key generator. Defaults to a random UUID; every call must return a key never issued before. */
  generateKey?: () => string;
  logger?: CacheLogger;
}

/**
 * Stores scalar and byte payloads under freshly generated keys.
 * Holds no local copy: every read goes to the backend.
 */
export class ObjectStore {
  private backend: KeyValueBackend;
  private generateKey: () => string;
  private logger?: CacheLogger;

  constructor(config: ObjectStoreConfig) {
    this.backend = GuardedBackend.wrap(config.backend);
    this.generateKey = config.generateKey ?? randomUUID;
    this.logger = config.logger;
  }

  /**
   * Writes `payload` under a new key and returns the key.
   */
  public async store(payload: Payload): Promise<string> {
    const stored = classifyPayload(payload);
    const key = this.generateKey();
    await this.backend.set(key, encodeStoredValue(stored));
    this.logger?.({ type: 'store', key, kind: stored.kind });
    return key;
  }

  /**
   * Reads the raw bytes at `key`, or applies `coerce` to them.
   * Returns null for an unknown key; errors thrown by `coerce` reach the caller.
   */
  public async retrieve(key: string): Promise<Buffer | null>;
  public async retrieve<T>(key: string, coerce: Coercion<T>): Promise<T | null>;
  public async retrieve<T>(key: string, coerce?: Coercion<T>): Promise<T | Buffer | null> {
    const raw = await this.backend.get(key);
    if (raw === null) return null;
    return coerce ? coerce(raw) : raw;
  }

  public retrieveAsText(key: string): Promise<string | null> {
    return this.retrieve(key, asText);
  }

  public retrieveAsInteger(key: string): Promise<number | null> {
    return this.retrieve(key, asInteger);
  }

  public retrieveAsFloat(key: string): Promise<number | null> {
    return this.retrieve(key, asFloat);
  }
}
