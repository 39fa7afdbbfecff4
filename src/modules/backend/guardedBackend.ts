import { BackendUnavailableError, CacheError } from '../../errors';
import type { BackendCommand, BackendValue, KeyValueBackend } from './keyValueBackend';

/**
 * Wraps a backend so that every failing command surfaces as a BackendUnavailableError
 * naming the command. Errors are never retried here; the caller decides.
 * All commands become asynchronous.
 */
export class GuardedBackend implements KeyValueBackend {
  constructor(private readonly inner: KeyValueBackend) {}

  /** Wraps `backend` unless it is already guarded. */
  static wrap(backend: KeyValueBackend): GuardedBackend {
    return backend instanceof GuardedBackend ? backend : new GuardedBackend(backend);
  }

  get(key: string): Promise<Buffer | null> {
    return this._call('get', () => this.inner.get(key));
  }

  set(key: string, value: BackendValue): Promise<void> {
    return this._call('set', () => this.inner.set(key, value));
  }

  setex(key: string, seconds: number, value: BackendValue): Promise<void> {
    return this._call('setex', () => this.inner.setex(key, seconds, value));
  }

  incr(key: string): Promise<number> {
    return this._call('incr', () => this.inner.incr(key));
  }

  rpush(key: string, value: BackendValue): Promise<number> {
    return this._call('rpush', () => this.inner.rpush(key, value));
  }

  lrange(key: string, start: number, stop: number): Promise<Buffer[]> {
    return this._call('lrange', () => this.inner.lrange(key, start, stop));
  }

  exists(key: string): Promise<boolean> {
    return this._call('exists', () => this.inner.exists(key));
  }

  ttl(key: string): Promise<number> {
    return this._call('ttl', () => this.inner.ttl(key));
  }

  delete(...keys: string[]): Promise<number> {
    return this._call('delete', () => this.inner.delete(...keys));
  }

  keys(pattern: string): Promise<string[]> {
    return this._call('keys', () => this.inner.keys(pattern));
  }

  flushdb(): Promise<void> {
    return this._call('flushdb', () => this.inner.flushdb());
  }

  async connect(): Promise<void> {
    const { inner } = this;
    if (!inner.connect) return;
    await this._call('connect', () => inner.connect?.());
  }

  async disconnect(): Promise<void> {
    const { inner } = this;
    if (!inner.disconnect) return;
    await this._call('disconnect', () => inner.disconnect?.());
  }

  private async _call<T>(command: BackendCommand | 'connect' | 'disconnect', run: () => T | Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      if (error instanceof CacheError) throw error;
      throw new BackendUnavailableError(command, error);
    }
  }
}
