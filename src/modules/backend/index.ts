export { GuardedBackend } from './guardedBackend';
export { InMemoryBackend, type InMemoryBackendOptions } from './inMemoryBackend';
export type { BackendCommand, BackendValue, KeyValueBackend } from './keyValueBackend';
