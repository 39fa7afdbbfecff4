import { z } from 'zod';
import { ConfigError } from './errors';

export const DEFAULT_EXPIRE_SECONDS = 10;

const expireSecondsSchema = z.number().int().positive();

export const fetchCacheOptionsSchema = z.object({
  /** Cache entry lifetime used when fetch() is called without one. */
  expireSeconds: expireSecondsSchema.default(DEFAULT_EXPIRE_SECONDS),
  /**
   * How resource identifiers map to backend keys. Fixed per deployment:
   * switching schemes makes existing entries unreachable.
   */
  keyScheme: z.enum(['hashed', 'prefixed', 'raw']).default('hashed'),
  /** 'every-request' counts cache hits too; 'miss' counts only real fetches. */
  countOn: z.enum(['every-request', 'miss']).default('every-request'),
});

export type FetchCacheOptions = z.input<typeof fetchCacheOptionsSchema>;
export type ResolvedFetchCacheOptions = z.output<typeof fetchCacheOptionsSchema>;
export type KeyScheme = ResolvedFetchCacheOptions['keyScheme'];
export type CountPolicy = ResolvedFetchCacheOptions['countOn'];

export const cacheOptionsSchema = z.object({
  /** Empty the backend when the Cache is constructed. Meant for test harnesses. */
  flushOnInit: z.boolean().default(false),
  /** Run instrumented store() calls one at a time so history stays paired. */
  serializeCalls: z.boolean().default(true),
});

export type CacheOptions = z.input<typeof cacheOptionsSchema>;
export type ResolvedCacheOptions = z.output<typeof cacheOptionsSchema>;

/**
 * Parses options with `schema`, throwing a ConfigError that lists every issue.
 */
export function parseOptions<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid ${label} options: ${issues}`);
  }
  return result.data;
}

export function parseExpireSeconds(value: unknown): number {
  return parseOptions(expireSecondsSchema, value, 'expireSeconds');
}
