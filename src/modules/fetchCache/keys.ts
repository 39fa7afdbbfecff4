import * as crypto from 'node:crypto';
import type { KeyScheme } from '../../config';

export interface ResourceKeys {
  /** Where the cached payload lives. */
  cache: string;
  /** Where the access counter lives. */
  count: string;
}

export const CACHE_PREFIX = 'cached';
export const COUNT_PREFIX = 'count';

export function sha256Hex(value: string): string {
  return crypto.createHash('sha256').update(value, 'utf8').digest('hex');
}

/**
 * Maps a resource identifier to its backend keys.
 *
 * - `hashed`:   `cached:<sha256>` / `count:<sha256>`
 * - `prefixed`: `cached:<resource>` / `count:<resource>`
 * - `raw`:      `<resource>` / `count:<resource>`
 */
export function resourceKeys(resource: string, scheme: KeyScheme): ResourceKeys {
  switch (scheme) {
    case 'hashed': {
      const digest = sha256Hex(resource);
      return { cache: `${CACHE_PREFIX}:${digest}`, count: `${COUNT_PREFIX}:${digest}` };
    }
    case 'prefixed':
      return { cache: `${CACHE_PREFIX}:${resource}`, count: `${COUNT_PREFIX}:${resource}` };
    case 'raw':
      return { cache: resource, count: `${COUNT_PREFIX}:${resource}` };
  }
}
