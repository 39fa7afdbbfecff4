import { UpstreamFetchError } from '../../errors';

export type Fetcher = (resource: string) => Promise<string>;

export interface HttpFetcherOptions {
  /** Defaults to the global fetch. */
  fetch?: typeof fetch;
  init?: RequestInit;
}

/**
 * Builds the slow operation the fetch cache wraps by default: a GET returning the body as text.
 * Non-2xx responses and network failures raise UpstreamFetchError.
 */
export function createHttpFetcher(options: HttpFetcherOptions = {}): Fetcher {
  const fetchImpl = options.fetch ?? fetch;

  return async (url: string) => {
    let response: Response;
    try {
      response = await fetchImpl(url, { method: 'GET', ...options.init });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Unknown network error';
      throw new UpstreamFetchError(url, `Request to ${url} failed: ${message}`, undefined, error);
    }

    if (!response.ok) {
      throw new UpstreamFetchError(url, `Request to ${url} failed with status ${response.status}`, response.status);
    }
    return await response.text();
  };
}
