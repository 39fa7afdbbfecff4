export type CacheErrorCode =
  | 'CONVERSION_FAILED'
  | 'BACKEND_UNAVAILABLE'
  | 'UPSTREAM_FETCH_FAILED'
  | 'INVALID_CONFIG';

export class CacheError extends Error {
  readonly code: CacheErrorCode;

  constructor(code: CacheErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A value could not be converted to or from its stored bytes. */
export class ConversionError extends CacheError {
  constructor(
    message: string,
    readonly raw?: string,
  ) {
    super('CONVERSION_FAILED', message);
  }
}

/** A backend command failed. Never retried internally. */
export class BackendUnavailableError extends CacheError {
  constructor(
    readonly command: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('BACKEND_UNAVAILABLE', `Backend command "${command}" failed: ${reason}`, { cause });
  }
}

export class UpstreamFetchError extends CacheError {
  constructor(
    readonly resource: string,
    message: string,
    readonly status?: number,
    cause?: unknown,
  ) {
    super('UPSTREAM_FETCH_FAILED', message, { cause });
  }
}

export class ConfigError extends CacheError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}
