export type StationErrorCode =
  | 'CONFIG'
  | 'UPSTREAM_NETWORK'
  | 'UPSTREAM_PARSE'
  | 'EMPTY_OBSERVATIONS'
  | 'STALE_DATA'
  | 'TIMESTAMP_PARSE'
  | 'CACHE_UNAVAILABLE';

export abstract class StationError extends Error {
  abstract readonly code: StationErrorCode;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends StationError {
  readonly code = 'CONFIG';
}

export class UpstreamNetworkError extends StationError {
  readonly code = 'UPSTREAM_NETWORK';
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: ErrorOptions) {
    super(message, options);
    this.status = status;
  }
}

export class UpstreamParseError extends StationError {
  readonly code = 'UPSTREAM_PARSE';
}

export class EmptyObservationsError extends StationError {
  readonly code = 'EMPTY_OBSERVATIONS';

  constructor(message: string = 'No observations found in API response') {
    super(message);
  }
}

export class StaleDataError extends StationError {
  readonly code = 'STALE_DATA';
  readonly observedAt: number;
  readonly ageMs: number;

  constructor(observedAt: number, ageMs: number) {
    super(`API returned stale data (observation time UTC: ${new Date(observedAt).toISOString()}, age ${Math.round(ageMs / 1000)}s)`);
    this.observedAt = observedAt;
    this.ageMs = ageMs;
  }
}

export class TimestampParseError extends StationError {
  readonly code = 'TIMESTAMP_PARSE';
  readonly rawValue: string | number | null;

  constructor(rawValue: string | number | null) {
    super(`Could not parse observation timestamp: ${rawValue === null ? 'missing' : JSON.stringify(rawValue)}`);
    this.rawValue = rawValue;
  }
}

export class CacheUnavailableError extends StationError {
  readonly code = 'CACHE_UNAVAILABLE';

  constructor(cause?: unknown) {
    super('No weather data available, fresh or cached', cause === undefined ? undefined : { cause });
  }
}

export type RetryableUpstreamError = UpstreamNetworkError | UpstreamParseError | EmptyObservationsError | StaleDataError;

export const isRetryableUpstreamError = (error: unknown): error is RetryableUpstreamError =>
  error instanceof UpstreamNetworkError ||
  error instanceof UpstreamParseError ||
  error instanceof EmptyObservationsError ||
  error instanceof StaleDataError;

export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};
