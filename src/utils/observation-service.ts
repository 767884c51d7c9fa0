import {
  CacheUnavailableError,
  StaleDataError,
  TimestampParseError,
  describeError,
  isRetryableUpstreamError,
} from './errors.js';
import { decideFetch, type FreshnessPolicyOptions } from './freshness-policy.js';
import type { CachedObservations, ObservationCache } from './observation-cache.js';
import { currentObservation, resolveObservedAt, type ObservationSet } from './observations.js';
import { FIVE_MINUTES_MS, formatClockUtc, formatDuration } from './time.js';

// `stale` is a too-old set accepted because nothing else was ever cached.
export type ObservationSource = 'fresh' | 'cache' | 'fallback' | 'stale';

export interface ObservationResult {
  data: ObservationSet;
  lastFetched: number;
  dataAge: number;
  source: ObservationSource;
  /** Set when the data was served despite a failed or stale fetch. */
  error: Error | null;
}

interface CompletedFetch {
  data: ObservationSet;
  fetchedAt: number;
  asOf: number;
}

interface CreateObservationServiceOptions {
  cache: ObservationCache;
  fetchObservations: () => Promise<ObservationSet>;
  fetchBufferSeconds: number;
  gridIntervalMs?: number;
  staleAfterMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  redact?: (text: string) => string;
}

export interface ObservationService {
  getCurrentObservations: (requestedAt?: number) => Promise<ObservationResult>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const toError = (value: unknown): Error => (value instanceof Error ? value : new Error(String(value)));

const fromSnapshot = (
  snapshot: CachedObservations,
  source: ObservationSource,
  error: Error | null = null,
): ObservationResult => ({
  data: snapshot.data,
  lastFetched: snapshot.lastFetched,
  dataAge: snapshot.dataAge,
  source,
  error,
});

export const createObservationService = ({
  cache,
  fetchObservations,
  fetchBufferSeconds,
  gridIntervalMs = FIVE_MINUTES_MS,
  staleAfterMs = FIVE_MINUTES_MS,
  maxRetries = 3,
  retryDelayMs = 5000,
  now = Date.now,
  sleep = defaultSleep,
  redact = (text) => text,
}: CreateObservationServiceOptions): ObservationService => {
  const policyOptions: FreshnessPolicyOptions = { fetchBufferSeconds, gridIntervalMs };
  let inFlight: Promise<ObservationResult> | null = null;

  // The fetch is stamped with the time the attempt started, so a forced fetch
  // begun just before a boundary does not use up the next window.
  const fetchOnce = async (): Promise<CompletedFetch> => {
    const fetchedAt = now();
    const data = await fetchObservations();
    const observation = currentObservation(data);
    const observedAt = resolveObservedAt(observation);
    if (observedAt === null) {
      const warning = new TimestampParseError(observation.obsTimeUtc ?? observation.epoch);
      console.warn(`[Cache] ${warning.message}; treating data as fresh as of fetch time`);
      return { data, fetchedAt, asOf: fetchedAt };
    }
    return { data, fetchedAt, asOf: observedAt };
  };

  const fetchWithRetries = async (): Promise<ObservationResult> => {
    const attempts = maxRetries + 1;
    let lastError: unknown = null;
    let staleCandidate: CompletedFetch | null = null;

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      if (attempt > 1) {
        console.log(`[Upstream] Retrying in ${retryDelayMs}ms (attempt ${attempt}/${attempts})`);
        await sleep(retryDelayMs);
      }

      try {
        const completed = await fetchOnce();
        const ageMs = completed.fetchedAt - completed.asOf;
        const isFresh = ageMs <= staleAfterMs;
        console.log(
          `[Cache] Observation time (UTC): ${formatClockUtc(completed.asOf)}, fetched at (UTC): ${formatClockUtc(completed.fetchedAt)}, age: ${formatDuration(ageMs)}, fresh: ${isFresh}`,
        );
        if (!isFresh) {
          staleCandidate = completed;
          throw new StaleDataError(completed.asOf, ageMs);
        }

        return fromSnapshot(cache.replace(completed.data, completed.fetchedAt, completed.asOf), 'fresh');
      } catch (error) {
        lastError = error;
        console.error(`[Upstream] Fetch attempt ${attempt}/${attempts} failed: ${redact(describeError(error))}`);
        if (!isRetryableUpstreamError(error)) {
          break;
        }
      }
    }

    const snapshot = cache.snapshot();
    if (snapshot.exists) {
      console.warn(`[Cache] Fetch failed, returning cached data from ${formatClockUtc(snapshot.lastFetched)}`);
      return fromSnapshot(snapshot, 'fallback', toError(lastError));
    }

    if (staleCandidate) {
      console.warn('[Cache] No cached data to fall back to, accepting stale observation as best available');
      const accepted = cache.replace(staleCandidate.data, staleCandidate.fetchedAt, staleCandidate.asOf);
      return fromSnapshot(accepted, 'stale', toError(lastError));
    }

    throw new CacheUnavailableError(lastError);
  };

  // Requests that decide to fetch while one is already running share it; a
  // request that goes away does not cancel it.
  const refresh = (): Promise<ObservationResult> => {
    if (!inFlight) {
      inFlight = fetchWithRetries().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  };

  const getCurrentObservations = async (requestedAt: number = now()): Promise<ObservationResult> => {
    const snapshot = cache.snapshot();
    const decision = decideFetch(requestedAt, snapshot, policyOptions);

    if (decision.action === 'serve-cache') {
      if (snapshot.exists) {
        console.log(`[Cache] Using cached weather data (${decision.reason}, fetched ${formatDuration(requestedAt - snapshot.lastFetched)} ago)`);
        return fromSnapshot(snapshot, 'cache');
      }
      console.log('[Policy] Outside fetch window with no cached data, forcing fallback fetch');
    } else {
      console.log(`[Policy] Fetching new weather data at ${formatClockUtc(requestedAt)} (${decision.reason})`);
    }

    return refresh();
  };

  return { getCurrentObservations };
};
