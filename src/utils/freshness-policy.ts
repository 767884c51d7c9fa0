import type { CacheSnapshot } from './observation-cache.js';
import { FIVE_MINUTES_MS, truncateToInterval } from './time.js';

export type FetchDecision =
  | { action: 'fetch'; reason: 'no-cache' | 'cache-stale' }
  | { action: 'serve-cache'; reason: 'outside-window' | 'cache-fresh' };

export interface FreshnessPolicyOptions {
  fetchBufferSeconds: number;
  gridIntervalMs?: number;
}

export interface FetchWindow {
  windowStart: number;
  secondsSinceBoundary: number;
  open: boolean;
}

// The PWS network publishes on a fixed 5 minute grid; new data can only appear
// shortly after each boundary.
export const resolveFetchWindow = (now: number, { fetchBufferSeconds, gridIntervalMs = FIVE_MINUTES_MS }: FreshnessPolicyOptions): FetchWindow => {
  const windowStart = truncateToInterval(now, gridIntervalMs);
  const secondsSinceBoundary = Math.floor((now - windowStart) / 1000);
  return {
    windowStart,
    secondsSinceBoundary,
    open: secondsSinceBoundary >= 0 && secondsSinceBoundary <= fetchBufferSeconds,
  };
};

/**
 * Fixed-grid freshness policy. A fetch is only allowed inside the buffer after
 * a grid boundary, and at most once per grid window. Outside the buffer the
 * answer is always `serve-cache`, even with nothing cached; the caller decides
 * how to cover an empty cache.
 */
export const decideFetch = (now: number, snapshot: CacheSnapshot, options: FreshnessPolicyOptions): FetchDecision => {
  const window = resolveFetchWindow(now, options);
  if (!window.open) {
    return { action: 'serve-cache', reason: 'outside-window' };
  }
  if (!snapshot.exists) {
    return { action: 'fetch', reason: 'no-cache' };
  }

  const lastFetchWindow = truncateToInterval(snapshot.lastFetched, options.gridIntervalMs ?? FIVE_MINUTES_MS);
  if (lastFetchWindow !== window.windowStart) {
    return { action: 'fetch', reason: 'cache-stale' };
  }
  return { action: 'serve-cache', reason: 'cache-fresh' };
};
