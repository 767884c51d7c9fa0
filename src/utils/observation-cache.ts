import type { ObservationSet } from './observations.js';

export type CacheSnapshot =
  | { readonly exists: false; readonly data: null; readonly lastFetched: null; readonly dataAge: null }
  | { readonly exists: true; readonly data: ObservationSet; readonly lastFetched: number; readonly dataAge: number };

export type CachedObservations = Extract<CacheSnapshot, { exists: true }>;

const EMPTY_SNAPSHOT: CacheSnapshot = Object.freeze({
  exists: false,
  data: null,
  lastFetched: null,
  dataAge: null,
});

/**
 * Last accepted observation set plus its fetch time (`lastFetched`) and the
 * observation's own reported time (`dataAge`).
 *
 * Both operations run to completion without yielding, so on Node's single
 * event loop thread a snapshot is never taken half way through a replace. The
 * state object is swapped in one assignment and never mutated afterwards:
 * readers share it freely and always see data and timestamps that belong
 * together.
 */
export class ObservationCache {
  private state: CacheSnapshot = EMPTY_SNAPSHOT;

  snapshot(): CacheSnapshot {
    return this.state;
  }

  replace(data: ObservationSet, fetchedAt: number, asOf: number): CachedObservations {
    if (data.observations.length === 0) {
      throw new RangeError('Refusing to cache an observation set with no observations');
    }
    if (!Number.isFinite(fetchedAt) || !Number.isFinite(asOf)) {
      throw new RangeError('Cache timestamps must be finite epoch milliseconds');
    }

    const next: CachedObservations = Object.freeze({
      exists: true,
      data,
      lastFetched: fetchedAt,
      dataAge: asOf,
    });
    this.state = next;
    return next;
  }
}
