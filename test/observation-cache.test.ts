import { ObservationCache } from '../src/utils/observation-cache.js';
import { currentObservation, type ObservationSet } from '../src/utils/observations.js';
import { at, buildObservation, buildSet } from './helpers/fixtures.js';

test('starts empty', () => {
  expect(new ObservationCache().snapshot()).toEqual({ exists: false, data: null, lastFetched: null, dataAge: null });
});

test('snapshot is idempotent without an intervening replace', () => {
  const cache = new ObservationCache();
  cache.replace(buildSet(), at(12, 5, 10), at(12, 4));
  const first = cache.snapshot();
  const second = cache.snapshot();
  expect(second).toBe(first);
});

test('replace then snapshot returns the same data and timestamps', () => {
  const cache = new ObservationCache();
  const data = buildSet();
  cache.replace(data, at(12, 5, 10), at(12, 4));
  const snapshot = cache.snapshot();
  expect(snapshot.exists).toBe(true);
  expect(snapshot.data).toBe(data);
  expect(snapshot.lastFetched).toBe(at(12, 5, 10));
  expect(snapshot.dataAge).toBe(at(12, 4));
  expect(JSON.stringify(snapshot.data)).toBe(JSON.stringify(data));
});

test('replace swaps the whole value', () => {
  const cache = new ObservationCache();
  cache.replace(buildSet(), at(12, 5, 10), at(12, 4));
  const held = cache.snapshot();
  const next = buildSet(buildObservation({ stationID: 'KTESTPWS2' }));
  cache.replace(next, at(12, 10, 5), at(12, 9));

  expect(held.lastFetched).toBe(at(12, 5, 10));
  expect(cache.snapshot()).toEqual({ exists: true, data: next, lastFetched: at(12, 10, 5), dataAge: at(12, 9) });
  expect(Object.isFrozen(cache.snapshot())).toBe(true);
});

test('refuses an empty observation set', () => {
  const cache = new ObservationCache();
  const empty: ObservationSet = { observations: [] };
  expect(() => cache.replace(empty, at(12, 5), at(12, 4))).toThrow(RangeError);
  expect(cache.snapshot().exists).toBe(false);
});

test('concurrent readers never see data and timestamps from different writes', async () => {
  const cache = new ObservationCache();
  const minuteOf = (data: ObservationSet) => Number(String(currentObservation(data).obsTimeUtc).slice(14, 16));

  const writer = async () => {
    for (let minute = 0; minute < 50; minute += 1) {
      const obsTimeUtc = `2024-06-01T12:${String(minute).padStart(2, '0')}:00Z`;
      cache.replace(buildSet(buildObservation({ obsTimeUtc })), at(12, minute, 30), at(12, minute));
      await Promise.resolve();
    }
  };

  const reader = async () => {
    const seen: string[] = [];
    for (let i = 0; i < 50; i += 1) {
      const snapshot = cache.snapshot();
      if (snapshot.exists) {
        const minute = minuteOf(snapshot.data);
        expect(snapshot.dataAge).toBe(at(12, minute));
        expect(snapshot.lastFetched).toBe(at(12, minute, 30));
        seen.push(String(minute));
      }
      await Promise.resolve();
    }
    return seen;
  };

  const [, ...readings] = await Promise.all([writer(), reader(), reader(), reader(), reader()]);
  expect(readings.every((seen) => seen.length > 0)).toBe(true);
});
