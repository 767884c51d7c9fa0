import type { UnitSystem } from '../server/runtime.js';

// The trailing N is the wrap-around bucket for bearings just short of 360.
export const COMPASS_DIRECTIONS = [
  'N',
  'NNE',
  'NE',
  'ENE',
  'E',
  'ESE',
  'SE',
  'SSE',
  'S',
  'SSW',
  'SW',
  'WSW',
  'W',
  'WNW',
  'NW',
  'NNW',
  'N',
] as const;

export type CompassDirection = (typeof COMPASS_DIRECTIONS)[number];

const DEGREES_PER_BUCKET = 22;

export const degreesToCompass = (degrees: number | null | undefined): CompassDirection | null => {
  if (typeof degrees !== 'number' || !Number.isFinite(degrees)) {
    return null;
  }
  const rawIndex = Math.trunc(degrees / DEGREES_PER_BUCKET);
  const index = Math.min(Math.max(rawIndex, 0), COMPASS_DIRECTIONS.length - 1);
  return COMPASS_DIRECTIONS[index] ?? null;
};

export const windSpeedUnitLabel = (units: UnitSystem): string => (units === 'm' ? 'km/h' : 'mph');
