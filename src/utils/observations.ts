import type { UnitSystem } from '../server/runtime.js';
import { EmptyObservationsError, UpstreamParseError } from './errors.js';
import { parseEpochSecondsToMs, parseIsoTimeToMs } from './time.js';

export interface UnitReadings {
  temp: number | null;
  heatIndex: number | null;
  dewpt: number | null;
  windChill: number | null;
  windSpeed: number | null;
  windGust: number | null;
  pressure: number | null;
  precipRate: number | null;
  precipTotal: number | null;
  elev: number | null;
}

export const UNIT_BLOCK_KEYS = {
  e: 'imperial',
  m: 'metric',
  h: 'uk_hybrid',
} as const satisfies Record<UnitSystem, string>;

export interface StationObservation {
  stationID: string;
  obsTimeUtc: string | null;
  obsTimeLocal: string;
  epoch: number | null;
  neighborhood: string | null;
  softwareType: string | null;
  country: string | null;
  solarRadiation: number | null;
  uv: number | null;
  lat: number | null;
  lon: number | null;
  winddir: number | null;
  humidity: number | null;
  qcStatus: number | null;
  imperial?: UnitReadings;
  metric?: UnitReadings;
  uk_hybrid?: UnitReadings;
}

/**
 * One upstream response. The API may return several observations; the first one
 * is "current" and is the only one rendered.
 */
export interface ObservationSet {
  readonly observations: readonly StationObservation[];
}

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const toFiniteNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

const toOptionalString = (value: unknown): string | null =>
  typeof value === 'string' && value.trim() ? value : null;

const normalizeUnitReadings = (value: unknown): UnitReadings | undefined => {
  if (!isRecord(value)) {
    return undefined;
  }
  return {
    temp: toFiniteNumber(value.temp),
    heatIndex: toFiniteNumber(value.heatIndex),
    dewpt: toFiniteNumber(value.dewpt),
    windChill: toFiniteNumber(value.windChill),
    windSpeed: toFiniteNumber(value.windSpeed),
    windGust: toFiniteNumber(value.windGust),
    pressure: toFiniteNumber(value.pressure),
    precipRate: toFiniteNumber(value.precipRate),
    precipTotal: toFiniteNumber(value.precipTotal),
    elev: toFiniteNumber(value.elev),
  };
};

const normalizeObservation = (value: unknown, index: number): StationObservation => {
  if (!isRecord(value)) {
    throw new UpstreamParseError(`Observation ${index} is not an object`);
  }
  if (typeof value.stationID !== 'string' || !value.stationID.trim()) {
    throw new UpstreamParseError(`Observation ${index} is missing stationID`);
  }

  const observation: StationObservation = {
    stationID: value.stationID,
    obsTimeUtc: toOptionalString(value.obsTimeUtc),
    obsTimeLocal: typeof value.obsTimeLocal === 'string' ? value.obsTimeLocal : '',
    epoch: toFiniteNumber(value.epoch),
    neighborhood: toOptionalString(value.neighborhood),
    softwareType: toOptionalString(value.softwareType),
    country: toOptionalString(value.country),
    solarRadiation: toFiniteNumber(value.solarRadiation),
    uv: toFiniteNumber(value.uv),
    lat: toFiniteNumber(value.lat),
    lon: toFiniteNumber(value.lon),
    winddir: toFiniteNumber(value.winddir),
    humidity: toFiniteNumber(value.humidity),
    qcStatus: toFiniteNumber(value.qcStatus),
  };

  for (const key of Object.values(UNIT_BLOCK_KEYS)) {
    const readings = normalizeUnitReadings(value[key]);
    if (readings) {
      observation[key] = readings;
    }
  }

  return observation;
};

const deepFreeze = <T>(value: T): Readonly<T> => {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

export const parseObservationPayload = (rawBody: string): ObservationSet => {
  // The PWS API answers 204 with an empty body when the station has not reported recently.
  if (!rawBody.trim()) {
    throw new EmptyObservationsError('API response body was empty');
  }

  let payload: unknown;
  try {
    payload = JSON.parse(rawBody);
  } catch (error) {
    throw new UpstreamParseError('Error parsing API response', { cause: error });
  }

  if (!isRecord(payload) || !Array.isArray(payload.observations)) {
    throw new UpstreamParseError('API response is missing an observations array');
  }
  if (payload.observations.length === 0) {
    throw new EmptyObservationsError();
  }

  const observations = payload.observations.map((entry, index) => normalizeObservation(entry, index));
  return deepFreeze({ observations });
};

export const currentObservation = (set: ObservationSet): StationObservation => {
  const [first] = set.observations;
  if (!first) {
    throw new EmptyObservationsError('Observation set has no current observation');
  }
  return first;
};

/** Reported instant of an observation: `obsTimeUtc`, then `epoch`. */
export const resolveObservedAt = (observation: StationObservation): number | null =>
  parseIsoTimeToMs(observation.obsTimeUtc) ?? parseEpochSecondsToMs(observation.epoch);
