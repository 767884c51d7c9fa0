import type { UnitSystem } from '../server/runtime.js';
import { UNIT_BLOCK_KEYS, currentObservation, type ObservationSet, type UnitReadings } from './observations.js';
import { degreesToCompass, windSpeedUnitLabel } from './wind.js';

export const FEELS_LIKE_HEAT_INDEX_THRESHOLD_F = 70;

export const fahrenheitToCelsius = (valueF: number): number => Math.trunc(((valueF - 32) * 5) / 9);

export const celsiusToFahrenheit = (valueC: number): number => Math.trunc((valueC * 9) / 5 + 32);

export interface TemperaturePair {
  f: number;
  c: number;
}

export const toTemperaturePair = (value: number | null, units: UnitSystem): TemperaturePair | null => {
  if (value === null || !Number.isFinite(value)) {
    return null;
  }
  if (units === 'e') {
    return { f: Math.trunc(value), c: fahrenheitToCelsius(value) };
  }
  return { f: celsiusToFahrenheit(value), c: Math.trunc(value) };
};

/** Heat index above 70°F, wind chill otherwise; the air temperature stands in when either is missing. */
export const computeFeelsLike = (readings: UnitReadings, units: UnitSystem): TemperaturePair | null => {
  const temperature = toTemperaturePair(readings.temp, units);
  if (!temperature) {
    return null;
  }
  const source = temperature.f > FEELS_LIKE_HEAT_INDEX_THRESHOLD_F ? readings.heatIndex : readings.windChill;
  return toTemperaturePair(source, units) ?? temperature;
};

export interface StationDisplay {
  stationId: string;
  reportTime: string;
  currentTempF: number | null;
  currentTempC: number | null;
  feelsLikeF: number | null;
  feelsLikeC: number | null;
  dewPointF: number | null;
  dewPointC: number | null;
  humidity: number | null;
  windSpeed: number | null;
  windGust: number | null;
  windSpeedUnit: string;
  windDirCompass: string | null;
  windDirDegrees: number | null;
  randomSecret: string;
}

export const buildStationDisplay = (observationSet: ObservationSet, units: UnitSystem, randomSecret: string): StationDisplay => {
  const observation = currentObservation(observationSet);
  const readings = observation[UNIT_BLOCK_KEYS[units]];
  const temperature = readings ? toTemperaturePair(readings.temp, units) : null;
  const feelsLike = readings ? computeFeelsLike(readings, units) : null;
  const dewPoint = readings ? toTemperaturePair(readings.dewpt, units) : null;

  return {
    stationId: observation.stationID,
    reportTime: observation.obsTimeLocal,
    currentTempF: temperature?.f ?? null,
    currentTempC: temperature?.c ?? null,
    feelsLikeF: feelsLike?.f ?? null,
    feelsLikeC: feelsLike?.c ?? null,
    dewPointF: dewPoint?.f ?? null,
    dewPointC: dewPoint?.c ?? null,
    humidity: observation.humidity,
    windSpeed: readings?.windSpeed ?? null,
    windGust: readings?.windGust ?? null,
    windSpeedUnit: windSpeedUnitLabel(units),
    windDirCompass: degreesToCompass(observation.winddir),
    windDirDegrees: observation.winddir,
    randomSecret,
  };
};
