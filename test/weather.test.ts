import { buildStationDisplay, celsiusToFahrenheit, computeFeelsLike, fahrenheitToCelsius } from '../src/utils/weather.js';
import type { UnitReadings } from '../src/utils/observations.js';
import { degreesToCompass } from '../src/utils/wind.js';
import { buildObservation, buildSet } from './helpers/fixtures.js';

const readings = (overrides: Partial<UnitReadings>): UnitReadings => ({
  temp: null,
  heatIndex: null,
  dewpt: null,
  windChill: null,
  windSpeed: null,
  windGust: null,
  pressure: null,
  precipRate: null,
  precipTotal: null,
  elev: null,
  ...overrides,
});

test('temperature conversions truncate toward zero', () => {
  expect(fahrenheitToCelsius(78)).toBe(25);
  expect(fahrenheitToCelsius(45)).toBe(7);
  expect(fahrenheitToCelsius(20)).toBe(-6);
  expect(celsiusToFahrenheit(24)).toBe(75);
});

test('feels-like uses heat index above 70F', () => {
  expect(computeFeelsLike(readings({ temp: 75, heatIndex: 78, windChill: 75 }), 'e')).toEqual({ f: 78, c: 25 });
});

test('feels-like uses wind chill at or below 70F', () => {
  expect(computeFeelsLike(readings({ temp: 50, heatIndex: 50, windChill: 45 }), 'e')).toEqual({ f: 45, c: 7 });
  expect(computeFeelsLike(readings({ temp: 70, heatIndex: 72, windChill: 70 }), 'e')).toEqual({ f: 70, c: 21 });
});

test('feels-like falls back to the air temperature when the index is missing', () => {
  expect(computeFeelsLike(readings({ temp: 50 }), 'e')).toEqual({ f: 50, c: 10 });
  expect(computeFeelsLike(readings({}), 'e')).toBeNull();
});

test('metric readings are converted from Celsius', () => {
  expect(computeFeelsLike(readings({ temp: 24, heatIndex: 26, windChill: 24 }), 'm')).toEqual({ f: 78, c: 26 });
});

test('compass buckets', () => {
  expect(degreesToCompass(0)).toBe('N');
  expect(degreesToCompass(45)).toBe('NE');
  expect(degreesToCompass(180)).toBe('S');
  expect(degreesToCompass(350)).toBe('NNW');
  expect(degreesToCompass(359)).toBe('N');
  expect(degreesToCompass(1000)).toBe('N');
  expect(degreesToCompass(-5)).toBe('N');
  expect(degreesToCompass(null)).toBeNull();
});

test('buildStationDisplay derives every page field from the first observation', () => {
  const set = buildSet(buildObservation(), buildObservation({ stationID: 'KTESTPWS2', winddir: 10 }));
  expect(buildStationDisplay(set, 'e', 'test-secret')).toEqual({
    stationId: 'KTESTPWS1',
    reportTime: '2024-06-01 05:04:00',
    currentTempF: 75,
    currentTempC: 23,
    feelsLikeF: 78,
    feelsLikeC: 25,
    dewPointF: 60,
    dewPointC: 15,
    humidity: 60,
    windSpeed: 5,
    windGust: 9,
    windSpeedUnit: 'mph',
    windDirCompass: 'SSW',
    windDirDegrees: 200,
    randomSecret: 'test-secret',
  });
});

test('buildStationDisplay reads the block for the configured units', () => {
  const set = buildSet(
    buildObservation({
      imperial: undefined,
      metric: { temp: 10, heatIndex: 10, dewpt: 5, windChill: 8, windSpeed: 12, windGust: 20 },
    }),
  );
  const display = buildStationDisplay(set, 'm', 'test-secret');
  expect(display.currentTempF).toBe(50);
  expect(display.currentTempC).toBe(10);
  expect(display.feelsLikeF).toBe(46);
  expect(display.feelsLikeC).toBe(8);
  expect(display.windSpeed).toBe(12);
  expect(display.windSpeedUnit).toBe('km/h');
});
