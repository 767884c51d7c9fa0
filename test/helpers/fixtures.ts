import { parseObservationPayload, type ObservationSet } from '../../src/utils/observations.js';

export const STATION_ID = 'KTESTPWS1';
export const API_BASE = 'https://api.test.local/v2/pws/observations/current';
export const API_KEY = 'test-key';

export const at = (hours: number, minutes: number, seconds: number = 0, ms: number = 0): number =>
  Date.UTC(2024, 5, 1, hours, minutes, seconds, ms);

export const buildObservation = (
  overrides: Record<string, unknown> = {},
  imperial: Record<string, unknown> = {},
): Record<string, unknown> => ({
  stationID: STATION_ID,
  obsTimeUtc: '2024-06-01T12:04:00Z',
  obsTimeLocal: '2024-06-01 05:04:00',
  neighborhood: 'Test Hill',
  epoch: 1717243440,
  winddir: 200,
  humidity: 60,
  imperial: {
    temp: 75,
    heatIndex: 78,
    dewpt: 60,
    windChill: 75,
    windSpeed: 5,
    windGust: 9,
    pressure: 29.92,
    precipRate: 0,
    precipTotal: 0.1,
    elev: 100,
    ...imperial,
  },
  ...overrides,
});

export const buildBody = (...observations: Record<string, unknown>[]): string => JSON.stringify({ observations });

export const buildSet = (...observations: Record<string, unknown>[]): ObservationSet =>
  parseObservationPayload(buildBody(...(observations.length ? observations : [buildObservation()])));

export const jsonResponse = (body: string, status: number = 200): Response =>
  new Response(body, { status, headers: { 'Content-Type': 'application/json' } });
