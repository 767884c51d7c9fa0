import type { UnitSystem } from '../server/runtime.js';
import { noopDebugLog, type DebugLog } from './debug-log.js';
import { UpstreamNetworkError, describeError } from './errors.js';
import { DEFAULT_FETCH_HEADERS, redactSecret, type FetchWithTimeout, type TimedResponse } from './http-client.js';
import { parseObservationPayload, type ObservationSet } from './observations.js';

export interface ObservationQuery {
  apiBase: string;
  stationId: string;
  units: UnitSystem;
  apiKey: string;
}

interface CreatePwsClientOptions extends ObservationQuery {
  fetchWithTimeout: FetchWithTimeout;
  debugLog?: DebugLog;
}

export interface PwsClient {
  fetchCurrent: () => Promise<ObservationSet>;
  redact: (text: string) => string;
}

export const buildObservationUrl = ({ apiBase, stationId, units, apiKey }: ObservationQuery): string => {
  const url = new URL(apiBase);
  url.searchParams.set('stationId', stationId);
  url.searchParams.set('format', 'json');
  url.searchParams.set('units', units);
  url.searchParams.set('apiKey', apiKey);
  return url.toString();
};

export const createPwsClient = ({ fetchWithTimeout, debugLog = noopDebugLog, ...query }: CreatePwsClientOptions): PwsClient => {
  const redact = (text: string) => redactSecret(text, query.apiKey);

  const fetchCurrent = async (): Promise<ObservationSet> => {
    const url = buildObservationUrl(query);
    console.log(`[Upstream] Making API request to: ${redact(url)}`);

    let response: TimedResponse;
    try {
      response = await fetchWithTimeout(url, { method: 'GET', headers: DEFAULT_FETCH_HEADERS });
    } catch (error) {
      throw new UpstreamNetworkError(`Error making HTTP request: ${redact(describeError(error))}`, null, { cause: error });
    }

    console.log(`[Upstream] API response status: ${response.status} ${response.statusText}`);
    if (!response.ok) {
      throw new UpstreamNetworkError(`Upstream responded with status ${response.status}`, response.status);
    }

    const rawBody = response.body;
    console.log(`[Upstream] API response body length: ${Buffer.byteLength(rawBody)} bytes`);
    debugLog(`[Upstream] Raw API response: ${redact(rawBody)}`);

    const observationSet = parseObservationPayload(rawBody);
    console.log(`[Upstream] Number of observations in response: ${observationSet.observations.length}`);
    return observationSet;
  };

  return { fetchCurrent, redact };
};
