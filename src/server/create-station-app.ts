import type { Express } from 'express';
import { registerCurrentConditionsRoute } from '../routes/current-conditions.js';
import { registerHealthRoutes } from '../routes/health.js';
import { createDebugLog } from '../utils/debug-log.js';
import { createFetchWithTimeout, type FetchImpl } from '../utils/http-client.js';
import { ObservationCache } from '../utils/observation-cache.js';
import { createObservationService, type ObservationService } from '../utils/observation-service.js';
import { createPwsClient } from '../utils/pws-client.js';
import { createApp } from './create-app.js';
import { errorHandler } from './error-handler.js';
import {
  DEBUG,
  IS_PRODUCTION,
  RATE_LIMIT_MAX_REQUESTS,
  RATE_LIMIT_WINDOW_MS,
  REQUEST_TIMEOUT_MS,
  STALE_AFTER_MS,
  STATIC_DIR,
  UPSTREAM_MAX_RETRIES,
  UPSTREAM_RETRY_DELAY_MS,
  readRandomSecret as readRandomSecretFromSources,
  type StationConfig,
} from './runtime.js';

export interface CreateStationAppOptions {
  config: StationConfig;
  fetchImpl?: FetchImpl;
  readRandomSecret?: () => string;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
  requestTimeoutMs?: number;
  staleAfterMs?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  rateLimitMaxRequests?: number;
  debug?: boolean;
}

export interface StationApp {
  app: Express;
  cache: ObservationCache;
  observationService: ObservationService;
}

export const createStationApp = ({
  config,
  fetchImpl,
  readRandomSecret = () => readRandomSecretFromSources(),
  now,
  sleep,
  requestTimeoutMs = REQUEST_TIMEOUT_MS,
  staleAfterMs = STALE_AFTER_MS,
  maxRetries = UPSTREAM_MAX_RETRIES,
  retryDelayMs = UPSTREAM_RETRY_DELAY_MS,
  rateLimitMaxRequests = RATE_LIMIT_MAX_REQUESTS,
  debug = DEBUG,
}: CreateStationAppOptions): StationApp => {
  const app = createApp({
    isProduction: IS_PRODUCTION,
    rateLimitWindowMs: RATE_LIMIT_WINDOW_MS,
    rateLimitMaxRequests,
    staticDir: STATIC_DIR,
  });

  const pwsClient = createPwsClient({
    apiBase: config.apiBase,
    stationId: config.stationId,
    units: config.units,
    apiKey: config.apiKey,
    fetchWithTimeout: createFetchWithTimeout(requestTimeoutMs, fetchImpl),
    debugLog: createDebugLog(debug),
  });

  const cache = new ObservationCache();
  const observationService = createObservationService({
    cache,
    fetchObservations: pwsClient.fetchCurrent,
    fetchBufferSeconds: config.fetchBufferSeconds,
    staleAfterMs,
    maxRetries,
    retryDelayMs,
    now,
    sleep,
    redact: pwsClient.redact,
  });

  registerHealthRoutes({ app, cache });
  registerCurrentConditionsRoute({ app, observationService, units: config.units, readRandomSecret });
  app.use(errorHandler);

  return { app, cache, observationService };
};
