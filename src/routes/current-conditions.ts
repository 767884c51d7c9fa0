import type { Express, NextFunction, Request, Response } from 'express';
import type { UnitSystem } from '../server/runtime.js';
import { describeError } from '../utils/errors.js';
import type { ObservationResult, ObservationService } from '../utils/observation-service.js';
import { buildStationDisplay } from '../utils/weather.js';
import { renderIndexPage } from '../views/index-page.js';

// The observation cache on the server is the only cache; browsers must always come back.
export const NO_CACHE_HEADERS = {
  'Cache-Control': 'no-cache, no-store, must-revalidate',
  Pragma: 'no-cache',
  Expires: '0',
};

interface RegisterCurrentConditionsRouteOptions {
  app: Express;
  observationService: ObservationService;
  units: UnitSystem;
  readRandomSecret: () => string;
}

export const registerCurrentConditionsRoute = ({
  app,
  observationService,
  units,
  readRandomSecret,
}: RegisterCurrentConditionsRouteOptions) => {
  app.get('/', async (_req: Request, res: Response, next: NextFunction) => {
    let randomSecret: string;
    try {
      randomSecret = readRandomSecret();
    } catch (error) {
      console.error(`Error reading random secret: ${describeError(error)}`);
      res.status(500).type('text/plain').send('Configuration error');
      return;
    }

    res.set(NO_CACHE_HEADERS);

    let result: ObservationResult;
    try {
      result = await observationService.getCurrentObservations();
    } catch (error) {
      console.error(`Error getting weather data: ${describeError(error)}`);
      res.status(503).type('text/plain').send('Weather data unavailable');
      return;
    }

    if (result.error) {
      console.warn(`[Cache] Serving ${result.source} data after fetch problem: ${describeError(result.error)}`);
    }

    try {
      const display = buildStationDisplay(result.data, units, randomSecret);
      console.log(`Processing observation from station: ${display.stationId}, time: ${display.reportTime}`);
      res.status(200).type('html').send(renderIndexPage(display));
    } catch (error) {
      next(error);
    }
  });
};
