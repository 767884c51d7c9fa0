import type { Express, Request, Response } from 'express';
import pkg from '../../package.json' with { type: 'json' };
import type { ObservationCache } from '../utils/observation-cache.js';

const { version } = pkg;

const toIsoOrNull = (timeMs: number | null): string | null => (timeMs === null ? null : new Date(timeMs).toISOString());

const healthPayload = (cache: ObservationCache) => {
  const mem = process.memoryUsage();
  const snapshot = cache.snapshot();
  return {
    ok: true,
    service: 'station-conditions',
    version,
    env: process.env.NODE_ENV || 'development',
    uptime: Math.floor(process.uptime()),
    nodeVersion: process.version,
    memory: {
      heapUsedMb: Math.round(mem.heapUsed / 1024 / 1024),
      rssMb: Math.round(mem.rss / 1024 / 1024),
    },
    cache: {
      exists: snapshot.exists,
      lastFetched: toIsoOrNull(snapshot.lastFetched),
      dataAge: toIsoOrNull(snapshot.dataAge),
    },
    timestamp: new Date().toISOString(),
  };
};

interface RegisterHealthRoutesOptions {
  app: Express;
  cache: ObservationCache;
}

export const registerHealthRoutes = ({ app, cache }: RegisterHealthRoutesOptions) => {
  const respond = (_req: Request, res: Response) => {
    res.set('Cache-Control', 'no-store');
    res.json(healthPayload(cache));
  };

  app.get('/healthz', respond);
  app.get('/health', respond);
  app.get('/api/healthz', respond);
  app.get('/api/health', respond);
};
