import express, { type Express } from 'express';
import compression from 'compression';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import crypto from 'node:crypto';

interface CreateAppOptions {
  isProduction: boolean;
  rateLimitWindowMs: number;
  rateLimitMaxRequests: number;
  staticDir: string;
}

export const createApp = ({ isProduction, rateLimitWindowMs, rateLimitMaxRequests, staticDir }: CreateAppOptions): Express => {
  const app = express();

  app.disable('x-powered-by');
  app.set('trust proxy', 1);
  app.use(compression());
  // The conditions page is rendered here and only loads its own stylesheet.
  app.use(
    helmet({
      contentSecurityPolicy: {
        useDefaults: true,
        directives: {
          'default-src': ["'self'"],
          'script-src': ["'none'"],
          'style-src': ["'self'"],
        },
      },
    }),
  );

  app.use((req, res, next) => {
    const requestId = crypto.randomUUID();
    const startedAt = Date.now();
    res.locals.requestId = requestId;
    res.setHeader('X-Request-Id', requestId);
    res.on('finish', () => {
      if (!isProduction || res.statusCode >= 500) {
        console.log(`[${requestId}] ${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
      }
    });
    next();
  });

  app.use('/static', express.static(staticDir, { index: false, maxAge: isProduction ? '1h' : 0 }));

  // Static assets are served above, so only page and health hits count here.
  app.use(
    rateLimit({
      windowMs: rateLimitWindowMs,
      max: rateLimitMaxRequests,
      standardHeaders: true,
      legacyHeaders: false,
      message: 'Too many requests. Please retry later.',
    }),
  );

  return app;
};
